import bwipjs from 'bwip-js';
import { EncodingError, describeError } from './errors.js';
import { BarcodeSymbol } from './types.js';

export interface BarcodeEncoder {
  /** Throws EncodingError when the identifier cannot be represented. */
  encode(identifier: string): BarcodeSymbol;
}

const PRINTABLE_ASCII = /^[\x20-\x7e]+$/;
const VIEW_BOX_REGEX = /viewBox="\s*[-\d.]+[\s,]+[-\d.]+[\s,]+([\d.]+)[\s,]+([\d.]+)\s*"/;
const WIDTH_REGEX = /<svg[^>]*\swidth="([\d.]+)/;
const HEIGHT_REGEX = /<svg[^>]*\sheight="([\d.]+)/;

/** Intrinsic size from the viewBox, or the root width/height attributes. */
export function svgSize(svg: string): { width: number; height: number } | null {
  const viewBox = svg.match(VIEW_BOX_REGEX);
  if (viewBox) {
    return { width: Number.parseFloat(viewBox[1]), height: Number.parseFloat(viewBox[2]) };
  }
  const width = svg.match(WIDTH_REGEX);
  const height = svg.match(HEIGHT_REGEX);
  if (width && height) {
    return { width: Number.parseFloat(width[1]), height: Number.parseFloat(height[1]) };
  }
  return null;
}

/** Code 128 via bwip-js, returned as an SVG symbol. */
export class Code128Encoder implements BarcodeEncoder {
  encode(identifier: string): BarcodeSymbol {
    if (identifier.length === 0) {
      throw new EncodingError(identifier, 'identifier is empty');
    }
    if (!PRINTABLE_ASCII.test(identifier)) {
      const bad = [...identifier].find(char => !PRINTABLE_ASCII.test(char)) ?? '';
      const code = bad.codePointAt(0)?.toString(16).toUpperCase().padStart(4, '0') ?? '????';
      throw new EncodingError(identifier, `unsupported character U+${code}`);
    }

    let svg: string;
    try {
      svg = bwipjs.toSVG({
        bcid: 'code128',
        text: identifier,
        scale: 2,
        height: 10,
        includetext: false
      });
    } catch (error) {
      throw new EncodingError(identifier, describeError(error), undefined, { cause: error });
    }

    const size = svgSize(svg);
    if (!size || size.width <= 0 || size.height <= 0) {
      throw new EncodingError(identifier, 'encoder returned an SVG without a usable size');
    }

    return { identifier, svg, ...size };
  }
}
