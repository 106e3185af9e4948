import { BarcodeEncoder } from '../src/barcodeEncoder.js';
import { EncodingError } from '../src/errors.js';
import { BarcodeSymbol, LabelRecord } from '../src/types.js';

export const TEST_SVG =
  '<svg xmlns="http://www.w3.org/2000/svg" width="20" height="10" viewBox="0 0 20 10">' +
  '<rect x="0" y="0" width="4" height="10" fill="#000000"/></svg>';

/** Accepts anything except identifiers containing '!'. */
export class FakeEncoder implements BarcodeEncoder {
  readonly encoded: string[] = [];

  encode(identifier: string): BarcodeSymbol {
    if (identifier.includes('!')) {
      throw new EncodingError(identifier, 'unsupported character');
    }
    this.encoded.push(identifier);
    return { identifier, svg: TEST_SVG, width: 20, height: 10 };
  }
}

export function recordsFrom(source: string, count: number, prefix = source): LabelRecord[] {
  return Array.from({ length: count }, (_, i) => ({ identifier: `${prefix}-${i}`, source }));
}
