import { barcodeBox } from './sheetGeometry.js';
import { Cell, LabelTexts, Rect, RenderOptions, SheetGeometry, TextRun } from './types.js';

export const DEFAULT_LABEL_TEXTS: LabelTexts = {
  headerTitle: 'One barcode per collection pouch. To be scanned via the ARQ app.',
  instruction: 'scan in ARQ app after taking blood sample',
  sourcePrefix: 'Source: '
};

export interface LabelLayout {
  barcode: Rect;
  idText?: TextRun;
  instruction?: TextRun;
}

export function layoutLabel(
  cell: Cell,
  identifier: string,
  options: RenderOptions,
  geometry: SheetGeometry,
  texts: LabelTexts = DEFAULT_LABEL_TEXTS
): LabelLayout {
  const barcode = barcodeBox(cell, geometry);
  // Text is centred on the cell, not on the shifted barcode.
  const centerX = cell.x + cell.width / 2;
  const layout: LabelLayout = { barcode };

  if (options.includeIdText) {
    layout.idText = {
      text: identifier,
      x: centerX,
      y: barcode.y + barcode.height + geometry.text.idGap,
      fontSize: geometry.text.idFontSize,
      weight: 'regular'
    };
  }

  if (options.includeInstruction) {
    layout.instruction = {
      text: texts.instruction,
      x: centerX,
      y: cell.y + cell.height - geometry.text.instructionInset,
      fontSize: geometry.text.instructionFontSize,
      weight: 'regular'
    };
  }

  return layout;
}

/**
 * Page header: a bold title line above a line naming the source files.
 * Both lines are centred on the page width.
 */
export function layoutHeader(
  sources: readonly string[],
  geometry: SheetGeometry,
  texts: LabelTexts = DEFAULT_LABEL_TEXTS
): TextRun[] {
  const centerX = geometry.pageWidth / 2;
  return [
    {
      text: texts.headerTitle,
      x: centerX,
      y: geometry.header.titleBaseline,
      fontSize: geometry.header.titleFontSize,
      weight: 'bold'
    },
    {
      text: `${texts.sourcePrefix}${sources.join(', ')}`,
      x: centerX,
      y: geometry.header.sourceBaseline,
      fontSize: geometry.header.sourceFontSize,
      weight: 'regular'
    }
  ];
}
