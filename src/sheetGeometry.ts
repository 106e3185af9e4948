import { Cell, Rect, SheetGeometry } from './types.js';

export const POINTS_PER_INCH = 72;

export function inch(value: number): number {
  return value * POINTS_PER_INCH;
}

// Avery 5160: 30 labels of 2-5/8" x 1" on US Letter.
// The barcode shift and lift were measured against printed die-cut sheets.
export const AVERY_5160: SheetGeometry = Object.freeze({
  pageWidth: inch(8.5),
  pageHeight: inch(11),
  marginLeft: inch(0.05),
  marginTop: inch(0.5),
  cellWidth: inch(2.625),
  cellHeight: inch(1),
  colGap: inch(0.125),
  rowGap: 0,
  rows: 10,
  cols: 3,
  barcode: Object.freeze({
    sideInset: inch(0.138),
    height: inch(0.4),
    shift: inch(0.157),
    lift: inch(0.05)
  }),
  text: Object.freeze({
    idFontSize: 6,
    idGap: inch(0.08),
    instructionFontSize: 5.5,
    instructionInset: inch(0.05)
  }),
  header: Object.freeze({
    titleFontSize: 8,
    titleBaseline: inch(0.29),
    sourceFontSize: 7,
    sourceBaseline: inch(0.42)
  })
});

export function labelsPerPage(geometry: SheetGeometry): number {
  return geometry.rows * geometry.cols;
}

/** The rectangle covered by the label grid, gaps included. */
export function usableArea(geometry: SheetGeometry): Rect {
  return {
    x: geometry.marginLeft,
    y: geometry.marginTop,
    width: geometry.cols * geometry.cellWidth + (geometry.cols - 1) * geometry.colGap,
    height: geometry.rows * geometry.cellHeight + (geometry.rows - 1) * geometry.rowGap
  };
}

/**
 * Page-relative rectangle for a label slot, filled row-major
 * (left to right, then top to bottom). Callers keep `idx` within
 * `[0, labelsPerPage)`.
 */
export function cellForIndex(idx: number, geometry: SheetGeometry): Cell {
  const row = Math.floor(idx / geometry.cols);
  const col = idx % geometry.cols;
  return {
    row,
    col,
    x: geometry.marginLeft + col * (geometry.cellWidth + geometry.colGap),
    y: geometry.marginTop + row * (geometry.cellHeight + geometry.rowGap),
    width: geometry.cellWidth,
    height: geometry.cellHeight
  };
}

/**
 * Barcode target box inside a cell. The width is a fixed inset from the
 * cell edges, not the symbol's natural width, and the box sits `shift`
 * points left of the cell's horizontal centre.
 */
export function barcodeBox(cell: Rect, geometry: SheetGeometry): Rect {
  const { sideInset, height, shift, lift } = geometry.barcode;
  const width = cell.width - 2 * sideInset;
  return {
    x: cell.x + (cell.width - width) / 2 - shift,
    y: cell.y + (cell.height - height) / 2 - lift,
    width,
    height
  };
}

export function validateGeometry(geometry: SheetGeometry): void {
  const problems: string[] = [];

  if (!Number.isInteger(geometry.rows) || geometry.rows < 1) {
    problems.push('rows must be a positive integer');
  }
  if (!Number.isInteger(geometry.cols) || geometry.cols < 1) {
    problems.push('cols must be a positive integer');
  }
  if (geometry.cellWidth <= 0 || geometry.cellHeight <= 0) {
    problems.push('cell dimensions must be positive');
  }
  if (geometry.colGap < 0 || geometry.rowGap < 0) {
    problems.push('gaps must not be negative');
  }
  if (geometry.marginLeft < 0 || geometry.marginTop < 0) {
    problems.push('margins must not be negative');
  }

  const area = usableArea(geometry);
  if (area.x + area.width > geometry.pageWidth) {
    problems.push('label columns overflow the page width');
  }
  if (area.y + area.height > geometry.pageHeight) {
    problems.push('label rows overflow the page height');
  }
  if (geometry.barcode.sideInset * 2 >= geometry.cellWidth) {
    problems.push('barcode side inset leaves no room for the barcode');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid sheet geometry: ${problems.join('; ')}`);
  }
}
