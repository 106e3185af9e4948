export interface LabelRecord {
  readonly identifier: string;
  readonly source: string; // display name of the originating file
}

export interface RenderOptions {
  readonly includeHeader: boolean;
  readonly includeIdText: boolean;
  readonly includeInstruction: boolean;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  includeHeader: true,
  includeIdText: true,
  includeInstruction: true
};

/**
 * All lengths are PDF points (72 per inch). Page space has its origin at the
 * top-left corner and `y` grows downward; only the PDF writer flips it.
 */
export interface SheetGeometry {
  readonly pageWidth: number;
  readonly pageHeight: number;
  readonly marginLeft: number;
  readonly marginTop: number;
  readonly cellWidth: number;
  readonly cellHeight: number;
  readonly colGap: number;
  readonly rowGap: number;
  readonly rows: number;
  readonly cols: number;
  readonly barcode: BarcodeCalibration;
  readonly text: LabelTextMetrics;
  readonly header: HeaderMetrics;
}

export interface BarcodeCalibration {
  sideInset: number;
  height: number;
  shift: number;  // positive moves left of centre
  lift: number;   // positive moves up from the cell's vertical centre
}

export interface LabelTextMetrics {
  idFontSize: number;
  idGap: number;             // barcode bottom to id baseline
  instructionFontSize: number;
  instructionInset: number;  // cell bottom to instruction baseline
}

export interface HeaderMetrics {
  titleFontSize: number;
  titleBaseline: number;
  sourceFontSize: number;
  sourceBaseline: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Cell extends Rect {
  row: number;
  col: number;
}

export interface BarcodeSymbol {
  identifier: string;
  svg: string;
  width: number;  // intrinsic, in SVG user units
  height: number;
}

export type FontWeight = 'regular' | 'bold';

/** Text centred on `x` with its baseline at `y`. */
export interface TextRun {
  text: string;
  x: number;
  y: number;
  fontSize: number;
  weight: FontWeight;
}

export interface LabelTexts {
  headerTitle: string;
  instruction: string;
  sourcePrefix: string;
}
