import { BarcodeEncoder } from './barcodeEncoder.js';
import { DocumentSink } from './documentSink.js';
import { EncodingError } from './errors.js';
import { DEFAULT_LABEL_TEXTS, layoutHeader, layoutLabel } from './labelLayout.js';
import { cellForIndex, labelsPerPage } from './sheetGeometry.js';
import { BarcodeSymbol, LabelRecord, LabelTexts, RenderOptions, SheetGeometry } from './types.js';

export type PageState = 'fresh' | 'filling' | 'full';

export interface PageCursor {
  pageNumber: number;
  index: number;         // next free slot on the page
  state: PageState;
  source: string | null; // source of the last placed record
  sources: string[];     // every source on the page, in order of first appearance
}

export interface Placement {
  pageNumber: number;
  index: number;
  identifier: string;
  source: string;
}

export interface PageSummary {
  pageNumber: number;
  labels: number;
  sources: string[];
}

export interface GenerationResult {
  pages: number;
  labels: number;
  pageSummaries: PageSummary[];
  placements: Placement[];
}

/**
 * Packs records onto label sheets in input order. A page is flushed only
 * when all of its slots are used or the run ends, so a change of source
 * file mid-page continues on the same sheet.
 */
export class PaginationEngine {
  private readonly perPage: number;

  constructor(
    private readonly geometry: SheetGeometry,
    private readonly encoder: BarcodeEncoder,
    private readonly sink: DocumentSink,
    private readonly texts: LabelTexts = DEFAULT_LABEL_TEXTS
  ) {
    this.perPage = labelsPerPage(geometry);
  }

  /**
   * Places every record and closes the last page. The header is written
   * once, when a page closes, as a single `Source:` line listing each file
   * placed on that page in order of first appearance. A page that starts
   * with B and continues with C therefore prints `Source: b.csv, c.csv`
   * rather than a second header at the switch; the switch only shows in
   * `PageSummary.sources` and never moves a label.
   */
  generate(records: Iterable<LabelRecord>, options: RenderOptions): GenerationResult {
    const result: GenerationResult = { pages: 0, labels: 0, pageSummaries: [], placements: [] };
    let cursor: PageCursor | null = null;

    for (const record of records) {
      if (cursor === null) {
        cursor = this.openPage(1);
      } else if (cursor.state === 'full') {
        this.closePage(cursor, options, result);
        cursor = this.openPage(cursor.pageNumber + 1);
      }

      if (cursor.source !== record.source) {
        cursor.source = record.source;
        if (!cursor.sources.includes(record.source)) {
          cursor.sources.push(record.source);
        }
      }

      this.place(cursor, record, options);
      result.placements.push({
        pageNumber: cursor.pageNumber,
        index: cursor.index - 1,
        identifier: record.identifier,
        source: record.source
      });
    }

    if (cursor !== null && cursor.state !== 'fresh') {
      this.closePage(cursor, options, result);
    }

    return result;
  }

  private openPage(pageNumber: number): PageCursor {
    this.sink.beginPage(pageNumber);
    return { pageNumber, index: 0, state: 'fresh', source: null, sources: [] };
  }

  private place(cursor: PageCursor, record: LabelRecord, options: RenderOptions): void {
    if (cursor.state === 'full') {
      throw new Error(`Page ${cursor.pageNumber} has no free label slot`);
    }

    let symbol: BarcodeSymbol;
    try {
      symbol = this.encoder.encode(record.identifier);
    } catch (error) {
      if (error instanceof EncodingError) {
        throw error.withSource(record.source);
      }
      throw error;
    }

    const cell = cellForIndex(cursor.index, this.geometry);
    const layout = layoutLabel(cell, record.identifier, options, this.geometry, this.texts);
    this.sink.drawBarcode(symbol, layout.barcode);
    if (layout.idText) {
      this.sink.drawText(layout.idText);
    }
    if (layout.instruction) {
      this.sink.drawText(layout.instruction);
    }

    cursor.index += 1;
    cursor.state = cursor.index === this.perPage ? 'full' : 'filling';
  }

  private closePage(cursor: PageCursor, options: RenderOptions, result: GenerationResult): void {
    if (options.includeHeader) {
      for (const run of layoutHeader(cursor.sources, this.geometry, this.texts)) {
        this.sink.drawText(run);
      }
    }
    this.sink.endPage();

    result.pages += 1;
    result.labels += cursor.index;
    result.pageSummaries.push({
      pageNumber: cursor.pageNumber,
      labels: cursor.index,
      sources: [...cursor.sources]
    });
  }
}
