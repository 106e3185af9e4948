import { BarcodeSymbol, Rect, TextRun } from './types.js';

/**
 * Drawing capability the pagination engine writes to. Coordinates are
 * top-down page points (see SheetGeometry).
 */
export interface DocumentSink {
  beginPage(pageNumber: number): void;
  drawBarcode(symbol: BarcodeSymbol, box: Rect): void;
  drawText(run: TextRun): void;
  endPage(): void;
}

export interface RecordedBarcode {
  symbol: BarcodeSymbol;
  box: Rect;
}

export interface RecordedPage {
  pageNumber: number;
  barcodes: RecordedBarcode[];
  texts: TextRun[];
}

export type SinkEvent =
  | { type: 'beginPage'; pageNumber: number }
  | { type: 'barcode'; identifier: string }
  | { type: 'text'; text: string }
  | { type: 'endPage'; pageNumber: number };

/** Keeps every page in memory. */
export class RecordingSink implements DocumentSink {
  readonly pages: RecordedPage[] = [];
  readonly events: SinkEvent[] = [];
  private current: RecordedPage | null = null;

  beginPage(pageNumber: number): void {
    if (this.current) {
      throw new Error(`Page ${this.current.pageNumber} is still open`);
    }
    this.current = { pageNumber, barcodes: [], texts: [] };
    this.events.push({ type: 'beginPage', pageNumber });
  }

  drawBarcode(symbol: BarcodeSymbol, box: Rect): void {
    this.requirePage().barcodes.push({ symbol, box });
    this.events.push({ type: 'barcode', identifier: symbol.identifier });
  }

  drawText(run: TextRun): void {
    this.requirePage().texts.push(run);
    this.events.push({ type: 'text', text: run.text });
  }

  endPage(): void {
    const page = this.requirePage();
    this.pages.push(page);
    this.current = null;
    this.events.push({ type: 'endPage', pageNumber: page.pageNumber });
  }

  get pageCount(): number {
    return this.pages.length;
  }

  private requirePage(): RecordedPage {
    if (!this.current) {
      throw new Error('No page is open');
    }
    return this.current;
  }
}
