import { PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import sharp from 'sharp';
import { RecordedBarcode, RecordingSink } from './documentSink.js';
import { SheetGeometry, TextRun } from './types.js';

const DEFAULT_RASTER_DENSITY = 600;

export interface PdfSinkOptions {
  title?: string;
  rasterDensity?: number; // DPI used when rasterising barcode SVGs
}

/**
 * Collects pages like RecordingSink, then writes them with pdf-lib.
 * Geometry is needed to flip top-down page points into PDF space.
 */
export class PdfDocumentSink extends RecordingSink {
  private readonly rasterDensity: number;

  constructor(
    private readonly geometry: SheetGeometry,
    private readonly options: PdfSinkOptions = {}
  ) {
    super();
    this.rasterDensity = options.rasterDensity ?? DEFAULT_RASTER_DENSITY;
  }

  /** Returns null when nothing was recorded. */
  async toBytes(): Promise<Uint8Array | null> {
    if (this.pages.length === 0) {
      return null;
    }

    const pdfDoc = await PDFDocument.create();
    if (this.options.title) {
      pdfDoc.setTitle(this.options.title);
    }
    const fonts: Record<TextRun['weight'], PDFFont> = {
      regular: await pdfDoc.embedFont(StandardFonts.Helvetica),
      bold: await pdfDoc.embedFont(StandardFonts.HelveticaBold)
    };

    for (const recorded of this.pages) {
      const page = pdfDoc.addPage([this.geometry.pageWidth, this.geometry.pageHeight]);
      for (const barcode of recorded.barcodes) {
        await this.drawBarcodeImage(pdfDoc, page, barcode);
      }
      for (const run of recorded.texts) {
        this.drawCentredText(page, fonts[run.weight], run);
      }
    }

    return pdfDoc.save();
  }

  private async drawBarcodeImage(pdfDoc: PDFDocument, page: PDFPage, barcode: RecordedBarcode): Promise<void> {
    const png = await sharp(Buffer.from(barcode.symbol.svg), { density: this.rasterDensity })
      .png()
      .toBuffer();
    const image = await pdfDoc.embedPng(png);
    const { box } = barcode;
    // Stretched to the target box regardless of the symbol's aspect ratio.
    page.drawImage(image, {
      x: box.x,
      y: this.geometry.pageHeight - (box.y + box.height),
      width: box.width,
      height: box.height
    });
  }

  private drawCentredText(page: PDFPage, font: PDFFont, run: TextRun): void {
    const width = font.widthOfTextAtSize(run.text, run.fontSize);
    page.drawText(run.text, {
      x: run.x - width / 2,
      y: this.geometry.pageHeight - run.y,
      size: run.fontSize,
      font,
      color: rgb(0, 0, 0)
    });
  }
}
