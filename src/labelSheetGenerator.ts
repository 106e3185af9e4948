import fs from 'fs/promises';
import path from 'path';
import { BarcodeEncoder, Code128Encoder } from './barcodeEncoder.js';
import { readLabelFiles, LoadedRecords } from './csvInput.js';
import { RecordingSink } from './documentSink.js';
import { OutputWriteError, RecordValidationError } from './errors.js';
import { DEFAULT_LABEL_TEXTS } from './labelLayout.js';
import { GenerationResult, PageSummary, PaginationEngine } from './paginationEngine.js';
import { PdfDocumentSink } from './pdfDocumentSink.js';
import { AVERY_5160, validateGeometry } from './sheetGeometry.js';
import { LabelRecord, LabelTexts, RenderOptions, SheetGeometry } from './types.js';

export const MULTI_FILE_OUTPUT_NAME = 'barcode_sheets.pdf';

export interface GeneratorOptions {
  geometry?: SheetGeometry;
  encoder?: BarcodeEncoder;
  texts?: LabelTexts;
  rasterDensity?: number;
  log?: (message: string) => void;
}

export interface GenerationSummary {
  outputPath: string | null; // null when nothing was written
  pages: number;
  labels: number;
  files: LoadedRecords['files'];
  skipped: RecordValidationError[];
  pageSummaries: PageSummary[];
}

export interface RenderedDocument {
  result: GenerationResult;
  bytes: Uint8Array | null;
}

export function defaultOutputPath(inputFiles: string[], outputDir: string): string {
  if (inputFiles.length === 1) {
    const base = path.basename(inputFiles[0], path.extname(inputFiles[0]));
    return path.join(outputDir, `${base}.pdf`);
  }
  return path.join(outputDir, MULTI_FILE_OUTPUT_NAME);
}

export class LabelSheetGenerator {
  private readonly geometry: SheetGeometry;
  private readonly encoder: BarcodeEncoder;
  private readonly texts: LabelTexts;
  private readonly rasterDensity?: number;
  private readonly log: (message: string) => void;

  constructor(options: GeneratorOptions = {}) {
    this.geometry = options.geometry ?? AVERY_5160;
    validateGeometry(this.geometry);
    this.encoder = options.encoder ?? new Code128Encoder();
    this.texts = options.texts ?? DEFAULT_LABEL_TEXTS;
    this.rasterDensity = options.rasterDensity;
    this.log = options.log ?? console.log;
  }

  /** Lays out the records without producing a document. */
  preview(records: Iterable<LabelRecord>, options: RenderOptions): GenerationResult {
    const engine = new PaginationEngine(this.geometry, this.encoder, new RecordingSink(), this.texts);
    return engine.generate(records, options);
  }

  async render(records: Iterable<LabelRecord>, options: RenderOptions, title?: string): Promise<RenderedDocument> {
    const sink = new PdfDocumentSink(this.geometry, { title, rasterDensity: this.rasterDensity });
    const engine = new PaginationEngine(this.geometry, this.encoder, sink, this.texts);
    const result = engine.generate(records, options);
    return { result, bytes: await sink.toBytes() };
  }

  /**
   * Reads every input file, renders the whole document in memory and only
   * then writes it, so a failed run leaves no output file behind.
   */
  async generate(
    inputFiles: string[],
    outputPath: string,
    options: RenderOptions,
    dryRun = false
  ): Promise<GenerationSummary> {
    if (!dryRun) {
      await this.ensureOutputDir(outputPath);
    }

    const loaded = await readLabelFiles(inputFiles);
    for (const file of loaded.files) {
      this.log(`  Processing ${file.source}: ${file.labels} barcodes`);
    }
    for (const warning of loaded.skipped) {
      this.log(`  Skipped ${warning.message}`);
    }

    const summary: GenerationSummary = {
      outputPath: null,
      pages: 0,
      labels: 0,
      files: loaded.files,
      skipped: loaded.skipped,
      pageSummaries: []
    };

    if (loaded.records.length === 0) {
      this.log('No barcodes found in the input files; nothing to write.');
      return summary;
    }

    if (dryRun) {
      return { ...summary, ...this.totals(this.preview(loaded.records, options)) };
    }

    const title = path.basename(outputPath, path.extname(outputPath));
    const { result, bytes } = await this.render(loaded.records, options, title);
    if (bytes) {
      await this.writeOutput(outputPath, bytes);
      summary.outputPath = outputPath;
    }
    return { ...summary, ...this.totals(result) };
  }

  private totals(result: GenerationResult): Pick<GenerationSummary, 'pages' | 'labels' | 'pageSummaries'> {
    return { pages: result.pages, labels: result.labels, pageSummaries: result.pageSummaries };
  }

  private async ensureOutputDir(outputPath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
    } catch (error) {
      throw new OutputWriteError(outputPath, { cause: error });
    }
  }

  private async writeOutput(outputPath: string, bytes: Uint8Array): Promise<void> {
    try {
      await fs.writeFile(outputPath, bytes);
    } catch (error) {
      throw new OutputWriteError(outputPath, { cause: error });
    }
  }
}
