export class LabelSheetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No input files matched, or a file could not be read or lacks a barcode column. */
export class InputResolutionError extends LabelSheetError {}

/** A CSV row without an identifier. Reported as a warning; the row is skipped. */
export class RecordValidationError extends LabelSheetError {
  constructor(
    public readonly source: string,
    public readonly rowNumber: number
  ) {
    super(`${source} row ${rowNumber}: missing barcode value`);
  }
}

export class EncodingError extends LabelSheetError {
  constructor(
    public readonly identifier: string,
    public readonly reason: string,
    public readonly source?: string,
    options?: { cause?: unknown }
  ) {
    const origin = source ? ` from ${source}` : '';
    super(`Cannot encode barcode '${identifier}'${origin}: ${reason}`, options);
  }

  withSource(source: string): EncodingError {
    return new EncodingError(this.identifier, this.reason, source, { cause: this.cause });
  }
}

export class OutputWriteError extends LabelSheetError {
  constructor(
    public readonly outputPath: string,
    options?: { cause?: unknown }
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot write output file ${outputPath}${detail}`, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
