import fs from 'fs/promises';
import path from 'path';
import { InputResolutionError, RecordValidationError, describeError } from './errors.js';
import { LabelRecord } from './types.js';

export const BARCODE_COLUMN = 'barcode';
export const DEFAULT_PATTERN = '*.csv';

export interface InputSelection {
  files?: string[];
  directory?: string;
  pattern?: string;
  defaultDir: string;
}

export interface ParsedLabelFile {
  source: string;
  records: LabelRecord[];
  skipped: RecordValidationError[];
}

export interface LoadedRecords {
  records: LabelRecord[];
  skipped: RecordValidationError[];
  files: Array<{ source: string; path: string; labels: number }>;
}

export interface CsvRow {
  /** Physical line, 1-based, on which the row starts. */
  line: number;
  fields: string[];
}

/**
 * Splits a CSV document into rows. Quote state carries across line breaks,
 * so a quoted field may span several physical lines.
 */
export function parseCsvRows(content: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let fields: string[] = [];
  let field = '';
  let quoted = false;
  let line = 1;
  let rowStart = 1;

  const endField = () => {
    fields.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    rows.push({ line: rowStart, fields });
    fields = [];
  };

  let pos = 0;
  while (pos < content.length) {
    const char = content[pos];
    pos += 1;

    if (quoted) {
      if (char !== '"') {
        if (char === '\n') line += 1;
        field += char;
      } else if (content[pos] === '"') {
        field += '"';
        pos += 1;
      } else {
        quoted = false;
      }
      continue;
    }

    switch (char) {
      case '"':
        quoted = true;
        break;
      case ',':
        endField();
        break;
      case '\r':
        if (content[pos] !== '\n') field += char;
        break;
      case '\n':
        endRow();
        line += 1;
        rowStart = line;
        break;
      default:
        field += char;
    }
  }

  if (field !== '' || fields.length > 0) {
    endRow();
  }
  return rows;
}

export function parseCsvLine(line: string): string[] {
  return parseCsvRows(line)[0]?.fields ?? [''];
}

function isBlankRow(row: CsvRow): boolean {
  return row.fields.length === 1 && row.fields[0].trim() === '';
}

/**
 * Reads the `barcode` column of a CSV document. Rows with a blank barcode
 * are skipped and reported; every other column is ignored.
 */
export function parseLabelCsv(content: string, source: string): ParsedLabelFile {
  const rows = parseCsvRows(content.replace(/^\uFEFF/, '')).filter(row => !isBlankRow(row));
  const [header, ...body] = rows;
  if (!header) {
    return { source, records: [], skipped: [] };
  }

  const column = header.fields.map(h => h.trim().toLowerCase()).indexOf(BARCODE_COLUMN);
  if (column < 0) {
    throw new InputResolutionError(`${source} has no '${BARCODE_COLUMN}' column`);
  }

  const records: LabelRecord[] = [];
  const skipped: RecordValidationError[] = [];

  for (const row of body) {
    const identifier = (row.fields[column] ?? '').trim();
    if (!identifier) {
      skipped.push(new RecordValidationError(source, row.line));
      continue;
    }
    records.push({ identifier, source });
  }

  return { source, records, skipped };
}

export function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('')
    .map(char => {
      if (char === '*') return '[^/\\\\]*';
      if (char === '?') return '[^/\\\\]';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${escaped}$`, 'i');
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function listMatching(directory: string, pattern: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    throw new InputResolutionError(`Cannot read directory ${directory}: ${describeError(error)}`, { cause: error });
  }

  const matcher = patternToRegExp(pattern);
  const matches: string[] = [];
  for (const entry of entries.sort()) {
    const fullPath = path.join(directory, entry);
    if (matcher.test(entry) && (await isFile(fullPath))) {
      matches.push(fullPath);
    }
  }
  return matches;
}

/**
 * A directory with a pattern wins over explicit files; with neither,
 * files come from the default input directory (created if missing).
 */
export async function resolveInputFiles(selection: InputSelection): Promise<string[]> {
  const pattern = selection.pattern || DEFAULT_PATTERN;

  if (selection.directory) {
    const files = await listMatching(selection.directory, pattern);
    if (files.length === 0) {
      throw new InputResolutionError(`No files matching '${pattern}' in ${selection.directory}`);
    }
    return files;
  }

  if (selection.files && selection.files.length > 0) {
    for (const file of selection.files) {
      if (!(await isFile(file))) {
        throw new InputResolutionError(`Input file not found: ${file}`);
      }
    }
    return [...selection.files];
  }

  await fs.mkdir(selection.defaultDir, { recursive: true });
  const files = await listMatching(selection.defaultDir, DEFAULT_PATTERN);
  if (files.length === 0) {
    throw new InputResolutionError(`No CSV files found in '${selection.defaultDir}'`);
  }
  return files;
}

export async function readLabelFile(filePath: string): Promise<ParsedLabelFile> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputResolutionError(`Cannot read ${filePath}: ${describeError(error)}`, { cause: error });
  }
  return parseLabelCsv(content, path.basename(filePath));
}

/** Concatenates the records of every file, keeping each file contiguous and in the given order. */
export async function readLabelFiles(filePaths: string[]): Promise<LoadedRecords> {
  const loaded: LoadedRecords = { records: [], skipped: [], files: [] };
  for (const filePath of filePaths) {
    const parsed = await readLabelFile(filePath);
    loaded.records.push(...parsed.records);
    loaded.skipped.push(...parsed.skipped);
    loaded.files.push({ source: parsed.source, path: filePath, labels: parsed.records.length });
  }
  return loaded;
}
