import { DEFAULT_PATTERN } from './csvInput.js';
import { RenderOptions } from './types.js';

export interface CliOptions {
  files: string[];
  output?: string;
  directory?: string;
  pattern: string;
  render: RenderOptions;
  dryRun: boolean;
  help: boolean;
}

export class CliUsageError extends Error {}

const VALUE_FLAGS: Record<string, 'output' | 'directory' | 'pattern'> = {
  '-o': 'output',
  '--output': 'output',
  '-d': 'directory',
  '--dir': 'directory',
  '-p': 'pattern',
  '--pattern': 'pattern'
};

export function parseCliArgs(argv: string[]): CliOptions {
  const options: Omit<CliOptions, 'render'> = {
    files: [],
    pattern: DEFAULT_PATTERN,
    dryRun: false,
    help: false
  };
  let includeHeader = true;
  let includeIdText = true;
  let includeInstruction = true;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const valueFlag = Object.hasOwn(VALUE_FLAGS, arg) ? VALUE_FLAGS[arg] : undefined;

    if (valueFlag) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CliUsageError(`${arg} needs a value`);
      }
      options[valueFlag] = next;
      i += 1;
    } else if (arg === '--no-header') {
      includeHeader = false;
    } else if (arg === '--no-id') {
      includeIdText = false;
    } else if (arg === '--no-instruction') {
      includeInstruction = false;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      options.files.push(arg);
    }
  }

  return { ...options, render: { includeHeader, includeIdText, includeInstruction } };
}

export const HELP_TEXT = `
Usage:
  barcode-label-sheets [csv files...] [options]

Generates 30-up barcode label sheets (Avery 5160) from CSV files with a
'barcode' column. Without files or --dir, every *.csv in the input
directory is used.

Options:
  -o, --output <file>    Output PDF (default: named after the input)
  -d, --dir <dir>        Process all matching CSV files in a directory
  -p, --pattern <glob>   File pattern for --dir (default: *.csv)
  --no-header            Omit page headers
  --no-id                Omit the barcode id under each barcode
  --no-instruction       Omit the instruction line
  --dry-run              Lay out the sheets and report without writing
  -h, --help             Show this help

Examples:
  barcode-label-sheets data.csv -o output/barcodes.pdf
  barcode-label-sheets file1.csv file2.csv -o output/combined.pdf
  barcode-label-sheets --dir ./csv_files/ --no-header --no-instruction
`.trim();
