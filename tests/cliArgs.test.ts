import { describe, expect, it } from 'vitest';
import { CliUsageError, parseCliArgs } from '../src/cliArgs.js';

describe('parseCliArgs', () => {
  it('defaults to every render option enabled', () => {
    expect(parseCliArgs([])).toEqual({
      files: [],
      pattern: '*.csv',
      dryRun: false,
      help: false,
      render: { includeHeader: true, includeIdText: true, includeInstruction: true }
    });
  });

  it('collects files, output and toggles', () => {
    const options = parseCliArgs(['a.csv', '-o', 'out/all.pdf', 'b.csv', '--no-header', '--no-instruction']);

    expect(options.files).toEqual(['a.csv', 'b.csv']);
    expect(options.output).toBe('out/all.pdf');
    expect(options.render).toEqual({ includeHeader: false, includeIdText: true, includeInstruction: false });
  });

  it('reads a directory and pattern', () => {
    const options = parseCliArgs(['--dir', 'csvs', '--pattern', 'kit-*.csv', '--no-id', '--dry-run']);

    expect(options.directory).toBe('csvs');
    expect(options.pattern).toBe('kit-*.csv');
    expect(options.render.includeIdText).toBe(false);
    expect(options.dryRun).toBe(true);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--colour'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--colour'])).toThrow('Unknown option: --colour');
  });

  it('rejects a value flag without a value', () => {
    expect(() => parseCliArgs(['-o'])).toThrow('-o needs a value');
    expect(() => parseCliArgs(['-d', '--no-id'])).toThrow('-d needs a value');
  });

  it('treats a bare word like constructor as a file', () => {
    expect(parseCliArgs(['constructor']).files).toEqual(['constructor']);
  });
});
