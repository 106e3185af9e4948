import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  parseCsvLine,
  parseCsvRows,
  parseLabelCsv,
  patternToRegExp,
  readLabelFiles,
  resolveInputFiles
} from '../src/csvInput.js';
import { InputResolutionError } from '../src/errors.js';

describe('parseCsvLine', () => {
  it('splits quoted fields and unescapes doubled quotes', () => {
    expect(parseCsvLine('a,"b,c","say ""hi""",')).toEqual(['a', 'b,c', 'say "hi"', '']);
  });
});

describe('parseCsvRows', () => {
  it('keeps a quoted line break inside its field and numbers rows by starting line', () => {
    expect(parseCsvRows('a,b\r\n1,"x\r\ny"\r\n2,z')).toEqual([
      { line: 1, fields: ['a', 'b'] },
      { line: 2, fields: ['1', 'x\r\ny'] },
      { line: 4, fields: ['2', 'z'] }
    ]);
  });
});

describe('parseLabelCsv', () => {
  it('does not turn a multi-line quoted note into extra labels', () => {
    const parsed = parseLabelCsv('barcode,note\nA-1,"line one\nline two"\nA-2,x\n', 'n.csv');

    expect(parsed.records.map(r => r.identifier)).toEqual(['A-1', 'A-2']);
    expect(parsed.skipped).toEqual([]);
  });

  it('reports the starting line of a skipped row after a multi-line field', () => {
    const parsed = parseLabelCsv('barcode,note\nA-1,"one\ntwo\nthree"\n,blank\n', 'n.csv');

    expect(parsed.records.map(r => r.identifier)).toEqual(['A-1']);
    expect(parsed.skipped.map(s => s.rowNumber)).toEqual([5]);
  });

  it('reads only the barcode column, wherever it is', () => {
    const parsed = parseLabelCsv('id,Barcode,notes\n1,S-001,first\n2," S-002 ",second\n', 'kit.csv');

    expect(parsed.records).toEqual([
      { identifier: 'S-001', source: 'kit.csv' },
      { identifier: 'S-002', source: 'kit.csv' }
    ]);
    expect(parsed.skipped).toEqual([]);
  });

  it('skips rows without a barcode and reports their line numbers', () => {
    const parsed = parseLabelCsv('barcode,notes\r\nS-1,x\r\n,missing\r\n\r\nS-2,y\r\n', 'kit.csv');

    expect(parsed.records.map(r => r.identifier)).toEqual(['S-1', 'S-2']);
    expect(parsed.skipped).toHaveLength(1);
    expect(parsed.skipped[0].rowNumber).toBe(3);
    expect(parsed.skipped[0].message).toBe('kit.csv row 3: missing barcode value');
  });

  it('ignores a byte order mark before the header', () => {
    const parsed = parseLabelCsv('\uFEFFbarcode\nS-9\n', 'bom.csv');
    expect(parsed.records).toEqual([{ identifier: 'S-9', source: 'bom.csv' }]);
  });

  it('fails when the barcode column is missing', () => {
    expect(() => parseLabelCsv('sku,notes\nA,1\n', 'wrong.csv')).toThrow("wrong.csv has no 'barcode' column");
  });

  it('returns nothing for an empty document', () => {
    expect(parseLabelCsv('\n\n', 'empty.csv').records).toEqual([]);
  });
});

describe('patternToRegExp', () => {
  it('matches wildcards case-insensitively', () => {
    const regex = patternToRegExp('*.csv');
    expect(regex.test('batch.CSV')).toBe(true);
    expect(regex.test('batch.csv.bak')).toBe(false);
    expect(patternToRegExp('kit-?.csv').test('kit-7.csv')).toBe(true);
    expect(patternToRegExp('kit-?.csv').test('kit-17.csv')).toBe(false);
  });
});

describe('input file resolution', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'label-sheets-'));
    await fs.writeFile(path.join(tempDir, 'b.csv'), 'barcode\nB-1\nB-2\n', 'utf8');
    await fs.writeFile(path.join(tempDir, 'a.csv'), 'barcode\nA-1\n', 'utf8');
    await fs.writeFile(path.join(tempDir, 'notes.txt'), 'barcode\nN-1\n', 'utf8');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('lists matching files of a directory in sorted order', async () => {
    const files = await resolveInputFiles({ directory: tempDir, defaultDir: tempDir });
    expect(files).toEqual([path.join(tempDir, 'a.csv'), path.join(tempDir, 'b.csv')]);
  });

  it('applies a custom pattern', async () => {
    const files = await resolveInputFiles({ directory: tempDir, pattern: 'b*', defaultDir: tempDir });
    expect(files).toEqual([path.join(tempDir, 'b.csv')]);
  });

  it('keeps explicit files in the given order', async () => {
    const b = path.join(tempDir, 'b.csv');
    const a = path.join(tempDir, 'a.csv');
    expect(await resolveInputFiles({ files: [b, a], defaultDir: tempDir })).toEqual([b, a]);
  });

  it('rejects a missing explicit file', async () => {
    const missing = path.join(tempDir, 'missing.csv');
    await expect(resolveInputFiles({ files: [missing], defaultDir: tempDir })).rejects.toThrow(
      `Input file not found: ${missing}`
    );
  });

  it('creates an empty default directory and reports that nothing was found', async () => {
    const defaultDir = path.join(tempDir, 'input');
    await expect(resolveInputFiles({ defaultDir })).rejects.toBeInstanceOf(InputResolutionError);
    expect((await fs.stat(defaultDir)).isDirectory()).toBe(true);
  });

  it('concatenates records file by file', async () => {
    const loaded = await readLabelFiles([path.join(tempDir, 'b.csv'), path.join(tempDir, 'a.csv')]);

    expect(loaded.records.map(r => `${r.source}:${r.identifier}`)).toEqual(['b.csv:B-1', 'b.csv:B-2', 'a.csv:A-1']);
    expect(loaded.files.map(f => [f.source, f.labels])).toEqual([
      ['b.csv', 2],
      ['a.csv', 1]
    ]);
  });
});
