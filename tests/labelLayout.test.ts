import { describe, expect, it } from 'vitest';
import { DEFAULT_LABEL_TEXTS, layoutHeader, layoutLabel } from '../src/labelLayout.js';
import { AVERY_5160, cellForIndex, inch } from '../src/sheetGeometry.js';
import { DEFAULT_RENDER_OPTIONS } from '../src/types.js';

describe('layoutLabel', () => {
  const cell = cellForIndex(0, AVERY_5160);

  it('puts the id text 0.08in under the barcode, centred on the cell', () => {
    const layout = layoutLabel(cell, 'S-0001', DEFAULT_RENDER_OPTIONS, AVERY_5160);

    expect(layout.barcode.y).toBeCloseTo(54, 9);
    expect(layout.idText).toBeDefined();
    expect(layout.idText?.text).toBe('S-0001');
    expect(layout.idText?.fontSize).toBe(6);
    expect(layout.idText?.x).toBeCloseTo(cell.x + inch(2.625) / 2, 9);
    expect(layout.idText?.y).toBeCloseTo(54 + inch(0.4) + inch(0.08), 9);
  });

  it('puts the instruction line 0.05in above the cell bottom', () => {
    const layout = layoutLabel(cell, 'S-0001', DEFAULT_RENDER_OPTIONS, AVERY_5160);

    expect(layout.instruction?.text).toBe('scan in ARQ app after taking blood sample');
    expect(layout.instruction?.fontSize).toBe(5.5);
    expect(layout.instruction?.y).toBeCloseTo(cell.y + cell.height - inch(0.05), 9);
  });

  it('omits text the options turn off', () => {
    const layout = layoutLabel(
      cell,
      'S-0001',
      { includeHeader: true, includeIdText: false, includeInstruction: false },
      AVERY_5160
    );

    expect(layout.idText).toBeUndefined();
    expect(layout.instruction).toBeUndefined();
    expect(layout.barcode.width).toBeCloseTo(inch(2.349), 9);
  });

  it('uses custom instruction text', () => {
    const layout = layoutLabel(cell, 'S-1', DEFAULT_RENDER_OPTIONS, AVERY_5160, {
      ...DEFAULT_LABEL_TEXTS,
      instruction: 'peel and stick'
    });
    expect(layout.instruction?.text).toBe('peel and stick');
  });
});

describe('layoutHeader', () => {
  it('centres both lines on the page', () => {
    const [title, source] = layoutHeader(['a.csv'], AVERY_5160);

    expect(title).toEqual({
      text: DEFAULT_LABEL_TEXTS.headerTitle,
      x: 306,
      y: inch(0.29),
      fontSize: 8,
      weight: 'bold'
    });
    expect(source).toEqual({
      text: 'Source: a.csv',
      x: 306,
      y: inch(0.42),
      fontSize: 7,
      weight: 'regular'
    });
  });

  it('names every source on the page', () => {
    const runs = layoutHeader(['a.csv', 'b.csv'], AVERY_5160);
    expect(runs[1].text).toBe('Source: a.csv, b.csv');
  });
});
