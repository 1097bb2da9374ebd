import { describe, it, expect } from '@jest/globals';
import {
  TABLE_BODY_DEFAULTS,
  TABLE_HEADER_DEFAULTS,
  capFractions,
  computeColumnFractions,
  layoutTable,
  resolveRowIndex,
} from './table-layout.js';
import type { TableBlock } from './types.js';

function table(overrides: Partial<TableBlock> = {}): TableBlock {
  return {
    type: 'table',
    headers: [],
    rows: [],
    header: {},
    body: {},
    grid: { width: 0.5, color: '000000' },
    cellOverrides: [],
    rowOverrides: [],
    ...overrides,
  };
}

describe('layoutTable', () => {
  it('pads short rows with blank cells', () => {
    const layout = layoutTable(table({ headers: ['A', 'B', 'C'], rows: [['1'], ['2', '3', '4', '5']] }));
    expect(layout.columns).toBe(3);
    expect(layout.rows).toEqual([
      ['1', '', ''],
      ['2', '3', '4'],
    ]);
  });

  it('takes the column count from the widest row without headers', () => {
    const layout = layoutTable(table({ rows: [['1'], ['2', '3']] }));
    expect(layout.columns).toBe(2);
    expect(layout.headers).toEqual(['', '']);
  });

  it('resolves base, row and cell styles in that order', () => {
    const layout = layoutTable(
      table({
        headers: ['A', 'B'],
        rows: [
          ['1', '2'],
          ['3', '4'],
        ],
        body: { color: '111111' },
        rowOverrides: [{ row: 1, style: { color: '222222', bold: true } }],
        cellOverrides: [{ row: 1, col: 1, style: { color: '333333' } }],
      })
    );

    expect(layout.styles[0]?.[0]).toEqual(TABLE_HEADER_DEFAULTS);
    expect(layout.styles[1]?.[0]).toEqual({ ...TABLE_BODY_DEFAULTS, color: '222222', bold: true });
    expect(layout.styles[1]?.[1]).toEqual({ ...TABLE_BODY_DEFAULTS, color: '333333', bold: true });
    expect(layout.styles[2]?.[1]).toEqual({ ...TABLE_BODY_DEFAULTS, color: '111111' });
    expect(layout.warnings).toEqual([]);
  });

  it('skips overrides outside the table with a warning', () => {
    const layout = layoutTable(
      table({
        headers: ['A', 'B'],
        rows: [['1', '2']],
        cellOverrides: [
          { row: 99, col: 0, style: { bold: true } },
          { row: 1, col: 5, style: { bold: true } },
        ],
        rowOverrides: [{ row: 5, style: { italic: true } }],
      })
    );

    expect(layout.warnings).toEqual([
      { code: 'override-out-of-range', message: 'Ignoring row override for row 5' },
      { code: 'override-out-of-range', message: 'Ignoring cell override for row 99, column 0' },
      { code: 'override-out-of-range', message: 'Ignoring cell override for row 1, column 5' },
    ]);
    expect(layout.styles[1]).toEqual([TABLE_BODY_DEFAULTS, TABLE_BODY_DEFAULTS]);
  });
});

describe('column widths', () => {
  it('caps a long column at 40% and spreads the rest by weight', () => {
    const fractions = computeColumnFractions(
      table({ headers: ['Description', 'Qty', 'Unit'], rows: [['x'.repeat(50), '1', '2']] })
    );
    // weights 50, 3, 4: the first is capped, 0.6 is shared 3:4
    expect(fractions[0]).toBeCloseTo(0.4);
    expect(fractions[1]).toBeCloseTo((0.6 * 3) / 7);
    expect(fractions[2]).toBeCloseTo((0.6 * 4) / 7);
  });

  it('leaves the table narrower than the frame when every column is capped', () => {
    expect(capFractions([5, 1])).toEqual([0.4, 0.4]);
  });

  it('splits evenly between equal columns', () => {
    expect(capFractions([1, 1, 1, 1])).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it('normalizes explicit width hints without a cap', () => {
    expect(computeColumnFractions(table({ headers: ['A', 'B'], widths: [1, 3] }))).toEqual([0.25, 0.75]);
  });

  it('gives columns without a hint the average hint', () => {
    const fractions = computeColumnFractions(table({ headers: ['A', 'B', 'C'], widths: [2] }));
    fractions.forEach(fraction => expect(fraction).toBeCloseTo(1 / 3));
  });

  it('returns nothing for an empty table', () => {
    expect(computeColumnFractions(table())).toEqual([]);
  });
});

describe('resolveRowIndex', () => {
  it('maps names and indexes onto layout rows', () => {
    expect(resolveRowIndex('header', 3)).toBe(0);
    expect(resolveRowIndex('first', 3)).toBe(1);
    expect(resolveRowIndex('last', 3)).toBe(3);
    expect(resolveRowIndex(2, 3)).toBe(2);
  });

  it('rejects rows that do not exist', () => {
    expect(resolveRowIndex(4, 3)).toBeUndefined();
    expect(resolveRowIndex(-1, 3)).toBeUndefined();
    expect(resolveRowIndex(1.5, 3)).toBeUndefined();
    expect(resolveRowIndex('first', 0)).toBeUndefined();
  });
});
