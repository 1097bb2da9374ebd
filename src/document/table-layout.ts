// Table geometry and cell style resolution shared by the backends

import { mergeStyles } from './style.js';
import type { CellStyle, RowRef, StyleWarning, TableBlock } from './types.js';

export const MAX_COLUMN_FRACTION = 0.4;
export const MIN_COLUMN_WEIGHT = 3;

export const TABLE_HEADER_DEFAULTS: CellStyle = {
  fontSize: 10,
  bold: true,
  color: '000000',
  backgroundColor: 'D3D3D3',
  alignment: 'center',
  verticalAlignment: 'middle',
  wrap: true,
};

export const TABLE_BODY_DEFAULTS: CellStyle = {
  fontSize: 9,
  bold: false,
  color: '000000',
  backgroundColor: 'FFFFFF',
  alignment: 'left',
  verticalAlignment: 'middle',
  wrap: true,
};

/** Points of padding inside each cell */
export const DEFAULT_CELL_MARGIN = 5;

const CELL_STYLE_KEYS: readonly (keyof CellStyle)[] = [
  'fontName',
  'fontSize',
  'color',
  'backgroundColor',
  'bold',
  'italic',
  'alignment',
  'verticalAlignment',
  'wrap',
  'border',
];

export interface TableLayout {
  columns: number;
  /** Header row padded to `columns` */
  headers: string[];
  /** Body rows padded with blanks and cut to `columns` */
  rows: string[][];
  /** Share of the frame width per column; sums to at most 1 */
  fractions: number[];
  /** Resolved styles, row 0 is the header */
  styles: CellStyle[][];
  warnings: StyleWarning[];
}

export function columnCount(table: Pick<TableBlock, 'headers' | 'rows'>): number {
  if (table.headers.length > 0) return table.headers.length;
  return table.rows.reduce((max, row) => Math.max(max, row.length), 0);
}

export function normalizeRow(row: readonly string[], columns: number): string[] {
  const cells: string[] = [];
  for (let i = 0; i < columns; i++) {
    cells.push(row[i] ?? '');
  }
  return cells;
}

/**
 * Cap every fraction at `cap`, handing the surplus to the uncapped columns in
 * proportion to their weight. When every column hits the cap the total stays
 * below 1.
 */
export function capFractions(weights: readonly number[], cap = MAX_COLUMN_FRACTION): number[] {
  const capped = new Set<number>();
  let fractions = weights.map(() => 0);

  for (;;) {
    const free = weights.map((_, i) => i).filter(i => !capped.has(i));
    const remaining = 1 - capped.size * cap;
    const freeWeight = free.reduce((sum, i) => sum + (weights[i] ?? 0), 0);

    fractions = weights.map((weight, i) =>
      capped.has(i) ? cap : freeWeight > 0 ? (remaining * weight) / freeWeight : 0
    );

    const over = free.filter(i => (fractions[i] ?? 0) > cap);
    if (over.length === 0) return fractions;
    over.forEach(i => capped.add(i));
  }
}

/**
 * Column widths as fractions of the frame. Explicit `widths` are proportional
 * hints; without them each column weighs the longest text it holds.
 */
export function computeColumnFractions(table: TableBlock, columns = columnCount(table)): number[] {
  if (columns === 0) return [];

  const hints = (table.widths ?? []).slice(0, columns).filter(w => Number.isFinite(w) && w > 0);
  if (hints.length > 0) {
    const average = hints.reduce((sum, w) => sum + w, 0) / hints.length;
    const weights = normalizeRow([], columns).map((_, i) => {
      const hint = table.widths?.[i];
      return hint !== undefined && Number.isFinite(hint) && hint > 0 ? hint : average;
    });
    const total = weights.reduce((sum, w) => sum + w, 0);
    return weights.map(w => w / total);
  }

  const weights: number[] = [];
  for (let col = 0; col < columns; col++) {
    let longest = (table.headers[col] ?? '').length;
    for (const row of table.rows) {
      longest = Math.max(longest, (row[col] ?? '').length);
    }
    weights.push(Math.max(MIN_COLUMN_WEIGHT, longest));
  }
  return capFractions(weights);
}

/**
 * Map a row reference onto a layout row (0 = header, 1..bodyRows = body).
 * Out-of-range references yield undefined.
 */
export function resolveRowIndex(row: RowRef, bodyRows: number): number | undefined {
  if (row === 'header') return 0;
  if (row === 'first') return bodyRows > 0 ? 1 : undefined;
  if (row === 'last') return bodyRows > 0 ? bodyRows : undefined;
  if (!Number.isInteger(row) || row < 0 || row > bodyRows) return undefined;
  return row;
}

/**
 * Work out every cell's style: base (header or body) → row override → cell
 * override. Overrides pointing outside the table are skipped with a warning.
 */
export function layoutTable(table: TableBlock): TableLayout {
  const columns = columnCount(table);
  const headers = normalizeRow(table.headers, columns);
  const rows = table.rows.map(row => normalizeRow(row, columns));
  const warnings: StyleWarning[] = [];

  const header = mergeStyles(CELL_STYLE_KEYS, TABLE_HEADER_DEFAULTS, table.header);
  const body = mergeStyles(CELL_STYLE_KEYS, TABLE_BODY_DEFAULTS, table.body);
  const rowStyles: Array<CellStyle | undefined> = [];

  for (const override of table.rowOverrides) {
    const index = resolveRowIndex(override.row, rows.length);
    if (index === undefined) {
      warnings.push({
        code: 'override-out-of-range',
        message: `Ignoring row override for row ${String(override.row)}`,
      });
      continue;
    }
    rowStyles[index] = mergeStyles(CELL_STYLE_KEYS, rowStyles[index], override.style);
  }

  const styles: CellStyle[][] = [];
  for (let r = 0; r <= rows.length; r++) {
    const base = r === 0 ? header : body;
    styles.push(normalizeRow([], columns).map(() => mergeStyles(CELL_STYLE_KEYS, base, rowStyles[r])));
  }

  for (const override of table.cellOverrides) {
    const index = resolveRowIndex(override.row, rows.length);
    const cells = index === undefined ? undefined : styles[index];
    const current = cells?.[override.col];
    if (!cells || !current || !Number.isInteger(override.col)) {
      warnings.push({
        code: 'override-out-of-range',
        message: `Ignoring cell override for row ${String(override.row)}, column ${override.col}`,
      });
      continue;
    }
    cells[override.col] = mergeStyles(CELL_STYLE_KEYS, current, override.style);
  }

  return {
    columns,
    headers,
    rows,
    fractions: computeColumnFractions(table, columns),
    styles,
    warnings,
  };
}
