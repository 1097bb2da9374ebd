import { describe, it, expect } from '@jest/globals';
import { SchemaError } from './errors.js';
import { decodeDocument } from './schema.js';

const single = (block: Record<string, unknown>) => {
  const { document, warnings } = decodeDocument({ blocks: [block] });
  const [decoded] = document.blocks;
  return { block: decoded, warnings };
};

describe('decodeDocument', () => {
  it('accepts an empty block list', () => {
    const { document, warnings } = decodeDocument({ meta: { title: 'Empty' }, blocks: [] });
    expect(document).toEqual({ meta: { title: 'Empty', hideTitle: false, pageSize: 'A4' }, blocks: [] });
    expect(warnings).toEqual([]);
  });

  it('treats missing blocks as none', () => {
    expect(decodeDocument({}).document.blocks).toEqual([]);
  });

  it('rejects values that are not document objects', () => {
    expect(() => decodeDocument([])).toThrow(SchemaError);
    expect(() => decodeDocument('text')).toThrow('Document must be a JSON object');
    expect(() => decodeDocument({ blocks: 'nope' })).toThrow('"blocks" must be an array (at blocks)');
  });

  it('rejects an unknown block type', () => {
    expect(() => decodeDocument({ blocks: [{ type: 'chart' }] })).toThrow(
      'Unknown block type "chart" (at blocks[0])'
    );
    expect(() => decodeDocument({ blocks: [{ text: 'no type' }] })).toThrow(SchemaError);
    expect(() => decodeDocument({ blocks: ['plain'] })).toThrow('Block must be an object (at blocks[0])');
  });

  it('falls back to A4 for an unknown page size', () => {
    const { document, warnings } = decodeDocument({ meta: { page_size: 'b5' }, blocks: [] });
    expect(document.meta.pageSize).toBe('A4');
    expect(warnings).toEqual([{ code: 'invalid-value', message: 'Unknown page size "b5", using A4' }]);
    expect(decodeDocument({ meta: { page_size: 'letter' } }).document.meta.pageSize).toBe('LETTER');
  });

  it('reads header and footer from the top level or from meta', () => {
    const { document } = decodeDocument({
      header: 'Quarterly report',
      meta: { footer: { content: 'Page {page}', alignment: 'right' } },
      blocks: [],
    });
    expect(document.header).toEqual({ text: 'Quarterly report', style: {} });
    expect(document.footer).toEqual({ text: 'Page {page}', style: { alignment: 'right' } });
  });
});

describe('block decoding', () => {
  it('records a malformed color and drops it', () => {
    const { block, warnings } = single({ type: 'paragraph', text: 'Hi', color: '#zzz', bold: 'true' });
    expect(block).toEqual({ type: 'paragraph', text: 'Hi', style: { bold: true }, spacing: {} });
    expect(warnings).toEqual([
      { code: 'invalid-color', message: 'Ignoring malformed color "#zzz" at blocks[0].color' },
    ]);
  });

  it('normalizes colors and reads numeric strings', () => {
    const { block } = single({ type: 'paragraph', text: 'Hi', color: '#f00', font_size: '14', space_after: 6 });
    expect(block).toEqual({
      type: 'paragraph',
      text: 'Hi',
      style: { color: 'FF0000', fontSize: 14 },
      spacing: { spaceAfter: 6 },
    });
  });

  it('clamps heading levels', () => {
    expect(single({ type: 'heading', level: '7', text: 'Deep' }).block).toMatchObject({ level: 6 });
    expect(single({ type: 'heading', level: 0, text: 'Top' }).block).toMatchObject({ level: 1 });
    expect(single({ type: 'heading', text: 'Plain' }).block).toMatchObject({ level: 1 });
  });

  it('applies math defaults', () => {
    expect(single({ type: 'math', formula: 'E = mc^2' }).block).toEqual({
      type: 'math',
      formula: 'E = mc^2',
      style: { italic: true },
      mathFontSize: 12,
      captionFontSize: 10,
    });
    expect(single({ type: 'math', formula: 'x', font_size: 14, caption: 'Energy' }).block).toMatchObject({
      caption: 'Energy',
      mathFontSize: 14,
      captionFontSize: 14,
    });
  });

  it('applies graph defaults', () => {
    expect(single({ type: 'function_graph', function: 'sin(x)' }).block).toEqual({
      type: 'function_graph',
      expression: 'sin(x)',
      xMin: -10,
      xMax: 10,
      width: 150,
      height: 90,
      lineColor: '1F77B4',
      lineWidth: 2,
      showGrid: true,
      alignment: 'center',
    });
  });

  it('applies table of contents defaults', () => {
    expect(single({ type: 'toc' }).block).toEqual({
      type: 'toc',
      title: 'Contents',
      levels: 3,
      style: {},
      indent: 12,
      leaderDots: true,
      includePages: false,
    });
  });

  it('stringifies table cells and applies the default grid', () => {
    const { block } = single({ type: 'table', headers: ['A', 'B'], rows: [[1, 2], [3], 'loose'] });
    expect(block).toEqual({
      type: 'table',
      headers: ['A', 'B'],
      rows: [['1', '2'], ['3'], ['loose']],
      header: {},
      body: {},
      grid: { width: 0.5, color: '000000' },
      cellOverrides: [],
      rowOverrides: [],
    });
  });

  it('reads table params, borders and overrides', () => {
    const { block, warnings } = single({
      type: 'table',
      headers: ['A', 'B'],
      rows: [['1', '2']],
      params: { header_bg_color: '#CCCCCC', body_font_size: 8, body_alignment: 'right' },
      table_properties: { border: false, cell_margin: 3 },
      column_widths: [1, 2],
      cell_properties: [{ row: 1, col: 0, bg_color: 'yellow', vertical_alignment: 'top' }, { row: 1 }],
      row_properties: [{ row: 'last', text_color: 'navy' }],
    });
    expect(block).toEqual({
      type: 'table',
      headers: ['A', 'B'],
      rows: [['1', '2']],
      header: { backgroundColor: 'CCCCCC' },
      body: { fontSize: 8, alignment: 'right' },
      grid: null,
      cellMargin: 3,
      widths: [1, 2],
      cellOverrides: [{ row: 1, col: 0, style: { backgroundColor: 'FFFF00', verticalAlignment: 'top' } }],
      rowOverrides: [{ row: 'last', style: { color: '000080' } }],
    });
    expect(warnings).toEqual([
      {
        code: 'invalid-value',
        message: 'Skipping cell override without row/col at blocks[0].cell_properties[1]',
      },
    ]);
  });
});
