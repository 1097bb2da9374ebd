// Document schema decoding - one lenient decoder per block type
//
// Only the envelope and the `type` discriminator can fail decoding. Every
// other field that is missing or malformed falls back to its default.

import { z } from 'zod';
import { SchemaError } from './errors.js';
import { normalizeColor, parseAlignment, parseVerticalAlignment } from './style.js';
import type {
  Block,
  BlockSpacing,
  BlockType,
  CellBorder,
  CellOverride,
  CellStyle,
  DocumentMeta,
  DocumentModel,
  FunctionGraphBlock,
  HeadingBlock,
  HeadingLevel,
  ListBlock,
  MathBlock,
  PageSize,
  ParagraphBlock,
  RowOverride,
  RowRef,
  StyleSpec,
  StyleWarning,
  StyledText,
  TableBlock,
  TocBlock,
} from './types.js';

const NUMERIC = /^\s*-?\d+(\.\d+)?\s*$/;

const optText = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(value => String(value))
  .optional()
  .catch(undefined);

const optNumber = z
  .union([z.number(), z.string().regex(NUMERIC).transform(Number)])
  .optional()
  .catch(undefined);

const optBoolean = z
  .union([z.boolean(), z.enum(['true', 'false']).transform(value => value === 'true')])
  .optional()
  .catch(undefined);

const cellText = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform(value => (value === null ? '' : String(value)))
  .catch('');

const textList = z.array(cellText).catch([]);

const styleShape = {
  font_name: optText,
  font_size: optNumber,
  color: z.unknown(),
  bg_color: z.unknown(),
  bold: optBoolean,
  italic: optBoolean,
  underline: optBoolean,
  alignment: z.unknown(),
};

const spacingShape = {
  left_indent: optNumber,
  right_indent: optNumber,
  space_after: optNumber,
};

const headingSchema = z.object({ ...styleShape, level: optNumber, text: optText });
const paragraphSchema = z.object({ ...styleShape, ...spacingShape, text: optText });
const listSchema = z.object({
  ...styleShape,
  ...spacingShape,
  ordered: optBoolean,
  items: textList,
});

const borderValue = z.union([z.boolean(), z.number(), z.string()]).optional().catch(undefined);

const tableSchema = z.object({
  headers: textList,
  rows: z.array(z.unknown()).catch([]),
  params: z.record(z.unknown()).optional().catch(undefined),
  table_properties: z
    .object({
      border: borderValue,
      cell_margin: optNumber,
      widths: z.array(z.number()).optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
  column_widths: z.array(z.number()).optional().catch(undefined),
  cell_properties: z.array(z.unknown()).catch([]),
  row_properties: z.array(z.unknown()).catch([]),
});

const rowRef = z
  .union([
    z.number().int(),
    z.enum(['header', 'first', 'last']),
    z.string().regex(/^\s*\d+\s*$/).transform(Number),
  ])
  .optional()
  .catch(undefined);

const cellStyleShape = {
  bg_color: z.unknown(),
  text_color: z.unknown(),
  font_name: optText,
  font_size: optNumber,
  bold: optBoolean,
  italic: optBoolean,
  text_wrap: optBoolean,
  vertical_alignment: z.unknown(),
  valign: z.unknown(),
  horizontal_alignment: z.unknown(),
  alignment: z.unknown(),
  border: borderValue,
  border_width: optNumber,
  border_color: z.unknown(),
};

const cellPropertySchema = z.object({ ...cellStyleShape, row: rowRef, col: optNumber });
const rowPropertySchema = z.object({ ...cellStyleShape, row: rowRef });

const mathSchema = z.object({
  ...styleShape,
  formula: optText,
  caption: optText,
  math_font_size: optNumber,
  caption_font_size: optNumber,
});

const graphSchema = z.object({
  function: optText,
  expression: optText,
  x_min: optNumber,
  x_max: optNumber,
  title: optText,
  xlabel: optText,
  ylabel: optText,
  width: optNumber,
  height: optNumber,
  line_color: z.unknown(),
  line_width: optNumber,
  show_grid: optBoolean,
  caption: optText,
  alignment: z.unknown(),
});

const tocSchema = z.object({
  title: optText,
  levels: optNumber,
  font_name: optText,
  font_size: optNumber,
  indent: optNumber,
  leader_dots: optBoolean,
  include_pages: optBoolean,
});

const headerFooterSchema = z.object({
  ...styleShape,
  content: optText,
  text: optText,
});

const metaSchema = z.object({
  title: optText,
  hide_title: optBoolean,
  page_size: optText,
  header: z.unknown(),
  footer: z.unknown(),
});

const PAGE_SIZES: readonly PageSize[] = ['A4', 'A3', 'A5', 'LETTER', 'LEGAL'];

export const BLOCK_TYPES: readonly BlockType[] = [
  'heading',
  'paragraph',
  'list',
  'table',
  'math',
  'function_graph',
  'toc',
];

export function isBlockType(value: string): value is BlockType {
  return BLOCK_TYPES.some(type => type === value);
}

export class DecodeContext {
  readonly warnings: StyleWarning[] = [];

  warn(code: StyleWarning['code'], message: string): void {
    this.warnings.push({ code, message });
  }

  color(value: unknown, path: string): string | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    const color = normalizeColor(value);
    if (!color) {
      this.warn('invalid-color', `Ignoring malformed color ${JSON.stringify(value)} at ${path}`);
    }
    return color;
  }

  alignment(value: unknown, path: string): StyleSpec['alignment'] {
    if (value === undefined || value === null || value === '') return undefined;
    const alignment = parseAlignment(value);
    if (!alignment) {
      this.warn('invalid-value', `Ignoring alignment ${JSON.stringify(value)} at ${path}`);
    }
    return alignment;
  }
}

type StyleFields = z.infer<z.ZodObject<typeof styleShape>>;
type SpacingFields = z.infer<z.ZodObject<typeof spacingShape>>;

function decodeStyle(raw: StyleFields, ctx: DecodeContext, path: string): StyleSpec {
  const style: StyleSpec = {};
  if (raw.font_name) style.fontName = raw.font_name;
  if (raw.font_size !== undefined && raw.font_size > 0) style.fontSize = raw.font_size;
  const color = ctx.color(raw.color, `${path}.color`);
  if (color) style.color = color;
  const background = ctx.color(raw.bg_color, `${path}.bg_color`);
  if (background) style.backgroundColor = background;
  if (raw.bold !== undefined) style.bold = raw.bold;
  if (raw.italic !== undefined) style.italic = raw.italic;
  if (raw.underline !== undefined) style.underline = raw.underline;
  const alignment = ctx.alignment(raw.alignment, `${path}.alignment`);
  if (alignment) style.alignment = alignment;
  return style;
}

function decodeSpacing(raw: SpacingFields): BlockSpacing {
  const spacing: BlockSpacing = {};
  if (raw.left_indent !== undefined) spacing.leftIndent = Math.max(0, raw.left_indent);
  if (raw.right_indent !== undefined) spacing.rightIndent = Math.max(0, raw.right_indent);
  if (raw.space_after !== undefined) spacing.spaceAfter = Math.max(0, raw.space_after);
  return spacing;
}

function clampInt(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.round(value)));
}

function toHeadingLevel(value: number): HeadingLevel {
  switch (value) {
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    case 6:
      return 6;
    default:
      return 1;
  }
}

function decodeHeading(raw: unknown, ctx: DecodeContext, path: string): HeadingBlock {
  const fields = headingSchema.parse(raw);
  return {
    type: 'heading',
    level: toHeadingLevel(clampInt(fields.level, 1, 6, 1)),
    text: fields.text ?? '',
    style: decodeStyle(fields, ctx, path),
  };
}

function decodeParagraph(raw: unknown, ctx: DecodeContext, path: string): ParagraphBlock {
  const fields = paragraphSchema.parse(raw);
  return {
    type: 'paragraph',
    text: fields.text ?? '',
    style: decodeStyle(fields, ctx, path),
    spacing: decodeSpacing(fields),
  };
}

function decodeList(raw: unknown, ctx: DecodeContext, path: string): ListBlock {
  const fields = listSchema.parse(raw);
  return {
    type: 'list',
    ordered: fields.ordered ?? false,
    items: fields.items,
    style: decodeStyle(fields, ctx, path),
    spacing: decodeSpacing(fields),
  };
}

function decodeBorder(
  value: string | number | boolean | undefined,
  width: number | undefined,
  color: string | undefined
): CellBorder | null | undefined {
  if (value === false || value === 0 || value === 'none') return null;
  if (typeof value === 'number') return { width: value, color: color ?? '000000' };
  if (value === 'medium') return { width: 1, color: color ?? '000000' };
  if (value === 'thick') return { width: 1.5, color: color ?? '000000' };
  if (value !== undefined || width !== undefined || color !== undefined) {
    return { width: width ?? 0.5, color: color ?? '000000' };
  }
  return undefined;
}

function decodeCellStyle(
  raw: z.infer<z.ZodObject<typeof cellStyleShape>>,
  ctx: DecodeContext,
  path: string
): CellStyle {
  const style: CellStyle = {};
  const background = ctx.color(raw.bg_color, `${path}.bg_color`);
  if (background) style.backgroundColor = background;
  const color = ctx.color(raw.text_color, `${path}.text_color`);
  if (color) style.color = color;
  if (raw.font_name) style.fontName = raw.font_name;
  if (raw.font_size !== undefined && raw.font_size > 0) style.fontSize = raw.font_size;
  if (raw.bold !== undefined) style.bold = raw.bold;
  if (raw.italic !== undefined) style.italic = raw.italic;
  if (raw.text_wrap !== undefined) style.wrap = raw.text_wrap;
  const vertical = parseVerticalAlignment(raw.vertical_alignment ?? raw.valign);
  if (vertical) style.verticalAlignment = vertical;
  const horizontal = ctx.alignment(raw.horizontal_alignment ?? raw.alignment, `${path}.horizontal_alignment`);
  if (horizontal) style.alignment = horizontal;
  const border = decodeBorder(raw.border, raw.border_width, ctx.color(raw.border_color, `${path}.border_color`));
  if (border) style.border = border;
  return style;
}

function decodeTableParams(params: Record<string, unknown> | undefined, ctx: DecodeContext, path: string) {
  const read = (prefix: 'header' | 'body'): CellStyle => {
    const p = params ?? {};
    const fields = cellPropertySchema.parse({
      font_name: p[`${prefix}_font_name`],
      font_size: p[`${prefix}_font_size`],
      text_color: p[`${prefix}_color`],
      bg_color: p[`${prefix}_bg_color`],
      bold: p[`${prefix}_bold`],
      italic: p[`${prefix}_italic`],
      horizontal_alignment: p[`${prefix}_alignment`],
      vertical_alignment: p[`${prefix}_valign`],
    });
    return decodeCellStyle(fields, ctx, `${path}.params.${prefix}`);
  };
  const gridWidth = optNumber.parse(params?.grid_width);
  const gridColor = ctx.color(params?.grid_color, `${path}.params.grid_color`);
  return { header: read('header'), body: read('body'), gridWidth, gridColor };
}

function decodeTable(raw: unknown, ctx: DecodeContext, path: string): TableBlock {
  const fields = tableSchema.parse(raw);
  const params = decodeTableParams(fields.params, ctx, path);
  const properties = fields.table_properties;

  const rows = fields.rows.map(row => (Array.isArray(row) ? textList.parse(row) : [cellText.parse(row)]));

  let grid: CellBorder | null = { width: params.gridWidth ?? 0.5, color: params.gridColor ?? '000000' };
  const border = decodeBorder(properties?.border, params.gridWidth, params.gridColor);
  if (border === null) grid = null;
  else if (border) grid = border;

  const cellOverrides: CellOverride[] = [];
  fields.cell_properties.forEach((entry, i) => {
    const parsed = cellPropertySchema.safeParse(entry);
    const where = `${path}.cell_properties[${i}]`;
    if (!parsed.success || parsed.data.row === undefined || parsed.data.col === undefined) {
      ctx.warn('invalid-value', `Skipping cell override without row/col at ${where}`);
      return;
    }
    cellOverrides.push({
      row: parsed.data.row,
      col: parsed.data.col,
      style: decodeCellStyle(parsed.data, ctx, where),
    });
  });

  const rowOverrides: RowOverride[] = [];
  fields.row_properties.forEach((entry, i) => {
    const parsed = rowPropertySchema.safeParse(entry);
    const where = `${path}.row_properties[${i}]`;
    if (!parsed.success || parsed.data.row === undefined) {
      ctx.warn('invalid-value', `Skipping row override without row at ${where}`);
      return;
    }
    const row: RowRef = parsed.data.row;
    rowOverrides.push({ row, style: decodeCellStyle(parsed.data, ctx, where) });
  });

  const widths = properties?.widths ?? fields.column_widths;
  const cellMargin = properties?.cell_margin;

  return {
    type: 'table',
    headers: fields.headers,
    rows,
    header: params.header,
    body: params.body,
    grid,
    ...(cellMargin !== undefined && cellMargin >= 0 ? { cellMargin } : {}),
    ...(widths && widths.length > 0 ? { widths } : {}),
    cellOverrides,
    rowOverrides,
  };
}

function decodeMath(raw: unknown, ctx: DecodeContext, path: string): MathBlock {
  const fields = mathSchema.parse(raw);
  const style = decodeStyle(fields, ctx, path);
  if (style.italic === undefined) style.italic = true;
  return {
    type: 'math',
    formula: fields.formula ?? '',
    ...(fields.caption ? { caption: fields.caption } : {}),
    style,
    mathFontSize: fields.math_font_size ?? fields.font_size ?? 12,
    captionFontSize: fields.caption_font_size ?? fields.font_size ?? 10,
  };
}

function decodeGraph(raw: unknown, ctx: DecodeContext, path: string): FunctionGraphBlock {
  const fields = graphSchema.parse(raw);
  const positive = (value: number | undefined, fallback: number) =>
    value !== undefined && value > 0 ? value : fallback;
  return {
    type: 'function_graph',
    expression: fields.function ?? fields.expression ?? '',
    xMin: fields.x_min ?? -10,
    xMax: fields.x_max ?? 10,
    ...(fields.title ? { title: fields.title } : {}),
    ...(fields.xlabel ? { xLabel: fields.xlabel } : {}),
    ...(fields.ylabel ? { yLabel: fields.ylabel } : {}),
    width: positive(fields.width, 150),
    height: positive(fields.height, 90),
    lineColor: ctx.color(fields.line_color, `${path}.line_color`) ?? '1F77B4',
    lineWidth: positive(fields.line_width, 2),
    showGrid: fields.show_grid ?? true,
    ...(fields.caption ? { caption: fields.caption } : {}),
    alignment: ctx.alignment(fields.alignment, `${path}.alignment`) ?? 'center',
  };
}

function decodeToc(raw: unknown, _ctx: DecodeContext, _path: string): TocBlock {
  const fields = tocSchema.parse(raw);
  const style: StyleSpec = {};
  if (fields.font_name) style.fontName = fields.font_name;
  if (fields.font_size !== undefined && fields.font_size > 0) style.fontSize = fields.font_size;
  return {
    type: 'toc',
    title: fields.title ?? 'Contents',
    levels: clampInt(fields.levels, 1, 6, 3),
    style,
    indent: fields.indent !== undefined && fields.indent >= 0 ? fields.indent : 12,
    leaderDots: fields.leader_dots ?? true,
    includePages: fields.include_pages ?? false,
  };
}

type BlockDecoder = (raw: unknown, ctx: DecodeContext, path: string) => Block;

const BLOCK_DECODERS: Record<BlockType, BlockDecoder> = {
  heading: decodeHeading,
  paragraph: decodeParagraph,
  list: decodeList,
  table: decodeTable,
  math: decodeMath,
  function_graph: decodeGraph,
  toc: decodeToc,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeBlock(raw: unknown, ctx: DecodeContext, path: string): Block {
  if (!isRecord(raw)) {
    throw new SchemaError('Block must be an object', path);
  }
  const type = raw.type;
  if (typeof type !== 'string') {
    throw new SchemaError('Block is missing its "type"', path);
  }
  if (!isBlockType(type)) {
    throw new SchemaError(`Unknown block type "${type}"`, path);
  }
  return BLOCK_DECODERS[type](raw, ctx, path);
}

function decodeStyledText(raw: unknown, ctx: DecodeContext, path: string): StyledText | undefined {
  if (typeof raw === 'string') {
    return raw.trim() ? { text: raw, style: {} } : undefined;
  }
  const parsed = headerFooterSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const text = parsed.data.content ?? parsed.data.text;
  if (!text || !text.trim()) return undefined;
  return { text, style: decodeStyle(parsed.data, ctx, path) };
}

function decodeMeta(raw: unknown, ctx: DecodeContext): DocumentMeta & { header?: unknown; footer?: unknown } {
  const parsed = metaSchema.safeParse(isRecord(raw) ? raw : {});
  const fields = parsed.success ? parsed.data : metaSchema.parse({});
  const requested = fields.page_size?.trim().toUpperCase();
  const pageSize = PAGE_SIZES.find(size => size === requested);
  if (requested && !pageSize) {
    ctx.warn('invalid-value', `Unknown page size "${fields.page_size}", using A4`);
  }
  return {
    ...(fields.title ? { title: fields.title } : {}),
    hideTitle: fields.hide_title ?? false,
    pageSize: pageSize ?? 'A4',
    header: fields.header,
    footer: fields.footer,
  };
}

export interface DecodeResult {
  document: DocumentModel;
  warnings: StyleWarning[];
}

/**
 * Decode parsed JSON into a document. Throws SchemaError when the value is
 * not a document object or names a block type that has no renderer.
 */
export function decodeDocument(value: unknown): DecodeResult {
  if (!isRecord(value)) {
    throw new SchemaError('Document must be a JSON object');
  }

  const ctx = new DecodeContext();
  const { header: metaHeader, footer: metaFooter, ...meta } = decodeMeta(value.meta, ctx);

  const rawBlocks = value.blocks ?? [];
  if (!Array.isArray(rawBlocks)) {
    throw new SchemaError('"blocks" must be an array', 'blocks');
  }

  const blocks = rawBlocks.map((raw, index) => decodeBlock(raw, ctx, `blocks[${index}]`));
  const header = decodeStyledText(value.header ?? metaHeader, ctx, 'header');
  const footer = decodeStyledText(value.footer ?? metaFooter, ctx, 'footer');

  return {
    document: {
      meta,
      ...(header ? { header } : {}),
      ...(footer ? { footer } : {}),
      blocks,
    },
    warnings: ctx.warnings,
  };
}
