// Document model - the renderable form of a structured model reply

export type DocumentFormat = 'docx' | 'pdf' | 'xlsx' | 'rtf';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['docx', 'pdf', 'xlsx', 'rtf'];

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some(format => format === value);
}

export type Alignment = 'left' | 'center' | 'right' | 'justify';
export type VerticalAlignment = 'top' | 'middle' | 'bottom';
export type PageSize = 'A4' | 'A3' | 'A5' | 'LETTER' | 'LEGAL';

/**
 * Text styling. Every field is optional; backends fill the gaps with their
 * own defaults. Colors are normalized to six uppercase hex digits.
 */
export interface StyleSpec {
  fontName?: string;
  fontSize?: number;
  color?: string;
  backgroundColor?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  alignment?: Alignment;
}

export interface StyledText {
  text: string;
  style: StyleSpec;
}

/** Indents and spacing in points */
export interface BlockSpacing {
  leftIndent?: number;
  rightIndent?: number;
  spaceAfter?: number;
}

export interface DocumentMeta {
  title?: string;
  hideTitle: boolean;
  pageSize: PageSize;
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingBlock {
  type: 'heading';
  level: HeadingLevel;
  text: string;
  style: StyleSpec;
}

export interface ParagraphBlock {
  type: 'paragraph';
  text: string;
  style: StyleSpec;
  spacing: BlockSpacing;
}

export interface ListBlock {
  type: 'list';
  ordered: boolean;
  items: string[];
  style: StyleSpec;
  spacing: BlockSpacing;
}

export interface CellBorder {
  width: number;
  color: string;
}

export interface CellStyle {
  fontName?: string;
  fontSize?: number;
  color?: string;
  backgroundColor?: string;
  bold?: boolean;
  italic?: boolean;
  alignment?: Alignment;
  verticalAlignment?: VerticalAlignment;
  wrap?: boolean;
  border?: CellBorder;
}

/** 0 is the header row, 1..n the body rows */
export type RowRef = number | 'header' | 'first' | 'last';

export interface CellOverride {
  row: RowRef;
  col: number;
  style: CellStyle;
}

export interface RowOverride {
  row: RowRef;
  style: CellStyle;
}

export interface TableBlock {
  type: 'table';
  headers: string[];
  rows: string[][];
  header: CellStyle;
  body: CellStyle;
  grid: CellBorder | null;
  cellMargin?: number;
  /** Proportional hints, one per column */
  widths?: number[];
  cellOverrides: CellOverride[];
  rowOverrides: RowOverride[];
}

export interface MathBlock {
  type: 'math';
  formula: string;
  caption?: string;
  style: StyleSpec;
  mathFontSize: number;
  captionFontSize: number;
}

export interface FunctionGraphBlock {
  type: 'function_graph';
  expression: string;
  xMin: number;
  xMax: number;
  title?: string;
  xLabel?: string;
  yLabel?: string;
  /** Millimetres */
  width: number;
  height: number;
  lineColor: string;
  lineWidth: number;
  showGrid: boolean;
  caption?: string;
  alignment: Alignment;
}

export interface TocBlock {
  type: 'toc';
  title: string;
  levels: number;
  style: StyleSpec;
  indent: number;
  leaderDots: boolean;
  includePages: boolean;
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | ListBlock
  | TableBlock
  | MathBlock
  | FunctionGraphBlock
  | TocBlock;

export type BlockType = Block['type'];

export interface DocumentModel {
  meta: DocumentMeta;
  header?: StyledText;
  footer?: StyledText;
  blocks: Block[];
}

export type StyleWarningCode =
  | 'invalid-color'
  | 'invalid-value'
  | 'override-out-of-range'
  | 'font-substituted';

/**
 * Something in the document was malformed and got replaced by a default or
 * skipped. Collected on the artifact, never thrown.
 */
export interface StyleWarning {
  code: StyleWarningCode;
  message: string;
}

export interface BlockFailure {
  index: number;
  type: BlockType;
  message: string;
}

export interface RenderArtifact {
  format: DocumentFormat;
  filename: string;
  mimeType: string;
  data: Buffer | string;
  warnings: StyleWarning[];
  /** Blocks that were replaced by a textual stand-in */
  failures: BlockFailure[];
}
