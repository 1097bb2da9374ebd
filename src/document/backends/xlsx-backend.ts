// Spreadsheet output through exceljs
//
// The document is flattened onto one sheet, one block after another. Cells
// reference named styles kept per sheet.

import * as ExcelJS from 'exceljs';
import { renderFormulaOrFallback } from '../formula.js';
import { collectHeadings } from '../describe.js';
import { fitWithin, type PlacedImage } from '../rasterize.js';
import { listMarker, splitPageNumberTokens, styledText } from '../style.js';
import { layoutTable } from '../table-layout.js';
import { HEADER_FOOTER_FONT_SIZE, PARAGRAPH_FONT_SIZE, TITLE_FONT_SIZE, headingFontSize } from '../layout.js';
import { FormatBackend, type RenderSession } from './backend.js';
import type {
  Alignment,
  CellBorder,
  CellStyle,
  DocumentModel,
  FunctionGraphBlock,
  HeadingBlock,
  ListBlock,
  MathBlock,
  ParagraphBlock,
  StyleSpec,
  StyleWarning,
  StyledText,
  TableBlock,
  TocBlock,
} from '../types.js';

/** Total character width the text columns span */
const FRAME_CHARS = 100;
const MIN_TEXT_COLUMNS = 4;
const ROW_HEIGHT_PX = 20;
const PX_PER_MM = 96 / 25.4;

const VERTICAL = { top: 'top', middle: 'middle', bottom: 'bottom' } as const;

type CellFormat = Partial<ExcelJS.Style>;

/**
 * Named cell formats for one sheet. Each distinct format is defined once and
 * every cell using it gets the same definition.
 */
export class SheetStyles {
  private readonly styles = new Map<string, CellFormat>();

  define(name: string, format: CellFormat): string {
    if (!this.styles.has(name)) {
      this.styles.set(name, format);
    }
    return name;
  }

  get(name: string): CellFormat | undefined {
    return this.styles.get(name);
  }

  names(): string[] {
    return [...this.styles.keys()];
  }

  apply(cell: ExcelJS.Cell, name: string): void {
    const format = this.styles.get(name);
    if (format) {
      cell.style = format;
    }
  }
}

const argb = (hex: string) => `FF${hex}`;

function borderFor(border: CellBorder): Partial<ExcelJS.Border> {
  const style: ExcelJS.BorderStyle = border.width <= 0.5 ? 'thin' : border.width <= 1 ? 'medium' : 'thick';
  return { style, color: { argb: argb(border.color) } };
}

/**
 * One exceljs format for a text style
 */
export function xlsxFormat(
  style: StyleSpec & Pick<CellStyle, 'verticalAlignment' | 'wrap'>,
  defaultSize: number,
  border?: CellBorder | null
): CellFormat {
  const format: CellFormat = {
    font: {
      name: style.fontName ?? 'Calibri',
      size: style.fontSize ?? defaultSize,
      bold: style.bold ?? false,
      italic: style.italic ?? false,
      underline: style.underline ?? false,
      color: { argb: argb(style.color ?? '000000') },
    },
    alignment: {
      horizontal: style.alignment ?? 'left',
      vertical: VERTICAL[style.verticalAlignment ?? 'top'],
      wrapText: style.wrap ?? true,
    },
  };
  if (style.backgroundColor) {
    format.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: argb(style.backgroundColor) } };
  }
  if (border) {
    const side = borderFor(border);
    format.border = { top: side, left: side, bottom: side, right: side };
  }
  return format;
}

/** Stable key for a format so equal styles share a name */
function styleKey(prefix: string, value: object): string {
  return `${prefix}:${JSON.stringify(value)}`;
}

/** Excel header/footer text with page numbers as `&P` */
export function xlsxPageText(content: StyledText): string {
  const { text, style } = styledText(content.text, content.style);
  const section = style.alignment === 'left' ? '&L' : style.alignment === 'right' ? '&R' : '&C';
  const size = `&${Math.round(style.fontSize ?? HEADER_FOOTER_FONT_SIZE)}`;
  const body = splitPageNumberTokens(text)
    .map(part => (part.kind === 'page' ? '&P' : part.value.replace(/&/g, '&&')))
    .join('');
  return `${section}${size}${style.bold ? '&B' : ''}${body}`;
}

function sheetName(title: string | undefined): string {
  const clean = (title ?? '').replace(/[[\]:*?/\\]/g, ' ').trim().slice(0, 31);
  return clean || 'Document';
}

interface XlsxSession extends RenderSession {
  workbook: ExcelJS.Workbook;
  sheet: ExcelJS.Worksheet;
  styles: SheetStyles;
  /** Next free row, 1-based */
  row: number;
  /** Columns merged for running text */
  span: number;
}

export class XlsxBackend extends FormatBackend<XlsxSession> {
  readonly format = 'xlsx' as const;
  readonly mimeType = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
  readonly extension = 'xlsx';

  protected begin(document: DocumentModel, warnings: StyleWarning[]): XlsxSession {
    const workbook = new ExcelJS.Workbook();
    workbook.creator = 'replyforge';
    workbook.title = document.meta.title ?? '';

    const sheet = workbook.addWorksheet(sheetName(document.meta.title));
    if (document.header) sheet.headerFooter.oddHeader = xlsxPageText(document.header);
    if (document.footer) sheet.headerFooter.oddFooter = xlsxPageText(document.footer);

    const widest = document.blocks.reduce(
      (max, block) => (block.type === 'table' ? Math.max(max, block.headers.length, ...block.rows.map(r => r.length)) : max),
      0
    );
    const span = Math.max(MIN_TEXT_COLUMNS, widest);
    for (let c = 1; c <= span; c++) {
      sheet.getColumn(c).width = FRAME_CHARS / span;
    }

    const session: XlsxSession = { document, warnings, workbook, sheet, styles: new SheetStyles(), row: 1, span };

    const title = document.meta.title?.trim();
    if (title && !document.meta.hideTitle) {
      this.writeLine(session, title, { bold: true, fontSize: TITLE_FONT_SIZE, alignment: 'center' }, TITLE_FONT_SIZE);
      session.row++;
    }
    return session;
  }

  protected async finish(session: XlsxSession): Promise<Buffer> {
    const data = await session.workbook.xlsx.writeBuffer();
    return Buffer.from(data);
  }

  /** Write text into the first cell of a merged row sized to fit it */
  private writeLine(session: XlsxSession, text: string, style: StyleSpec, defaultSize: number, indent = 0): void {
    const { sheet } = session;
    const size = style.fontSize ?? defaultSize;
    const format = xlsxFormat(style, defaultSize);
    if (indent > 0 && format.alignment) {
      format.alignment = { ...format.alignment, indent };
    }
    const name = session.styles.define(styleKey('text', { ...style, fontSize: size, indent }), format);

    const cell = sheet.getCell(session.row, 1);
    cell.value = text;
    session.styles.apply(cell, name);
    sheet.mergeCells(session.row, 1, session.row, session.span);

    const charsPerLine = Math.max(10, Math.floor((FRAME_CHARS * 11) / size));
    const lines = text
      .split('\n')
      .reduce((sum, line) => sum + Math.max(1, Math.ceil(line.length / charsPerLine)), 0);
    sheet.getRow(session.row).height = Math.max(15, lines * size * 1.4);
    session.row++;
  }

  protected renderHeading(session: XlsxSession, block: HeadingBlock): void {
    const { text, style } = styledText(block.text, { bold: true, ...block.style });
    this.writeLine(session, text, style, headingFontSize(block.level));
  }

  protected renderParagraph(session: XlsxSession, block: ParagraphBlock): void {
    const { text, style } = styledText(block.text, block.style);
    const indent = Math.round((block.spacing.leftIndent ?? 0) / 12);
    this.writeLine(session, text, style, PARAGRAPH_FONT_SIZE, indent);
    if ((block.spacing.spaceAfter ?? 12) > 0) session.row++;
  }

  protected renderList(session: XlsxSession, block: ListBlock): void {
    block.items.forEach((item, i) => {
      const { text, style } = styledText(item, block.style);
      this.writeLine(session, `${listMarker(block.ordered, i)} ${text}`, style, PARAGRAPH_FONT_SIZE, 1);
    });
    session.row++;
  }

  protected renderTable(session: XlsxSession, block: TableBlock): void {
    const { sheet, styles } = session;
    const layout = layoutTable(block);
    session.warnings.push(...layout.warnings);
    if (layout.columns === 0) return;

    layout.fractions.forEach((fraction, c) => {
      const column = sheet.getColumn(c + 1);
      column.width = Math.max(column.width ?? 0, Math.round(fraction * FRAME_CHARS));
    });

    const rows = block.headers.length > 0 ? [layout.headers, ...layout.rows] : layout.rows;
    const offset = block.headers.length > 0 ? 0 : 1;

    rows.forEach((cells, r) => {
      const cellStyles = layout.styles[r + offset] ?? [];
      const sheetRow = sheet.getRow(session.row);
      cells.forEach((raw, c) => {
        const cellStyle = cellStyles[c] ?? {};
        const { text, style } = styledText(raw, {
          fontName: cellStyle.fontName,
          fontSize: cellStyle.fontSize,
          color: cellStyle.color,
          bold: cellStyle.bold,
          italic: cellStyle.italic,
        });
        const merged = { ...cellStyle, ...style };
        const name = styles.define(
          styleKey('cell', { ...merged, grid: block.grid }),
          xlsxFormat(merged, PARAGRAPH_FONT_SIZE, cellStyle.border ?? block.grid)
        );
        const cell = sheetRow.getCell(c + 1);
        cell.value = text;
        styles.apply(cell, name);
      });
      session.row++;
    });
    session.row++;
  }

  private placeImage(session: XlsxSession, image: PlacedImage): void {
    const id = session.workbook.addImage({
      base64: `data:image/png;base64,${image.data.toString('base64')}`,
      extension: 'png',
    });
    const width = image.widthMm * PX_PER_MM;
    const height = image.heightMm * PX_PER_MM;
    session.sheet.addImage(id, { tl: { col: 0, row: session.row - 1 }, ext: { width, height } });
    session.row += Math.ceil(height / ROW_HEIGHT_PX) + 1;
  }

  protected async renderMath(session: XlsxSession, block: MathBlock): Promise<void> {
    const outcome = await renderFormulaOrFallback(block, this.images.formula);
    if (outcome.kind === 'text') {
      this.renderText(session, outcome.lines, { ...block.style, fontSize: block.mathFontSize });
      return;
    }
    this.placeImage(session, outcome.image);
    if (outcome.caption) {
      this.writeLine(session, outcome.caption, this.captionStyle(block.style.alignment), block.captionFontSize);
    }
  }

  private captionStyle(alignment: Alignment | undefined): StyleSpec {
    return { italic: true, alignment: alignment ?? 'center' };
  }

  protected async renderGraph(session: XlsxSession, block: FunctionGraphBlock): Promise<void> {
    const raster = await this.images.graph.rasterize(block);
    this.placeImage(session, fitWithin(raster, block.width, block.height));
    if (block.caption) {
      this.writeLine(session, block.caption, this.captionStyle(block.alignment), 10);
    }
  }

  protected renderToc(session: XlsxSession, block: TocBlock): void {
    this.writeLine(session, block.title, { ...block.style, bold: true }, 14);
    for (const entry of collectHeadings(session.document, block.levels)) {
      this.writeLine(session, entry.text, block.style, PARAGRAPH_FONT_SIZE, entry.level - 1);
    }
    session.row++;
  }

  protected renderText(session: XlsxSession, lines: string[], style: StyleSpec): void {
    for (const line of lines) {
      this.writeLine(session, line, style, PARAGRAPH_FONT_SIZE);
    }
  }
}
