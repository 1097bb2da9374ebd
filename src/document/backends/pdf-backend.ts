// Fixed-layout output through pdfkit

import { existsSync } from 'fs';
import PDFDocument from 'pdfkit';
import { logger } from '../../utils/logger.js';
import { renderFormulaOrFallback } from '../formula.js';
import { collectHeadings, type TocEntry } from '../describe.js';
import { fitWithin, type PlacedImage } from '../rasterize.js';
import { listMarker, mmToPoints, replacePageNumber, styledText } from '../style.js';
import { DEFAULT_CELL_MARGIN, layoutTable } from '../table-layout.js';
import {
  DEFAULT_PDF_FOOTER,
  HEADER_FOOTER_FONT_SIZE,
  PAGE_MARGINS_MM,
  PARAGRAPH_FONT_SIZE,
  PARAGRAPH_SPACE_AFTER,
  TITLE_FONT_SIZE,
  headingFontSize,
} from '../layout.js';
import { FormatBackend, type ImageServices, type RenderSession } from './backend.js';
import type {
  Alignment,
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

export type PdfFontKey = 'default' | 'helvetica' | 'courier';

export interface FontResolution {
  font: PdfFontKey;
  /** The requested font was replaced by the default */
  substituted: boolean;
}

/**
 * Map a requested font name onto a font the PDF writer can draw.
 * Any Times / New Roman variant goes to the bundled default, as does every
 * name we do not carry.
 */
export function normalizeFontName(name: string | undefined): FontResolution {
  if (!name || !name.trim()) return { font: 'default', substituted: false };
  const key = name.toLowerCase().replace(/[\s_-]+/g, '');
  if (key.includes('times') || key.includes('newroman')) {
    return { font: 'default', substituted: true };
  }
  if (key === 'helvetica') return { font: 'helvetica', substituted: false };
  if (key === 'courier' || key === 'couriernew') return { font: 'courier', substituted: false };
  if (key === 'default' || key === 'dejavusans') return { font: 'default', substituted: false };
  return { font: 'default', substituted: true };
}

interface FontFamily {
  regular: string;
  bold: string;
  italic: string;
  boldItalic: string;
  /** Italics are drawn by slanting the upright face */
  slanted: boolean;
}

const HELVETICA: FontFamily = {
  regular: 'Helvetica',
  bold: 'Helvetica-Bold',
  italic: 'Helvetica-Oblique',
  boldItalic: 'Helvetica-BoldOblique',
  slanted: false,
};

const COURIER: FontFamily = {
  regular: 'Courier',
  bold: 'Courier-Bold',
  italic: 'Courier-Oblique',
  boldItalic: 'Courier-BoldOblique',
  slanted: false,
};

/**
 * Path of a DejaVu face shipped with the dejavu-fonts-ttf package, or
 * undefined when the package is not installed.
 */
export function bundledFontPath(file: string): string | undefined {
  try {
    return require.resolve(`dejavu-fonts-ttf/ttf/${file}`);
  } catch (error) {
    logger.debug(`Bundled font ${file} not found: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

export const BUNDLED_REGULAR_FONT = 'DejaVuSans.ttf';
export const BUNDLED_BOLD_FONT = 'DejaVuSans-Bold.ttf';

export interface PdfBackendOptions {
  /** TrueType file used as the default font; the bundled DejaVu Sans when unset */
  fontPath?: string;
  boldFontPath?: string;
  images?: Partial<ImageServices>;
}

interface PendingToc {
  block: TocBlock;
  entries: TocEntry[];
  page: number;
  y: number;
  lineHeight: number;
  fontSize: number;
}

interface PdfSession extends RenderSession {
  doc: PDFKit.PDFDocument;
  defaultFamily: FontFamily;
  substitutedFonts: Set<string>;
  /** Heading block index to 1-based page number */
  headingPages: Map<number, number>;
  tocs: PendingToc[];
}

interface TextStyleOptions {
  oblique?: boolean;
  underline?: boolean;
}

export class PdfBackend extends FormatBackend<PdfSession> {
  readonly format = 'pdf' as const;
  readonly mimeType = 'application/pdf';
  readonly extension = 'pdf';

  private readonly fontPath?: string;
  private readonly boldFontPath?: string;

  constructor(options: PdfBackendOptions = {}) {
    super(options.images);
    this.fontPath = options.fontPath;
    this.boldFontPath = options.boldFontPath;
  }

  /** Configured file when it exists, the bundled face otherwise */
  private fontFile(configured: string | undefined, bundled: string, warnings: StyleWarning[]): string | undefined {
    if (configured && existsSync(configured)) return configured;
    const fallback = bundledFontPath(bundled);
    if (configured) {
      warnings.push({
        code: 'font-substituted',
        message: fallback
          ? `Font file "${configured}" not found, using the bundled ${bundled}`
          : `Font file "${configured}" not found, using Helvetica`,
      });
    }
    return fallback && existsSync(fallback) ? fallback : undefined;
  }

  private registerDefaultFamily(doc: PDFKit.PDFDocument, warnings: StyleWarning[]): FontFamily {
    const regular = this.fontFile(this.fontPath, BUNDLED_REGULAR_FONT, warnings);
    if (!regular) {
      if (!this.fontPath) {
        warnings.push({
          code: 'font-substituted',
          message: 'No Unicode font available, using Helvetica (Latin-1 text only)',
        });
      }
      return HELVETICA;
    }
    doc.registerFont('Body', regular);
    let bold = 'Body';
    const boldFile = this.fontFile(this.boldFontPath, BUNDLED_BOLD_FONT, warnings);
    if (boldFile) {
      doc.registerFont('Body-Bold', boldFile);
      bold = 'Body-Bold';
    }
    return { regular: 'Body', bold, italic: 'Body', boldItalic: bold, slanted: true };
  }

  protected begin(document: DocumentModel, warnings: StyleWarning[]): PdfSession {
    const doc = new PDFDocument({
      size: document.meta.pageSize,
      margins: {
        top: mmToPoints(PAGE_MARGINS_MM.top),
        right: mmToPoints(PAGE_MARGINS_MM.right),
        bottom: mmToPoints(PAGE_MARGINS_MM.bottom),
        left: mmToPoints(PAGE_MARGINS_MM.left),
      },
      bufferPages: true,
      info: { Title: document.meta.title ?? '', Creator: 'replyforge' },
    });

    const session: PdfSession = {
      document,
      warnings,
      doc,
      defaultFamily: this.registerDefaultFamily(doc, warnings),
      substitutedFonts: new Set(),
      headingPages: new Map(),
      tocs: [],
    };

    const title = document.meta.title?.trim();
    if (title && !document.meta.hideTitle) {
      this.writeText(session, title, { bold: true, alignment: 'center' }, TITLE_FONT_SIZE, { spaceAfter: 12 });
    }
    return session;
  }

  protected async finish(session: PdfSession): Promise<Buffer> {
    const { doc } = session;
    const chunks: Buffer[] = [];
    const done = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    for (const toc of session.tocs) {
      this.fillToc(session, toc);
    }
    this.drawHeadersAndFooters(session);

    doc.end();
    return done;
  }

  private family(session: PdfSession, fontName: string | undefined): FontFamily {
    const { font, substituted } = normalizeFontName(fontName);
    if (substituted && fontName && !session.substitutedFonts.has(fontName)) {
      session.substitutedFonts.add(fontName);
      session.warnings.push({
        code: 'font-substituted',
        message: `Font "${fontName}" is not available for PDF, using the default font`,
      });
    }
    if (font === 'helvetica') return HELVETICA;
    if (font === 'courier') return COURIER;
    return session.defaultFamily;
  }

  /** Select font, size and color on the document for a style */
  private applyStyle(session: PdfSession, style: StyleSpec | CellStyle, defaultSize: number): TextStyleOptions {
    const family = this.family(session, style.fontName);
    const face =
      style.bold && style.italic
        ? family.boldItalic
        : style.bold
          ? family.bold
          : style.italic
            ? family.italic
            : family.regular;
    session.doc
      .font(face)
      .fontSize(style.fontSize ?? defaultSize)
      .fillColor(`#${style.color ?? '000000'}`);
    return {
      oblique: style.italic && family.slanted ? true : undefined,
      underline: 'underline' in style ? style.underline : undefined,
    };
  }

  private frame(doc: PDFKit.PDFDocument) {
    const left = doc.page.margins.left;
    const right = doc.page.width - doc.page.margins.right;
    return { left, right, width: right - left, bottom: doc.page.height - doc.page.margins.bottom };
  }

  private ensureSpace(session: PdfSession, height: number): void {
    const { doc } = session;
    if (doc.y + height > this.frame(doc).bottom && doc.y > doc.page.margins.top) {
      doc.addPage();
    }
  }

  private currentPage(doc: PDFKit.PDFDocument): number {
    const range = doc.bufferedPageRange();
    return range.start + range.count - 1;
  }

  private writeText(
    session: PdfSession,
    text: string,
    style: StyleSpec,
    defaultSize: number,
    spacing: { leftIndent?: number; rightIndent?: number; spaceAfter?: number } = {}
  ): void {
    const { doc } = session;
    const frame = this.frame(doc);
    const x = frame.left + (spacing.leftIndent ?? 0);
    const width = Math.max(20, frame.width - (spacing.leftIndent ?? 0) - (spacing.rightIndent ?? 0));
    const extra = this.applyStyle(session, style, defaultSize);
    const options = { ...extra, width, align: style.alignment ?? 'left' };

    if (style.backgroundColor) {
      const height = doc.heightOfString(text, options);
      this.ensureSpace(session, height);
      doc.rect(x, doc.y, width, height).fill(`#${style.backgroundColor}`);
      doc.fillColor(`#${style.color ?? '000000'}`);
    }

    doc.text(text, x, doc.y, options);
    doc.y += spacing.spaceAfter ?? 0;
    doc.x = frame.left;
  }

  protected renderHeading(session: PdfSession, block: HeadingBlock, index: number): void {
    const { doc } = session;
    const { text, style } = styledText(block.text, { bold: true, ...block.style });
    const size = style.fontSize ?? headingFontSize(block.level);
    this.ensureSpace(session, size * 2.5);
    session.headingPages.set(index, this.currentPage(doc) + 1);
    doc.y += size * 0.4;
    this.writeText(session, text, style, size, { spaceAfter: 6 });
  }

  protected renderParagraph(session: PdfSession, block: ParagraphBlock): void {
    const { text, style } = styledText(block.text, block.style);
    this.writeText(session, text, style, PARAGRAPH_FONT_SIZE, {
      leftIndent: block.spacing.leftIndent,
      rightIndent: block.spacing.rightIndent,
      spaceAfter: block.spacing.spaceAfter ?? PARAGRAPH_SPACE_AFTER,
    });
  }

  protected renderList(session: PdfSession, block: ListBlock): void {
    block.items.forEach((item, i) => {
      const { text, style } = styledText(item, block.style);
      const last = i === block.items.length - 1;
      this.writeText(session, `${listMarker(block.ordered, i)} ${text}`, style, PARAGRAPH_FONT_SIZE, {
        leftIndent: block.spacing.leftIndent ?? 14,
        rightIndent: block.spacing.rightIndent,
        spaceAfter: last ? (block.spacing.spaceAfter ?? PARAGRAPH_SPACE_AFTER) : 2,
      });
    });
  }

  protected renderTable(session: PdfSession, block: TableBlock): void {
    const { doc } = session;
    const layout = layoutTable(block);
    session.warnings.push(...layout.warnings);
    if (layout.columns === 0) return;

    const frame = this.frame(doc);
    const widths = layout.fractions.map(fraction => fraction * frame.width);
    const pad = block.cellMargin ?? DEFAULT_CELL_MARGIN;
    const hasHeader = block.headers.length > 0;

    const cellText = (text: string, style: CellStyle) =>
      styledText(text, {
        fontName: style.fontName,
        fontSize: style.fontSize,
        color: style.color,
        bold: style.bold,
        italic: style.italic,
      });

    // Row heights are measured before anything is drawn so rows never split
    const measure = (cells: string[], styles: CellStyle[]): number => {
      let tallest = 0;
      cells.forEach((raw, c) => {
        const style = styles[c] ?? {};
        const { text, style: runStyle } = cellText(raw, style);
        const extra = this.applyStyle(session, runStyle, PARAGRAPH_FONT_SIZE);
        const inner = Math.max(1, (widths[c] ?? 0) - pad * 2);
        const height =
          style.wrap === false
            ? doc.currentLineHeight(true)
            : doc.heightOfString(text || ' ', { ...extra, width: inner });
        tallest = Math.max(tallest, height);
      });
      return tallest + pad * 2;
    };

    let y = doc.y;
    const drawRow = (cells: string[], styles: CellStyle[]) => {
      const height = measure(cells, styles);
      let x = frame.left;
      cells.forEach((raw, c) => {
        const style = styles[c] ?? {};
        const width = widths[c] ?? 0;
        const { text, style: runStyle } = cellText(raw, style);

        if (style.backgroundColor) {
          doc.rect(x, y, width, height).fill(`#${style.backgroundColor}`);
        }
        const border = style.border ?? block.grid;
        if (border && border.width > 0) {
          doc.lineWidth(border.width).strokeColor(`#${border.color}`).rect(x, y, width, height).stroke();
        }

        const extra = this.applyStyle(session, runStyle, PARAGRAPH_FONT_SIZE);
        const inner = Math.max(1, width - pad * 2);
        const wrap = style.wrap !== false;
        const textHeight = wrap ? doc.heightOfString(text || ' ', { ...extra, width: inner }) : doc.currentLineHeight(true);
        const slack = height - pad * 2 - textHeight;
        const offset =
          style.verticalAlignment === 'top' ? 0 : style.verticalAlignment === 'bottom' ? slack : slack / 2;
        doc.text(text, x + pad, y + pad + Math.max(0, offset), {
          ...extra,
          width: inner,
          align: style.alignment ?? 'left',
          ...(wrap ? {} : { height: textHeight, ellipsis: true }),
        });
        x += width;
      });
      y += height;
    };

    const headerStyles = layout.styles[0] ?? [];
    if (hasHeader) {
      if (y + measure(layout.headers, headerStyles) > frame.bottom) {
        doc.addPage();
        y = doc.y;
      }
      drawRow(layout.headers, headerStyles);
    }

    layout.rows.forEach((row, r) => {
      const styles = layout.styles[r + 1] ?? [];
      if (y + measure(row, styles) > frame.bottom) {
        doc.addPage();
        y = doc.y;
        if (hasHeader) drawRow(layout.headers, headerStyles);
      }
      drawRow(row, styles);
    });

    doc.x = frame.left;
    doc.y = y + PARAGRAPH_SPACE_AFTER;
  }

  private drawImage(session: PdfSession, image: PlacedImage, alignment: Alignment | undefined): void {
    const { doc } = session;
    const frame = this.frame(doc);
    let width = mmToPoints(image.widthMm);
    let height = mmToPoints(image.heightMm);
    if (width > frame.width) {
      height *= frame.width / width;
      width = frame.width;
    }
    this.ensureSpace(session, height);
    const x =
      alignment === 'left'
        ? frame.left
        : alignment === 'right'
          ? frame.right - width
          : frame.left + (frame.width - width) / 2;
    doc.image(image.data, x, doc.y, { width, height });
    doc.x = frame.left;
    doc.y += height + 6;
  }

  protected async renderMath(session: PdfSession, block: MathBlock): Promise<void> {
    const outcome = await renderFormulaOrFallback(block, this.images.formula);
    if (outcome.kind === 'text') {
      this.renderText(session, outcome.lines, { ...block.style, fontSize: block.mathFontSize });
      return;
    }
    this.drawImage(session, outcome.image, block.style.alignment ?? 'center');
    if (outcome.caption) {
      this.writeText(
        session,
        outcome.caption,
        { ...block.style, italic: true, bold: false, alignment: block.style.alignment ?? 'center' },
        block.captionFontSize,
        { spaceAfter: PARAGRAPH_SPACE_AFTER }
      );
    }
  }

  protected async renderGraph(session: PdfSession, block: FunctionGraphBlock): Promise<void> {
    const raster = await this.images.graph.rasterize(block);
    this.drawImage(session, fitWithin(raster, block.width, block.height), block.alignment);
    if (block.caption) {
      this.writeText(session, block.caption, { italic: true, alignment: block.alignment }, 10, {
        spaceAfter: PARAGRAPH_SPACE_AFTER,
      });
    }
  }

  protected renderToc(session: PdfSession, block: TocBlock): void {
    const { doc } = session;
    this.writeText(session, block.title, { ...block.style, bold: true, fontSize: undefined }, 14, {
      spaceAfter: 6,
    });

    const entries = collectHeadings(session.document, block.levels);
    const fontSize = block.style.fontSize ?? 11;
    this.applyStyle(session, block.style, fontSize);
    const lineHeight = doc.currentLineHeight(true) + 2;
    const needed = entries.length * lineHeight;
    const frame = this.frame(doc);

    if (block.includePages && needed <= frame.bottom - doc.page.margins.top) {
      this.ensureSpace(session, needed);
      session.tocs.push({ block, entries, page: this.currentPage(doc), y: doc.y, lineHeight, fontSize });
      doc.y += needed + PARAGRAPH_SPACE_AFTER;
      return;
    }

    for (const entry of entries) {
      this.writeText(session, entry.text, block.style, fontSize, {
        leftIndent: (entry.level - 1) * block.indent,
        spaceAfter: 2,
      });
    }
    doc.y += PARAGRAPH_SPACE_AFTER;
  }

  /** Write the page numbers of a reserved table of contents */
  private fillToc(session: PdfSession, toc: PendingToc): void {
    const { doc } = session;
    doc.switchToPage(toc.page);
    const frame = this.frame(doc);

    toc.entries.forEach((entry, i) => {
      const y = toc.y + i * toc.lineHeight;
      const x = frame.left + (entry.level - 1) * toc.block.indent;
      const extra = this.applyStyle(session, toc.block.style, toc.fontSize);
      const page = String(session.headingPages.get(entry.index) ?? '');
      const pageWidth = doc.widthOfString(page);

      let label = entry.text;
      if (toc.block.leaderDots && page) {
        const room = frame.right - pageWidth - 4 - (x + doc.widthOfString(`${label} `));
        const dots = Math.max(0, Math.floor(room / doc.widthOfString('.')));
        label = `${label} ${'.'.repeat(dots)}`;
      }
      doc.text(label, x, y, { ...extra, lineBreak: false });
      if (page) {
        doc.text(page, frame.right - pageWidth, y, { lineBreak: false });
      }
    });
  }

  private drawPageText(session: PdfSession, content: StyledText, page: number, position: 'header' | 'footer') {
    const { doc } = session;
    const { text, style } = styledText(content.text, content.style);
    const size = style.fontSize ?? HEADER_FOOTER_FONT_SIZE;
    const extra = this.applyStyle(session, style, size);
    const frame = this.frame(doc);
    const y =
      position === 'header'
        ? doc.page.margins.top / 2 - size / 2
        : doc.page.height - doc.page.margins.bottom / 2 - size / 2;

    const bottom = doc.page.margins.bottom;
    doc.page.margins.bottom = 0;
    doc.text(replacePageNumber(text, page), frame.left, y, {
      ...extra,
      width: frame.width,
      align: style.alignment ?? 'center',
      lineBreak: false,
    });
    doc.page.margins.bottom = bottom;
  }

  private drawHeadersAndFooters(session: PdfSession): void {
    const { doc, document } = session;
    const footer = document.footer ?? { text: DEFAULT_PDF_FOOTER, style: {} };
    const range = doc.bufferedPageRange();
    for (let i = range.start; i < range.start + range.count; i++) {
      doc.switchToPage(i);
      if (document.header) {
        this.drawPageText(session, document.header, i + 1, 'header');
      }
      this.drawPageText(session, footer, i + 1, 'footer');
    }
  }

  protected renderText(session: PdfSession, lines: string[], style: StyleSpec): void {
    lines.forEach((line, i) => {
      this.writeText(session, line, style, PARAGRAPH_FONT_SIZE, {
        spaceAfter: i === lines.length - 1 ? PARAGRAPH_SPACE_AFTER : 2,
      });
    });
  }
}
