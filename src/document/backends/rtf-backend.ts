// Markup output: a hand-written RTF stream

import { collectHeadings } from '../describe.js';
import { renderFormulaOrFallback } from '../formula.js';
import { graphPlaceholder } from '../graph.js';
import type { PlacedImage } from '../rasterize.js';
import { listMarker, splitPageNumberTokens, styledText } from '../style.js';
import { DEFAULT_CELL_MARGIN, layoutTable } from '../table-layout.js';
import {
  PAGE_DIMENSIONS_MM,
  PAGE_MARGINS_MM,
  PARAGRAPH_FONT_SIZE,
  PARAGRAPH_SPACE_AFTER,
  HEADER_FOOTER_FONT_SIZE,
  TITLE_FONT_SIZE,
  frameWidthMm,
  headingFontSize,
} from '../layout.js';
import { FormatBackend, type RenderSession } from './backend.js';
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

const DEFAULT_FONT = 'Calibri';

const TWIPS_PER_MM = 1440 / 25.4;
const mmToTwips = (mm: number) => Math.round(mm * TWIPS_PER_MM);
const pointsToTwips = (points: number) => Math.round(points * 20);

const ALIGN: Record<Alignment, string> = { left: '\\ql', center: '\\qc', right: '\\qr', justify: '\\qj' };
const VALIGN = { top: '\\clvertalt', middle: '\\clvertalc', bottom: '\\clvertalb' } as const;

/**
 * Escape text for an RTF body: backslash and braces get a backslash,
 * line breaks become paragraph breaks, anything outside ASCII is written as
 * a `\uN?` escape.
 */
export function escapeRtf(text: string): string {
  let out = '';
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (char === '\\' || char === '{' || char === '}') {
      out += `\\${char}`;
    } else if (char === '\n') {
      out += '\\par\n';
    } else if (char === '\r') {
      continue;
    } else if (char === '\t') {
      out += '\\tab ';
    } else if (code < 0x80) {
      out += char;
    } else {
      // Code points past 16 bits go out as a surrogate pair
      for (let i = 0; i < char.length; i++) {
        const unit = char.charCodeAt(i);
        out += `\\u${unit > 0x7fff ? unit - 0x10000 : unit}?`;
      }
    }
  }
  return out;
}

/** Font and color tables filled while the body is written */
class RtfTables {
  private readonly fonts: string[] = [DEFAULT_FONT];
  private readonly colors: string[] = ['000000'];

  font(name: string | undefined): number {
    const font = name?.trim() || DEFAULT_FONT;
    let index = this.fonts.indexOf(font);
    if (index < 0) {
      index = this.fonts.push(font) - 1;
    }
    return index;
  }

  /** 1-based; 0 is the automatic color */
  color(hex: string): number {
    let index = this.colors.indexOf(hex);
    if (index < 0) {
      index = this.colors.push(hex) - 1;
    }
    return index + 1;
  }

  header(): string {
    const fonts = this.fonts.map((name, i) => `{\\f${i}\\fswiss ${escapeRtf(name)};}`).join('');
    const colors = this.colors
      .map(hex => {
        const value = parseInt(hex, 16);
        return `\\red${(value >> 16) & 0xff}\\green${(value >> 8) & 0xff}\\blue${value & 0xff};`;
      })
      .join('');
    return `{\\fonttbl${fonts}}\n{\\colortbl;${colors}}\n`;
  }
}

interface RtfSession extends RenderSession {
  tables: RtfTables;
  body: string[];
}

export class RtfBackend extends FormatBackend<RtfSession> {
  readonly format = 'rtf' as const;
  readonly mimeType = 'application/rtf';
  readonly extension = 'rtf';

  protected begin(document: DocumentModel, warnings: StyleWarning[]): RtfSession {
    const session: RtfSession = { document, warnings, tables: new RtfTables(), body: [] };
    const title = document.meta.title?.trim();
    if (title && !document.meta.hideTitle) {
      this.paragraph(session, title, { bold: true, alignment: 'center' }, TITLE_FONT_SIZE, { spaceAfter: 12 });
    }
    return session;
  }

  protected async finish(session: RtfSession): Promise<string> {
    const { meta, header, footer } = session.document;
    const page = PAGE_DIMENSIONS_MM[meta.pageSize];
    const pageSetup =
      `\\paperw${mmToTwips(page.width)}\\paperh${mmToTwips(page.height)}` +
      `\\margl${mmToTwips(PAGE_MARGINS_MM.left)}\\margr${mmToTwips(PAGE_MARGINS_MM.right)}` +
      `\\margt${mmToTwips(PAGE_MARGINS_MM.top)}\\margb${mmToTwips(PAGE_MARGINS_MM.bottom)}\n`;

    // Header and footer first so their fonts land in the tables
    const pageTexts: string[] = [];
    if (header) pageTexts.push(`{\\header ${this.pageText(session, header)}}\n`);
    if (footer) pageTexts.push(`{\\footer ${this.pageText(session, footer)}}\n`);

    return (
      '{\\rtf1\\ansi\\ansicpg1252\\deff0\\uc1\n' +
      session.tables.header() +
      pageSetup +
      pageTexts.join('') +
      session.body.join('') +
      '}'
    );
  }

  /** Character formatting for a style */
  private applyStyle(session: RtfSession, style: StyleSpec | CellStyle, defaultSize: number): string {
    const { tables } = session;
    let codes = `\\f${tables.font(style.fontName)}\\fs${Math.round((style.fontSize ?? defaultSize) * 2)}`;
    if (style.color) codes += `\\cf${tables.color(style.color)}`;
    if (style.backgroundColor) codes += `\\highlight${tables.color(style.backgroundColor)}`;
    if (style.bold) codes += '\\b';
    if (style.italic) codes += '\\i';
    if ('underline' in style && style.underline) codes += '\\ul';
    return `${codes} `;
  }

  private paragraph(
    session: RtfSession,
    text: string,
    style: StyleSpec,
    defaultSize: number,
    spacing: { leftIndent?: number; rightIndent?: number; spaceAfter?: number } = {}
  ): void {
    const align = ALIGN[style.alignment ?? 'left'];
    const indents =
      `\\li${pointsToTwips(spacing.leftIndent ?? 0)}\\ri${pointsToTwips(spacing.rightIndent ?? 0)}` +
      `\\sa${pointsToTwips(spacing.spaceAfter ?? 0)}`;
    session.body.push(
      `{\\pard${align}${indents}${this.applyStyle(session, style, defaultSize)}${escapeRtf(text)}\\par}\n`
    );
  }

  private pageText(session: RtfSession, content: StyledText): string {
    const { text, style } = styledText(content.text, content.style);
    const body = splitPageNumberTokens(text)
      .map(part => (part.kind === 'page' ? '\\chpgn ' : escapeRtf(part.value)))
      .join('');
    return `\\pard${ALIGN[style.alignment ?? 'center']}${this.applyStyle(session, style, HEADER_FOOTER_FONT_SIZE)}${body}\\par`;
  }

  protected renderHeading(session: RtfSession, block: HeadingBlock): void {
    const { text, style } = styledText(block.text, { bold: true, ...block.style });
    this.paragraph(session, text, style, headingFontSize(block.level), { spaceAfter: 6 });
  }

  protected renderParagraph(session: RtfSession, block: ParagraphBlock): void {
    const { text, style } = styledText(block.text, block.style);
    this.paragraph(session, text, style, PARAGRAPH_FONT_SIZE, {
      leftIndent: block.spacing.leftIndent,
      rightIndent: block.spacing.rightIndent,
      spaceAfter: block.spacing.spaceAfter ?? PARAGRAPH_SPACE_AFTER,
    });
  }

  protected renderList(session: RtfSession, block: ListBlock): void {
    block.items.forEach((item, i) => {
      const { text, style } = styledText(item, block.style);
      const last = i === block.items.length - 1;
      this.paragraph(session, `${listMarker(block.ordered, i)} ${text}`, style, PARAGRAPH_FONT_SIZE, {
        leftIndent: block.spacing.leftIndent ?? 18,
        rightIndent: block.spacing.rightIndent,
        spaceAfter: last ? (block.spacing.spaceAfter ?? PARAGRAPH_SPACE_AFTER) : 0,
      });
    });
  }

  protected renderTable(session: RtfSession, block: TableBlock): void {
    const layout = layoutTable(block);
    session.warnings.push(...layout.warnings);
    if (layout.columns === 0) return;

    const frame = mmToTwips(frameWidthMm(session.document.meta.pageSize));
    const gap = pointsToTwips(block.cellMargin ?? DEFAULT_CELL_MARGIN);
    const rows = block.headers.length > 0 ? [layout.headers, ...layout.rows] : layout.rows;
    const offset = block.headers.length > 0 ? 0 : 1;

    rows.forEach((cells, r) => {
      const styles = layout.styles[r + offset] ?? [];
      let edge = 0;
      let definition = `\\trowd\\trgaph${gap}${r === 0 && offset === 0 ? '\\trhdr' : ''}`;
      let contents = '';

      cells.forEach((raw, c) => {
        const style = styles[c] ?? {};
        edge += Math.round((layout.fractions[c] ?? 0) * frame);
        const border = style.border ?? block.grid;
        if (border) {
          const line = `\\brdrs\\brdrw${Math.max(1, pointsToTwips(border.width))}\\brdrcf${session.tables.color(border.color)}`;
          definition += `\\clbrdrt${line}\\clbrdrl${line}\\clbrdrb${line}\\clbrdrr${line}`;
        }
        if (style.backgroundColor) {
          definition += `\\clcbpat${session.tables.color(style.backgroundColor)}`;
        }
        definition += `${VALIGN[style.verticalAlignment ?? 'middle']}\\cellx${edge}`;

        const { text, style: runStyle } = styledText(raw, {
          fontName: style.fontName,
          fontSize: style.fontSize,
          color: style.color,
          bold: style.bold,
          italic: style.italic,
        });
        contents +=
          `\\pard\\intbl${ALIGN[style.alignment ?? 'left']}{${this.applyStyle(session, runStyle, PARAGRAPH_FONT_SIZE)}` +
          `${escapeRtf(text)}}\\cell\n`;
      });

      session.body.push(`${definition}\n${contents}\\row\n`);
    });
    session.body.push('\\pard\\par\n');
  }

  /** PNG picture in its own paragraph, hex-encoded */
  private picture(session: RtfSession, image: PlacedImage, alignment: Alignment | undefined): void {
    const hex = image.data.toString('hex').replace(/.{1,128}/g, line => `${line}\n`);
    const size =
      `\\picw${Math.round(image.widthMm * 100)}\\pich${Math.round(image.heightMm * 100)}` +
      `\\picwgoal${mmToTwips(image.widthMm)}\\pichgoal${mmToTwips(image.heightMm)}`;
    session.body.push(`{\\pard${ALIGN[alignment ?? 'center']}{\\pict\\pngblip${size}\n${hex}}\\par}\n`);
  }

  protected async renderMath(session: RtfSession, block: MathBlock): Promise<void> {
    const outcome = await renderFormulaOrFallback(block, this.images.formula);
    if (outcome.kind === 'text') {
      this.renderText(session, outcome.lines, { ...block.style, fontSize: block.mathFontSize });
      return;
    }
    this.picture(session, outcome.image, block.style.alignment);
    if (outcome.caption) {
      this.paragraph(session, outcome.caption, { ...block.style, italic: true }, block.captionFontSize, {
        spaceAfter: PARAGRAPH_SPACE_AFTER,
      });
    }
  }

  protected renderGraph(session: RtfSession, block: FunctionGraphBlock): void {
    const lines = [graphPlaceholder(block)];
    if (block.caption) lines.push(`(${block.caption})`);
    this.renderText(session, lines, { italic: true, alignment: block.alignment });
  }

  protected renderToc(session: RtfSession, block: TocBlock): void {
    this.paragraph(session, block.title, { ...block.style, bold: true }, 14, { spaceAfter: 6 });
    for (const entry of collectHeadings(session.document, block.levels)) {
      this.paragraph(session, entry.text, block.style, PARAGRAPH_FONT_SIZE, {
        leftIndent: (entry.level - 1) * block.indent,
      });
    }
    this.paragraph(session, '', {}, PARAGRAPH_FONT_SIZE);
  }

  protected renderText(session: RtfSession, lines: string[], style: StyleSpec): void {
    lines.forEach((line, i) => {
      this.paragraph(session, line, style, PARAGRAPH_FONT_SIZE, {
        spaceAfter: i === lines.length - 1 ? PARAGRAPH_SPACE_AFTER : 0,
      });
    });
  }
}
