// Word-processor output through the docx package

import {
  AlignmentType,
  BorderStyle,
  Document,
  Footer,
  Header,
  HeadingLevel as DocxHeadingLevel,
  ImageRun,
  Packer,
  PageNumber,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableLayoutType,
  TableOfContents,
  TableRow,
  TextRun,
  UnderlineType,
  VerticalAlign,
  WidthType,
  convertMillimetersToTwip,
  type IRunOptions,
} from 'docx';
import { renderFormulaOrFallback } from '../formula.js';
import { collectHeadings } from '../describe.js';
import { fitWithin, type PlacedImage } from '../rasterize.js';
import { splitPageNumberTokens, styledText } from '../style.js';
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

const ALIGNMENTS = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
  justify: AlignmentType.JUSTIFIED,
} as const;

const VERTICAL_ALIGNMENTS = {
  top: VerticalAlign.TOP,
  middle: VerticalAlign.CENTER,
  bottom: VerticalAlign.BOTTOM,
} as const;

const HEADING_LEVELS = {
  1: DocxHeadingLevel.HEADING_1,
  2: DocxHeadingLevel.HEADING_2,
  3: DocxHeadingLevel.HEADING_3,
  4: DocxHeadingLevel.HEADING_4,
  5: DocxHeadingLevel.HEADING_5,
  6: DocxHeadingLevel.HEADING_6,
} as const;

const PX_PER_MM = 96 / 25.4;

const pointsToTwips = (points: number) => Math.round(points * 20);

export interface DocxSession extends RenderSession {
  children: Array<Paragraph | Table | TableOfContents>;
  updateFields: boolean;
}

/**
 * Run properties for a style. Sizes are in points here and half-points in
 * the file.
 */
export function docxRunOptions(text: string, style: StyleSpec, defaultSize: number): IRunOptions {
  return {
    text,
    font: style.fontName,
    size: Math.round((style.fontSize ?? defaultSize) * 2),
    color: style.color,
    bold: style.bold,
    italics: style.italic,
    underline: style.underline ? { type: UnderlineType.SINGLE } : undefined,
    shading: style.backgroundColor
      ? { type: ShadingType.CLEAR, color: 'auto', fill: style.backgroundColor }
      : undefined,
  };
}

function borderSide(border: CellBorder | null) {
  return border
    ? { style: BorderStyle.SINGLE, size: Math.max(2, Math.round(border.width * 8)), color: border.color }
    : { style: BorderStyle.NONE, size: 0, color: 'FFFFFF' };
}

export class DocxBackend extends FormatBackend<DocxSession> {
  readonly format = 'docx' as const;
  readonly mimeType = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
  readonly extension = 'docx';

  protected begin(document: DocumentModel, warnings: StyleWarning[]): DocxSession {
    const children: DocxSession['children'] = [];
    const title = document.meta.title?.trim();
    if (title && !document.meta.hideTitle) {
      children.push(
        new Paragraph({
          heading: DocxHeadingLevel.TITLE,
          alignment: AlignmentType.CENTER,
          children: [new TextRun({ text: title, bold: true, size: TITLE_FONT_SIZE * 2 })],
        })
      );
    }
    return { document, warnings, children, updateFields: false };
  }

  protected async finish(session: DocxSession): Promise<Buffer> {
    const { meta } = session.document;
    const page = PAGE_DIMENSIONS_MM[meta.pageSize];
    const header = session.document.header;
    const footer = session.document.footer;

    const doc = new Document({
      creator: 'replyforge',
      title: meta.title,
      features: session.updateFields ? { updateFields: true } : undefined,
      sections: [
        {
          properties: {
            page: {
              size: {
                width: convertMillimetersToTwip(page.width),
                height: convertMillimetersToTwip(page.height),
              },
              margin: {
                top: convertMillimetersToTwip(PAGE_MARGINS_MM.top),
                right: convertMillimetersToTwip(PAGE_MARGINS_MM.right),
                bottom: convertMillimetersToTwip(PAGE_MARGINS_MM.bottom),
                left: convertMillimetersToTwip(PAGE_MARGINS_MM.left),
              },
            },
          },
          headers: header ? { default: new Header({ children: [this.pageTextParagraph(header)] }) } : undefined,
          footers: footer ? { default: new Footer({ children: [this.pageTextParagraph(footer)] }) } : undefined,
          children: session.children,
        },
      ],
    });

    return Packer.toBuffer(doc);
  }

  private pageTextParagraph(content: StyledText): Paragraph {
    const { text, style } = styledText(content.text, content.style);
    const runs = splitPageNumberTokens(text).map(part =>
      part.kind === 'text'
        ? new TextRun(docxRunOptions(part.value, style, HEADER_FOOTER_FONT_SIZE))
        : new TextRun({ ...docxRunOptions('', style, HEADER_FOOTER_FONT_SIZE), text: undefined, children: [PageNumber.CURRENT] })
    );
    return new Paragraph({ alignment: ALIGNMENTS[style.alignment ?? 'center'], children: runs });
  }

  protected renderHeading(session: DocxSession, block: HeadingBlock): void {
    const { text, style } = styledText(block.text, { bold: true, ...block.style });
    session.children.push(
      new Paragraph({
        heading: HEADING_LEVELS[block.level],
        alignment: style.alignment ? ALIGNMENTS[style.alignment] : undefined,
        children: [new TextRun(docxRunOptions(text, style, headingFontSize(block.level)))],
      })
    );
  }

  protected renderParagraph(session: DocxSession, block: ParagraphBlock): void {
    const { text, style } = styledText(block.text, block.style);
    session.children.push(
      new Paragraph({
        alignment: style.alignment ? ALIGNMENTS[style.alignment] : undefined,
        indent: {
          left: pointsToTwips(block.spacing.leftIndent ?? 0),
          right: pointsToTwips(block.spacing.rightIndent ?? 0),
        },
        spacing: { after: pointsToTwips(block.spacing.spaceAfter ?? PARAGRAPH_SPACE_AFTER) },
        children: [new TextRun(docxRunOptions(text, style, PARAGRAPH_FONT_SIZE))],
      })
    );
  }

  protected renderList(session: DocxSession, block: ListBlock): void {
    block.items.forEach((item, i) => {
      const { text, style } = styledText(item, block.style);
      const last = i === block.items.length - 1;
      session.children.push(
        new Paragraph({
          bullet: block.ordered ? undefined : { level: 0 },
          alignment: style.alignment ? ALIGNMENTS[style.alignment] : undefined,
          indent: {
            left: pointsToTwips(block.spacing.leftIndent ?? 18),
            right: pointsToTwips(block.spacing.rightIndent ?? 0),
          },
          spacing: { after: last ? pointsToTwips(block.spacing.spaceAfter ?? PARAGRAPH_SPACE_AFTER) : 0 },
          children: [
            new TextRun(docxRunOptions(block.ordered ? `${i + 1}. ${text}` : text, style, PARAGRAPH_FONT_SIZE)),
          ],
        })
      );
    });
  }

  private tableCell(text: string, style: CellStyle, width: number, grid: CellBorder | null, margin: number) {
    const clean = styledText(text, {
      fontName: style.fontName,
      fontSize: style.fontSize,
      color: style.color,
      bold: style.bold,
      italic: style.italic,
    });
    const side = borderSide(style.border ?? grid);
    return new TableCell({
      width: { size: width, type: WidthType.DXA },
      shading: style.backgroundColor
        ? { type: ShadingType.CLEAR, color: 'auto', fill: style.backgroundColor }
        : undefined,
      verticalAlign: VERTICAL_ALIGNMENTS[style.verticalAlignment ?? 'middle'],
      margins: { top: margin, bottom: margin, left: margin, right: margin },
      borders: { top: side, bottom: side, left: side, right: side },
      children: [
        new Paragraph({
          alignment: ALIGNMENTS[style.alignment ?? 'left'],
          children: [new TextRun(docxRunOptions(clean.text, clean.style, PARAGRAPH_FONT_SIZE))],
        }),
      ],
    });
  }

  protected renderTable(session: DocxSession, block: TableBlock): void {
    const layout = layoutTable(block);
    session.warnings.push(...layout.warnings);
    if (layout.columns === 0) return;

    const frame = convertMillimetersToTwip(frameWidthMm(session.document.meta.pageSize));
    const widths = layout.fractions.map(fraction => Math.round(fraction * frame));
    const margin = pointsToTwips(block.cellMargin ?? DEFAULT_CELL_MARGIN);

    const rows: TableRow[] = [];
    const all = [layout.headers, ...layout.rows];
    all.forEach((cells, r) => {
      if (r === 0 && block.headers.length === 0) return;
      const styles = layout.styles[r] ?? [];
      rows.push(
        new TableRow({
          tableHeader: r === 0,
          children: cells.map((text, c) =>
            this.tableCell(text, styles[c] ?? {}, widths[c] ?? 0, block.grid, margin)
          ),
        })
      );
    });
    if (rows.length === 0) return;

    session.children.push(
      new Table({
        rows,
        width: { size: widths.reduce((sum, w) => sum + w, 0), type: WidthType.DXA },
        columnWidths: widths,
        layout: TableLayoutType.FIXED,
      }),
      new Paragraph({ children: [] })
    );
  }

  private imageParagraph(image: PlacedImage, alignment: StyleSpec['alignment']): Paragraph {
    return new Paragraph({
      alignment: ALIGNMENTS[alignment ?? 'center'],
      children: [
        new ImageRun({
          type: 'png',
          data: image.data,
          transformation: {
            width: Math.round(image.widthMm * PX_PER_MM),
            height: Math.round(image.heightMm * PX_PER_MM),
          },
        }),
      ],
    });
  }

  private captionParagraph(caption: string, style: StyleSpec, size: number): Paragraph {
    return new Paragraph({
      alignment: ALIGNMENTS[style.alignment ?? 'center'],
      spacing: { after: pointsToTwips(PARAGRAPH_SPACE_AFTER) },
      children: [new TextRun(docxRunOptions(caption, { ...style, italic: true, bold: false }, size))],
    });
  }

  protected async renderMath(session: DocxSession, block: MathBlock): Promise<void> {
    const outcome = await renderFormulaOrFallback(block, this.images.formula);
    if (outcome.kind === 'text') {
      this.renderText(session, outcome.lines, { ...block.style, fontSize: block.mathFontSize });
      return;
    }
    session.children.push(this.imageParagraph(outcome.image, block.style.alignment));
    if (outcome.caption) {
      session.children.push(this.captionParagraph(outcome.caption, block.style, block.captionFontSize));
    }
  }

  protected async renderGraph(session: DocxSession, block: FunctionGraphBlock): Promise<void> {
    const raster = await this.images.graph.rasterize(block);
    session.children.push(this.imageParagraph(fitWithin(raster, block.width, block.height), block.alignment));
    if (block.caption) {
      session.children.push(this.captionParagraph(block.caption, { alignment: block.alignment }, 10));
    }
  }

  protected renderToc(session: DocxSession, block: TocBlock): void {
    session.children.push(
      new Paragraph({
        spacing: { after: pointsToTwips(6) },
        children: [new TextRun(docxRunOptions(block.title, { ...block.style, bold: true }, 14))],
      })
    );
    if (block.includePages) {
      session.updateFields = true;
      session.children.push(
        new TableOfContents(block.title, { hyperlink: true, headingStyleRange: `1-${block.levels}` })
      );
    }
    for (const entry of collectHeadings(session.document, block.levels)) {
      session.children.push(
        new Paragraph({
          indent: { left: pointsToTwips((entry.level - 1) * block.indent) },
          children: [new TextRun(docxRunOptions(entry.text, block.style, PARAGRAPH_FONT_SIZE))],
        })
      );
    }
    session.children.push(new Paragraph({ children: [] }));
  }

  protected renderText(session: DocxSession, lines: string[], style: StyleSpec): void {
    for (const line of lines) {
      session.children.push(
        new Paragraph({
          alignment: style.alignment ? ALIGNMENTS[style.alignment] : undefined,
          children: [new TextRun(docxRunOptions(line, style, PARAGRAPH_FONT_SIZE))],
        })
      );
    }
  }
}
