// Shared render loop for every output format

import { log } from '../../utils/logger.js';
import { ErrorHandler } from '../../utils/error-handler.js';
import { describeBlock } from '../describe.js';
import { RenderBackendError, SchemaError } from '../errors.js';
import { MathJaxRasterizer, type FormulaRasterizer } from '../formula.js';
import { SvgGraphRasterizer, type GraphRasterizer } from '../graph.js';
import type {
  Block,
  BlockFailure,
  DocumentFormat,
  DocumentModel,
  FunctionGraphBlock,
  HeadingBlock,
  ListBlock,
  MathBlock,
  ParagraphBlock,
  RenderArtifact,
  StyleSpec,
  StyleWarning,
  TableBlock,
  TocBlock,
} from '../types.js';

export interface ImageServices {
  formula: FormulaRasterizer;
  graph: GraphRasterizer;
}

export function createImageServices(overrides: Partial<ImageServices> = {}): ImageServices {
  return {
    formula: overrides.formula ?? new MathJaxRasterizer(),
    graph: overrides.graph ?? new SvgGraphRasterizer(),
  };
}

/**
 * State of one render call. Backends extend it with their native document.
 */
export interface RenderSession {
  document: DocumentModel;
  warnings: StyleWarning[];
}

/** The operations the pipeline needs from an output format */
export interface BlockRenderer {
  readonly format: DocumentFormat;
  readonly mimeType: string;
  readonly extension: string;
  render(document: DocumentModel, warnings?: StyleWarning[]): Promise<RenderArtifact>;
}

export function suggestFilename(title: string | undefined, extension: string): string {
  const slug = (title ?? '')
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .replace(/[^\p{L}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 60);
  return `${slug || 'document'}.${extension}`;
}

/**
 * Renders blocks in order, one method per block kind. A failing block is
 * replaced by its plain-text description; a SchemaError ends the render.
 */
export abstract class FormatBackend<TSession extends RenderSession> implements BlockRenderer {
  abstract readonly format: DocumentFormat;
  abstract readonly mimeType: string;
  abstract readonly extension: string;

  protected readonly images: ImageServices;

  constructor(images: Partial<ImageServices> = {}) {
    this.images = createImageServices(images);
  }

  protected abstract begin(document: DocumentModel, warnings: StyleWarning[]): Promise<TSession> | TSession;
  protected abstract finish(session: TSession): Promise<Buffer | string>;

  protected abstract renderHeading(session: TSession, block: HeadingBlock, index: number): Promise<void> | void;
  protected abstract renderParagraph(session: TSession, block: ParagraphBlock): Promise<void> | void;
  protected abstract renderList(session: TSession, block: ListBlock): Promise<void> | void;
  protected abstract renderTable(session: TSession, block: TableBlock): Promise<void> | void;
  protected abstract renderMath(session: TSession, block: MathBlock): Promise<void> | void;
  protected abstract renderGraph(session: TSession, block: FunctionGraphBlock): Promise<void> | void;
  protected abstract renderToc(session: TSession, block: TocBlock): Promise<void> | void;

  /** Plain lines used for degraded blocks */
  protected abstract renderText(session: TSession, lines: string[], style: StyleSpec): Promise<void> | void;

  async render(document: DocumentModel, warnings: StyleWarning[] = []): Promise<RenderArtifact> {
    const session = await this.begin(document, [...warnings]);
    const failures: BlockFailure[] = [];

    for (const [index, block] of document.blocks.entries()) {
      try {
        await this.renderBlock(session, block, index);
      } catch (error) {
        if (error instanceof SchemaError) {
          throw error;
        }
        const failure = new RenderBackendError(
          `${this.format}: ${block.type} block ${index} failed: ${ErrorHandler.getErrorMessage(error)}`,
          index,
          error
        );
        log.warn(failure.message);
        failures.push({ index, type: block.type, message: failure.message });
        await this.renderText(session, describeBlock(block), {});
      }
    }

    for (const warning of session.warnings) {
      log.debug(`${this.format}: ${warning.message}`);
    }

    return {
      format: this.format,
      filename: suggestFilename(document.meta.title, this.extension),
      mimeType: this.mimeType,
      data: await this.finish(session),
      warnings: session.warnings,
      failures,
    };
  }

  protected renderBlock(session: TSession, block: Block, index: number): Promise<void> | void {
    switch (block.type) {
      case 'heading':
        return this.renderHeading(session, block, index);
      case 'paragraph':
        return this.renderParagraph(session, block);
      case 'list':
        return this.renderList(session, block);
      case 'table':
        return this.renderTable(session, block);
      case 'math':
        return this.renderMath(session, block);
      case 'function_graph':
        return this.renderGraph(session, block);
      case 'toc':
        return this.renderToc(session, block);
    }
  }
}
