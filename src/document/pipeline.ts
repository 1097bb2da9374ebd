// Model reply → document artifact

import { log } from '../utils/logger.js';
import { DocxBackend } from './backends/docx-backend.js';
import { PdfBackend } from './backends/pdf-backend.js';
import { RtfBackend } from './backends/rtf-backend.js';
import { XlsxBackend } from './backends/xlsx-backend.js';
import { createImageServices, type BlockRenderer, type ImageServices } from './backends/backend.js';
import { FormatError, SchemaError } from './errors.js';
import { parseReplyJson } from './parse.js';
import { decodeDocument, type DecodeResult } from './schema.js';
import type { DocumentFormat, DocumentModel, RenderArtifact, StyleWarning } from './types.js';

export interface PipelineOptions {
  images?: Partial<ImageServices>;
  pdfFontPath?: string;
  pdfBoldFontPath?: string;
}

export class DocumentPipeline {
  private readonly backends: Record<DocumentFormat, BlockRenderer>;

  constructor(options: PipelineOptions = {}) {
    const images = createImageServices(options.images);
    this.backends = {
      docx: new DocxBackend(images),
      pdf: new PdfBackend({ images, fontPath: options.pdfFontPath, boldFontPath: options.pdfBoldFontPath }),
      xlsx: new XlsxBackend(images),
      rtf: new RtfBackend(images),
    };
  }

  backendFor(format: DocumentFormat): BlockRenderer {
    return this.backends[format];
  }

  /**
   * Fence-strip, parse and decode a reply. FormatError when it is not JSON,
   * SchemaError when it is JSON but not a document.
   */
  parse(rawModelOutput: string | null | undefined): DecodeResult {
    const value = parseReplyJson(rawModelOutput);
    return decodeDocument(value);
  }

  async render(rawModelOutput: string | null | undefined, format: DocumentFormat): Promise<RenderArtifact> {
    const { document, warnings } = this.parse(rawModelOutput);
    return this.renderDocument(document, format, warnings);
  }

  async renderDocument(
    document: DocumentModel,
    format: DocumentFormat,
    warnings: StyleWarning[] = []
  ): Promise<RenderArtifact> {
    log.debug(`Rendering ${document.blocks.length} blocks as ${format}`);
    const artifact = await this.backendFor(format).render(document, warnings);
    if (artifact.failures.length > 0) {
      log.info(`${artifact.filename}: ${artifact.failures.length} block(s) rendered as text`);
    }
    return artifact;
  }
}

export type DeliveredReply =
  | { kind: 'artifact'; artifact: RenderArtifact }
  | { kind: 'text'; text: string; reason: string };

/**
 * Render a reply, or hand back the reply itself when it cannot be turned into
 * a document. Only unexpected failures propagate.
 */
export async function deliverReply(
  pipeline: DocumentPipeline,
  rawModelOutput: string,
  format: DocumentFormat
): Promise<DeliveredReply> {
  try {
    return { kind: 'artifact', artifact: await pipeline.render(rawModelOutput, format) };
  } catch (error) {
    if (error instanceof FormatError || error instanceof SchemaError) {
      log.info(`Sending the reply as text: ${error.message}`);
      return { kind: 'text', text: rawModelOutput, reason: error.message };
    }
    throw error;
  }
}
