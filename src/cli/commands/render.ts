// Render a model reply into a document file

import chalk from 'chalk';
import { promises as fs } from 'fs';
import path from 'path';
import { loadConfig } from '../../utils/config.js';
import { log } from '../../utils/logger.js';
import { ErrorHandler } from '../../utils/error-handler.js';
import { DocumentPipeline, deliverReply } from '../../document/pipeline.js';
import { detectRequestedFormat } from '../../document/format-detect.js';
import { DOCUMENT_FORMATS, isDocumentFormat, type DocumentFormat } from '../../document/types.js';
import { readInput } from '../input.js';

export interface RenderCommandOptions {
  format?: string;
  detect?: string;
  output?: string;
}

function resolveFormat(options: RenderCommandOptions): DocumentFormat {
  if (options.format) {
    const format = options.format.toLowerCase();
    if (!isDocumentFormat(format)) {
      throw new Error(`Unknown format "${options.format}" (expected ${DOCUMENT_FORMATS.join(', ')})`);
    }
    return format;
  }
  if (options.detect) {
    const detected = detectRequestedFormat(options.detect);
    if (!detected) {
      throw new Error(`No document format mentioned in "${options.detect}"`);
    }
    log.debug(`Detected format: ${detected}`);
    return detected;
  }
  throw new Error('Choose a format with --format or --detect');
}

/** Where the plain-text fallback goes */
export function textFallbackPath(output: string | undefined): string {
  if (!output) return 'reply.txt';
  const ext = path.extname(output);
  return ext ? `${output.slice(0, -ext.length)}.txt` : `${output}.txt`;
}

export async function renderCommand(input: string, options: RenderCommandOptions): Promise<void> {
  try {
    const format = resolveFormat(options);
    const raw = await readInput(input);
    const config = await loadConfig();
    const pipeline = new DocumentPipeline({
      pdfFontPath: config.documents.pdfFontPath,
      pdfBoldFontPath: config.documents.pdfBoldFontPath,
    });

    const result = await deliverReply(pipeline, raw, format);

    if (result.kind === 'text') {
      const target = textFallbackPath(options.output);
      await fs.writeFile(target, result.text, 'utf-8');
      log.warn(`Not a document (${result.reason})`);
      log.info(chalk.yellow(`Saved the reply as plain text: ${target}`));
      return;
    }

    const { artifact } = result;
    const target = options.output ?? artifact.filename;
    await fs.writeFile(target, artifact.data);
    log.success(`Wrote ${target} (${artifact.format})`);

    for (const warning of artifact.warnings) {
      log.info(chalk.gray(`  ${warning.code}: ${warning.message}`));
    }
    for (const failure of artifact.failures) {
      log.info(chalk.yellow(`  block ${failure.index} (${failure.type}) rendered as text`));
    }
  } catch (error) {
    log.error(chalk.red('Error:') + ' ' + ErrorHandler.getErrorMessage(error));
    process.exit(1);
  }
}
