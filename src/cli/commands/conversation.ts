// Stored per-user conversations: prepare a model request, record replies, reset

import chalk from 'chalk';
import { loadConfig, modelForMode, type AppConfig } from '../../utils/config.js';
import { log } from '../../utils/logger.js';
import { ErrorHandler } from '../../utils/error-handler.js';
import { TokenEstimator } from '../../context/token-estimator.js';
import { HistoryTruncator } from '../../context/truncator.js';
import { ConversationService } from '../../conversation/service.js';
import { JsonFileConversationStore } from '../../conversation/store.js';
import { DOCUMENT_FORMATS, isDocumentFormat, type DocumentFormat } from '../../document/types.js';

export interface ConversationCommandOptions {
  mode: string;
  model?: string;
  reserve?: number;
  /** A document format, "none" for plain text, or unset to detect */
  format?: string;
}

function createService(config: AppConfig): ConversationService {
  const store = new JsonFileConversationStore({
    maxTurns: config.conversation.maxTurns,
    systemPrompts: config.conversation.systemPrompts,
  });
  const truncator = new HistoryTruncator(new TokenEstimator({ overhead: config.tokens.overhead }));
  return new ConversationService(store, { truncator, reserveTokens: config.tokens.reserveTokens });
}

export function parseFormatOption(value: string | undefined): DocumentFormat | null | undefined {
  if (value === undefined) return undefined;
  const format = value.toLowerCase();
  if (format === 'none') return null;
  if (!isDocumentFormat(format)) {
    throw new Error(`Unknown format "${value}" (expected ${DOCUMENT_FORMATS.join(', ')} or none)`);
  }
  return format;
}

export async function conversationPrepareCommand(
  user: string,
  message: string,
  options: ConversationCommandOptions
): Promise<void> {
  try {
    const config = await loadConfig();
    const model = options.model ?? modelForMode(config, options.mode);
    const prepared = await createService(config).prepareRequest(user, options.mode, message, {
      model,
      reserveTokens: options.reserve,
      format: parseFormatOption(options.format),
    });

    const { report } = prepared;
    if (report.exhausted) {
      log.warn(`Nothing fits: ${report.availableTokens} tokens available for ${model}`);
    } else {
      log.info(
        chalk.gray(
          `${model}: ${report.retainedTokens}/${report.availableTokens} tokens, ${report.droppedTurns} turns dropped`
        )
      );
    }
    if (prepared.format) {
      log.info(chalk.gray(`Reply requested as ${prepared.format}`));
    }
    console.log(JSON.stringify(prepared.turns, null, 2));
  } catch (error) {
    log.error(chalk.red('Error:') + ' ' + ErrorHandler.getErrorMessage(error));
    process.exit(1);
  }
}

export async function conversationRecordCommand(
  user: string,
  userContent: string,
  reply: string,
  options: ConversationCommandOptions
): Promise<void> {
  try {
    const config = await loadConfig();
    await createService(config).recordExchange(user, options.mode, userContent, reply);
    log.success(`Recorded exchange for ${user} (${options.mode})`);
  } catch (error) {
    log.error(chalk.red('Error:') + ' ' + ErrorHandler.getErrorMessage(error));
    process.exit(1);
  }
}

export async function conversationResetCommand(user: string, options: ConversationCommandOptions): Promise<void> {
  try {
    const config = await loadConfig();
    await createService(config).reset(user, options.mode);
    log.success(`Cleared conversation for ${user} (${options.mode})`);
  } catch (error) {
    log.error(chalk.red('Error:') + ' ' + ErrorHandler.getErrorMessage(error));
    process.exit(1);
  }
}
