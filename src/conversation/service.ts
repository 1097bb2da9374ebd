// Building model requests from stored context

import { logger } from '../utils/logger.js';
import { defaultHistoryTruncator, type HistoryTruncator, type TruncationReport } from '../context/truncator.js';
import { detectRequestedFormat, documentInstructions } from '../document/format-detect.js';
import type { DocumentFormat } from '../document/types.js';
import type { ConversationTurn } from '../context/types.js';
import type { ConversationStore, UserId } from './store.js';

export interface PrepareOptions {
  model: string;
  reserveTokens?: number;
  /** Skip keyword detection and use this format (null for plain text) */
  format?: DocumentFormat | null;
}

export interface PreparedRequest {
  /** What to send to the model, already truncated */
  turns: ConversationTurn[];
  format?: DocumentFormat;
  /** The user message as sent, instructions included */
  userContent: string;
  report: TruncationReport;
}

export interface ConversationServiceOptions {
  truncator?: HistoryTruncator;
  reserveTokens?: number;
}

export class ConversationService {
  private readonly truncator: HistoryTruncator;
  private readonly reserveTokens: number;

  constructor(
    private readonly store: ConversationStore,
    options: ConversationServiceOptions = {}
  ) {
    this.truncator = options.truncator ?? defaultHistoryTruncator;
    this.reserveTokens = options.reserveTokens ?? 0;
  }

  async prepareRequest(
    userId: UserId,
    mode: string,
    userMessage: string,
    options: PrepareOptions
  ): Promise<PreparedRequest> {
    const format = options.format === undefined ? detectRequestedFormat(userMessage) : (options.format ?? undefined);
    const userContent = format ? `${userMessage}\n\n${documentInstructions(format)}` : userMessage;

    const context = await this.store.get(userId, mode);
    const report = this.truncator.truncateWithReport(
      [...context, { role: 'user', content: userContent }],
      options.model,
      options.reserveTokens ?? this.reserveTokens
    );

    if (report.exhausted) {
      logger.warn(`No room left in ${options.model} for user ${String(userId)} (${mode})`);
    } else if (report.droppedTurns > 0) {
      logger.debug(`Dropped ${report.droppedTurns} turns for user ${String(userId)} (${mode})`);
    }

    return { turns: report.turns, ...(format ? { format } : {}), userContent, report };
  }

  /** Store a request/response pair */
  async recordExchange(userId: UserId, mode: string, userContent: string, reply: string): Promise<void> {
    await this.store.append(
      userId,
      mode,
      { role: 'user', content: userContent },
      { role: 'assistant', content: reply }
    );
  }

  async reset(userId: UserId, mode: string): Promise<void> {
    await this.store.reset(userId, mode);
  }
}
