// History truncation - fit a conversation into a model's context window

import { logger } from '../utils/logger.js';
import { defaultTokenEstimator, type TokenEstimator } from './token-estimator.js';
import { turnText, type ConversationTurn } from './types.js';

export interface TruncateOptions {
  /** Use this window instead of the registry's */
  maxTokens?: number;
}

export interface TruncationReport {
  turns: ConversationTurn[];
  /** Budget left for history after the reserve */
  availableTokens: number;
  originalTokens: number;
  retainedTokens: number;
  droppedTurns: number;
  systemRetained: boolean;
  /**
   * Nothing could be kept. Callers have to deal with an empty request
   * themselves; this is not an error.
   */
  exhausted: boolean;
}

/**
 * Keeps the most recent turns that fit in `window - reserve`.
 *
 * A leading system turn is kept whole or not at all. Older turns are
 * dropped first, one at a time, so a user/assistant pair can lose its
 * first half; that is accepted.
 */
export class HistoryTruncator {
  constructor(private readonly estimator: TokenEstimator = defaultTokenEstimator) {}

  truncate(
    turns: readonly ConversationTurn[],
    model: string,
    reserveTokens: number = 0,
    options: TruncateOptions = {}
  ): ConversationTurn[] {
    return this.truncateWithReport(turns, model, reserveTokens, options).turns;
  }

  truncateWithReport(
    turns: readonly ConversationTurn[],
    model: string,
    reserveTokens: number = 0,
    options: TruncateOptions = {}
  ): TruncationReport {
    const profile = this.estimator.profileFor(model);
    const window = options.maxTokens ?? profile.contextWindow;
    const available = window - Math.max(0, reserveTokens);

    if (profile.kind === 'image') {
      return this.truncateImagePrompt(turns, model, available);
    }

    const originalTokens = this.estimator.countConversation(turns, model);

    if (available <= 0) {
      return this.report([], turns, model, available, originalTokens, false);
    }

    if (originalTokens <= available) {
      return this.report([...turns], turns, model, available, originalTokens, turns[0]?.role === 'system');
    }

    const [first, ...rest] = turns;
    const system = first?.role === 'system' ? first : undefined;
    const history = system ? rest : [...turns];

    let remaining = available;
    if (system) {
      const systemTokens = this.estimator.countTurn(system, model);
      if (systemTokens > available) {
        logger.debug(`System turn alone (${systemTokens} tokens) exceeds the ${available} token budget for ${model}`);
        return this.report([], turns, model, available, originalTokens, false);
      }
      remaining -= systemTokens;
    }

    const kept: ConversationTurn[] = [];
    let used = 0;
    for (let i = history.length - 1; i >= 0; i--) {
      const cost = this.estimator.countTurn(history[i], model);
      if (used + cost > remaining) break;
      kept.unshift(history[i]);
      used += cost;
    }

    const result = system ? [system, ...kept] : kept;
    return this.report(result, turns, model, available, originalTokens, system !== undefined);
  }

  /**
   * Image prompts carry no history: everything goes if the text fits the
   * character budget, otherwise only the latest user turn.
   */
  private truncateImagePrompt(
    turns: readonly ConversationTurn[],
    model: string,
    available: number
  ): TruncationReport {
    const originalTokens = this.estimator.countConversation(turns, model);
    if (available <= 0) {
      return this.report([], turns, model, available, originalTokens, false);
    }

    const characters = turns.reduce((total, turn) => total + turnText(turn.content).length, 0);
    if (characters <= available) {
      return this.report([...turns], turns, model, available, originalTokens, turns[0]?.role === 'system');
    }

    const lastUser = [...turns].reverse().find(turn => turn.role === 'user');
    return this.report(lastUser ? [lastUser] : [], turns, model, available, originalTokens, false);
  }

  private report(
    retained: ConversationTurn[],
    original: readonly ConversationTurn[],
    model: string,
    availableTokens: number,
    originalTokens: number,
    systemRetained: boolean
  ): TruncationReport {
    const exhausted = retained.length === 0 && original.length > 0;
    if (exhausted) {
      logger.debug(`Token budget exhausted for ${model}: no turns retained`);
    }
    return {
      turns: retained,
      availableTokens,
      originalTokens,
      retainedTokens: retained.length > 0 ? this.estimator.countConversation(retained, model) : 0,
      droppedTurns: original.length - retained.length,
      systemRetained,
      exhausted,
    };
  }
}

export const defaultHistoryTruncator = new HistoryTruncator();

export function truncate(
  turns: readonly ConversationTurn[],
  modelName: string,
  reserveTokens: number = 0,
  options: TruncateOptions = {}
): ConversationTurn[] {
  return defaultHistoryTruncator.truncate(turns, modelName, reserveTokens, options);
}
