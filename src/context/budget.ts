// Context Budget - how much of a model's window a conversation uses

import chalk from 'chalk';
import { defaultTokenEstimator, type TokenEstimator } from './token-estimator.js';
import type { ConversationTurn } from './types.js';

/**
 * Token usage of a conversation against one model's window.
 *
 * @example
 * ```typescript
 * const usage = checkTokenUsage(turns, 'gpt-4', { reserveTokens: 1000 });
 * // {
 * //   totalTokens: 7400,
 * //   maxTokens: 8192,
 * //   availableTokens: 7192,
 * //   reserveTokens: 1000,
 * //   isWithinLimit: false,
 * //   excessTokens: 208,
 * //   percentUsed: 90.33
 * // }
 * ```
 *
 * @remarks
 * - `availableTokens` can be negative when the reserve is larger than the
 *   window; `isWithinLimit` is then false for any non-empty conversation
 * - `percentUsed` is relative to the full window, not to the available part
 */
export interface TokenUsage {
  /** Tokens the conversation costs, framing included */
  totalTokens: number;

  /** The model's window, or the explicit override */
  maxTokens: number;

  /** Window minus reserve */
  availableTokens: number;

  /** Tokens held back for the model's answer */
  reserveTokens: number;

  isWithinLimit: boolean;

  /** How far over the available budget the conversation is, never negative */
  excessTokens: number;

  percentUsed: number;
}

export interface UsageOptions {
  reserveTokens?: number;
  maxTokens?: number;
  estimator?: TokenEstimator;
}

export const DEFAULT_RESERVE_TOKENS = 1000;

export function checkTokenUsage(
  turns: readonly ConversationTurn[],
  model: string,
  options: UsageOptions = {}
): TokenUsage {
  const estimator = options.estimator ?? defaultTokenEstimator;
  const reserveTokens = options.reserveTokens ?? DEFAULT_RESERVE_TOKENS;
  const maxTokens = options.maxTokens ?? estimator.profileFor(model).contextWindow;
  const availableTokens = maxTokens - reserveTokens;
  const totalTokens = estimator.countConversation(turns, model);

  return {
    totalTokens,
    maxTokens,
    availableTokens,
    reserveTokens,
    isWithinLimit: totalTokens <= availableTokens,
    excessTokens: Math.max(0, totalTokens - availableTokens),
    percentUsed: maxTokens > 0 ? Math.round((totalTokens / maxTokens) * 10000) / 100 : 100,
  };
}

/**
 * One-line usage summary with a progress bar, for terminal output
 */
export function formatUsageSummary(usage: TokenUsage): string {
  const bar = createProgressBar(usage.percentUsed);
  const warning = usage.isWithinLimit
    ? ''
    : `\n⚠️  Over budget by ${usage.excessTokens} tokens - history will be truncated`;
  return `${bar} ${Math.round(usage.percentUsed)}% used (${usage.totalTokens}/${usage.maxTokens} tokens, ${usage.reserveTokens} reserved)${warning}`;
}

function createProgressBar(percent: number): string {
  const width = 20;
  const filled = Math.min(width, Math.max(0, Math.round((percent / 100) * width)));
  const empty = width - filled;

  let color = chalk.green;
  if (percent > 80) {
    color = chalk.red;
  } else if (percent > 60) {
    color = chalk.yellow;
  }

  return color('█'.repeat(filled)) + chalk.gray('░'.repeat(empty));
}
