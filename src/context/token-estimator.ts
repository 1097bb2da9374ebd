// Token estimation for context budgeting
// Exact counts for the subword-tokenized family, approximations for the rest

import { getEncoding, type Tiktoken } from 'js-tiktoken';
import { LRUCache } from '../utils/lru-cache.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_ENCODING, defaultModelRegistry, type ModelProfile, type ModelRegistry } from './models.js';
import type { ContentPart, ConversationTurn, TurnContent } from './types.js';

// Average characters per token for models without a local tokenizer
const CHARS_PER_TOKEN = 4;

// Inline images for heuristic-counted models: bytes per token, and a ceiling
const IMAGE_BYTES_PER_TOKEN = 250;
const MAX_IMAGE_TOKENS = 200;

/**
 * Framing cost of a chat request on top of the text itself:
 * `<|start|>{role}<|message|>{content}<|end|>` per turn, one more when the
 * turn carries a name, and the primer for the reply.
 *
 * The truncator prices turns with the same estimator, so whatever values are
 * set here are what both sides agree on.
 */
export interface ConversationOverhead {
  perTurn: number;
  perName: number;
  reply: number;
}

export const DEFAULT_CONVERSATION_OVERHEAD: ConversationOverhead = {
  perTurn: 3,
  perName: 1,
  reply: 3,
};

export interface TokenEstimatorOptions {
  registry?: ModelRegistry;
  overhead?: Partial<ConversationOverhead>;
}

// Shared by every estimator in the process, keyed by model name
const encoderCache = new LRUCache<string, Tiktoken>(32);

export function cachedEncoderModels(): string[] {
  return encoderCache.keys();
}

export class TokenEstimator {
  readonly registry: ModelRegistry;
  readonly overhead: ConversationOverhead;

  constructor(options: TokenEstimatorOptions = {}) {
    this.registry = options.registry ?? defaultModelRegistry;
    this.overhead = { ...DEFAULT_CONVERSATION_OVERHEAD, ...options.overhead };
  }

  profileFor(model: string): ModelProfile {
    return this.registry.get(model);
  }

  /**
   * Count tokens in a single value. Absent values count zero; anything that
   * is not a string is counted by its textual form.
   */
  count(text: unknown, model: string): number {
    const value = toText(text);
    if (!value) return 0;

    const profile = this.profileFor(model);
    switch (profile.countingStrategy) {
      case 'characters':
        return value.length;
      case 'heuristic':
        return Math.floor(value.length / CHARS_PER_TOKEN);
      case 'exact':
        return this.countExact(value, profile);
    }
  }

  /**
   * Count a whole request: text of every field plus the framing overhead.
   * An empty request still pays the reply priming.
   */
  countConversation(turns: readonly ConversationTurn[], model: string): number {
    let total = 0;
    for (const turn of turns) {
      total += this.overhead.perTurn;
      total += this.count(turn.role, model);
      total += this.countContent(turn.content, model);
      if (turn.name !== undefined && turn.name !== null) {
        total += this.count(turn.name, model) + this.overhead.perName;
      }
    }
    return total + this.overhead.reply;
  }

  /**
   * Cost of sending one turn on its own, framing included
   */
  countTurn(turn: ConversationTurn, model: string): number {
    return this.countConversation([turn], model);
  }

  private countContent(content: TurnContent | null | undefined, model: string): number {
    if (content === null || content === undefined) return 0;
    if (!Array.isArray(content)) return this.count(content, model);

    let total = 0;
    for (const part of content) {
      total += this.countPart(part, model);
    }
    return total;
  }

  private countPart(part: ContentPart, model: string): number {
    if (part.type === 'text') {
      return this.count(part.text, model);
    }
    // Images are not text-encoded for the exact and character strategies
    if (this.profileFor(model).countingStrategy !== 'heuristic' || !part.data) {
      return 0;
    }
    return Math.min(Math.floor(part.data.byteLength / IMAGE_BYTES_PER_TOKEN), MAX_IMAGE_TOKENS);
  }

  private countExact(text: string, profile: ModelProfile): number {
    try {
      const encoder = encoderCache.getOrCreate(profile.name, () =>
        getEncoding(profile.encoding ?? DEFAULT_ENCODING)
      );
      // Special-token markers in user text are counted as ordinary text
      return encoder.encode(text, [], []).length;
    } catch (error) {
      logger.debug(
        `Tokenizer unavailable for ${profile.name}, using character estimate: ${error instanceof Error ? error.message : String(error)}`
      );
      return Math.floor(text.length / CHARS_PER_TOKEN);
    }
  }
}

function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? '';
  } catch {
    return String(value);
  }
}

export const defaultTokenEstimator = new TokenEstimator();

export function countTokens(text: unknown, modelName: string): number {
  return defaultTokenEstimator.count(text, modelName);
}

export function countConversationTokens(turns: readonly ConversationTurn[], modelName: string): number {
  return defaultTokenEstimator.countConversation(turns, modelName);
}
