// Model profile registry - context windows and counting strategies per model

import type { TiktokenEncoding } from 'js-tiktoken';

/**
 * How tokens are counted for a model:
 * - `exact`: the model family's subword tokenizer
 * - `heuristic`: roughly four characters per token
 * - `characters`: one token per character (image-generation prompts)
 */
export type CountingStrategy = 'exact' | 'heuristic' | 'characters';

export type ModelKind = 'chat' | 'image';

export interface ModelProfile {
  readonly name: string;
  readonly contextWindow: number;
  readonly countingStrategy: CountingStrategy;
  readonly kind: ModelKind;
  /** Tokenizer for the exact strategy; the general-purpose one when omitted */
  readonly encoding?: TiktokenEncoding;
}

export const DEFAULT_CONTEXT_WINDOW = 4096;
export const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

const EXACT_FAMILY_PREFIXES = ['gpt-', 'chatgpt-', 'o1', 'o3', 'o4', 'text-'];

export const DEFAULT_MODEL_PROFILES: readonly ModelProfile[] = [
  { name: 'gpt-5.1', contextWindow: 128000, countingStrategy: 'exact', kind: 'chat', encoding: 'o200k_base' },
  { name: 'gpt-4o-mini', contextWindow: 128000, countingStrategy: 'exact', kind: 'chat', encoding: 'o200k_base' },
  { name: 'gpt-4o', contextWindow: 128000, countingStrategy: 'exact', kind: 'chat', encoding: 'o200k_base' },
  { name: 'gpt-4-turbo', contextWindow: 128000, countingStrategy: 'exact', kind: 'chat', encoding: 'cl100k_base' },
  { name: 'gpt-4', contextWindow: 8192, countingStrategy: 'exact', kind: 'chat', encoding: 'cl100k_base' },
  { name: 'gpt-3.5-turbo', contextWindow: 16385, countingStrategy: 'exact', kind: 'chat', encoding: 'cl100k_base' },
  // Prompt length limit, in characters
  { name: 'dall-e-3', contextWindow: 4096, countingStrategy: 'characters', kind: 'image' },
  { name: 'gemini-2.5-flash-preview-image', contextWindow: 1048576, countingStrategy: 'heuristic', kind: 'chat' },
  { name: 'gemini-2.5-pro', contextWindow: 2097152, countingStrategy: 'heuristic', kind: 'chat' },
  { name: 'gemini-2.0-flash-exp', contextWindow: 1048576, countingStrategy: 'heuristic', kind: 'chat' },
  { name: 'gemini-1.5-pro', contextWindow: 1048576, countingStrategy: 'heuristic', kind: 'chat' },
  { name: 'gemini-1.0-pro', contextWindow: 32768, countingStrategy: 'heuristic', kind: 'chat' },
];

export function isExactFamily(modelName: string): boolean {
  const lower = modelName.toLowerCase();
  return EXACT_FAMILY_PREFIXES.some(prefix => lower.startsWith(prefix));
}

/**
 * Read-mostly registry of model profiles. Lookups never fail: unknown
 * names get the default window, with the exact tokenizer when the name
 * belongs to the exact family and the character heuristic otherwise.
 */
export class ModelRegistry {
  private profiles = new Map<string, ModelProfile>();

  constructor(profiles: readonly ModelProfile[] = DEFAULT_MODEL_PROFILES) {
    for (const profile of profiles) {
      this.register(profile);
    }
  }

  register(profile: ModelProfile): void {
    if (!Number.isFinite(profile.contextWindow) || profile.contextWindow < 0) {
      throw new Error(`Invalid context window for ${profile.name}: ${profile.contextWindow}`);
    }
    this.profiles.set(profile.name, Object.freeze({ ...profile }));
  }

  has(modelName: string): boolean {
    return this.profiles.has(modelName);
  }

  get(modelName: string): ModelProfile {
    const known = this.profiles.get(modelName);
    if (known) return known;

    if (isExactFamily(modelName)) {
      return {
        name: modelName,
        contextWindow: DEFAULT_CONTEXT_WINDOW,
        countingStrategy: 'exact',
        kind: 'chat',
        encoding: DEFAULT_ENCODING,
      };
    }
    return {
      name: modelName,
      contextWindow: DEFAULT_CONTEXT_WINDOW,
      countingStrategy: 'heuristic',
      kind: 'chat',
    };
  }

  contextWindowFor(modelName: string): number {
    return this.get(modelName).contextWindow;
  }

  list(): ModelProfile[] {
    return Array.from(this.profiles.values());
  }
}

export const defaultModelRegistry = new ModelRegistry();

export function contextWindowFor(modelName: string): number {
  return defaultModelRegistry.contextWindowFor(modelName);
}
