import { describe, it, expect } from '@jest/globals';
import { ModelRegistry, contextWindowFor, defaultModelRegistry } from './models.js';
import {
  TokenEstimator,
  cachedEncoderModels,
  countConversationTokens,
  countTokens,
} from './token-estimator.js';
import type { ConversationTurn } from './types.js';

const registry = new ModelRegistry([
  { name: 'test-chat', contextWindow: 100, countingStrategy: 'heuristic', kind: 'chat' },
  { name: 'test-image', contextWindow: 50, countingStrategy: 'characters', kind: 'image' },
]);
const estimator = new TokenEstimator({ registry });

const forty = 'x'.repeat(40);

describe('TokenEstimator.count', () => {
  it('returns 0 for absent and empty text on every model', () => {
    for (const model of ['gpt-4', 'dall-e-3', 'gemini-2.5-pro', 'unknown-model']) {
      expect(countTokens(null, model)).toBe(0);
      expect(countTokens(undefined, model)).toBe(0);
      expect(countTokens('', model)).toBe(0);
    }
  });

  it('uses four characters per token for heuristic models', () => {
    expect(estimator.count(forty, 'test-chat')).toBe(10);
    expect(estimator.count('abc', 'test-chat')).toBe(0);
  });

  it('counts characters for image-generation models', () => {
    expect(estimator.count('hello', 'test-image')).toBe(5);
    expect(countTokens('a cat on a sofa', 'dall-e-3')).toBe(15);
  });

  it('coerces non-string values to text', () => {
    expect(estimator.count(12345678, 'test-chat')).toBe(2);
    expect(estimator.count(true, 'test-image')).toBe(4);
    expect(estimator.count({ a: 1 }, 'test-image')).toBe(7);
  });

  it('counts with the subword tokenizer for the exact family', () => {
    expect(countTokens('hello', 'gpt-4')).toBe(1);
  });

  it('falls back to the general-purpose tokenizer for unknown exact-family names', () => {
    const text = 'The quick brown fox jumps over the lazy dog.';
    expect(countTokens(text, 'gpt-9-preview')).toBe(countTokens(text, 'gpt-4'));
    expect(cachedEncoderModels()).toContain('gpt-9-preview');
  });

  it('does not throw on special-token markers in user text', () => {
    expect(countTokens('<|endoftext|>', 'gpt-4')).toBeGreaterThan(0);
  });
});

describe('TokenEstimator.countConversation', () => {
  it('adds per-turn and reply framing to the text counts', () => {
    const turns: ConversationTurn[] = [
      { role: 'system', content: forty },
      { role: 'user', content: forty },
      { role: 'assistant', content: forty },
    ];
    // (3 + 1 + 10) + (3 + 1 + 10) + (3 + 2 + 10) + 3
    expect(estimator.countConversation(turns, 'test-chat')).toBe(46);
  });

  it('charges the name field plus one', () => {
    const turn: ConversationTurn = { role: 'user', content: forty, name: 'bob' };
    expect(estimator.countConversation([turn], 'test-chat')).toBe(18);
  });

  it('counts missing content as zero', () => {
    expect(estimator.countConversation([{ role: 'user', content: null }], 'test-chat')).toBe(7);
  });

  it('charges only the reply priming for an empty conversation', () => {
    expect(estimator.countConversation([], 'test-chat')).toBe(3);
    expect(countConversationTokens([], 'gpt-4')).toBe(3);
  });

  it('counts text parts and estimates inline images for heuristic models', () => {
    const turn: ConversationTurn = {
      role: 'user',
      content: [
        { type: 'text', text: forty },
        { type: 'image', data: new Uint8Array(1000) },
      ],
    };
    expect(estimator.countConversation([turn], 'test-chat')).toBe(21);

    const big: ConversationTurn = { role: 'user', content: [{ type: 'image', data: new Uint8Array(100000) }] };
    expect(estimator.countConversation([big], 'test-chat')).toBe(3 + 1 + 200 + 3);
  });

  it('ignores images for character-counted models', () => {
    const turn: ConversationTurn = {
      role: 'user',
      content: [
        { type: 'text', text: 'draw' },
        { type: 'image', data: new Uint8Array(1000) },
      ],
    };
    // 3 + "user" + "draw" + 3
    expect(estimator.countConversation([turn], 'test-image')).toBe(14);
  });

  it('takes overridden overhead constants', () => {
    const bare = new TokenEstimator({ registry, overhead: { perTurn: 0, reply: 0 } });
    expect(bare.countConversation([{ role: 'user', content: forty }], 'test-chat')).toBe(11);
    expect(bare.overhead.perName).toBe(1);
  });
});

describe('ModelRegistry', () => {
  it('returns registered windows and the default for unknown models', () => {
    expect(contextWindowFor('gpt-4')).toBe(8192);
    expect(contextWindowFor('gemini-1.0-pro')).toBe(32768);
    expect(contextWindowFor('mystery-model')).toBe(4096);
  });

  it('gives unknown models heuristic counting unless they belong to the exact family', () => {
    expect(defaultModelRegistry.get('mystery-model').countingStrategy).toBe('heuristic');
    expect(defaultModelRegistry.get('gpt-7').countingStrategy).toBe('exact');
    expect(defaultModelRegistry.get('dall-e-3').kind).toBe('image');
  });

  it('accepts runtime registrations', () => {
    const local = new ModelRegistry([]);
    local.register({ name: 'local-llm', contextWindow: 2048, countingStrategy: 'heuristic', kind: 'chat' });
    expect(local.contextWindowFor('local-llm')).toBe(2048);
    expect(local.list().map(p => p.name)).toEqual(['local-llm']);
  });

  it('rejects negative windows', () => {
    const local = new ModelRegistry([]);
    expect(() =>
      local.register({ name: 'broken', contextWindow: -1, countingStrategy: 'heuristic', kind: 'chat' })
    ).toThrow('Invalid context window');
  });
});
