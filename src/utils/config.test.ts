import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { deepMerge, getConfigValue, getDefaultConfig, loadConfig, modelForMode, setConfigValue } from './config.js';

const ENV_KEYS = [
  'REPLYFORGE_HOME',
  'REPLYFORGE_CHAT_MODEL',
  'REPLYFORGE_IMAGE_MODEL',
  'REPLYFORGE_RESERVE_TOKENS',
  'REPLYFORGE_MAX_TURNS',
  'REPLYFORGE_PDF_FONT',
  'REPLYFORGE_PDF_BOLD_FONT',
  'REPLYFORGE_LOG_LEVEL',
];

describe('config', () => {
  let home: string;
  const saved: Record<string, string | undefined> = {};

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'replyforge-config-'));
    process.env.REPLYFORGE_HOME = home;
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await fs.rm(home, { recursive: true, force: true });
  });

  const writeConfig = (value: unknown) =>
    fs.writeFile(path.join(home, 'config.json'), JSON.stringify(value), 'utf-8');

  it('uses the defaults without a config file', async () => {
    expect(await loadConfig()).toEqual(getDefaultConfig());
  });

  it('overlays the config file on the defaults', async () => {
    await writeConfig({ tokens: { reserveTokens: 500 } });
    const config = await loadConfig();
    expect(config.tokens).toEqual({ reserveTokens: 500, overhead: { perTurn: 3, perName: 1, reply: 3 } });
    expect(config.models.chat).toBe('gpt-5.1');
  });

  it('falls back to the defaults when the file is invalid', async () => {
    await writeConfig({ conversation: { maxTurns: -1 } });
    expect(await loadConfig()).toEqual(getDefaultConfig());
  });

  it('lets the environment win over the file', async () => {
    await writeConfig({ tokens: { reserveTokens: 500 } });
    process.env.REPLYFORGE_RESERVE_TOKENS = '42';
    process.env.REPLYFORGE_LOG_LEVEL = 'DEBUG';
    const config = await loadConfig();
    expect(config.tokens.reserveTokens).toBe(42);
    expect(config.logging.level).toBe('debug');
  });

  it('sets and reads dotted keys', async () => {
    await setConfigValue('conversation.maxTurns', '4');
    expect(await getConfigValue('conversation.maxTurns')).toBe(4);
    expect(await getConfigValue('conversation.missing')).toBeUndefined();

    const stored: unknown = JSON.parse(await fs.readFile(path.join(home, 'config.json'), 'utf-8'));
    expect(stored).toEqual({ conversation: { maxTurns: 4 } });
  });

  it('refuses values the schema rejects', async () => {
    await expect(setConfigValue('logging.level', 'loud')).rejects.toThrow(/^Invalid value for logging\.level/);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces everything else', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2] })).toEqual({ a: { b: 1, c: 3 }, d: [2] });
  });

  it('ignores a source that is not an object', () => {
    expect(deepMerge({ a: 1 }, 'nope')).toEqual({ a: 1 });
  });
});

describe('modelForMode', () => {
  it('picks the model configured for the mode, chat otherwise', () => {
    const config = getDefaultConfig();
    expect(modelForMode(config, 'image')).toBe('dall-e-3');
    expect(modelForMode(config, 'voice')).toBe('gpt-5.1');
  });
});
