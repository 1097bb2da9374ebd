// Configuration management

import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { getReplyforgeHomeDir } from './app-paths.js';
import { logger } from './logger.js';

// Load .env file
dotenv.config();

const overheadSchema = z.object({
  perTurn: z.number().int().nonnegative(),
  perName: z.number().int().nonnegative(),
  reply: z.number().int().nonnegative(),
});

export const configSchema = z.object({
  models: z.object({
    chat: z.string().min(1),
    image: z.string().min(1),
    edit: z.string().min(1),
    fileAnalysis: z.string().min(1),
  }),
  tokens: z.object({
    reserveTokens: z.number().int().nonnegative(),
    overhead: overheadSchema,
  }),
  conversation: z.object({
    maxTurns: z.number().int().positive(),
    /** System prompt that opens a new context, per bot mode */
    systemPrompts: z.record(z.string()),
  }),
  documents: z.object({
    pdfFontPath: z.string().optional(),
    pdfBoldFontPath: z.string().optional(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Model configured for a bot mode; chat for modes without one */
export function modelForMode(config: AppConfig, mode: string): string {
  const models: Record<string, string> = config.models;
  return models[mode] ?? config.models.chat;
}

type PlainObject = Record<string, unknown>;

function getConfigFile(): string {
  return path.join(getReplyforgeHomeDir(), 'config.json');
}

export function getDefaultConfig(): AppConfig {
  return {
    models: {
      chat: 'gpt-5.1',
      image: 'dall-e-3',
      edit: 'gemini-2.5-flash-preview-image',
      fileAnalysis: 'gpt-5.1',
    },
    tokens: {
      reserveTokens: 1500,
      overhead: { perTurn: 3, perName: 1, reply: 3 },
    },
    conversation: {
      maxTurns: 10,
      systemPrompts: {
        chat: 'You are a helpful assistant.',
      },
    },
    documents: {},
    logging: {
      level: 'info',
    },
  };
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Environment overrides, only for the variables that are set
 */
function getEnvOverrides(): PlainObject {
  const env = process.env;
  const overrides: PlainObject = {};
  const models: PlainObject = {};
  if (env.REPLYFORGE_CHAT_MODEL) models.chat = env.REPLYFORGE_CHAT_MODEL;
  if (env.REPLYFORGE_IMAGE_MODEL) models.image = env.REPLYFORGE_IMAGE_MODEL;
  if (Object.keys(models).length > 0) overrides.models = models;

  const reserveTokens = parseIntEnv(env.REPLYFORGE_RESERVE_TOKENS);
  if (reserveTokens !== undefined) overrides.tokens = { reserveTokens };

  const maxTurns = parseIntEnv(env.REPLYFORGE_MAX_TURNS);
  if (maxTurns !== undefined) overrides.conversation = { maxTurns };

  const documents: PlainObject = {};
  if (env.REPLYFORGE_PDF_FONT) documents.pdfFontPath = env.REPLYFORGE_PDF_FONT;
  if (env.REPLYFORGE_PDF_BOLD_FONT) documents.pdfBoldFontPath = env.REPLYFORGE_PDF_BOLD_FONT;
  if (Object.keys(documents).length > 0) overrides.documents = documents;

  if (env.REPLYFORGE_LOG_LEVEL) overrides.logging = { level: env.REPLYFORGE_LOG_LEVEL.toLowerCase() };
  return overrides;
}

async function readConfigFile(): Promise<PlainObject> {
  let configData: string;
  try {
    configData = await fs.readFile(getConfigFile(), 'utf-8');
  } catch {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(configData);
    return isPlainObject(parsed) ? parsed : {};
  } catch (error) {
    logger.warn(`Ignoring unreadable config file ${getConfigFile()}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

export async function loadConfig(): Promise<AppConfig> {
  const defaults = getDefaultConfig();
  const merged = deepMerge(deepMerge(toPlainObject(defaults), await readConfigFile()), getEnvOverrides());

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const fields = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
    logger.warn(`Invalid configuration (${fields}), using defaults`);
    return defaults;
  }
  return result.data;
}

export async function saveConfig(config: PlainObject): Promise<void> {
  await fs.mkdir(getReplyforgeHomeDir(), { recursive: true });

  const current = await readConfigFile();
  const next = deepMerge(current, config);

  await fs.writeFile(getConfigFile(), JSON.stringify(next, null, 2), 'utf-8');
}

export async function getConfigValue(key: string): Promise<unknown> {
  const config = toPlainObject(await loadConfig());
  let value: unknown = config;

  for (const k of key.split('.')) {
    value = isPlainObject(value) ? value[k] : undefined;
  }

  return value;
}

export async function setConfigValue(key: string, value: string): Promise<void> {
  const keys = key.split('.');
  const patch: PlainObject = {};
  let obj = patch;

  for (let i = 0; i < keys.length - 1; i++) {
    const child: PlainObject = {};
    obj[keys[i]] = child;
    obj = child;
  }

  // Try to parse as JSON, otherwise use string
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    parsed = value;
  }
  obj[keys[keys.length - 1]] = parsed;

  const candidate = deepMerge(toPlainObject(await loadConfig()), patch);
  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`Invalid value for ${key}: ${result.error.errors.map(err => err.message).join(', ')}`);
  }

  await saveConfig(patch);
}

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPlainObject(config: AppConfig): PlainObject {
  return deepMerge({}, config);
}

export function deepMerge(target: PlainObject, source: unknown): PlainObject {
  const result: PlainObject = { ...target };
  if (!isPlainObject(source)) return result;

  for (const key of Object.keys(source)) {
    const value = source[key];
    const existing = target[key];
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}
