// Conversation storage per (user, mode)

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { getConversationsDir } from '../utils/app-paths.js';
import { logger } from '../utils/logger.js';
import type { ConversationTurn, ExchangeTurn } from '../context/types.js';

export type UserId = string | number;

/**
 * Holds the running context of each user in each bot mode. Callers serialize
 * mutations of a single (user, mode) context themselves.
 */
export interface ConversationStore {
  get(userId: UserId, mode: string): Promise<ConversationTurn[]>;
  append(userId: UserId, mode: string, ...turns: ExchangeTurn[]): Promise<void>;
  reset(userId: UserId, mode: string): Promise<void>;
}

export interface ConversationStoreOptions {
  /** Non-system turns kept per context; oldest go first */
  maxTurns?: number;
  /** System prompt that opens a new context, per mode */
  systemPrompts?: Partial<Record<string, string>>;
}

export const DEFAULT_MAX_TURNS = 10;

/**
 * Context and eviction rules shared by the stores
 */
abstract class BaseConversationStore implements ConversationStore {
  protected readonly maxTurns: number;
  private readonly systemPrompts: Partial<Record<string, string>>;

  constructor(options: ConversationStoreOptions = {}) {
    this.maxTurns = Math.max(1, options.maxTurns ?? DEFAULT_MAX_TURNS);
    this.systemPrompts = options.systemPrompts ?? {};
  }

  protected abstract load(key: string): Promise<ConversationTurn[] | undefined>;
  protected abstract save(key: string, turns: ConversationTurn[]): Promise<void>;
  protected abstract remove(key: string): Promise<void>;

  protected keyFor(userId: UserId, mode: string): string {
    return `${String(userId)}:${mode}`;
  }

  protected seed(mode: string): ConversationTurn[] {
    const prompt = this.systemPrompts[mode];
    return prompt ? [{ role: 'system', content: prompt }] : [];
  }

  /** Keep the leading system turn and the newest `maxTurns` others */
  protected cap(turns: ConversationTurn[]): ConversationTurn[] {
    const [first, ...rest] = turns;
    if (first?.role === 'system') {
      return [first, ...rest.slice(-this.maxTurns)];
    }
    return turns.slice(-this.maxTurns);
  }

  async get(userId: UserId, mode: string): Promise<ConversationTurn[]> {
    const turns = await this.load(this.keyFor(userId, mode));
    return turns ? [...turns] : this.seed(mode);
  }

  async append(userId: UserId, mode: string, ...turns: ExchangeTurn[]): Promise<void> {
    const key = this.keyFor(userId, mode);
    const current = (await this.load(key)) ?? this.seed(mode);
    await this.save(key, this.cap([...current, ...turns]));
  }

  async reset(userId: UserId, mode: string): Promise<void> {
    await this.remove(this.keyFor(userId, mode));
  }
}

export class InMemoryConversationStore extends BaseConversationStore {
  private readonly contexts = new Map<string, ConversationTurn[]>();

  protected async load(key: string): Promise<ConversationTurn[] | undefined> {
    return this.contexts.get(key);
  }

  protected async save(key: string, turns: ConversationTurn[]): Promise<void> {
    this.contexts.set(key, turns);
  }

  protected async remove(key: string): Promise<void> {
    this.contexts.delete(key);
  }

  size(): number {
    return this.contexts.size;
  }
}

const storedPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('image'),
    mimeType: z.string().optional(),
    url: z.string().optional(),
    data: z
      .string()
      .optional()
      .transform(value => (value === undefined ? undefined : new Uint8Array(Buffer.from(value, 'base64')))),
  }),
]);

const storedTurnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string(), z.null(), z.array(storedPartSchema)]),
  name: z.string().optional(),
});

const storedContextSchema = z.object({
  turns: z.array(storedTurnSchema),
});

function toStored(turn: ConversationTurn) {
  const content =
    turn.content === null || typeof turn.content === 'string'
      ? turn.content
      : turn.content.map(part =>
          part.type === 'image' && part.data
            ? { ...part, data: Buffer.from(part.data).toString('base64') }
            : part
        );
  return turn.name ? { role: turn.role, content, name: turn.name } : { role: turn.role, content };
}

/**
 * One JSON file per user and mode under the conversations directory
 */
export class JsonFileConversationStore extends BaseConversationStore {
  private readonly directory: string;

  constructor(options: ConversationStoreOptions & { directory?: string } = {}) {
    super(options);
    this.directory = options.directory ?? getConversationsDir();
  }

  private fileFor(key: string): string {
    const safe = key.replace(/[^\w.-]+/g, '_');
    return path.join(this.directory, `${safe}.json`);
  }

  protected async load(key: string): Promise<ConversationTurn[] | undefined> {
    const file = this.fileFor(key);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Ignoring unreadable conversation file ${file}: ${String(error)}`);
      return undefined;
    }
    const parsed = storedContextSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn(`Ignoring invalid conversation file ${file}: ${parsed.error.issues[0]?.message ?? 'bad shape'}`);
      return undefined;
    }
    return parsed.data.turns;
  }

  protected async save(key: string, turns: ConversationTurn[]): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const body = JSON.stringify({ turns: turns.map(toStored) }, null, 2);
    await fs.writeFile(this.fileFor(key), body, 'utf-8');
  }

  protected async remove(key: string): Promise<void> {
    await fs.rm(this.fileFor(key), { force: true });
  }
}
