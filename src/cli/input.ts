// Reading command input from files or stdin

import { promises as fs } from 'fs';
import { z } from 'zod';
import { HandledError } from '../utils/error-handler.js';
import type { ConversationTurn } from '../context/types.js';

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/** File contents, or stdin for `-` */
export async function readInput(source: string): Promise<string> {
  if (source === '-') {
    return readStdin();
  }
  try {
    return await fs.readFile(source, 'utf-8');
  } catch (error) {
    throw new HandledError(`Cannot read ${source}`, 'cli.input', error);
  }
}

const partSchema = z.discriminatedUnion('type', [
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

const turnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string(), z.null(), z.array(partSchema)]),
  name: z.string().optional(),
});

const conversationSchema = z.union([z.array(turnSchema), z.object({ turns: z.array(turnSchema) })]);

/**
 * A conversation file holds either an array of turns or `{ "turns": [...] }`.
 * Image parts carry their bytes base64-encoded in `data`.
 */
export function parseConversation(text: string, source = 'conversation'): ConversationTurn[] {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new HandledError(`${source} is not valid JSON`, 'cli.input', error);
  }

  const result = conversationSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new HandledError(`${source} is not a conversation${where}: ${issue?.message ?? 'invalid shape'}`, 'cli.input');
  }
  return Array.isArray(result.data) ? result.data : result.data.turns;
}

export async function loadConversation(source: string): Promise<ConversationTurn[]> {
  return parseConversation(await readInput(source), source === '-' ? 'stdin' : source);
}
