// Conversation turn type definitions

export type TurnRole = 'system' | 'user' | 'assistant';

export interface TextPart {
  type: 'text';
  text: string;
}

/**
 * Inline binary attachment (an uploaded photo for the edit mode, for example).
 * Either the raw bytes or a reference to where they live.
 */
export interface BinaryPart {
  type: 'image';
  mimeType?: string;
  data?: Uint8Array;
  url?: string;
}

export type ContentPart = TextPart | BinaryPart;

export type TurnContent = string | ContentPart[];

export interface ConversationTurn {
  role: TurnRole;
  content: TurnContent | null;
  name?: string;
}

export type SystemTurn = ConversationTurn & { role: 'system' };
export type ExchangeTurn = ConversationTurn & { role: 'user' | 'assistant' };

/**
 * Plain text of a turn's content; binary parts contribute nothing.
 */
export function turnText(content: TurnContent | null | undefined): string {
  if (content === null || content === undefined) return '';
  if (typeof content === 'string') return content;
  return content
    .map(part => (part.type === 'text' ? part.text : ''))
    .join('');
}
