// Turning a model reply into JSON

import { FormatError } from './errors.js';

const LEADING_FENCE = /^```[\w-]*[^\S\r\n]*\r?\n?/;
const TRAILING_FENCE = /\r?\n?```\s*$/;

/**
 * Remove a surrounding markdown code fence (with or without a language tag).
 * Text without a fence is returned trimmed.
 */
export function stripCodeFences(text: string): string {
  let body = text.trim();
  if (body.startsWith('```')) {
    body = body.replace(LEADING_FENCE, '');
    body = body.replace(TRAILING_FENCE, '');
  }
  return body.trim();
}

/**
 * Parse a reply as JSON, tolerating a code fence around it.
 * Throws FormatError when nothing parseable is left.
 */
export function parseReplyJson(text: string | null | undefined): unknown {
  const body = stripCodeFences(text ?? '');
  if (!body) {
    throw new FormatError('Empty output');
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError(`Output is not valid JSON: ${reason}`, error);
  }
}
