// Style helpers shared by every backend

import type { Alignment, StyleSpec, VerticalAlignment } from './types.js';

const NAMED_COLORS: Record<string, string> = {
  black: '000000',
  white: 'FFFFFF',
  red: 'FF0000',
  green: '008000',
  blue: '0000FF',
  yellow: 'FFFF00',
  orange: 'FFA500',
  purple: '800080',
  gray: '808080',
  grey: '808080',
  lightgray: 'D3D3D3',
  lightgrey: 'D3D3D3',
  darkgray: 'A9A9A9',
  darkgrey: 'A9A9A9',
  navy: '000080',
  teal: '008080',
  maroon: '800000',
  silver: 'C0C0C0',
};

/**
 * Normalize a color to six uppercase hex digits without `#`.
 * Accepts `#RRGGBB`, `RRGGBB`, `#RGB` and a few CSS names; anything else
 * yields undefined.
 */
export function normalizeColor(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  const named = NAMED_COLORS[trimmed.toLowerCase()];
  if (named) return named;

  const hex = trimmed.startsWith('#') ? trimmed.slice(1) : trimmed;
  if (/^[0-9a-fA-F]{6}$/.test(hex)) {
    return hex.toUpperCase();
  }
  if (trimmed.startsWith('#') && /^[0-9a-fA-F]{3}$/.test(hex)) {
    return hex
      .split('')
      .map(digit => digit + digit)
      .join('')
      .toUpperCase();
  }
  return undefined;
}

export function parseAlignment(value: unknown): Alignment | undefined {
  if (typeof value !== 'string') return undefined;
  switch (value.trim().toLowerCase()) {
    case 'left':
      return 'left';
    case 'center':
    case 'centre':
      return 'center';
    case 'right':
      return 'right';
    case 'justify':
    case 'justified':
      return 'justify';
    default:
      return undefined;
  }
}

export function parseVerticalAlignment(value: unknown): VerticalAlignment | undefined {
  if (typeof value !== 'string') return undefined;
  switch (value.trim().toLowerCase()) {
    case 'top':
      return 'top';
    case 'middle':
    case 'center':
    case 'vcenter':
      return 'middle';
    case 'bottom':
      return 'bottom';
    default:
      return undefined;
  }
}

export interface SanitizedText {
  text: string;
  /** The whole text was wrapped in `**...**` */
  bold: boolean;
  /** The whole text was wrapped in `*...*` or `_..._` */
  italic: boolean;
}

/**
 * Strip markup tags and markdown emphasis so backends can apply the
 * equivalent styling themselves.
 */
export function sanitizeText(value: unknown): SanitizedText {
  const raw = value === null || value === undefined ? '' : String(value);
  let text = raw.trim();

  const bold = /^\*\*[^*]+\*\*$/.test(text);
  const italic = !bold && (/^\*[^*]+\*$/.test(text) || /^_[^_]+_$/.test(text));

  text = text.replace(/<[^>]+>/g, '');
  text = text.replace(/\*\*(.*?)\*\*/g, '$1');
  text = text.replace(/(?<!\*)\*([^*]+?)\*(?!\*)/g, '$1');
  text = text.replace(/(?<![\w_])_([^_]+?)_(?![\w_])/g, '$1');

  return { text: text.trim(), bold, italic };
}

export const STYLE_SPEC_KEYS: readonly (keyof StyleSpec)[] = [
  'fontName',
  'fontSize',
  'color',
  'backgroundColor',
  'bold',
  'italic',
  'underline',
  'alignment',
];

/**
 * Later styles win for every one of `keys` they define
 */
export function mergeStyles<T extends object>(
  keys: readonly (keyof T)[],
  ...styles: Array<Partial<T> | undefined>
): Partial<T> {
  const merged: Partial<T> = {};
  for (const style of styles) {
    if (!style) continue;
    for (const key of keys) {
      const value = style[key];
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Sanitize text and fold its emphasis into the style when the block does
 * not say otherwise
 */
export function styledText(value: unknown, style: StyleSpec): { text: string; style: StyleSpec } {
  const sanitized = sanitizeText(value);
  return {
    text: sanitized.text,
    style: {
      ...style,
      bold: style.bold ?? (sanitized.bold || undefined),
      italic: style.italic ?? (sanitized.italic || undefined),
    },
  };
}

export function listMarker(ordered: boolean, index: number): string {
  return ordered ? `${index + 1}.` : '•';
}

export const PAGE_NUMBER_PATTERN = /\{page\}|\{pageNumber\}|\{current_page\}/g;

/**
 * Split header/footer text around page-number placeholders
 */
export function splitPageNumberTokens(text: string): Array<{ kind: 'text'; value: string } | { kind: 'page' }> {
  const parts: Array<{ kind: 'text'; value: string } | { kind: 'page' }> = [];
  let last = 0;
  for (const match of text.matchAll(PAGE_NUMBER_PATTERN)) {
    const start = match.index ?? 0;
    if (start > last) parts.push({ kind: 'text', value: text.slice(last, start) });
    parts.push({ kind: 'page' });
    last = start + match[0].length;
  }
  if (last < text.length) parts.push({ kind: 'text', value: text.slice(last) });
  return parts;
}

export function replacePageNumber(text: string, page: number): string {
  return text.replace(PAGE_NUMBER_PATTERN, String(page));
}

export const POINTS_PER_MM = 72 / 25.4;

export function mmToPoints(mm: number): number {
  return mm * POINTS_PER_MM;
}
