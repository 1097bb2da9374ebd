// Page geometry and per-block defaults

import type { HeadingLevel, PageSize } from './types.js';

export const PAGE_DIMENSIONS_MM: Record<PageSize, { width: number; height: number }> = {
  A4: { width: 210, height: 297 },
  A3: { width: 297, height: 420 },
  A5: { width: 148, height: 210 },
  LETTER: { width: 215.9, height: 279.4 },
  LEGAL: { width: 215.9, height: 355.6 },
};

export const PAGE_MARGINS_MM = { top: 20, right: 10, bottom: 20, left: 20 };

export function frameWidthMm(pageSize: PageSize): number {
  return PAGE_DIMENSIONS_MM[pageSize].width - PAGE_MARGINS_MM.left - PAGE_MARGINS_MM.right;
}

export const TITLE_FONT_SIZE = 18;
export const PARAGRAPH_FONT_SIZE = 12;
export const PARAGRAPH_SPACE_AFTER = 12;
export const HEADER_FOOTER_FONT_SIZE = 9;
export const DEFAULT_PDF_FOOTER = 'Page {page}';

export function headingFontSize(level: HeadingLevel): number {
  if (level === 1) return 16;
  if (level === 2) return 14;
  return 12;
}
