// Plain-text stand-ins for blocks a backend could not render

import { formulaFallbackLines } from './formula.js';
import { graphPlaceholder } from './graph.js';
import { listMarker, sanitizeText } from './style.js';
import { columnCount, normalizeRow } from './table-layout.js';
import type { Block, DocumentModel } from './types.js';

export interface TocEntry {
  /** Index of the heading block */
  index: number;
  level: number;
  text: string;
}

export function collectHeadings(document: DocumentModel, levels: number): TocEntry[] {
  const entries: TocEntry[] = [];
  document.blocks.forEach((block, index) => {
    if (block.type === 'heading' && block.level <= levels) {
      entries.push({ index, level: block.level, text: sanitizeText(block.text).text });
    }
  });
  return entries;
}

export function describeBlock(block: Block): string[] {
  switch (block.type) {
    case 'heading':
    case 'paragraph':
      return [sanitizeText(block.text).text];
    case 'list':
      return block.items.map((item, i) => `${listMarker(block.ordered, i)} ${sanitizeText(item).text}`);
    case 'table': {
      const columns = columnCount(block);
      const lines = block.headers.length > 0 ? [normalizeRow(block.headers, columns).join(' | ')] : [];
      for (const row of block.rows) {
        lines.push(normalizeRow(row, columns).join(' | '));
      }
      return lines;
    }
    case 'math':
      return formulaFallbackLines(block);
    case 'function_graph':
      return [graphPlaceholder(block)];
    case 'toc':
      return [block.title];
  }
}
