// Which document format a user asked for, and how to ask the model for it

import type { DocumentFormat } from './types.js';

interface FormatKeywords {
  format: DocumentFormat;
  patterns: RegExp[];
  phrases: string[];
  negative?: string[];
}

// Checked in order: the first format that matches wins
const FORMAT_KEYWORDS: FormatKeywords[] = [
  {
    format: 'docx',
    patterns: [/\bdocx?\b/, /\bms word\b/, /\bword (?:document|file|format)\b/, /\bin word\b/],
    phrases: ['формат docx', 'в формате word', 'в ворде', 'ворд', 'документ word', 'word документ'],
  },
  {
    format: 'pdf',
    patterns: [/\bpdf\b/, /\badobe\b/],
    phrases: ['пдф', 'в формате пдф'],
  },
  {
    format: 'xlsx',
    patterns: [/\bxlsx?\b/, /\bexcel\b/, /\bspreadsheet\b/],
    phrases: ['в экселе', 'в виде экселя', 'в формате таблицы', 'табличный формат'],
  },
  {
    format: 'rtf',
    patterns: [/\brtf\b/, /\brich text\b/],
    phrases: [],
    negative: [
      'not interested in rtf',
      "don't want rtf",
      'do not want rtf',
      'no need for rtf',
      'not rtf',
      'without rtf',
      'без rtf',
      'не rtf',
    ],
  },
];

/**
 * Pick the output format requested in free text, if any.
 * A negative RTF phrase ("not rtf", "without rtf") rules RTF out.
 */
export function detectRequestedFormat(text: string | null | undefined): DocumentFormat | undefined {
  const message = (text ?? '').toLowerCase();
  if (!message.trim()) return undefined;

  for (const entry of FORMAT_KEYWORDS) {
    if (entry.negative?.some(phrase => message.includes(phrase))) continue;
    if (entry.patterns.some(pattern => pattern.test(message)) || entry.phrases.some(p => message.includes(p))) {
      return entry.format;
    }
  }
  return undefined;
}

const BLOCK_SCHEMA = `"blocks": [
  {"type": "heading", "level": 1, "text": "string", "font_name": "string", "font_size": 16, "color": "#000000", "bold": true, "italic": false},
  {"type": "paragraph", "text": "string", "font_name": "string", "font_size": 12, "left_indent": 0, "right_indent": 0, "space_after": 12, "alignment": "left", "color": "#000000", "bold": false, "italic": false, "underline": false},
  {"type": "list", "ordered": false, "items": ["item 1", "item 2"], "font_size": 12, "left_indent": 0, "space_after": 12},
  {"type": "table", "headers": ["column 1", "column 2"], "rows": [["value 1", "value 2"]],
   "params": {"header_font_size": 10, "header_bg_color": "#D3D3D3", "header_alignment": "center", "body_font_size": 9, "body_alignment": "left", "grid_width": 0.5, "grid_color": "#000000"},
   "table_properties": {"border": true, "cell_margin": 5, "widths": [1, 2]},
   "cell_properties": [{"row": 1, "col": 0, "bg_color": "#FFFFFF", "text_color": "#000000", "text_wrap": true, "vertical_alignment": "middle", "horizontal_alignment": "left"}],
   "row_properties": [{"row": 1, "bg_color": "#F2F2F2", "text_color": "#000000"}]},
  {"type": "math", "formula": "TeX formula", "caption": "string", "math_font_size": 12, "caption_font_size": 10},
  {"type": "function_graph", "function": "sin(x)", "x_min": -10, "x_max": 10, "title": "string", "xlabel": "x", "ylabel": "y", "width": 150, "height": 90, "line_color": "#1F77B4", "line_width": 2, "show_grid": true, "caption": "string"},
  {"type": "toc", "title": "Contents", "levels": 3, "indent": 12, "leader_dots": true, "include_pages": false}
]`;

const FORMAT_NOTES: Record<DocumentFormat, string> = {
  docx: 'The answer will be delivered as a Word document.',
  pdf: 'The answer will be delivered as a PDF. Header and footer text may use {page} for the page number.',
  xlsx: 'The answer will be delivered as an Excel workbook. Put tabular data in table blocks.',
  rtf: 'The answer will be delivered as an RTF document. Graphs are written as text.',
};

/**
 * Instructions appended to a user message so the model answers with a
 * document the pipeline can render
 */
export function documentInstructions(format: DocumentFormat): string {
  return [
    FORMAT_NOTES[format],
    'Reply with ONLY valid JSON, no explanations and no code fences, following this schema:',
    '{',
    '"meta": {"title": "string", "hide_title": false, "page_size": "A4"},',
    '"header": {"content": "string", "font_size": 9, "alignment": "center"},',
    '"footer": {"content": "Page {page}", "font_size": 9, "alignment": "center"},',
    BLOCK_SCHEMA,
    '}',
  ].join('\n');
}
