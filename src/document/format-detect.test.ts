import { describe, it, expect } from '@jest/globals';
import { detectRequestedFormat, documentInstructions } from './format-detect.js';

describe('detectRequestedFormat', () => {
  it('recognizes each format in English', () => {
    expect(detectRequestedFormat('Please make a Word document with the results')).toBe('docx');
    expect(detectRequestedFormat('Give me a PDF')).toBe('pdf');
    expect(detectRequestedFormat('export the numbers to Excel')).toBe('xlsx');
    expect(detectRequestedFormat('I need an RTF file')).toBe('rtf');
  });

  it('recognizes Russian phrasing', () => {
    expect(detectRequestedFormat('сделай отчёт в экселе')).toBe('xlsx');
    expect(detectRequestedFormat('пришли пдф')).toBe('pdf');
  });

  it('prefers docx over pdf over xlsx', () => {
    expect(detectRequestedFormat('a pdf and a docx please')).toBe('docx');
    expect(detectRequestedFormat('xlsx or pdf, whichever')).toBe('pdf');
  });

  it('honours a negative rtf phrase', () => {
    expect(detectRequestedFormat('not rtf, plain text is fine')).toBeUndefined();
    expect(detectRequestedFormat('without rtf, send a pdf')).toBe('pdf');
  });

  it('returns undefined when no format is asked for', () => {
    expect(detectRequestedFormat('What is the capital of France?')).toBeUndefined();
    expect(detectRequestedFormat('')).toBeUndefined();
    expect(detectRequestedFormat(undefined)).toBeUndefined();
  });
});

describe('documentInstructions', () => {
  it('leads with the format note and carries the schema', () => {
    const text = documentInstructions('pdf');
    expect(text.split('\n')[0]).toBe(
      'The answer will be delivered as a PDF. Header and footer text may use {page} for the page number.'
    );
    expect(text).toContain('"blocks": [');
    expect(text).toContain('{"type": "toc"');
  });
});
