import { describe, it, expect } from '@jest/globals';
import {
  STYLE_SPEC_KEYS,
  listMarker,
  mergeStyles,
  normalizeColor,
  parseAlignment,
  parseVerticalAlignment,
  replacePageNumber,
  sanitizeText,
  splitPageNumberTokens,
  styledText,
} from './style.js';
import type { StyleSpec } from './types.js';

describe('normalizeColor', () => {
  it('accepts hex with or without a hash', () => {
    expect(normalizeColor('#1f77b4')).toBe('1F77B4');
    expect(normalizeColor('00ff00')).toBe('00FF00');
  });

  it('expands short hex', () => {
    expect(normalizeColor('#abc')).toBe('AABBCC');
  });

  it('knows a few names', () => {
    expect(normalizeColor('Red')).toBe('FF0000');
    expect(normalizeColor('lightgrey')).toBe('D3D3D3');
  });

  it('rejects everything else', () => {
    expect(normalizeColor('abc')).toBeUndefined();
    expect(normalizeColor('#12345')).toBeUndefined();
    expect(normalizeColor(12)).toBeUndefined();
  });
});

describe('alignment parsing', () => {
  it('maps spellings onto alignments', () => {
    expect(parseAlignment('Centre')).toBe('center');
    expect(parseAlignment('justified')).toBe('justify');
    expect(parseAlignment('middle')).toBeUndefined();
    expect(parseVerticalAlignment('vcenter')).toBe('middle');
    expect(parseVerticalAlignment('BOTTOM')).toBe('bottom');
  });
});

describe('sanitizeText', () => {
  it('turns whole-text emphasis into flags', () => {
    expect(sanitizeText('**Total**')).toEqual({ text: 'Total', bold: true, italic: false });
    expect(sanitizeText('*note*')).toEqual({ text: 'note', bold: false, italic: true });
  });

  it('strips tags and inline emphasis', () => {
    expect(sanitizeText('<b>x</b> and _y_')).toEqual({ text: 'x and y', bold: false, italic: false });
    expect(sanitizeText('a **b** c')).toEqual({ text: 'a b c', bold: false, italic: false });
  });

  it('keeps snake_case words intact', () => {
    expect(sanitizeText('use max_tokens_limit here').text).toBe('use max_tokens_limit here');
  });

  it('stringifies non-strings', () => {
    expect(sanitizeText(42).text).toBe('42');
    expect(sanitizeText(null).text).toBe('');
  });
});

describe('styledText', () => {
  it('folds emphasis into the style unless the block says otherwise', () => {
    expect(styledText('**Hi**', { fontSize: 10 })).toEqual({ text: 'Hi', style: { fontSize: 10, bold: true } });
    expect(styledText('**Hi**', { bold: false }).style.bold).toBe(false);
  });
});

describe('mergeStyles', () => {
  it('lets later styles win for the keys they define', () => {
    expect(mergeStyles<StyleSpec>(STYLE_SPEC_KEYS, { bold: true, fontSize: 10 }, undefined, { fontSize: 12 })).toEqual({
      bold: true,
      fontSize: 12,
    });
  });
});

describe('page numbers', () => {
  it('splits text around placeholders', () => {
    expect(splitPageNumberTokens('Page {page} of X')).toEqual([
      { kind: 'text', value: 'Page ' },
      { kind: 'page' },
      { kind: 'text', value: ' of X' },
    ]);
    expect(splitPageNumberTokens('{current_page}')).toEqual([{ kind: 'page' }]);
  });

  it('replaces every placeholder spelling', () => {
    expect(replacePageNumber('p{pageNumber}/{current_page}/{page}', 3)).toBe('p3/3/3');
  });
});

describe('listMarker', () => {
  it('numbers ordered items from one', () => {
    expect(listMarker(true, 0)).toBe('1.');
    expect(listMarker(false, 4)).toBe('•');
  });
});
