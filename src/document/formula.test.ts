import { describe, it, expect, jest } from '@jest/globals';
import {
  MathJaxRasterizer,
  formulaCanvasSize,
  formulaFallbackLines,
  renderFormulaOrFallback,
  type FormulaRasterizer,
} from './formula.js';
import type { RasterImage } from './rasterize.js';
import type { MathBlock } from './types.js';

function math(formula: string, caption?: string): MathBlock {
  return {
    type: 'math',
    formula,
    ...(caption ? { caption } : {}),
    style: { italic: true },
    mathFontSize: 12,
    captionFontSize: 10,
  };
}

const failing: FormulaRasterizer = {
  rasterize: async () => {
    throw new Error('no TeX engine');
  },
};

describe('formulaCanvasSize', () => {
  it('scales the width with the formula length', () => {
    const size = formulaCanvasSize('E = mc^2');
    expect(size.widthMm).toBeCloseTo(48);
    expect(size.heightMm).toBe(15);
  });

  it('stops growing at three times the base width', () => {
    const size = formulaCanvasSize('x'.repeat(40));
    expect(size.widthMm).toBe(180);
    expect(size.heightMm).toBeCloseTo(36);
  });
});

describe('renderFormulaOrFallback', () => {
  it('places the rasterized image inside the canvas', async () => {
    const raster: RasterImage = { data: Buffer.from('png'), width: 200, height: 50 };
    const rasterize = jest.fn<FormulaRasterizer['rasterize']>().mockResolvedValue(raster);

    const outcome = await renderFormulaOrFallback(math('  E = mc^2 ', 'Energy'), { rasterize });

    expect(rasterize).toHaveBeenCalledWith('E = mc^2', formulaCanvasSize('E = mc^2'), { fontSize: 12, color: undefined });
    expect(outcome.kind).toBe('image');
    if (outcome.kind === 'image') {
      // scale is min(48 / 200, 15 / 50)
      expect(outcome.image.widthMm).toBeCloseTo(48);
      expect(outcome.image.heightMm).toBeCloseTo(12);
      expect(outcome.caption).toBe('Energy');
    }
  });

  it('falls back to the labelled formula when rasterizing fails', async () => {
    const outcome = await renderFormulaOrFallback(math('E = mc^2', 'Energy'), failing);
    expect(outcome).toEqual({
      kind: 'text',
      lines: ['Formula: E = mc^2', '(Energy)'],
      reason: 'no TeX engine',
    });
  });

  it('does not try to rasterize an empty formula', async () => {
    const rasterize = jest.fn<FormulaRasterizer['rasterize']>();
    const outcome = await renderFormulaOrFallback(math(''), { rasterize });
    expect(rasterize).not.toHaveBeenCalled();
    expect(outcome).toEqual({ kind: 'text', lines: ['Formula: '], reason: 'empty formula' });
  });
});

describe('formulaFallbackLines', () => {
  it('adds the caption in parentheses', () => {
    expect(formulaFallbackLines({ formula: 'a^2 + b^2 = c^2' })).toEqual(['Formula: a^2 + b^2 = c^2']);
    expect(formulaFallbackLines({ formula: 'x', caption: 'Unknown' })).toEqual(['Formula: x', '(Unknown)']);
  });
});

describe('MathJaxRasterizer', () => {
  const rasterizer = new MathJaxRasterizer();

  it('typesets TeX to SVG in the requested color', () => {
    const svg = rasterizer.toSvg('x^2', { fontSize: 12, color: 'FF0000' });
    expect(svg.startsWith('<svg')).toBe(true);
    expect(svg).toContain('#FF0000');
    expect(svg).not.toContain('currentColor');
  });

  it('throws on malformed TeX', () => {
    expect(() => rasterizer.toSvg('\\frac{1}{', { fontSize: 12 })).toThrow();
  });
});
