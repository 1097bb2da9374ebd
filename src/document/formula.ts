// Math blocks: formula image with a text fallback

import { mathjax } from 'mathjax-full/js/mathjax.js';
import { TeX } from 'mathjax-full/js/input/tex.js';
import { SVG } from 'mathjax-full/js/output/svg.js';
import { liteAdaptor, LiteAdaptor } from 'mathjax-full/js/adaptors/liteAdaptor.js';
import { RegisterHTMLHandler } from 'mathjax-full/js/handlers/html.js';
import { AllPackages } from 'mathjax-full/js/input/tex/AllPackages.js';
import { log } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { fitWithin, mmToPixels, svgToPng, type PlacedImage, type RasterImage } from './rasterize.js';
import type { MathBlock } from './types.js';

export const FORMULA_LABEL = 'Formula: ';

const BASE_WIDTH_MM = 60;
const MAX_WIDTH_FACTOR = 3;
const MIN_HEIGHT_MM = 15;

export interface CanvasSize {
  widthMm: number;
  heightMm: number;
}

/**
 * Canvas for a formula image: 60mm scaled by `min(length / 10, 3)`, height a
 * fifth of the width but at least 15mm
 */
export function formulaCanvasSize(formula: string): CanvasSize {
  const widthMm = BASE_WIDTH_MM * Math.min(formula.length / 10, MAX_WIDTH_FACTOR);
  return { widthMm, heightMm: Math.max(0.2 * widthMm, MIN_HEIGHT_MM) };
}

export interface FormulaRenderOptions {
  fontSize: number;
  color?: string;
}

export interface FormulaRasterizer {
  rasterize(formula: string, canvas: CanvasSize, options: FormulaRenderOptions): Promise<RasterImage>;
}

// Size of one `ex` in px for a 12pt formula
const EX_PX_AT_12PT = 8;

/**
 * Typesets TeX with MathJax and rasterizes the SVG
 */
export class MathJaxRasterizer implements FormulaRasterizer {
  private adaptor: LiteAdaptor | null = null;
  private document: ReturnType<typeof mathjax.document> | null = null;

  private ensureDocument() {
    if (this.adaptor && this.document) {
      return { adaptor: this.adaptor, document: this.document };
    }
    const adaptor = liteAdaptor();
    RegisterHTMLHandler(adaptor);
    const tex = new TeX({
      packages: AllPackages.filter(name => name !== 'noerrors' && name !== 'noundefined'),
      formatError: (_jax: unknown, error: Error) => {
        throw error;
      },
    });
    const svg = new SVG({ fontCache: 'none' });
    const document = mathjax.document('', { InputJax: tex, OutputJax: svg });
    this.adaptor = adaptor;
    this.document = document;
    return { adaptor, document };
  }

  toSvg(formula: string, options: FormulaRenderOptions): string {
    const { adaptor, document } = this.ensureDocument();
    const node = document.convert(formula.replace(/^\$+|\$+$/g, '').trim(), { display: true });
    const exPx = (EX_PX_AT_12PT * options.fontSize) / 12;
    return adaptor
      .innerHTML(node)
      .replace(/(width|height)="([\d.]+)ex"/g, (_match, attr: string, value: string) => {
        return `${attr}="${(Number(value) * exPx).toFixed(2)}"`;
      })
      .replace(/currentColor/g, `#${options.color ?? '000000'}`);
  }

  async rasterize(formula: string, canvas: CanvasSize, options: FormulaRenderOptions): Promise<RasterImage> {
    return svgToPng(this.toSvg(formula, options), mmToPixels(canvas.widthMm));
  }
}

export type FormulaOutcome =
  | { kind: 'image'; image: PlacedImage; caption?: string }
  | { kind: 'text'; lines: string[]; reason: string };

export function formulaFallbackLines(block: Pick<MathBlock, 'formula' | 'caption'>): string[] {
  const lines = [`${FORMULA_LABEL}${block.formula}`];
  if (block.caption) {
    lines.push(`(${block.caption})`);
  }
  return lines;
}

/**
 * Render the formula as an image; on any failure return the labelled formula
 * text (and the caption in parentheses) instead
 */
export async function renderFormulaOrFallback(
  block: MathBlock,
  rasterizer: FormulaRasterizer
): Promise<FormulaOutcome> {
  const formula = block.formula.trim();
  if (!formula) {
    return { kind: 'text', lines: formulaFallbackLines(block), reason: 'empty formula' };
  }

  const canvas = formulaCanvasSize(formula);
  try {
    const raster = await rasterizer.rasterize(formula, canvas, {
      fontSize: block.mathFontSize,
      color: block.style.color,
    });
    const image = fitWithin(raster, canvas.widthMm, canvas.heightMm);
    return block.caption ? { kind: 'image', image, caption: block.caption } : { kind: 'image', image };
  } catch (error) {
    const reason = ErrorHandler.getErrorMessage(error);
    log.debug(`Formula image failed, using text: ${reason}`);
    return { kind: 'text', lines: formulaFallbackLines(block), reason };
  }
}
