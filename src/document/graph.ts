// Function graphs: sample with mathjs, draw an SVG plot, rasterize

import { compile } from 'mathjs';
import { escapeXml, mmToPixels, svgToPng, type RasterImage } from './rasterize.js';
import type { FunctionGraphBlock } from './types.js';

export const GRAPH_SAMPLES = 400;

export interface Point {
  x: number;
  y: number;
}

/** Drop a leading `y =` or `f(x) =` */
export function normalizeExpression(expression: string): string {
  return expression.trim().replace(/^(?:y|f\s*\(\s*x\s*\))\s*=\s*/i, '');
}

/**
 * Evaluate `expression` of `x` across the range. Non-finite values split the
 * curve into separate segments.
 */
export function sampleFunction(
  expression: string,
  xMin: number,
  xMax: number,
  samples = GRAPH_SAMPLES
): Point[][] {
  const source = normalizeExpression(expression);
  if (!source) {
    throw new Error('Graph has no function');
  }
  if (!(xMin < xMax)) {
    throw new Error(`Invalid range [${xMin}, ${xMax}]`);
  }

  const code = compile(source);
  const segments: Point[][] = [];
  let current: Point[] = [];

  for (let i = 0; i < samples; i++) {
    const x = xMin + ((xMax - xMin) * i) / (samples - 1);
    const value: unknown = code.evaluate({ x });
    if (typeof value === 'number' && Number.isFinite(value)) {
      current.push({ x, y: value });
    } else if (current.length > 0) {
      segments.push(current);
      current = [];
    }
  }
  if (current.length > 0) segments.push(current);

  if (segments.length === 0) {
    throw new Error(`"${source}" has no finite values on [${xMin}, ${xMax}]`);
  }
  return segments;
}

/** Round numbers for tick labels */
function niceStep(span: number, ticks: number): number {
  const raw = span / ticks;
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  const normalized = raw / magnitude;
  const factor = normalized < 1.5 ? 1 : normalized < 3 ? 2 : normalized < 7 ? 5 : 10;
  return factor * magnitude;
}

const MAX_TICKS = 50;

export function ticksFor(min: number, max: number, count = 5): number[] {
  const step = niceStep(max - min, count);
  const ticks: number[] = [];
  if (!(step > 0) || !Number.isFinite(step)) return ticks;
  for (let v = Math.ceil(min / step) * step; v <= max + step * 1e-9 && ticks.length < MAX_TICKS; v += step) {
    ticks.push(Number(v.toPrecision(12)));
    if (v + step === v) break;
  }
  return ticks;
}

/** Widen a range too narrow to label to one unit either side of its centre */
export function plotRange(min: number, max: number): { min: number; max: number } {
  if (max - min < 1e-9 * Math.max(1, Math.abs(max))) {
    const centre = (min + max) / 2;
    return { min: centre - 1, max: centre + 1 };
  }
  return { min, max };
}

function formatTick(value: number): string {
  return Math.abs(value) >= 1e4 || (value !== 0 && Math.abs(value) < 1e-3)
    ? value.toExponential(1)
    : String(Number(value.toFixed(3)));
}

const PX_PER_MM = 4;

export function buildGraphSvg(block: FunctionGraphBlock, segments: Point[][]): string {
  const width = Math.round(block.width * PX_PER_MM);
  const height = Math.round(block.height * PX_PER_MM);
  const margin = { left: 56, right: 16, top: block.title ? 32 : 16, bottom: block.xLabel ? 44 : 28 };
  const plotW = Math.max(1, width - margin.left - margin.right);
  const plotH = Math.max(1, height - margin.top - margin.bottom);

  let sampledMin = Infinity;
  let sampledMax = -Infinity;
  for (const point of segments.flat()) {
    sampledMin = Math.min(sampledMin, point.y);
    sampledMax = Math.max(sampledMax, point.y);
  }
  const { min: yMin, max: yMax } = plotRange(sampledMin, sampledMax);

  const sx = (x: number) => margin.left + ((x - block.xMin) / (block.xMax - block.xMin)) * plotW;
  const sy = (y: number) => margin.top + plotH - ((y - yMin) / (yMax - yMin)) * plotH;

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect x="0" y="0" width="${width}" height="${height}" fill="#FFFFFF"/>`,
  ];

  const xTicks = ticksFor(block.xMin, block.xMax);
  const yTicks = ticksFor(yMin, yMax);

  if (block.showGrid) {
    for (const t of xTicks) {
      parts.push(`<line x1="${sx(t)}" y1="${margin.top}" x2="${sx(t)}" y2="${margin.top + plotH}" stroke="#DDDDDD" stroke-width="1"/>`);
    }
    for (const t of yTicks) {
      parts.push(`<line x1="${margin.left}" y1="${sy(t)}" x2="${margin.left + plotW}" y2="${sy(t)}" stroke="#DDDDDD" stroke-width="1"/>`);
    }
  }

  parts.push(
    `<rect x="${margin.left}" y="${margin.top}" width="${plotW}" height="${plotH}" fill="none" stroke="#333333" stroke-width="1"/>`
  );

  for (const t of xTicks) {
    parts.push(
      `<text x="${sx(t)}" y="${margin.top + plotH + 16}" font-size="11" text-anchor="middle" fill="#333333">${formatTick(t)}</text>`
    );
  }
  for (const t of yTicks) {
    parts.push(
      `<text x="${margin.left - 6}" y="${sy(t) + 4}" font-size="11" text-anchor="end" fill="#333333">${formatTick(t)}</text>`
    );
  }

  for (const segment of segments) {
    const points = segment.map(p => `${sx(p.x).toFixed(2)},${sy(p.y).toFixed(2)}`).join(' ');
    parts.push(
      `<polyline points="${points}" fill="none" stroke="#${block.lineColor}" stroke-width="${block.lineWidth}" stroke-linejoin="round"/>`
    );
  }

  if (block.title) {
    parts.push(
      `<text x="${width / 2}" y="20" font-size="14" font-weight="bold" text-anchor="middle" fill="#000000">${escapeXml(block.title)}</text>`
    );
  }
  if (block.xLabel) {
    parts.push(
      `<text x="${margin.left + plotW / 2}" y="${height - 10}" font-size="12" text-anchor="middle" fill="#000000">${escapeXml(block.xLabel)}</text>`
    );
  }
  if (block.yLabel) {
    const cy = margin.top + plotH / 2;
    parts.push(
      `<text x="14" y="${cy}" font-size="12" text-anchor="middle" fill="#000000" transform="rotate(-90 14 ${cy})">${escapeXml(block.yLabel)}</text>`
    );
  }

  parts.push('</svg>');
  return parts.join('\n');
}

export interface GraphRasterizer {
  rasterize(block: FunctionGraphBlock): Promise<RasterImage>;
}

export class SvgGraphRasterizer implements GraphRasterizer {
  async rasterize(block: FunctionGraphBlock): Promise<RasterImage> {
    const segments = sampleFunction(block.expression, block.xMin, block.xMax);
    return svgToPng(buildGraphSvg(block, segments), mmToPixels(block.width));
  }
}

export function graphPlaceholder(block: Pick<FunctionGraphBlock, 'expression' | 'xMin' | 'xMax'>): string {
  return `Graph: y = ${normalizeExpression(block.expression)}, x in [${block.xMin}, ${block.xMax}]`;
}
