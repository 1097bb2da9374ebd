// SVG to PNG through resvg

import { Resvg } from '@resvg/resvg-js';

export interface RasterImage {
  /** PNG bytes */
  data: Buffer;
  /** Pixel size of the PNG */
  width: number;
  height: number;
}

/** Millimetres on the page an image should occupy */
export interface PlacedImage {
  data: Buffer;
  widthMm: number;
  heightMm: number;
}

export const RASTER_DPI = 200;

export function mmToPixels(mm: number, dpi = RASTER_DPI): number {
  return Math.max(1, Math.round((mm / 25.4) * dpi));
}

export function svgToPng(svg: string, widthPx: number): RasterImage {
  const resvg = new Resvg(svg, {
    fitTo: { mode: 'width', value: Math.max(1, Math.round(widthPx)) },
    background: 'white',
    font: { loadSystemFonts: true, defaultFontFamily: 'DejaVu Sans' },
  });
  const rendered = resvg.render();
  return { data: rendered.asPng(), width: rendered.width, height: rendered.height };
}

/**
 * Largest size with the image's aspect ratio that fits the box
 */
export function fitWithin(image: RasterImage, boxWidthMm: number, boxHeightMm: number): PlacedImage {
  if (image.width <= 0 || image.height <= 0) {
    return { data: image.data, widthMm: boxWidthMm, heightMm: boxHeightMm };
  }
  const scale = Math.min(boxWidthMm / image.width, boxHeightMm / image.height);
  return { data: image.data, widthMm: image.width * scale, heightMm: image.height * scale };
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
