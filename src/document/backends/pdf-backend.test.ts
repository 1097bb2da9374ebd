import { describe, it, expect } from '@jest/globals';
import { PdfBackend, bundledFontPath, normalizeFontName } from './pdf-backend.js';
import type { ImageServices } from './backend.js';
import type { DocumentModel } from '../types.js';

const head = (data: Buffer | string) => (typeof data === 'string' ? data : data.toString('latin1')).slice(0, 5);

const noImages: ImageServices = {
  formula: {
    rasterize: async () => {
      throw new Error('no TeX engine');
    },
  },
  graph: {
    rasterize: async () => {
      throw new Error('no plotter');
    },
  },
};

describe('normalizeFontName', () => {
  it('maps every Times spelling onto the default font', () => {
    for (const name of ['Times New Roman', 'times new roman', 'TIMES-NEW-ROMAN', 'times_new_roman', 'Times', 'New Roman']) {
      expect(normalizeFontName(name)).toEqual({ font: 'default', substituted: true });
    }
  });

  it('keeps the families it can draw', () => {
    expect(normalizeFontName('Helvetica')).toEqual({ font: 'helvetica', substituted: false });
    expect(normalizeFontName('Courier New')).toEqual({ font: 'courier', substituted: false });
    expect(normalizeFontName('DejaVu Sans')).toEqual({ font: 'default', substituted: false });
  });

  it('uses the default without complaint when no font is asked for', () => {
    expect(normalizeFontName(undefined)).toEqual({ font: 'default', substituted: false });
    expect(normalizeFontName('  ')).toEqual({ font: 'default', substituted: false });
  });

  it('substitutes fonts it does not carry', () => {
    expect(normalizeFontName('Comic Sans MS')).toEqual({ font: 'default', substituted: true });
  });
});

describe('PdfBackend', () => {
  const document: DocumentModel = {
    meta: { title: 'Report', hideTitle: false, pageSize: 'A4' },
    header: { text: 'Internal', style: {} },
    blocks: [
      { type: 'toc', title: 'Contents', levels: 3, style: {}, indent: 12, leaderDots: true, includePages: true },
      { type: 'heading', level: 1, text: 'Summary', style: {} },
      { type: 'paragraph', text: 'First', style: { fontName: 'Times New Roman' }, spacing: {} },
      { type: 'paragraph', text: 'Second', style: { fontName: 'Times New Roman' }, spacing: {} },
      { type: 'list', ordered: true, items: ['one', 'two'], style: {}, spacing: {} },
      {
        type: 'table',
        headers: ['Name', 'Value'],
        rows: [['alpha', '1'], ['beta']],
        header: {},
        body: {},
        grid: { width: 0.5, color: '000000' },
        cellOverrides: [],
        rowOverrides: [],
      },
      { type: 'math', formula: 'E = mc^2', style: { italic: true }, mathFontSize: 12, captionFontSize: 10 },
    ],
  };

  it('produces a PDF file', async () => {
    const artifact = await new PdfBackend({ images: noImages }).render(document);
    expect(Buffer.isBuffer(artifact.data)).toBe(true);
    expect(head(artifact.data)).toBe('%PDF-');
    expect(artifact.filename).toBe('Report.pdf');
    expect(artifact.failures).toEqual([]);
  });

  it('reports a substituted font once', async () => {
    const artifact = await new PdfBackend({ images: noImages }).render(document);
    expect(artifact.warnings).toEqual([
      {
        code: 'font-substituted',
        message: 'Font "Times New Roman" is not available for PDF, using the default font',
      },
    ]);
  });

  it('records a failed graph and keeps going', async () => {
    const artifact = await new PdfBackend({ images: noImages }).render({
      meta: { hideTitle: false, pageSize: 'LETTER' },
      blocks: [
        {
          type: 'function_graph',
          expression: 'x^2',
          xMin: 0,
          xMax: 1,
          width: 150,
          height: 90,
          lineColor: '1F77B4',
          lineWidth: 2,
          showGrid: true,
          alignment: 'center',
        },
        { type: 'paragraph', text: 'After', style: {}, spacing: {} },
      ],
    });
    expect(artifact.failures).toEqual([
      { index: 0, type: 'function_graph', message: 'pdf: function_graph block 0 failed: no plotter' },
    ]);
    expect(head(artifact.data)).toBe('%PDF-');
  });
});

describe('default font', () => {
  const cyrillic: DocumentModel = {
    meta: { hideTitle: false, pageSize: 'A4' },
    blocks: [{ type: 'paragraph', text: 'Привет, мир', style: {}, spacing: {} }],
  };

  it('ships DejaVu Sans with the package', () => {
    expect(bundledFontPath('DejaVuSans.ttf')).toMatch(/dejavu-fonts-ttf[\\/]ttf[\\/]DejaVuSans\.ttf$/);
    expect(bundledFontPath('NoSuchFont.ttf')).toBeUndefined();
  });

  it('draws Cyrillic text with the bundled font without warnings', async () => {
    const artifact = await new PdfBackend({ images: noImages }).render(cyrillic);
    expect(artifact.warnings).toEqual([]);
    expect(artifact.failures).toEqual([]);
  });

  it('warns when the configured font file is missing', async () => {
    const artifact = await new PdfBackend({ images: noImages, fontPath: '/missing/Body.ttf' }).render(cyrillic);
    expect(artifact.warnings).toEqual([
      {
        code: 'font-substituted',
        message: 'Font file "/missing/Body.ttf" not found, using the bundled DejaVuSans.ttf',
      },
    ]);
    expect(head(artifact.data)).toBe('%PDF-');
  });
});
