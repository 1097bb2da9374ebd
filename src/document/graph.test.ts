import { describe, it, expect } from '@jest/globals';
import { buildGraphSvg, graphPlaceholder, normalizeExpression, plotRange, sampleFunction, ticksFor } from './graph.js';
import type { FunctionGraphBlock } from './types.js';

const block: FunctionGraphBlock = {
  type: 'function_graph',
  expression: 'x^2',
  xMin: 0,
  xMax: 2,
  title: 'Growth & decay',
  width: 150,
  height: 90,
  lineColor: 'FF0000',
  lineWidth: 2,
  showGrid: false,
  alignment: 'center',
};

describe('normalizeExpression', () => {
  it('drops a leading assignment', () => {
    expect(normalizeExpression('y = sin(x)')).toBe('sin(x)');
    expect(normalizeExpression('f(x)=x^2 + 1')).toBe('x^2 + 1');
    expect(normalizeExpression(' cos(x) ')).toBe('cos(x)');
  });
});

describe('sampleFunction', () => {
  it('samples evenly across the range', () => {
    expect(sampleFunction('y = x^2', 0, 2, 3)).toEqual([
      [
        { x: 0, y: 0 },
        { x: 1, y: 1 },
        { x: 2, y: 4 },
      ],
    ]);
  });

  it('splits the curve where the function is undefined', () => {
    // sqrt of a negative number is complex at x = 0
    const segments = sampleFunction('sqrt(x^2 - 1)', -2, 2, 5);
    expect(segments.map(segment => segment.map(point => point.x))).toEqual([
      [-2, -1],
      [1, 2],
    ]);
  });

  it('rejects an empty function or range', () => {
    expect(() => sampleFunction('', 0, 1)).toThrow('Graph has no function');
    expect(() => sampleFunction('x', 1, 1)).toThrow('Invalid range [1, 1]');
  });

  it('rejects a function with no finite values', () => {
    expect(() => sampleFunction('sqrt(x)', -2, -1, 5)).toThrow('"sqrt(x)" has no finite values on [-2, -1]');
  });
});

describe('buildGraphSvg', () => {
  const svg = buildGraphSvg(block, sampleFunction(block.expression, block.xMin, block.xMax, 3));

  it('sizes the drawing at four pixels per millimetre', () => {
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="600" height="360"')).toBe(true);
  });

  it('draws the curve in the line color and escapes the title', () => {
    expect(svg).toContain('stroke="#FF0000" stroke-width="2"');
    expect(svg).toContain('>Growth &amp; decay</text>');
  });

  it('leaves out grid lines when the grid is off', () => {
    expect(svg).not.toContain('stroke="#DDDDDD"');
    const withGrid = buildGraphSvg({ ...block, showGrid: true }, sampleFunction('x', 0, 2, 3));
    expect(withGrid).toContain('stroke="#DDDDDD"');
  });
});

describe('plotRange', () => {
  it('keeps a range wide enough to label', () => {
    expect(plotRange(0, 4)).toEqual({ min: 0, max: 4 });
  });

  it('widens flat and nearly flat ranges around their centre', () => {
    expect(plotRange(3, 3)).toEqual({ min: 2, max: 4 });
    const range = plotRange(0.9999999999999998, 1.0000000000000002);
    expect(range.min).toBeCloseTo(0, 12);
    expect(range.max).toBeCloseTo(2, 12);
  });
});

describe('ticksFor', () => {
  it('steps through round values', () => {
    expect(ticksFor(0, 2)).toEqual([0, 0.5, 1, 1.5, 2]);
  });

  it('stops on spans too small to step through', () => {
    expect(ticksFor(0, 0)).toEqual([]);
    expect(ticksFor(1, 1.0000000000000004).length).toBeLessThanOrEqual(50);
  });
});

describe('constant functions', () => {
  it('plots a curve whose samples differ only by rounding', () => {
    const identity = { ...block, expression: 'sin(x)^2 + cos(x)^2', xMin: -10, xMax: 10 };
    const segments = sampleFunction(identity.expression, identity.xMin, identity.xMax);
    const svg = buildGraphSvg(identity, segments);

    expect(svg.endsWith('</svg>')).toBe(true);
    expect(svg).toContain('text-anchor="end" fill="#333333">0.5</text>');
  });
});

describe('graphPlaceholder', () => {
  it('describes the function and range', () => {
    expect(graphPlaceholder({ expression: 'y = sin(x)', xMin: -3.14, xMax: 3.14 })).toBe(
      'Graph: y = sin(x), x in [-3.14, 3.14]'
    );
  });
});
