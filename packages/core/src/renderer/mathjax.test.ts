import { beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import sharp from 'sharp';
import { LocalRenderer } from './mathjax';
import type { RenderResult } from './base';
import { composeSolution } from '../solution/composer';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function imageBytes(result: RenderResult): Uint8Array {
  if (result.kind !== 'image') {
    throw new Error(`expected an image, got ${result.kind}`);
  }
  return result.bytes;
}

describe('LocalRenderer', () => {
  let renderer: LocalRenderer;

  beforeAll(() => {
    renderer = new LocalRenderer();
  });

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('renders an expression to PNG bytes', async () => {
    const result = await renderer.render({ expression: 'x^2+y^2=z^2', dpi: 150, color: 'black' });

    expect(result.kind).toBe('image');
    const bytes = imageBytes(result);
    expect(Array.from(bytes.subarray(0, 8))).toEqual(PNG_SIGNATURE);
  });

  it('scales the image with the requested dpi', async () => {
    const low = imageBytes(await renderer.render({ expression: '\\frac{a}{b}', dpi: 150, color: 'black' }));
    const high = imageBytes(await renderer.render({ expression: '\\frac{a}{b}', dpi: 300, color: 'black' }));

    const lowWidth = (await sharp(low).metadata()).width ?? 0;
    const highWidth = (await sharp(high).metadata()).width ?? 0;

    expect(lowWidth).toBeGreaterThan(0);
    expect(highWidth / lowWidth).toBeGreaterThan(1.8);
    expect(highWidth / lowWidth).toBeLessThan(2.2);
  });

  it('renders a composed solution layout', async () => {
    const expression = composeSolution(['2x+4=10', '2x=6'], 'x=3');

    const result = await renderer.render({ expression, dpi: 200, color: 'black', background: 'white' });

    expect(result.kind).toBe('image');
  });

  it('returns an error result for an undefined control sequence', async () => {
    const result = await renderer.render({ expression: '\\notamacro{x}', dpi: 150, color: 'black' });

    expect(result.kind).toBe('error');
    expect(result).toMatchObject({ message: expect.stringContaining('Undefined control sequence') });
  });

  it('returns an error result for unbalanced braces', async () => {
    const result = await renderer.render({ expression: '\\frac{1}{', dpi: 150, color: 'black' });

    expect(result.kind).toBe('error');
  });

  it('returns an error result for a background the rasteriser cannot parse', async () => {
    const result = await renderer.render({
      expression: 'x',
      dpi: 150,
      color: 'black',
      background: 'not-a-colour',
    });

    expect(result.kind).toBe('error');
  });

  describe('toSVG', () => {
    it('recolours MathJax output and sizes it in pixels', () => {
      const svg = renderer.toSVG('x+1', 'red');

      expect(svg.startsWith('<svg')).toBe(true);
      expect(svg).toContain('fill="red"');
      expect(svg).not.toContain('currentColor');
      expect(svg).not.toMatch(/(width|height)="[0-9.]+ex"/);
    });
  });

  describe('validate', () => {
    it('accepts well-formed input', () => {
      expect(renderer.validate('\\sqrt{x^2+1}')).toEqual({ valid: true, errors: [] });
    });

    it('reports TeX errors', () => {
      const result = renderer.validate('\\notamacro');

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Undefined control sequence \\notamacro']);
    });
  });
});
