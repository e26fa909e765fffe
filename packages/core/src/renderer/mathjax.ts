import sharp from 'sharp';
import { mathjax } from 'mathjax-full/js/mathjax.js';
import { TeX } from 'mathjax-full/js/input/tex.js';
import { SVG } from 'mathjax-full/js/output/svg.js';
import { liteAdaptor } from 'mathjax-full/js/adaptors/liteAdaptor.js';
import { RegisterHTMLHandler } from 'mathjax-full/js/handlers/html.js';
import { AllPackages } from 'mathjax-full/js/input/tex/AllPackages.js';
import {
  PNG_MIME_TYPE,
  errorMessage,
  type ImageRenderer,
  type RenderRequest,
  type RenderResult,
} from './base';

// These packages render bad input in red instead of failing the conversion.
const LENIENT_PACKAGES = ['noerrors', 'noundefined'];

const EM_PX = 16;
const EX_PX = 8;
const DEFAULT_BACKGROUND = 'white';

export class LocalRenderer implements ImageRenderer {
  readonly mode = 'local' as const;
  private adaptor: ReturnType<typeof liteAdaptor>;
  private document: ReturnType<typeof mathjax.document>;

  constructor() {
    this.adaptor = liteAdaptor();
    RegisterHTMLHandler(this.adaptor);
    this.document = mathjax.document('', {
      InputJax: new TeX({
        packages: AllPackages.filter((name) => !LENIENT_PACKAGES.includes(name)),
        formatError: (_jax: unknown, error: Error) => {
          throw error;
        },
      }),
      OutputJax: new SVG({ fontCache: 'none' }),
    });
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    try {
      const svg = this.toSVG(request.expression, request.color);
      const png = await sharp(Buffer.from(svg), { density: request.dpi })
        .flatten({ background: request.background ?? DEFAULT_BACKGROUND })
        .png()
        .toBuffer();

      return { kind: 'image', bytes: new Uint8Array(png), mimeType: PNG_MIME_TYPE };
    } catch (error) {
      console.error('Local render failed:', error);
      return { kind: 'error', message: errorMessage(error) };
    }
  }

  /**
   * Convert LaTeX to a standalone SVG document sized in pixels.
   * Throws on TeX errors such as undefined control sequences.
   */
  toSVG(latex: string, color: string): string {
    const node = this.document.convert(latex, {
      display: true,
      em: EM_PX,
      ex: EX_PX,
      containerWidth: 80 * EM_PX,
    });
    const html = this.adaptor.outerHTML(node);

    const svgMatch = html.match(/<svg[^>]*>[\s\S]*<\/svg>/);
    if (!svgMatch) {
      throw new Error('MathJax produced no SVG output');
    }

    // MathJax sizes the outer svg in ex, which rasterisers resolve inconsistently
    return svgMatch[0]
      .replace(/(width|height)="([0-9.]+)ex"/g, (_match, dimension: string, ex: string) => {
        const px = Math.max(parseFloat(ex) * EX_PX, 1);
        return `${dimension}="${px.toFixed(3)}"`;
      })
      .replace(/currentColor/g, escapeXmlAttribute(color));
  }

  validate(latex: string): { valid: boolean; errors: string[] } {
    try {
      this.document.convert(latex, { display: true });
      return { valid: true, errors: [] };
    } catch (error) {
      return {
        valid: false,
        errors: [errorMessage(error)],
      };
    }
  }
}

function escapeXmlAttribute(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
