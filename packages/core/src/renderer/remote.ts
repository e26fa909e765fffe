import { buildLocator } from './locator';
import {
  PNG_MIME_TYPE,
  type ImageRenderer,
  type RenderRequest,
  type RenderResult,
} from './base';

export const DEFAULT_FETCH_TIMEOUT_MS = 5000;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface RemoteRendererOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

export class RemoteRenderer implements ImageRenderer {
  readonly mode = 'remote' as const;
  private baseUrl?: string;
  private timeoutMs: number;
  private fetchFn: FetchFn;

  constructor(options: RemoteRendererOptions = {}) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  locate(request: RenderRequest): string {
    return buildLocator(request.expression, request.dpi, request.color, {
      baseUrl: this.baseUrl,
      background: request.background,
    });
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    const locator = this.locate(request);

    try {
      const response = await this.fetchFn(locator, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        console.error(`Remote render returned ${response.status}, falling back to URL`);
        return { kind: 'fallback', locator };
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      // Proxies and captive portals answer 200 with an HTML page
      if (!isPNG(bytes)) {
        console.error('Remote render returned a body that is not a PNG, falling back to URL');
        return { kind: 'fallback', locator };
      }
      return { kind: 'image', bytes, mimeType: PNG_MIME_TYPE };
    } catch (error) {
      console.error('Remote render failed, falling back to URL:', error);
      return { kind: 'fallback', locator };
    }
  }
}

function isPNG(bytes: Uint8Array): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((byte, i) => bytes[i] === byte);
}
