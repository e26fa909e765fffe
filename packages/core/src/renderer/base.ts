export type RenderMode = 'remote' | 'local';

export const PNG_MIME_TYPE = 'image/png';

export interface RenderRequest {
  expression: string;
  dpi: number;
  color: string;
  background?: string;
}

export interface ImageResult {
  kind: 'image';
  bytes: Uint8Array;
  mimeType: typeof PNG_MIME_TYPE;
}

export interface FallbackResult {
  kind: 'fallback';
  locator: string;
}

export interface ErrorResult {
  kind: 'error';
  message: string;
}

export type RenderResult = ImageResult | FallbackResult | ErrorResult;

export interface ImageRenderer {
  readonly mode: RenderMode;
  render(request: RenderRequest): Promise<RenderResult>;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
