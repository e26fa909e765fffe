import type { ImageRenderer, RenderMode } from './base';
import { LocalRenderer } from './mathjax';
import { RemoteRenderer, type RemoteRendererOptions } from './remote';

export * from './base';
export * from './locator';
export { LocalRenderer } from './mathjax';
export { RemoteRenderer, DEFAULT_FETCH_TIMEOUT_MS } from './remote';
export type { FetchFn, RemoteRendererOptions } from './remote';

export function createRenderer(mode: RenderMode, options: RemoteRendererOptions = {}): ImageRenderer {
  if (mode === 'local') {
    return new LocalRenderer();
  }
  return new RemoteRenderer(options);
}
