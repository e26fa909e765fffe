import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { RenderResult } from '@mathshot/core';

export const FALLBACK_PREFIX = 'Image URL: ';

export function encodeResult(result: RenderResult): CallToolResult {
  switch (result.kind) {
    case 'image':
      return {
        content: [
          {
            type: 'image',
            data: Buffer.from(result.bytes).toString('base64'),
            mimeType: result.mimeType,
          },
        ],
      };
    case 'fallback':
      // The client can still dereference the URL itself
      return { content: [{ type: 'text', text: `${FALLBACK_PREFIX}${result.locator}` }] };
    case 'error':
      return {
        content: [{ type: 'text', text: `Rendering failed: ${result.message}` }],
        isError: true,
      };
  }
}
