import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { HttpBindings } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createMcpServer } from '../mcp/server';
import type { ToolDeps } from '../mcp/tools';

/**
 * Stateless Streamable HTTP endpoint: every POST gets a fresh server and
 * transport, torn down when the response closes.
 */
export function createMcpRoute(deps: ToolDeps) {
  const mcp = new Hono<{ Bindings: HttpBindings }>();

  mcp.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new HTTPException(400, { message: 'Request body must be JSON-RPC' });
    }

    const { incoming, outgoing } = c.env;
    const server = createMcpServer(deps);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    outgoing.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        console.error('Failed to close MCP session:', err);
      });
    });

    await server.connect(transport);
    await transport.handleRequest(incoming, outgoing, body);
    return RESPONSE_ALREADY_SENT;
  });

  // Stateless mode keeps no session to stream to or delete
  mcp.all('/', () => {
    throw new HTTPException(405, { message: 'Method not allowed' });
  });

  return mcp;
}
