import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { HttpBindings } from '@hono/node-server';
import { corsMiddleware } from './middleware/cors';
import { errorHandler } from './middleware/error';
import health from './routes/health';
import { createMcpRoute } from './routes/mcp';
import { SERVER_NAME, SERVER_VERSION } from './mcp/server';
import type { ToolDeps } from './mcp/tools';

export { loadConfig, type AppConfig } from './config';
export { createMcpServer, createToolDeps } from './mcp/server';
export { encodeResult } from './mcp/encoder';
export type { ToolDeps } from './mcp/tools';

// stdout carries the protocol when running over stdio
const logToStderr = (message: string, ...rest: string[]) => console.error(message, ...rest);

export function createApp(deps: ToolDeps) {
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.use('*', logger(logToStderr));
  app.use('*', corsMiddleware);

  app.get('/', (c) => {
    return c.json({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      description: 'MCP server that renders LaTeX math expressions and step-by-step solutions to PNG images',
      renderMode: deps.renderer.mode,
      endpoints: {
        health: 'GET /health',
        mcp: 'POST /mcp',
      },
      tools: ['render_latex', 'render_solution', 'get_image_url', 'check_latex_syntax'],
    });
  });

  app.route('/health', health);
  app.route('/mcp', createMcpRoute(deps));

  app.onError(errorHandler);

  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: 'Not found',
        path: c.req.path,
      },
      404
    );
  });

  return app;
}
