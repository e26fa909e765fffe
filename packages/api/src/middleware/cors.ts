import { cors } from 'hono/cors';

export const corsMiddleware = cors({
  origin: '*',
  allowMethods: ['GET', 'POST', 'OPTIONS'],
  allowHeaders: ['Content-Type', 'Accept', 'Mcp-Session-Id', 'Mcp-Protocol-Version'],
  exposeHeaders: ['Content-Length', 'Content-Type', 'Mcp-Session-Id'],
  maxAge: 86400,
});
