import { serve } from '@hono/node-server';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createApp, createMcpServer, createToolDeps, loadConfig } from './index';
import { exitOnError } from './lifecycle';

async function main(): Promise<void> {
  const config = loadConfig();
  const deps = createToolDeps(config);

  console.error(
    `Starting mathshot | transport=${config.transport} host=${config.host} port=${config.port} render=${config.renderMode}`
  );

  if (config.transport === 'stdio') {
    await createMcpServer(deps).connect(new StdioServerTransport());
    return;
  }

  const app = createApp(deps);
  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    console.error(`Listening on http://${info.address}:${info.port}`);
  });
  exitOnError(server);
}

main().catch((err) => {
  console.error('mathshot failed to start:', err);
  process.exit(1);
});
