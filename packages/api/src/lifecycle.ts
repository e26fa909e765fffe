import type { EventEmitter } from 'node:events';

// Listen failures such as EADDRINUSE arrive as events, not rejections
export function exitOnError(server: EventEmitter): void {
  server.on('error', (err: unknown) => {
    console.error('mathshot HTTP server failed:', err);
    process.exit(1);
  });
}
