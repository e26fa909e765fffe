import { describe, it, expect } from 'vitest';
import { loadConfig } from './index';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      transport: 'http',
      host: '0.0.0.0',
      port: 8000,
      renderMode: 'remote',
      renderBaseUrl: 'https://latex.codecogs.com/png.image',
      fetchTimeoutMs: 5000,
    });
  });

  it('reads and coerces environment values', () => {
    expect(
      loadConfig({
        MCP_TRANSPORT: 'stdio',
        HOST: '127.0.0.1',
        PORT: '9000',
        RENDER_MODE: 'local',
        RENDER_BASE_URL: 'https://render.test/png',
        FETCH_TIMEOUT_MS: '2500',
      })
    ).toEqual({
      transport: 'stdio',
      host: '127.0.0.1',
      port: 9000,
      renderMode: 'local',
      renderBaseUrl: 'https://render.test/png',
      fetchTimeoutMs: 2500,
    });
  });

  it('rejects an unknown render mode', () => {
    expect(() => loadConfig({ RENDER_MODE: 'gpu' })).toThrow(/^Invalid configuration: RENDER_MODE: /);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
  });
});
