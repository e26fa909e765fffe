import { z } from 'zod';
import { CODECOGS_BASE_URL, DEFAULT_FETCH_TIMEOUT_MS } from '@mathshot/core';

export const ConfigSchema = z
  .object({
    MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(8000),
    RENDER_MODE: z.enum(['remote', 'local']).default('remote'),
    RENDER_BASE_URL: z.string().url().default(CODECOGS_BASE_URL),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  })
  .transform((env) => ({
    transport: env.MCP_TRANSPORT,
    host: env.HOST,
    port: env.PORT,
    renderMode: env.RENDER_MODE,
    renderBaseUrl: env.RENDER_BASE_URL,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
  }));

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
