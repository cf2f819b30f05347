import { z } from 'zod';

// ── Environment ─────────────────────────────────────────────

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate the process environment.
 * Only logging is configured here; everything else comes from the config file.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse({
    LOG_LEVEL: source['LOG_LEVEL']?.trim().toLowerCase() || undefined,
  });
}
