import { z } from 'zod';

import { BROWSER_ARGS, TIMEOUTS } from '../config/defaults.js';

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    headless: z.boolean().optional().default(false),
    browserArgs: z
      .array(z.string().min(1))
      .optional()
      .default([...BROWSER_ARGS]),
    navigationTimeoutMs: z
      .number()
      .int()
      .positive()
      .optional()
      .default(TIMEOUTS.NAVIGATION_TIMEOUT),
    callTimeoutMs: z
      .number()
      .int()
      .positive()
      .optional()
      .default(TIMEOUTS.CALL_TIMEOUT),
    reportPath: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── CLI arguments ───────────────────────────────────────────

export const watchArgsSchema = z.object({
  url: z.string().url(),
  waitSeconds: z.coerce.number().int().positive(),
});

export type WatchArgs = z.infer<typeof watchArgsSchema>;
