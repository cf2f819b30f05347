import { z } from 'zod';

import { capturedEventSchema } from './capture.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  url: z.string(),
  waitSeconds: z.number().int().positive(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  interrupted: z.boolean(),
  exitCode: z.number().int().nonnegative(),
  observedCount: z.number().int().nonnegative(),
  events: z.array(capturedEventSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
