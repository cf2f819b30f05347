import { z } from 'zod';

import { jsonValueSchema } from './json.js';

// ── Event source ─────────────────────────────────────────────

export const eventSourceSchema = z.enum([
  'console_log',
  'performance_log',
  'console_api',
  'injected_push',
  'final_snapshot',
]);

export type EventSource = z.infer<typeof eventSourceSchema>;

// ── Captured event ───────────────────────────────────────────

export const capturedEventSchema = z.object({
  source: eventSourceSchema,
  payload: jsonValueSchema,
  level: z.string().optional(),
  /** Epoch ms when the controller recorded the event. */
  observedAt: z.number().int().nonnegative(),
  /** Epoch ms reported by the browser, when it reports one. */
  originTimestamp: z.number().nonnegative().optional(),
});

export type CapturedEvent = Readonly<z.infer<typeof capturedEventSchema>>;

// ── Log buffer entry ─────────────────────────────────────────

export const logChannelSchema = z.enum(['console', 'performance']);

export type LogChannel = z.infer<typeof logChannelSchema>;

export const logEntrySchema = z.object({
  level: z.string(),
  message: z.string(),
  timestamp: z.number().nonnegative(),
});

export type LogEntry = z.infer<typeof logEntrySchema>;

// ── In-page monitor snapshot ─────────────────────────────────

export const monitorRecordSchema = z.object({
  data: z.unknown(),
  timestamp: z.number(),
  source: z.literal('dataLayer.push'),
});

export type MonitorRecord = z.infer<typeof monitorRecordSchema>;

export const monitorSnapshotSchema = z.object({
  dataLayer: z.array(z.unknown()),
  monitorEvents: z.array(monitorRecordSchema),
  monitorInstalled: z.boolean(),
});

export type MonitorSnapshot = z.infer<typeof monitorSnapshotSchema>;
