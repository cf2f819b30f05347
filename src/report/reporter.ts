import { inspect } from 'node:util';

import type { CapturedEvent } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';
import type { ObservationResult } from '../core/observer.js';
import { bestEffortSync } from '../core/errors.js';

// Re-export contract types for consumers
export type { JsonOutput };

// ── Text report ──────────────────────────────────────────────

export const REPORT_MARKERS = {
  START: '=== CAPTURED DATALAYER EVENTS ===',
  END: '=== END OF CAPTURED EVENTS ===',
  EMPTY: 'No events captured.',
} as const;

export interface ReportOptions {
  /** Serializer for one event block. */
  stringify?: (event: CapturedEvent) => string;
}

/**
 * Render events as numbered, pretty-printed blocks in insertion order.
 * A block that cannot be formatted falls back to a raw dump; the rest
 * of the report is still rendered.
 */
export function renderReport(
  events: readonly CapturedEvent[],
  options: ReportOptions = {},
): string[] {
  const stringify = options.stringify ?? formatEvent;
  const snapshots = events.filter((e) => e.source === 'final_snapshot').length;
  const observed = events.length - snapshots;

  const lines: string[] = [REPORT_MARKERS.START];

  if (observed === 0) {
    lines.push(REPORT_MARKERS.EMPTY);
  }

  events.forEach((event, i) => {
    const n = String(i + 1);
    const block = bestEffortSync('formatting', () => stringify(event));
    if (block === undefined) {
      lines.push(`Event ${n} (raw): ${rawDump(event)}`);
    } else {
      lines.push(`Event ${n} [${event.source}]: ${block}`);
    }
  });

  lines.push(REPORT_MARKERS.END);
  lines.push(
    `Total events captured: ${String(observed)} (plus ${String(snapshots)} final snapshot)`,
  );

  return lines;
}

export function formatEvent(event: CapturedEvent): string {
  return JSON.stringify(event, null, 2);
}

function rawDump(event: CapturedEvent): string {
  return inspect(event, { depth: null, breakLength: Infinity });
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(result: ObservationResult, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    url: result.url,
    waitSeconds: result.waitSeconds,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    durationMs: result.durationMs,
    interrupted: result.interrupted,
    exitCode,
    observedCount: result.observedCount,
    events: [...result.events],
  };
}

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, null, 2);
}
