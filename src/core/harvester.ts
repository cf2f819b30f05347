import { setTimeout as delay } from 'node:timers/promises';

import type { BrowserSession } from '../browser/runner.js';
import type { LogEntry } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { isAnalyticsNetworkLine, isDataLayerRelated } from './classifier.js';
import { bestEffort, bestEffortSync, withTimeout } from './errors.js';
import type { EventStore } from './store.js';
import * as log from '../utils/logger.js';

// ── Clock ────────────────────────────────────────────────────

export interface Clock {
  now(): number;
  /** Resolves `false` when `signal` aborted the sleep. */
  sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}

export const systemClock: Clock = {
  now: () => Date.now(),

  async sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    try {
      await delay(ms, undefined, signal ? { signal } : {});
      return true;
    } catch (err) {
      if (signal?.aborted) return false;
      throw err;
    }
  },
};

// ── Public types ─────────────────────────────────────────────

export interface HarvestOptions {
  waitSeconds: number;
  callTimeoutMs: number;
  pollIntervalMs?: number | undefined;
  signal?: AbortSignal | undefined;
  clock?: Clock | undefined;
}

export interface HarvestResult {
  /** Drain passes performed, the final one included. */
  polls: number;
  interrupted: boolean;
}

// ── Polling loop ─────────────────────────────────────────────

/**
 * Drain the log buffers once per interval until `waitSeconds` have
 * elapsed or `signal` aborts, then drain one last time.
 */
export async function harvestLogs(
  session: BrowserSession,
  store: EventStore,
  options: HarvestOptions,
): Promise<HarvestResult> {
  const clock = options.clock ?? systemClock;
  const interval = options.pollIntervalMs ?? TIMEOUTS.POLL_INTERVAL;
  const deadline = clock.now() + options.waitSeconds * 1000;
  const aborted = (): boolean => options.signal?.aborted === true;

  let polls = 0;
  let interrupted = aborted();

  while (!interrupted && clock.now() < deadline) {
    const tickStart = clock.now();
    await drainOnce(session, store, options.callTimeoutMs);
    polls++;

    const remaining = Math.min(
      interval - (clock.now() - tickStart),
      deadline - clock.now(),
    );
    if (remaining > 0) {
      const completed = await clock.sleep(remaining, options.signal);
      if (!completed) interrupted = true;
    }
    if (aborted()) interrupted = true;
  }

  if (interrupted) {
    log.warn('Observation interrupted, collecting remaining logs');
  }

  // Catch whatever arrived during the last sleep.
  await drainOnce(session, store, options.callTimeoutMs);
  polls++;

  return { polls, interrupted };
}

// ── Single pass ──────────────────────────────────────────────

/** Drain every available buffer once; resolves the number of stored events. */
export async function drainOnce(
  session: BrowserSession,
  store: EventStore,
  callTimeoutMs: number,
): Promise<number> {
  let stored = 0;

  const consoleEntries = await bestEffort('poll_read', () =>
    withTimeout(session.drainLog('console'), callTimeoutMs, 'console log read'),
  );
  for (const entry of consoleEntries ?? []) {
    if (bestEffortSync('classification', () => recordConsoleEntry(store, entry))) {
      stored++;
    }
  }

  if (!session.capabilities.performanceLog) return stored;

  const performanceEntries = await bestEffort('performance_log', () =>
    withTimeout(session.drainLog('performance'), callTimeoutMs, 'performance log read'),
  );
  for (const entry of performanceEntries ?? []) {
    if (bestEffortSync('classification', () => recordPerformanceEntry(store, entry))) {
      stored++;
    }
  }

  return stored;
}

// ── Entry classification ─────────────────────────────────────

export function recordConsoleEntry(store: EventStore, entry: LogEntry): boolean {
  if (!isDataLayerRelated(entry.message)) return false;

  store.append({
    source: 'console_log',
    level: entry.level,
    payload: { message: entry.message },
    originTimestamp: entry.timestamp,
  });
  log.captured('console_log', entry.message);
  return true;
}

export function recordPerformanceEntry(store: EventStore, entry: LogEntry): boolean {
  if (!isAnalyticsNetworkLine(entry.message)) return false;

  store.append({
    source: 'performance_log',
    level: entry.level,
    payload: parseLogLine(entry.message),
    originTimestamp: entry.timestamp,
  });
  log.captured('performance_log', describeNetworkLine(entry.message));
  return true;
}

/** Performance lines are JSON; anything else is kept as the raw string. */
export function parseLogLine(message: string): unknown {
  try {
    return JSON.parse(message);
  } catch {
    return message;
  }
}

function describeNetworkLine(message: string): string {
  const url = /"url":"([^"]+)"/.exec(message)?.[1];
  return url ?? message.slice(0, 120);
}
