import type { BrowserSession, SessionLauncher } from '../browser/runner.js';
import type { CapturedEvent } from '../schema/index.js';
import { LaunchError, bestEffort, errorMessage } from './errors.js';
import { harvestLogs } from './harvester.js';
import type { Clock } from './harvester.js';
import { captureFinalSnapshot, installMonitor, registerMonitorInitScript } from './injector.js';
import { EventStore } from './store.js';
import { subscribeConsoleApi } from './subscriber.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface ObservationConfig {
  url: string;
  waitSeconds: number;
  callTimeoutMs: number;
  pollIntervalMs?: number | undefined;
  signal?: AbortSignal | undefined;
  clock?: Clock | undefined;
}

export interface ObservationResult {
  url: string;
  waitSeconds: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  events: readonly CapturedEvent[];
  /** Events excluding the teardown snapshot. */
  observedCount: number;
  interrupted: boolean;
  polls: number;
  consoleApiSubscribed: boolean;
  monitorInstalled: boolean;
}

// ── Main observation run ─────────────────────────────────────

/**
 * One observation session: launch, subscribe, inject, navigate, poll for
 * the wait window, drain, snapshot. The browser is closed exactly once
 * on every exit path. Only a launch failure rejects on purpose.
 */
export async function runObservation(
  launch: SessionLauncher,
  config: ObservationConfig,
): Promise<ObservationResult> {
  const startedAt = new Date();

  // ── 1. Launch browser session ──────────────────────────────

  const session = await acquireSession(launch);
  const store = new EventStore();
  const callOptions = { callTimeoutMs: config.callTimeoutMs };

  try {
    log.section(`Starting dataLayer monitoring for URL: ${config.url}`);

    // ── 2. DevTools console-API listener ─────────────────────

    const consoleApiSubscribed = await subscribeConsoleApi(session, store, callOptions);

    // ── 3. Monitor for every new document ────────────────────

    const initRegistered = await registerMonitorInitScript(session, callOptions);

    // ── 4. Navigate ──────────────────────────────────────────

    await bestEffort('navigation', () => session.navigate(config.url));

    // ── 5. Monitor for the current document ──────────────────

    const outcome = await installMonitor(session, callOptions);
    if (outcome === undefined && !initRegistered) {
      log.warn('DataLayer monitor inactive; relying on console and performance logs');
    }

    // ── 6. Poll log buffers for the wait window ──────────────

    log.info(`Waiting ${String(config.waitSeconds)} seconds to capture dataLayer events...`);
    const harvest = await harvestLogs(session, store, {
      waitSeconds: config.waitSeconds,
      callTimeoutMs: config.callTimeoutMs,
      pollIntervalMs: config.pollIntervalMs,
      signal: config.signal,
      clock: config.clock,
    });

    // ── 7. One-shot snapshot ─────────────────────────────────

    const snapshot = await captureFinalSnapshot(session, store, callOptions);

    const finishedAt = new Date();
    return {
      url: config.url,
      waitSeconds: config.waitSeconds,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      events: store.list(),
      observedCount: store.observedCount,
      interrupted: harvest.interrupted,
      polls: harvest.polls,
      consoleApiSubscribed,
      monitorInstalled: snapshot?.monitorInstalled ?? false,
    };
  } finally {
    await releaseSession(session);
  }
}

// ── Session scope ────────────────────────────────────────────

async function acquireSession(launch: SessionLauncher): Promise<BrowserSession> {
  try {
    return await launch();
  } catch (err) {
    if (err instanceof LaunchError) throw err;
    throw new LaunchError(errorMessage(err), { cause: err });
  }
}

async function releaseSession(session: BrowserSession): Promise<void> {
  await bestEffort('close', () => session.close());
  log.browser('Browser session closed');
}
