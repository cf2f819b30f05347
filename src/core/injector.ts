import type { BrowserSession } from '../browser/runner.js';
import type { MonitorInstallOutcome } from '../browser/monitor.js';
import {
  buildMonitorInitScript,
  buildMonitorScript,
  buildSnapshotScript,
  monitorInstallOutcomeSchema,
} from '../browser/monitor.js';
import type { MonitorSnapshot } from '../schema/index.js';
import { monitorSnapshotSchema } from '../schema/index.js';
import { bestEffort, withTimeout } from './errors.js';
import type { EventStore } from './store.js';
import * as log from '../utils/logger.js';

export interface InjectorOptions {
  callTimeoutMs: number;
}

// ── Installation ─────────────────────────────────────────────

/**
 * Register the monitor to run in every new document before page scripts.
 * Resolves `false` when the browser refused the script.
 */
export async function registerMonitorInitScript(
  session: BrowserSession,
  options: InjectorOptions,
): Promise<boolean> {
  const done = await bestEffort('injection', async () => {
    await withTimeout(
      session.addInitScript(buildMonitorInitScript()),
      options.callTimeoutMs,
      'monitor init script',
    );
    return true;
  });
  return done === true;
}

/** Install into the current document. A second install is a no-op in the page. */
export async function installMonitor(
  session: BrowserSession,
  options: InjectorOptions,
): Promise<MonitorInstallOutcome | undefined> {
  const outcome = await bestEffort('injection', async () => {
    const raw = await withTimeout(
      session.evaluate(buildMonitorScript()),
      options.callTimeoutMs,
      'monitor injection',
    );
    return monitorInstallOutcomeSchema.parse(raw);
  });

  if (outcome === 'installed') {
    log.inject('DataLayer monitor script injected successfully');
  } else if (outcome === 'already-installed') {
    log.inject('DataLayer monitor already active in page');
  }
  return outcome;
}

// ── Teardown snapshot ────────────────────────────────────────

const EMPTY_SNAPSHOT: MonitorSnapshot = {
  dataLayer: [],
  monitorEvents: [],
  monitorInstalled: false,
};

/**
 * Read the page's dataLayer and the monitor's accumulator in one call.
 * Each monitor record becomes an `injected_push` event; the whole read is
 * stored as exactly one `final_snapshot` event, also when it failed.
 */
export async function captureFinalSnapshot(
  session: BrowserSession,
  store: EventStore,
  options: InjectorOptions,
): Promise<MonitorSnapshot | undefined> {
  const snapshot = await bestEffort('snapshot', async () => {
    const raw = await withTimeout(
      session.evaluate(buildSnapshotScript()),
      options.callTimeoutMs,
      'dataLayer snapshot',
    );
    return monitorSnapshotSchema.parse(raw);
  });

  const read = snapshot ?? EMPTY_SNAPSHOT;

  for (const record of read.monitorEvents) {
    store.append({
      source: 'injected_push',
      payload: record.data,
      originTimestamp: record.timestamp,
    });
  }

  store.append({
    source: 'final_snapshot',
    payload: {
      complete: snapshot !== undefined,
      monitorInstalled: read.monitorInstalled,
      monitorEventCount: read.monitorEvents.length,
      dataLayer: read.dataLayer,
    },
  });

  if (snapshot) {
    log.info(`Current dataLayer content extracted: ${String(read.dataLayer.length)} entries`);
    log.info(`Monitor captured events: ${String(read.monitorEvents.length)}`);
  }

  return snapshot;
}
