import { z } from 'zod';

import type { MonitorRecord, MonitorSnapshot } from '../schema/index.js';

// ── Page-side shapes ─────────────────────────────────────────

export type PushFunction = (...items: unknown[]) => number;

export interface MonitorState {
  /** The queue array whose `push` was last wrapped. */
  queue: unknown[] | null;
  /** The wrapper installed on `queue`. */
  wrapper: PushFunction | null;
  events: MonitorRecord[];
  lastTimestamp: number;
  /** Item lists of the push calls currently running, outermost first. */
  pending: unknown[][];
  /** `dataLayer` is an accessor that wraps every assigned array. */
  watching: boolean;
}

export interface MonitorHost {
  dataLayer?: unknown;
  __dataLayerMonitor?: MonitorState;
  console: { log(...args: unknown[]): void };
}

export const monitorInstallOutcomeSchema = z.enum(['installed', 'already-installed']);

export type MonitorInstallOutcome = z.infer<typeof monitorInstallOutcomeSchema>;

// ── Browser-context functions ────────────────────────────────
// These functions are serialized and executed inside the browser.
// They must NOT reference any outer-scope variables.

/**
 * Wrap `dataLayer.push` so every pushed item is timestamped and kept in
 * `__dataLayerMonitor.events`, then echoed to the console.
 *
 * The current `push` still runs first. The queue counts as installed only
 * while its `push` is still our wrapper; a page that replaced the array or
 * its `push` gets wrapped again. When several of our wrappers sit in one
 * call chain, only the outermost records the items.
 *
 * With `watchAssignments`, `dataLayer` becomes an accessor so an array the
 * page assigns later (`dataLayer = [...]`) is wrapped on assignment.
 */
export function installDataLayerMonitor(
  host: MonitorHost,
  watchAssignments = false,
): MonitorInstallOutcome {
  let state = host.__dataLayerMonitor;
  if (!state) {
    state = {
      queue: null,
      wrapper: null,
      events: [],
      lastTimestamp: 0,
      pending: [],
      watching: false,
    };
    host.__dataLayerMonitor = state;
  }
  const monitor = state;

  function isWrapped(queue: unknown[]): boolean {
    return monitor.queue === queue && monitor.wrapper !== null && queue.push === monitor.wrapper;
  }

  function wrap(queue: unknown[]): void {
    const previousPush = queue.push;

    const wrapper: PushFunction = function (...items: unknown[]): number {
      const outer = monitor.pending[monitor.pending.length - 1];
      const nested =
        outer !== undefined &&
        outer.length === items.length &&
        outer.every((item, i) => item === items[i]);

      monitor.pending.push(items);
      let length: number;
      try {
        length = previousPush.apply(queue, items);
      } finally {
        monitor.pending.pop();
      }
      if (nested) return length;

      // Clamp so a clock step backwards never reorders records.
      const timestamp = Math.max(monitor.lastTimestamp, Date.now());
      monitor.lastTimestamp = timestamp;

      for (const item of items) {
        const record: MonitorRecord = { data: item, timestamp, source: 'dataLayer.push' };
        monitor.events.push(record);
        host.console.log('DataLayer Event Captured:', record);
      }

      return length;
    };

    // Non-enumerable like Array.prototype.push; still writable for tag managers.
    Object.defineProperty(queue, 'push', {
      value: wrapper,
      writable: true,
      configurable: true,
      enumerable: false,
    });
    monitor.queue = queue;
    monitor.wrapper = wrapper;
  }

  const queue: unknown[] = Array.isArray(host.dataLayer) ? host.dataLayer : [];
  const alreadyWrapped = isWrapped(queue);
  if (host.dataLayer !== queue) host.dataLayer = queue;

  if (watchAssignments && !monitor.watching) {
    const descriptor = Object.getOwnPropertyDescriptor(host, 'dataLayer');
    if (descriptor === undefined || descriptor.configurable === true) {
      let current: unknown = host.dataLayer;
      Object.defineProperty(host, 'dataLayer', {
        configurable: true,
        enumerable: true,
        get: () => current,
        set: (value: unknown) => {
          current = value;
          if (Array.isArray(value) && !isWrapped(value)) wrap(value);
        },
      });
      monitor.watching = true;
    }
  }

  if (alreadyWrapped) {
    return 'already-installed';
  }

  // The accessor may have wrapped the queue on assignment above.
  if (!isWrapped(queue)) wrap(queue);
  return 'installed';
}

export function readDataLayerSnapshot(host: MonitorHost): MonitorSnapshot {
  // Cycles are cut at the ancestor chain only; shared references are copied.
  function plain(value: unknown, ancestors: readonly object[]): unknown {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'bigint') return value.toString();
    if (typeof value !== 'object') return null;
    if (ancestors.includes(value)) return '[Circular]';

    const path = [...ancestors, value];
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => plain(item, path));
    }

    const copy: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(value);
    for (const [key, item] of entries) {
      if (item === undefined || typeof item === 'function' || typeof item === 'symbol') continue;
      copy[key] = plain(item, path);
    }
    return copy;
  }

  function copyOf(value: unknown): unknown {
    try {
      return plain(value, []);
    } catch {
      return String(value);
    }
  }

  const state = host.__dataLayerMonitor;
  const queue = Array.isArray(host.dataLayer) ? host.dataLayer : [];

  return {
    dataLayer: queue.map((item: unknown) => copyOf(item)),
    monitorEvents: state
      ? state.events.map((record) => ({
          data: copyOf(record.data),
          timestamp: record.timestamp,
          source: record.source,
        }))
      : [],
    monitorInstalled: state !== undefined && state.queue !== null,
  };
}

// ── Script builders ──────────────────────────────────────────

/** Expression for `evaluate`; resolves to the install outcome. */
export function buildMonitorScript(): string {
  return `(${installDataLayerMonitor.toString()})(window)`;
}

/** Statement for an init script; a failure must not break the page. */
export function buildMonitorInitScript(): string {
  return [
    'try {',
    `  (${installDataLayerMonitor.toString()})(window, true);`,
    '} catch (err) {',
    "  console.warn('DataLayer monitor could not be installed', err);",
    '}',
  ].join('\n');
}

export function buildSnapshotScript(): string {
  return `(${readDataLayerSnapshot.toString()})(window)`;
}
