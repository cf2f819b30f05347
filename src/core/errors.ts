import * as log from '../utils/logger.js';

// ── Fatal errors ─────────────────────────────────────────────

export class LaunchError extends Error {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Browser session could not be launched: ${reason}`, options);
    this.name = 'LaunchError';
  }
}

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, reason: string) {
    super(`Invalid config file ${configPath}: ${reason}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

// ── Capture errors ───────────────────────────────────────────

export class CallTimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} did not settle within ${String(timeoutMs)}ms`);
    this.name = 'CallTimeoutError';
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export class ChannelUnavailableError extends Error {
  readonly channel: string;

  constructor(channel: string) {
    super(`Channel "${channel}" is not available in this browser session`);
    this.name = 'ChannelUnavailableError';
    this.channel = channel;
  }
}

// ── Non-fatal handling path ──────────────────────────────────
// Every collector funnels its failures through here: one log line,
// fixed severity per category, no retry.

export type CaptureErrorCategory =
  | 'injection'
  | 'navigation'
  | 'poll_read'
  | 'performance_log'
  | 'classification'
  | 'subscription'
  | 'snapshot'
  | 'formatting'
  | 'close';

type Severity = 'debug' | 'warn' | 'error';

const SEVERITY: Record<CaptureErrorCategory, Severity> = {
  injection: 'error',
  navigation: 'warn',
  poll_read: 'warn',
  performance_log: 'debug',
  classification: 'debug',
  subscription: 'warn',
  snapshot: 'error',
  formatting: 'error',
  close: 'warn',
};

const LABELS: Record<CaptureErrorCategory, string> = {
  injection: 'Failed to inject dataLayer monitor',
  navigation: 'Navigation did not complete',
  poll_read: 'Error collecting console logs',
  performance_log: 'Performance logs not available',
  classification: 'Error processing captured entry',
  subscription: 'Could not set up DevTools console listener',
  snapshot: 'Error extracting dataLayer content',
  formatting: 'Error formatting event',
  close: 'Error closing browser session',
};

export function severityOf(category: CaptureErrorCategory): Severity {
  return SEVERITY[category];
}

export function reportNonFatal(category: CaptureErrorCategory, err: unknown): void {
  const message = `${LABELS[category]}: ${errorMessage(err)}`;
  switch (SEVERITY[category]) {
    case 'debug':
      log.debug(message);
      break;
    case 'warn':
      log.warn(message);
      break;
    case 'error':
      log.error(message);
      break;
  }
}

/** Run `task`; on failure report it as non-fatal and resolve `undefined`. */
export async function bestEffort<T>(
  category: CaptureErrorCategory,
  task: () => Promise<T>,
): Promise<T | undefined> {
  try {
    return await task();
  } catch (err) {
    reportNonFatal(category, err);
    return undefined;
  }
}

export function bestEffortSync<T>(
  category: CaptureErrorCategory,
  task: () => T,
): T | undefined {
  try {
    return task();
  } catch (err) {
    reportNonFatal(category, err);
    return undefined;
  }
}

// ── Call bounding ────────────────────────────────────────────

export function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new CallTimeoutError(label, timeoutMs));
    }, timeoutMs);

    task.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// ── Helpers ──────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
