import type { BrowserSession, ConsoleApiEvent } from '../browser/runner.js';
import { matchesConsoleApiArgument, stringifyArgument } from './classifier.js';
import {
  ChannelUnavailableError,
  bestEffort,
  bestEffortSync,
  reportNonFatal,
  withTimeout,
} from './errors.js';
import type { EventStore } from './store.js';
import * as log from '../utils/logger.js';

export interface SubscriberOptions {
  callTimeoutMs: number;
}

// ── Subscription ─────────────────────────────────────────────

/**
 * Listen to DevTools console-API calls for the rest of the session.
 * Resolves `false` when the channel is missing; capture then relies on polling.
 */
export async function subscribeConsoleApi(
  session: BrowserSession,
  store: EventStore,
  options: SubscriberOptions,
): Promise<boolean> {
  if (!session.capabilities.consoleApi) {
    reportNonFatal('subscription', new ChannelUnavailableError('Runtime.consoleAPICalled'));
    return false;
  }

  const subscribed = await bestEffort('subscription', async () => {
    await withTimeout(
      session.subscribeConsoleApi((event) => {
        bestEffortSync('classification', () => recordConsoleApiEvent(store, event));
      }),
      options.callTimeoutMs,
      'console-API subscription',
    );
    return true;
  });

  if (subscribed === true) {
    log.info('DevTools console listener setup completed');
    return true;
  }
  return false;
}

// ── Event handling ───────────────────────────────────────────

/** Store the call when its first argument mentions dataLayer or gtag. */
export function recordConsoleApiEvent(store: EventStore, event: ConsoleApiEvent): boolean {
  if (event.args.length === 0) return false;

  const first = event.args[0];
  if (!matchesConsoleApiArgument(first)) return false;

  store.append({
    source: 'console_api',
    level: event.type,
    payload: { type: event.type, args: event.args },
    originTimestamp: event.timestamp,
  });
  log.captured('console_api', stringifyArgument(first));
  return true;
}
