import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { recordConsoleApiEvent, subscribeConsoleApi } from '../../src/core/subscriber.js';
import { EventStore } from '../../src/core/store.js';
import { FakeBrowserSession } from '../helpers/fake-session.js';

const OPTIONS = { callTimeoutMs: 1_000 };

beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('recordConsoleApiEvent', () => {
  it('should store calls whose first argument mentions dataLayer', () => {
    const store = new EventStore({ now: () => 9 });

    const stored = recordConsoleApiEvent(store, {
      type: 'log',
      args: ['DataLayer Event Captured:', { event: 'page_view' }],
      timestamp: 8,
    });

    expect(stored).toBe(true);
    expect(store.list()).toEqual([
      {
        source: 'console_api',
        level: 'log',
        payload: { type: 'log', args: ['DataLayer Event Captured:', { event: 'page_view' }] },
        observedAt: 9,
        originTimestamp: 8,
      },
    ]);
  });

  it('should match regardless of case', () => {
    const store = new EventStore();
    expect(recordConsoleApiEvent(store, { type: 'info', args: ['GTAG loaded'], timestamp: 1 })).toBe(true);
    expect(recordConsoleApiEvent(store, { type: 'info', args: ['datalayer'], timestamp: 1 })).toBe(true);
  });

  it('should ignore calls that do not match or have no arguments', () => {
    const store = new EventStore();
    expect(recordConsoleApiEvent(store, { type: 'log', args: [], timestamp: 1 })).toBe(false);
    expect(recordConsoleApiEvent(store, { type: 'log', args: ['hello', 'dataLayer'], timestamp: 1 })).toBe(false);
    expect(store.size).toBe(0);
  });
});

describe('subscribeConsoleApi', () => {
  it('should record matching console calls for the session', async () => {
    const session = new FakeBrowserSession();
    const store = new EventStore();

    await expect(subscribeConsoleApi(session, store, OPTIONS)).resolves.toBe(true);
    session.emitConsole('log', ['gtag("event", "login")']);
    session.emitConsole('log', ['unrelated']);

    expect(store.count('console_api')).toBe(1);
  });

  it('should degrade when the browser has no console-API channel', async () => {
    const session = new FakeBrowserSession({ capabilities: { consoleApi: false } });
    const subscribe = vi.spyOn(session, 'subscribeConsoleApi');

    await expect(subscribeConsoleApi(session, new EventStore(), OPTIONS)).resolves.toBe(false);
    expect(subscribe).not.toHaveBeenCalled();
    expect(process.stderr.write).toHaveBeenCalledWith(
      '⚠️  Could not set up DevTools console listener: Channel "Runtime.consoleAPICalled" is not available in this browser session\n',
    );
  });

  it('should degrade when subscribing throws', async () => {
    const session = new FakeBrowserSession();
    vi.spyOn(session, 'subscribeConsoleApi').mockRejectedValue(new Error('Runtime.enable failed'));

    await expect(subscribeConsoleApi(session, new EventStore(), OPTIONS)).resolves.toBe(false);
  });

  it('should keep the callback alive when one event cannot be stored', async () => {
    const session = new FakeBrowserSession();
    const store = new EventStore();
    await subscribeConsoleApi(session, store, OPTIONS);

    const append = vi.spyOn(store, 'append').mockImplementationOnce(() => {
      throw new Error('store failure');
    });

    expect(() => session.emitConsole('log', ['dataLayer one'])).not.toThrow();
    session.emitConsole('log', ['dataLayer two']);

    expect(append).toHaveBeenCalledTimes(2);
    expect(store.list().map((e) => e.payload)).toEqual([{ type: 'log', args: ['dataLayer two'] }]);
  });
});
