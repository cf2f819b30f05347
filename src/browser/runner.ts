import { chromium } from 'playwright';
import type { Browser, BrowserContext, CDPSession, ConsoleMessage, Page } from 'playwright';

import type { LogChannel, LogEntry } from '../schema/index.js';
import {
  ChannelUnavailableError,
  LaunchError,
  errorMessage,
  reportNonFatal,
} from '../core/errors.js';
import * as log from '../utils/logger.js';
import { remoteValue } from './remote.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
  browserArgs: readonly string[];
  navigationTimeoutMs: number;
}

export interface SessionCapabilities {
  /** DevTools `Runtime.consoleAPICalled` subscription. */
  consoleApi: boolean;
  /** Network events buffered as performance log lines. */
  performanceLog: boolean;
}

export interface ConsoleApiEvent {
  type: string;
  args: unknown[];
  /** Epoch ms reported by the browser. */
  timestamp: number;
}

export type ConsoleApiHandler = (event: ConsoleApiEvent) => void;

export interface BrowserSession {
  readonly capabilities: SessionCapabilities;
  navigate(url: string): Promise<void>;
  addInitScript(source: string): Promise<void>;
  evaluate(source: string): Promise<unknown>;
  /** Destructive read: returned entries are removed from the buffer. */
  drainLog(channel: LogChannel): Promise<LogEntry[]>;
  subscribeConsoleApi(handler: ConsoleApiHandler): Promise<void>;
  close(): Promise<void>;
}

export type SessionLauncher = () => Promise<BrowserSession>;

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(config: RunnerConfig): Promise<BrowserSession> {
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: config.headless,
      args: [...config.browserArgs],
    });
  } catch (err) {
    throw new LaunchError(errorMessage(err), { cause: err });
  }

  try {
    return await openSession(browser, config);
  } catch (err) {
    await browser.close().catch((closeErr: unknown) => {
      reportNonFatal('close', closeErr);
    });
    throw new LaunchError(errorMessage(err), { cause: err });
  }
}

async function openSession(
  browser: Browser,
  config: RunnerConfig,
): Promise<BrowserSession> {
  const context = await browser.newContext();
  const page = await context.newPage();

  const buffers: Record<LogChannel, LogEntry[]> = {
    console: [],
    performance: [],
  };

  page.on('console', (msg) => {
    buffers.console.push({
      level: msg.type(),
      message: formatConsoleMessage(msg),
      timestamp: Date.now(),
    });
  });

  const cdp = await probeDevTools(context, page);
  const performanceLog = cdp !== null && (await enableNetworkLog(cdp, buffers.performance));

  const capabilities: SessionCapabilities = {
    consoleApi: cdp !== null,
    performanceLog,
  };
  log.browser(
    `Chromium ${browser.version()} ready (console API: ${flag(capabilities.consoleApi)}, performance log: ${flag(performanceLog)})`,
  );

  let closed = false;

  return {
    capabilities,

    async navigate(url: string): Promise<void> {
      await page.goto(url, {
        timeout: config.navigationTimeoutMs,
        waitUntil: 'domcontentloaded',
      });
    },

    async addInitScript(source: string): Promise<void> {
      await context.addInitScript({ content: source });
    },

    async evaluate(source: string): Promise<unknown> {
      return page.evaluate<unknown>(source);
    },

    async drainLog(channel: LogChannel): Promise<LogEntry[]> {
      if (channel === 'performance' && !performanceLog) {
        throw new ChannelUnavailableError('performance');
      }
      return buffers[channel].splice(0);
    },

    async subscribeConsoleApi(handler: ConsoleApiHandler): Promise<void> {
      if (cdp === null) {
        throw new ChannelUnavailableError('Runtime.consoleAPICalled');
      }
      cdp.on('Runtime.consoleAPICalled', (event) => {
        handler({
          type: event.type,
          args: event.args.map((arg) => remoteValue(arg)),
          timestamp: event.timestamp,
        });
      });
      await cdp.send('Runtime.enable');
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await browser.close();
    },
  };
}

// ── DevTools probing ─────────────────────────────────────────

async function probeDevTools(
  context: BrowserContext,
  page: Page,
): Promise<CDPSession | null> {
  try {
    return await context.newCDPSession(page);
  } catch (err) {
    log.debug(`DevTools session unavailable: ${errorMessage(err)}`);
    return null;
  }
}

async function enableNetworkLog(
  cdp: CDPSession,
  buffer: LogEntry[],
): Promise<boolean> {
  cdp.on('Network.requestWillBeSent', (event) => {
    buffer.push(performanceEntry('Network.requestWillBeSent', event, event.wallTime * 1000));
  });
  cdp.on('Network.responseReceived', (event) => {
    buffer.push(performanceEntry('Network.responseReceived', event, Date.now()));
  });

  try {
    await cdp.send('Network.enable');
    return true;
  } catch (err) {
    reportNonFatal('performance_log', err);
    return false;
  }
}

// ── Entry formatting ─────────────────────────────────────────

// Same shape Chrome writes to its performance log: one CDP event per line.
function performanceEntry(method: string, params: object, timestamp: number): LogEntry {
  return {
    level: 'INFO',
    message: JSON.stringify({ message: { method, params } }),
    timestamp: Math.max(0, Math.floor(timestamp)),
  };
}

function formatConsoleMessage(msg: ConsoleMessage): string {
  const { url, lineNumber, columnNumber } = msg.location();
  if (!url) return msg.text();
  return `${url} ${String(lineNumber)}:${String(columnNumber)} ${msg.text()}`;
}

function flag(value: boolean): string {
  return value ? 'yes' : 'no';
}
