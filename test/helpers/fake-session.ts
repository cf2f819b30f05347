import type {
  BrowserSession,
  ConsoleApiHandler,
  SessionCapabilities,
} from '../../src/browser/runner.js';
import type { MonitorHost } from '../../src/browser/monitor.js';
import { stringifyArgument } from '../../src/core/classifier.js';
import { ChannelUnavailableError } from '../../src/core/errors.js';
import type { LogChannel, LogEntry } from '../../src/schema/index.js';

export interface FakeSessionOptions {
  capabilities?: Partial<SessionCapabilities>;
  /** Runs after init scripts, like the page's own scripts. */
  onLoad?: (window: MonitorHost) => void;
  now?: () => number;
}

/**
 * In-process stand-in for the Playwright session. Scripts passed to
 * `evaluate` and `addInitScript` run for real against a fake `window`.
 */
export class FakeBrowserSession implements BrowserSession {
  readonly capabilities: SessionCapabilities;
  window: MonitorHost;
  readonly navigations: string[] = [];
  readonly initScripts: string[] = [];
  readonly evaluated: string[] = [];
  closeCalls = 0;

  private readonly buffers: Record<LogChannel, LogEntry[]> = { console: [], performance: [] };
  private readonly handlers: ConsoleApiHandler[] = [];
  private readonly onLoad: ((window: MonitorHost) => void) | undefined;
  private readonly clock: () => number;

  constructor(options: FakeSessionOptions = {}) {
    this.capabilities = {
      consoleApi: options.capabilities?.consoleApi ?? true,
      performanceLog: options.capabilities?.performanceLog ?? true,
    };
    this.onLoad = options.onLoad;
    this.clock = options.now ?? Date.now;
    this.window = this.createWindow();
  }

  // ── BrowserSession ─────────────────────────────────────────

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    this.window = this.createWindow();
    for (const source of this.initScripts) {
      runStatement(source, this.window);
    }
    this.onLoad?.(this.window);
  }

  async addInitScript(source: string): Promise<void> {
    this.initScripts.push(source);
  }

  async evaluate(source: string): Promise<unknown> {
    this.evaluated.push(source);
    return runExpression(source, this.window);
  }

  async drainLog(channel: LogChannel): Promise<LogEntry[]> {
    if (channel === 'performance' && !this.capabilities.performanceLog) {
      throw new ChannelUnavailableError('performance');
    }
    return this.buffers[channel].splice(0);
  }

  async subscribeConsoleApi(handler: ConsoleApiHandler): Promise<void> {
    if (!this.capabilities.consoleApi) {
      throw new ChannelUnavailableError('Runtime.consoleAPICalled');
    }
    this.handlers.push(handler);
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  // ── Page simulation ────────────────────────────────────────

  /** Call `window.dataLayer.push` the way page code would. */
  pushToDataLayer(...items: unknown[]): void {
    const queue = this.window.dataLayer;
    if (!Array.isArray(queue)) {
      throw new Error('dataLayer is not an array');
    }
    queue.push(...items);
  }

  emitConsole(type: string, args: unknown[]): void {
    const timestamp = this.clock();
    this.buffers.console.push({
      level: type,
      message: args.map((arg) => stringifyArgument(arg)).join(' '),
      timestamp,
    });
    for (const handler of this.handlers) {
      handler({ type, args, timestamp });
    }
  }

  emitNetwork(message: string): void {
    this.buffers.performance.push({ level: 'INFO', message, timestamp: this.clock() });
  }

  private createWindow(): MonitorHost {
    return {
      console: {
        log: (...args: unknown[]) => {
          this.emitConsole('log', args);
        },
      },
    };
  }
}

// ── Script execution ─────────────────────────────────────────

function runExpression(source: string, window: MonitorHost): unknown {
  const fn = new Function('window', `return (${source});`);
  const result: unknown = fn(window);
  return result;
}

function runStatement(source: string, window: MonitorHost): void {
  const fn = new Function('window', 'console', source);
  fn(window, window.console);
}
