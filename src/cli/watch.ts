import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { ZodError } from 'zod';

import { launchSession } from '../browser/runner.js';
import type { BrowserSession, RunnerConfig } from '../browser/runner.js';
import { DEFAULTS, EXIT_CODES } from '../config/defaults.js';
import type { ExitCode } from '../config/defaults.js';
import { loadConfigFile } from '../config/loader.js';
import { ConfigError, LaunchError, errorMessage } from '../core/errors.js';
import { runObservation } from '../core/observer.js';
import type { ObservationResult } from '../core/observer.js';
import type { Clock } from '../core/harvester.js';
import { generateJSON, renderReport, serializeJSON } from '../report/reporter.js';
import { watchArgsSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import * as log from '../utils/logger.js';

// ── Dependencies ─────────────────────────────────────────────

export interface WatchDependencies {
  launch?: (config: RunnerConfig) => Promise<BrowserSession>;
  /** Receives each report line. */
  print?: (line: string) => void;
  configPath?: string;
  signal?: AbortSignal;
  clock?: Clock;
}

// ── Run ──────────────────────────────────────────────────────

/**
 * Observe `url` for `waitSeconds` and print the report.
 *
 * Exit codes: 0 capture completed (events or none), 1 unexpected failure,
 * 2 bad arguments or config, 3 browser launch failure.
 */
export async function runWatch(
  rawUrl: string | undefined,
  rawWaitSeconds: string | undefined,
  deps: WatchDependencies = {},
): Promise<ExitCode> {
  const print = deps.print ?? ((line: string) => process.stdout.write(line + '\n'));
  const launch = deps.launch ?? launchSession;

  // 1. Validate arguments
  const parsedArgs = watchArgsSchema.safeParse({
    url: rawUrl ?? DEFAULTS.URL,
    waitSeconds: rawWaitSeconds ?? DEFAULTS.WAIT_SECONDS,
  });
  if (!parsedArgs.success) {
    log.error(`Invalid arguments: ${describeIssues(parsedArgs.error)}`);
    return EXIT_CODES.USAGE;
  }
  const { url, waitSeconds } = parsedArgs.data;

  // 2. Load config file
  const configPath = path.resolve(deps.configPath ?? DEFAULTS.CONFIG_FILE);
  let config: FileConfig;
  try {
    config = await loadConfigFile(configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      return EXIT_CODES.USAGE;
    }
    throw err;
  }

  // 3. Observe
  let result: ObservationResult;
  try {
    result = await runObservation(
      () =>
        launch({
          headless: config.headless,
          browserArgs: config.browserArgs,
          navigationTimeoutMs: config.navigationTimeoutMs,
        }),
      {
        url,
        waitSeconds,
        callTimeoutMs: config.callTimeoutMs,
        signal: deps.signal,
        clock: deps.clock,
      },
    );
  } catch (err) {
    if (err instanceof LaunchError) {
      log.error(err.message);
      return EXIT_CODES.LAUNCH_FAILED;
    }
    log.error(`Error during dataLayer capture: ${errorMessage(err)}`);
    return EXIT_CODES.FAILURE;
  }

  // 4. Report to stdout
  for (const line of renderReport(result.events)) {
    print(line);
  }

  // 5. JSON artifact, when configured
  if (config.reportPath !== undefined) {
    const reportFile = path.resolve(config.reportPath);
    try {
      await mkdir(path.dirname(reportFile), { recursive: true });
      await writeFile(
        reportFile,
        serializeJSON(generateJSON(result, EXIT_CODES.OK)) + '\n',
        'utf-8',
      );
      log.info(`JSON report written to ${reportFile}`);
    } catch (err) {
      log.error(`Could not write JSON report: ${errorMessage(err)}`);
      return EXIT_CODES.FAILURE;
    }
  }

  log.info(
    `Done in ${(result.durationMs / 1000).toFixed(1)}s: ${String(result.observedCount)} events from ${String(result.polls)} polls${result.interrupted ? ' (interrupted)' : ''}`,
  );
  return EXIT_CODES.OK;
}

// ── Command registration ─────────────────────────────────────

export function registerWatchCommand(program: Command): void {
  program
    .argument('[url]', 'Page to observe', DEFAULTS.URL)
    .argument(
      '[waitSeconds]',
      'How long to capture events, in seconds',
      String(DEFAULTS.WAIT_SECONDS),
    )
    .action(async (url: string, waitSeconds: string) => {
      const controller = new AbortController();
      const onSignal = (): void => {
        if (controller.signal.aborted) return;
        log.warn('Interrupt received, finishing capture');
        controller.abort();
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      try {
        process.exitCode = await runWatch(url, waitSeconds, {
          signal: controller.signal,
        });
      } catch (err) {
        log.error(`Error: ${errorMessage(err)}`);
        process.exitCode = EXIT_CODES.FAILURE;
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    });
}

// ── Helpers ──────────────────────────────────────────────────

function describeIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
}
