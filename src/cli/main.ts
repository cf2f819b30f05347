#!/usr/bin/env node

/**
 * datalayer-watch CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { loadEnv } from '../config/env.js';
import { EXIT_CODES } from '../config/defaults.js';
import { errorMessage } from '../core/errors.js';
import { setLogLevel } from '../utils/logger.js';
import { registerWatchCommand } from './watch.js';

try {
  setLogLevel(loadEnv().LOG_LEVEL);
} catch (err) {
  process.stderr.write(`Invalid LOG_LEVEL: ${errorMessage(err)}\n`);
  process.exit(EXIT_CODES.USAGE);
}

const program = new Command();

program
  .name('datalayer-watch')
  .description(
    'Open a page in Chromium and log Google Tag Manager dataLayer pushes seen through DevTools, an injected monitor and the browser logs.',
  )
  .version('0.1.0');

registerWatchCommand(program);

await program.parseAsync();
