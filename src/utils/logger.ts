/**
 * Live execution logger for datalayer-watch.
 *
 * All output goes to stderr so stdout stays clean for the event report.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { LogLevel } from '../config/env.js';

// ── Level threshold ─────────────────────────────────────────

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function debug(message: string): void {
  if (enabled('debug')) write(`🐞 ${message}`);
}

export function info(message: string): void {
  if (enabled('info')) write(`ℹ️  ${message}`);
}

export function section(title: string): void {
  if (!enabled('info')) return;
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  if (enabled('warn')) write(`⚠️  ${message}`);
}

export function error(message: string): void {
  if (enabled('error')) write(`💥 ${message}`);
}

export function browser(message: string): void {
  if (enabled('info')) write(`🌐 ${message}`);
}

export function inject(message: string): void {
  if (enabled('info')) write(`💉 ${message}`);
}

export function captured(source: string, summary: string): void {
  if (enabled('info')) write(`📥 [${source}] ${summary}`);
}
