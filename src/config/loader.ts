import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { ConfigError } from '../core/errors.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.datalayer-watch.yaml` (or JSON) config file.
 * A missing file yields the defaults; an unreadable or invalid one
 * throws a `ConfigError`.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    throw new ConfigError(configPath, describe(err));
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(configPath, describe(err));
  }

  try {
    // An empty YAML document parses to null.
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(configPath, formatIssues(err));
    }
    throw err;
  }
}

// ── Helpers ─────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}
