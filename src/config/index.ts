/**
 * Configuration module.
 * Loads and validates runtime config from env and the optional config file.
 * Zod-validated.
 */

export { DEFAULTS, TIMEOUTS, BROWSER_ARGS, EXIT_CODES } from './defaults.js';
export type { ExitCode } from './defaults.js';
export { loadConfigFile } from './loader.js';
export { loadEnv, logLevelSchema } from './env.js';
export type { Env, LogLevel } from './env.js';
