/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerWatchCommand, runWatch } from './watch.js';
export type { WatchDependencies } from './watch.js';
