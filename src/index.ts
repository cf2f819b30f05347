export * from './schema/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './report/index.js';
export { runWatch } from './cli/index.js';
export type { WatchDependencies } from './cli/index.js';
