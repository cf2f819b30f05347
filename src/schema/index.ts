/**
 * Schema module: the data shapes shared by capture, config and reports.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './json.js';
export * from './capture.js';
export * from './config.js';
export * from './jsonOutput.js';
