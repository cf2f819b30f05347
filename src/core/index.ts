/**
 * Core capture module.
 * Classification, event storage, the three collectors and the session
 * that drives them.
 */

export * from './errors.js';
export * from './classifier.js';
export { EventStore } from './store.js';
export type { EventInput, EventStoreOptions } from './store.js';
export { harvestLogs, drainOnce, systemClock } from './harvester.js';
export type { Clock, HarvestOptions, HarvestResult } from './harvester.js';
export { subscribeConsoleApi, recordConsoleApiEvent } from './subscriber.js';
export { registerMonitorInitScript, installMonitor, captureFinalSnapshot } from './injector.js';
export { runObservation } from './observer.js';
export type { ObservationConfig, ObservationResult } from './observer.js';
