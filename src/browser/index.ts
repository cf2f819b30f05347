/**
 * Browser module.
 * Playwright-backed session handle and the scripts injected into the page.
 */

export { launchSession } from './runner.js';
export type {
  RunnerConfig,
  BrowserSession,
  SessionCapabilities,
  SessionLauncher,
  ConsoleApiEvent,
  ConsoleApiHandler,
} from './runner.js';
export {
  installDataLayerMonitor,
  readDataLayerSnapshot,
  buildMonitorScript,
  buildMonitorInitScript,
  buildSnapshotScript,
  monitorInstallOutcomeSchema,
} from './monitor.js';
export type { MonitorHost, MonitorState, MonitorInstallOutcome, PushFunction } from './monitor.js';
export { remoteValue, previewValue } from './remote.js';
export type { RemoteValue, ObjectPreview, PropertyPreview } from './remote.js';
