/**
 * Report generation module.
 * Turns the captured events into the text report and the JSON artifact.
 */

export {
  renderReport,
  formatEvent,
  generateJSON,
  serializeJSON,
  REPORT_MARKERS,
} from './reporter.js';
export type { JsonOutput, ReportOptions } from './reporter.js';
