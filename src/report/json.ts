import type { Report } from '../types/index.js';

/** The report as pretty-printed JSON, field for field. */
export function serializeReport(report: Report): string {
  return JSON.stringify(report, null, 2) + '\n';
}
