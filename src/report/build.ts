/**
 * livyscan — Report builder.
 * Turns per-session profiles into the summary report. Counts always cover
 * every profile; the external-only filter narrows the detail list alone.
 */

import type { Report, SessionSecurityProfile } from '../types/index.js';

export interface ReportContext {
  /** Effective trust catalog patterns, for the report header */
  trustedPatterns?: readonly string[];
  /** Clock for `generatedAt` */
  now?: () => Date;
}

export function buildReport(
  profiles: readonly SessionSecurityProfile[],
  externalOnly: boolean,
  context: ReportContext = {},
): Report {
  const { trustedPatterns = [], now = () => new Date() } = context;

  const ordered = [...profiles].sort(compareProfiles);
  const shown = externalOnly ? ordered.filter(p => p.hasExternalActivity) : ordered;

  return {
    generatedAt: now().toISOString(),
    externalOnly,
    totalSessions: profiles.length,
    sessionsWithExternalActivity: profiles.filter(p => p.hasExternalActivity).length,
    sessionsWithConnections: profiles.filter(p => p.connections.length > 0).length,
    sessionsWithPackageInstalls: profiles.filter(p => p.packageInstalls.length > 0).length,
    sessionsWithLoggingChanges: profiles.filter(p => p.loggingChanges.length > 0).length,
    sessionsWithDisabledLogging: profiles.filter(p => p.loggingDisabled).length,
    trustedDomainCount: trustedPatterns.length,
    trustedPatterns: [...trustedPatterns].sort(),
    profiles: shown,
  };
}

/**
 * startTime ascending, then sessionId. Times that do not parse sort last.
 * Plain code-unit comparison keeps the order locale-independent.
 */
export function compareProfiles(a: SessionSecurityProfile, b: SessionSecurityProfile): number {
  const ta = timeOf(a.startTime);
  const tb = timeOf(b.startTime);
  if (ta !== tb) return ta < tb ? -1 : 1;
  if (a.sessionId === b.sessionId) return 0;
  return a.sessionId < b.sessionId ? -1 : 1;
}

function timeOf(startTime: string): number {
  const t = Date.parse(startTime);
  return Number.isNaN(t) ? Number.POSITIVE_INFINITY : t;
}
