/**
 * livyscan CLI — Console summary printed by `analyze`.
 */

import type { Report, SessionSecurityProfile } from '../types/index.js';
import { externalHosts, sessionTitle } from '../report/index.js';
import { C, header } from './format.js';

export type SummaryMode = 'all' | 'external' | 'connections';

export function formatConsoleSummary(report: Report, mode: SummaryMode): string[] {
  const lines: string[] = [];

  if (mode === 'external') {
    const sessions = report.profiles.filter(p => p.hasExternalActivity);
    lines.push('', C.external(`!!! SESSIONS WITH EXTERNAL CONNECTIONS (${sessions.length}) !!!`));
    if (sessions.length === 0) {
      lines.push(C.success('+ No sessions found with external connections (all connections are to trusted services)'));
    }
    for (const p of sessions) lines.push(...sessionBlock(p));
  } else if (mode === 'connections') {
    const sessions = report.profiles.filter(p => p.connections.length > 0);
    lines.push('', C.bold(`SESSIONS WITH ANY OUTBOUND CONNECTIONS (${sessions.length})`));
    for (const p of sessions) {
      const external = p.connections.filter(c => !c.trusted).length;
      const status = external > 0 ? C.external('! HAS EXTERNAL') : C.trusted('+ TRUSTED ONLY');
      lines.push(`> ${sessionTitle(p)} - ${status}`);
      lines.push(`   External: ${external}, Trusted: ${p.connections.length - external}`);
    }
  } else {
    for (const p of report.profiles) lines.push(...sessionBlock(p));
  }

  lines.push(...header('SUMMARY'));
  lines.push(`Total sessions analyzed:        ${report.totalSessions}`);
  lines.push(`Sessions with connections:      ${report.sessionsWithConnections}`);
  lines.push(`Sessions with external:         ${colorCount(report.sessionsWithExternalActivity, C.external)}`);
  lines.push(`Sessions with package installs: ${report.sessionsWithPackageInstalls}`);
  lines.push(`Sessions with logging changes:  ${report.sessionsWithLoggingChanges}`);
  lines.push(`Sessions with logging disabled: ${colorCount(report.sessionsWithDisabledLogging, C.warn)}`);
  lines.push(`Trusted domains/patterns:       ${report.trustedDomainCount}`);
  return lines;
}

function sessionBlock(p: SessionSecurityProfile): string[] {
  const lines: string[] = [];
  const external = p.connections.filter(c => !c.trusted).length;

  lines.push('');
  lines.push(`> ${C.bold(sessionTitle(p))}`);
  if (p.workspaceName) lines.push(`   Workspace: ${p.workspaceName}`);
  lines.push(`   Connections: ${p.connections.length} (${colorCount(external, C.external)} external)`);
  if (external > 0) lines.push(`   External hosts: ${C.external(externalHosts(p.connections).join(', '))}`);
  if (p.packageInstalls.length > 0) {
    const packages = [...new Set(p.packageInstalls.flatMap(i => i.packages))];
    lines.push(`   Package installs: ${p.packageInstalls.length}${packages.length > 0 ? ` (${packages.join(', ')})` : ''}`);
  }
  if (p.loggingChanges.length > 0) {
    const state = p.loggingDisabled ? C.warn('logging disabled') : 'logging changed';
    lines.push(`   Logging: ${state} (${p.loggingChanges.length} change(s))`);
  }
  if (p.appUrl) lines.push(C.dim(`   Monitor: ${p.appUrl}`));
  for (const w of p.warnings) lines.push(C.warn(`   ⚠ ${w}`));
  return lines;
}

function colorCount(n: number, color: (s: string) => string): string {
  return n > 0 ? color(String(n)) : String(n);
}
