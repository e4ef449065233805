/**
 * livyscan — Plain-text summary.
 * The external-connections summary written by `analyze --export-summary`.
 */

import type { Report } from '../types/index.js';
import { externalHosts, sessionTitle } from './hosts.js';

export function formatTextSummary(report: Report): string {
  const lines: string[] = [];
  const external = report.profiles.filter(p => p.hasExternalActivity);

  lines.push('SESSION LOG ANALYSIS - EXTERNAL CONNECTIONS SUMMARY');
  lines.push('='.repeat(80));
  lines.push('');
  lines.push(`Generated: ${report.generatedAt}`);
  lines.push(`Total Sessions Analyzed: ${report.totalSessions}`);
  lines.push(`Sessions with ANY Outbound Connections: ${report.sessionsWithConnections}`);
  lines.push(`Sessions with EXTERNAL Connections: ${report.sessionsWithExternalActivity}`);
  lines.push(`Sessions with Package Installs: ${report.sessionsWithPackageInstalls}`);
  lines.push(`Sessions with Logging Changes: ${report.sessionsWithLoggingChanges}`);
  lines.push(`Sessions with Disabled Logging: ${report.sessionsWithDisabledLogging}`);
  lines.push(`Trusted Domains Configured: ${report.trustedDomainCount}`);
  lines.push('');

  if (report.trustedPatterns.length > 0) {
    lines.push('TRUSTED DOMAINS/PATTERNS:');
    lines.push('-'.repeat(30));
    for (const pattern of report.trustedPatterns) lines.push(`  • ${pattern}`);
    lines.push('');
  }

  if (external.length > 0) {
    lines.push('!!! SESSIONS WITH EXTERNAL CONNECTIONS (SECURITY REVIEW NEEDED) !!!');
    lines.push('='.repeat(70));
    external.forEach((p, i) => {
      const externalCount = p.connections.filter(c => !c.trusted).length;
      lines.push('');
      lines.push(`${i + 1}. Session: ${sessionTitle(p)}`);
      lines.push(`   Notebook ID: ${p.notebookId}`);
      if (p.workspaceName) lines.push(`   Workspace: ${p.workspaceName}`);
      lines.push(`   Started: ${p.startTime || 'unknown'}  Status: ${p.status}`);
      lines.push(`   External Connections: ${externalCount}`);
      lines.push(`   Trusted Connections: ${p.connections.length - externalCount}`);
      if (p.appUrl) lines.push(`   Monitor URL: ${p.appUrl}`);
      lines.push(`   !!! EXTERNAL HOSTS: ${externalHosts(p.connections).join(', ')}`);
      lines.push(`   ${'-'.repeat(60)}`);
    });
  } else {
    lines.push('+ NO EXTERNAL CONNECTIONS FOUND');
    lines.push('All detected connections are to trusted services.');
  }

  const withConnections = report.profiles.filter(p => p.connections.length > 0);
  if (withConnections.length > 0) {
    lines.push('');
    lines.push('=== ALL SESSIONS SUMMARY (Including Trusted) ===');
    lines.push('-'.repeat(50));
    for (const p of withConnections) {
      const externalCount = p.connections.filter(c => !c.trusted).length;
      const status = externalCount > 0 ? '! HAS EXTERNAL' : '+ TRUSTED ONLY';
      lines.push(`   ${sessionTitle(p)} - ${status}`);
      lines.push(`      External: ${externalCount}, Trusted: ${p.connections.length - externalCount}`);
    }
  }

  const installs = report.profiles.filter(p => p.packageInstalls.length > 0);
  if (installs.length > 0) {
    lines.push('');
    lines.push('=== PACKAGE INSTALLS ===');
    for (const p of installs) {
      lines.push(`   ${sessionTitle(p)}`);
      for (const install of p.packageInstalls) {
        const packages = install.packages.length > 0 ? install.packages.join(', ') : '(none parsed)';
        lines.push(`      [${install.manager}] ${packages}  (${install.streamKind}:${install.lineNumber})`);
      }
    }
  }

  const logging = report.profiles.filter(p => p.loggingChanges.length > 0);
  if (logging.length > 0) {
    lines.push('');
    lines.push('=== LOGGING CONFIGURATION ===');
    for (const p of logging) {
      lines.push(`   ${sessionTitle(p)} - ${p.loggingDisabled ? 'DISABLED' : 'CHANGED'}`);
      for (const change of p.loggingChanges) {
        lines.push(`      ${change.configKeyHint}  (${change.streamKind}:${change.lineNumber})`);
      }
    }
  }

  return lines.join('\n') + '\n';
}
