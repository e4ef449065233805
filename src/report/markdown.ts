/**
 * livyscan — Markdown report generator.
 * Summary table, a diagram of external contacts, then one section per
 * session listing what it reached, installed and reconfigured.
 */

import type { Report, SessionSecurityProfile } from '../types/index.js';
import { generateMermaid } from './mermaid.js';
import { hostLabel, sessionTitle } from './hosts.js';

export function generateMarkdownReport(report: Report): string {
  const lines: string[] = [];

  // ── Header ──
  lines.push('# Session Log Security Report');
  lines.push('');
  lines.push(`> Generated: ${report.generatedAt}  `);
  lines.push(`> Sessions analyzed: ${report.totalSessions} | Trusted patterns: ${report.trustedDomainCount}`);
  if (report.externalOnly) lines.push('> Showing only sessions with external activity.');
  lines.push('');

  // ── Summary ──
  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Count |');
  lines.push('|--------|-------|');
  lines.push(`| Sessions analyzed | ${report.totalSessions} |`);
  lines.push(`| Sessions with connections | ${report.sessionsWithConnections} |`);
  lines.push(`| **Sessions with external connections** | **${report.sessionsWithExternalActivity}** |`);
  lines.push(`| Sessions with package installs | ${report.sessionsWithPackageInstalls} |`);
  lines.push(`| Sessions with logging changes | ${report.sessionsWithLoggingChanges} |`);
  lines.push(`| ↳ Logging disabled | ${report.sessionsWithDisabledLogging} |`);
  lines.push('');

  // ── Diagram ──
  lines.push('## External Contacts');
  lines.push('');
  lines.push('```mermaid');
  lines.push(generateMermaid(report));
  lines.push('```');
  lines.push('');

  // ── Sessions ──
  lines.push('## Sessions');
  lines.push('');
  if (report.profiles.length === 0) {
    lines.push('_No sessions to show._');
    lines.push('');
  }
  for (const p of report.profiles) sessionSection(lines, p);

  // ── Trusted patterns ──
  if (report.trustedPatterns.length > 0) {
    lines.push('## Trusted Patterns');
    lines.push('');
    for (const pattern of report.trustedPatterns) lines.push(`- \`${pattern}\``);
    lines.push('');
  }

  return lines.join('\n');
}

function sessionSection(lines: string[], p: SessionSecurityProfile): void {
  const badge = p.hasExternalActivity ? '⚠ ' : '';
  lines.push(`### ${badge}${escapeCell(sessionTitle(p))}`);
  lines.push('');
  lines.push(`- Notebook: ${p.notebookId}`);
  if (p.workspaceName) lines.push(`- Workspace: ${p.workspaceName}`);
  lines.push(`- Started: ${p.startTime || '—'} | Status: ${p.status}`);
  if (p.appUrl) lines.push(`- Monitor: ${p.appUrl}`);
  if (p.loggingDisabled) lines.push('- **Logging disabled**');
  if (p.parseWarnings > 0) lines.push(`- Unrecognized lines: ${p.parseWarnings}`);
  lines.push('');

  if (p.connections.length > 0) {
    lines.push('| Endpoint | Scheme | Trust | Matched | Location |');
    lines.push('|----------|--------|-------|---------|----------|');
    for (const c of p.connections) {
      const trust = c.trusted ? 'trusted' : '**external**';
      const matched = c.matchedPattern ? `\`${c.matchedPattern.pattern}\`` : '—';
      lines.push(`| ${escapeCell(hostLabel(c))} | ${c.scheme ?? '—'} | ${trust} | ${matched} | ${c.streamKind}:${c.lineNumber} |`);
    }
    lines.push('');
  }

  if (p.packageInstalls.length > 0) {
    lines.push('| Manager | Packages | Command | Location |');
    lines.push('|---------|----------|---------|----------|');
    for (const i of p.packageInstalls) {
      const packages = i.packages.length > 0 ? i.packages.join(', ') : '—';
      lines.push(`| ${i.manager} | ${escapeCell(packages)} | \`${escapeCell(truncate(i.rawCommand, 60))}\` | ${i.streamKind}:${i.lineNumber} |`);
    }
    lines.push('');
  }

  if (p.loggingChanges.length > 0) {
    lines.push('| Logging change | Disables | Line | Location |');
    lines.push('|----------------|----------|------|----------|');
    for (const l of p.loggingChanges) {
      lines.push(`| ${l.configKeyHint} | ${l.disablesLogging ? 'yes' : 'no'} | \`${escapeCell(truncate(l.rawLine, 60))}\` | ${l.streamKind}:${l.lineNumber} |`);
    }
    lines.push('');
  }

  if (p.warnings.length > 0) {
    lines.push('<details><summary>Warnings</summary>');
    lines.push('');
    for (const w of p.warnings) lines.push(`- ${w}`);
    lines.push('');
    lines.push('</details>');
    lines.push('');
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + '…';
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|').replace(/`/g, "'");
}
