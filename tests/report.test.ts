import { describe, it, expect } from 'vitest';
import {
  buildReport, compareProfiles, formatTextSummary, generateMarkdownReport, generateMermaid, serializeReport,
} from '../src/report/index.js';
import { failedSessionProfile } from '../src/aggregate/index.js';
import type { SessionSecurityProfile } from '../src/types/index.js';
import { NOW, catalog, quietSession, riskySession, sampleReport } from './helpers/sessions.js';

function empty(sessionId: string, startTime: string): SessionSecurityProfile {
  return failedSessionProfile({ sessionId, notebookId: 'nb', startTime, status: 'dead' }, 'n/a');
}

// ─── Builder ─────────────────────────────────────────────────────────

describe('buildReport', () => {
  it('counts every session', () => {
    const report = sampleReport();
    expect(report).toMatchObject({
      generatedAt: '2025-04-01T00:00:00.000Z',
      externalOnly: false,
      totalSessions: 2,
      sessionsWithExternalActivity: 1,
      sessionsWithConnections: 2,
      sessionsWithPackageInstalls: 1,
      sessionsWithLoggingChanges: 1,
      sessionsWithDisabledLogging: 1,
      trustedDomainCount: 2,
      trustedPatterns: ['*.notebook.windows.net', 'api.fabric.microsoft.com'],
    });
    expect(report.profiles.map(p => p.sessionId)).toEqual(['sess-2', 'sess-1']);
  });

  it('filters the detail list but not the counts when external-only', () => {
    const report = sampleReport(true);
    expect(report.totalSessions).toBe(2);
    expect(report.profiles.map(p => p.sessionId)).toEqual(['sess-1']);
  });

  it('orders by start time, then session id, unparseable times last', () => {
    const report = buildReport([
      empty('c', '2025-03-02T00:00:00Z'),
      empty('z', 'not a date'),
      empty('b', '2025-03-01T00:00:00Z'),
      empty('a', '2025-03-01T00:00:00Z'),
      empty('y', ''),
    ], false, { now: NOW });
    expect(report.profiles.map(p => p.sessionId)).toEqual(['a', 'b', 'c', 'y', 'z']);
  });

  it('handles an empty input', () => {
    const report = buildReport([], false, { now: NOW });
    expect(report.totalSessions).toBe(0);
    expect(report.profiles).toEqual([]);
    expect(report.trustedDomainCount).toBe(0);
  });

  it('compares session ids by code unit', () => {
    expect(compareProfiles(empty('B', ''), empty('a', ''))).toBe(-1);
    expect(compareProfiles(empty('a', ''), empty('a', ''))).toBe(0);
  });
});

// ─── Text summary ────────────────────────────────────────────────────

describe('formatTextSummary', () => {
  it('lists sessions with external hosts', () => {
    const lines = formatTextSummary(sampleReport()).split('\n');
    expect(lines[0]).toBe('SESSION LOG ANALYSIS - EXTERNAL CONNECTIONS SUMMARY');
    expect(lines).toContain('Total Sessions Analyzed: 2');
    expect(lines).toContain('Sessions with EXTERNAL Connections: 1');
    expect(lines).toContain('  • *.notebook.windows.net');
    expect(lines).toContain('1. Session: Daily Load (sess-1)');
    expect(lines).toContain('   Workspace: Analytics');
    expect(lines).toContain('   External Connections: 1');
    expect(lines).toContain('   Trusted Connections: 1');
    expect(lines).toContain('   !!! EXTERNAL HOSTS: evil-exfil.io:443');
    expect(lines).toContain('   sess-2 - + TRUSTED ONLY');
    expect(lines).toContain('   Daily Load (sess-1) - ! HAS EXTERNAL');
    expect(lines).toContain('      [pip] requests  (stdout:3)');
    expect(lines).toContain('   Daily Load (sess-1) - DISABLED');
    expect(lines).toContain('      logging.disable  (stdout:4)');
  });

  it('says so when nothing is external', () => {
    const report = buildReport([quietSession()], false, { now: NOW });
    expect(formatTextSummary(report).split('\n')).toContain('+ NO EXTERNAL CONNECTIONS FOUND');
  });
});

// ─── Mermaid ─────────────────────────────────────────────────────────

describe('generateMermaid', () => {
  it('links sessions to their external hosts only', () => {
    const lines = generateMermaid(sampleReport()).split('\n');
    expect(lines.slice(0, 4)).toEqual([
      'graph LR',
      '  s_sess_1["Daily Load<br/>sess-1"]',
      '  h_evil_exfil_io_443(["evil-exfil.io:443"])',
      '  s_sess_1 --> h_evil_exfil_io_443',
    ]);
    expect(lines).toContain('  class h_evil_exfil_io_443 external');
    expect(lines.some(l => l.includes('notebook'))).toBe(false);
  });

  it('draws a placeholder when nothing is external', () => {
    const report = buildReport([quietSession()], false, { now: NOW });
    expect(generateMermaid(report)).toBe('graph LR\n  none["No external connections"]');
  });
});

// ─── Markdown ────────────────────────────────────────────────────────

describe('generateMarkdownReport', () => {
  const lines = generateMarkdownReport(sampleReport()).split('\n');

  it('summarizes counts in a table', () => {
    expect(lines[0]).toBe('# Session Log Security Report');
    expect(lines).toContain('| **Sessions with external connections** | **1** |');
    expect(lines).toContain('| ↳ Logging disabled | 1 |');
  });

  it('tabulates each session', () => {
    expect(lines).toContain('### sess-2');
    expect(lines).toContain('### ⚠ Daily Load (sess-1)');
    expect(lines).toContain('| evil-exfil.io:443 | https | **external** | — | stdout:2 |');
    expect(lines).toContain('| api.fabric.microsoft.com | — | trusted | `api.fabric.microsoft.com` | stdout:1 |');
    expect(lines).toContain('| pip | requests | `pip install requests` | stdout:3 |');
    expect(lines).toContain('- **Logging disabled**');
  });

  it('lists trusted patterns', () => {
    expect(lines).toContain('- `api.fabric.microsoft.com`');
  });
});

// ─── JSON ────────────────────────────────────────────────────────────

describe('serializeReport', () => {
  it('round-trips the report fields', () => {
    const report = buildReport([riskySession()], false, { trustedPatterns: catalog.patterns, now: NOW });
    expect(JSON.parse(serializeReport(report))).toEqual(report);
  });
});
