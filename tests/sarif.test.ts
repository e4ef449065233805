import { describe, it, expect } from 'vitest';
import { generateSarif, RULE_IDS } from '../src/analyzer/index.js';
import { buildReport } from '../src/report/index.js';
import { NOW, quietSession, sampleReport } from './helpers/sessions.js';

describe('generateSarif', () => {
  it('declares every rule', () => {
    const sarif = generateSarif(sampleReport());
    expect(sarif.version).toBe('2.1.0');
    expect(sarif.runs[0]?.tool.driver.rules.map(r => [r.id, r.defaultConfiguration.level])).toEqual([
      [RULE_IDS.externalConnection, 'warning'],
      [RULE_IDS.loggingDisabled, 'error'],
      [RULE_IDS.loggingChange, 'note'],
      [RULE_IDS.packageInstall, 'note'],
    ]);
  });

  it('reports external connections, logging and installs with stream locations', () => {
    const results = generateSarif(sampleReport()).runs[0]?.results ?? [];
    expect(results.map(r => [r.ruleId, r.level, r.locations[0]?.physicalLocation.region.startLine])).toEqual([
      ['livyscan/external-connection', 'warning', 2],
      ['livyscan/logging-disabled', 'error', 4],
      ['livyscan/package-install', 'note', 3],
    ]);
    expect(results[0]).toEqual({
      ruleId: 'livyscan/external-connection',
      level: 'warning',
      message: { text: 'Session sess-1 connected to evil-exfil.io:443 via https' },
      locations: [{
        physicalLocation: {
          artifactLocation: { uri: 'sess-1/driver_stdout.log' },
          region: { startLine: 2 },
        },
      }],
      properties: {
        sessionId: 'sess-1',
        notebookId: 'nb-1',
        notebookName: 'Daily Load',
        host: 'evil-exfil.io',
        marker: 'url',
      },
    });
  });

  it('drops results below the minimum level', () => {
    expect(generateSarif(sampleReport(), { minLevel: 'warning' }).runs[0]?.results).toHaveLength(2);
    expect(generateSarif(sampleReport(), { minLevel: 'error' }).runs[0]?.results.map(r => r.ruleId)).toEqual([
      'livyscan/logging-disabled',
    ]);
  });

  it('emits nothing for trusted-only sessions', () => {
    const report = buildReport([quietSession()], false, { now: NOW });
    expect(generateSarif(report).runs[0]?.results).toEqual([]);
  });
});
