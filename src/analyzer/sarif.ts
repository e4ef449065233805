/**
 * livyscan SARIF — Convert session findings to SARIF 2.1.0.
 *
 * Consumed by code-scanning dashboards and SARIF viewers. Each finding
 * points at `<sessionId>/<stream file>`, the layout the log downloader
 * writes, with the line number inside that stream.
 *
 * Results emitted:
 *   1. Connections to endpoints outside the trust catalog
 *   2. Logging configuration changes (disabling ones as errors)
 *   3. Package installs
 */

import type {
  ClassifiedConnection,
  LoggingConfigChange,
  PackageInstallCommand,
  Report,
  SessionSecurityProfile,
  StreamKind,
} from '../types/index.js';
import { STREAM_FILE_NAMES, VERSION } from '../types/index.js';
import { hostLabel } from '../report/hosts.js';

// ─── SARIF 2.1.0 types (subset) ─────────────────────────────────────

export type SarifLevel = 'error' | 'warning' | 'note';

export interface SarifLog {
  $schema: string;
  version: '2.1.0';
  runs: SarifRun[];
}

interface SarifRun {
  tool: {
    driver: {
      name: string;
      version: string;
      rules: SarifRule[];
    };
  };
  results: SarifResult[];
}

interface SarifRule {
  id: string;
  name: string;
  shortDescription: { text: string };
  fullDescription?: { text: string };
  defaultConfiguration: { level: SarifLevel };
}

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations: SarifLocation[];
  properties?: Record<string, unknown>;
}

interface SarifLocation {
  physicalLocation: {
    artifactLocation: { uri: string };
    region: { startLine: number };
  };
}

// ─── Rule definitions ────────────────────────────────────────────────

export const RULE_IDS = {
  externalConnection: 'livyscan/external-connection',
  loggingDisabled: 'livyscan/logging-disabled',
  loggingChange: 'livyscan/logging-change',
  packageInstall: 'livyscan/package-install',
} as const;

const RULES: SarifRule[] = [
  {
    id: RULE_IDS.externalConnection,
    name: 'ExternalConnection',
    shortDescription: { text: 'Session contacted an endpoint outside the trusted catalog' },
    fullDescription: { text: 'A log line references a host that matches no trusted domain pattern. Review whether data left the platform.' },
    defaultConfiguration: { level: 'warning' },
  },
  {
    id: RULE_IDS.loggingDisabled,
    name: 'LoggingDisabled',
    shortDescription: { text: 'Session turned logging off or suppressed it' },
    fullDescription: { text: 'A logging configuration change disables logging or raises the level past errors, which can hide later activity.' },
    defaultConfiguration: { level: 'error' },
  },
  {
    id: RULE_IDS.loggingChange,
    name: 'LoggingChange',
    shortDescription: { text: 'Session changed logging configuration' },
    defaultConfiguration: { level: 'note' },
  },
  {
    id: RULE_IDS.packageInstall,
    name: 'PackageInstall',
    shortDescription: { text: 'Session installed packages at run time' },
    defaultConfiguration: { level: 'note' },
  },
];

const LEVEL_ORDER: Record<SarifLevel, number> = { error: 0, warning: 1, note: 2 };

// ─── Generator ───────────────────────────────────────────────────────

export interface SarifOptions {
  /** Drop results below this level */
  minLevel?: SarifLevel;
}

export function generateSarif(report: Report, options: SarifOptions = {}): SarifLog {
  const minLevel = options.minLevel ?? 'note';
  const results: SarifResult[] = [];

  for (const p of report.profiles) {
    for (const c of p.connections) {
      if (!c.trusted) results.push(connectionResult(p, c));
    }
    for (const l of p.loggingChanges) results.push(loggingResult(p, l));
    for (const i of p.packageInstalls) results.push(installResult(p, i));
  }

  return {
    $schema: 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json',
    version: '2.1.0',
    runs: [{
      tool: {
        driver: {
          name: 'livyscan',
          version: VERSION,
          rules: RULES,
        },
      },
      results: results.filter(r => LEVEL_ORDER[r.level] <= LEVEL_ORDER[minLevel]),
    }],
  };
}

function connectionResult(p: SessionSecurityProfile, c: ClassifiedConnection): SarifResult {
  const scheme = c.scheme ? ` via ${c.scheme}` : '';
  return {
    ruleId: RULE_IDS.externalConnection,
    level: 'warning',
    message: { text: `Session ${p.sessionId} connected to ${hostLabel(c)}${scheme}` },
    locations: [locationFrom(p.sessionId, c.streamKind, c.lineNumber)],
    properties: { ...sessionProperties(p), host: c.host, marker: c.marker },
  };
}

function loggingResult(p: SessionSecurityProfile, l: LoggingConfigChange): SarifResult {
  const disabled = l.disablesLogging;
  return {
    ruleId: disabled ? RULE_IDS.loggingDisabled : RULE_IDS.loggingChange,
    level: disabled ? 'error' : 'note',
    message: { text: `Session ${p.sessionId} ${disabled ? 'disabled logging' : 'changed logging'} (${l.configKeyHint})` },
    locations: [locationFrom(p.sessionId, l.streamKind, l.lineNumber)],
    properties: sessionProperties(p),
  };
}

function installResult(p: SessionSecurityProfile, i: PackageInstallCommand): SarifResult {
  const packages = i.packages.length > 0 ? i.packages.join(', ') : 'unknown packages';
  return {
    ruleId: RULE_IDS.packageInstall,
    level: 'note',
    message: { text: `Session ${p.sessionId} installed ${packages} with ${i.manager}` },
    locations: [locationFrom(p.sessionId, i.streamKind, i.lineNumber)],
    properties: { ...sessionProperties(p), packages: i.packages },
  };
}

// ─── Helpers ─────────────────────────────────────────────────────────

function locationFrom(sessionId: string, stream: StreamKind, line: number): SarifLocation {
  return {
    physicalLocation: {
      artifactLocation: { uri: `${encodeURIComponent(sessionId)}/${STREAM_FILE_NAMES[stream]}` },
      region: { startLine: line },
    },
  };
}

function sessionProperties(p: SessionSecurityProfile): Record<string, unknown> {
  return {
    sessionId: p.sessionId,
    notebookId: p.notebookId,
    ...(p.notebookName ? { notebookName: p.notebookName } : {}),
  };
}
