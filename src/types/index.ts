/**
 * livyscan — Core type definitions.
 *
 * Everything the pipeline produces is plain readonly data: a stage never
 * mutates a value after handing it to the next one.
 */

// ─── Streams ─────────────────────────────────────────────────────────

export type StreamKind = 'livy' | 'stdout' | 'stderr';

/** Canonical merge order for a session's streams. */
export const STREAM_ORDER: readonly StreamKind[] = ['livy', 'stdout', 'stderr'];

/** File names the log downloader writes for each stream. */
export const STREAM_FILE_NAMES: Readonly<Record<StreamKind, string>> = {
  livy: 'livy_logs.txt',
  stdout: 'driver_stdout.log',
  stderr: 'driver_stderr.log',
};

export const VERSION = '0.3.0';

export interface RawLogFile {
  sessionId: string;
  streamKind: StreamKind;
  /** Arbitrary, possibly malformed text */
  text: string;
  /** Where the loader read the text from, if it came from disk */
  path?: string;
}

// ─── Bundles ─────────────────────────────────────────────────────────

export interface SessionMetadata {
  sessionId: string;
  notebookId: string;
  startTime: string;
  status: string;
  notebookName?: string;
  workspaceId?: string;
  workspaceName?: string;
  sparkApplicationId?: string;
  /** Monitoring URL for the session */
  appUrl?: string;
}

export interface LogBundle extends SessionMetadata {
  streams: readonly RawLogFile[];
  /** Structural defects found while loading the bundle */
  warnings?: readonly string[];
}

/** A session whose streams have not been read yet. */
export interface SessionSource {
  meta: SessionMetadata;
  load(): Promise<LogBundle>;
}

// ─── Parsed events ───────────────────────────────────────────────────

export type PackageManager = 'pip' | 'conda' | 'other';

interface LineOrigin {
  rawLine: string;
  /** 1-indexed */
  lineNumber: number;
  streamKind: StreamKind;
}

export interface ConnectionReference extends LineOrigin {
  kind: 'connection';
  host: string;
  port?: number;
  scheme?: string;
  /** Part before `@` in the authority, e.g. an ABFS container */
  userInfo?: string;
  /** Detection rule that produced the reference */
  marker: string;
}

export interface PackageInstallCommand extends LineOrigin {
  kind: 'packageInstall';
  manager: PackageManager;
  rawCommand: string;
  packages: string[];
}

export interface LoggingConfigChange extends LineOrigin {
  kind: 'loggingConfig';
  configKeyHint: string;
  /** The line turns logging off or raises the level past errors */
  disablesLogging: boolean;
}

export type UnrecognizedReason = 'no-match' | 'malformed-connection';

export interface Unrecognized extends LineOrigin {
  kind: 'unrecognized';
  reason: UnrecognizedReason;
}

export type LogEvent =
  | ConnectionReference
  | PackageInstallCommand
  | LoggingConfigChange
  | Unrecognized;

// ─── Trust ───────────────────────────────────────────────────────────

export type TrustPatternKind = 'exact' | 'wildcardSuffix' | 'prefix';

export interface TrustPattern {
  pattern: string;
  kind: TrustPatternKind;
}

export interface TrustResult {
  trusted: boolean;
  matched?: TrustPattern;
}

export interface TrustCatalog {
  /** Number of distinct patterns */
  readonly size: number;
  /** Pattern strings, sorted */
  readonly patterns: readonly string[];
  classify(host: string): TrustResult;
}

export interface ClassifiedConnection extends ConnectionReference {
  trusted: boolean;
  matchedPattern?: TrustPattern;
}

// ─── Profiles and report ─────────────────────────────────────────────

export interface SessionSecurityProfile extends SessionMetadata {
  /** Deduplicated by (host, port, scheme), first-seen order */
  connections: readonly ClassifiedConnection[];
  packageInstalls: readonly PackageInstallCommand[];
  loggingChanges: readonly LoggingConfigChange[];
  hasExternalActivity: boolean;
  loggingDisabled: boolean;
  /** Lines no rule could interpret */
  parseWarnings: number;
  /** Structural problems: missing streams, unreadable files, failures */
  warnings: readonly string[];
}

export interface Report {
  generatedAt: string;
  externalOnly: boolean;
  totalSessions: number;
  sessionsWithExternalActivity: number;
  sessionsWithConnections: number;
  sessionsWithPackageInstalls: number;
  sessionsWithLoggingChanges: number;
  sessionsWithDisabledLogging: number;
  trustedDomainCount: number;
  trustedPatterns: readonly string[];
  /** Ordered by startTime, then sessionId */
  profiles: readonly SessionSecurityProfile[];
}
