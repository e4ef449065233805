/**
 * livyscan — Session aggregator.
 * Merges the events of a session's three streams into one security profile.
 */

import type {
  LogEvent, LoggingConfigChange, PackageInstallCommand, SessionMetadata,
  SessionSecurityProfile, StreamKind, TrustCatalog,
} from '../types/index.js';
import { STREAM_ORDER } from '../types/index.js';
import { classifyConnection } from '../classifier/index.js';
import { ConnectionSet } from './connection-set.js';

export type StreamEvents = Partial<Record<StreamKind, Iterable<LogEvent>>>;

/**
 * Build a profile from per-stream events. Streams are consumed livy, stdout,
 * stderr; install and logging events keep that order and their line order
 * within each stream. A session with no recognisable events still yields
 * a profile, with empty collections.
 */
export function aggregateSession(
  meta: SessionMetadata,
  events: StreamEvents,
  catalog: TrustCatalog,
  warnings: readonly string[] = [],
): SessionSecurityProfile {
  const connections = new ConnectionSet();
  const packageInstalls: PackageInstallCommand[] = [];
  const loggingChanges: LoggingConfigChange[] = [];
  let parseWarnings = 0;

  for (const kind of STREAM_ORDER) {
    const stream = events[kind];
    if (!stream) continue;

    for (const event of stream) {
      switch (event.kind) {
        case 'connection':
          connections.add(classifyConnection(event, catalog));
          break;
        case 'packageInstall':
          packageInstalls.push(event);
          break;
        case 'loggingConfig':
          loggingChanges.push(event);
          break;
        case 'unrecognized':
          parseWarnings++;
          break;
      }
    }
  }

  const retained = connections.values();
  return {
    ...pickMetadata(meta),
    connections: retained,
    packageInstalls,
    loggingChanges,
    hasExternalActivity: retained.some(c => !c.trusted),
    loggingDisabled: loggingChanges.some(l => l.disablesLogging),
    parseWarnings,
    warnings: [...warnings],
  };
}

/** Copy only the metadata fields, dropping streams or anything else a caller passed. */
export function pickMetadata(meta: SessionMetadata): SessionMetadata {
  const picked: SessionMetadata = {
    sessionId: meta.sessionId,
    notebookId: meta.notebookId,
    startTime: meta.startTime,
    status: meta.status,
  };
  if (meta.notebookName !== undefined) picked.notebookName = meta.notebookName;
  if (meta.workspaceId !== undefined) picked.workspaceId = meta.workspaceId;
  if (meta.workspaceName !== undefined) picked.workspaceName = meta.workspaceName;
  if (meta.sparkApplicationId !== undefined) picked.sparkApplicationId = meta.sparkApplicationId;
  if (meta.appUrl !== undefined) picked.appUrl = meta.appUrl;
  return picked;
}
