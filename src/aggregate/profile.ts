/**
 * livyscan — Bundle to profile.
 * Parses each stream of a LogBundle and aggregates the result, recording
 * structural defects as warnings on the session instead of failing.
 */

import type {
  LogBundle, RawLogFile, SessionMetadata, SessionSecurityProfile, StreamKind, TrustCatalog,
} from '../types/index.js';
import { STREAM_ORDER } from '../types/index.js';
import { errorMessage } from '../types/errors.js';
import { parseStream } from '../parser/index.js';
import { aggregateSession, pickMetadata, type StreamEvents } from './aggregate.js';

export function buildSessionProfile(bundle: LogBundle, catalog: TrustCatalog): SessionSecurityProfile {
  const warnings: string[] = [...(bundle.warnings ?? [])];
  const byKind = new Map<StreamKind, RawLogFile>();

  for (const file of bundle.streams) {
    if (file.sessionId !== bundle.sessionId) {
      warnings.push(`${file.streamKind} stream belongs to session ${file.sessionId}; ignored`);
      continue;
    }
    if (byKind.has(file.streamKind)) {
      warnings.push(`duplicate ${file.streamKind} stream ignored`);
      continue;
    }
    byKind.set(file.streamKind, file);
  }

  const events: StreamEvents = {};
  for (const kind of STREAM_ORDER) {
    const file = byKind.get(kind);
    if (file) events[kind] = parseStream(file);
    else warnings.push(`missing ${kind} stream`);
  }

  return aggregateSession(bundle, events, catalog, warnings);
}

/** Empty profile for a session whose processing failed outright. */
export function failedSessionProfile(meta: SessionMetadata, error: unknown): SessionSecurityProfile {
  return {
    ...pickMetadata(meta),
    connections: [],
    packageInstalls: [],
    loggingChanges: [],
    hasExternalActivity: false,
    loggingDisabled: false,
    parseWarnings: 0,
    warnings: [`session processing failed: ${errorMessage(error)}`],
  };
}
