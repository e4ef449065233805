/**
 * livyscan — Endpoint classifier.
 * Pure: the same reference and catalog always give the same result.
 */

import type { ClassifiedConnection, ConnectionReference, TrustCatalog } from '../types/index.js';

/** Lower-case, drop IPv6 brackets and trailing dots. */
export function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/^\[(.*)\]$/, '$1').replace(/\.+$/, '');
}

export function classifyConnection(ref: ConnectionReference, catalog: TrustCatalog): ClassifiedConnection {
  const host = normalizeHost(ref.host);
  const { trusted, matched } = catalog.classify(host);

  const classified: ClassifiedConnection = {
    kind: 'connection',
    host,
    marker: ref.marker,
    rawLine: ref.rawLine,
    lineNumber: ref.lineNumber,
    streamKind: ref.streamKind,
    trusted,
  };
  if (ref.port !== undefined) classified.port = ref.port;
  if (ref.scheme !== undefined) classified.scheme = ref.scheme;
  if (ref.userInfo !== undefined) classified.userInfo = ref.userInfo;
  if (matched) classified.matchedPattern = matched;
  return classified;
}
