import type { ClassifiedConnection } from '../types/index.js';

/** `host` or `host:port`, as the summaries print endpoints. */
export function hostLabel(c: ClassifiedConnection): string {
  const host = c.host.includes(':') ? `[${c.host}]` : c.host;
  return c.port !== undefined ? `${host}:${c.port}` : host;
}

/** Sorted distinct endpoint labels of the external connections. */
export function externalHosts(connections: readonly ClassifiedConnection[]): string[] {
  return [...new Set(connections.filter(c => !c.trusted).map(hostLabel))].sort();
}

export function sessionTitle(p: { sessionId: string; notebookName?: string }): string {
  return p.notebookName ? `${p.notebookName} (${p.sessionId})` : p.sessionId;
}
