/**
 * livyscan — Mermaid diagram generator.
 *
 * One node per session with external activity, one node per external
 * endpoint, an edge for each contact. Trusted endpoints are left out so
 * the graph shows only what needs review.
 */

import type { Report } from '../types/index.js';
import { externalHosts } from './hosts.js';

/** Sanitize for Mermaid node IDs */
function nid(prefix: string, name: string): string {
  return `${prefix}_${name.replace(/[^a-zA-Z0-9_]/g, '_')}`;
}

/** Escape for Mermaid labels */
function esc(s: string): string {
  return s.replace(/"/g, '#quot;').replace(/\n/g, ' ');
}

function trunc(s: string, max = 30): string {
  return s.length <= max ? s : s.slice(0, max - 1) + '…';
}

export function generateMermaid(report: Report): string {
  const lines: string[] = ['graph LR'];
  const sessions = report.profiles.filter(p => p.hasExternalActivity);

  if (sessions.length === 0) {
    lines.push('  none["No external connections"]');
    return lines.join('\n');
  }

  const hostIds = new Map<string, string>();
  const edges: string[] = [];

  for (const p of sessions) {
    const sid = nid('s', p.sessionId);
    const label = p.notebookName ? `${trunc(p.notebookName)}<br/>${p.sessionId}` : p.sessionId;
    lines.push(`  ${sid}["${esc(label)}"]`);
    for (const host of externalHosts(p.connections)) {
      let hid = hostIds.get(host);
      if (!hid) {
        hid = nid('h', host);
        hostIds.set(host, hid);
      }
      edges.push(`  ${sid} --> ${hid}`);
    }
  }

  for (const [host, hid] of hostIds) {
    lines.push(`  ${hid}(["${esc(host)}"])`);
  }
  lines.push(...edges);

  lines.push('  classDef session fill:#e8f0fe,stroke:#4a6fa5');
  lines.push('  classDef external fill:#fdecea,stroke:#c0392b');
  lines.push(`  class ${sessions.map(p => nid('s', p.sessionId)).join(',')} session`);
  lines.push(`  class ${[...hostIds.values()].join(',')} external`);

  return lines.join('\n');
}
