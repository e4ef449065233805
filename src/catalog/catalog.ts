/**
 * livyscan — Trust catalog.
 * Holds the trusted-domain patterns used to separate infrastructure traffic
 * from external activity. Immutable once loaded.
 */

import type { TrustCatalog, TrustPattern, TrustPatternKind, TrustResult } from '../types/index.js';
import { ConfigurationError } from '../types/errors.js';

const INVALID_CHARS = /[\s/\\?#@]/;

/**
 * Classify a raw pattern string.
 *   *.example.com → wildcardSuffix (subdomains only)
 *   vm-           → prefix
 *   anything else → exact
 */
export function parsePattern(raw: string): TrustPattern {
  const pattern = raw.trim().toLowerCase().replace(/\.+$/, '');
  if (!pattern || INVALID_CHARS.test(pattern)) {
    throw new ConfigurationError(`Invalid trusted domain pattern: "${raw}"`);
  }

  let kind: TrustPatternKind = 'exact';
  if (pattern.startsWith('*.')) {
    const suffix = pattern.slice(2);
    if (!suffix || suffix.includes('*')) {
      throw new ConfigurationError(`Invalid wildcard pattern: "${raw}"`);
    }
    kind = 'wildcardSuffix';
  } else if (pattern.includes('*')) {
    throw new ConfigurationError(`Wildcards are only allowed as a leading "*.": "${raw}"`);
  } else if (pattern.endsWith('-')) {
    kind = 'prefix';
  }
  return { pattern, kind };
}

/**
 * Build a catalog from pattern strings. Blank entries are skipped and
 * duplicates collapse; an empty result is a configuration error, since it
 * would flag every connection as external.
 */
export function loadTrustCatalog(patterns: readonly string[]): TrustCatalog {
  const byPattern = new Map<string, TrustPattern>();
  for (const raw of patterns) {
    if (!raw.trim()) continue;
    const parsed = parsePattern(raw);
    byPattern.set(parsed.pattern, parsed);
  }

  if (byPattern.size === 0) {
    throw new ConfigurationError('No trusted domains configured: the trust catalog is empty');
  }

  const exact = new Map<string, TrustPattern>();
  const suffixes: TrustPattern[] = [];
  const prefixes: TrustPattern[] = [];
  for (const p of byPattern.values()) {
    if (p.kind === 'exact') exact.set(p.pattern, p);
    else if (p.kind === 'wildcardSuffix') suffixes.push(p);
    else prefixes.push(p);
  }
  // Longest first so `matched` names the most specific pattern
  suffixes.sort(bySpecificity);
  prefixes.sort(bySpecificity);

  const sorted = Object.freeze([...byPattern.keys()].sort());

  function classify(host: string): TrustResult {
    const h = host.trim().toLowerCase().replace(/\.+$/, '');
    if (!h) return { trusted: false };

    const hit = exact.get(h);
    if (hit) return { trusted: true, matched: hit };

    for (const p of suffixes) {
      // "*.a.b" → ".a.b"; the host must carry at least one extra label
      if (h.endsWith(p.pattern.slice(1))) return { trusted: true, matched: p };
    }
    for (const p of prefixes) {
      if (h.startsWith(p.pattern) && h.length > p.pattern.length) return { trusted: true, matched: p };
    }
    return { trusted: false };
  }

  return Object.freeze({
    size: byPattern.size,
    patterns: sorted,
    classify,
  });
}

function bySpecificity(a: TrustPattern, b: TrustPattern): number {
  return b.pattern.length - a.pattern.length || (a.pattern < b.pattern ? -1 : a.pattern > b.pattern ? 1 : 0);
}
