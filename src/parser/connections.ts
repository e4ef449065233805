/**
 * livyscan — Endpoint extraction.
 * Finds the network endpoints a log line refers to: URL-like substrings,
 * bare host[:port] after connection phrases, and Azure storage hostnames.
 */

import { cleanToken, splitHostPort, type HostPort } from './normalize.js';

export interface Endpoint {
  host: string;
  port?: number;
  scheme?: string;
  userInfo?: string;
  marker: string;
}

export interface EndpointScan {
  endpoints: Endpoint[];
  /** A connection token was found but its host or port was unusable */
  malformed: number;
}

// ─── Rules ───────────────────────────────────────────────────────────

// Optional jdbc: prefix keeps the driver in the scheme (jdbc:postgresql)
const URL_START = /(jdbc:)?\b([a-z][a-z0-9+.-]*):\/\//gi;

// Characters that end a URL authority
const AUTHORITY_END = /[\s/?#"'`<>(){}|\\,;]/;

const PHRASE_MARKERS = String.raw`established connection to|connecting to|connected to|connection to|remote address|destination|target|bootstrap\.servers|kafka`;
const PHRASE = new RegExp(String.raw`\b(${PHRASE_MARKERS})\b[\s:=]+["']?([^\s"',;()]+)`, 'gi');

// HTTP verbs are matched case-sensitively: "GET" is a request, "get" is prose
const HTTP_VERB = /\b(GET|POST|PUT|PATCH|DELETE|HEAD) +["']?([^\s"',;()]+)/g;

// Markers that also appear in prose ("Python target: 3.10"); only host:port counts
const PORT_REQUIRED = new Set(['target', 'destination', 'remote address', 'kafka']);

// All-numeric dotted tokens are versions or sizes unless they form an IPv4 address
const NUMERIC_HOST = /^\d+(?:\.\d+)*$/;
const DOTTED_QUAD = /^\d{1,3}(?:\.\d{1,3}){3}$/;

const STORAGE_HOST = /\b([a-z0-9]{3,24}\.(?:dfs|blob|table|queue)\.core\.windows\.net)\b/gi;

// Java-style "hostname/10.0.0.4:7337"
const JAVA_ADDRESS = /^([^/]+)\/(\d{1,3}(?:\.\d{1,3}){3}):(\d+)$/;
// Netty-style "/10.0.0.4:7337"
const LEADING_SLASH_IP = /^\/\d{1,3}(?:\.\d{1,3}){3}:\d+/;

// ─── Scanner ─────────────────────────────────────────────────────────

export function scanEndpoints(line: string): EndpointScan {
  const endpoints: Endpoint[] = [];
  const seen = new Set<string>();
  let malformed = 0;

  const add = (e: Endpoint) => {
    const key = `${e.host.toLowerCase()}|${e.port ?? ''}|${e.scheme ?? ''}|${e.userInfo ?? ''}`;
    if (seen.has(key)) return;
    seen.add(key);
    endpoints.push(e);
  };

  // 1. URL-like substrings
  for (const m of line.matchAll(URL_START)) {
    const scheme = (m[1] ?? '') + m[2];
    const start = (m.index ?? 0) + m[0].length;
    const authority = readAuthority(line, start);
    if (!authority) continue; // file:///..., no network endpoint

    const at = authority.lastIndexOf('@');
    // Keep the user/container name, never a password
    const userInfo = at >= 0 ? authority.slice(0, at).split(':')[0] : undefined;
    const hostPort = splitHostPort(trimAuthority(authority.slice(at + 1)));
    if (!hostPort) {
      malformed++;
      continue;
    }
    add(toEndpoint(hostPort, 'url', scheme.toLowerCase(), userInfo || undefined));
  }

  // 2. Bare host[:port] after a connection phrase or HTTP verb
  for (const m of [...line.matchAll(PHRASE), ...line.matchAll(HTTP_VERB)]) {
    const candidate = m[2];
    if (candidate.includes('://')) continue;
    if (candidate.startsWith('/') && !LEADING_SLASH_IP.test(candidate)) continue;
    const marker = m[1].toLowerCase();
    const result = parseBareCandidate(candidate, PORT_REQUIRED.has(marker));
    if (result === null) {
      malformed++;
      continue;
    }
    if (result === undefined) continue;
    add(toEndpoint(result, marker));
  }

  // 3. Azure storage account hostnames not already covered by a URL
  for (const m of line.matchAll(STORAGE_HOST)) {
    const host = m[1];
    const lower = host.toLowerCase();
    if (endpoints.some(e => e.host.toLowerCase() === lower)) continue;
    add({ host, marker: 'storage-host' });
  }

  return { endpoints, malformed };
}

// ─── Helpers ─────────────────────────────────────────────────────────

function readAuthority(line: string, start: number): string {
  let end = start;
  while (end < line.length && !AUTHORITY_END.test(line[end])) end++;
  return line.slice(start, end);
}

/** Drop trailing sentence punctuation without eating an IPv6 bracket. */
function trimAuthority(authority: string): string {
  return authority.replace(/[.,:;!]+$/, '');
}

/**
 * Parse a bare candidate. Returns undefined when the token is plainly not
 * an endpoint (a single word or a version number with no port), null when
 * it is malformed.
 */
function parseBareCandidate(raw: string, requirePort: boolean): HostPort | null | undefined {
  const token = cleanToken(raw).replace(/^\/(?=\d)/, '');
  if (!token) return undefined;

  const java = token.match(JAVA_ADDRESS);
  if (java) return splitHostPort(`${java[1]}:${java[3]}`);

  const authority = token.split(/[/?#]/)[0];
  const hostPort = splitHostPort(authority);
  if (!hostPort) return null;
  const { host, port } = hostPort;
  if (port !== undefined) return hostPort;
  if (requirePort) return undefined;
  if (NUMERIC_HOST.test(host) && !DOTTED_QUAD.test(host)) return undefined;
  if (!host.includes('.') && !host.includes(':') && host.toLowerCase() !== 'localhost') return undefined;
  return hostPort;
}

function toEndpoint(hp: HostPort, marker: string, scheme?: string, userInfo?: string): Endpoint {
  const e: Endpoint = { host: hp.host, marker };
  if (hp.port !== undefined) e.port = hp.port;
  if (scheme) e.scheme = scheme;
  if (userInfo) e.userInfo = userInfo;
  return e;
}
