/**
 * Token cleanup shared by the line rules.
 */

/** Quotes, brackets and sentence punctuation that cling to tokens in log text. */
const LEADING_JUNK = /^["'`(<{]+/;
const TRAILING_JUNK = /["'`)>}.,;:!]+$/;

/** Strip quotes and trailing punctuation from a token. */
export function cleanToken(raw: string): string {
  return raw.replace(LEADING_JUNK, '').replace(TRAILING_JUNK, '');
}

/**
 * Parse a port string. Returns undefined for an empty string and null
 * for anything that is not a port number.
 */
export function parsePort(raw: string): number | undefined | null {
  if (raw === '') return undefined;
  if (!/^\d{1,5}$/.test(raw)) return null;
  const port = Number(raw);
  return port >= 1 && port <= 65535 ? port : null;
}

const HOSTNAME = /^[a-z0-9_](?:[a-z0-9_-]*[a-z0-9_])?(?:\.[a-z0-9_](?:[a-z0-9_-]*[a-z0-9_])?)*\.?$/i;
const IPV4 = /^\d{1,3}(?:\.\d{1,3}){3}$/;
const IPV6 = /^[0-9a-f:.]+$/i;

export function isValidHost(host: string, bracketed = false): boolean {
  if (!host || host.length > 253) return false;
  if (bracketed) return host.includes(':') && IPV6.test(host);
  if (IPV4.test(host)) return host.split('.').every(o => Number(o) <= 255);
  return HOSTNAME.test(host);
}

export interface HostPort {
  host: string;
  port?: number;
  bracketed: boolean;
}

/**
 * Split `host[:port]` or `[v6][:port]`. Returns null when the pieces are
 * present but unusable (bad port, stray colons, invalid host).
 */
export function splitHostPort(authority: string): HostPort | null {
  if (authority.startsWith('[')) {
    const close = authority.indexOf(']');
    if (close < 0) return null;
    const host = authority.slice(1, close);
    const rest = authority.slice(close + 1);
    if (rest && !rest.startsWith(':')) return null;
    const port = parsePort(rest.slice(1));
    if (port === null || !isValidHost(host, true)) return null;
    return { host, port, bracketed: true };
  }

  const colons = authority.split(':').length - 1;
  if (colons > 1) return null;
  const [host, portRaw = ''] = authority.split(':');
  const port = parsePort(portRaw);
  if (port === null || !isValidHost(host)) return null;
  return { host, port, bracketed: false };
}

/** `requests-2.31.0` → `requests` (pip's "Successfully installed" format) */
export function stripInstalledVersion(token: string): string {
  return token.replace(/-\d[\w.!+]*$/, '');
}
