/**
 * livyscan — Line-level event parser.
 * Maps a single log line to exactly one LogEvent variant.
 *
 * Priority: package install, logging change, connection, unrecognized.
 * A connection line yields one ConnectionReference per distinct endpoint.
 */

import type { LogEvent, StreamKind } from '../types/index.js';
import { scanEndpoints } from './connections.js';
import { matchLoggingChange } from './logging.js';
import { matchPackageInstall } from './packages.js';

export function parseLine(line: string, lineNumber: number, streamKind: StreamKind): LogEvent[] {
  const rawLine = line.trim();
  const origin = { rawLine, lineNumber, streamKind };

  const install = matchPackageInstall(rawLine);
  if (install) {
    return [{ kind: 'packageInstall', ...origin, ...install }];
  }

  const logging = matchLoggingChange(rawLine);
  if (logging) {
    return [{ kind: 'loggingConfig', ...origin, ...logging }];
  }

  const { endpoints, malformed } = scanEndpoints(rawLine);
  if (endpoints.length > 0) {
    return endpoints.map(e => ({ kind: 'connection' as const, ...origin, ...e }));
  }

  return [{
    kind: 'unrecognized',
    ...origin,
    reason: malformed > 0 ? 'malformed-connection' : 'no-match',
  }];
}
