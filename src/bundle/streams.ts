import { basename } from 'node:path';
import type { StreamKind } from '../types/index.js';

/** Stream a downloaded file holds, judged by its name. */
export function streamKindForPath(path: string): StreamKind | undefined {
  const name = basename(path.replace(/\\/g, '/')).toLowerCase();
  if (name.startsWith('livy')) return 'livy';
  if (name.includes('stdout')) return 'stdout';
  if (name.includes('stderr')) return 'stderr';
  return undefined;
}
