/**
 * livyscan — Input discovery.
 * Locates downloader output on disk with fast-glob.
 */

import fg from 'fast-glob';
import { existsSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import type { SessionSource } from '../types/index.js';
import { BundleFormatError } from '../types/errors.js';
import { readSessionSummary, unreadableSession } from './load.js';

export const CONSOLIDATED_PATTERN = 'consolidated_spark_logs_*.json';

const DEFAULT_EXCLUDE = ['**/node_modules/**', '**/.git/**'];

/**
 * One SessionSource per `log_summary.json` found below `root`. A summary
 * that cannot be read still yields a source, one that fails on load.
 */
export async function findSessionDirectories(root: string): Promise<SessionSource[]> {
  const files = await fg('**/log_summary.json', {
    cwd: root,
    ignore: DEFAULT_EXCLUDE,
    absolute: true,
    dot: true,
  });
  files.sort();
  return Promise.all(files.map(async file => {
    try {
      return await readSessionSummary(file);
    } catch (err) {
      if (err instanceof BundleFormatError) return unreadableSession(file, err);
      throw err;
    }
  }));
}

/**
 * Newest consolidated file in the first directory that has one. The
 * downloader stamps names with `YYYYMMDD_HHMMSS`, so the greatest name
 * is the latest run.
 */
export async function findLatestConsolidatedFile(dirs: readonly string[]): Promise<string | undefined> {
  for (const dir of dirs) {
    const cwd = resolve(dir);
    if (!existsSync(cwd)) continue;
    const files = await fg(CONSOLIDATED_PATTERN, { cwd, absolute: true, onlyFiles: true });
    if (files.length === 0) continue;
    return files.reduce((latest, f) => (basename(f) > basename(latest) ? f : latest));
  }
  return undefined;
}
