/**
 * livyscan — Session sources.
 * Turns downloader summaries into SessionSources whose streams are read
 * only when the pipeline asks for them.
 */

import { readFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import type { LogBundle, RawLogFile, SessionMetadata, SessionSource } from '../types/index.js';
import { STREAM_FILE_NAMES, STREAM_ORDER } from '../types/index.js';
import { BundleFormatError, errorMessage } from '../types/errors.js';
import { ConsolidatedFileSchema, LogSummarySchema, type LogSummary } from './schema.js';
import { streamKindForPath } from './streams.js';

export function summaryToMetadata(summary: LogSummary): SessionMetadata {
  const meta: SessionMetadata = {
    sessionId: summary.livy_id,
    notebookId: summary.notebook_id ?? 'unknown',
    startTime: summary.start_time ?? summary.download_timestamp ?? '',
    status: summary.state ?? 'unknown',
  };
  if (summary.notebook_name) meta.notebookName = summary.notebook_name;
  if (summary.workspace_id) meta.workspaceId = summary.workspace_id;
  if (summary.workspace_name) meta.workspaceName = summary.workspace_name;
  if (summary.spark_application_id) meta.sparkApplicationId = summary.spark_application_id;
  if (summary.app_url) meta.appUrl = summary.app_url;
  return meta;
}

/**
 * Read a consolidated file. Relative stream paths resolve against the
 * file's own directory.
 */
export async function readConsolidatedFile(path: string): Promise<SessionSource[]> {
  const data = await readJson(path, ConsolidatedFileSchema);
  const base = dirname(resolve(path));

  return data.log_summaries.map(summary => {
    const meta = summaryToMetadata(summary);
    const files = summary.downloaded_files.map(f => (isAbsolute(f) ? f : join(base, f)));
    return { meta, load: () => loadStreams(meta, files, true) };
  });
}

/**
 * Read one `log_summary.json`. The downloader's recorded paths point into
 * a temp directory that may have moved, so streams are looked up by file
 * name beside the summary.
 */
export async function readSessionSummary(path: string): Promise<SessionSource> {
  const summary = await readJson(path, LogSummarySchema);
  const meta = summaryToMetadata(summary);
  const dir = dirname(resolve(path));
  const names = new Set<string>(STREAM_ORDER.map(kind => STREAM_FILE_NAMES[kind]));
  for (const f of summary.downloaded_files) names.add(basename(f.replace(/\\/g, '/')));
  const files = [...names].map(name => join(dir, name));
  return { meta, load: () => loadStreams(meta, files, false) };
}

/**
 * Placeholder for a summary that could not be read. The session is named
 * after its directory and loading it rejects with the read error, so the
 * pipeline records it as a failed session.
 */
export function unreadableSession(path: string, error: BundleFormatError): SessionSource {
  const meta: SessionMetadata = {
    sessionId: basename(dirname(resolve(path))),
    notebookId: 'unknown',
    startTime: '',
    status: 'unknown',
  };
  return { meta, load: () => Promise.reject(error) };
}

async function loadStreams(
  meta: SessionMetadata,
  files: readonly string[],
  reportMissing: boolean,
): Promise<LogBundle> {
  const streams: RawLogFile[] = [];
  const warnings: string[] = [];

  for (const file of files) {
    const streamKind = streamKindForPath(file);
    if (!streamKind) {
      warnings.push(`unrecognized stream file ${basename(file)} ignored`);
      continue;
    }
    try {
      const text = await readFile(file, 'utf-8');
      streams.push({ sessionId: meta.sessionId, streamKind, text, path: file });
    } catch (err) {
      if (isNotFound(err) && !reportMissing) continue;
      warnings.push(`could not read ${basename(file)}: ${errorMessage(err)}`);
    }
  }

  return { ...meta, streams, warnings };
}

async function readJson<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.output<T>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new BundleFormatError(`cannot read ${path}: ${errorMessage(err)}`, path, { cause: err });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    throw new BundleFormatError(`${path} is not valid JSON`, path, { cause: err });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new BundleFormatError(`${path} is not a session summary file${where}: ${issue?.message ?? 'invalid'}`, path, { cause: parsed.error });
  }
  return parsed.data;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
