/**
 * livyscan — Pipeline.
 * Bundles in, report out. Sessions are independent: one that throws gets
 * an empty profile carrying the error as a warning and the run goes on.
 * Ordering happens once, in buildReport, after every session is done.
 */

import type {
  LogBundle, Report, SessionSecurityProfile, SessionSource, TrustCatalog,
} from '../types/index.js';
import { buildSessionProfile, failedSessionProfile } from '../aggregate/index.js';
import { buildReport } from '../report/build.js';
import { mapWithConcurrency } from './pool.js';

export interface PipelineHooks {
  onSessionComplete?: (profile: SessionSecurityProfile) => void;
  onSessionFailed?: (sessionId: string, error: unknown) => void;
}

export interface PipelineOptions {
  hooks?: PipelineHooks;
  /** Clock for the report timestamp */
  now?: () => Date;
}

export interface AsyncPipelineOptions extends PipelineOptions {
  externalOnly?: boolean;
  /** Sessions in flight at once (default 4) */
  concurrency?: number;
}

export const DEFAULT_CONCURRENCY = 4;

export function runPipeline(
  bundles: readonly LogBundle[],
  catalog: TrustCatalog,
  externalOnly: boolean,
  options: PipelineOptions = {},
): Report {
  const { hooks = {} } = options;
  const profiles = bundles.map(bundle => {
    try {
      const profile = buildSessionProfile(bundle, catalog);
      hooks.onSessionComplete?.(profile);
      return profile;
    } catch (err) {
      hooks.onSessionFailed?.(bundle.sessionId, err);
      return failedSessionProfile(bundle, err);
    }
  });
  return buildReport(profiles, externalOnly, { trustedPatterns: catalog.patterns, now: options.now });
}

export async function runPipelineAsync(
  sources: readonly SessionSource[],
  catalog: TrustCatalog,
  options: AsyncPipelineOptions = {},
): Promise<Report> {
  const { hooks = {}, externalOnly = false, concurrency = DEFAULT_CONCURRENCY } = options;

  const profiles = await mapWithConcurrency(sources, concurrency, async source => {
    try {
      const bundle = await source.load();
      const profile = buildSessionProfile(bundle, catalog);
      hooks.onSessionComplete?.(profile);
      return profile;
    } catch (err) {
      hooks.onSessionFailed?.(source.meta.sessionId, err);
      return failedSessionProfile(source.meta, err);
    }
  });

  return buildReport(profiles, externalOnly, { trustedPatterns: catalog.patterns, now: options.now });
}
