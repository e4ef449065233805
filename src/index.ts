/**
 * livyscan — Library entry point.
 *
 * Parse notebook session logs, classify outbound endpoints against a
 * trusted-domain catalog, and summarize each session's security-relevant
 * activity.
 */

export * from './types/index.js';
export { ConfigurationError, BundleFormatError, errorMessage } from './types/errors.js';
export { loadTrustCatalog, parsePattern, DEFAULT_TRUSTED_DOMAINS } from './catalog/index.js';
export { parseLine, parseStream, parseString, iterateLines } from './parser/index.js';
export { classifyConnection, normalizeHost } from './classifier/index.js';
export { aggregateSession, buildSessionProfile, failedSessionProfile, ConnectionSet } from './aggregate/index.js';
export {
  buildReport, formatTextSummary, generateMarkdownReport, generateMermaid, serializeReport,
} from './report/index.js';
export type { ReportContext } from './report/index.js';
export { generateSarif } from './analyzer/index.js';
export type { SarifLog, SarifOptions } from './analyzer/index.js';
export { runPipeline, runPipelineAsync, mapWithConcurrency } from './pipeline/index.js';
export type { PipelineHooks, PipelineOptions, AsyncPipelineOptions } from './pipeline/index.js';
export {
  readConsolidatedFile, readSessionSummary, findSessionDirectories, findLatestConsolidatedFile, streamKindForPath,
} from './bundle/index.js';
export { resolveConfig } from './config/index.js';
export type { ConfigFlags, ResolvedConfig } from './config/index.js';
