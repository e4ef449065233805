/**
 * livyscan Bundle — Public API
 */

export { readConsolidatedFile, readSessionSummary, summaryToMetadata, unreadableSession } from './load.js';
export { findSessionDirectories, findLatestConsolidatedFile, CONSOLIDATED_PATTERN } from './discover.js';
export { streamKindForPath } from './streams.js';
export { LogSummarySchema, ConsolidatedFileSchema } from './schema.js';
export type { LogSummary, ConsolidatedFile } from './schema.js';
