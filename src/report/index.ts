/**
 * livyscan — Report exports.
 * Everything here returns strings; writing them out is the caller's job.
 */

export { buildReport, compareProfiles } from './build.js';
export type { ReportContext } from './build.js';
export { formatTextSummary } from './text.js';
export { generateMarkdownReport } from './markdown.js';
export { generateMermaid } from './mermaid.js';
export { serializeReport } from './json.js';
export { hostLabel, externalHosts, sessionTitle } from './hosts.js';
