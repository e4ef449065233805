/**
 * livyscan Parser — Public API
 */

export { parseStream, parseString } from './parse-stream.js';
export { parseLine } from './parse-line.js';
export { iterateLines } from './lines.js';
export type { SourceLine } from './lines.js';
