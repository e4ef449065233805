/**
 * livyscan Analyzer — exports.
 * SARIF generation is a pure transformation; callers write the file.
 */

export { generateSarif, RULE_IDS } from './sarif.js';
export type { SarifLog, SarifLevel, SarifOptions, SarifResult } from './sarif.js';
