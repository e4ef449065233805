/**
 * livyscan Aggregator — Public API
 */

export { aggregateSession, pickMetadata } from './aggregate.js';
export type { StreamEvents } from './aggregate.js';
export { buildSessionProfile, failedSessionProfile } from './profile.js';
export { ConnectionSet } from './connection-set.js';
export { defaultPort } from './ports.js';
