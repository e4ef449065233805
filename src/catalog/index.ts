/**
 * livyscan Trust Catalog — Public API
 */

export { loadTrustCatalog, parsePattern } from './catalog.js';
export { DEFAULT_TRUSTED_DOMAINS } from './defaults.js';
