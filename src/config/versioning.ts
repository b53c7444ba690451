/**
 * Versioning constants for cache invalidation
 *
 * When these versions change, cached entries become invalid automatically.
 * Increment CACHE_SCHEMA_VERSION when a formula or the MetricResult shape changes.
 */

/**
 * Cache schema version - part of every fingerprint and every stored entry
 *
 * Examples of changes requiring increment:
 * - A formula's calculation logic changes
 * - Metadata keys are renamed or restructured
 * - DNF or season-floor semantics change
 */
export const CACHE_SCHEMA_VERSION = '2';

/** Reported by /health and the API index */
export const API_VERSION = '1.0.0';
