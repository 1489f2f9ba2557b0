/**
 * @fileoverview @tracewell/core - Transactional Tracing Core
 * @description
 * Tracing contracts keyed by transaction and checkpoint, an
 * AsyncLocalStorage transaction context, and two closed exception
 * taxonomies for business-logic applications.
 *
 * ## Architecture Layers
 *
 * - **Domain**: transaction context, domain exceptions, external
 *   interaction errors, exception filters
 * - **Infrastructure**: logger factory, tracer contracts and backends
 *
 * @packageDocumentation
 * @module @tracewell/core
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

/**
 * Transaction context, exception taxonomies and exception filters.
 */
export * from './domain';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

/**
 * Logging and tracing.
 */
export * from './infrastructure';

// ==================== Version ====================
export const VERSION = '1.0.0';
