/**
 * @module @tracewell/core/infrastructure
 * @description Infrastructure layer exports
 */

// ============================================================================
// Logging
// ============================================================================

export * from './logging';

// ============================================================================
// Tracing
// ============================================================================

export * from './tracing';
