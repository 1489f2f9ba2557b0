/**
 * @module @tracewell/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Transaction Context
// ============================================================================

export * from './context';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
