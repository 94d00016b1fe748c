/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer holds the container, the registry and the
 * ambient adapters (logging, configuration).
 *
 * @module @kindling/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// DI - Container, cache and discovery
// ============================================================================
export * from './di';

// ============================================================================
// Registry - Graph validation, ordering and lifecycle
// ============================================================================
export * from './registry';

// ============================================================================
// Logging - winston adapter
// ============================================================================
export * from './logging';

// ============================================================================
// Config - zod-validated runtime options
// ============================================================================
export * from './config';
