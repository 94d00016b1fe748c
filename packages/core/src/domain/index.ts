/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the runtime's contracts and value types.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @kindling/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// DI - Identifiers, lifetimes, contracts and errors
// ============================================================================
export * from './di';

// ============================================================================
// Registry - Component registration and graph diagnostics
// ============================================================================
export * from './registry';
