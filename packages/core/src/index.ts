/**
 * @fileoverview @kindling/core - Main Entry Point
 *
 * In-process application runtime bootstrapper: a component registry with
 * dependency validation, deterministic initialization order and lifetime
 * management on top of a zero-reflection service container.
 *
 * @packageDocumentation
 * @module @kindling/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { createRuntime, createToken } from '@kindling/core';
 *
 * interface IStorage { read(key: string): string | null; }
 * const IStorage = createToken<IStorage>('IStorage');
 *
 * const runtime = createRuntime();
 * runtime.container.registerSingleton(IStorage, MemoryStorage);
 * runtime.registry.register(SaveManager, { priority: 50 });
 * runtime.registry.initializeAll();
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Contracts, identifiers, errors - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Infrastructure Layer Exports
// Container, registry, logging, configuration
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Application Layer Exports
// Runtime composition
// ============================================================================
export * from './application';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
