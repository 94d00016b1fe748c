/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete container, cache and discovery implementations. Use these in the
 * application's composition root, or let `createRuntime` wire them.
 *
 * ```typescript
 * import { ServiceContainer } from '@kindling/core/infrastructure/di';
 *
 * const container = new ServiceContainer();
 * container.registerSingleton(TimeManager);
 * container.registerFactory(IRandom, () => new SeededRandom(7));
 *
 * const time = container.resolve(TimeManager);
 * ```
 */

// ============================================================================
// ServiceContainer - Registration and Resolution
// ============================================================================

export { ServiceContainer, type ServiceContainerOptions } from './service-container';

// ============================================================================
// Constructor Selection
// ============================================================================

export { rankSignatures, allowsZeroArgs, constructInstance } from './constructor-selection';

// ============================================================================
// ResolutionCache - Time-bounded instances
// ============================================================================

export {
  ResolutionCache,
  type ResolutionCacheOptions,
  type ResolutionCacheStats,
} from './resolution-cache';

// ============================================================================
// Discovery
// ============================================================================

export { ImplementationCatalog, type CatalogEntryOptions } from './discovery';

// ============================================================================
// Health Monitoring
// ============================================================================

export { ServiceHealthMonitor, type ServiceHealthMonitorOptions } from './service-health-monitor';
