/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @kindling/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Identifiers, lifetimes, descriptors, lifecycle contracts and error classes.
 * The infrastructure layer implements these contracts.
 *
 * ```typescript
 * import { createToken } from '@kindling/core/domain/di';
 *
 * interface IStorage { read(key: string): string | null; }
 * const IStorage = createToken<IStorage>('IStorage');
 *
 * class SaveManager {
 *   static inject = [IStorage] as const;
 *   constructor(private storage: IStorage) {}
 * }
 * ```
 */

// ============================================================================
// Service Identifier
// ============================================================================

export {
  type ServiceIdentifier,
  type ServiceToken,
  type Constructor,
  type AbstractConstructor,
  type IInjectableConstructor,
  isServiceIdentifier,
  isServiceToken,
  isConstructor,
  getServiceName,
  hasInjectProperty,
  getInjectDependencies,
  getDeclaredSignatures,
  createToken,
} from './service-identifier';

// ============================================================================
// Service Lifetime
// ============================================================================

export {
  ServiceLifetime,
  isCacheable,
  isCaptiveDependency,
  getLifetimeName,
} from './service-lifetime';

// ============================================================================
// Service Descriptor
// ============================================================================

export {
  type IServiceDescriptor,
  type ServiceFactory,
  type IServiceResolver,
  validateDescriptor,
} from './service-descriptor';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type IDisposable,
  type IInitializable,
  type IDependencyAware,
  type ILogger,
  type Clock,
  type ResolutionResult,
  type IServiceContainer,
  type IContainerStatistics,
  type IContainerVerification,
  type IImplementationDiscovery,
  isDisposable,
  isInitializable,
  isDependencyAware,
} from './di.interface';

// ============================================================================
// Service Health
// ============================================================================

export {
  ServiceHealthStatus,
  type HealthCheckOutcome,
  type IHealthCheckable,
  type ServiceHealthCheck,
  type HealthReport,
  isHealthCheckable,
} from './service-health';

// ============================================================================
// DI Errors
// ============================================================================

export {
  DIError,
  MissingDependencyError,
  CircularDependencyError,
  UnregisteredServiceError,
  InstanceCreationError,
  ComponentInitializationError,
  RuntimeConfigurationError,
  toError,
} from './di.errors';
