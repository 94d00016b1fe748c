/**
 * @fileoverview DI Interfaces - Core Runtime Contracts
 *
 * @packageDocumentation
 * @module @kindling/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the contracts shared by the container, the component
 * registry and the components they manage. They describe WHAT the runtime
 * does, not HOW.
 *
 * ## Component Lifecycle
 *
 * ```
 * register ──▶ construct ──▶ initialize() ──▶ onDependenciesResolved() ──▶ dispose()
 * ```
 *
 * Every hook is optional and synchronous.
 *
 * @version 1.0.0
 */

import {
  type IServiceDescriptor,
  type IServiceResolver,
  type ServiceFactory,
} from './service-descriptor';
import { type ServiceIdentifier, type Constructor } from './service-identifier';
import { type ServiceLifetime } from './service-lifetime';

// ============================================================================
// Lifecycle Hooks
// ============================================================================

/**
 * Interface for components that release resources on teardown.
 *
 * @remarks
 * Called in reverse initialization order by the registry and for every
 * stored singleton by the container. Should be idempotent.
 */
export interface IDisposable {
  dispose(): void;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' && obj !== null && 'dispose' in obj && typeof obj.dispose === 'function'
  );
}

/**
 * Components with a setup step that runs after construction.
 */
export interface IInitializable {
  initialize(): void;
}

export function isInitializable(obj: unknown): obj is IInitializable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'initialize' in obj &&
    typeof obj.initialize === 'function'
  );
}

/**
 * Components notified once all of their dependencies exist.
 *
 * @example
 * ```typescript
 * class EconomyManager implements IDependencyAware {
 *   onDependenciesResolved(): void {
 *     this.prices = this.market.snapshot();
 *   }
 * }
 * ```
 */
export interface IDependencyAware {
  onDependenciesResolved(): void;
}

export function isDependencyAware(obj: unknown): obj is IDependencyAware {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'onDependenciesResolved' in obj &&
    typeof obj.onDependenciesResolved === 'function'
  );
}

// ============================================================================
// Logging Port
// ============================================================================

/**
 * Narrow logging port every runtime component takes through its constructor.
 *
 * @remarks
 * The infrastructure layer adapts winston to this shape; tests pass spies.
 */
export interface ILogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Millisecond clock. Defaults to `Date.now`; tests inject a fake.
 */
export type Clock = () => number;

// ============================================================================
// Resolution Result
// ============================================================================

/**
 * Outcome of a resolution that does not throw.
 */
export type ResolutionResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: Error };

// ============================================================================
// Discovery Port
// ============================================================================

/**
 * Best-effort lookup of an implementation for a type nobody registered.
 *
 * @remarks
 * "Not found" is `null`, never an error.
 */
export interface IImplementationDiscovery {
  tryDiscover<T>(type: ServiceIdentifier<T>): T | null;
}

// ============================================================================
// IServiceContainer - Registration and Resolution
// ============================================================================

/**
 * IServiceContainer - Register and resolve services.
 *
 * @remarks
 * **Resolution Algorithm:**
 *
 * ```
 * resolve(identifier)
 *   0. On the resolution stack already -> CircularDependencyError
 *   1. Stored singleton -> return it
 *   2. Registered factory -> invoke it (never stored)
 *   3. Registration, else discovery, else UnregisteredServiceError
 *   4. Pre-built instance on the registration -> return it
 *   5. Construct (most parameters first, then fewer, then none)
 *   6. Singleton lifetime -> store the new instance
 * ```
 *
 * @example
 * ```typescript
 * container.registerSingleton(TimeManager);
 * container.registerTransient(PathfindingJob);
 * container.registerFactory(IRandom, () => new SeededRandom(7));
 *
 * const time = container.resolve(TimeManager);
 * const maybeSave = container.tryResolve(SaveManager); // null when unavailable
 * ```
 */
export interface IServiceContainer extends IServiceResolver {
  register<T>(
    identifier: ServiceIdentifier<T>,
    implementationType: Constructor<T> | undefined,
    lifetime: ServiceLifetime,
    instance?: T,
    factory?: ServiceFactory<T>,
  ): void;

  registerSingleton<T>(implementation: Constructor<T>): void;
  registerSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): void;
  /**
   * Register an existing object as the singleton; same as `registerInstance`.
   */
  registerSingleton<T extends object>(identifier: ServiceIdentifier<T>, instance: T): void;

  registerInstance<T>(identifier: ServiceIdentifier<T>, instance: T): void;

  registerTransient<T>(implementation: Constructor<T>): void;
  registerTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): void;

  registerFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): void;

  resolveResult<T>(identifier: ServiceIdentifier<T>): ResolutionResult<T>;

  /**
   * Resolve every registration for an identifier (zero or one).
   */
  resolveAll<T>(identifier: ServiceIdentifier<T>): T[];

  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Remove a registration, its factory and its stored singleton.
   *
   * @returns true if anything was removed
   */
  unregister(identifier: ServiceIdentifier): boolean;

  getRegistrations(): readonly IServiceDescriptor[];

  readonly serviceCount: number;
  readonly singletonCount: number;

  /**
   * Drop every registration and stored instance without running hooks.
   */
  clear(): void;

  /**
   * Dispose stored singletons, then clear.
   */
  dispose(): void;
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Snapshot of container activity.
 */
export interface IContainerStatistics {
  readonly totalServices: number;
  readonly singletonServices: number;
  readonly transientServices: number;
  readonly factoryServices: number;
  readonly storedSingletons: number;
  readonly totalResolutions: number;
  readonly successfulResolutions: number;
  readonly failedResolutions: number;
  /**
   * Percentage (0-100). 0 before any resolution.
   */
  readonly successRate: number;
  /**
   * Up to five names, most resolved first.
   */
  readonly mostResolved: readonly { readonly name: string; readonly count: number }[];
}

/**
 * Result of verifying the container's registrations.
 */
export interface IContainerVerification {
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly servicesValidated: number;
  /**
   * One line, e.g. `Validation: PASSED | Errors: 0 | Warnings: 1`.
   */
  readonly summary: string;
}
