/**
 * @fileoverview ServiceContainer - Core Dependency Resolution Engine
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements registration and resolution of services, including
 * singleton storage, factory delegation, multi-signature constructor
 * injection and circular dependency detection.
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolve(identifier)
 *   0. Identifier already on the resolution stack -> CircularDependencyError
 *   1. Stored singleton -> return it
 *   2. Registered factory -> invoke with this container as resolver
 *   3. Registration, else discovery, else UnregisteredServiceError
 *   4. Pre-built instance -> return it
 *   5. Construct through the best satisfiable signature
 *   6. Singleton lifetime -> store
 * ```
 *
 * The resolution stack is shared by re-entrant calls (a factory resolving
 * other services) and is empty again after every top-level call.
 *
 * @version 1.0.0
 */

import {
  type Clock,
  type Constructor,
  type IContainerStatistics,
  type IContainerVerification,
  type IImplementationDiscovery,
  type ILogger,
  type IServiceContainer,
  type IServiceDescriptor,
  type ResolutionResult,
  type ServiceFactory,
  type ServiceIdentifier,
  CircularDependencyError,
  InstanceCreationError,
  ServiceLifetime,
  UnregisteredServiceError,
  getServiceName,
  isCacheable,
  isCaptiveDependency,
  getLifetimeName,
  isConstructor,
  isDisposable,
  toError,
  validateDescriptor,
} from '../../domain/di';
import { findFirstCycle } from '../registry/dependency-resolver';
import { getDefaultLogger } from '../logging';

import { constructInstance, rankSignatures } from './constructor-selection';

/**
 * A function argument is taken as the class to construct; anything else is
 * a ready instance.
 */
function isImplementationClass<T>(value: Constructor<T> | T): value is Constructor<T> {
  return typeof value === 'function';
}

export interface ServiceContainerOptions {
  logger?: ILogger;
  clock?: Clock;
  /**
   * Consulted when a type has no registration. `null` disables discovery.
   */
  discovery?: IImplementationDiscovery | null;
}

/**
 * ServiceContainer - IServiceContainer implementation.
 *
 * @remarks
 * **Lifecycle Management:**
 *
 * - Singleton: stored in `singletons` on first resolution
 * - Transient: constructed on every resolution
 * - Factory: the factory runs on every resolution; nothing is stored
 *
 * Registrations and stored singletons are keyed by the identifier value.
 *
 * @example
 * ```typescript
 * const container = new ServiceContainer();
 *
 * container.registerInstance(ILogger, logger);
 * container.registerTransient(PathfindingJob);
 *
 * const a = container.resolve(PathfindingJob);
 * const b = container.resolve(PathfindingJob);
 * a !== b; // true
 * ```
 */
export class ServiceContainer implements IServiceContainer {
  private readonly descriptors = new Map<ServiceIdentifier, IServiceDescriptor>();
  private readonly singletons = new Map<ServiceIdentifier, unknown>();
  private readonly resolutionStack: ServiceIdentifier[] = [];

  private readonly logger: ILogger;
  private readonly clock: Clock;
  private readonly discovery: IImplementationDiscovery | null;

  private totalResolutions = 0;
  private successfulResolutions = 0;
  private readonly resolveCounts = new Map<string, number>();

  constructor(options: ServiceContainerOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger('ServiceContainer');
    this.clock = options.clock ?? Date.now;
    this.discovery = options.discovery ?? null;
  }

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Register a service.
   *
   * @remarks
   * Re-registering an identifier replaces the previous registration and
   * drops its stored singleton.
   */
  register<T>(
    identifier: ServiceIdentifier<T>,
    implementationType: Constructor<T> | undefined,
    lifetime: ServiceLifetime,
    instance?: T,
    factory?: ServiceFactory<T>,
    dependencies?: readonly ServiceIdentifier[],
  ): void {
    const name = getServiceName(identifier);

    if (this.descriptors.has(identifier)) {
      this.logger.debug('Replacing registration', { service: name });
      this.singletons.delete(identifier);
    }

    const descriptor: IServiceDescriptor<T> = {
      serviceIdentifier: identifier,
      lifetime: factory ? ServiceLifetime.Factory : lifetime,
      implementationType,
      instance,
      factory,
      dependencies: dependencies ? Object.freeze([...dependencies]) : undefined,
      registeredAt: this.clock(),
    };
    this.descriptors.set(identifier, descriptor);

    if (instance !== undefined && instance !== null) {
      this.singletons.set(identifier, instance);
    }

    this.logger.debug('Registered service', { service: name, lifetime: descriptor.lifetime });
  }

  registerSingleton<T>(implementation: Constructor<T>): void;
  registerSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): void;
  registerSingleton<T extends object>(identifier: ServiceIdentifier<T>, instance: T): void;
  registerSingleton<T>(
    identifierOrImpl: ServiceIdentifier<T>,
    implementationOrInstance?: Constructor<T> | (T & {}),
  ): void {
    if (implementationOrInstance !== undefined && !isImplementationClass(implementationOrInstance)) {
      this.registerInstance(identifierOrImpl, implementationOrInstance);
      return;
    }
    this.register(
      identifierOrImpl,
      this.implementationFor(identifierOrImpl, implementationOrInstance),
      ServiceLifetime.Singleton,
    );
  }

  registerInstance<T>(identifier: ServiceIdentifier<T>, instance: T): void {
    this.register(identifier, undefined, ServiceLifetime.Singleton, instance);
  }

  registerTransient<T>(implementation: Constructor<T>): void;
  registerTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): void;
  registerTransient<T>(
    identifierOrImpl: ServiceIdentifier<T>,
    implementation?: Constructor<T>,
  ): void {
    this.register(
      identifierOrImpl,
      this.implementationFor(identifierOrImpl, implementation),
      ServiceLifetime.Transient,
    );
  }

  registerFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>): void {
    this.register(identifier, undefined, ServiceLifetime.Factory, undefined, factory);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.descriptors.has(identifier);
  }

  hasSingletonInstance(identifier: ServiceIdentifier): boolean {
    return this.singletons.has(identifier);
  }

  unregister(identifier: ServiceIdentifier): boolean {
    const removedDescriptor = this.descriptors.delete(identifier);
    const removedInstance = this.singletons.delete(identifier);
    return removedDescriptor || removedInstance;
  }

  getRegistrations(): readonly IServiceDescriptor[] {
    return Object.freeze([...this.descriptors.values()]);
  }

  get serviceCount(): number {
    return this.descriptors.size;
  }

  get singletonCount(): number {
    return this.singletons.size;
  }

  // ============================================================================
  // Resolution
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    const result = this.resolveResult(identifier);
    if (!result.success) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Resolve a service, returning `null` on any failure.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | null {
    const result = this.resolveResult(identifier);
    return result.success ? result.value : null;
  }

  resolveAll<T>(identifier: ServiceIdentifier<T>): T[] {
    const service = this.tryResolve(identifier);
    return service !== null ? [service] : [];
  }

  /**
   * Resolve without throwing. `resolve` and `tryResolve` both wrap this.
   */
  resolveResult<T>(identifier: ServiceIdentifier<T>): ResolutionResult<T> {
    const topLevel = this.resolutionStack.length === 0;
    if (topLevel) {
      this.totalResolutions++;
    }

    try {
      const value = this.resolveInternal(identifier);
      if (topLevel) {
        this.successfulResolutions++;
        const name = getServiceName(identifier);
        this.resolveCounts.set(name, (this.resolveCounts.get(name) ?? 0) + 1);
      }
      return { success: true, value };
    } catch (error) {
      const failure = toError(error);
      if (topLevel) {
        this.logger.debug('Resolution failed', {
          service: getServiceName(identifier),
          error: failure.message,
        });
      }
      return { success: false, error: failure };
    }
  }

  private resolveInternal<T>(identifier: ServiceIdentifier<T>): T {
    const path = this.resolutionStack.map((entry) => getServiceName(entry));

    // Check for circular dependency
    const cycleStart = this.resolutionStack.indexOf(identifier);
    if (cycleStart !== -1) {
      const cycle = [...this.resolutionStack.slice(cycleStart), identifier];
      throw new CircularDependencyError(cycle, [...path, `${getServiceName(identifier)} (CIRCULAR!)`]);
    }

    this.resolutionStack.push(identifier);
    try {
      if (this.singletons.has(identifier)) {
        return this.singletons.get(identifier) as T;
      }

      const descriptor = this.descriptors.get(identifier) as IServiceDescriptor<T> | undefined;

      if (descriptor?.factory) {
        return this.invokeFactory(identifier, descriptor.factory, path);
      }

      if (!descriptor) {
        const discovered = this.discovery?.tryDiscover(identifier) ?? null;
        if (discovered !== null) {
          return discovered;
        }
        throw new UnregisteredServiceError(identifier, path);
      }

      if (descriptor.instance !== undefined && descriptor.instance !== null) {
        return descriptor.instance;
      }

      if (!descriptor.implementationType) {
        throw new InstanceCreationError(
          identifier,
          'registration has no implementation type, instance or factory',
          undefined,
          path,
        );
      }

      const instance = constructInstance(
        identifier,
        descriptor.implementationType,
        rankSignatures(descriptor.implementationType, descriptor.dependencies),
        (parameter) => this.resolveResult(parameter),
        path,
      );

      if (isCacheable(descriptor.lifetime)) {
        this.singletons.set(identifier, instance);
      }

      return instance;
    } finally {
      this.resolutionStack.pop();
    }
  }

  private invokeFactory<T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<T>, path: string[]): T {
    try {
      return factory(this);
    } catch (error) {
      if (error instanceof CircularDependencyError || error instanceof UnregisteredServiceError) {
        throw error;
      }
      const cause = toError(error);
      throw new InstanceCreationError(identifier, `factory threw: ${cause.message}`, cause, path);
    }
  }

  private implementationFor<T>(
    identifierOrImpl: ServiceIdentifier<T>,
    implementation: Constructor<T> | undefined,
  ): Constructor<T> {
    if (implementation) {
      return implementation;
    }
    if (isConstructor(identifierOrImpl)) {
      return identifierOrImpl;
    }
    throw new TypeError(
      `An implementation class is required to register '${getServiceName(identifierOrImpl)}'`,
    );
  }

  // ============================================================================
  // Diagnostics
  // ============================================================================

  getStatistics(): IContainerStatistics {
    const lifetimes = [...this.descriptors.values()].map((descriptor) => descriptor.lifetime);
    const count = (lifetime: ServiceLifetime): number =>
      lifetimes.filter((entry) => entry === lifetime).length;

    return {
      totalServices: this.descriptors.size,
      singletonServices: count(ServiceLifetime.Singleton),
      transientServices: count(ServiceLifetime.Transient),
      factoryServices: count(ServiceLifetime.Factory),
      storedSingletons: this.singletons.size,
      totalResolutions: this.totalResolutions,
      successfulResolutions: this.successfulResolutions,
      failedResolutions: this.totalResolutions - this.successfulResolutions,
      successRate:
        this.totalResolutions > 0 ? (this.successfulResolutions / this.totalResolutions) * 100 : 0,
      mostResolved: [...this.resolveCounts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, 5)
        .map(([name, resolutions]) => ({ name, count: resolutions })),
    };
  }

  /**
   * Check registrations without constructing anything.
   *
   * @remarks
   * Only each class's widest signature is inspected for dependencies.
   */
  verify(): IContainerVerification {
    const errors: string[] = [];
    const warnings: string[] = [];
    const edges = new Map<ServiceIdentifier, readonly ServiceIdentifier[]>();

    if (this.descriptors.size === 0) {
      warnings.push('No services registered');
    }

    for (const [identifier, descriptor] of this.descriptors) {
      const name = getServiceName(identifier);

      try {
        validateDescriptor(descriptor);
      } catch (error) {
        errors.push(toError(error).message);
        continue;
      }

      if (descriptor.factory || descriptor.instance !== undefined || !descriptor.implementationType) {
        continue;
      }

      const signatures = rankSignatures(descriptor.implementationType, descriptor.dependencies);
      const primary = signatures[0] ?? [];
      edges.set(identifier, primary);

      for (const dependency of primary) {
        const target = this.descriptors.get(dependency);
        if (!target) {
          errors.push(`${name} depends on ${getServiceName(dependency)}, which is not registered`);
        } else if (isCaptiveDependency(descriptor.lifetime, target.lifetime)) {
          warnings.push(
            `${getLifetimeName(descriptor.lifetime)} ${name} depends on ${target.lifetime} ${getServiceName(dependency)}`,
          );
        }
      }
    }

    const cycle = findFirstCycle([...this.descriptors.keys()], edges);
    if (cycle.length > 0) {
      errors.push(
        `Circular dependency: ${cycle.map((identifier) => getServiceName(identifier)).join(' -> ')}`,
      );
    }

    const isValid = errors.length === 0;
    return {
      isValid,
      errors,
      warnings,
      servicesValidated: this.descriptors.size,
      summary: `Validation: ${isValid ? 'PASSED' : 'FAILED'} | Errors: ${errors.length} | Warnings: ${warnings.length}`,
    };
  }

  // ============================================================================
  // Teardown
  // ============================================================================

  clear(): void {
    this.descriptors.clear();
    this.singletons.clear();
    this.resolveCounts.clear();
    this.totalResolutions = 0;
    this.successfulResolutions = 0;
  }

  /**
   * Dispose stored singletons in reverse creation order, then clear.
   */
  dispose(): void {
    const instances = [...this.singletons.entries()].reverse();

    for (const [identifier, instance] of instances) {
      if (!isDisposable(instance)) {
        continue;
      }
      try {
        instance.dispose();
      } catch (error) {
        this.logger.error('Error disposing singleton', {
          service: getServiceName(identifier),
          error: toError(error).message,
        });
      }
    }

    this.clear();
  }
}
