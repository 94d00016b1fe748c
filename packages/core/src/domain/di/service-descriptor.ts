/**
 * @fileoverview IServiceDescriptor - Service Registration Metadata
 *
 * @packageDocumentation
 * @module @kindling/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the metadata structure for registered services.
 * IServiceDescriptor holds all information needed to resolve a service.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, type Constructor, getServiceName } from './service-identifier';
import { ServiceLifetime } from './service-lifetime';

/**
 * Factory function type for creating service instances.
 *
 * @remarks
 * Factories receive a resolver so they can pull other services. Resolutions
 * made through it share the caller's resolution stack, so a factory that
 * ends up requesting its own service is reported as a cycle.
 *
 * @example
 * ```typescript
 * const randomFactory: ServiceFactory<IRandom> = (resolver) => {
 *   const config = resolver.resolve(IGameConfig);
 *   return new SeededRandom(config.seed);
 * };
 * ```
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T;

/**
 * Minimal resolver interface used by factories.
 */
export interface IServiceResolver {
  /**
   * Resolve a service, throwing on failure.
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Resolve a service, returning `null` on any failure.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | null;
}

/**
 * IServiceDescriptor - Complete metadata for a registered service.
 *
 * @remarks
 * **Registration Patterns:**
 *
 * 1. **Class-based**: `implementationType`, constructed by the container
 * 2. **Instance-based**: `instance`, always singleton
 * 3. **Factory-based**: `factory`, lifetime `Factory`
 *
 * **Invariants:**
 *
 * - At least one of `implementationType`, `instance` or `factory` is set
 * - A `Factory` lifetime always has a factory
 */
export interface IServiceDescriptor<T = unknown> {
  /**
   * The identifier used to request this service.
   */
  readonly serviceIdentifier: ServiceIdentifier<T>;

  readonly lifetime: ServiceLifetime;

  /**
   * The concrete implementation class.
   */
  readonly implementationType?: Constructor<T> | undefined;

  /**
   * Pre-built instance supplied at registration.
   */
  readonly instance?: T | undefined;

  readonly factory?: ServiceFactory<T> | undefined;

  /**
   * Explicit constructor signature, overriding the class's static declaration.
   */
  readonly dependencies?: readonly ServiceIdentifier[] | undefined;

  /**
   * Clock timestamp (ms) at registration.
   */
  readonly registeredAt: number;
}

/**
 * Validate a IServiceDescriptor.
 *
 * @throws Error if descriptor is invalid
 *
 * @internal
 */
export function validateDescriptor<T>(descriptor: IServiceDescriptor<T>): void {
  const name = getServiceName(descriptor.serviceIdentifier);
  const hasImplementation = descriptor.implementationType !== undefined;
  const hasInstance = descriptor.instance !== undefined && descriptor.instance !== null;
  const hasFactory = descriptor.factory !== undefined;

  if (!hasImplementation && !hasInstance && !hasFactory) {
    throw new Error(
      `Service descriptor for '${name}' must have an implementationType, an instance or a factory`,
    );
  }

  if (descriptor.lifetime === ServiceLifetime.Factory && !hasFactory) {
    throw new Error(`Factory lifetime for '${name}' requires a factory function`);
  }

  if (hasImplementation && typeof descriptor.implementationType !== 'function') {
    throw new Error(`implementationType for '${name}' must be a constructor function`);
  }

  if (hasFactory && typeof descriptor.factory !== 'function') {
    throw new Error(`factory for '${name}' must be a function`);
  }
}
