/**
 * @fileoverview ServiceLifetime - Instance Reuse Policies
 *
 * @packageDocumentation
 * @module @kindling/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the lifetimes that control when service instances
 * are created and whether they are reused.
 *
 * @version 1.0.0
 */

/**
 * ServiceLifetime - Defines when service instances are created and reused.
 *
 * @remarks
 * **Lifecycle Overview:**
 *
 * | Lifetime  | Created                  | Shared     | Stored by the container |
 * |-----------|--------------------------|------------|-------------------------|
 * | Singleton | First resolution         | Globally   | Yes                     |
 * | Transient | Every resolution         | Never      | No                      |
 * | Factory   | Whenever the factory runs| Up to it   | No                      |
 *
 * **Dependency Rules:**
 *
 * A singleton that captures a transient keeps one transient instance alive for
 * the container's whole life. Verification reports this as a warning.
 *
 * @example
 * ```typescript
 * container.registerSingleton(TimeManager);
 * container.registerTransient(PathfindingJob);
 * container.registerFactory(IRandom, () => new SeededRandom(42));
 * ```
 */
export enum ServiceLifetime {
  /**
   * One instance, created on first resolution (or supplied up front) and
   * reused until the container is disposed.
   */
  Singleton = 'singleton',

  /**
   * A new instance on every resolution.
   */
  Transient = 'transient',

  /**
   * Construction is delegated to a caller-supplied function on every
   * resolution. Results are never stored as singletons.
   */
  Factory = 'factory',
}

/**
 * Check if the container stores instances of this lifetime.
 */
export function isCacheable(lifetime: ServiceLifetime): boolean {
  return lifetime === ServiceLifetime.Singleton;
}

/**
 * Check whether `from` capturing `to` keeps a short-lived instance alive.
 *
 * @example
 * ```typescript
 * isCaptiveDependency(ServiceLifetime.Singleton, ServiceLifetime.Transient); // true
 * isCaptiveDependency(ServiceLifetime.Transient, ServiceLifetime.Singleton); // false
 * ```
 */
export function isCaptiveDependency(from: ServiceLifetime, to: ServiceLifetime): boolean {
  return from === ServiceLifetime.Singleton && to !== ServiceLifetime.Singleton;
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Transient:
      return 'Transient';
    case ServiceLifetime.Factory:
      return 'Factory';
    default:
      return 'Unknown';
  }
}
