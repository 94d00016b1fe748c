/**
 * @fileoverview Registry Types - Component Registration and Graph Diagnostics
 *
 * @packageDocumentation
 * @module @kindling/core/domain/registry
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Value types produced and consumed by the component registry, the
 * dependency resolver and the initialization scheduler.
 *
 * @version 1.0.0
 */

import { type Constructor, type ServiceIdentifier } from '../di/service-identifier';
import { ServiceLifetime } from '../di/service-lifetime';

/**
 * Lifetimes a registry component may have. Factories belong to the container.
 */
export type ComponentLifetime = ServiceLifetime.Singleton | ServiceLifetime.Transient;

/**
 * Registry lifecycle.
 *
 * ```
 * registering ──initializeAll()──▶ initializing ──▶ initialized ──dispose()──▶ disposed
 *      ▲                                │
 *      └──────── strict failure ────────┘
 * ```
 */
export type RegistryPhase = 'registering' | 'initializing' | 'initialized' | 'disposed';

/**
 * A component known to the registry.
 *
 * @remarks
 * Only `instance` is ever mutated after registration, to attach the
 * constructed component.
 */
export interface ComponentRegistration<T = unknown> {
  readonly type: ServiceIdentifier<T>;
  /**
   * Higher initializes earlier.
   */
  readonly priority: number;
  readonly dependencies: readonly ServiceIdentifier[];
  readonly lifetime: ComponentLifetime;
  instance?: T | undefined;
  readonly registeredAt: number;
  /**
   * Monotonic registration counter; last tie-break in ordering.
   */
  readonly sequence: number;
}

export interface RegisterComponentOptions<T = unknown> {
  priority?: number;
  /**
   * Overrides the class's declared constructor signature.
   */
  dependencies?: readonly ServiceIdentifier[];
  lifetime?: ComponentLifetime;
  /**
   * Required when the type is a token or string key.
   */
  implementation?: Constructor<T>;
}

/**
 * Adjacency map `type -> direct dependency types`.
 */
export type DependencyEdges = ReadonlyMap<ServiceIdentifier, readonly ServiceIdentifier[]>;

export interface MissingDependency {
  readonly dependent: ServiceIdentifier;
  readonly dependency: ServiceIdentifier;
}

/**
 * Outcome of a dependency graph validation.
 *
 * @remarks
 * All categories are collected in one pass. Warnings never affect
 * `isValid`.
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly missingDependencies: readonly MissingDependency[];
  readonly missingDependencyMessages: readonly string[];
  readonly hasCircularDependencies: boolean;
  /**
   * First cycle found, closed (`[X, Y, X]`); empty when acyclic.
   */
  readonly cycle: readonly ServiceIdentifier[];
  /**
   * `X -> Y -> X`, or an empty string.
   */
  readonly cycleDescription: string;
  readonly warnings: readonly string[];
}

export type ComplexityRating = 'Low' | 'Medium' | 'High';

/**
 * Graph metrics for diagnostics. Nothing depends on these values.
 */
export interface DependencyAnalysis {
  readonly totalComponents: number;
  readonly totalDependencies: number;
  readonly maxPerComponent: number;
  readonly avgPerComponent: number;
  /**
   * Number of components on the longest dependency chain.
   */
  readonly longestChain: number;
  readonly complexityRating: ComplexityRating;
}

export interface InitializationFailure {
  readonly type: ServiceIdentifier;
  readonly name: string;
  readonly error: Error;
}

export interface InitializationReport {
  readonly initialized: readonly ServiceIdentifier[];
  /**
   * Components not initialized because a dependency failed.
   */
  readonly skipped: readonly ServiceIdentifier[];
  readonly failed: readonly InitializationFailure[];
}

export interface RegistrationSummary {
  readonly phase: RegistryPhase;
  readonly registeredCount: number;
  readonly initializedCount: number;
  readonly registered: readonly string[];
  readonly initialized: readonly string[];
}
