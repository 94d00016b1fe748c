/**
 * @fileoverview DI Errors - Resolution and Bootstrapping Error Classes
 *
 * @packageDocumentation
 * @module @kindling/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Error classes raised while validating, ordering, resolving and
 * initializing components. Each error carries the resolution path that led
 * to it and a small rendering of that path for logs.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, getServiceName } from './service-identifier';

/**
 * Base error class for all DI-related errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   container.resolve(SaveManager);
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     logger.error(error.message, { path: error.resolutionPath });
 *   }
 * }
 * ```
 */
export abstract class DIError extends Error {
  /**
   * The chain of services being resolved when the error occurred:
   * ```
   * GameManager -> SaveManager -> IStorage (UNREGISTERED)
   * ```
   */
  public readonly resolutionPath: string[];

  /**
   * Indented rendering of {@link resolutionPath}:
   * ```
   * GameManager
   *   └─ SaveManager
   *     └─ IStorage (UNREGISTERED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = this.buildDependencyGraph();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * @internal
   */
  private buildDependencyGraph(): string {
    if (this.resolutionPath.length === 0) {
      return '';
    }

    return this.resolutionPath
      .map((entry, depth) => `${'  '.repeat(depth)}${depth === 0 ? '' : '└─ '}${entry}`)
      .join('\n');
  }
}

/**
 * A declared dependency has no registration.
 *
 * @remarks
 * Validation collects these instead of throwing them, so one pass reports
 * every missing edge.
 */
export class MissingDependencyError extends DIError {
  public readonly dependent: ServiceIdentifier;
  public readonly dependency: ServiceIdentifier;

  constructor(dependent: ServiceIdentifier, dependency: ServiceIdentifier) {
    const dependentName = getServiceName(dependent);
    const dependencyName = getServiceName(dependency);

    super(`${dependentName} depends on ${dependencyName}, which is not registered`, [
      dependentName,
      `${dependencyName} (MISSING)`,
    ]);
    this.dependent = dependent;
    this.dependency = dependency;
  }
}

/**
 * Error thrown when a circular dependency is detected.
 *
 * @remarks
 * The same shape is used by validation, by initialization ordering and by
 * the container at resolve time. `cycle` is closed: its last element repeats
 * its first.
 *
 * ```
 * EconomyManager -> TradeManager -> EconomyManager
 * ```
 *
 * To break a cycle, move the shared state into a third component or have
 * one side pull the other lazily through a factory.
 */
export class CircularDependencyError extends DIError {
  /**
   * The cycle as identifiers, e.g. `[X, Y, X]`.
   */
  public readonly cycle: readonly ServiceIdentifier[];

  /**
   * The cycle as display names.
   */
  public readonly cyclePath: string[];

  constructor(cycle: readonly ServiceIdentifier[], resolutionPath: string[] = []) {
    const cyclePath = cycle.map((identifier) => getServiceName(identifier));

    super(
      `Circular dependency detected: ${cyclePath.join(' -> ')}`,
      resolutionPath.length > 0 ? resolutionPath : cyclePath,
    );
    this.cycle = [...cycle];
    this.cyclePath = cyclePath;
  }
}

/**
 * Error thrown when a requested service has no registration, no factory,
 * and discovery found nothing.
 */
export class UnregisteredServiceError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);

    super(`Service '${name}' is not registered`, [...resolutionPath, `${name} (UNREGISTERED)`]);
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when instance creation fails.
 *
 * @remarks
 * Raised when every constructor signature was exhausted, or when the chosen
 * constructor or factory threw. In the latter case the original error is
 * kept as `cause`.
 */
export class InstanceCreationError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  public readonly cause: Error | undefined;

  constructor(
    identifier: ServiceIdentifier,
    reason: string,
    cause?: Error,
    resolutionPath: string[] = [],
  ) {
    const name = getServiceName(identifier);

    super(`Failed to create '${name}': ${reason}`, [...resolutionPath, `${name} (CREATION FAILED)`]);
    this.serviceIdentifier = identifier;
    this.cause = cause;
  }
}

/**
 * Bulk initialization was aborted by a component.
 */
export class ComponentInitializationError extends DIError {
  public readonly component: ServiceIdentifier;
  public readonly componentName: string;
  public readonly cause: Error;

  constructor(component: ServiceIdentifier, cause: Error) {
    const componentName = getServiceName(component);

    super(`Initialization aborted at '${componentName}': ${cause.message}`, [componentName]);
    this.component = component;
    this.componentName = componentName;
    this.cause = cause;
  }
}

/**
 * Runtime options failed validation.
 */
export class RuntimeConfigurationError extends DIError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid runtime options:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 *
 * @internal
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
