/**
 * @fileoverview ImplementationCatalog - Best-effort discovery of implementations
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * There is no module scanning. Start-up code lists, per abstract type, the
 * implementations that may stand in for it:
 *
 * ```typescript
 * const catalog = new ImplementationCatalog();
 * catalog.registerImplementation(IStorage, MemoryStorage);
 * catalog.registerImplementation(Shape, AbstractPolygon, { abstract: true });
 * catalog.registerImplementation(Shape, Square);
 * ```
 *
 * The container asks the catalog only after a lookup found no registration.
 *
 * @version 1.0.0
 */

import {
  type AbstractConstructor,
  type Constructor,
  type IImplementationDiscovery,
  type ILogger,
  type ServiceIdentifier,
  getServiceName,
  isConstructor,
  toError,
} from '../../domain/di';
import { getDefaultLogger } from '../logging';

export interface CatalogEntryOptions {
  /**
   * Never instantiate this candidate.
   */
  abstract?: boolean;
}

type Implementation<T = unknown> = Constructor<T> | AbstractConstructor<T>;

interface CatalogCandidate {
  readonly implementation: Implementation;
  readonly abstract: boolean;
}

/**
 * ImplementationCatalog - Known implementations per abstract type.
 *
 * @remarks
 * A candidate qualifies when it is not flagged abstract, takes no constructor
 * parameters, and (when the request is a class) has the requested class on
 * its prototype chain. The first qualifying candidate in registration order
 * wins.
 *
 * Each type is attempted at most once. Both outcomes are remembered: a found
 * instance is returned again, a miss stays a miss until {@link reset}.
 */
export class ImplementationCatalog implements IImplementationDiscovery {
  private readonly candidates = new Map<ServiceIdentifier, CatalogCandidate[]>();
  private readonly outcomes = new Map<ServiceIdentifier, unknown>();
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? getDefaultLogger('ImplementationCatalog');
  }

  registerImplementation<T>(
    type: ServiceIdentifier<T>,
    implementation: Implementation<T>,
    options: CatalogEntryOptions = {},
  ): this {
    const list = this.candidates.get(type) ?? [];
    list.push({ implementation, abstract: options.abstract ?? false });
    this.candidates.set(type, list);
    return this;
  }

  getCandidates(type: ServiceIdentifier): readonly Implementation[] {
    return (this.candidates.get(type) ?? []).map((candidate) => candidate.implementation);
  }

  hasAttempted(type: ServiceIdentifier): boolean {
    return this.outcomes.has(type);
  }

  tryDiscover<T>(type: ServiceIdentifier<T>): T | null {
    if (this.outcomes.has(type)) {
      return this.outcomes.get(type) as T | null;
    }

    const instance = this.discover(type);
    this.outcomes.set(type, instance);
    return instance;
  }

  /**
   * Forget remembered outcomes; candidates stay.
   */
  reset(): void {
    this.outcomes.clear();
  }

  private discover<T>(type: ServiceIdentifier<T>): T | null {
    const name = getServiceName(type);
    const candidate = (this.candidates.get(type) ?? []).find((entry) =>
      this.qualifies(type, entry),
    );

    const implementation = candidate?.implementation;
    if (implementation === undefined || !isConstructor(implementation)) {
      this.logger.debug('No implementation discovered', { service: name });
      return null;
    }

    try {
      const instance = new implementation() as T;
      this.logger.info('Discovered implementation', {
        service: name,
        implementation: implementation.name,
      });
      return instance;
    } catch (error) {
      this.logger.warn('Discovered implementation failed to construct', {
        service: name,
        implementation: implementation.name,
        error: toError(error).message,
      });
      return null;
    }
  }

  private qualifies(type: ServiceIdentifier, entry: CatalogCandidate): boolean {
    if (entry.abstract || entry.implementation.length > 0) {
      return false;
    }
    if (isConstructor(type)) {
      return entry.implementation === type || entry.implementation.prototype instanceof type;
    }
    return true;
  }
}
