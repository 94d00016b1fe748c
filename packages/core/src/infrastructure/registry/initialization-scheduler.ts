/**
 * @fileoverview InitializationScheduler - Deterministic start-up ordering
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/registry
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Orders components so that dependencies come first and, among components
 * that are ready, higher priority comes first. Then constructs them and
 * runs their lifecycle hooks in that order.
 *
 * ```
 * GameManager(100) -> SaveManager(50) -> StorageManager(0)
 *
 * order: StorageManager, SaveManager, GameManager
 * ```
 *
 * @version 1.0.0
 */

import {
  type ILogger,
  type ServiceIdentifier,
  CircularDependencyError,
  ComponentInitializationError,
  getServiceName,
  isDependencyAware,
  isInitializable,
  toError,
} from '../../domain/di';
import {
  type ComponentRegistration,
  type DependencyEdges,
  type InitializationFailure,
  type InitializationReport,
} from '../../domain/registry';
import { getDefaultLogger } from '../logging';

import { findFirstCycle } from './dependency-resolver';

/**
 * Builds the instance for a registration. Throwing marks the component as
 * failed.
 */
export type ConstructComponent = (registration: ComponentRegistration) => unknown;

/**
 * Bookkeeping shared by the {@link InitializationScheduler.ensure} calls of
 * one initialization pass.
 */
export interface InitializationRun {
  readonly initialized: ServiceIdentifier[];
  readonly skipped: ServiceIdentifier[];
  readonly failed: InitializationFailure[];
  readonly blocked: Set<ServiceIdentifier>;
  readonly inProgress: Set<ServiceIdentifier>;
}

export function createInitializationRun(): InitializationRun {
  return { initialized: [], skipped: [], failed: [], blocked: new Set(), inProgress: new Set() };
}

export interface InitializationSchedulerOptions {
  logger?: ILogger;
  /**
   * Abort on the first construction failure. Default: true
   */
  strict?: boolean;
}

/**
 * Candidate order: priority desc, then registration time, then sequence.
 */
export function compareRegistrations(a: ComponentRegistration, b: ComponentRegistration): number {
  return b.priority - a.priority || a.registeredAt - b.registeredAt || a.sequence - b.sequence;
}

export class InitializationScheduler {
  private readonly logger: ILogger;
  private readonly strict: boolean;

  constructor(
    private readonly construct: ConstructComponent,
    options: InitializationSchedulerOptions = {},
  ) {
    this.logger = options.logger ?? getDefaultLogger('InitializationScheduler');
    this.strict = options.strict ?? true;
  }

  /**
   * Compute the initialization order.
   *
   * @remarks
   * Each step places the first candidate, in {@link compareRegistrations}
   * order, whose registered dependencies are all placed. Dependencies outside
   * the registration set do not block.
   *
   * @throws CircularDependencyError when the remaining candidates all wait on
   * each other
   */
  computeOrder(
    registrations: readonly ComponentRegistration[],
    edges: DependencyEdges,
  ): ServiceIdentifier[] {
    const registered = new Set(registrations.map((registration) => registration.type));
    const candidates = [...registrations].sort(compareRegistrations);
    const placed = new Set<ServiceIdentifier>();
    const order: ServiceIdentifier[] = [];

    while (candidates.length > 0) {
      const index = candidates.findIndex((candidate) =>
        (edges.get(candidate.type) ?? []).every(
          (dependency) => placed.has(dependency) || !registered.has(dependency),
        ),
      );

      if (index === -1) {
        const stuck = candidates.map((candidate) => candidate.type);
        const cycle = findFirstCycle(stuck, edges);
        throw new CircularDependencyError(cycle.length > 0 ? cycle : stuck);
      }

      const [next] = candidates.splice(index, 1);
      if (next) {
        placed.add(next.type);
        order.push(next.type);
      }
    }

    return order;
  }

  /**
   * Construct and start every component in `order`.
   *
   * @remarks
   * Components that already have an instance are left alone. Before a
   * component is built, its registered dependencies are ensured first.
   *
   * - Strict: a construction failure is logged and aborts with
   *   ComponentInitializationError.
   * - Lenient: the failed component and everything depending on it are
   *   skipped.
   *
   * A throwing lifecycle hook aborts in both modes; the component it belongs
   * to is left without an instance.
   */
  initialize(
    order: readonly ServiceIdentifier[],
    registrations: ReadonlyMap<ServiceIdentifier, ComponentRegistration>,
    edges: DependencyEdges,
    run: InitializationRun = createInitializationRun(),
  ): InitializationReport {
    for (const type of order) {
      this.ensure(type, registrations, edges, run);
    }
    return { initialized: run.initialized, skipped: run.skipped, failed: run.failed };
  }

  /**
   * Construct and start one component, its registered dependencies first.
   *
   * @remarks
   * Failure handling is the same as {@link initialize}. Pass the same `run`
   * across calls to share blocked components and collect what was started.
   *
   * @returns true when the component has an instance afterwards, or is not
   * registered at all
   */
  ensure(
    type: ServiceIdentifier,
    registrations: ReadonlyMap<ServiceIdentifier, ComponentRegistration>,
    edges: DependencyEdges,
    run: InitializationRun = createInitializationRun(),
  ): boolean {
    const registration = registrations.get(type);
    if (!registration || registration.instance !== undefined) {
      return true;
    }
    if (run.blocked.has(type)) {
      return false;
    }
    if (run.inProgress.has(type)) {
      throw new CircularDependencyError([...run.inProgress, type]);
    }

    run.inProgress.add(type);
    try {
      const name = getServiceName(type);

      const unavailable = (edges.get(type) ?? []).find(
        (dependency) => !this.ensure(dependency, registrations, edges, run),
      );
      if (unavailable !== undefined) {
        this.logger.warn('Skipping component, dependency unavailable', {
          component: name,
          dependency: getServiceName(unavailable),
        });
        run.blocked.add(type);
        run.skipped.push(type);
        return false;
      }

      let instance: unknown;
      try {
        instance = this.construct(registration);
      } catch (error) {
        const cause = toError(error);
        this.logger.error('Failed to construct component', { component: name, error: cause.message });
        if (this.strict) {
          throw new ComponentInitializationError(type, cause);
        }
        run.blocked.add(type);
        run.failed.push({ type, name, error: cause });
        return false;
      }

      registration.instance = instance;
      try {
        this.activate(registration);
      } catch (error) {
        registration.instance = undefined;
        throw error;
      }
      run.initialized.push(type);
      this.logger.debug('Initialized component', { component: name });
      return true;
    } finally {
      run.inProgress.delete(type);
    }
  }

  /**
   * Run `initialize()` then `onDependenciesResolved()` on an attached
   * instance.
   *
   * @throws ComponentInitializationError when a hook throws
   */
  activate(registration: ComponentRegistration): void {
    const instance = registration.instance;
    try {
      if (isInitializable(instance)) {
        instance.initialize();
      }
      if (isDependencyAware(instance)) {
        instance.onDependenciesResolved();
      }
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Lifecycle hook failed', {
        component: getServiceName(registration.type),
        error: cause.message,
      });
      throw new ComponentInitializationError(registration.type, cause);
    }
  }
}
