/**
 * @fileoverview ComponentRegistry - Managed component lifecycle
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/registry
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The registry is the bootstrapper's front door. Components are registered
 * with a priority and their dependencies, validated as a graph, initialized
 * once in dependency order and disposed in reverse.
 *
 * ```
 * registering ──initializeAll()──▶ initializing ──▶ initialized ──dispose()──▶ disposed
 * ```
 *
 * Construction goes through the {@link ServiceContainer}: every registered
 * component is also a container entry, so a component's constructor
 * parameters may be any container service.
 *
 * @version 1.0.0
 */

import {
  type Clock,
  type IImplementationDiscovery,
  type ILogger,
  type ServiceIdentifier,
  ComponentInitializationError,
  ServiceLifetime,
  getServiceName,
  isConstructor,
  isDisposable,
  toError,
} from '../../domain/di';
import {
  type ComponentRegistration,
  type ComplexityRating,
  type DependencyAnalysis,
  type InitializationReport,
  type RegisterComponentOptions,
  type RegistrationSummary,
  type RegistryPhase,
  type ValidationResult,
} from '../../domain/registry';
import { rankSignatures } from '../di/constructor-selection';
import { type ResolutionCache } from '../di/resolution-cache';
import { type ServiceContainer } from '../di/service-container';
import { getDefaultLogger } from '../logging';

import { DependencyResolver } from './dependency-resolver';
import {
  type InitializationRun,
  InitializationScheduler,
  createInitializationRun,
} from './initialization-scheduler';

export interface ComponentRegistryOptions {
  container: ServiceContainer;
  /**
   * Holds lazily built transient components. `null` disables caching.
   */
  cache?: ResolutionCache | null;
  /**
   * Last resort for types neither registered here nor in the container.
   */
  discovery?: IImplementationDiscovery | null;
  logger?: ILogger;
  clock?: Clock;
  /**
   * Default: true
   */
  strictInitialization?: boolean;
}

const EMPTY_REPORT: InitializationReport = Object.freeze({
  initialized: [],
  skipped: [],
  failed: [],
});

/**
 * ComponentRegistry - Register, order, initialize and dispose components.
 *
 * @example
 * ```typescript
 * const registry = new ComponentRegistry({ container });
 *
 * registry.register(StorageManager);
 * registry.register(SaveManager, { priority: 50, dependencies: [StorageManager] });
 * registry.register(GameManager, { priority: 100, dependencies: [SaveManager] });
 *
 * const validation = registry.validateDependencies();
 * if (validation.isValid) {
 *   registry.initializeAll();
 * }
 *
 * const save = registry.getManager(SaveManager);
 * ```
 */
export class ComponentRegistry {
  private readonly registrations = new Map<ServiceIdentifier, ComponentRegistration>();
  private readonly edges = new Map<ServiceIdentifier, readonly ServiceIdentifier[]>();
  private initializationOrder: ServiceIdentifier[] = [];
  private readonly startOrder: ServiceIdentifier[] = [];
  private lastReport: InitializationReport = EMPTY_REPORT;
  private phase: RegistryPhase = 'registering';
  private sequence = 0;

  private readonly container: ServiceContainer;
  private readonly cache: ResolutionCache | null;
  private readonly discovery: IImplementationDiscovery | null;
  private readonly logger: ILogger;
  private readonly clock: Clock;
  private readonly resolver = new DependencyResolver();
  private readonly scheduler: InitializationScheduler;

  constructor(options: ComponentRegistryOptions) {
    this.container = options.container;
    this.cache = options.cache ?? null;
    this.discovery = options.discovery ?? null;
    this.logger = options.logger ?? getDefaultLogger('ComponentRegistry');
    this.clock = options.clock ?? Date.now;
    this.scheduler = new InitializationScheduler(
      (registration) => this.container.resolve(registration.type),
      { logger: this.logger, strict: options.strictInitialization ?? true },
    );
  }

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Register a component.
   *
   * @remarks
   * Accepted only while registering. A duplicate, a late registration, or a
   * token without an implementation is logged and ignored.
   *
   * @returns true if the registration was accepted
   */
  register<T>(type: ServiceIdentifier<T>, options: RegisterComponentOptions<T> = {}): boolean {
    const name = getServiceName(type);
    if (!this.acceptsRegistration(name) || this.isDuplicate(type, name)) {
      return false;
    }

    const implementation = options.implementation ?? (isConstructor(type) ? type : undefined);
    if (!implementation) {
      this.logger.error('Registration needs an implementation class', { component: name });
      return false;
    }

    const lifetime = options.lifetime ?? ServiceLifetime.Singleton;
    const dependencies = options.dependencies ?? rankSignatures(implementation)[0] ?? [];

    this.addRegistration({
      type,
      priority: options.priority ?? 0,
      dependencies: ComponentRegistry.freezeDependencies(dependencies),
      lifetime,
      registeredAt: this.clock(),
      sequence: this.sequence++,
    });
    this.container.register(
      type,
      implementation,
      lifetime,
      undefined,
      undefined,
      options.dependencies,
    );

    this.logger.debug('Registered component', { component: name, priority: options.priority ?? 0 });
    return true;
  }

  /**
   * Register an already constructed component. Initialization leaves it
   * alone.
   */
  registerInstance<T>(type: ServiceIdentifier<T>, instance: T, priority = 0): boolean {
    const name = getServiceName(type);
    if (!this.acceptsRegistration(name) || this.isDuplicate(type, name)) {
      return false;
    }

    this.addRegistration({
      type,
      priority,
      dependencies: ComponentRegistry.freezeDependencies([]),
      lifetime: ServiceLifetime.Singleton,
      instance,
      registeredAt: this.clock(),
      sequence: this.sequence++,
    });
    this.container.registerInstance(type, instance);
    return true;
  }

  isRegistered(type: ServiceIdentifier): boolean {
    return this.registrations.has(type);
  }

  /**
   * Read-only snapshot, in registration order.
   */
  getRegistrations(): readonly Readonly<ComponentRegistration>[] {
    return Object.freeze(
      [...this.registrations.values()].map((registration) => Object.freeze({ ...registration })),
    );
  }

  getPhase(): RegistryPhase {
    return this.phase;
  }

  private acceptsRegistration(name: string): boolean {
    if (this.phase === 'registering') {
      return true;
    }
    this.logger.warn('Registration ignored', { component: name, phase: this.phase });
    return false;
  }

  private isDuplicate(type: ServiceIdentifier, name: string): boolean {
    if (!this.registrations.has(type)) {
      return false;
    }
    this.logger.warn('Component already registered', { component: name });
    return true;
  }

  private addRegistration(registration: ComponentRegistration): void {
    this.registrations.set(registration.type, registration);
    this.edges.set(registration.type, registration.dependencies);
  }

  /**
   * Edge lists are shared between registrations, snapshots and the edge map,
   * so they are frozen copies.
   */
  private static freezeDependencies(
    dependencies: readonly ServiceIdentifier[],
  ): readonly ServiceIdentifier[] {
    return Object.freeze([...dependencies]);
  }

  // ============================================================================
  // Lookup
  // ============================================================================

  /**
   * Get a component, constructing it on first use.
   *
   * @remarks
   * Never throws; failures are logged and give `null`. Lookup order:
   * attached instance, resolution cache, construction through the container
   * (registered types), the container itself, then discovery.
   */
  getManager<T>(type: ServiceIdentifier<T>): T | null {
    const name = getServiceName(type);
    const registration = this.registrations.get(type) as ComponentRegistration<T> | undefined;

    const attached = registration?.instance;
    if (attached !== undefined) {
      return attached;
    }

    const cached = this.cache?.tryGet(type) ?? null;
    if (cached !== null) {
      return cached;
    }

    if (registration) {
      return this.constructLazily(registration, name);
    }

    const resolved = this.container.tryResolve(type) ?? this.discovery?.tryDiscover(type) ?? null;
    if (resolved === null) {
      this.logger.warn('Component not available', { component: name });
    }
    return resolved;
  }

  /**
   * Singletons are ensured through the scheduler, so registered dependencies
   * are attached and started before the component's own hooks run.
   * Transients have their dependencies ensured, then are built and cached.
   */
  private constructLazily<T>(registration: ComponentRegistration<T>, name: string): T | null {
    const run = createInitializationRun();
    try {
      if (registration.lifetime === ServiceLifetime.Transient) {
        return this.constructTransient(registration, name, run);
      }
      if (!this.scheduler.ensure(registration.type, this.registrations, this.edges, run)) {
        this.logger.warn('Component not available', { component: name });
        return null;
      }
      return registration.instance ?? null;
    } catch (error) {
      const cause = error instanceof ComponentInitializationError ? error.cause : toError(error);
      this.logger.warn('Failed to construct component', { component: name, error: cause.message });
      return null;
    } finally {
      this.startOrder.push(...run.initialized);
    }
  }

  private constructTransient<T>(
    registration: ComponentRegistration<T>,
    name: string,
    run: InitializationRun,
  ): T | null {
    const unavailable = registration.dependencies.find(
      (dependency) => !this.scheduler.ensure(dependency, this.registrations, this.edges, run),
    );
    if (unavailable !== undefined) {
      this.logger.warn('Component not available', {
        component: name,
        dependency: getServiceName(unavailable),
      });
      return null;
    }

    const result = this.container.resolveResult(registration.type);
    if (!result.success) {
      this.logger.warn('Failed to construct component', {
        component: name,
        error: result.error.message,
      });
      return null;
    }

    if (!this.container.hasSingletonInstance(registration.type)) {
      this.cache?.put(registration.type, result.value);
    }
    return result.value;
  }

  // ============================================================================
  // Graph Diagnostics
  // ============================================================================

  /**
   * Validate the current graph. Read-only; callable in any phase.
   */
  validateDependencies(): ValidationResult {
    return this.resolver.validate([...this.registrations.values()], this.edges);
  }

  analyzeDependencies(): DependencyAnalysis {
    const types = [...this.registrations.keys()];
    const counts = types.map((type) => (this.edges.get(type) ?? []).length);
    const totalDependencies = counts.reduce((sum, count) => sum + count, 0);
    const avgPerComponent = types.length > 0 ? totalDependencies / types.length : 0;
    const longestChain = this.longestChain(types);

    return {
      totalComponents: types.length,
      totalDependencies,
      maxPerComponent: Math.max(0, ...counts),
      avgPerComponent,
      longestChain,
      complexityRating: rateComplexity(avgPerComponent, longestChain),
    };
  }

  /**
   * Number of components on the longest registered dependency path. Edges
   * closing a cycle are not followed.
   */
  private longestChain(types: readonly ServiceIdentifier[]): number {
    const depth = new Map<ServiceIdentifier, number>();
    const onPath = new Set<ServiceIdentifier>();

    const measure = (type: ServiceIdentifier): number => {
      const known = depth.get(type);
      if (known !== undefined) {
        return known;
      }

      onPath.add(type);
      let deepest = 0;
      for (const dependency of this.edges.get(type) ?? []) {
        if (this.registrations.has(dependency) && !onPath.has(dependency)) {
          deepest = Math.max(deepest, measure(dependency));
        }
      }
      onPath.delete(type);

      depth.set(type, deepest + 1);
      return deepest + 1;
    };

    return types.reduce((longest, type) => Math.max(longest, measure(type)), 0);
  }

  getInitializationOrder(): ServiceIdentifier[] {
    return [...this.initializationOrder];
  }

  getRegistrationSummary(): RegistrationSummary {
    const registered = [...this.registrations.values()];
    const initialized = registered.filter((registration) => registration.instance !== undefined);

    return {
      phase: this.phase,
      registeredCount: registered.length,
      initializedCount: initialized.length,
      registered: registered.map((registration) => getServiceName(registration.type)),
      initialized: initialized.map((registration) => getServiceName(registration.type)),
    };
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Initialize every registered component once.
   *
   * @remarks
   * A second call logs a warning and returns the first call's report. When
   * strict initialization aborts, the registry returns to `registering` and
   * the error is rethrown.
   *
   * @throws CircularDependencyError when no order exists
   * @throws ComponentInitializationError on a strict construction failure or
   * any hook failure
   */
  initializeAll(): InitializationReport {
    if (this.phase !== 'registering') {
      this.logger.warn('initializeAll ignored', { phase: this.phase });
      return this.lastReport;
    }

    this.phase = 'initializing';
    try {
      const validation = this.validateDependencies();
      for (const message of validation.missingDependencyMessages) {
        this.logger.warn(message);
      }
      for (const warning of validation.warnings) {
        this.logger.debug(warning);
      }

      const order = this.scheduler.computeOrder([...this.registrations.values()], this.edges);
      this.initializationOrder = order;

      const run = createInitializationRun();
      let report: InitializationReport;
      try {
        report = this.scheduler.initialize(order, this.registrations, this.edges, run);
      } finally {
        this.startOrder.push(...run.initialized);
      }
      this.lastReport = report;
      this.phase = 'initialized';

      this.logger.info('Components initialized', {
        initialized: report.initialized.length,
        skipped: report.skipped.length,
        failed: report.failed.length,
      });
      return report;
    } catch (error) {
      this.phase = 'registering';
      this.logger.error('Initialization aborted', { error: toError(error).message });
      throw error;
    }
  }

  /**
   * Dispose components in reverse initialization order and forget them.
   * Idempotent.
   */
  dispose(): void {
    if (this.phase === 'disposed') {
      return;
    }

    // Pre-built instances were never started here, so they go last.
    const started = new Set(this.startOrder);
    const order = [
      ...[...this.registrations.keys()].filter((type) => !started.has(type)),
      ...this.startOrder,
    ];

    for (const type of [...order].reverse()) {
      const instance = this.registrations.get(type)?.instance;
      if (!isDisposable(instance)) {
        continue;
      }
      try {
        instance.dispose();
      } catch (error) {
        this.logger.error('Error disposing component', {
          component: getServiceName(type),
          error: toError(error).message,
        });
      }
    }

    for (const type of this.registrations.keys()) {
      this.container.unregister(type);
    }

    this.registrations.clear();
    this.edges.clear();
    this.initializationOrder = [];
    this.startOrder.length = 0;
    this.cache?.clear();
    this.phase = 'disposed';
  }
}

/**
 * Low: avg <= 1 and chain <= 3. Medium: avg <= 3 and chain <= 5. Else High.
 */
export function rateComplexity(avgPerComponent: number, longestChain: number): ComplexityRating {
  if (avgPerComponent <= 1 && longestChain <= 3) {
    return 'Low';
  }
  if (avgPerComponent <= 3 && longestChain <= 5) {
    return 'Medium';
  }
  return 'High';
}
