/**
 * @fileoverview ComponentRegistry Unit Tests
 *
 * Tests for registration, lazy lookup, dependency diagnostics and the
 * initialize / dispose lifecycle.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  CircularDependencyError,
  ComponentInitializationError,
  ServiceLifetime,
  createToken,
  type IDependencyAware,
  type IDisposable,
  type IInitializable,
} from '../../../src/domain/di';
import { ImplementationCatalog, ResolutionCache, ServiceContainer } from '../../../src/infrastructure/di';
import { ComponentRegistry, rateComplexity } from '../../../src/infrastructure/registry';
import { createTestLogger, type TestLogger } from '../../fixtures/test-logger';

// ============================================================================
// Test Fixtures
// ============================================================================

const events: string[] = [];

class StorageManager implements IDisposable {
  dispose(): void {
    events.push('StorageManager.dispose');
  }
}

class SaveManager implements IDependencyAware, IDisposable {
  static inject = [StorageManager] as const;

  constructor(public readonly storage: StorageManager) {}

  onDependenciesResolved(): void {
    events.push('SaveManager.onDependenciesResolved');
  }

  dispose(): void {
    events.push('SaveManager.dispose');
  }
}

class GameManager implements IDependencyAware, IDisposable {
  static inject = [SaveManager] as const;

  constructor(public readonly save: SaveManager) {}

  onDependenciesResolved(): void {
    events.push('GameManager.onDependenciesResolved');
  }

  dispose(): void {
    events.push('GameManager.dispose');
  }
}

class PathJob {}
class ContainerOnly {}
class Unknown {}
class Ping {}
class Pong {}

class Failing {
  constructor() {
    throw new Error('no device');
  }
}

class Exploding implements IDisposable {
  dispose(): void {
    throw new Error('disk full');
  }
}

interface IAudio {
  play(clip: string): string;
}

const IAudioToken = createToken<IAudio>('IAudio');

class SilentAudio implements IAudio {
  play(clip: string): string {
    return `muted ${clip}`;
  }
}

abstract class Shape {
  abstract area(): number;
}

class UnitCircle extends Shape {
  area(): number {
    return 3;
  }
}

class CacheStore implements IInitializable {
  ready = false;

  initialize(): void {
    this.ready = true;
    events.push('CacheStore.initialize');
  }
}

class ProfileManager implements IDependencyAware {
  static inject = [CacheStore] as const;

  constructor(public readonly store: CacheStore) {}

  onDependenciesResolved(): void {
    events.push(`ProfileManager.onDependenciesResolved storeReady=${String(this.store.ready)}`);
  }
}

class RouteJob {
  static inject = [CacheStore] as const;

  constructor(public readonly store: CacheStore) {}
}

class NeedsFailing implements IDependencyAware {
  static inject = [Failing] as const;

  constructor(public readonly failing: Failing) {}

  onDependenciesResolved(): void {
    events.push('NeedsFailing.onDependenciesResolved');
  }
}

class FailingRoute {
  static inject = [Failing] as const;

  constructor(public readonly failing: Failing) {}
}

// ============================================================================
// Tests
// ============================================================================

describe('ComponentRegistry', () => {
  let logger: TestLogger;
  let container: ServiceContainer;
  let cache: ResolutionCache;
  let registry: ComponentRegistry;
  let now: number;

  const clock = (): number => now;

  beforeEach(() => {
    events.length = 0;
    now = 1_000;
    logger = createTestLogger();
    container = new ServiceContainer({ logger, clock });
    cache = new ResolutionCache({ ttlMs: 1_000, clock });
    registry = new ComponentRegistry({ container, cache, logger, clock });
  });

  function registerGameGraph(): void {
    registry.register(GameManager, { priority: 100 });
    registry.register(SaveManager, { priority: 50 });
    registry.register(StorageManager);
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  describe('register', () => {
    it('should register a component here and in the container', () => {
      expect(registry.register(StorageManager)).toBe(true);

      expect(registry.isRegistered(StorageManager)).toBe(true);
      expect(container.isRegistered(StorageManager)).toBe(true);
    });

    it('should take dependencies from the static declaration', () => {
      registry.register(SaveManager, { priority: 5 });

      const [registration] = registry.getRegistrations();
      expect(registration).toMatchObject({
        type: SaveManager,
        priority: 5,
        dependencies: [StorageManager],
        lifetime: ServiceLifetime.Singleton,
        registeredAt: 1_000,
        sequence: 0,
      });
    });

    it('should prefer explicit dependencies', () => {
      registry.register(Ping, { dependencies: [Pong] });

      expect(registry.getRegistrations()[0]?.dependencies).toEqual([Pong]);
    });

    it('should ignore duplicates', () => {
      registry.register(StorageManager);

      expect(registry.register(StorageManager)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Component already registered', {
        component: 'StorageManager',
      });
    });

    it('should reject a token without an implementation class', () => {
      expect(registry.register(IAudioToken)).toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Registration needs an implementation class', {
        component: 'Symbol(IAudio)',
      });
      expect(registry.isRegistered(IAudioToken)).toBe(false);
    });

    it('should register a token with an implementation class', () => {
      registry.register(IAudioToken, { implementation: SilentAudio });

      expect(registry.getManager(IAudioToken)?.play('door')).toBe('muted door');
    });

    it('should ignore registrations after initialization', () => {
      registry.initializeAll();

      expect(registry.register(PathJob)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Registration ignored', {
        component: 'PathJob',
        phase: 'initialized',
      });
    });

    it('should return frozen snapshots', () => {
      registry.register(StorageManager);

      const registrations = registry.getRegistrations();
      expect(Object.isFrozen(registrations)).toBe(true);
      expect(Object.isFrozen(registrations[0])).toBe(true);
    });

    it('should not let a snapshot change the dependency graph', () => {
      registry.register(Ping, { dependencies: [Pong] });
      registry.register(Pong);

      const dependencies = registry.getRegistrations()[0]?.dependencies;

      expect(Object.isFrozen(dependencies)).toBe(true);
      expect(() => Array.prototype.push.call(dependencies, Unknown)).toThrow(TypeError);
      expect(registry.validateDependencies().isValid).toBe(true);
    });

    it('should copy the caller dependency list', () => {
      const dependencies = [Pong];
      registry.register(Ping, { dependencies });
      registry.register(Pong);

      dependencies.push(Unknown);

      expect(registry.getRegistrations()[0]?.dependencies).toEqual([Pong]);
      expect(registry.validateDependencies().missingDependencies).toEqual([]);
      expect(
        container.getRegistrations().find((descriptor) => descriptor.serviceIdentifier === Ping)
          ?.dependencies,
      ).toEqual([Pong]);
    });
  });

  describe('registerInstance', () => {
    it('should attach the instance and leave its hooks alone', () => {
      const prebuilt = new SaveManager(new StorageManager());

      expect(registry.registerInstance(SaveManager, prebuilt, 10)).toBe(true);
      registry.initializeAll();

      expect(registry.getManager(SaveManager)).toBe(prebuilt);
      expect(container.resolve(SaveManager)).toBe(prebuilt);
      expect(events).toEqual([]);
    });
  });

  // ==========================================================================
  // initializeAll
  // ==========================================================================

  describe('initializeAll', () => {
    it('should initialize components in dependency order', () => {
      registerGameGraph();

      const report = registry.initializeAll();

      expect(report.initialized).toEqual([StorageManager, SaveManager, GameManager]);
      expect(registry.getInitializationOrder()).toEqual([StorageManager, SaveManager, GameManager]);
      expect(registry.getPhase()).toBe('initialized');
      expect(events).toEqual([
        'SaveManager.onDependenciesResolved',
        'GameManager.onDependenciesResolved',
      ]);
    });

    it('should wire the same instances the registry hands out', () => {
      registerGameGraph();
      registry.initializeAll();

      const game = registry.getManager(GameManager);
      const save = registry.getManager(SaveManager);

      expect(game?.save).toBe(save);
      expect(save?.storage).toBe(registry.getManager(StorageManager));
    });

    it('should run only once', () => {
      registerGameGraph();
      const first = registry.initializeAll();

      const second = registry.initializeAll();

      expect(second).toBe(first);
      expect(logger.warn).toHaveBeenCalledWith('initializeAll ignored', { phase: 'initialized' });
      expect(events).toHaveLength(2);
    });

    it('should throw CircularDependencyError and stay open for registration', () => {
      registry.register(Ping, { dependencies: [Pong] });
      registry.register(Pong, { dependencies: [Ping] });

      expect(() => registry.initializeAll()).toThrow(CircularDependencyError);
      expect(registry.getPhase()).toBe('registering');
      expect(logger.error).toHaveBeenCalledWith('Initialization aborted', {
        error: 'Circular dependency detected: Ping -> Pong -> Ping',
      });
    });

    it('should warn about missing dependencies and abort when strict', () => {
      registry.register(SaveManager);

      expect(() => registry.initializeAll()).toThrow(ComponentInitializationError);
      expect(logger.warn).toHaveBeenCalledWith(
        'SaveManager depends on StorageManager, which is not registered',
      );
      expect(registry.getPhase()).toBe('registering');
    });

    it('should record failures and continue when lenient', () => {
      const lenient = new ComponentRegistry({ container, logger, clock, strictInitialization: false });
      lenient.register(Failing, { priority: 10 });
      lenient.register(StorageManager);

      const report = lenient.initializeAll();

      expect(report.initialized).toEqual([StorageManager]);
      expect(report.failed.map((failure) => failure.name)).toEqual(['Failing']);
      expect(lenient.getPhase()).toBe('initialized');
    });
  });

  // ==========================================================================
  // getManager
  // ==========================================================================

  describe('getManager', () => {
    it('should construct and start a singleton on first use', () => {
      registry.register(SaveManager);
      registry.register(StorageManager);

      const save = registry.getManager(SaveManager);

      expect(save).toBeInstanceOf(SaveManager);
      expect(registry.getManager(SaveManager)).toBe(save);
      expect(events).toEqual(['SaveManager.onDependenciesResolved']);
    });

    it('should not start a lazily built component twice', () => {
      registry.register(SaveManager);
      registry.register(StorageManager);
      registry.getManager(SaveManager);

      registry.initializeAll();

      expect(events).toEqual(['SaveManager.onDependenciesResolved']);
    });

    it('should start registered dependencies before the component hooks', () => {
      registry.register(ProfileManager, { priority: 10 });
      registry.register(CacheStore);

      const profile = registry.getManager(ProfileManager);
      registry.initializeAll();

      expect(events).toEqual([
        'CacheStore.initialize',
        'ProfileManager.onDependenciesResolved storeReady=true',
      ]);
      expect(profile?.store).toBe(registry.getManager(CacheStore));
      expect(registry.getRegistrationSummary().initialized).toEqual(['ProfileManager', 'CacheStore']);
    });

    it('should return null without hooks when a dependency fails to construct', () => {
      registry.register(NeedsFailing);
      registry.register(Failing);

      expect(registry.getManager(NeedsFailing)).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        'Failed to construct component',
        expect.objectContaining({ component: 'NeedsFailing' }),
      );
      expect(events).toEqual([]);
      expect(registry.getRegistrationSummary().initialized).toEqual([]);
    });

    it('should return null when a dependency is unavailable in lenient mode', () => {
      const lenient = new ComponentRegistry({ container, logger, clock, strictInitialization: false });
      lenient.register(NeedsFailing);
      lenient.register(Failing);

      expect(lenient.getManager(NeedsFailing)).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('Component not available', { component: 'NeedsFailing' });
      expect(events).toEqual([]);
    });

    it('should start the dependencies of a transient component', () => {
      registry.register(RouteJob, { lifetime: ServiceLifetime.Transient });
      registry.register(CacheStore);

      const job = registry.getManager(RouteJob);

      expect(job?.store.ready).toBe(true);
      expect(job?.store).toBe(registry.getManager(CacheStore));
      expect(events).toEqual(['CacheStore.initialize']);
    });

    it('should not build a transient whose dependency is unavailable', () => {
      const lenient = new ComponentRegistry({ container, logger, clock, strictInitialization: false });
      lenient.register(FailingRoute, { lifetime: ServiceLifetime.Transient });
      lenient.register(Failing);

      expect(lenient.getManager(FailingRoute)).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('Component not available', {
        component: 'FailingRoute',
        dependency: 'Failing',
      });
    });

    it('should cache transient components until they expire', () => {
      registry.register(PathJob, { lifetime: ServiceLifetime.Transient });

      const first = registry.getManager(PathJob);
      const second = registry.getManager(PathJob);
      now += 1_001;
      const third = registry.getManager(PathJob);

      expect(first).toBeInstanceOf(PathJob);
      expect(second).toBe(first);
      expect(third).not.toBe(first);
      expect(cache.getStats()).toMatchObject({ hits: 1, size: 1 });
    });

    it('should build a new transient each time without a cache', () => {
      const uncached = new ComponentRegistry({ container, logger, clock, cache: null });
      uncached.register(PathJob, { lifetime: ServiceLifetime.Transient });

      expect(uncached.getManager(PathJob)).not.toBe(uncached.getManager(PathJob));
    });

    it('should fall back to the container', () => {
      container.registerSingleton(ContainerOnly);

      expect(registry.getManager(ContainerOnly)).toBe(container.resolve(ContainerOnly));
    });

    it('should fall back to discovery', () => {
      const catalog = new ImplementationCatalog(logger).registerImplementation(Shape, UnitCircle);
      const discovering = new ComponentRegistry({ container, logger, discovery: catalog });

      const shape = discovering.getManager(Shape);

      expect(shape).toBeInstanceOf(UnitCircle);
      expect(shape?.area()).toBe(3);
    });

    it('should return null and warn when nothing provides the type', () => {
      expect(registry.getManager(Unknown)).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('Component not available', { component: 'Unknown' });
    });

    it('should return null when construction fails', () => {
      registry.register(Failing);

      expect(registry.getManager(Failing)).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith(
        'Failed to construct component',
        expect.objectContaining({ component: 'Failing' }),
      );
    });
  });

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  describe('validateDependencies', () => {
    it('should describe a cycle', () => {
      registry.register(Ping, { dependencies: [Pong] });
      registry.register(Pong, { dependencies: [Ping] });

      const result = registry.validateDependencies();

      expect(result.isValid).toBe(false);
      expect(result.cycleDescription).toBe('Ping -> Pong -> Ping');
    });
  });

  describe('analyzeDependencies', () => {
    it('should measure a chain', () => {
      registerGameGraph();

      const analysis = registry.analyzeDependencies();

      expect(analysis).toMatchObject({
        totalComponents: 3,
        totalDependencies: 2,
        maxPerComponent: 1,
        longestChain: 3,
        complexityRating: 'Low',
      });
      expect(analysis.avgPerComponent).toBeCloseTo(2 / 3);
    });

    it('should report zeros for an empty registry', () => {
      expect(registry.analyzeDependencies()).toEqual({
        totalComponents: 0,
        totalDependencies: 0,
        maxPerComponent: 0,
        avgPerComponent: 0,
        longestChain: 0,
        complexityRating: 'Low',
      });
    });

    it('should not loop on a cycle', () => {
      registry.register(Ping, { dependencies: [Pong] });
      registry.register(Pong, { dependencies: [Ping] });

      expect(registry.analyzeDependencies().longestChain).toBe(2);
    });
  });

  describe('rateComplexity', () => {
    it('should rate by average and chain length', () => {
      expect(rateComplexity(1, 3)).toBe('Low');
      expect(rateComplexity(1, 4)).toBe('Medium');
      expect(rateComplexity(3, 5)).toBe('Medium');
      expect(rateComplexity(3.5, 2)).toBe('High');
      expect(rateComplexity(0.5, 6)).toBe('High');
    });
  });

  describe('getRegistrationSummary', () => {
    it('should list registered and initialized components', () => {
      registry.register(StorageManager);
      registry.register(SaveManager);

      expect(registry.getRegistrationSummary()).toEqual({
        phase: 'registering',
        registeredCount: 2,
        initializedCount: 0,
        registered: ['StorageManager', 'SaveManager'],
        initialized: [],
      });

      registry.initializeAll();

      expect(registry.getRegistrationSummary()).toMatchObject({
        phase: 'initialized',
        initializedCount: 2,
        initialized: ['StorageManager', 'SaveManager'],
      });
    });
  });

  // ==========================================================================
  // dispose
  // ==========================================================================

  describe('dispose', () => {
    it('should dispose in reverse initialization order', () => {
      registerGameGraph();
      registry.initializeAll();
      events.length = 0;

      registry.dispose();

      expect(events).toEqual([
        'GameManager.dispose',
        'SaveManager.dispose',
        'StorageManager.dispose',
      ]);
      expect(registry.getPhase()).toBe('disposed');
      expect(registry.isRegistered(GameManager)).toBe(false);
      expect(container.isRegistered(GameManager)).toBe(false);
    });

    it('should dispose lazily started components in reverse start order', () => {
      registry.register(SaveManager);
      registry.register(StorageManager);
      registry.getManager(SaveManager);
      events.length = 0;

      registry.dispose();

      expect(events).toEqual(['SaveManager.dispose', 'StorageManager.dispose']);
    });

    it('should be idempotent', () => {
      registerGameGraph();
      registry.initializeAll();
      registry.dispose();
      events.length = 0;

      registry.dispose();

      expect(events).toEqual([]);
    });

    it('should log disposal errors and keep going', () => {
      registry.register(Exploding, { priority: 1 });
      registry.register(StorageManager, { priority: 2 });
      registry.initializeAll();

      registry.dispose();

      expect(logger.error).toHaveBeenCalledWith('Error disposing component', {
        component: 'Exploding',
        error: 'disk full',
      });
      expect(events).toEqual(['StorageManager.dispose']);
    });

    it('should ignore registrations after dispose', () => {
      registry.dispose();

      expect(registry.register(StorageManager)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Registration ignored', {
        component: 'StorageManager',
        phase: 'disposed',
      });
    });
  });
});
