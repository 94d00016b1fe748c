/**
 * @fileoverview InitializationScheduler Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  CircularDependencyError,
  ComponentInitializationError,
  ServiceLifetime,
  isConstructor,
  type ServiceIdentifier,
} from '../../../src/domain/di';
import { type ComponentRegistration } from '../../../src/domain/registry';
import {
  InitializationScheduler,
  compareRegistrations,
  createInitializationRun,
} from '../../../src/infrastructure/registry';
import { createTestLogger, messagesOf, type TestLogger } from '../../fixtures/test-logger';

// ============================================================================
// Test Fixtures
// ============================================================================

const events: string[] = [];

class GameManager {}
class SaveManager {}
class StorageManager {}
class HighManager {}
class MidManager {}
class LowManager {}
class Ghost {}
class Ping {}
class Pong {}
class Free {}

class AudioManager {
  initialize(): void {
    events.push('AudioManager.initialize');
  }

  onDependenciesResolved(): void {
    events.push('AudioManager.onDependenciesResolved');
  }
}

class Broken {
  constructor() {
    throw new Error('boom');
  }
}

class Dependent {}
class Downstream {}
class Independent {}

class BadHook {
  initialize(): void {
    throw new Error('hook failed');
  }
}

let sequence = 0;

function registration(
  type: ServiceIdentifier,
  priority = 0,
  registeredAt = 0,
): ComponentRegistration {
  return {
    type,
    priority,
    dependencies: [],
    lifetime: ServiceLifetime.Singleton,
    registeredAt,
    sequence: sequence++,
  };
}

function edges(
  ...pairs: [ServiceIdentifier, ServiceIdentifier[]][]
): Map<ServiceIdentifier, readonly ServiceIdentifier[]> {
  return new Map(pairs);
}

function byType(
  ...registrations: ComponentRegistration[]
): Map<ServiceIdentifier, ComponentRegistration> {
  return new Map(registrations.map((entry) => [entry.type, entry]));
}

const construct = vi.fn((entry: ComponentRegistration): unknown => {
  const { type } = entry;
  if (isConstructor(type)) {
    return new type();
  }
  throw new Error('not a class');
});

// ============================================================================
// Tests
// ============================================================================

describe('InitializationScheduler', () => {
  let logger: TestLogger;
  let scheduler: InitializationScheduler;

  beforeEach(() => {
    events.length = 0;
    construct.mockClear();
    logger = createTestLogger();
    scheduler = new InitializationScheduler(construct, { logger });
  });

  // ==========================================================================
  // compareRegistrations
  // ==========================================================================

  describe('compareRegistrations', () => {
    it('should order by priority, then registration time, then sequence', () => {
      const first = registration(Free, 1, 10);
      const later = registration(Ping, 1, 20);
      const higher = registration(Pong, 5, 30);
      const sameTime = registration(Ghost, 1, 10);

      expect([later, sameTime, higher, first].sort(compareRegistrations)).toEqual([
        higher,
        first,
        sameTime,
        later,
      ]);
    });
  });

  // ==========================================================================
  // computeOrder
  // ==========================================================================

  describe('computeOrder', () => {
    it('should place dependencies before dependents', () => {
      const order = scheduler.computeOrder(
        [registration(GameManager, 100), registration(SaveManager, 50), registration(StorageManager, 0)],
        edges([GameManager, [SaveManager]], [SaveManager, [StorageManager]]),
      );

      expect(order).toEqual([StorageManager, SaveManager, GameManager]);
    });

    it('should order independent components by priority', () => {
      const order = scheduler.computeOrder(
        [registration(LowManager, 1), registration(HighManager, 5), registration(MidManager, 3)],
        edges(),
      );

      expect(order).toEqual([HighManager, MidManager, LowManager]);
    });

    it('should break priority ties by registration time', () => {
      const order = scheduler.computeOrder(
        [registration(Ping, 0, 20), registration(Pong, 0, 10)],
        edges(),
      );

      expect(order).toEqual([Pong, Ping]);
    });

    it('should restart from the highest priority after each placement', () => {
      const order = scheduler.computeOrder(
        [registration(LowManager, 0), registration(HighManager, 10), registration(MidManager, 5)],
        edges([HighManager, [LowManager]]),
      );

      expect(order).toEqual([MidManager, LowManager, HighManager]);
    });

    it('should not wait on unregistered dependencies', () => {
      const order = scheduler.computeOrder([registration(GameManager)], edges([GameManager, [Ghost]]));

      expect(order).toEqual([GameManager]);
    });

    it('should throw CircularDependencyError naming the cycle', () => {
      try {
        scheduler.computeOrder(
          [registration(Free, 3), registration(Ping, 2), registration(Pong, 1)],
          edges([Ping, [Pong]], [Pong, [Ping]]),
        );
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(CircularDependencyError);
        if (error instanceof CircularDependencyError) {
          expect(error.cycle).toEqual([Ping, Pong, Ping]);
          expect(error.message).toBe('Circular dependency detected: Ping -> Pong -> Ping');
        }
      }
    });
  });

  // ==========================================================================
  // initialize
  // ==========================================================================

  describe('initialize', () => {
    it('should construct components and run their hooks in order', () => {
      const audio = registration(AudioManager);
      const report = scheduler.initialize([AudioManager], byType(audio), edges());

      expect(report).toEqual({ initialized: [AudioManager], skipped: [], failed: [] });
      expect(audio.instance).toBeInstanceOf(AudioManager);
      expect(events).toEqual(['AudioManager.initialize', 'AudioManager.onDependenciesResolved']);
    });

    it('should leave components with an attached instance alone', () => {
      const existing = new AudioManager();
      const audio = registration(AudioManager);
      audio.instance = existing;

      const report = scheduler.initialize([AudioManager], byType(audio), edges());

      expect(construct).not.toHaveBeenCalled();
      expect(audio.instance).toBe(existing);
      expect(events).toEqual([]);
      expect(report.initialized).toEqual([]);
    });

    it('should build dependencies first even when listed later', () => {
      const report = scheduler.initialize(
        [GameManager, StorageManager],
        byType(registration(GameManager), registration(StorageManager)),
        edges([GameManager, [StorageManager]]),
      );

      expect(report.initialized).toEqual([StorageManager, GameManager]);
      expect(construct).toHaveBeenCalledTimes(2);
    });

    it('should abort on a construction failure in strict mode', () => {
      const registrations = byType(registration(Broken), registration(Independent));

      try {
        scheduler.initialize([Broken, Independent], registrations, edges());
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ComponentInitializationError);
        if (error instanceof ComponentInitializationError) {
          expect(error.message).toBe("Initialization aborted at 'Broken': boom");
          expect(error.componentName).toBe('Broken');
        }
      }

      expect(logger.error).toHaveBeenCalledWith('Failed to construct component', {
        component: 'Broken',
        error: 'boom',
      });
      expect(registrations.get(Independent)?.instance).toBeUndefined();
    });

    it('should skip failed components and their dependents in lenient mode', () => {
      const lenient = new InitializationScheduler(construct, { logger, strict: false });

      const report = lenient.initialize(
        [Broken, Dependent, Downstream, Independent],
        byType(
          registration(Broken),
          registration(Dependent),
          registration(Downstream),
          registration(Independent),
        ),
        edges([Dependent, [Broken]], [Downstream, [Dependent]]),
      );

      expect(report.initialized).toEqual([Independent]);
      expect(report.skipped).toEqual([Dependent, Downstream]);
      expect(report.failed).toHaveLength(1);
      expect(report.failed[0]?.name).toBe('Broken');
      expect(report.failed[0]?.error.message).toBe('boom');
      expect(logger.warn).toHaveBeenCalledWith('Skipping component, dependency unavailable', {
        component: 'Dependent',
        dependency: 'Broken',
      });
      expect(logger.warn).toHaveBeenCalledWith('Skipping component, dependency unavailable', {
        component: 'Downstream',
        dependency: 'Dependent',
      });
    });

    it('should abort on a failing hook even in lenient mode', () => {
      const lenient = new InitializationScheduler(construct, { logger, strict: false });

      expect(() =>
        lenient.initialize([BadHook], byType(registration(BadHook)), edges()),
      ).toThrow("Initialization aborted at 'BadHook': hook failed");
      expect(messagesOf(logger.error)).toEqual(['Lifecycle hook failed']);
    });
  });

  // ==========================================================================
  // ensure
  // ==========================================================================

  describe('ensure', () => {
    it('should start only the component and its registered dependencies', () => {
      const registrations = byType(
        registration(GameManager),
        registration(StorageManager),
        registration(Independent),
      );

      const started = scheduler.ensure(
        GameManager,
        registrations,
        edges([GameManager, [StorageManager, Ghost]]),
      );

      expect(started).toBe(true);
      expect(construct.mock.calls.map(([entry]) => entry.type)).toEqual([StorageManager, GameManager]);
      expect(registrations.get(Independent)?.instance).toBeUndefined();
    });

    it('should report an unregistered type as available', () => {
      expect(scheduler.ensure(Ghost, byType(), edges())).toBe(true);
      expect(construct).not.toHaveBeenCalled();
    });

    it('should share blocked components across calls of one run', () => {
      const lenient = new InitializationScheduler(construct, { logger, strict: false });
      const registrations = byType(registration(Broken), registration(Dependent), registration(Downstream));
      const graph = edges([Dependent, [Broken]], [Downstream, [Broken]]);
      const run = createInitializationRun();

      expect(lenient.ensure(Dependent, registrations, graph, run)).toBe(false);
      expect(lenient.ensure(Downstream, registrations, graph, run)).toBe(false);

      expect(construct).toHaveBeenCalledTimes(1);
      expect(run.skipped).toEqual([Dependent, Downstream]);
      expect(run.failed.map((failure) => failure.name)).toEqual(['Broken']);
    });

    it('should detach the instance when a hook fails', () => {
      const badHook = registration(BadHook);

      expect(() => scheduler.ensure(BadHook, byType(badHook), edges())).toThrow(
        ComponentInitializationError,
      );
      expect(badHook.instance).toBeUndefined();
    });

    it('should throw CircularDependencyError for a cycle reached directly', () => {
      expect(() =>
        scheduler.ensure(
          Ping,
          byType(registration(Ping), registration(Pong)),
          edges([Ping, [Pong]], [Pong, [Ping]]),
        ),
      ).toThrow(CircularDependencyError);
    });
  });

  // ==========================================================================
  // activate
  // ==========================================================================

  describe('activate', () => {
    it('should run hooks on the attached instance', () => {
      const audio = registration(AudioManager);
      audio.instance = new AudioManager();

      scheduler.activate(audio);

      expect(events).toEqual(['AudioManager.initialize', 'AudioManager.onDependenciesResolved']);
    });

    it('should do nothing for an instance without hooks', () => {
      const plain = registration(Free);
      plain.instance = new Free();

      expect(() => scheduler.activate(plain)).not.toThrow();
    });
  });
});
