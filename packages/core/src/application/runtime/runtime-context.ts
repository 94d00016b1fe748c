/**
 * @fileoverview RuntimeContext - Composition root for the bootstrapper
 *
 * @packageDocumentation
 * @module @kindling/core/application/runtime
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Wires the logger, container, cache, catalog and registry from validated
 * options. Create one context at process start and pass it to whatever needs
 * the runtime; there is no global accessor.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime({ cache: { ttlMs: 60_000 } });
 *
 * runtime.catalog.registerImplementation(IStorage, MemoryStorage);
 * runtime.registry.register(SaveManager, { priority: 50 });
 * runtime.registry.initializeAll();
 *
 * // ... on shutdown
 * runtime.dispose();
 * ```
 *
 * @version 1.0.0
 */

import { type Clock, type ILogger } from '../../domain/di';
import {
  type RuntimeOptions,
  type RuntimeOptionsInput,
  parseRuntimeOptions,
} from '../../infrastructure/config';
import { ImplementationCatalog } from '../../infrastructure/di/discovery';
import { ResolutionCache } from '../../infrastructure/di/resolution-cache';
import { ServiceContainer } from '../../infrastructure/di/service-container';
import { ServiceHealthMonitor } from '../../infrastructure/di/service-health-monitor';
import { createContextLogger, createLogger } from '../../infrastructure/logging';
import { ComponentRegistry } from '../../infrastructure/registry/component-registry';

export interface RuntimeContext {
  readonly options: RuntimeOptions;
  readonly logger: ILogger;
  readonly container: ServiceContainer;
  readonly registry: ComponentRegistry;
  readonly cache: ResolutionCache;
  readonly catalog: ImplementationCatalog;
  readonly health: ServiceHealthMonitor;
  /**
   * Dispose the registry's components, then the container's singletons.
   */
  dispose(): void;
}

export interface CreateRuntimeOverrides {
  /**
   * Replaces the winston logger; every component gets this one.
   */
  logger?: ILogger;
  clock?: Clock;
}

/**
 * Build a runtime from options.
 *
 * @throws RuntimeConfigurationError when options are invalid
 */
export function createRuntime(
  input: RuntimeOptionsInput = {},
  overrides: CreateRuntimeOverrides = {},
): RuntimeContext {
  const options = parseRuntimeOptions(input);
  const clock = overrides.clock ?? Date.now;

  const root = createLogger({ level: options.logging.level, silent: options.logging.silent });
  const loggerFor = (context: string): ILogger =>
    overrides.logger ?? createContextLogger(root, context);

  const catalog = new ImplementationCatalog(loggerFor('ImplementationCatalog'));
  const cache = new ResolutionCache({
    ttlMs: options.cache.ttlMs,
    enabled: options.cache.enabled,
    clock,
  });
  const container = new ServiceContainer({
    logger: loggerFor('ServiceContainer'),
    clock,
    discovery: options.discovery.enabled ? catalog : null,
  });
  const registry = new ComponentRegistry({
    container,
    cache,
    logger: loggerFor('ComponentRegistry'),
    clock,
    strictInitialization: options.strictInitialization,
  });
  const health = new ServiceHealthMonitor(container, {
    logger: loggerFor('ServiceHealthMonitor'),
    clock,
  });

  const logger = loggerFor('Runtime');
  let disposed = false;

  logger.info('Runtime created', {
    strictInitialization: options.strictInitialization,
    cacheEnabled: options.cache.enabled,
    discoveryEnabled: options.discovery.enabled,
  });

  return {
    options,
    logger,
    container,
    registry,
    cache,
    catalog,
    health,
    dispose: () => {
      if (disposed) {
        return;
      }
      disposed = true;
      registry.dispose();
      container.dispose();
      logger.info('Runtime disposed');
    },
  };
}
