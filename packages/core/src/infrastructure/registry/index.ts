/**
 * @fileoverview Infrastructure Registry Module Exports
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/registry
 * @license Apache-2.0
 */

export { DependencyResolver, findFirstCycle, canonicalizeCycle } from './dependency-resolver';

export {
  InitializationScheduler,
  type ConstructComponent,
  type InitializationSchedulerOptions,
  type InitializationRun,
  compareRegistrations,
  createInitializationRun,
} from './initialization-scheduler';

export {
  ComponentRegistry,
  type ComponentRegistryOptions,
  rateComplexity,
} from './component-registry';
