/**
 * @fileoverview Domain Registry Module Exports
 *
 * @packageDocumentation
 * @module @kindling/core/domain/registry
 * @license Apache-2.0
 */

export type {
  ComponentLifetime,
  RegistryPhase,
  ComponentRegistration,
  RegisterComponentOptions,
  DependencyEdges,
  MissingDependency,
  ValidationResult,
  ComplexityRating,
  DependencyAnalysis,
  InitializationFailure,
  InitializationReport,
  RegistrationSummary,
} from './registry.types';
