/**
 * @fileoverview Infrastructure Config Module Exports
 *
 * @module @kindling/core/infrastructure/config
 * @license Apache-2.0
 */

export {
  DEFAULT_CACHE_TTL_MS,
  RuntimeOptionsSchema,
  type RuntimeOptions,
  type RuntimeOptionsInput,
  parseRuntimeOptions,
  loadRuntimeOptionsFromEnv,
} from './runtime-options';
