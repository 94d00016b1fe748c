/**
 * @fileoverview Application Runtime Module Exports
 *
 * @module @kindling/core/application/runtime
 * @license Apache-2.0
 */

export { type RuntimeContext, type CreateRuntimeOverrides, createRuntime } from './runtime-context';
