/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer composes the infrastructure into a runnable
 * runtime.
 *
 * @module @kindling/core/application
 * @license Apache-2.0
 */

export * from './runtime';
