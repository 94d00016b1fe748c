/**
 * @fileoverview Service Health - Health check contracts and report shapes
 *
 * @packageDocumentation
 * @module @kindling/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Shapes produced by the container health monitor, and the optional hook a
 * service implements to report on itself.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier } from './service-identifier';

export enum ServiceHealthStatus {
  /**
   * Not checked yet.
   */
  Unknown = 'unknown',
  Healthy = 'healthy',
  /**
   * Resolves, but slowly, after repeated failures, or by its own account.
   */
  Degraded = 'degraded',
  Unhealthy = 'unhealthy',
}

/**
 * What a service reports about itself.
 */
export interface HealthCheckOutcome {
  readonly status: ServiceHealthStatus;
  readonly message: string;
}

/**
 * Services that can judge their own health.
 *
 * @example
 * ```typescript
 * class NetworkManager implements IHealthCheckable {
 *   checkHealth(): HealthCheckOutcome {
 *     return this.socket.connected
 *       ? { status: ServiceHealthStatus.Healthy, message: 'Connected' }
 *       : { status: ServiceHealthStatus.Degraded, message: 'Reconnecting' };
 *   }
 * }
 * ```
 */
export interface IHealthCheckable {
  checkHealth(): HealthCheckOutcome;
}

export function isHealthCheckable(obj: unknown): obj is IHealthCheckable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'checkHealth' in obj &&
    typeof obj.checkHealth === 'function'
  );
}

/**
 * Result of checking one service.
 */
export interface ServiceHealthCheck {
  readonly serviceIdentifier: ServiceIdentifier;
  readonly serviceName: string;
  readonly status: ServiceHealthStatus;
  readonly message: string;
  /**
   * Clock timestamp (ms); 0 when never checked.
   */
  readonly checkedAt: number;
  readonly responseTimeMs: number;
  /**
   * `instanceType`, `customHealthCheck`, `lifetime`, `avgResponseTime`,
   * `failureCount`, where known.
   */
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Result of checking every registered service.
 */
export interface HealthReport {
  readonly reportedAt: number;
  /**
   * Unhealthy if any service is, else Degraded if any service is, else
   * Healthy.
   */
  readonly overallStatus: ServiceHealthStatus;
  readonly totalServices: number;
  readonly healthyServices: number;
  readonly degradedServices: number;
  readonly unhealthyServices: number;
  readonly checks: readonly ServiceHealthCheck[];
  /**
   * One line, e.g. `Health: degraded | Healthy: 3 | Degraded: 1 | Unhealthy: 0`.
   */
  readonly summary: string;
}
