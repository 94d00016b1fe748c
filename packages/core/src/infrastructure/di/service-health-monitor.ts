/**
 * @fileoverview ServiceHealthMonitor - Per-service health checks
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Resolves every registered service, asks the ones that implement
 * {@link IHealthCheckable} how they are doing, and rates each one:
 *
 * ```
 * not registered / fails to resolve / resolves to null   -> Unhealthy
 * own check says so                                      -> its status
 * resolved in more than slowResponseMs                   -> Degraded
 * more than failureThreshold recorded failures           -> Degraded
 * otherwise                                              -> Healthy
 * ```
 *
 * Nothing runs on a timer. Call {@link ServiceHealthMonitor.checkIfDue} from
 * a loop the application already has, or check on demand.
 *
 * @version 1.0.0
 */

import {
  type Clock,
  type HealthReport,
  type ILogger,
  type ServiceHealthCheck,
  type ServiceIdentifier,
  ServiceHealthStatus,
  getServiceName,
  isHealthCheckable,
  toError,
} from '../../domain/di';
import { getDefaultLogger } from '../logging';

import { type ServiceContainer } from './service-container';

export interface ServiceHealthMonitorOptions {
  logger?: ILogger;
  clock?: Clock;
  /**
   * Default: 100
   */
  slowResponseMs?: number;
  /**
   * Failures above this count degrade an otherwise healthy service.
   * Default: 3
   */
  failureThreshold?: number;
  /**
   * Response times kept per service. Default: 20
   */
  historySize?: number;
  /**
   * Minimum time between checks run by `checkIfDue`. Default: 30000
   */
  intervalMs?: number;
}

interface CheckDraft {
  status: ServiceHealthStatus;
  message: string;
  metadata: Record<string, string>;
}

export class ServiceHealthMonitor {
  private readonly lastChecks = new Map<ServiceIdentifier, ServiceHealthCheck>();
  private readonly responseTimes = new Map<ServiceIdentifier, number[]>();
  private readonly failureCounts = new Map<ServiceIdentifier, number>();
  private lastReport: HealthReport | null = null;

  private readonly logger: ILogger;
  private readonly clock: Clock;
  private readonly slowResponseMs: number;
  private readonly failureThreshold: number;
  private readonly historySize: number;
  private readonly intervalMs: number;

  constructor(
    private readonly container: ServiceContainer,
    options: ServiceHealthMonitorOptions = {},
  ) {
    this.logger = options.logger ?? getDefaultLogger('ServiceHealthMonitor');
    this.clock = options.clock ?? Date.now;
    this.slowResponseMs = options.slowResponseMs ?? 100;
    this.failureThreshold = options.failureThreshold ?? 3;
    this.historySize = options.historySize ?? 20;
    this.intervalMs = options.intervalMs ?? 30_000;
  }

  // ============================================================================
  // Checks
  // ============================================================================

  /**
   * Check every registered service and log the outcome.
   */
  performHealthCheck(): HealthReport {
    const checks = this.container
      .getRegistrations()
      .map((descriptor) => this.checkServiceHealth(descriptor.serviceIdentifier));

    const count = (status: ServiceHealthStatus): number =>
      checks.filter((check) => check.status === status).length;
    const healthyServices = count(ServiceHealthStatus.Healthy);
    const degradedServices = count(ServiceHealthStatus.Degraded);
    const unhealthyServices = count(ServiceHealthStatus.Unhealthy);

    let overallStatus = ServiceHealthStatus.Healthy;
    if (unhealthyServices > 0) {
      overallStatus = ServiceHealthStatus.Unhealthy;
    } else if (degradedServices > 0) {
      overallStatus = ServiceHealthStatus.Degraded;
    }

    const report: HealthReport = {
      reportedAt: this.clock(),
      overallStatus,
      totalServices: checks.length,
      healthyServices,
      degradedServices,
      unhealthyServices,
      checks,
      summary: `Health: ${overallStatus} | Healthy: ${healthyServices} | Degraded: ${degradedServices} | Unhealthy: ${unhealthyServices}`,
    };

    this.lastReport = report;
    this.logReport(report);
    return report;
  }

  /**
   * Run {@link performHealthCheck} when no check has run yet or the interval
   * has elapsed since the last one.
   *
   * @returns the new report, or `null` when not due
   */
  checkIfDue(): HealthReport | null {
    if (this.lastReport !== null && this.clock() - this.lastReport.reportedAt < this.intervalMs) {
      return null;
    }
    return this.performHealthCheck();
  }

  /**
   * Check one service and remember the result.
   */
  checkServiceHealth(identifier: ServiceIdentifier): ServiceHealthCheck {
    const serviceName = getServiceName(identifier);
    const startedAt = this.clock();

    const finish = (draft: CheckDraft, responseTimeMs: number): ServiceHealthCheck => {
      const check: ServiceHealthCheck = {
        serviceIdentifier: identifier,
        serviceName,
        checkedAt: startedAt,
        responseTimeMs,
        ...draft,
      };
      this.lastChecks.set(identifier, check);
      return check;
    };

    if (!this.container.isRegistered(identifier)) {
      return finish(
        { status: ServiceHealthStatus.Unhealthy, message: 'Service not registered', metadata: {} },
        0,
      );
    }

    const draft = this.inspectInstance(identifier);
    const responseTimeMs = this.clock() - startedAt;
    this.recordResponseTime(identifier, responseTimeMs);

    if (draft.status === ServiceHealthStatus.Healthy && responseTimeMs > this.slowResponseMs) {
      draft.status = ServiceHealthStatus.Degraded;
      draft.message = `Slow response time: ${responseTimeMs.toFixed(2)}ms`;
    }

    const failures = this.getFailureCount(identifier);
    if (draft.status === ServiceHealthStatus.Healthy && failures > this.failureThreshold) {
      draft.status = ServiceHealthStatus.Degraded;
      draft.message = `Recent failures detected (${failures} in history)`;
    }

    const lifetime = this.container
      .getRegistrations()
      .find((descriptor) => descriptor.serviceIdentifier === identifier)?.lifetime;
    if (lifetime !== undefined) {
      draft.metadata['lifetime'] = lifetime;
    }
    draft.metadata['avgResponseTime'] = `${this.getAverageResponseTime(identifier).toFixed(2)}ms`;
    draft.metadata['failureCount'] = String(failures);

    return finish(draft, responseTimeMs);
  }

  private inspectInstance(identifier: ServiceIdentifier): CheckDraft {
    const metadata: Record<string, string> = {};

    const result = this.container.resolveResult(identifier);
    if (!result.success) {
      this.incrementFailureCount(identifier);
      return {
        status: ServiceHealthStatus.Unhealthy,
        message: `Failed to resolve: ${result.error.message}`,
        metadata,
      };
    }

    const instance = result.value;
    if (instance === null || instance === undefined) {
      return { status: ServiceHealthStatus.Unhealthy, message: 'Service resolved to null', metadata };
    }

    if (typeof instance === 'object') {
      metadata['instanceType'] = instance.constructor.name;
    }

    if (!isHealthCheckable(instance)) {
      return { status: ServiceHealthStatus.Healthy, message: 'Service resolved successfully', metadata };
    }

    metadata['customHealthCheck'] = 'true';
    try {
      const outcome = instance.checkHealth();
      return { status: outcome.status, message: outcome.message, metadata };
    } catch (error) {
      this.incrementFailureCount(identifier);
      return {
        status: ServiceHealthStatus.Unhealthy,
        message: `Health check threw: ${toError(error).message}`,
        metadata,
      };
    }
  }

  // ============================================================================
  // Queries
  // ============================================================================

  /**
   * Last result for a service, or an `Unknown` placeholder.
   */
  getServiceHealth(identifier: ServiceIdentifier): ServiceHealthCheck {
    return (
      this.lastChecks.get(identifier) ?? {
        serviceIdentifier: identifier,
        serviceName: getServiceName(identifier),
        status: ServiceHealthStatus.Unknown,
        message: 'No health check performed yet',
        checkedAt: 0,
        responseTimeMs: 0,
        metadata: {},
      }
    );
  }

  getLastReport(): HealthReport | null {
    return this.lastReport;
  }

  getUnhealthyServices(): ServiceHealthCheck[] {
    return this.withStatus(ServiceHealthStatus.Unhealthy);
  }

  getDegradedServices(): ServiceHealthCheck[] {
    return this.withStatus(ServiceHealthStatus.Degraded);
  }

  getFailureCount(identifier: ServiceIdentifier): number {
    return this.failureCounts.get(identifier) ?? 0;
  }

  /**
   * Mean of the kept response times; 0 with no history.
   */
  getAverageResponseTime(identifier: ServiceIdentifier): number {
    const history = this.responseTimes.get(identifier) ?? [];
    if (history.length === 0) {
      return 0;
    }
    return history.reduce((sum, time) => sum + time, 0) / history.length;
  }

  resetFailureCount(identifier: ServiceIdentifier): void {
    this.failureCounts.delete(identifier);
  }

  /**
   * Forget every result, response time and failure count.
   */
  clearHistory(): void {
    this.lastChecks.clear();
    this.responseTimes.clear();
    this.failureCounts.clear();
    this.lastReport = null;
  }

  private withStatus(status: ServiceHealthStatus): ServiceHealthCheck[] {
    return [...this.lastChecks.values()].filter((check) => check.status === status);
  }

  private recordResponseTime(identifier: ServiceIdentifier, responseTimeMs: number): void {
    const history = this.responseTimes.get(identifier) ?? [];
    history.push(responseTimeMs);
    if (history.length > this.historySize) {
      history.shift();
    }
    this.responseTimes.set(identifier, history);
  }

  private incrementFailureCount(identifier: ServiceIdentifier): void {
    this.failureCounts.set(identifier, this.getFailureCount(identifier) + 1);
  }

  private logReport(report: HealthReport): void {
    this.logger.info('Service health report', { summary: report.summary });
    for (const check of report.checks) {
      if (check.status === ServiceHealthStatus.Unhealthy) {
        this.logger.error('Unhealthy service', { service: check.serviceName, message: check.message });
      } else if (check.status === ServiceHealthStatus.Degraded) {
        this.logger.warn('Degraded service', { service: check.serviceName, message: check.message });
      }
    }
  }
}
