/**
 * Health Monitor
 *
 * Probes the task service health endpoint and caches a healthy result for
 * a configurable time. Concurrent checks share the probe in flight.
 */

import { HealthStatus, type GatewayLogger } from './types.js';
import type { RetryingTransport } from './transport/RetryingTransport.js';

export interface HealthMonitorOptions {
  serviceName: string;
  healthCheckPath: string;
  /** How long a healthy result is trusted */
  ttlMs: number;
}

export interface HealthSnapshot {
  status: HealthStatus;
  lastCheck: Date | null;
  latencyMs: number;
  error?: string;
}

export class HealthMonitor {
  private status: HealthStatus = HealthStatus.UNKNOWN;
  private lastCheckAt = 0;
  private latencyMs = 0;
  private lastError: string | null = null;
  private probe: Promise<boolean> | null = null;

  constructor(
    private readonly transport: RetryingTransport,
    private readonly options: HealthMonitorOptions,
    private readonly logger: GatewayLogger,
    private readonly onChange?: (status: HealthStatus) => void
  ) {}

  /**
   * Whether the task service is healthy. Never throws.
   */
  async check(): Promise<boolean> {
    if (
      this.status === HealthStatus.HEALTHY &&
      Date.now() - this.lastCheckAt < this.options.ttlMs
    ) {
      return true;
    }

    if (!this.probe) {
      this.probe = this.runProbe().finally(() => {
        this.probe = null;
      });
    }
    return this.probe;
  }

  getSnapshot(): HealthSnapshot {
    return {
      status: this.status,
      lastCheck: this.lastCheckAt > 0 ? new Date(this.lastCheckAt) : null,
      latencyMs: this.latencyMs,
      ...(this.lastError ? { error: this.lastError } : {}),
    };
  }

  /**
   * Forget the cached result so the next check probes again
   */
  invalidate(): void {
    this.lastCheckAt = 0;
  }

  private async runProbe(): Promise<boolean> {
    const result = await this.transport.execute({
      method: 'GET',
      path: this.options.healthCheckPath,
      skipRetry: true,
      recordMetrics: false,
    });

    this.lastCheckAt = Date.now();
    let healthy: boolean;
    if (result.ok) {
      healthy = result.value.status === 200;
      this.latencyMs = result.value.latencyMs;
      this.lastError = healthy ? null : `Health endpoint returned HTTP ${result.value.status}`;
    } else {
      healthy = false;
      this.lastError = result.error.message;
    }

    this.logger.debug(
      { service: this.options.serviceName, healthy, error: this.lastError ?? undefined },
      'Task service health check'
    );
    if (!healthy) {
      this.logger.warn(
        { service: this.options.serviceName, error: this.lastError },
        'Task service health check failed'
      );
    }

    this.setStatus(healthy ? HealthStatus.HEALTHY : HealthStatus.UNHEALTHY);
    return healthy;
  }

  private setStatus(status: HealthStatus): void {
    if (status === this.status) {
      return;
    }
    this.status = status;
    this.onChange?.(status);
  }
}
