/**
 * Metrics Tracker
 *
 * Counts task service calls and the attempts inside them. Call latency
 * covers the whole call with retries and backoff; attempt latency covers a
 * single round trip, so the two diverge when the upstream flaps.
 *
 * @example
 * ```typescript
 * const tracker = new MetricsTracker();
 *
 * tracker.recordCallStart();
 * tracker.recordAttempt(120, false);
 * tracker.recordRetry();
 * tracker.recordAttempt(40, true);
 * tracker.recordSuccess(1160);
 *
 * tracker.getMetrics().successRate; // 100
 * ```
 */

import type { ConnectionFailedError, TimeoutError } from './errors.js';
import type { GatewayClientMetrics, LatencySummary } from './types.js';

type CallCounters = Omit<
  GatewayClientMetrics,
  'successRate' | 'failureRate' | 'callLatency' | 'attemptLatency'
>;

class LatencyWindow {
  private count = 0;
  private sum = 0;
  private max = 0;
  private min = Infinity;

  add(latencyMs: number): void {
    this.count++;
    this.sum += latencyMs;
    this.max = Math.max(this.max, latencyMs);
    this.min = Math.min(this.min, latencyMs);
  }

  summary(): LatencySummary {
    return {
      count: this.count,
      avgMs: this.count === 0 ? 0 : Math.round(this.sum / this.count),
      maxMs: this.max,
      minMs: this.min,
    };
  }
}

function percentage(part: number, whole: number, whenEmpty: number): number {
  return whole === 0 ? whenEmpty : Math.round((part / whole) * 100);
}

export class MetricsTracker {
  private counters: CallCounters = MetricsTracker.freshCounters();
  private calls = new LatencyWindow();
  private attempts = new LatencyWindow();

  private static freshCounters(): CallCounters {
    return {
      totalCalls: 0,
      successfulCalls: 0,
      failedCalls: 0,
      connectionFailures: 0,
      timeouts: 0,
      totalRetries: 0,
      totalAttempts: 0,
      failedAttempts: 0,
      lastResetAt: new Date(),
    };
  }

  /**
   * Once per logical call, before the first attempt
   */
  recordCallStart(): void {
    this.counters.totalCalls++;
  }

  /**
   * One round trip, whether or not it produced a response
   */
  recordAttempt(latencyMs: number, gotResponse: boolean): void {
    this.counters.totalAttempts++;
    if (!gotResponse) {
      this.counters.failedAttempts++;
    }
    this.attempts.add(latencyMs);
  }

  recordRetry(): void {
    this.counters.totalRetries++;
  }

  /**
   * A call that ended with an HTTP response
   *
   * @param latencyMs - From call start to the response, backoff included
   */
  recordSuccess(latencyMs: number): void {
    this.counters.successfulCalls++;
    this.calls.add(latencyMs);
  }

  /**
   * A call that ran out of attempts, classified by its last error
   */
  recordFailure(kind: (ConnectionFailedError | TimeoutError)['kind']): void {
    this.counters.failedCalls++;
    if (kind === 'Timeout') {
      this.counters.timeouts++;
    } else {
      this.counters.connectionFailures++;
    }
  }

  getMetrics(): GatewayClientMetrics {
    const { totalCalls, successfulCalls, failedCalls } = this.counters;
    return {
      ...this.counters,
      successRate: percentage(successfulCalls, totalCalls, 100),
      failureRate: percentage(failedCalls, totalCalls, 0),
      callLatency: this.calls.summary(),
      attemptLatency: this.attempts.summary(),
    };
  }

  reset(): void {
    this.counters = MetricsTracker.freshCounters();
    this.calls = new LatencyWindow();
    this.attempts = new LatencyWindow();
  }
}
