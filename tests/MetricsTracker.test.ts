import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsTracker } from '../src/MetricsTracker.js';

describe('MetricsTracker', () => {
  let tracker: MetricsTracker;

  beforeEach(() => {
    tracker = new MetricsTracker();
  });

  describe('recordCallStart', () => {
    it('should increment total calls', () => {
      tracker.recordCallStart();
      tracker.recordCallStart();
      tracker.recordCallStart();

      expect(tracker.getMetrics().totalCalls).toBe(3);
    });
  });

  describe('recordSuccess', () => {
    it('should track end-to-end call latency', () => {
      tracker.recordCallStart();
      tracker.recordSuccess(100);
      tracker.recordCallStart();
      tracker.recordSuccess(200);
      tracker.recordCallStart();
      tracker.recordSuccess(300);

      const metrics = tracker.getMetrics();
      expect(metrics.successfulCalls).toBe(3);
      expect(metrics.callLatency).toEqual({ count: 3, avgMs: 200, maxMs: 300, minMs: 100 });
    });
  });

  describe('recordAttempt', () => {
    it('should keep attempt latency apart from call latency', () => {
      tracker.recordCallStart();
      tracker.recordAttempt(30, false);
      tracker.recordRetry();
      tracker.recordAttempt(10, true);
      tracker.recordSuccess(1040);

      const metrics = tracker.getMetrics();
      expect(metrics.totalAttempts).toBe(2);
      expect(metrics.failedAttempts).toBe(1);
      expect(metrics.totalRetries).toBe(1);
      expect(metrics.attemptLatency).toEqual({ count: 2, avgMs: 20, maxMs: 30, minMs: 10 });
      expect(metrics.callLatency).toEqual({ count: 1, avgMs: 1040, maxMs: 1040, minMs: 1040 });
    });
  });

  describe('recordFailure', () => {
    it('should count failed calls by their last error', () => {
      tracker.recordCallStart();
      tracker.recordFailure('ConnectionFailed');
      tracker.recordCallStart();
      tracker.recordFailure('Timeout');
      tracker.recordCallStart();
      tracker.recordFailure('Timeout');

      const metrics = tracker.getMetrics();
      expect(metrics.failedCalls).toBe(3);
      expect(metrics.connectionFailures).toBe(1);
      expect(metrics.timeouts).toBe(2);
    });
  });

  describe('rates', () => {
    it('should report 100% success before any call', () => {
      const metrics = tracker.getMetrics();

      expect(metrics.successRate).toBe(100);
      expect(metrics.failureRate).toBe(0);
    });

    it('should derive rates from call outcomes', () => {
      tracker.recordCallStart();
      tracker.recordSuccess(50);
      tracker.recordCallStart();
      tracker.recordSuccess(50);
      tracker.recordCallStart();
      tracker.recordFailure('ConnectionFailed');

      // 2 successful out of 3 total = 67%
      const metrics = tracker.getMetrics();
      expect(metrics.successRate).toBe(67);
      expect(metrics.failureRate).toBe(33);
    });
  });

  describe('reset', () => {
    it('should reset all metrics to defaults', () => {
      tracker.recordCallStart();
      tracker.recordAttempt(10, true);
      tracker.recordSuccess(100);
      tracker.recordFailure('Timeout');
      tracker.recordRetry();

      tracker.reset();

      expect(tracker.getMetrics()).toMatchObject({
        totalCalls: 0,
        successfulCalls: 0,
        failedCalls: 0,
        timeouts: 0,
        totalRetries: 0,
        totalAttempts: 0,
        successRate: 100,
        callLatency: { count: 0, avgMs: 0, maxMs: 0, minMs: Infinity },
        attemptLatency: { count: 0, avgMs: 0, maxMs: 0, minMs: Infinity },
      });
    });

    it('should not carry latency over a reset', () => {
      tracker.recordCallStart();
      tracker.recordSuccess(1000);
      tracker.reset();
      tracker.recordCallStart();
      tracker.recordSuccess(10);

      expect(tracker.getMetrics().callLatency.avgMs).toBe(10);
    });
  });

  describe('getMetrics', () => {
    it('should return a copy', () => {
      tracker.recordCallStart();

      const metrics = tracker.getMetrics();
      metrics.totalCalls = 99;
      metrics.callLatency.count = 99;

      expect(tracker.getMetrics().totalCalls).toBe(1);
      expect(tracker.getMetrics().callLatency.count).toBe(0);
    });
  });
});
