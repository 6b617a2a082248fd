import { describe, it, expect, beforeEach } from 'vitest';
import { metrics } from '../../src/utils/metrics.js';

describe('metrics', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('should summarize cycles by outcome', () => {
    metrics.recordCycle('succeeded', 100);
    metrics.recordCycle('partial', 200);
    metrics.recordCycle('failed', 300);
    metrics.cyclesSkipped.inc();

    expect(metrics.getSummary().cycles).toEqual({
      total: 3,
      failed: 1,
      partial: 1,
      skipped: 1,
      avgDuration: 200,
    });
  });

  it('should track vendor calls per operation', () => {
    metrics.recordVendorCall('system.hostInfo', 10, false);
    metrics.recordVendorCall('system.hostInfo', 30, true);

    const summary = metrics.getSummary();
    expect(summary.vendor).toEqual({ total: 2, errors: 1, errorRate: 50, avgDuration: 20 });

    const byOperation = metrics.getAll().counters.find(
      counter => counter.name === 'meshwatch_vendor_calls_by_operation'
    );
    expect(byOperation).toEqual({
      name: 'meshwatch_vendor_calls_by_operation',
      type: 'counter',
      value: 2,
      labels: { operation: 'system.hostInfo' },
    });
  });

  it('should report mesh size gauges', () => {
    metrics.routerCount.set(3);
    metrics.deviceCount.set(12);

    expect(metrics.getSummary().mesh).toEqual({ routers: 3, devices: 12 });
  });
});
