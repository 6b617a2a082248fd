import { createChildLogger } from './logger.js';

const logger = createChildLogger('metrics');

export interface MetricStats {
  count: number;
  sum: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

class Counter {
  private value = 0;
  private readonly name: string;
  private readonly labels: Record<string, string>;

  constructor(name: string, labels: Record<string, string> = {}) {
    this.name = name;
    this.labels = labels;
  }

  inc(delta = 1): void {
    this.value += delta;
  }

  get(): number {
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }

  toJSON(): { name: string; type: 'counter'; value: number; labels: Record<string, string> } {
    return { name: this.name, type: 'counter', value: this.value, labels: this.labels };
  }
}

class Gauge {
  private value = 0;
  private readonly name: string;
  private readonly labels: Record<string, string>;

  constructor(name: string, labels: Record<string, string> = {}) {
    this.name = name;
    this.labels = labels;
  }

  set(value: number): void {
    this.value = value;
  }

  get(): number {
    return this.value;
  }

  toJSON(): { name: string; type: 'gauge'; value: number; labels: Record<string, string> } {
    return { name: this.name, type: 'gauge', value: this.value, labels: this.labels };
  }
}

class Histogram {
  private values: number[] = [];
  private readonly name: string;
  private readonly labels: Record<string, string>;
  private readonly maxSamples: number;

  constructor(name: string, labels: Record<string, string> = {}, maxSamples = 1000) {
    this.name = name;
    this.labels = labels;
    this.maxSamples = maxSamples;
  }

  observe(value: number): void {
    this.values.push(value);
    if (this.values.length > this.maxSamples) {
      this.values.shift();
    }
  }

  getStats(): MetricStats {
    const count = this.values.length;
    if (count === 0) {
      return { count: 0, sum: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
    }

    const sorted = [...this.values].sort((a, b) => a - b);
    const sum = sorted.reduce((a, b) => a + b, 0);
    const at = (quantile: number): number => sorted[Math.min(count - 1, Math.floor(count * quantile))] ?? 0;

    return {
      count,
      sum,
      min: at(0),
      max: sorted[count - 1] ?? 0,
      avg: sum / count,
      p50: at(0.5),
      p95: at(0.95),
      p99: at(0.99),
    };
  }

  reset(): void {
    this.values = [];
  }

  toJSON(): { name: string; type: 'histogram'; stats: MetricStats; labels: Record<string, string> } {
    return { name: this.name, type: 'histogram', stats: this.getStats(), labels: this.labels };
  }
}

class MonitorMetrics {
  private counters = new Map<string, Counter>();
  private gauges = new Map<string, Gauge>();
  private histograms = new Map<string, Histogram>();
  private readonly startTime = Date.now();

  readonly cyclesTotal = this.counter('meshwatch_cycles_total');
  readonly cyclesFailed = this.counter('meshwatch_cycles_failed_total');
  readonly cyclesPartial = this.counter('meshwatch_cycles_partial_total');
  readonly cyclesSkipped = this.counter('meshwatch_cycles_skipped_total');
  readonly cycleDuration = this.histogram('meshwatch_cycle_duration_ms');
  readonly vendorCalls = this.counter('meshwatch_vendor_calls_total');
  readonly vendorErrors = this.counter('meshwatch_vendor_errors_total');
  readonly vendorDuration = this.histogram('meshwatch_vendor_call_duration_ms');
  readonly logins = this.counter('meshwatch_logins_total');
  readonly routerCount = this.gauge('meshwatch_routers');
  readonly deviceCount = this.gauge('meshwatch_devices');

  private counter(name: string, labels: Record<string, string> = {}): Counter {
    const key = `${name}:${JSON.stringify(labels)}`;
    const existing = this.counters.get(key);
    if (existing) return existing;
    const created = new Counter(name, labels);
    this.counters.set(key, created);
    return created;
  }

  private gauge(name: string, labels: Record<string, string> = {}): Gauge {
    const key = `${name}:${JSON.stringify(labels)}`;
    const existing = this.gauges.get(key);
    if (existing) return existing;
    const created = new Gauge(name, labels);
    this.gauges.set(key, created);
    return created;
  }

  private histogram(name: string, labels: Record<string, string> = {}): Histogram {
    const key = `${name}:${JSON.stringify(labels)}`;
    const existing = this.histograms.get(key);
    if (existing) return existing;
    const created = new Histogram(name, labels);
    this.histograms.set(key, created);
    return created;
  }

  labeledCounter(name: string, labels: Record<string, string>): Counter {
    return this.counter(name, labels);
  }

  recordVendorCall(operation: string, durationMs: number, success: boolean): void {
    this.vendorCalls.inc();
    this.vendorDuration.observe(durationMs);
    this.labeledCounter('meshwatch_vendor_calls_by_operation', { operation }).inc();

    if (!success) {
      this.vendorErrors.inc();
      this.labeledCounter('meshwatch_vendor_errors_by_operation', { operation }).inc();
    }
  }

  recordCycle(status: 'succeeded' | 'partial' | 'failed', durationMs: number): void {
    this.cyclesTotal.inc();
    this.cycleDuration.observe(durationMs);
    if (status === 'failed') {
      this.cyclesFailed.inc();
    } else if (status === 'partial') {
      this.cyclesPartial.inc();
    }
  }

  getUptime(): number {
    return Date.now() - this.startTime;
  }

  getAll(): {
    uptime: number;
    counters: Array<ReturnType<Counter['toJSON']>>;
    gauges: Array<ReturnType<Gauge['toJSON']>>;
    histograms: Array<ReturnType<Histogram['toJSON']>>;
  } {
    return {
      uptime: this.getUptime(),
      counters: Array.from(this.counters.values()).map(c => c.toJSON()),
      gauges: Array.from(this.gauges.values()).map(g => g.toJSON()),
      histograms: Array.from(this.histograms.values()).map(h => h.toJSON()),
    };
  }

  getSummary(): {
    uptime: number;
    cycles: { total: number; failed: number; partial: number; skipped: number; avgDuration: number };
    vendor: { total: number; errors: number; errorRate: number; avgDuration: number };
    mesh: { routers: number; devices: number };
  } {
    const vendorTotal = this.vendorCalls.get();

    return {
      uptime: this.getUptime(),
      cycles: {
        total: this.cyclesTotal.get(),
        failed: this.cyclesFailed.get(),
        partial: this.cyclesPartial.get(),
        skipped: this.cyclesSkipped.get(),
        avgDuration: this.cycleDuration.getStats().avg,
      },
      vendor: {
        total: vendorTotal,
        errors: this.vendorErrors.get(),
        errorRate: vendorTotal > 0 ? (this.vendorErrors.get() / vendorTotal) * 100 : 0,
        avgDuration: this.vendorDuration.getStats().avg,
      },
      mesh: {
        routers: this.routerCount.get(),
        devices: this.deviceCount.get(),
      },
    };
  }

  logSummary(): void {
    logger.info(this.getSummary(), 'Monitor metrics summary');
  }

  reset(): void {
    this.counters.forEach(c => c.reset());
    this.histograms.forEach(h => h.reset());
  }
}

export const metrics = new MonitorMetrics();
