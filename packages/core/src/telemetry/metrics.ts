// Counter and histogram shapes match prom-client's, so a host can hand its
// registry's metrics straight to the engine.

export interface Counter {
  inc(labels?: Record<string, string>, value?: number): void;
}

export interface Histogram {
  observe(labels: Record<string, string>, value: number): void;
}

export interface AdmissionMetrics {
  evaluationsTotal: Counter;
  allowedTotal: Counter;
  blockedTotal: Counter;
  /** Blocked requests that moved their caller up the ladder. */
  escalationsTotal: Counter;
  evaluationLatencyMs: Histogram;
}

/** Sums increments across all label sets. */
export class InMemoryCounter implements Counter {
  private total = 0;

  inc(_labels?: Record<string, string>, value = 1): void {
    this.total += value;
  }

  get(): number {
    return this.total;
  }
}

export interface HistogramSummary {
  count: number;
  sum: number;
  max: number;
}

/** Keeps a running summary rather than every observation. */
export class InMemoryHistogram implements Histogram {
  private summary: HistogramSummary = { count: 0, sum: 0, max: 0 };

  observe(_labels: Record<string, string>, value: number): void {
    this.summary = {
      count: this.summary.count + 1,
      sum: this.summary.sum + value,
      max: Math.max(this.summary.max, value),
    };
  }

  getSummary(): HistogramSummary {
    return { ...this.summary };
  }
}

export function createInMemoryMetrics(): AdmissionMetrics {
  return {
    evaluationsTotal: new InMemoryCounter(),
    allowedTotal: new InMemoryCounter(),
    blockedTotal: new InMemoryCounter(),
    escalationsTotal: new InMemoryCounter(),
    evaluationLatencyMs: new InMemoryHistogram(),
  };
}

let processMetrics: AdmissionMetrics | undefined;

/** Installs the metrics engines fall back to when none are injected. */
export function setMetrics(metrics: AdmissionMetrics): void {
  processMetrics = metrics;
}

export function getMetrics(): AdmissionMetrics {
  if (!processMetrics) {
    processMetrics = createInMemoryMetrics();
  }
  return processMetrics;
}
