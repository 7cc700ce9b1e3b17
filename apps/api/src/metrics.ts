import { Counter as PromCounterMetric, Histogram as PromHistogramMetric, Registry, collectDefaultMetrics } from "prom-client";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { AdmissionMetrics, Counter, Histogram } from "@rankguard/core";

class PromCounter implements Counter {
  private counter: PromCounterMetric;
  constructor(registry: Registry, name: string, help: string, labelNames: string[]) {
    this.counter = new PromCounterMetric({ name, help, labelNames, registers: [registry] });
  }
  inc(labels?: Record<string, string>, value?: number): void {
    if (labels) {
      this.counter.inc(labels, value ?? 1);
    } else {
      this.counter.inc(value ?? 1);
    }
  }
}

class PromHistogram implements Histogram {
  private histogram: PromHistogramMetric;
  constructor(registry: Registry, name: string, help: string, labelNames: string[], buckets?: number[]) {
    this.histogram = new PromHistogramMetric({ name, help, labelNames, buckets, registers: [registry] });
  }
  observe(labels: Record<string, string>, value: number): void {
    this.histogram.observe(labels, value);
  }
}

const LABELS = ["endpoint"];
const LATENCY_BUCKETS = [0.5, 1, 2.5, 5, 10, 25, 50, 100, 250, 500, 1000];

export interface PromMetrics {
  registry: Registry;
  metrics: AdmissionMetrics;
}

export function createPromMetrics(options: { collectDefaults?: boolean } = {}): PromMetrics {
  const registry = new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  return {
    registry,
    metrics: {
      evaluationsTotal: new PromCounter(registry, "admission_evaluations_total", "Admission evaluations", LABELS),
      allowedTotal: new PromCounter(registry, "admission_allowed_total", "Requests admitted", LABELS),
      blockedTotal: new PromCounter(registry, "admission_blocked_total", "Requests rejected", LABELS),
      escalationsTotal: new PromCounter(registry, "admission_escalations_total", "Rank escalations", LABELS),
      evaluationLatencyMs: new PromHistogram(
        registry,
        "admission_evaluation_latency_ms",
        "Admission evaluation latency in ms",
        LABELS,
        LATENCY_BUCKETS,
      ),
    },
  };
}

export function metricsRoute(registry: Registry) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const metrics = await registry.metrics();
    return reply.type(registry.contentType).send(metrics);
  };
}
