import { Global, Module } from "@nestjs/common";
import { Counter, Histogram, register } from "prom-client";

export const WHEEL_OPERATIONS_TOTAL = "wheel_operations_total";
export const WHEEL_OPERATION_LATENCY_MS = "wheel_operation_latency_ms";

export interface IMetrics {
  increment(name: string, labels?: Record<string, string>): void;
  observe(name: string, value: number, labels?: Record<string, string>): void;
}

export const METRICS = Symbol("METRICS");

export class PrometheusMetricsService implements IMetrics {
  private counters = new Map<string, Counter<string>>();
  private histograms = new Map<string, Histogram<string>>();

  constructor() {
    register.setDefaultLabels({ service: "prize-wheel" });
  }

  increment(name: string, labels: Record<string, string> = {}): void {
    const counter = this.getOrCreateCounter(name, Object.keys(labels));
    counter.inc(labels, 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.getOrCreateHistogram(name, Object.keys(labels));
    histogram.observe(labels, value);
  }

  private getOrCreateCounter(name: string, labelNames: string[]): Counter<string> {
    const existing = this.counters.get(name);
    if (existing) {
      return existing;
    }
    const counter = new Counter({ name, help: `${name}_counter`, labelNames });
    this.counters.set(name, counter);
    return counter;
  }

  private getOrCreateHistogram(name: string, labelNames: string[]): Histogram<string> {
    const existing = this.histograms.get(name);
    if (existing) {
      return existing;
    }
    const histogram = new Histogram({
      name,
      help: `${name}_histogram`,
      labelNames,
      buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
    });
    this.histograms.set(name, histogram);
    return histogram;
  }
}

export class NoopMetricsService implements IMetrics {
  increment(): void {}
  observe(): void {}
}

@Global()
@Module({
  providers: [
    {
      provide: METRICS,
      useFactory: () => {
        if (process.env.METRICS_DISABLED === "true") {
          return new NoopMetricsService();
        }
        return new PrometheusMetricsService();
      },
    },
  ],
  exports: [METRICS],
})
export class MetricsModule {}
