import { PerformanceMetrics } from './types.js';

export interface AggregatedMetrics {
  tool: string;
  count: number;
  avg_latency_ms: number;
  min_latency_ms: number;
  max_latency_ms: number;
  success_rate: number;
  errors: number;
}

export class MetricsCollector {
  private enabled: boolean;
  private metrics: PerformanceMetrics[] = [];
  private maxMetrics = 10000; // Keep last 10k metrics in memory

  constructor(enabled: boolean) {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  record(metric: PerformanceMetrics): void {
    if (!this.enabled) return;

    this.metrics.push({
      ...metric,
      timestamp: metric.timestamp || new Date().toISOString(),
    });

    if (this.metrics.length > this.maxMetrics) {
      this.metrics = this.metrics.slice(-this.maxMetrics);
    }
  }

  getMetrics(): { total_requests: number; aggregated: AggregatedMetrics[] } {
    if (!this.enabled) {
      return { total_requests: 0, aggregated: [] };
    }

    return {
      total_requests: this.metrics.length,
      aggregated: this.aggregateByTool(),
    };
  }

  private aggregateByTool(): AggregatedMetrics[] {
    const grouped = new Map<string, PerformanceMetrics[]>();

    for (const metric of this.metrics) {
      const bucket = grouped.get(metric.tool);
      if (bucket) {
        bucket.push(metric);
      } else {
        grouped.set(metric.tool, [metric]);
      }
    }

    const result: AggregatedMetrics[] = [];

    for (const [tool, metrics] of grouped.entries()) {
      const latencies = metrics.map((m) => m.latency_ms);
      const successes = metrics.filter((m) => m.success).length;
      const total = latencies.reduce((a, b) => a + b, 0);

      result.push({
        tool,
        count: metrics.length,
        avg_latency_ms: Math.round(total / metrics.length),
        min_latency_ms: Math.min(...latencies),
        max_latency_ms: Math.max(...latencies),
        success_rate: Math.round((successes / metrics.length) * 100),
        errors: metrics.length - successes,
      });
    }

    // most used first
    return result.sort((a, b) => b.count - a.count);
  }

  clear(): void {
    this.metrics = [];
  }
}
