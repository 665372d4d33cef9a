// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
  prefix?: string;
}

// What the protocol components need from a metrics sink
export interface MetricsRecorder {
  incrementCounter(name: string, labels: Record<string, string | number>): void;
  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void;
}

export class MetricsCollector implements MetricsRecorder {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics(config.prefix ?? 'oauth2_');
    }
  }

  private initializeMetrics(prefix: string): void {
    // Token endpoint
    this.counters.set(
      'token_requests_total',
      new Counter({
        name: `${prefix}token_requests_total`,
        help: 'Token endpoint requests by grant type and outcome',
        labelNames: ['grant_type', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'token_request_duration',
      new Histogram({
        name: `${prefix}token_request_duration_seconds`,
        help: 'Token endpoint round trip duration',
        labelNames: ['grant_type', 'status'],
        buckets: [0.1, 0.3, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_refresh_total',
      new Counter({
        name: `${prefix}token_refresh_total`,
        help: 'Token refresh attempts',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    // Protected resource calls
    this.counters.set(
      'resource_requests_total',
      new Counter({
        name: `${prefix}resource_requests_total`,
        help: 'Outbound resource requests',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'resource_request_duration',
      new Histogram({
        name: `${prefix}resource_request_duration_seconds`,
        help: 'Outbound resource request duration',
        labelNames: ['method', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
