/**
 * Prometheus Metrics Collector
 *
 * Why: Observability for services built from contracts
 *
 * Tracks:
 * - Contract loads (success, failure)
 * - Model generation duration
 * - HTTP requests (status, method, route path)
 * - Request validation failures per route
 */

import { Counter, Histogram, Registry } from 'prom-client';

export interface MetricsCollectorConfig {
  enabled: boolean;
  prefix?: string;
}

export class MetricsCollector {
  private registry: Registry;
  private enabled: boolean;

  // Contract metrics
  private contractLoadsTotal: Counter;
  private modelGenerationDuration: Histogram;

  // HTTP metrics
  private httpRequestsTotal: Counter;
  private httpRequestDuration: Histogram;
  private requestValidationFailures: Counter;

  constructor(config: MetricsCollectorConfig) {
    this.enabled = config.enabled;
    this.registry = new Registry();

    const prefix = config.prefix || 'contract_router_';

    this.contractLoadsTotal = new Counter({
      name: `${prefix}contract_loads_total`,
      help: 'Total number of contract loads',
      labelNames: ['status'],
      registers: [this.registry],
    });

    this.modelGenerationDuration = new Histogram({
      name: `${prefix}model_generation_duration_seconds`,
      help: 'Model generation duration in seconds',
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
      registers: [this.registry],
    });

    this.httpRequestsTotal = new Counter({
      name: `${prefix}http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: `${prefix}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      registers: [this.registry],
    });

    this.requestValidationFailures = new Counter({
      name: `${prefix}request_validation_failures_total`,
      help: 'Total number of requests rejected by model validation',
      labelNames: ['method', 'path'],
      registers: [this.registry],
    });
  }

  /**
   * Record contract load through the validator chain
   */
  recordContractLoad(status: 'success' | 'failure'): void {
    if (!this.enabled) return;
    this.contractLoadsTotal.inc({ status });
  }

  recordModelGeneration(durationSeconds: number): void {
    if (!this.enabled) return;
    this.modelGenerationDuration.observe(durationSeconds);
  }

  /**
   * Record HTTP request
   *
   * `path` is the contract path template, which keeps label cardinality
   * bounded by the contract.
   */
  recordHttpRequest(method: string, path: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const labels = {
      method,
      path: this.normalizePath(path),
      status: status.toString(),
    };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationSeconds);
  }

  recordRequestValidationFailure(method: string, path: string): void {
    if (!this.enabled) return;
    this.requestValidationFailures.inc({ method, path: this.normalizePath(path) });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }

  private normalizePath(path: string): string {
    return path.split('?')[0];
  }
}
