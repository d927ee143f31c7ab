/**
 * Gateway Metrics
 * ===============
 * Prometheus counters for the inference gateway, exposed on GET /metrics.
 * Each instance owns its registry, so several servers in one process (tests) never collide.
 */

import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

export interface GatewayMetricsConfig {
  /** Node.js process metrics (CPU, memory, event loop) */
  enableDefaultMetrics?: boolean;
}

export type BatchSource = 'batch' | 'micro';

const PREFIX = 'modelledger_gateway_';

export class GatewayMetrics {
  readonly registry: Registry;
  private requestsCounter: Counter<'route' | 'method' | 'status'>;
  private requestDuration: Histogram<'route'>;
  private batchesCounter: Counter<'source'>;
  private batchSizeHistogram: Histogram<'source'>;
  private predictionErrorsCounter: Counter<'source'>;

  constructor(config: GatewayMetricsConfig = {}) {
    this.registry = new Registry();

    this.requestsCounter = new Counter({
      name: `${PREFIX}requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['route', 'method', 'status'],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: `${PREFIX}request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['route'],
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
      registers: [this.registry],
    });

    this.batchesCounter = new Counter({
      name: `${PREFIX}batches_total`,
      help: 'Total number of prediction batches run',
      labelNames: ['source'],
      registers: [this.registry],
    });

    this.batchSizeHistogram = new Histogram({
      name: `${PREFIX}batch_size`,
      help: 'Number of items per prediction batch',
      labelNames: ['source'],
      buckets: [1, 2, 4, 8, 16, 32, 64, 128],
      registers: [this.registry],
    });

    this.predictionErrorsCounter = new Counter({
      name: `${PREFIX}prediction_errors_total`,
      help: 'Total number of items whose prediction failed',
      labelNames: ['source'],
      registers: [this.registry],
    });

    if (config.enableDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix: PREFIX });
    }
  }

  recordRequest(route: string, method: string, statusCode: number, durationMs: number): void {
    this.requestsCounter.inc({ route, method, status: String(statusCode) });
    this.requestDuration.observe({ route }, durationMs / 1000);
  }

  recordBatch(source: BatchSource, size: number): void {
    this.batchesCounter.inc({ source });
    this.batchSizeHistogram.observe({ source }, size);
  }

  recordPredictionErrors(source: BatchSource, count: number): void {
    if (count > 0) {
      this.predictionErrorsCounter.inc({ source }, count);
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /** Prometheus text exposition */
  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
