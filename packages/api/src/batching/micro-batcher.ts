/**
 * Micro-batcher
 *
 * Collects single prediction submissions and runs them as one batch once
 * `maxBatchSize` requests are waiting or `timeoutMs` has passed since the first.
 * Each submitter gets back the outcome carrying its own id.
 */

import { AppError, ServiceUnavailableError } from '@modelledger/utils';
import type { PredictionItem, PredictionOutcome } from './predict-batch.js';
import { logger } from '../logger.js';

export type BatchProcessor = (items: PredictionItem[]) => Promise<PredictionOutcome[]>;

export interface MicroBatcherOptions {
  maxBatchSize: number;
  timeoutMs: number;
  process: BatchProcessor;
  /** Called after each batch with its size */
  onBatch?: (size: number) => void;
}

export interface BatcherStats {
  totalRequests: number;
  totalBatches: number;
  avgBatchSize: number;
}

export class ResponseNotFoundError extends AppError {
  constructor(requestId: string) {
    super('response not found for request', 'RESPONSE_NOT_FOUND', 500, { requestId });
  }
}

interface PendingRequest {
  item: PredictionItem;
  resolve: (outcome: PredictionOutcome) => void;
  reject: (error: unknown) => void;
}

export class MicroBatcher {
  private pending: PendingRequest[] = [];
  private timer: NodeJS.Timeout | undefined;
  private readonly inFlight = new Set<Promise<void>>();
  private stopped = false;
  private totalRequests = 0;
  private totalBatches = 0;

  constructor(private readonly options: MicroBatcherOptions) {
    if (!Number.isInteger(options.maxBatchSize) || options.maxBatchSize < 1) {
      throw new RangeError(`maxBatchSize must be a positive integer, got ${options.maxBatchSize}`);
    }
  }

  submit(id: string, data: unknown): Promise<PredictionOutcome> {
    if (this.stopped) {
      return Promise.reject(new ServiceUnavailableError('micro-batcher'));
    }
    return new Promise<PredictionOutcome>((resolve, reject) => {
      this.pending.push({ item: { id, data }, resolve, reject });
      if (this.pending.length >= this.options.maxBatchSize) {
        this.flush();
      } else if (this.timer === undefined) {
        this.timer = setTimeout(() => this.flush(), this.options.timeoutMs);
      }
    });
  }

  /** Number of submissions waiting for a batch */
  get pendingCount(): number {
    return this.pending.length;
  }

  stats(): BatcherStats {
    return {
      totalRequests: this.totalRequests,
      totalBatches: this.totalBatches,
      avgBatchSize: this.totalBatches === 0 ? 0 : this.totalRequests / this.totalBatches,
    };
  }

  /**
   * Refuse new submissions, run everything already submitted, and wait for it.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    while (this.pending.length > 0) {
      this.flush();
    }
    await Promise.all([...this.inFlight]);
    logger.info('Micro-batcher stopped', { ...this.stats() });
  }

  private flush(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    const batch = this.pending.splice(0, this.options.maxBatchSize);
    if (batch.length === 0) {
      return;
    }

    const run: Promise<void> = this.runBatch(batch).finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);

    if (this.pending.length > 0 && !this.stopped) {
      this.timer = setTimeout(() => this.flush(), this.options.timeoutMs);
    }
  }

  private async runBatch(batch: PendingRequest[]): Promise<void> {
    logger.debug('Processing batch', { batchSize: batch.length });
    this.totalRequests += batch.length;
    this.totalBatches += 1;
    this.options.onBatch?.(batch.length);

    let outcomes: PredictionOutcome[];
    try {
      outcomes = await this.options.process(batch.map((request) => request.item));
    } catch (error) {
      for (const request of batch) {
        request.reject(error);
      }
      return;
    }

    const byId = new Map<string, PredictionOutcome>();
    for (const outcome of outcomes) {
      byId.set(outcome.id, outcome);
    }
    for (const request of batch) {
      const outcome = byId.get(request.item.id);
      if (outcome) {
        request.resolve(outcome);
      } else {
        request.reject(new ResponseNotFoundError(request.item.id));
      }
    }
  }
}
