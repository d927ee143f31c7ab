/**
 * Batch prediction with per-item isolation
 */

import type { ModelBackend } from '../backends/model-backend.js';
import { logger } from '../logger.js';

export interface PredictionItem {
  id: string;
  data: unknown;
}

/** Exactly one of result / error is set */
export interface PredictionOutcome {
  id: string;
  result?: unknown;
  error?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function predictOne(backend: ModelBackend, item: PredictionItem): Promise<PredictionOutcome> {
  try {
    const results = await backend.predictBatch([item.data]);
    if (results.length !== 1) {
      return { id: item.id, error: `Backend returned ${results.length} results for 1 input` };
    }
    return { id: item.id, result: results[0] };
  } catch (error) {
    return { id: item.id, error: errorMessage(error) };
  }
}

/**
 * Run the whole batch through the backend. If that fails, each item is retried on its
 * own so a bad input only fails itself. Outcomes are in input order, one per item.
 */
export async function predictBatchIsolated(
  backend: ModelBackend,
  items: PredictionItem[]
): Promise<PredictionOutcome[]> {
  if (items.length === 0) {
    return [];
  }

  try {
    const results = await backend.predictBatch(items.map((item) => item.data));
    if (results.length === items.length) {
      return items.map((item, i) => ({ id: item.id, result: results[i] }));
    }
    logger.warn('Backend returned a mismatched result count, isolating items', {
      expected: items.length,
      actual: results.length,
    });
  } catch (error) {
    logger.debug('Batch prediction failed, isolating items', {
      batchSize: items.length,
      error: errorMessage(error),
    });
  }

  return Promise.all(items.map((item) => predictOne(backend, item)));
}
