/**
 * Health check routes
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ServerConfig } from '@modelledger/utils';
import type { MicroBatcher } from '../batching/micro-batcher.js';
import { requireBackend, type GatewayState } from '../gateway-state.js';

export const GATEWAY_NAME = 'ModelLedger Inference Gateway';
export const GATEWAY_VERSION = '0.2.0';

export interface HealthRouteOptions {
  config: ServerConfig;
  state: GatewayState;
  batcher: MicroBatcher;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, options) => {
  const { config, state, batcher } = options;

  /**
   * GET /health
   * Always 200; `degraded` when no model is loaded
   */
  fastify.get('/health', async () => {
    const loaded = state.backend !== null;
    return {
      status: loaded ? 'healthy' : 'degraded',
      model_loaded: loaded,
      model_name: state.modelName ?? null,
      model_version: state.modelVersion ?? null,
    };
  });

  /**
   * GET /ready
   * Readiness check
   */
  fastify.get('/ready', async () => {
    requireBackend(state);
    return { status: 'ready' };
  });

  fastify.get('/info', async () => {
    const stats = batcher.stats();
    return {
      server: GATEWAY_NAME,
      version: GATEWAY_VERSION,
      model_loaded: state.backend !== null,
      backend: state.backend?.kind ?? null,
      load_error: state.loadError ?? null,
      config: {
        model_name: config.modelName ?? null,
        model_version: config.modelVersion,
        max_batch_size: config.maxBatchSize,
        batch_timeout_ms: config.batchTimeoutMs,
      },
      batcher: {
        total_requests: stats.totalRequests,
        total_batches: stats.totalBatches,
        avg_batch_size: stats.avgBatchSize,
      },
    };
  });
};
