/**
 * Fastify API Server
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { AppError, getServerConfig, type ServerConfig } from '@modelledger/utils';
import { logger } from './logger.js';
import { MicroBatcher } from './batching/micro-batcher.js';
import { predictBatchIsolated } from './batching/predict-batch.js';
import { GatewayMetrics } from './metrics/gateway-metrics.js';
import { ModelNotLoadedError, type GatewayState } from './gateway-state.js';
import { loadModelForServer } from './model-loader.js';
import { GATEWAY_NAME, GATEWAY_VERSION, healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';
import { predictRoutes } from './routes/predict.js';

export interface ApiServerOptions {
  config: ServerConfig;
  state: GatewayState;
  metrics?: GatewayMetrics;
  enableSwagger?: boolean;
  corsOrigin?: string | string[];
}

function errorCode(error: Error & { code?: string }): string {
  if (error instanceof AppError) {
    return error.code;
  }
  return error.code ?? 'INTERNAL_ERROR';
}

/**
 * Create and configure the inference gateway. Does not listen; see startGateway.
 */
export async function createApiServer(options: ApiServerOptions): Promise<FastifyInstance> {
  const {
    config,
    state,
    metrics = new GatewayMetrics({ enableDefaultMetrics: process.env.NODE_ENV !== 'test' }),
    enableSwagger = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test',
    corsOrigin = '*',
  } = options;

  const server = Fastify({
    logger: process.env.NODE_ENV === 'development',
  });

  const batcher = new MicroBatcher({
    maxBatchSize: config.maxBatchSize,
    timeoutMs: config.batchTimeoutMs,
    process: async (items) => {
      if (!state.backend) {
        throw new ModelNotLoadedError();
      }
      return predictBatchIsolated(state.backend, items);
    },
    onBatch: (size) => metrics.recordBatch('micro', size),
  });

  // Error handler (set before routes so every route context inherits it)
  server.setErrorHandler((error, request, reply) => {
    const statusCode =
      error instanceof AppError ? error.statusCode : error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error('API error', error, { method: request.method, url: request.url });
    } else {
      logger.debug('Request rejected', { method: request.method, url: request.url, statusCode });
    }

    reply.status(statusCode).send({
      error: {
        message: error.message || 'Internal server error',
        code: errorCode(error),
      },
    });
  });

  server.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? 'unmatched';
    metrics.recordRequest(route, request.method, reply.statusCode, reply.elapsedTime);
    logger.info('Request completed', {
      method: request.method,
      path: request.url,
      status: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  server.addHook('onClose', async () => {
    await batcher.stop();
  });

  await server.register(cors, {
    origin: corsOrigin,
  });

  // Swagger/OpenAPI documentation
  if (enableSwagger) {
    await server.register(swagger, {
      openapi: {
        info: {
          title: GATEWAY_NAME,
          description: 'Batch and single inference over a versioned model artifact',
          version: GATEWAY_VERSION,
        },
        servers: [
          {
            url: `http://${config.host}:${config.port}`,
            description: 'Development server',
          },
        ],
      },
    });

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: false,
      },
    });
  }

  await server.register(healthRoutes, { config, state, batcher });
  await server.register(metricsRoutes, { metrics });
  await server.register(predictRoutes, {
    state,
    batcher,
    metrics,
    maxBatchSize: config.maxBatchSize,
  });

  return server;
}

/**
 * Load the configured model, build the server and listen.
 * A model that fails to load leaves the gateway up but degraded.
 */
export async function startGateway(config: ServerConfig = getServerConfig()): Promise<FastifyInstance> {
  const state = await loadModelForServer(config);
  const server = await createApiServer({ config, state });

  await server.listen({ port: config.port, host: config.host });
  logger.info('Inference gateway started', {
    port: config.port,
    host: config.host,
    modelLoaded: state.backend !== null,
    modelName: state.modelName,
    modelVersion: state.modelVersion,
  });
  return server;
}
