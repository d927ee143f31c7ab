/**
 * Prometheus scrape endpoint
 */

import type { FastifyPluginAsync } from 'fastify';
import type { GatewayMetrics } from '../metrics/gateway-metrics.js';

export interface MetricsRouteOptions {
  metrics: GatewayMetrics;
}

export const metricsRoutes: FastifyPluginAsync<MetricsRouteOptions> = async (fastify, options) => {
  fastify.get('/metrics', async (_request, reply) => {
    const body = await options.metrics.render();
    reply.header('Content-Type', options.metrics.contentType);
    return body;
  });
};
