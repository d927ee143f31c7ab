/**
 * Prediction routes
 */

import { randomUUID } from 'node:crypto';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '@modelledger/utils';
import { predictBatchIsolated } from '../batching/predict-batch.js';
import type { MicroBatcher } from '../batching/micro-batcher.js';
import type { GatewayMetrics } from '../metrics/gateway-metrics.js';
import { requireBackend, type GatewayState } from '../gateway-state.js';

const PredictBatchBodySchema = z.object({
  requests: z.array(
    z.object({
      id: z.string().min(1),
      data: z.unknown(),
    })
  ),
});

const PredictBodySchema = z.object({
  data: z.unknown(),
});

export interface PredictRouteOptions {
  state: GatewayState;
  batcher: MicroBatcher;
  metrics: GatewayMetrics;
  maxBatchSize: number;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'invalid request body';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export const predictRoutes: FastifyPluginAsync<PredictRouteOptions> = async (fastify, options) => {
  const { state, batcher, metrics, maxBatchSize } = options;

  /**
   * POST /predict/batch
   *
   * Request:  { "requests": [{ "id": "a", "data": [1, 2, 3] }] }
   * Response: { "responses": [{ "id": "a", "result": 6 }] }
   *
   * One response per request, in request order. A failing item carries `error`
   * instead of `result` and does not affect the others.
   */
  fastify.post(
    '/predict/batch',
    {
      schema: {
        description: 'Run a batch of predictions',
        tags: ['predict'],
      },
    },
    async (request) => {
      const parsed = PredictBatchBodySchema.safeParse(request.body);
      if (!parsed.success) {
        throw new ValidationError(`Invalid batch request: ${describeIssue(parsed.error)}`);
      }
      const items = parsed.data.requests.map((item) => ({ id: item.id, data: item.data }));
      if (items.length > maxBatchSize) {
        throw new ValidationError(
          `Batch size ${items.length} exceeds maximum of ${maxBatchSize}`,
          { batchSize: items.length, maxBatchSize }
        );
      }

      const backend = requireBackend(state);
      const responses = await predictBatchIsolated(backend, items);
      metrics.recordBatch('batch', items.length);
      metrics.recordPredictionErrors(
        'batch',
        responses.filter((response) => response.error !== undefined).length
      );
      return { responses };
    }
  );

  /**
   * POST /predict
   *
   * Request:  { "data": [1, 2, 3] }
   * Response: { "request_id": "...", "result": 6 }
   *
   * Submitted through the micro-batcher, so concurrent calls share one backend batch.
   */
  fastify.post(
    '/predict',
    {
      schema: {
        description: 'Run a single prediction',
        tags: ['predict'],
      },
    },
    async (request, reply) => {
      const parsed = PredictBodySchema.safeParse(request.body);
      if (!parsed.success || parsed.data.data === undefined) {
        throw new ValidationError("Missing 'data' field");
      }
      requireBackend(state);

      const requestId = randomUUID();
      const outcome = await batcher.submit(requestId, parsed.data.data);
      if (outcome.error !== undefined) {
        metrics.recordPredictionErrors('micro', 1);
        reply.status(500);
        return { request_id: requestId, error: outcome.error };
      }
      return { request_id: requestId, result: outcome.result };
    }
  );
};
