/**
 * @modelledger/api
 *
 * Inference gateway using Fastify
 *
 * Endpoints:
 * - GET /health - Model status (healthy | degraded)
 * - GET /ready - Readiness check, 503 until a model is loaded
 * - GET /info - Server and batching configuration
 * - GET /metrics - Prometheus metrics
 * - POST /predict/batch - Batched predictions with per-item errors
 * - POST /predict - Single prediction through the micro-batcher
 */

export { createApiServer, startGateway } from './server.js';
export type { ApiServerOptions } from './server.js';
export { loadModelForServer, createServerTransport } from './model-loader.js';
export type { ModelLoaderDependencies } from './model-loader.js';
export { ModelNotLoadedError, requireBackend, type GatewayState } from './gateway-state.js';
export type { ModelBackend, BackendKind } from './backends/model-backend.js';
export { LinearBackend, LinearModelSchema, parseLinearModel, type LinearModel } from './backends/linear-backend.js';
export { ModuleBackend, loadModuleBackend, toModelModule, type ModelModule } from './backends/module-backend.js';
export { loadModelBackend } from './backends/backend-loader.js';
export {
  predictBatchIsolated,
  type PredictionItem,
  type PredictionOutcome,
} from './batching/predict-batch.js';
export {
  MicroBatcher,
  ResponseNotFoundError,
  type MicroBatcherOptions,
  type BatcherStats,
} from './batching/micro-batcher.js';
export { GatewayMetrics, type GatewayMetricsConfig } from './metrics/gateway-metrics.js';
