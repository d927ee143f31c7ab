/**
 * What the gateway is serving. Set once at startup; a null backend means degraded.
 */

import { AppError } from '@modelledger/utils';
import type { ModelBackend } from './backends/model-backend.js';

export interface GatewayState {
  backend: ModelBackend | null;
  modelName?: string;
  /** Commit hash actually loaded, or the configured selector when loaded from a path */
  modelVersion?: string;
  /** Why the model could not be loaded, when it could not */
  loadError?: string;
}

export class ModelNotLoadedError extends AppError {
  constructor() {
    super('Model not loaded', 'MODEL_NOT_LOADED', 503);
  }
}

export function requireBackend(state: GatewayState): ModelBackend {
  if (!state.backend) {
    throw new ModelNotLoadedError();
  }
  return state.backend;
}
