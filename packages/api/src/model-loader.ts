/**
 * Startup model loading
 *
 * MODEL_PATH wins. Otherwise MODEL_NAME / MODEL_VERSION are resolved through the
 * registry file and the artifact is downloaded to a temp directory, loaded, and removed.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  ArtifactRegistry,
  resolveOrThrow,
  type StorageTransportPort,
} from '@modelledger/core';
import { createStorageTransport } from '@modelledger/storage';
import { validateServerConfig, type ServerConfig } from '@modelledger/utils';
import { loadModelBackend } from './backends/backend-loader.js';
import type { GatewayState } from './gateway-state.js';
import { logger } from './logger.js';

export interface ModelLoaderDependencies {
  registry?: ArtifactRegistry;
  transport?: StorageTransportPort;
}

export function createServerTransport(config: ServerConfig): StorageTransportPort {
  return createStorageTransport({
    provider: config.provider,
    bucket: config.provider === 'gcs' ? config.gcsBucket : config.s3Bucket,
    region: config.awsRegion,
    localRoot: config.localStorageRoot,
  });
}

async function loadFromRegistry(
  config: ServerConfig,
  modelName: string,
  deps: ModelLoaderDependencies
): Promise<GatewayState> {
  const registry = deps.registry ?? ArtifactRegistry.load(path.resolve(config.registryPath));
  const resolved = resolveOrThrow(registry, config.modelVersion, modelName);
  const transport = deps.transport ?? createServerTransport(config);

  const workDir = await mkdtemp(path.join(tmpdir(), 'modelledger-'));
  const localPath = path.join(workDir, `model${path.extname(resolved.storageLocation)}`);
  try {
    logger.info('Downloading model', {
      modelName: resolved.modelName,
      commitHash: resolved.commitHash,
      storageLocation: resolved.storageLocation,
      provider: transport.provider,
    });
    await transport.download(resolved.storageLocation, localPath);
    const backend = await loadModelBackend(localPath);
    return { backend, modelName: resolved.modelName, modelVersion: resolved.commitHash };
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

/**
 * Never rejects: any failure is logged and yields a degraded state.
 */
export async function loadModelForServer(
  config: ServerConfig,
  deps: ModelLoaderDependencies = {}
): Promise<GatewayState> {
  const degraded = (loadError: string): GatewayState => ({
    backend: null,
    modelName: config.modelName,
    modelVersion: config.modelVersion,
    loadError,
  });

  try {
    validateServerConfig(config);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('No model configured, starting without a model', { reason: message });
    return degraded(message);
  }

  try {
    let state: GatewayState;
    if (config.modelPath) {
      logger.info('Loading model from local path', { modelPath: config.modelPath });
      const backend = await loadModelBackend(config.modelPath);
      state = { backend, modelName: config.modelName, modelVersion: config.modelVersion };
    } else if (config.modelName) {
      state = await loadFromRegistry(config, config.modelName, deps);
    } else {
      return degraded('MODEL_NAME is not set');
    }
    logger.info('Model loaded', {
      modelName: state.modelName,
      modelVersion: state.modelVersion,
      backend: state.backend?.kind,
    });
    return state;
  } catch (error) {
    logger.error('Failed to load model, starting degraded', error, {
      modelName: config.modelName,
      modelVersion: config.modelVersion,
    });
    return degraded(error instanceof Error ? error.message : String(error));
  }
}
