/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration for the inference server. The control-plane
 * configuration (rc file) lives in yaml-config.ts.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { StorageProviderSchema } from './providers.js';

export * from './providers.js';
export * from './yaml-config.js';

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  logLevel: z.string().default('info'),
  /** Local path to a model file; skips registry resolution */
  modelPath: z.string().optional(),
  modelName: z.string().optional(),
  /** Commit hash or "latest" */
  modelVersion: z.string().default('latest'),
  provider: StorageProviderSchema.default('local'),
  s3Bucket: z.string().optional(),
  awsRegion: z.string().default('us-east-1'),
  gcsBucket: z.string().optional(),
  localStorageRoot: z.string().optional(),
  registryPath: z.string().default('.modelledger.json'),
  maxBatchSize: z.coerce.number().int().positive().default(32),
  batchTimeoutMs: z.coerce.number().int().nonnegative().default(50),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const ENV_KEYS: Record<keyof ServerConfig, string> = {
  port: 'PORT',
  host: 'HOST',
  logLevel: 'LOG_LEVEL',
  modelPath: 'MODEL_PATH',
  modelName: 'MODEL_NAME',
  modelVersion: 'MODEL_VERSION',
  provider: 'PROVIDER',
  s3Bucket: 'S3_BUCKET',
  awsRegion: 'AWS_REGION',
  gcsBucket: 'GCS_BUCKET',
  localStorageRoot: 'LOCAL_STORAGE_ROOT',
  registryPath: 'REGISTRY_PATH',
  maxBatchSize: 'MAX_BATCH_SIZE',
  batchTimeoutMs: 'BATCH_TIMEOUT_MS',
};

/**
 * Load server configuration from environment variables
 */
export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const raw: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      raw[field] = field === 'provider' ? value.toLowerCase() : value;
    }
  }

  const result = ServerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? String(issue.path[0]) : 'unknown';
    const envKey = Object.entries(ENV_KEYS).find(([key]) => key === field)?.[1] ?? field;
    throw new ConfigurationError(
      `Invalid server configuration: ${envKey}: ${issue?.message ?? 'invalid value'}`,
      envKey
    );
  }
  return result.data;
}

/**
 * Storage root for the configured provider: bucket name for s3/gcs, directory for local.
 */
export function getStorageRoot(config: ServerConfig): string | undefined {
  switch (config.provider) {
    case 's3':
      return config.s3Bucket;
    case 'gcs':
      return config.gcsBucket;
    case 'local':
      return config.localStorageRoot;
  }
}

/**
 * Require a loadable model: either a local model file, or a model name plus storage.
 */
export function validateServerConfig(config: ServerConfig): void {
  if (config.modelPath) {
    return;
  }
  if (!getStorageRoot(config) || !config.modelName) {
    throw new ConfigurationError(
      'Must set either MODEL_PATH for a local model file, ' +
        'or (S3_BUCKET/GCS_BUCKET/LOCAL_STORAGE_ROOT + MODEL_NAME + PROVIDER) to load from storage',
      'MODEL_PATH'
    );
  }
}
