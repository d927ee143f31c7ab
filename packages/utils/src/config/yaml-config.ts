/**
 * YAML Configuration Loader
 * ==========================
 * Loads control-plane configuration from the `.modelledgerrc` file in the project root,
 * with environment variable overrides.
 */

import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';
import { StorageProviderSchema, type StorageProvider } from './providers.js';

export const CONFIG_FILE = '.modelledgerrc';
export const DEFAULT_REGISTRY_FILE = '.modelledger.json';

/**
 * Raw shape of the rc file. Everything is optional; unknown keys are kept.
 */
const RcFileSchema = z
  .object({
    provider: z.string().optional(),
    bucket: z.string().optional(),
    region: z.string().optional(),
    localRoot: z.string().optional(),
    registryFile: z.string().optional(),
  })
  .passthrough();

export type RcFile = z.infer<typeof RcFileSchema>;

export interface ControlPlaneConfig {
  projectRoot: string;
  provider: StorageProvider;
  bucket?: string;
  region?: string;
  /** Absolute directory used by the local provider */
  localRoot?: string;
  /** Absolute path of the registry file */
  registryFile: string;
}

const cachedConfigs = new Map<string, RcFile>();

/**
 * Load the rc file from a project root. A missing file yields an empty config.
 */
export function loadConfigFromYaml(projectRoot: string = process.cwd()): RcFile {
  const configPath = join(resolve(projectRoot), CONFIG_FILE);
  const cached = cachedConfigs.get(configPath);
  if (cached) {
    return cached;
  }

  if (!existsSync(configPath)) {
    logger.debug(`${CONFIG_FILE} not found, using environment variables only`, {
      path: configPath,
    });
    cachedConfigs.set(configPath, {});
    return {};
  }

  let parsed: unknown;
  try {
    parsed = load(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      CONFIG_FILE
    );
  }

  const result = RcFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration file ${configPath}: ${issues}`, CONFIG_FILE);
  }

  logger.debug(`Loaded configuration from ${CONFIG_FILE}`, { path: configPath });
  cachedConfigs.set(configPath, result.data);
  return result.data;
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Resolve the control-plane configuration.
 *
 * Priority: environment variable > rc file > default.
 */
export function getControlPlaneConfig(
  projectRoot: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): ControlPlaneConfig {
  const root = resolve(projectRoot);
  const rc = loadConfigFromYaml(root);

  const providerRaw = (envValue(env, 'MODELLEDGER_PROVIDER') ?? rc.provider ?? 's3').toLowerCase();
  const provider = StorageProviderSchema.safeParse(providerRaw);
  if (!provider.success) {
    throw new ConfigurationError(
      `Invalid provider '${providerRaw}'. Supported providers: ${StorageProviderSchema.options.join(', ')}`,
      'provider'
    );
  }

  const registryFile = envValue(env, 'MODELLEDGER_REGISTRY_FILE') ?? rc.registryFile ?? DEFAULT_REGISTRY_FILE;
  const localRoot = envValue(env, 'MODELLEDGER_LOCAL_ROOT') ?? rc.localRoot;

  return {
    projectRoot: root,
    provider: provider.data,
    bucket: envValue(env, 'MODELLEDGER_BUCKET') ?? rc.bucket,
    region: envValue(env, 'AWS_REGION') ?? rc.region,
    localRoot: localRoot === undefined ? undefined : resolve(root, localRoot),
    registryFile: resolve(root, registryFile),
  };
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfigs.clear();
}
