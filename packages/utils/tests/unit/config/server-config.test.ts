import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../src/errors.js';
import { getServerConfig, getStorageRoot, validateServerConfig } from '../../../src/config/index.js';

describe('server configuration', () => {
  it('applies defaults', () => {
    expect(getServerConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      logLevel: 'info',
      modelVersion: 'latest',
      provider: 'local',
      awsRegion: 'us-east-1',
      registryPath: '.modelledger.json',
      maxBatchSize: 32,
      batchTimeoutMs: 50,
    });
  });

  it('reads and coerces environment variables', () => {
    const config = getServerConfig({
      PORT: '9000',
      PROVIDER: 'GCS',
      GCS_BUCKET: 'team-models',
      MODEL_NAME: 'iris',
      MODEL_VERSION: 'abc123def456',
      MAX_BATCH_SIZE: '8',
      BATCH_TIMEOUT_MS: '0',
    });

    expect(config.port).toBe(9000);
    expect(config.provider).toBe('gcs');
    expect(config.gcsBucket).toBe('team-models');
    expect(config.modelVersion).toBe('abc123def456');
    expect(config.maxBatchSize).toBe(8);
    expect(config.batchTimeoutMs).toBe(0);
  });

  it('names the environment variable of an invalid value', () => {
    expect(() => getServerConfig({ MAX_BATCH_SIZE: '0' })).toThrow(ConfigurationError);
    expect(() => getServerConfig({ MAX_BATCH_SIZE: '0' })).toThrow(
      /^Invalid server configuration: MAX_BATCH_SIZE: /
    );
    expect(() => getServerConfig({ PROVIDER: 'azure' })).toThrow(
      /^Invalid server configuration: PROVIDER: /
    );
  });

  it('picks the storage root for the provider', () => {
    const env = { S3_BUCKET: 's3-bucket', GCS_BUCKET: 'gcs-bucket', LOCAL_STORAGE_ROOT: '/srv/models' };

    expect(getStorageRoot(getServerConfig({ ...env, PROVIDER: 's3' }))).toBe('s3-bucket');
    expect(getStorageRoot(getServerConfig({ ...env, PROVIDER: 'gcs' }))).toBe('gcs-bucket');
    expect(getStorageRoot(getServerConfig({ ...env, PROVIDER: 'local' }))).toBe('/srv/models');
  });

  describe('validateServerConfig', () => {
    it('accepts a local model path', () => {
      expect(() => validateServerConfig(getServerConfig({ MODEL_PATH: '/models/iris.json' }))).not.toThrow();
    });

    it('accepts a model name with storage', () => {
      const config = getServerConfig({ PROVIDER: 's3', S3_BUCKET: 'team-models', MODEL_NAME: 'iris' });

      expect(() => validateServerConfig(config)).not.toThrow();
    });

    it('rejects a model name without storage', () => {
      const config = getServerConfig({ PROVIDER: 's3', MODEL_NAME: 'iris' });

      expect(() => validateServerConfig(config)).toThrow(/^Must set either MODEL_PATH/);
    });

    it('rejects storage without a model name', () => {
      const config = getServerConfig({ PROVIDER: 's3', S3_BUCKET: 'team-models' });

      expect(() => validateServerConfig(config)).toThrow(ConfigurationError);
    });
  });
});
