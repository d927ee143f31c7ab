import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ConfigurationError } from '../../../src/errors.js';
import {
  clearConfigCache,
  getControlPlaneConfig,
  loadConfigFromYaml,
} from '../../../src/config/yaml-config.js';

describe('control-plane configuration', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'yaml-config-'));
    clearConfigCache();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function writeRc(content: string): void {
    writeFileSync(path.join(root, '.modelledgerrc'), content);
  }

  it('defaults to s3 and the default registry file without an rc file', () => {
    const config = getControlPlaneConfig(root, {});

    expect(config).toEqual({
      projectRoot: root,
      provider: 's3',
      bucket: undefined,
      region: undefined,
      localRoot: undefined,
      registryFile: path.join(root, '.modelledger.json'),
    });
  });

  it('reads the rc file', () => {
    writeRc('provider: gcs\nbucket: team-models\nregistryFile: registry/models.json\n');

    const config = getControlPlaneConfig(root, {});

    expect(config.provider).toBe('gcs');
    expect(config.bucket).toBe('team-models');
    expect(config.registryFile).toBe(path.join(root, 'registry', 'models.json'));
  });

  it('lets environment variables override the rc file', () => {
    writeRc('provider: gcs\nbucket: team-models\nregion: eu-west-1\n');

    const config = getControlPlaneConfig(root, {
      MODELLEDGER_PROVIDER: 'S3',
      MODELLEDGER_BUCKET: 'other-bucket',
      AWS_REGION: 'us-east-2',
    });

    expect(config.provider).toBe('s3');
    expect(config.bucket).toBe('other-bucket');
    expect(config.region).toBe('us-east-2');
  });

  it('ignores blank environment values', () => {
    writeRc('bucket: team-models\n');

    expect(getControlPlaneConfig(root, { MODELLEDGER_BUCKET: '  ' }).bucket).toBe('team-models');
  });

  it('resolves the local root against the project root', () => {
    writeRc('provider: local\nlocalRoot: artifacts\n');

    expect(getControlPlaneConfig(root, {}).localRoot).toBe(path.join(root, 'artifacts'));
  });

  it('rejects an unknown provider naming the key', () => {
    writeRc('provider: azure\n');

    const act = () => getControlPlaneConfig(root, {});

    expect(act).toThrow(ConfigurationError);
    expect(act).toThrow("Invalid provider 'azure'. Supported providers: s3, gcs, local");
    try {
      act();
    } catch (error) {
      expect(error instanceof ConfigurationError && error.context?.['configKey']).toBe('provider');
    }
  });

  it('rejects an rc file that is not YAML', () => {
    writeRc('provider: [unclosed\n');

    expect(() => loadConfigFromYaml(root)).toThrow(/^Failed to parse configuration file /);
  });

  it('rejects an rc file with the wrong value types', () => {
    writeRc('bucket:\n  - a\n  - b\n');

    expect(() => loadConfigFromYaml(root)).toThrow(/^Invalid configuration file .*: bucket: /);
  });

  it('caches the parsed rc file until cleared', () => {
    writeRc('bucket: first\n');
    expect(loadConfigFromYaml(root).bucket).toBe('first');

    writeRc('bucket: second\n');
    expect(loadConfigFromYaml(root).bucket).toBe('first');

    clearConfigCache();
    expect(loadConfigFromYaml(root).bucket).toBe('second');
  });
});
