import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ArtifactRegistry, createFixedClock, register } from '@modelledger/core';
import { LocalStorageTransport } from '@modelledger/storage';
import { getServerConfig } from '@modelledger/utils';
import { loadModelForServer } from '../../src/model-loader.js';

const HASH = 'abc123def456';

describe('loadModelForServer', () => {
  let dir: string;
  let storeDir: string;
  let registryFile: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'model-loader-'));
    storeDir = path.join(dir, 'store');
    registryFile = path.join(dir, '.modelledger.json');
    mkdirSync(path.join(storeDir, 'iris'), { recursive: true });
    writeFileSync(
      path.join(storeDir, 'iris', `${HASH}.json`),
      JSON.stringify({ type: 'linear', weights: [1, 2], bias: 0 })
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeRegistry(): void {
    const registry = ArtifactRegistry.empty(registryFile);
    register(
      registry,
      {
        modelName: 'iris',
        commitHash: HASH,
        storageLocation: `iris/${HASH}.json`,
        fileSizeBytes: 40,
        fileExtension: 'json',
      },
      createFixedClock(Date.UTC(2024, 0, 1))
    );
    registry.save();
  }

  function registryConfig(overrides: Record<string, string> = {}) {
    return getServerConfig({
      PROVIDER: 'local',
      LOCAL_STORAGE_ROOT: storeDir,
      MODEL_NAME: 'iris',
      REGISTRY_PATH: registryFile,
      ...overrides,
    });
  }

  it('loads a model straight from MODEL_PATH', async () => {
    const state = await loadModelForServer(
      getServerConfig({ MODEL_PATH: path.join(storeDir, 'iris', `${HASH}.json`), MODEL_NAME: 'iris' })
    );

    expect(state.backend?.kind).toBe('linear');
    expect(state.modelName).toBe('iris');
    expect(state.modelVersion).toBe('latest');
  });

  it('resolves latest through the registry and downloads the artifact', async () => {
    writeRegistry();

    const state = await loadModelForServer(registryConfig());

    expect(state.modelName).toBe('iris');
    expect(state.modelVersion).toBe(HASH);
    await expect(state.backend?.predictBatch([[1, 1]])).resolves.toEqual([3]);
  });

  it('resolves an explicit commit hash', async () => {
    writeRegistry();

    const state = await loadModelForServer(registryConfig({ MODEL_VERSION: HASH }));

    expect(state.modelVersion).toBe(HASH);
    expect(state.backend).not.toBeNull();
  });

  it('uses an injected transport', async () => {
    writeRegistry();
    const transport = new LocalStorageTransport(storeDir);
    const download = vi.spyOn(transport, 'download');

    await loadModelForServer(registryConfig(), { transport });

    expect(download).toHaveBeenCalledTimes(1);
    expect(download.mock.calls[0]?.[0]).toBe(`iris/${HASH}.json`);
    expect(path.extname(String(download.mock.calls[0]?.[1]))).toBe('.json');
  });

  it('starts degraded when nothing is configured', async () => {
    const state = await loadModelForServer(getServerConfig({}));

    expect(state.backend).toBeNull();
    expect(state.loadError).toMatch(/^Must set either MODEL_PATH/);
  });

  it('starts degraded when the registry file is missing', async () => {
    const state = await loadModelForServer(registryConfig());

    expect(state.backend).toBeNull();
    expect(state.loadError).toMatch(/^Model registry file \(.*\) not found\./);
  });

  it('starts degraded for an unknown model', async () => {
    writeRegistry();

    const state = await loadModelForServer(registryConfig({ MODEL_NAME: 'resnet' }));

    expect(state.backend).toBeNull();
    expect(state.modelName).toBe('resnet');
    expect(state.loadError).toBe("Model 'resnet' not found in registry.");
  });

  it('starts degraded for an unknown commit hash', async () => {
    writeRegistry();

    const state = await loadModelForServer(registryConfig({ MODEL_VERSION: 'ffffffffffff' }));

    expect(state.backend).toBeNull();
    expect(state.loadError).toBe("Commit hash 'ffffffffffff' not found for model 'iris'.");
  });

  it('starts degraded when MODEL_PATH does not exist', async () => {
    const missing = path.join(dir, 'missing.json');

    const state = await loadModelForServer(getServerConfig({ MODEL_PATH: missing }));

    expect(state.backend).toBeNull();
    expect(state.loadError).toBe(`Model file not found: ${missing}`);
  });
});
