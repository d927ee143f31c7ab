import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@modelledger/utils';
import { loadModelBackend } from '../../../src/backends/backend-loader.js';

const fixtures = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../fixtures');
const LINEAR = JSON.stringify({ type: 'linear', weights: [2, 3], bias: 1 });

describe('loadModelBackend', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'backend-loader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads .json files as linear models', async () => {
    const file = path.join(dir, 'model.json');
    writeFileSync(file, LINEAR);

    const backend = await loadModelBackend(file);

    expect(backend.kind).toBe('linear');
    await expect(backend.predictBatch([[1, 1]])).resolves.toEqual([6]);
  });

  it('reads unknown extensions as linear JSON', async () => {
    const file = path.join(dir, 'model.bin');
    writeFileSync(file, LINEAR);

    const backend = await loadModelBackend(file);

    expect(backend.kind).toBe('linear');
  });

  it('loads .mjs files as module models', async () => {
    const backend = await loadModelBackend(path.join(fixtures, 'double-model.mjs'));

    expect(backend.kind).toBe('module');
  });

  it('reports a missing file', async () => {
    const file = path.join(dir, 'missing.json');

    await expect(loadModelBackend(file)).rejects.toThrow(ConfigurationError);
    await expect(loadModelBackend(file)).rejects.toThrow(`Model file not found: ${file}`);
  });

  it('reports a directory as not found', async () => {
    await expect(loadModelBackend(dir)).rejects.toThrow(`Model file not found: ${dir}`);
  });

  it('rejects a non-model file', async () => {
    const file = path.join(dir, 'model.pkl');
    writeFileSync(file, 'binary');

    await expect(loadModelBackend(file)).rejects.toThrow(/^Model file is not valid JSON: /);
  });
});
