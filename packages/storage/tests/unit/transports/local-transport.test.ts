import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StorageError } from '@modelledger/utils';
import { LocalStorageTransport } from '../../../src/transports/local-transport.js';

describe('LocalStorageTransport', () => {
  let dir: string;
  let transport: LocalStorageTransport;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'local-transport-'));
    transport = new LocalStorageTransport(join(dir, 'bucket'));
    writeFileSync(join(dir, 'model.json'), '{"type":"linear"}');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('uploads under the root using the location as a relative path', async () => {
    await transport.upload(join(dir, 'model.json'), 'churn/abc.json');

    expect(readFileSync(join(dir, 'bucket', 'churn', 'abc.json'), 'utf-8')).toBe(
      '{"type":"linear"}'
    );
    await expect(transport.exists('churn/abc.json')).resolves.toBe(true);
  });

  it('downloads into a new directory', async () => {
    await transport.upload(join(dir, 'model.json'), 'churn/abc.json');
    const target = join(dir, 'out', 'nested', 'model.json');

    await transport.download('churn/abc.json', target);

    expect(readFileSync(target, 'utf-8')).toBe('{"type":"linear"}');
  });

  it('reports missing objects', async () => {
    await expect(transport.exists('churn/missing.json')).resolves.toBe(false);
    await expect(transport.download('churn/missing.json', join(dir, 'x'))).rejects.toThrow(
      'Model artifact not found in local storage'
    );
  });

  it('fails the upload for a missing source file', async () => {
    await expect(transport.upload(join(dir, 'nope.bin'), 'churn/a.bin')).rejects.toBeInstanceOf(
      StorageError
    );
  });

  it('rejects locations outside the root', () => {
    expect(() => transport.pathFor('../escape.bin')).toThrow(StorageError);
    expect(() => transport.pathFor('')).toThrow(StorageError);
    expect(transport.pathFor('churn/a.bin')).toBe(join(dir, 'bucket', 'churn', 'a.bin'));
  });
});
