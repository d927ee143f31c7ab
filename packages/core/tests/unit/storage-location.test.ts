import { describe, it, expect } from 'vitest';
import { buildStorageLocation, fileExtensionOf } from '../../src/storage-location.js';

describe('fileExtensionOf', () => {
  it.each([
    ['model.json', 'json'],
    ['/tmp/artifacts/model.onnx', 'onnx'],
    ['model.tar.gz', 'gz'],
    ['weights', 'bin'],
    ['.hidden', 'bin'],
    ['trailing.', 'bin'],
  ])('%s -> %s', (filePath, expected) => {
    expect(fileExtensionOf(filePath)).toBe(expected);
  });
});

describe('buildStorageLocation', () => {
  it('builds model/commit.ext', () => {
    expect(buildStorageLocation('churn', 'abc123def456', 'json')).toBe('churn/abc123def456.json');
  });
});
