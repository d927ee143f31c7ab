import { describe, it, expect } from 'vitest';
import { ValidationError } from '@modelledger/utils';
import { LinearBackend, parseLinearModel } from '../../../src/backends/linear-backend.js';

describe('parseLinearModel', () => {
  it('parses a linear model and defaults bias to 0', () => {
    const model = parseLinearModel('{"type":"linear","weights":[1,2]}', 'm.json');

    expect(model).toEqual({ type: 'linear', weights: [1, 2], bias: 0 });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseLinearModel('{not json', 'm.json')).toThrow(ValidationError);
    expect(() => parseLinearModel('{not json', 'm.json')).toThrow(
      /^Model file is not valid JSON: m\.json: /
    );
  });

  it('rejects an unsupported model type', () => {
    expect(() => parseLinearModel('{"type":"tree","weights":[1]}', 'm.json')).toThrow(
      /^Unsupported model file: m\.json: type: /
    );
  });

  it('rejects empty weights', () => {
    expect(() => parseLinearModel('{"type":"linear","weights":[]}', 'm.json')).toThrow(
      /^Unsupported model file: m\.json: weights: /
    );
  });
});

describe('LinearBackend', () => {
  const backend = new LinearBackend({ type: 'linear', weights: [1, 1, 1], bias: 0 });

  it('computes the dot product per row', async () => {
    await expect(backend.predictBatch([[1, 2, 3], [4, 5, 6]])).resolves.toEqual([6, 15]);
  });

  it('adds the bias', () => {
    const biased = new LinearBackend({ type: 'linear', weights: [0.5, 2], bias: 1 });

    expect(biased.predictOne([2, 3])).toBe(8);
  });

  it('reports its kind', () => {
    expect(backend.kind).toBe('linear');
  });

  it('rejects non-numeric input', () => {
    expect(() => backend.predictOne('oops')).toThrow('Input must be an array of numbers');
    expect(() => backend.predictOne([1, 'a', 3])).toThrow('Input must be an array of numbers');
  });

  it('rejects a row of the wrong width', () => {
    expect(() => backend.predictOne([1, 1])).toThrow('Expected 3 features, got 2');
  });

  it('rejects the whole batch when one row is malformed', async () => {
    await expect(backend.predictBatch([[1, 2, 3], 'oops'])).rejects.toThrow(
      'Input must be an array of numbers'
    );
  });
});
