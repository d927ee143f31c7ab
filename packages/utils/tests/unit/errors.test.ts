import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigurationError,
  CorruptDataError,
  DirtyRepositoryError,
  InvalidArgumentError,
  NotFoundError,
  NotInitializedError,
  ServiceUnavailableError,
  StorageError,
  UnknownModelError,
  UnknownVersionError,
  ValidationError,
} from '../../src/errors.js';

describe('errors', () => {
  describe('AppError', () => {
    it('defaults to a 500 operational error', () => {
      const error = new AppError('boom');

      expect(error.code).toBe('APP_ERROR');
      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });

    it('serializes to JSON for logging', () => {
      const json = new ValidationError('bad input', { field: 'modelName' }).toJSON();

      expect(json).toMatchObject({
        name: 'ValidationError',
        message: 'bad input',
        code: 'VALIDATION_ERROR',
        statusCode: 400,
        context: { field: 'modelName' },
        isOperational: true,
      });
    });
  });

  it.each([
    [new ValidationError('x'), 'VALIDATION_ERROR', 400],
    [new NotFoundError('Command', 'models.list'), 'NOT_FOUND', 404],
    [new ConfigurationError('x', 'bucket'), 'CONFIGURATION_ERROR', 500],
    [new ServiceUnavailableError('micro-batcher'), 'SERVICE_UNAVAILABLE', 503],
    [new StorageError('x', 's3'), 'STORAGE_ERROR', 502],
    [new NotInitializedError('/r.json'), 'REGISTRY_NOT_INITIALIZED', 404],
    [new UnknownModelError('iris'), 'UNKNOWN_MODEL', 404],
    [new UnknownVersionError('abc'), 'UNKNOWN_VERSION', 404],
    [new CorruptDataError('x', '/r.json'), 'CORRUPT_REGISTRY', 500],
    [new InvalidArgumentError('x'), 'INVALID_ARGUMENT', 400],
    [new DirtyRepositoryError(['a.py']), 'DIRTY_REPOSITORY', 409],
  ])('%s carries code %s and status %i', (error, code, statusCode) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.statusCode).toBe(statusCode);
  });

  it('formats not-found messages with and without an identifier', () => {
    expect(new NotFoundError('Command', 'models.list').message).toBe(
      "Command with identifier 'models.list' not found"
    );
    expect(new NotFoundError('Command').message).toBe('Command not found');
  });

  it('names the model in version errors when known', () => {
    expect(new UnknownVersionError('abc123def456', 'iris').message).toBe(
      "Commit hash 'abc123def456' not found for model 'iris'."
    );
    expect(new UnknownVersionError('abc123def456').message).toBe(
      "Commit hash 'abc123def456' not found in registry."
    );
  });

  it('lists uncommitted files', () => {
    const error = new DirtyRepositoryError(['train.py', 'data.csv']);

    expect(error.uncommittedFiles).toEqual(['train.py', 'data.csv']);
    expect(error.message.split('\n')[1]).toBe('Uncommitted files: train.py, data.csv');
  });

  it('keeps provider and location on storage errors', () => {
    const error = new StorageError('Failed to upload', 'gcs', 'iris/abc.bin');

    expect(error.provider).toBe('gcs');
    expect(error.location).toBe('iris/abc.bin');
    expect(error.context).toEqual({ provider: 'gcs', location: 'iris/abc.bin' });
  });

  it('marks corrupt registry data as not operational', () => {
    expect(new CorruptDataError('x', '/r.json').isOperational).toBe(false);
    expect(new UnknownModelError('iris').isOperational).toBe(true);
  });
});
