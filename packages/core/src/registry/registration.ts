/**
 * Registration Service - write path for new artifact versions
 */

import { InvalidArgumentError, logger } from '@modelledger/utils';
import { createSystemClock, isoTimestamp, type ClockPort } from '../ports/clockPort.js';
import type { ArtifactRegistry } from './artifact-registry.js';
import type { VersionEntry } from './registry-schema.js';

/** Keys a plain JSON object cannot hold as its own property once parsed back */
const RESERVED_KEYS = new Set(['__proto__']);

export interface RegisterVersionInput {
  modelName: string;
  commitHash: string;
  storageLocation: string;
  fileSizeBytes: number;
  fileExtension: string;
}

/**
 * Record a version for (modelName, commitHash) and point latest at it.
 *
 * Re-registering the same key overwrites the entry with the new facts and a fresh
 * timestamp, so a failed store can be re-run. Mutates memory only; the caller saves.
 */
export function register(
  registry: ArtifactRegistry,
  input: RegisterVersionInput,
  clock: ClockPort = createSystemClock()
): VersionEntry {
  const { modelName, commitHash, storageLocation, fileSizeBytes, fileExtension } = input;

  if (modelName.trim() === '') {
    throw new InvalidArgumentError('Model name must be a non-empty string', { modelName });
  }
  if (commitHash.trim() === '') {
    throw new InvalidArgumentError('Commit hash must be a non-empty string', { commitHash });
  }
  if (RESERVED_KEYS.has(modelName)) {
    throw new InvalidArgumentError(`Model name '${modelName}' is reserved`, { modelName });
  }
  if (RESERVED_KEYS.has(commitHash)) {
    throw new InvalidArgumentError(`Commit hash '${commitHash}' is reserved`, { commitHash });
  }
  if (!Number.isSafeInteger(fileSizeBytes) || fileSizeBytes < 0) {
    throw new InvalidArgumentError(
      `File size must be a non-negative integer, got ${fileSizeBytes}`,
      { fileSizeBytes }
    );
  }

  const entry: VersionEntry = {
    commitHash,
    storageLocation,
    fileSizeBytes,
    fileExtension,
    timestamp: isoTimestamp(clock),
  };

  const replaced = registry.getVersion(modelName, commitHash) !== undefined;
  registry.putVersion(modelName, entry);
  registry.pointLatest(modelName, commitHash);

  logger.debug('Registered model version', {
    modelName,
    commitHash,
    storageLocation,
    replaced,
  });

  return entry;
}
