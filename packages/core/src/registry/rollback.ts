/**
 * Rollback Service - repoint latest at an existing version
 */

import { UnknownModelError, UnknownVersionError, logger } from '@modelledger/utils';
import type { ArtifactRegistry } from './artifact-registry.js';

export interface RollbackResult {
  modelName: string;
  previous?: string;
  current: string;
}

/**
 * Set `latest` for a model to an already-registered commit hash.
 * Touches no version entry and does not persist; the caller saves.
 */
export function setLatest(
  registry: ArtifactRegistry,
  modelName: string,
  commitHash: string
): RollbackResult {
  registry.requireExists();

  if (!registry.hasModel(modelName)) {
    throw new UnknownModelError(modelName);
  }
  if (!registry.getVersion(modelName, commitHash)) {
    throw new UnknownVersionError(commitHash, modelName);
  }

  const previous = registry.getLatest(modelName);
  registry.pointLatest(modelName, commitHash);
  logger.debug('Latest pointer moved', { modelName, previous, current: commitHash });

  return { modelName, previous, current: commitHash };
}
