/**
 * Resolution Service - read path from (selector, model name) to a storage location
 */

import { InvalidArgumentError, UnknownModelError, UnknownVersionError } from '@modelledger/utils';
import type { ArtifactRegistry } from './artifact-registry.js';

/** Selector that asks for the model's latest pointer instead of an explicit commit hash */
export const LATEST_SELECTOR = 'latest';

export interface ResolvedVersion {
  found: true;
  modelName: string;
  commitHash: string;
  storageLocation: string;
}

export interface UnresolvedVersion {
  found: false;
  /**
   * - `no-latest`: the model has no latest pointer (never registered)
   * - `unknown-version`: no entry for the commit hash
   */
  reason: 'no-latest' | 'unknown-version';
  selector: string;
  modelName?: string;
}

export type Resolution = ResolvedVersion | UnresolvedVersion;

/**
 * Resolve a selector to a storage location.
 *
 * A legitimate miss is a `{ found: false }` result, not an error. Throws only for
 * malformed input (InvalidArgumentError) or a missing registry file (NotInitializedError).
 *
 * Without a model name, an explicit hash is searched across all models and the first
 * match in model registration order wins. Hashes are model-scoped, so two models can
 * share one; callers that care must pass the model name.
 */
export function resolve(
  registry: ArtifactRegistry,
  selector: string,
  modelName?: string
): Resolution {
  registry.requireExists();

  if (selector.trim() === '') {
    throw new InvalidArgumentError('Version selector must be a commit hash or "latest"');
  }

  if (selector === LATEST_SELECTOR) {
    if (!modelName) {
      throw new InvalidArgumentError(
        'Model name is required when using the "latest" selector.',
        { selector }
      );
    }
    const latestHash = registry.getLatest(modelName);
    if (latestHash === undefined) {
      return { found: false, reason: 'no-latest', selector, modelName };
    }
    return lookup(registry, latestHash, modelName, selector);
  }

  if (modelName) {
    return lookup(registry, selector, modelName, selector);
  }

  for (const candidate of registry.modelNames()) {
    const entry = registry.getVersion(candidate, selector);
    if (entry) {
      return {
        found: true,
        modelName: candidate,
        commitHash: entry.commitHash,
        storageLocation: entry.storageLocation,
      };
    }
  }
  return { found: false, reason: 'unknown-version', selector };
}

function lookup(
  registry: ArtifactRegistry,
  commitHash: string,
  modelName: string,
  selector: string
): Resolution {
  const entry = registry.getVersion(modelName, commitHash);
  if (!entry) {
    return { found: false, reason: 'unknown-version', selector, modelName };
  }
  return {
    found: true,
    modelName,
    commitHash: entry.commitHash,
    storageLocation: entry.storageLocation,
  };
}

/**
 * Like resolve(), but a miss becomes UnknownModelError / UnknownVersionError.
 * Used where there is no user to show a friendly "not found" message to (server startup).
 */
export function resolveOrThrow(
  registry: ArtifactRegistry,
  selector: string,
  modelName?: string
): ResolvedVersion {
  const resolution = resolve(registry, selector, modelName);
  if (resolution.found) {
    return resolution;
  }
  if (resolution.reason === 'no-latest' || (modelName && !registry.hasModel(modelName))) {
    throw new UnknownModelError(modelName ?? selector);
  }
  throw new UnknownVersionError(selector, modelName);
}
