/**
 * Listing - flattened view of every registered version
 */

import type { ArtifactRegistry } from './artifact-registry.js';

export interface ListedVersion {
  modelName: string;
  commitHash: string;
  storageLocation: string;
  fileSizeBytes: number;
  fileExtension: string;
  timestamp: string;
  isLatest: boolean;
}

/**
 * One record per (model, commit hash), in registry iteration order.
 */
export function listAll(registry: ArtifactRegistry): ListedVersion[] {
  registry.requireExists();

  const records: ListedVersion[] = [];
  for (const modelName of registry.modelNames()) {
    const latestHash = registry.getLatest(modelName);
    for (const entry of registry.getVersions(modelName)) {
      records.push({
        modelName,
        commitHash: entry.commitHash,
        storageLocation: entry.storageLocation,
        fileSizeBytes: entry.fileSizeBytes,
        fileExtension: entry.fileExtension,
        timestamp: entry.timestamp,
        isLatest: entry.commitHash === latestHash,
      });
    }
  }
  return records;
}

/**
 * Display order: model name, then timestamp, then commit hash.
 * Timestamps are wall-clock readings, so a clock that moved backwards shows up here.
 */
export function sortListing(records: readonly ListedVersion[]): ListedVersion[] {
  return [...records].sort(
    (a, b) =>
      a.modelName.localeCompare(b.modelName) ||
      a.timestamp.localeCompare(b.timestamp) ||
      a.commitHash.localeCompare(b.commitHash)
  );
}
