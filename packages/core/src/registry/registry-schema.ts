/**
 * Registry file format
 *
 * On disk the registry is a single JSON object, meant to be committed to source control:
 *
 * ```json
 * {
 *   "models": {
 *     "churn": {
 *       "3f2a9c1d0b7e": {
 *         "storage_uri": "churn/3f2a9c1d0b7e.json",
 *         "commit_hash": "3f2a9c1d0b7e",
 *         "file_size": 1048576,
 *         "file_extension": "json",
 *         "timestamp": "2024-05-01T09:30:00.000Z"
 *       }
 *     }
 *   },
 *   "latest": { "churn": "3f2a9c1d0b7e" }
 * }
 * ```
 */

import { z } from 'zod';

export const PersistedVersionEntrySchema = z.object({
  storage_uri: z.string(),
  commit_hash: z.string(),
  file_size: z.number().int().nonnegative(),
  file_extension: z.string(),
  timestamp: z.string(),
});

export const PersistedRegistrySchema = z.object({
  models: z.record(z.string(), z.record(z.string(), PersistedVersionEntrySchema)).default({}),
  latest: z.record(z.string(), z.string()).default({}),
});

export type PersistedVersionEntry = z.infer<typeof PersistedVersionEntrySchema>;
export type PersistedRegistry = z.infer<typeof PersistedRegistrySchema>;

/**
 * One registered artifact version. Immutable once created.
 */
export interface VersionEntry {
  commitHash: string;
  storageLocation: string;
  fileSizeBytes: number;
  fileExtension: string;
  /** ISO-8601, captured at registration */
  timestamp: string;
}

/**
 * Plain-object view of the whole registry, in iteration order.
 */
export interface RegistrySnapshot {
  models: Record<string, Record<string, VersionEntry>>;
  latest: Record<string, string>;
}

export function fromPersistedEntry(entry: PersistedVersionEntry): VersionEntry {
  return {
    commitHash: entry.commit_hash,
    storageLocation: entry.storage_uri,
    fileSizeBytes: entry.file_size,
    fileExtension: entry.file_extension,
    timestamp: entry.timestamp,
  };
}

export function toPersistedEntry(entry: VersionEntry): PersistedVersionEntry {
  return {
    storage_uri: entry.storageLocation,
    commit_hash: entry.commitHash,
    file_size: entry.fileSizeBytes,
    file_extension: entry.fileExtension,
    timestamp: entry.timestamp,
  };
}
