/**
 * Artifact Registry
 *
 * Durable mapping (model name, commit hash) -> version entry, plus one "latest"
 * pointer per model. Loaded fully into memory from a single JSON file and written
 * back as a whole after each mutation.
 *
 * Invariants:
 * - a model present in `models` has at least one version
 * - `latest[model]`, when set, names a version registered under that model
 *
 * Only the registry services (registration, rollback) mutate an instance, through
 * `putVersion` and `pointLatest`.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { CorruptDataError, NotInitializedError, logger } from '@modelledger/utils';
import {
  PersistedRegistrySchema,
  fromPersistedEntry,
  toPersistedEntry,
  type PersistedRegistry,
  type RegistrySnapshot,
  type VersionEntry,
} from './registry-schema.js';

export class ArtifactRegistry {
  readonly filePath: string;
  private readonly models = new Map<string, Map<string, VersionEntry>>();
  private readonly latest = new Map<string, string>();

  private constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  /**
   * In-memory registry bound to `filePath`, ignoring anything on disk.
   */
  static empty(filePath: string): ArtifactRegistry {
    return new ArtifactRegistry(filePath);
  }

  /**
   * Read the registry file. A missing file yields an empty registry;
   * a file that does not parse, or breaks an invariant, raises CorruptDataError.
   */
  static load(filePath: string): ArtifactRegistry {
    const registry = new ArtifactRegistry(filePath);
    if (!existsSync(registry.filePath)) {
      logger.debug('Registry file not found, starting empty', { filePath: registry.filePath });
      return registry;
    }

    const raw = readFileSync(registry.filePath, 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CorruptDataError(
        `Failed to parse registry file ${registry.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        registry.filePath
      );
    }

    const parsed = PersistedRegistrySchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
      throw new CorruptDataError(
        `Registry file ${registry.filePath} has an unexpected structure:\n  ${issues.join('\n  ')}`,
        registry.filePath,
        { issues }
      );
    }

    registry.hydrate(parsed.data);
    return registry;
  }

  private hydrate(data: PersistedRegistry): void {
    for (const [modelName, versions] of Object.entries(data.models)) {
      const entries = new Map<string, VersionEntry>();
      for (const [commitHash, persisted] of Object.entries(versions)) {
        if (persisted.commit_hash !== commitHash) {
          throw new CorruptDataError(
            `Registry entry ${modelName}/${commitHash} records commit_hash '${persisted.commit_hash}'`,
            this.filePath,
            { modelName, commitHash }
          );
        }
        entries.set(commitHash, fromPersistedEntry(persisted));
      }
      // Empty version maps are dropped
      if (entries.size > 0) {
        this.models.set(modelName, entries);
      }
    }

    for (const [modelName, commitHash] of Object.entries(data.latest)) {
      if (!this.models.get(modelName)?.has(commitHash)) {
        throw new CorruptDataError(
          `Latest pointer for model '${modelName}' references unknown commit hash '${commitHash}'`,
          this.filePath,
          { modelName, commitHash }
        );
      }
      this.latest.set(modelName, commitHash);
    }
  }

  /**
   * Whether the registry file exists on disk.
   */
  exists(): boolean {
    return existsSync(this.filePath);
  }

  /**
   * Precondition guard for read and rollback operations.
   */
  requireExists(): void {
    if (!this.exists()) {
      throw new NotInitializedError(this.filePath);
    }
  }

  /**
   * Overwrite the registry file with the in-memory state.
   * Writes a sibling temp file and renames it into place, so readers never see a partial file.
   */
  save(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    writeFileSync(tmpPath, `${JSON.stringify(this.toPersisted(), null, 2)}\n`, 'utf-8');
    renameSync(tmpPath, this.filePath);
    logger.debug('Registry saved', { filePath: this.filePath, models: this.models.size });
  }

  modelNames(): string[] {
    return Array.from(this.models.keys());
  }

  hasModel(modelName: string): boolean {
    return this.models.has(modelName);
  }

  getVersion(modelName: string, commitHash: string): VersionEntry | undefined {
    return this.models.get(modelName)?.get(commitHash);
  }

  /**
   * Versions of a model in registration order (empty for an unknown model).
   */
  getVersions(modelName: string): VersionEntry[] {
    return Array.from(this.models.get(modelName)?.values() ?? []);
  }

  getLatest(modelName: string): string | undefined {
    return this.latest.get(modelName);
  }

  /**
   * Insert or overwrite a version entry.
   */
  putVersion(modelName: string, entry: VersionEntry): void {
    let versions = this.models.get(modelName);
    if (!versions) {
      versions = new Map();
      this.models.set(modelName, versions);
    }
    versions.set(entry.commitHash, { ...entry });
  }

  /**
   * Point `latest` for a model at an already-registered version.
   */
  pointLatest(modelName: string, commitHash: string): void {
    if (!this.getVersion(modelName, commitHash)) {
      throw new RangeError(`Cannot point latest for '${modelName}' at unregistered '${commitHash}'`);
    }
    this.latest.set(modelName, commitHash);
  }

  /**
   * Deep copy of the current state.
   */
  snapshot(): RegistrySnapshot {
    return {
      models: this.mapModels((entry) => ({ ...entry })),
      latest: Object.fromEntries(this.latest),
    };
  }

  toPersisted(): PersistedRegistry {
    return {
      models: this.mapModels(toPersistedEntry),
      latest: Object.fromEntries(this.latest),
    };
  }

  private mapModels<T>(map: (entry: VersionEntry) => T): Record<string, Record<string, T>> {
    return Object.fromEntries(
      Array.from(this.models, ([modelName, versions]): [string, Record<string, T>] => [
        modelName,
        Object.fromEntries(
          Array.from(versions, ([commitHash, entry]): [string, T] => [commitHash, map(entry)])
        ),
      ])
    );
  }
}
