/**
 * Local filesystem transport
 *
 * Mirrors the bucket layout under a root directory. Used for development,
 * single-host deployments and tests.
 */

import { access, copyFile, mkdir } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'path';
import type { StorageTransportPort } from '@modelledger/core';
import { StorageError } from '@modelledger/utils';
import { logger } from '../logger.js';

export class LocalStorageTransport implements StorageTransportPort {
  readonly provider = 'local' as const;
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Absolute path for a location. Locations may not escape the root.
   */
  pathFor(location: string): string {
    const target = resolve(this.root, location);
    const rel = relative(this.root, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new StorageError(
        `Storage location '${location}' resolves outside the storage root ${this.root}.`,
        this.provider,
        location
      );
    }
    return target;
  }

  async upload(localPath: string, location: string): Promise<void> {
    const target = this.pathFor(location);
    try {
      await mkdir(dirname(target), { recursive: true });
      await copyFile(localPath, target);
    } catch (error) {
      throw new StorageError(
        `Failed to copy ${localPath} to ${target}: ${error instanceof Error ? error.message : String(error)}`,
        this.provider,
        location
      );
    }
    logger.debug('Stored object', { root: this.root, storageLocation: location });
  }

  async download(location: string, localPath: string): Promise<void> {
    const source = this.pathFor(location);
    if (!(await this.exists(location))) {
      throw new StorageError(
        `Model artifact not found in local storage: ${this.root}.\n` +
          `Storage location: ${location}\n` +
          'Action: verify the commit hash and model name.',
        this.provider,
        location
      );
    }
    try {
      await mkdir(dirname(localPath), { recursive: true });
      await copyFile(source, localPath);
    } catch (error) {
      throw new StorageError(
        `Failed to copy ${source} to ${localPath}: ${error instanceof Error ? error.message : String(error)}`,
        this.provider,
        location
      );
    }
  }

  async exists(location: string): Promise<boolean> {
    try {
      await access(this.pathFor(location));
      return true;
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      return false;
    }
  }
}
