/**
 * Google Cloud Storage Transport
 *
 * Objects live at `gs://{bucket}/{location}`. Credentials come from
 * application default credentials (GOOGLE_APPLICATION_CREDENTIALS or the metadata server).
 */

import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { Storage, type Bucket } from '@google-cloud/storage';
import type { StorageTransportPort } from '@modelledger/core';
import { StorageError } from '@modelledger/utils';
import { logger } from '../logger.js';

const CREDENTIALS_ACTION =
  'Action: ensure your GCP credentials (service account key) are configured and have read/write access to the bucket.';

export interface GcsTransportConfig {
  bucket: string;
  /** Injected client (tests, emulators) */
  storage?: Storage;
}

function errorCode(error: unknown): number | string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'number' || typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class GcsStorageTransport implements StorageTransportPort {
  readonly provider = 'gcs' as const;
  private readonly bucketName: string;
  private readonly bucket: Bucket;

  constructor(config: GcsTransportConfig) {
    this.bucketName = config.bucket;
    this.bucket = (config.storage ?? new Storage()).bucket(config.bucket);
  }

  async upload(localPath: string, location: string): Promise<void> {
    try {
      await this.bucket.upload(localPath, { destination: location });
    } catch (error) {
      throw this.toStorageError('upload to', location, error);
    }
    logger.debug('Uploaded object', { bucket: this.bucketName, storageLocation: location });
  }

  async download(location: string, localPath: string): Promise<void> {
    const file = this.bucket.file(location);
    if (!(await this.exists(location))) {
      throw new StorageError(
        `Model artifact not found in GCS bucket: ${this.bucketName}.\n` +
          `Storage location: ${location}\n` +
          'Action: verify the commit hash and model name.',
        this.provider,
        location
      );
    }

    await mkdir(dirname(localPath), { recursive: true });
    try {
      await file.download({ destination: localPath });
    } catch (error) {
      throw this.toStorageError('download from', location, error);
    }
    logger.debug('Downloaded object', { bucket: this.bucketName, storageLocation: location });
  }

  async exists(location: string): Promise<boolean> {
    try {
      const [found] = await this.bucket.file(location).exists();
      return found;
    } catch (error) {
      throw this.toStorageError('query', location, error);
    }
  }

  private toStorageError(verb: string, location: string, error: unknown): StorageError {
    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);

    if (code === 401 || code === 403 || /credential|authenticat/i.test(detail)) {
      return new StorageError(
        `Failed to connect to GCS bucket: ${this.bucketName}.\nReason: Authentication Failure.\n${CREDENTIALS_ACTION}`,
        this.provider,
        location,
        { code }
      );
    }
    return new StorageError(
      `Failed to ${verb} GCS bucket: ${this.bucketName}.\nReason: ${detail}\n${CREDENTIALS_ACTION}`,
      this.provider,
      location,
      { code }
    );
  }
}
