/**
 * S3 Storage Transport
 *
 * Objects live at `s3://{bucket}/{location}`. Credentials come from the default
 * AWS provider chain (env, shared config, instance role).
 */

import { createReadStream, createWriteStream } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { StorageTransportPort } from '@modelledger/core';
import { StorageError } from '@modelledger/utils';
import { logger } from '../logger.js';

const CREDENTIALS_ACTION =
  'Action: ensure your AWS credentials (access key / secret key) are configured and have read/write access to the bucket.';

export interface S3TransportConfig {
  bucket: string;
  region?: string;
  /** Injected client (tests, custom endpoints) */
  client?: S3Client;
}

export class S3StorageTransport implements StorageTransportPort {
  readonly provider = 's3' as const;
  private readonly bucket: string;
  private readonly client: S3Client;

  constructor(config: S3TransportConfig) {
    this.bucket = config.bucket;
    this.client = config.client ?? new S3Client({ region: config.region });
  }

  async upload(localPath: string, location: string): Promise<void> {
    const { size } = await stat(localPath);
    const body = createReadStream(localPath);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: location,
          Body: body,
          ContentLength: size,
        })
      );
    } catch (error) {
      throw this.toStorageError('upload to', location, error);
    } finally {
      body.destroy();
    }
    logger.debug('Uploaded object', { bucket: this.bucket, storageLocation: location, size });
  }

  /**
   * Streams the object body to `localPath`; the artifact is never held in memory whole.
   */
  async download(location: string, localPath: string): Promise<void> {
    let body: Readable;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: location })
      );
      if (!(response.Body instanceof Readable)) {
        throw new StorageError(
          `S3 returned no readable body for ${location} in bucket ${this.bucket}.`,
          this.provider,
          location
        );
      }
      body = response.Body;
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw this.toStorageError('download from', location, error);
    }

    try {
      await mkdir(dirname(localPath), { recursive: true });
      await pipeline(body, createWriteStream(localPath));
    } catch (error) {
      body.destroy();
      throw new StorageError(
        `Failed to write S3 object ${location} to ${localPath}: ${error instanceof Error ? error.message : String(error)}`,
        this.provider,
        location,
        { localPath }
      );
    }
    logger.debug('Downloaded object', { bucket: this.bucket, storageLocation: location });
  }

  async exists(location: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: location }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw this.toStorageError('query', location, error);
    }
  }

  private toStorageError(verb: string, location: string, error: unknown): StorageError {
    const code = error instanceof Error ? error.name : 'Unknown';
    const detail = error instanceof Error ? error.message : String(error);

    if (isNotFound(error)) {
      return new StorageError(
        `Model artifact not found in S3 bucket: ${this.bucket}.\n` +
          `Storage location: ${location}\n` +
          'Action: verify the commit hash and model name.',
        this.provider,
        location,
        { code }
      );
    }
    if (code === 'NoSuchBucket') {
      return new StorageError(
        `Failed to connect to S3 bucket: ${this.bucket}.\nReason: Bucket not found.\n` +
          'Action: ensure the bucket exists and you have access to it.',
        this.provider,
        location,
        { code }
      );
    }
    if (code === 'CredentialsProviderError' || code === 'AccessDenied' || code === 'InvalidAccessKeyId') {
      return new StorageError(
        `Failed to connect to S3 bucket: ${this.bucket}.\nReason: Authentication Failure.\n${CREDENTIALS_ACTION}`,
        this.provider,
        location,
        { code }
      );
    }
    return new StorageError(
      `Failed to ${verb} S3 bucket: ${this.bucket}.\nReason: ${code}.\nError: ${detail}`,
      this.provider,
      location,
      { code }
    );
  }
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof S3ServiceException) || error.name === 'NoSuchBucket') {
    return false;
  }
  return (
    error.name === 'NotFound' ||
    error.name === 'NoSuchKey' ||
    error.$metadata.httpStatusCode === 404
  );
}
