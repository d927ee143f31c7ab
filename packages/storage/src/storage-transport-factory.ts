/**
 * Storage transport factory
 */

import type { StorageTransportPort } from '@modelledger/core';
import { ConfigurationError, type StorageProvider } from '@modelledger/utils';
import { S3StorageTransport } from './transports/s3-transport.js';
import { GcsStorageTransport } from './transports/gcs-transport.js';
import { LocalStorageTransport } from './transports/local-transport.js';

export interface StorageTransportOptions {
  provider: StorageProvider;
  /** Bucket name (s3, gcs) */
  bucket?: string;
  region?: string;
  /** Root directory (local) */
  localRoot?: string;
}

/**
 * Build the transport for the configured provider.
 * Cloud clients are created here but do not connect until first use.
 */
export function createStorageTransport(options: StorageTransportOptions): StorageTransportPort {
  switch (options.provider) {
    case 's3':
      return new S3StorageTransport({ bucket: requireBucket(options), region: options.region });
    case 'gcs':
      return new GcsStorageTransport({ bucket: requireBucket(options) });
    case 'local':
      if (!options.localRoot) {
        throw new ConfigurationError(
          "Local storage root not configured.\nAction: set 'localRoot' in .modelledgerrc or MODELLEDGER_LOCAL_ROOT.",
          'localRoot'
        );
      }
      return new LocalStorageTransport(options.localRoot);
  }
}

function requireBucket(options: StorageTransportOptions): string {
  if (!options.bucket) {
    throw new ConfigurationError(
      "Bucket name not configured.\nAction: set 'bucket' in .modelledgerrc or MODELLEDGER_BUCKET.",
      'bucket'
    );
  }
  return options.bucket;
}
