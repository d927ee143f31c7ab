/**
 * @modelledger/storage
 *
 * Object-store transports for model artifacts: S3, Google Cloud Storage and a local directory.
 */

export { S3StorageTransport, type S3TransportConfig } from './transports/s3-transport.js';
export { GcsStorageTransport, type GcsTransportConfig } from './transports/gcs-transport.js';
export { LocalStorageTransport } from './transports/local-transport.js';
export {
  createStorageTransport,
  type StorageTransportOptions,
} from './storage-transport-factory.js';
