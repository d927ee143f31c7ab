/**
 * Storage Transport Port
 *
 * Moves artifact bytes between a local file and an object store.
 * The registry only ever sees the location string; it never talks to a transport.
 *
 * @packageDocumentation
 */

import type { StorageProvider } from '@modelledger/utils';

export interface StorageTransportPort {
  /** Provider this transport talks to */
  readonly provider: StorageProvider;

  /**
   * Upload a local file to `location`. Resolves only once the object store has
   * acknowledged the write; rejects with StorageError otherwise.
   */
  upload(localPath: string, location: string): Promise<void>;

  /**
   * Download `location` to `localPath`, creating parent directories.
   * Rejects with StorageError when the object is missing or unreachable.
   */
  download(location: string, localPath: string): Promise<void>;

  /** Whether an object exists at `location` */
  exists(location: string): Promise<boolean>;
}
