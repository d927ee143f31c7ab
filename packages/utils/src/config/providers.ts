import { z } from 'zod';

/**
 * Object-store providers an artifact can live in.
 * `local` is a directory on disk (development, tests, shared volumes).
 */
export const StorageProviderSchema = z.enum(['s3', 'gcs', 'local']);

export type StorageProvider = z.infer<typeof StorageProviderSchema>;
