import path from 'node:path';

/** Extension recorded for artifacts whose file name has none */
export const DEFAULT_FILE_EXTENSION = 'bin';

/**
 * File extension without the leading dot, or `bin` when the name has none.
 * `model.tar.gz` gives `gz`.
 */
export function fileExtensionOf(filePath: string): string {
  const ext = path.extname(filePath);
  return ext.length > 1 ? ext.slice(1) : DEFAULT_FILE_EXTENSION;
}

/**
 * Object key inside the bucket: `{model}/{commit}.{ext}`
 */
export function buildStorageLocation(modelName: string, commitHash: string, fileExtension: string): string {
  return `${modelName}/${commitHash}.${fileExtension}`;
}
