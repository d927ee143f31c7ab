/**
 * List Models Handler
 */

import { listAll, sortListing, type ListedVersion } from '@modelledger/core';
import type { CommandContext } from '../../core/command-context.js';
import type { ModelsListArgs } from '../../command-defs/models.js';

export const NO_MODELS_MESSAGE = 'No model artifacts found.';

export interface ModelListRow {
  model_name: string;
  commit_hash: string;
  storage_location: string;
  size: string;
  timestamp: string;
  latest: string;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Display row: size in MB with two decimals, timestamp cut to the second.
 */
export function toListRow(version: ListedVersion): ModelListRow {
  return {
    model_name: version.modelName,
    commit_hash: version.commitHash,
    storage_location: version.storageLocation,
    size: `${(version.fileSizeBytes / BYTES_PER_MB).toFixed(2)} MB`,
    timestamp: version.timestamp.slice(0, 19),
    latest: version.isLatest ? '✓' : '',
  };
}

export async function listModelsHandler(
  args: ModelsListArgs,
  ctx: CommandContext
): Promise<ModelListRow[] | string> {
  const versions = sortListing(listAll(ctx.services.registry())).filter(
    (version) => !args.modelName || version.modelName === args.modelName
  );

  if (versions.length === 0) {
    return NO_MODELS_MESSAGE;
  }
  return versions.map(toListRow);
}
