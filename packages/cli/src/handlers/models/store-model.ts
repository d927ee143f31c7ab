/**
 * Store Model Handler
 *
 * Upload an artifact keyed by the current commit, then record it in the registry.
 * The registry is written only after the upload succeeds.
 */

import { stat } from 'fs/promises';
import { basename, resolve } from 'path';
import {
  buildStorageLocation,
  fileExtensionOf,
  register,
  requireClean,
} from '@modelledger/core';
import { ValidationError, logger } from '@modelledger/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { ModelsStoreArgs } from '../../command-defs/models.js';

export interface StoreModelResult {
  modelName: string;
  commitHash: string;
  storageLocation: string;
  fileSizeBytes: number;
  message: string;
}

export async function storeModelHandler(
  args: ModelsStoreArgs,
  ctx: CommandContext
): Promise<StoreModelResult> {
  const modelFile = resolve(args.modelPath);
  const stats = await stat(modelFile).catch((error: unknown) => {
    throw new ValidationError(`Model file not found: ${args.modelPath}`, {
      modelPath: args.modelPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  });
  if (!stats.isFile()) {
    throw new ValidationError(`Path is not a file: ${args.modelPath}`, { modelPath: args.modelPath });
  }

  const { sourceControl, transport, registry, clock } = ctx.services;
  await requireClean(sourceControl());
  const commitHash = await sourceControl().currentCommit();

  const fileExtension = fileExtensionOf(modelFile);
  const storageLocation = buildStorageLocation(args.modelName, commitHash, fileExtension);

  logger.info('Uploading model artifact', {
    modelName: args.modelName,
    commitHash,
    storageLocation,
  });
  await transport().upload(modelFile, storageLocation);

  const reg = registry();
  register(
    reg,
    {
      modelName: args.modelName,
      commitHash,
      storageLocation,
      fileSizeBytes: stats.size,
      fileExtension,
    },
    clock()
  );
  reg.save();

  return {
    modelName: args.modelName,
    commitHash,
    storageLocation,
    fileSizeBytes: stats.size,
    message: `Model artifact stored. Action required: git commit and git push the updated ${basename(reg.filePath)} file.`,
  };
}
