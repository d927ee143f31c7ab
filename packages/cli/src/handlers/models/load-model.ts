/**
 * Load Model Handler
 *
 * Resolve a commit hash or "latest" and download the artifact. Never modifies the registry.
 */

import { resolve as resolvePath } from 'path';
import { LATEST_SELECTOR, resolve } from '@modelledger/core';
import { AppError, InvalidArgumentError } from '@modelledger/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { ModelsLoadArgs } from '../../command-defs/models.js';

export interface LoadModelResult {
  modelName: string;
  commitHash: string;
  storageLocation: string;
  outputPath: string;
}

export async function loadModelHandler(
  args: ModelsLoadArgs,
  ctx: CommandContext
): Promise<LoadModelResult> {
  const registry = ctx.services.registry();
  registry.requireExists();

  if (args.selector === LATEST_SELECTOR && !args.modelName) {
    throw new InvalidArgumentError(
      "Model name is required when using 'latest'. Use --model-name or -n option.",
      { selector: args.selector }
    );
  }

  const resolution = resolve(registry, args.selector, args.modelName);
  if (!resolution.found) {
    const message =
      resolution.reason === 'no-latest'
        ? `No latest model found for model name: ${args.modelName ?? ''}`
        : `Model artifact not found for commit hash: ${args.selector}`;
    throw new AppError(message, 'MODEL_NOT_FOUND', 404, {
      selector: args.selector,
      modelName: args.modelName,
      reason: resolution.reason,
    });
  }

  const outputPath = resolvePath(args.outputPath);
  await ctx.services.transport().download(resolution.storageLocation, outputPath);

  return {
    modelName: resolution.modelName,
    commitHash: resolution.commitHash,
    storageLocation: resolution.storageLocation,
    outputPath,
  };
}
