/**
 * Rollback Model Handler
 */

import { basename } from 'path';
import { setLatest } from '@modelledger/core';
import type { CommandContext } from '../../core/command-context.js';
import type { ModelsRollbackArgs } from '../../command-defs/models.js';

export interface RollbackModelResult {
  modelName: string;
  previous: string;
  current: string;
  message: string;
}

export async function rollbackModelHandler(
  args: ModelsRollbackArgs,
  ctx: CommandContext
): Promise<RollbackModelResult> {
  const registry = ctx.services.registry();
  const result = setLatest(registry, args.modelName, args.commitHash);
  registry.save();

  return {
    modelName: result.modelName,
    previous: result.previous ?? '',
    current: result.current,
    message: `Rolled back model '${result.modelName}' to commit ${result.current}. Action required: git commit and git push the updated ${basename(registry.filePath)} file.`,
  };
}
