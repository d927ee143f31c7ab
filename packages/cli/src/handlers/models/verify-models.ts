/**
 * Verify Models Handler
 *
 * Checks that every registered artifact is still present in object storage.
 */

import { listAll, sortListing } from '@modelledger/core';
import type { CommandContext } from '../../core/command-context.js';
import type { ModelsVerifyArgs } from '../../command-defs/models.js';

export interface VerifyRow {
  model_name: string;
  commit_hash: string;
  storage_location: string;
  status: 'present' | 'missing';
}

export async function verifyModelsHandler(
  args: ModelsVerifyArgs,
  ctx: CommandContext
): Promise<VerifyRow[]> {
  const versions = sortListing(listAll(ctx.services.registry())).filter(
    (version) => !args.modelName || version.modelName === args.modelName
  );
  const transport = ctx.services.transport();

  const rows: VerifyRow[] = [];
  for (const version of versions) {
    const present = await transport.exists(version.storageLocation);
    rows.push({
      model_name: version.modelName,
      commit_hash: version.commitHash,
      storage_location: version.storageLocation,
      status: present ? 'present' : 'missing',
    });
  }
  return rows;
}
