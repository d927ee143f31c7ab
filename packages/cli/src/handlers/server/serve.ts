/**
 * Serve Handler
 *
 * Starts the inference gateway from the environment, with optional overrides.
 */

import { startGateway } from '@modelledger/api';
import type { CommandContext } from '../../core/command-context.js';
import type { ServeArgs } from '../../command-defs/server.js';

export interface ServeResult {
  url: string;
  modelLoaded: boolean;
}

export async function serveHandler(args: ServeArgs, ctx: CommandContext): Promise<ServeResult> {
  const base = ctx.services.serverConfig();
  const config = {
    ...base,
    port: args.port ?? base.port,
    host: args.host ?? base.host,
    modelPath: args.modelPath ?? base.modelPath,
    modelName: args.modelName ?? base.modelName,
    modelVersion: args.modelVersion ?? base.modelVersion,
  };

  const server = await startGateway(config);
  const ready = await server.inject({ method: 'GET', url: '/ready' });

  return {
    url: `http://${config.host}:${config.port}`,
    modelLoaded: ready.statusCode === 200,
  };
}
