/**
 * Server Commands
 * ===============
 * Commands for starting the inference gateway
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { commandRegistry, defineHandler } from '../core/command-registry.js';
import type { PackageCommandModule } from '../types/index.js';
import { serveSchema } from '../command-defs/server.js';
import { serveHandler } from '../handlers/server/serve.js';

/**
 * Register server commands
 */
export function registerServerCommands(program: Command): void {
  const serveCmd = program
    .command('serve')
    .description('Start the inference gateway')
    .option('--port <number>', 'Server port (default: PORT or 8000)')
    .option('--host <host>', 'Server host (default: HOST or 0.0.0.0)')
    .option('--model-path <path>', 'Serve this model file instead of resolving through the registry')
    .option('--model-name <name>', 'Model to resolve through the registry')
    .option('--model-version <selector>', 'Commit hash or "latest"')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(serveCmd, {
    name: 'serve',
    packageName: 'server',
    onError: die,
  });
}

const serverModule: PackageCommandModule = {
  packageName: 'server',
  description: 'Inference gateway commands',
  commands: [
    defineHandler({
      name: 'serve',
      description: 'Start the inference gateway',
      schema: serveSchema,
      handler: serveHandler,
      examples: [
        'modelledger serve',
        'modelledger serve --port 8080',
        'modelledger serve --model-name iris --model-version latest',
      ],
    }),
  ],
};

commandRegistry.registerPackage(serverModule);
