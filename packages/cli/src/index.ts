/**
 * @modelledger/cli - command line for the model ledger
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export { runCommand, execute } from './core/execute.js';
export { defineCommand, type DefineCommandArgs } from './core/defineCommand.js';
export { die } from './core/cliErrors.js';
export * from './types/index.js';
export { registerModelsCommands } from './commands/models.js';
export { registerServerCommands } from './commands/server.js';
