/**
 * Model Commands
 *
 * Store, load, list, roll back and verify versioned model artifacts.
 *
 * @packageDocumentation
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { commandRegistry, defineHandler } from '../core/command-registry.js';
import type { PackageCommandModule } from '../types/index.js';
import {
  modelsListSchema,
  modelsLoadSchema,
  modelsRollbackSchema,
  modelsStoreSchema,
  modelsVerifySchema,
} from '../command-defs/models.js';
import { storeModelHandler } from '../handlers/models/store-model.js';
import { loadModelHandler } from '../handlers/models/load-model.js';
import { listModelsHandler } from '../handlers/models/list-models.js';
import { rollbackModelHandler } from '../handlers/models/rollback-model.js';
import { verifyModelsHandler } from '../handlers/models/verify-models.js';

/**
 * Merge positionals into options under the given names, in order
 */
function positionalsAs(
  ...names: string[]
): (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown> {
  return (args, rawOpts) => {
    const merged: Record<string, unknown> = { ...rawOpts };
    names.forEach((name, i) => {
      merged[name] = args[i];
    });
    return merged;
  };
}

/**
 * Register model commands
 */
export function registerModelsCommands(program: Command): void {
  const modelsCmd = program.command('models').description('Versioned model artifacts');

  const storeCmd = modelsCmd
    .command('store')
    .description('Upload a model file keyed by the current commit and record it in the registry')
    .argument('<modelPath>', 'Path to the model file')
    .argument('<modelName>', 'Model name')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(storeCmd, {
    name: 'store',
    packageName: 'models',
    argsToOpts: positionalsAs('modelPath', 'modelName'),
    onError: die,
  });

  const loadCmd = modelsCmd
    .command('load')
    .description('Download a model version by commit hash or "latest"')
    .argument('<selector>', 'Commit hash or "latest"')
    .argument('<outputPath>', 'Where to write the model file')
    .option('-n, --model-name <name>', 'Model name (required with "latest")')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(loadCmd, {
    name: 'load',
    packageName: 'models',
    argsToOpts: positionalsAs('selector', 'outputPath'),
    onError: die,
  });

  const listCmd = modelsCmd
    .command('list')
    .description('List registered model versions')
    .option('-n, --model-name <name>', 'Only this model')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(listCmd, {
    name: 'list',
    packageName: 'models',
    onError: die,
  });

  const rollbackCmd = modelsCmd
    .command('rollback')
    .description('Point a model\'s "latest" at an existing version')
    .argument('<commitHash>', 'Commit hash to make latest')
    .argument('<modelName>', 'Model name')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(rollbackCmd, {
    name: 'rollback',
    packageName: 'models',
    argsToOpts: positionalsAs('commitHash', 'modelName'),
    onError: die,
  });

  const verifyCmd = modelsCmd
    .command('verify')
    .description('Check that every registered artifact exists in storage')
    .option('-n, --model-name <name>', 'Only this model')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(verifyCmd, {
    name: 'verify',
    packageName: 'models',
    onError: die,
  });
}

/**
 * Register as package command module
 */
const modelsModule: PackageCommandModule = {
  packageName: 'models',
  description: 'Versioned model artifacts',
  commands: [
    defineHandler({
      name: 'store',
      description: 'Upload a model file keyed by the current commit and record it in the registry',
      schema: modelsStoreSchema,
      handler: storeModelHandler,
      examples: ['modelledger models store ./model.json iris'],
    }),
    defineHandler({
      name: 'load',
      description: 'Download a model version by commit hash or "latest"',
      schema: modelsLoadSchema,
      handler: loadModelHandler,
      examples: [
        'modelledger models load latest ./model.json -n iris',
        'modelledger models load abc123def456 ./model.json',
      ],
    }),
    defineHandler({
      name: 'list',
      description: 'List registered model versions',
      schema: modelsListSchema,
      handler: listModelsHandler,
      examples: ['modelledger models list', 'modelledger models list --format json'],
    }),
    defineHandler({
      name: 'rollback',
      description: 'Point a model\'s "latest" at an existing version',
      schema: modelsRollbackSchema,
      handler: rollbackModelHandler,
      examples: ['modelledger models rollback abc123def456 iris'],
    }),
    defineHandler({
      name: 'verify',
      description: 'Check that every registered artifact exists in storage',
      schema: modelsVerifySchema,
      handler: verifyModelsHandler,
      examples: ['modelledger models verify', 'modelledger models verify -n iris'],
    }),
  ],
};

commandRegistry.registerPackage(modelsModule);
