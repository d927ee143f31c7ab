/**
 * Command Registry
 *
 * Commands are keyed `package.command` (`models.store`, `server.serve`). Each command
 * module registers its definitions on import; Commander wiring looks them up by key.
 */

import type { z } from 'zod';
import type { CommandDefinition, CommandSpec, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@modelledger/utils';
import { validateAndCoerceArgs } from './validation-pipeline.js';

/**
 * Erase a typed handler into a registry entry that validates before calling it
 */
export function defineHandler<S extends z.ZodTypeAny>(spec: CommandSpec<S>): CommandDefinition {
  return {
    name: spec.name,
    description: spec.description,
    schema: spec.schema,
    examples: spec.examples,
    run: async (rawOptions, ctx) => spec.handler(validateAndCoerceArgs(spec.schema, rawOptions), ctx),
  };
}

function commandKey(packageName: string, commandName: string): string {
  return `${packageName}.${commandName}`;
}

export class CommandRegistry {
  private readonly packages = new Map<string, PackageCommandModule>();
  private readonly commands = new Map<string, CommandDefinition>();

  /**
   * All-or-nothing: a module with an invalid or duplicate command registers nothing.
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    const seen = new Set<string>();
    for (const command of module.commands) {
      validateCommand(command);
      if (seen.has(command.name)) {
        throw new ConfigurationError(
          `Command ${commandKey(module.packageName, command.name)} is already registered`,
          'commandName',
          { packageName: module.packageName, commandName: command.name }
        );
      }
      seen.add(command.name);
    }

    this.packages.set(module.packageName, module);
    for (const command of module.commands) {
      this.commands.set(commandKey(module.packageName, command.name), command);
    }
  }

  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(commandKey(packageName, commandName));
  }

  /**
   * Lookup for Commander wiring; a miss means a command was wired but never registered.
   */
  requireCommand(packageName: string, commandName: string): CommandDefinition {
    const command = this.getCommand(packageName, commandName);
    if (!command) {
      throw new ConfigurationError(
        `Command ${commandKey(packageName, commandName)} is not registered`,
        'commandName',
        { packageName, commandName }
      );
    }
    return command;
  }

  /**
   * Commands of a package, in registration order
   */
  getPackageCommands(packageName: string): CommandDefinition[] {
    return this.packages.get(packageName)?.commands ?? [];
  }

  /**
   * `Examples:` block appended to a command's --help, empty when it has none
   */
  examplesHelp(packageName: string, commandName: string): string {
    const examples = this.getCommand(packageName, commandName)?.examples ?? [];
    if (examples.length === 0) {
      return '';
    }
    return ['', 'Examples:', ...examples.map((example) => `  $ ${example}`)].join('\n');
  }
}

function validateCommand(command: CommandDefinition): void {
  if (command.name.trim() === '') {
    throw new ValidationError('Command name must be a non-empty string', {
      command: command.name,
    });
  }
  if (command.description.trim() === '') {
    throw new ValidationError('Command description must be a non-empty string', {
      command: command.name,
    });
  }
}

/**
 * Process-wide registry the command modules register into
 */
export const commandRegistry = new CommandRegistry();
