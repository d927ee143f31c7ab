/**
 * Standard Command Wrapper
 *
 * Provides a mechanical pattern for CLI commands:
 * - Commander owns flags & parsing
 * - Wrapper owns: canonical option shape (camelCase), positional-argument merging,
 *   registry lookup, handler invocation through execute()
 *
 * Validation uses the schema of the registered command definition, so there is one
 * schema per command.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { execute } from './execute.js';
import { commandRegistry } from './command-registry.js';
import type { CommandContext } from './command-context.js';

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Merge Commander positional arguments into options before validation
  argsToOpts?: (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
  // Context factory (tests)
  context?: () => CommandContext;
  onError?: (e: unknown) => never;
};

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Optional argsToOpts() merges positional arguments
 * - execute() validates with the registered schema, runs the handler and prints the result
 */
export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.addHelpText('after', () => commandRegistry.examplesHelp(args.packageName, args.name));

  cmd.action(async (...commanderArgs: unknown[]) => {
    try {
      const commandDef = commandRegistry.requireCommand(args.packageName, args.name);

      // Commander gives camelCase keys already
      const rawOpts: Record<string, unknown> = { ...cmd.opts() };
      // Commander passes (...positionals, options, command)
      const positionals = commanderArgs.slice(0, cmd.registeredArguments.length);
      const merged = args.argsToOpts ? args.argsToOpts(positionals, rawOpts) : rawOpts;

      await execute(commandDef, merged, args.context?.());
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
