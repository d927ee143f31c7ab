/**
 * Universal Command Executor
 *
 * Handles the universal parts of running a command:
 * - Validate arguments (through the command definition)
 * - Call handler
 * - Format output
 * - Error handling
 */

import { z } from 'zod';
import { logger } from '@modelledger/utils';
import { formatOutput } from './output-formatter.js';
import { handleError, renderError } from './error-handler.js';
import { CommandContext } from './command-context.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';

const OutputFormatSchema = z.enum(['json', 'table', 'csv']);

/**
 * Run a command and return its formatted output. Errors propagate.
 */
export async function runCommand(
  commandDef: CommandDefinition,
  rawOptions: Record<string, unknown>,
  ctx: CommandContext = new CommandContext()
): Promise<string> {
  // Format is a CLI concern, validated here rather than by each handler
  const parsedFormat = OutputFormatSchema.safeParse(rawOptions.format);
  const format: OutputFormat = parsedFormat.success ? parsedFormat.data : 'table';

  logger.debug('Running command', { command: commandDef.name, format });
  const result = await commandDef.run(rawOptions, ctx);
  return formatOutput(result, format);
}

/**
 * Run a command, print its output, and exit with status 1 on failure
 */
export async function execute(
  commandDef: CommandDefinition,
  rawOptions: Record<string, unknown>,
  ctx?: CommandContext
): Promise<void> {
  try {
    const output = await runCommand(commandDef, rawOptions, ctx);
    console.log(output);
  } catch (error) {
    console.error(renderError(handleError(error, { command: commandDef.name })));
    process.exit(1);
  }
}
