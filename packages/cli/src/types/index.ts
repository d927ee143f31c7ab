/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table' | 'csv';

/**
 * Command definition as stored in the registry.
 *
 * `run` validates raw (Commander) options against `schema` and calls the handler;
 * build one with `defineHandler()` so the handler sees the schema's output type.
 */
export interface CommandDefinition {
  /**
   * Command name (e.g., 'store', 'list')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: z.ZodTypeAny;

  run(rawOptions: Record<string, unknown>, ctx: CommandContext): Promise<unknown>;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Typed handler specification, erased to a CommandDefinition by defineHandler()
 */
export interface CommandSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  handler: (args: z.output<S>, ctx: CommandContext) => Promise<unknown> | unknown;
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'models', 'server')
   */
  packageName: string;

  /**
   * Package description
   */
  description: string;

  /**
   * Commands in this package
   */
  commands: CommandDefinition[];
}
