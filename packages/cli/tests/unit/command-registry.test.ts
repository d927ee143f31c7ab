/**
 * Unit tests for Command Registry
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, ValidationError } from '@modelledger/utils';
import { CommandRegistry, defineHandler, commandRegistry } from '../../src/core/command-registry.js';
import { CommandContext } from '../../src/core/command-context.js';
import '../../src/commands/models.js';
import '../../src/commands/server.js';

const echoSchema = z.object({ name: z.string().min(1), count: z.coerce.number().default(1) });

function echoCommand(handler = vi.fn(async (args: z.output<typeof echoSchema>) => args)) {
  return {
    handler,
    definition: defineHandler({
      name: 'echo',
      description: 'Echo arguments',
      schema: echoSchema,
      handler,
      examples: ['modelledger demo echo --name x'],
    }),
  };
}

describe('defineHandler', () => {
  it('validates raw options before calling the handler', async () => {
    const { handler, definition } = echoCommand();
    const ctx = new CommandContext();

    await expect(definition.run({ name: 'x', count: '3' }, ctx)).resolves.toEqual({ name: 'x', count: 3 });
    expect(handler).toHaveBeenCalledWith({ name: 'x', count: 3 }, ctx);
  });

  it('does not call the handler for invalid options', async () => {
    const { handler, definition } = echoCommand();

    await expect(definition.run({}, new CommandContext())).rejects.toThrow(ValidationError);
    expect(handler).not.toHaveBeenCalled();
  });
});

describe('CommandRegistry', () => {
  it('registers and looks up commands by package and name', () => {
    const registry = new CommandRegistry();
    const { definition } = echoCommand();

    registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [definition] });

    expect(registry.getCommand('demo', 'echo')).toBe(definition);
    expect(registry.getCommand('demo', 'missing')).toBeUndefined();
    expect(registry.getPackageCommands('demo')).toEqual([definition]);
    expect(registry.getPackageCommands('other')).toEqual([]);
  });

  it('requires a wired command to be registered', () => {
    const registry = new CommandRegistry();
    const { definition } = echoCommand();
    registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [definition] });

    expect(registry.requireCommand('demo', 'echo')).toBe(definition);
    expect(() => registry.requireCommand('demo', 'missing')).toThrow(
      'Command demo.missing is not registered'
    );
  });

  it('registers nothing from a module that repeats a command name', () => {
    const registry = new CommandRegistry();
    const { definition } = echoCommand();

    expect(() =>
      registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [definition, definition] })
    ).toThrow('Command demo.echo is already registered');
    expect(registry.getCommand('demo', 'echo')).toBeUndefined();
    expect(registry.getPackageCommands('demo')).toEqual([]);
  });

  it('rejects a package registered twice', () => {
    const registry = new CommandRegistry();
    const module = { packageName: 'demo', description: 'Demo', commands: [echoCommand().definition] };
    registry.registerPackage(module);

    expect(() => registry.registerPackage(module)).toThrow(ConfigurationError);
  });

  it('rejects a command without a name', () => {
    const registry = new CommandRegistry();
    const definition = { ...echoCommand().definition, name: ' ' };

    expect(() =>
      registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [definition] })
    ).toThrow('Command name must be a non-empty string');
  });

  it('renders examples for --help', () => {
    const registry = new CommandRegistry();
    registry.registerPackage({
      packageName: 'demo',
      description: 'Demo commands',
      commands: [echoCommand().definition],
    });

    expect(registry.examplesHelp('demo', 'echo')).toBe(
      '\nExamples:\n  $ modelledger demo echo --name x'
    );
    expect(registry.examplesHelp('demo', 'missing')).toBe('');
  });

  it('has every model and server command registered globally', () => {
    const names = commandRegistry.getPackageCommands('models').map((c) => c.name);

    expect(names).toEqual(['store', 'load', 'list', 'rollback', 'verify']);
    expect(commandRegistry.getCommand('server', 'serve')).toBeDefined();
  });
});
