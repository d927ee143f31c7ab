#!/usr/bin/env tsx

/**
 * ModelLedger CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported (side effects).
 * registerXCommands functions add Commander options and wire them to execute(),
 * which uses handlers from the registry.
 */

import 'dotenv/config';
import { program } from 'commander';
import { die } from '../core/cliErrors.js';
import { registerModelsCommands } from '../commands/models.js';
import { registerServerCommands } from '../commands/server.js';

program
  .name('modelledger')
  .description('Version model artifacts by commit and serve them for inference')
  .version('0.2.0');

registerModelsCommands(program);
registerServerCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

program.parseAsync().catch(die);
