#!/usr/bin/env tsx
import { Command } from 'commander';
import { TEMPORA_VERSION, errorMessage } from '@tempora/shared';
import { addCommand } from '../src/commands/add.js';
import { searchCommand } from '../src/commands/search.js';
import { listCommand } from '../src/commands/list.js';
import { deleteCommand } from '../src/commands/delete.js';
import { historyCommand } from '../src/commands/history.js';
import { reindexCommand } from '../src/commands/reindex.js';
import { serveCommand } from '../src/commands/serve.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('tempora')
  .description('Tempora - time-aware memory for conversational agents')
  .version(TEMPORA_VERSION)
  .option('-c, --config <path>', 'Config file (default: search for tempora.config.*)');

program.addCommand(addCommand);
program.addCommand(searchCommand);
program.addCommand(listCommand);
program.addCommand(deleteCommand);
program.addCommand(historyCommand);
program.addCommand(reindexCommand);
program.addCommand(serveCommand);
program.addCommand(configCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
