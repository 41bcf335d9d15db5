import { Command } from 'commander';
import { formatJson, formatRecords } from '../output/formatter.js';
import { withMemory, type GlobalOptions } from '../setup.js';

export const historyCommand = new Command('history')
  .description('Show a memory and everything it replaced, newest first')
  .argument('<userId>', 'Owner of the memory')
  .argument('<id>', 'Memory id')
  .option('--json', 'Output as JSON')
  .action(async (userId: string, id: string, options: { json?: boolean }, cmd: Command) => {
    await withMemory(cmd.optsWithGlobals<GlobalOptions>(), async ({ memory }) => {
      const chain = await memory.history(userId, id);
      console.log(options.json ? formatJson(chain) : formatRecords(chain));
    });
  });
