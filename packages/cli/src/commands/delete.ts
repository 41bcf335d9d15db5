import { Command } from 'commander';
import { formatDeleteResult, formatJson } from '../output/formatter.js';
import { withMemory, type GlobalOptions } from '../setup.js';

export const deleteCommand = new Command('delete')
  .description('Delete an active memory')
  .argument('<userId>', 'Owner of the memory')
  .argument('<id>', 'Memory id')
  .option('--json', 'Output as JSON')
  .action(async (userId: string, id: string, options: { json?: boolean }, cmd: Command) => {
    await withMemory(cmd.optsWithGlobals<GlobalOptions>(), async ({ memory }) => {
      const result = await memory.delete(userId, id);
      console.log(options.json ? formatJson(result) : formatDeleteResult(result));
    });
  });
