import { Command } from 'commander';
import { listQuerySchema } from '@tempora/shared';
import { formatJson, formatRecords } from '../output/formatter.js';
import { parseArgs, withMemory, type GlobalOptions } from '../setup.js';

export const listCommand = new Command('list')
  .description('List memories of a user')
  .argument('<userId>', 'Owner of the memories')
  .option('-s, --status <status>', 'active, archived or deleted', 'active')
  .option('--json', 'Output as JSON')
  .action(async (userId: string, options: { status: string; json?: boolean }, cmd: Command) => {
    const args = parseArgs(listQuerySchema, { userId, status: options.status });

    await withMemory(cmd.optsWithGlobals<GlobalOptions>(), async ({ memory }) => {
      const records = await memory.list(args.userId, args.status);
      console.log(options.json ? formatJson(records) : formatRecords(records));
    });
  });
