import { Command } from 'commander';
import { searchQuerySchema } from '@tempora/shared';
import { formatJson, formatSearchResult } from '../output/formatter.js';
import { parseArgs, withMemory, type GlobalOptions } from '../setup.js';

interface SearchCommandOptions {
  limit: string;
  type?: string;
  slot?: string;
  json?: boolean;
}

export const searchCommand = new Command('search')
  .description('Search memories by meaning, ranked by similarity, decay and confidence')
  .argument('<userId>', 'Owner of the memories')
  .argument('<query>', 'Search text')
  .option('-l, --limit <n>', 'Maximum number of results', '10')
  .option('--type <type>', 'Only memories of this type')
  .option('--slot <slot>', 'Only memories in this slot')
  .option('--json', 'Output as JSON')
  .action(async (userId: string, query: string, options: SearchCommandOptions, cmd: Command) => {
    const args = parseArgs(searchQuerySchema, {
      userId,
      q: query,
      limit: options.limit,
      type: options.type,
      slot: options.slot,
    });

    await withMemory(cmd.optsWithGlobals<GlobalOptions>(), async ({ memory }) => {
      const result = await memory.search(args.userId, args.q, { limit: args.limit, type: args.type, slot: args.slot });
      console.log(options.json ? formatJson(result) : formatSearchResult(result));
    });
  });
