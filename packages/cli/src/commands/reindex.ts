import { Command } from 'commander';
import { formatJson, formatReindexResult } from '../output/formatter.js';
import { withMemory, type GlobalOptions } from '../setup.js';

export const reindexCommand = new Command('reindex')
  .description('Re-embed memories that missed the vector index')
  .argument('<ids...>', 'Memory ids, as printed by [LAG] lines')
  .option('--json', 'Output as JSON')
  .action(async (ids: string[], options: { json?: boolean }, cmd: Command) => {
    await withMemory(cmd.optsWithGlobals<GlobalOptions>(), async ({ memory }) => {
      const result = await memory.reindex(ids);
      console.log(options.json ? formatJson(result) : formatReindexResult(result));
      if (result.failed.length > 0) process.exitCode = 1;
    });
  });
