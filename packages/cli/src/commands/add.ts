import { Command } from 'commander';
import { formatBatchResult, formatJson } from '../output/formatter.js';
import { withMemory, type GlobalOptions } from '../setup.js';

export const addCommand = new Command('add')
  .description('Extract facts from a user message and store them')
  .argument('<userId>', 'Owner of the memories')
  .argument('<text...>', 'What the user said')
  .option('--turn <id>', 'Source turn id to record on each memory')
  .option('--json', 'Output as JSON')
  .action(async (userId: string, text: string[], options: { turn?: string; json?: boolean }, cmd: Command) => {
    const globals = cmd.optsWithGlobals<GlobalOptions>();
    await withMemory(globals, async ({ memory }) => {
      const result = await memory.add([{ role: 'user', content: text.join(' ') }], userId, options.turn ?? null);
      console.log(options.json ? formatJson(result) : formatBatchResult(result));
      if (result.failures.length > 0) process.exitCode = 1;
    });
  });
