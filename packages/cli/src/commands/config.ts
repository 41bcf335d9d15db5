import { Command } from 'commander';
import { CONFIG_FILE_NAMES } from '@tempora/core';
import { formatJson } from '../output/formatter.js';
import { loadConfig, type GlobalOptions } from '../setup.js';

const ENV_VARS = [
  'TEMPORA_OPENAI_API_KEY',
  'TEMPORA_EMBEDDING_PROVIDER',
  'TEMPORA_EMBEDDING_MODEL',
  'TEMPORA_METADATA_PATH',
  'TEMPORA_VECTOR_BACKEND',
  'TEMPORA_QDRANT_URL',
  'TEMPORA_QDRANT_API_KEY',
  'TEMPORA_LOG_LEVEL',
  'TEMPORA_SERVER_PORT',
  'TEMPORA_API_KEY',
];

export const configCommand = new Command('config')
  .description('Inspect Tempora configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .action(async (_options: object, cmd: Command) => {
    const { config } = await loadConfig(cmd.optsWithGlobals<GlobalOptions>());
    console.log(formatJson(config));
  });

configCommand
  .command('path')
  .description('Show which config file is used and where it is looked for')
  .action(async (_options: object, cmd: Command) => {
    const { configPath } = await loadConfig(cmd.optsWithGlobals<GlobalOptions>());
    console.log(`Loaded: ${configPath ?? '(none, defaults and environment only)'}`);
    console.log('');
    console.log('Config files searched in the working directory and its parents (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
    console.log('');
    console.log('Environment variables:');
    for (const name of ENV_VARS) console.log(`  ${name}`);
  });
