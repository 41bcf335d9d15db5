import { Command } from 'commander';
import { z } from 'zod';
import { parseArgs, setupMemory, type GlobalOptions } from '../setup.js';

const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
});

export const serveCommand = new Command('serve')
  .description('Start the Tempora HTTP API server')
  .option('-p, --port <port>', 'Server port')
  .option('-H, --host <host>', 'Server host')
  .action(async (options: { port?: string; host?: string }, cmd: Command) => {
    const overrides = parseArgs(serveOptionsSchema, options);

    // Loaded lazily so other commands do not pull in the HTTP stack
    const { startServer } = await import('@tempora/server');
    const { config, logger, memory } = await setupMemory(cmd.optsWithGlobals<GlobalOptions>());

    const server = startServer(
      memory,
      {
        ...config.server,
        port: overrides.port ?? config.server.port,
        host: overrides.host ?? config.server.host,
        vectorBackend: config.vector.backend,
      },
      logger,
    );

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'shutting down');
      server.close(() => {
        memory.close();
        process.exit(0);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
