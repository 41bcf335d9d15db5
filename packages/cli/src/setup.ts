import type { z } from 'zod';
import { ConfigManager, TemporalMemory, createLogger, type Logger } from '@tempora/core';
import { ValidationError, type TemporaConfig } from '@tempora/shared';

export type GlobalOptions = {
  config?: string;
};

export interface CliContext {
  config: TemporaConfig;
  configPath: string | null;
  logger: Logger;
  memory: TemporalMemory;
}

export async function loadConfig(options: GlobalOptions): Promise<{ config: TemporaConfig; configPath: string | null }> {
  const manager = new ConfigManager();
  const config = await manager.load({ configPath: options.config });
  return { config, configPath: manager.getConfigPath() };
}

/** Load config, open the stores and build the engine. */
export async function setupMemory(options: GlobalOptions): Promise<CliContext> {
  const { config, configPath } = await loadConfig(options);
  const logger = createLogger(config.logging);
  const memory = TemporalMemory.fromConfig(config, { logger });
  logger.debug({ configPath, vectorBackend: config.vector.backend }, 'memory engine ready');
  return { config, configPath, logger, memory };
}

/** Run `fn` against a fresh engine and close the stores afterwards. */
export async function withMemory<T>(options: GlobalOptions, fn: (ctx: CliContext) => Promise<T>): Promise<T> {
  const ctx = await setupMemory(options);
  try {
    return await fn(ctx);
  } finally {
    ctx.memory.close();
  }
}

/** Validate command arguments with a shared schema. */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join(', '),
    );
  }
  return result.data;
}
