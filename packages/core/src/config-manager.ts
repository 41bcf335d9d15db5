import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type TemporaConfig,
  DEFAULT_CONFIG,
  temporaConfigSchema,
  ConfigError,
} from '@tempora/shared';

export const CONFIG_FILE_NAMES = ['tempora.config.yaml', 'tempora.config.yml', 'tempora.config.json'];

type PlainObject = Record<string, unknown>;

export class ConfigManager {
  private config: TemporaConfig = DEFAULT_CONFIG;
  private loadedFrom: string | null = null;

  async load(options?: { configPath?: string }): Promise<TemporaConfig> {
    // 1. Start with defaults
    let merged: PlainObject = structuredClone(DEFAULT_CONFIG);

    // 2. Load config file
    const filePath = this.findConfigFile(options?.configPath);
    if (filePath) {
      merged = deepMerge(merged, await this.parseConfigFile(filePath));
    }
    this.loadedFrom = filePath;

    // 3. Load environment variables
    merged = deepMerge(merged, this.loadEnvVars());

    // 4. Validate
    const result = temporaConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof TemporaConfig>(key: K): TemporaConfig[K] {
    return this.config[key];
  }

  getAll(): TemporaConfig {
    return this.config;
  }

  /** Path of the file the last `load` read, or null when only defaults and env applied. */
  getConfigPath(): string | null {
    return this.loadedFrom;
  }

  findConfigFile(configPath?: string): string | null {
    if (configPath) {
      const p = resolve(configPath);
      if (!existsSync(p)) throw new ConfigError(`config file not found: ${p}`);
      return p;
    }

    // Search cwd and parent directories
    let dir = resolve(process.cwd());
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) return p;
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<PlainObject> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (parsed == null) return {};
    if (!isPlainObject(parsed)) throw new ConfigError(`${p} must contain a mapping at the top level`);
    return parsed;
  }

  private loadEnvVars(): PlainObject {
    const env = process.env;
    const config: Record<string, PlainObject> = {};
    const section = (name: string): PlainObject => (config[name] ??= {});

    if (env.TEMPORA_OPENAI_API_KEY) {
      section('embedding').apiKey = env.TEMPORA_OPENAI_API_KEY;
      section('extraction').apiKey = env.TEMPORA_OPENAI_API_KEY;
    }

    if (env.TEMPORA_EMBEDDING_PROVIDER) {
      section('embedding').provider = env.TEMPORA_EMBEDDING_PROVIDER;
    }

    if (env.TEMPORA_EMBEDDING_MODEL) {
      section('embedding').model = env.TEMPORA_EMBEDDING_MODEL;
    }

    if (env.TEMPORA_METADATA_PATH) {
      section('store').metadataPath = env.TEMPORA_METADATA_PATH;
    }

    if (env.TEMPORA_VECTOR_BACKEND) {
      section('vector').backend = env.TEMPORA_VECTOR_BACKEND;
    }

    if (env.TEMPORA_QDRANT_URL || env.TEMPORA_QDRANT_API_KEY) {
      section('vector').qdrant = {
        ...(env.TEMPORA_QDRANT_URL ? { url: env.TEMPORA_QDRANT_URL } : {}),
        ...(env.TEMPORA_QDRANT_API_KEY ? { apiKey: env.TEMPORA_QDRANT_API_KEY } : {}),
      };
    }

    if (env.TEMPORA_LOG_LEVEL) {
      section('logging').level = env.TEMPORA_LOG_LEVEL;
    }

    if (env.TEMPORA_SERVER_PORT) {
      section('server').port = parseInt(env.TEMPORA_SERVER_PORT, 10);
    }

    if (env.TEMPORA_API_KEY) {
      section('server').apiKey = env.TEMPORA_API_KEY;
    }

    return config;
  }
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    result[key] = isPlainObject(from) && isPlainObject(into) ? deepMerge(into, from) : from;
  }
  return result;
}
