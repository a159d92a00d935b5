import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type SynapticConfig,
  DEFAULT_CONFIG,
  synapticConfigSchema,
  ConfigError,
  getErrorMessage,
} from '@synaptic/shared';

export const CONFIG_FILE_NAMES = ['synaptic.config.yaml', 'synaptic.config.yml', 'synaptic.config.json'];

type ConfigRecord = Record<string, unknown>;

export interface ConfigLoadOptions {
  /** Explicit file; when given, no upward search happens. */
  configPath?: string;
  /** Start of the upward search. Defaults to the working directory. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: SynapticConfig = DEFAULT_CONFIG;
  private sourcePath: string | null = null;

  /**
   * defaults ← config file ← SYNAPTIC_* environment variables, then validated.
   */
  async load(options: ConfigLoadOptions = {}): Promise<SynapticConfig> {
    let merged: ConfigRecord = toRecord(structuredClone(DEFAULT_CONFIG));

    this.sourcePath = options.configPath
      ? (existsSync(options.configPath) ? resolve(options.configPath) : null)
      : findConfigFile(options.cwd ?? process.cwd());
    if (options.configPath && !this.sourcePath) {
      throw new ConfigError(`config file not found: ${options.configPath}`);
    }

    if (this.sourcePath) {
      merged = deepMerge(merged, await parseConfigFile(this.sourcePath));
    }

    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));

    const result = synapticConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof SynapticConfig>(key: K): SynapticConfig[K] {
    return this.config[key];
  }

  getAll(): SynapticConfig {
    return this.config;
  }

  /** File the last `load` read, or null when it used defaults and environment only. */
  getSourcePath(): string | null {
    return this.sourcePath;
  }
}

// ── Helpers ──────────────────────────────────────────────────────

function findConfigFile(start: string): string | null {
  let dir = resolve(start);
  for (let depth = 0; depth < 10; depth++) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = resolve(dir, name);
      if (existsSync(p)) return p;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

async function parseConfigFile(p: string): Promise<ConfigRecord> {
  const content = await readFile(p, 'utf-8');
  let parsed: unknown;
  try {
    parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`cannot parse ${p}: ${getErrorMessage(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${p} must contain a mapping at the top level`);
  }
  return parsed;
}

function loadEnvVars(env: NodeJS.ProcessEnv): ConfigRecord {
  const config: Record<string, ConfigRecord> = {};
  const section = (name: string): ConfigRecord => {
    config[name] ??= {};
    return config[name];
  };

  if (env.SYNAPTIC_BACKEND) {
    section('backend').kind = env.SYNAPTIC_BACKEND;
  }
  if (env.SYNAPTIC_LANCEDB_PATH) {
    section('backend').lancedbPath = env.SYNAPTIC_LANCEDB_PATH;
  }
  if (env.SYNAPTIC_VECTOR_SIZE) {
    section('collections').vectorSize = Number(env.SYNAPTIC_VECTOR_SIZE);
  }
  if (env.SYNAPTIC_EMBEDDING_PROVIDER) {
    section('embedding').provider = env.SYNAPTIC_EMBEDDING_PROVIDER;
  }
  if (env.SYNAPTIC_OLLAMA_URL) {
    section('embedding').baseUrl = env.SYNAPTIC_OLLAMA_URL;
  }
  if (env.SYNAPTIC_OPENAI_API_KEY) {
    section('embedding').apiKey = env.SYNAPTIC_OPENAI_API_KEY;
  }
  if (env.SYNAPTIC_LOG_LEVEL) {
    section('logging').level = env.SYNAPTIC_LOG_LEVEL;
  }
  if (env.SYNAPTIC_ADMIN_DB) {
    section('admin').dbPath = env.SYNAPTIC_ADMIN_DB;
  }

  return config;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: object): ConfigRecord {
  return Object.fromEntries(Object.entries(value));
}

function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = target[key];
    result[key] = isRecord(incoming) && isRecord(existing) ? deepMerge(existing, incoming) : incoming;
  }
  return result;
}
