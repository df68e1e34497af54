import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type WmregConfig,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  wmregConfigSchema,
  ConfigurationError,
} from '@wmreg/shared';

export interface ConfigLoadOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: WmregConfig = DEFAULT_CONFIG;
  private source: string | null = null;

  async load(options: ConfigLoadOptions = {}): Promise<WmregConfig> {
    // 1. Start with defaults
    let merged: Record<string, unknown> = toRecord(structuredClone(DEFAULT_CONFIG));

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Load environment variables
    merged = deepMerge(merged, this.loadEnvVars(options.env ?? process.env));

    // 4. Validate
    const result = wmregConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof WmregConfig>(key: K): WmregConfig[K] {
    return this.config[key];
  }

  getAll(): WmregConfig {
    return this.config;
  }

  /** Path of the file the last `load` read, if any. */
  getSource(): string | null {
    return this.source;
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigurationError(`config file not found: ${configPath}`);
      }
      return this.parseConfigFile(configPath);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigurationError(`cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.source = p;
    // An empty YAML document parses to null
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }

  private loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const logging: Record<string, unknown> = {};

    if (env.WMREG_LOG_LEVEL) {
      logging.level = env.WMREG_LOG_LEVEL;
    }

    if (env.WMREG_TRACE) {
      logging.trace = env.WMREG_TRACE === 'true';
    }

    return Object.keys(logging).length > 0 ? { logging } : {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(config: WmregConfig): Record<string, unknown> {
  return { registers: config.registers, logging: config.logging };
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    if (isRecord(from) && isRecord(into)) {
      result[key] = deepMerge(into, from);
    } else {
      result[key] = from;
    }
  }
  return result;
}
