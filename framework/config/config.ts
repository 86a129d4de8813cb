/**
 * Configuration Management
 *
 * Loads and manages application configuration from a JSON file and the
 * environment.
 */

import { readFile } from 'node:fs/promises';
import { isLogLevel, type LogLevel } from '../telemetry/logger.ts';
import type { NamingConvention } from '../view/partial.ts';

export interface ViewSettings {
  /** Directory templates are loaded from */
  path: string;
  extension: string;
  naming: NamingConvention;
  /** Default page layout; `false` renders pages bare */
  layout: string | false;
  cache: boolean;
}

export interface ConfigOptions {
  env?: string;
  logLevel?: LogLevel;
  views?: Partial<ViewSettings>;
  [key: string]: unknown;
}

export class ConfigError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'ConfigError';
    this.source = source;
  }
}

const DEFAULT_CONFIG: ConfigOptions = {
  env: 'development',
  logLevel: 'info',
  views: {
    path: './views',
    extension: '.html',
    naming: 'underscore-prefixed',
    layout: 'layout',
    cache: true,
  },
};

const DEFAULT_CONFIG_PATH = './config/app.json';

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(mergeConfig({}, DEFAULT_CONFIG), options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get<T>(key: string, defaultValue?: T): T {
    const value = this.getNestedValue(key);
    return (value ?? defaultValue) as T;
  }

  /**
   * Deep-merge more settings over the current ones
   */
  merge(options: Record<string, unknown>): void {
    this.config = mergeConfig(this.config, options);
  }

  set(key: string, value: unknown): void {
    const parts = key.split('.');
    const last = parts.pop() ?? key;
    let current = this.config;

    for (const part of parts) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }

  has(key: string): boolean {
    return this.getNestedValue(key) !== undefined;
  }

  /**
   * View settings, validated
   */
  views(): ViewSettings {
    const naming = this.getNestedValue('views.naming');
    if (naming !== 'direct' && naming !== 'underscore-prefixed') {
      throw new ConfigError('views.naming', `unknown naming convention ${JSON.stringify(naming)}`);
    }

    const layout = this.getNestedValue('views.layout');
    return {
      path: String(this.getNestedValue('views.path') ?? './views'),
      extension: String(this.getNestedValue('views.extension') ?? '.html'),
      naming,
      layout: typeof layout === 'string' && layout !== '' ? layout : false,
      cache: this.getNestedValue('views.cache') !== false,
    };
  }

  logLevel(): LogLevel {
    const level = this.getNestedValue('logLevel');
    return isLogLevel(level) ? level : 'info';
  }

  private getNestedValue(path: string): unknown {
    let current: unknown = this.config;
    for (const key of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
    return current;
  }
}

/**
 * Load configuration from a JSON file, then the environment.
 * A missing file means defaults; an unreadable or malformed one throws.
 */
export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<Config> {
  const config = new Config();
  config.merge(await readConfigFile(configPath));

  const env = process.env;
  if (env.LOG_LEVEL !== undefined && !isLogLevel(env.LOG_LEVEL)) {
    throw new ConfigError('LOG_LEVEL', `unknown log level ${JSON.stringify(env.LOG_LEVEL)}`);
  }

  const overrides: Array<[string, unknown]> = [
    ['env', env.NODE_ENV],
    ['logLevel', env.LOG_LEVEL],
    ['views.path', env.VIEWS_PATH],
    ['views.naming', env.VIEWS_NAMING],
    ['views.layout', env.VIEWS_LAYOUT === 'false' ? false : env.VIEWS_LAYOUT],
  ];

  for (const [key, value] of overrides) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(configPath, error instanceof Error ? error.message : 'invalid JSON');
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(configPath, 'expected a JSON object');
  }
  return parsed;
}

/**
 * Deep merge; `undefined` in the override keeps the base value
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const existing = result[key];
    result[key] = isRecord(value) ? mergeConfig(isRecord(existing) ? existing : {}, value) : value;
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
