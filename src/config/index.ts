import { config as loadEnv } from 'dotenv';
import { parse as parseIni } from 'ini';
import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig, DEFAULT_INI_FILENAME } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';

export interface ConfigLoaderOptions {
  /** Explicit INI path; wins over XEN_INVENTORY_INI_PATH */
  iniPath?: string;
  /** Environment to read; defaults to process.env after loading .env */
  env?: NodeJS.ProcessEnv;
  /** Directory holding the default INI file and .env */
  cwd?: string;
}

interface DraftConfig {
  cache: { path: string; ttl?: number };
  xen: Config['xen'];
  // Loose until validated, so env and INI strings can be assigned as-is
  logging: { level: string; format: string; file?: string; silent: boolean };
}

/**
 * Load configuration from environment variables and the INI file
 * Priority: Environment Variables > INI File > Defaults
 */
export class ConfigLoader {
  private config: Config;
  private readonly env: NodeJS.ProcessEnv;
  private readonly cwd: string;
  private readonly iniPath: string;

  constructor(options: ConfigLoaderOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();

    if (options.env) {
      this.env = options.env;
    } else {
      // Load .env file if it exists
      loadEnv({ path: join(this.cwd, '.env') });
      this.env = process.env;
    }

    this.iniPath = options.iniPath ?? this.resolveIniPath();

    const draft: DraftConfig = {
      cache: { ...defaultConfig.cache },
      xen: { ...defaultConfig.xen },
      logging: { ...defaultConfig.logging },
    };

    this.loadFromFile(draft);
    this.loadFromEnv(draft);
    this.config = this.validate(draft);
  }

  /**
   * XEN_INVENTORY_INI_PATH, with ~ and $VAR expanded, or the default file in cwd
   */
  private resolveIniPath(): string {
    const fromEnv = this.env['XEN_INVENTORY_INI_PATH'];
    if (fromEnv) {
      return expandPath(fromEnv, this.env);
    }
    return join(this.cwd, DEFAULT_INI_FILENAME);
  }

  /**
   * Load the [GENERIC] and [LOGGING] sections of the INI file.
   * A missing file leaves the defaults in place.
   */
  private loadFromFile(draft: DraftConfig): void {
    if (!existsSync(this.iniPath)) {
      return;
    }

    let parsed: Record<string, unknown>;
    try {
      parsed = parseIni(readFileSync(this.iniPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read config file ${this.iniPath}`,
        { path: this.iniPath },
        toError(error)
      );
    }

    const generic = section(parsed, 'GENERIC');
    const cachePath = stringValue(generic['cache_path']);
    if (cachePath !== undefined) draft.cache.path = cachePath;
    const cacheTTL = stringValue(generic['cache_ttl']);
    if (cacheTTL !== undefined) draft.cache.ttl = parseInteger(cacheTTL);
    const host = stringValue(generic['xen_host']);
    if (host !== undefined) draft.xen.host = host;
    const user = stringValue(generic['xen_user']);
    if (user !== undefined) draft.xen.username = user;
    const pass = stringValue(generic['xen_pass']);
    if (pass !== undefined) draft.xen.password = pass;

    const logging = section(parsed, 'LOGGING');
    const level = stringValue(logging['level']);
    if (level !== undefined) draft.logging.level = level;
    const format = stringValue(logging['format']);
    if (format !== undefined) draft.logging.format = format;
    const file = stringValue(logging['file']);
    if (file) draft.logging.file = file;
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(draft: DraftConfig): void {
    const env = this.env;

    // Cache configuration
    if (env['XEN_INVENTORY_CACHE_PATH']) {
      draft.cache.path = env['XEN_INVENTORY_CACHE_PATH'];
    }
    if (env['XEN_INVENTORY_CACHE_TTL']) {
      draft.cache.ttl = parseInteger(env['XEN_INVENTORY_CACHE_TTL']);
    }

    // XenAPI connection
    if (env['XEN_INVENTORY_HOST']) {
      draft.xen.host = env['XEN_INVENTORY_HOST'];
    }
    if (env['XEN_INVENTORY_USER']) {
      draft.xen.username = env['XEN_INVENTORY_USER'];
    }
    if (env['XEN_INVENTORY_PASS']) {
      draft.xen.password = env['XEN_INVENTORY_PASS'];
    }

    // Logging configuration
    if (env['XEN_INVENTORY_LOG_LEVEL']) {
      draft.logging.level = env['XEN_INVENTORY_LOG_LEVEL'];
    }
    if (env['XEN_INVENTORY_LOG_FORMAT']) {
      draft.logging.format = env['XEN_INVENTORY_LOG_FORMAT'];
    }
    if (env['XEN_INVENTORY_LOG_FILE']) {
      draft.logging.file = env['XEN_INVENTORY_LOG_FILE'];
    }
    if (env['XEN_INVENTORY_LOG_SILENT']) {
      draft.logging.silent = env['XEN_INVENTORY_LOG_SILENT'] === 'true';
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(draft: DraftConfig): Config {
    const result = ConfigSchema.safeParse(draft);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, {
        path: this.iniPath,
        issues,
      });
    }
    return result.data;
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }

  /**
   * Path of the INI file that was (or would have been) read
   */
  public getIniPath(): string {
    return this.iniPath;
  }
}

function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = parsed[name];
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function stringValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Strict integer parse; anything else becomes NaN so the schema rejects it
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

/**
 * Expand a leading ~ and $VAR / ${VAR} references. Unknown variables are left as written.
 */
export function expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
  const withVars = input.replace(/\$(\w+)|\$\{(\w+)\}/g, (match: string, bare?: string, braced?: string) => {
    const name = bare ?? braced;
    const value = name ? env[name] : undefined;
    return value ?? match;
  });

  if (withVars === '~' || withVars.startsWith('~/')) {
    return join(homedir(), withVars.slice(1));
  }
  return withVars;
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(options?: ConfigLoaderOptions): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader(options);
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export types
export type { Config } from './schema.js';
