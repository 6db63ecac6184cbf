import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';

/**
 * Name of the optional JSON config file looked up in the working directory
 */
export const CONFIG_FILE = 'modsite.config.json';

type ConfigSection = keyof Config;
type RawConfig = Record<ConfigSection, Record<string, unknown>>;

const SECTIONS: readonly ConfigSection[] = ['logging', 'build', 'render'];

export interface ConfigLoaderOptions {
  /** Directory holding `.env` and `modsite.config.json` */
  cwd?: string;
  /** Environment to read; `.env` is only loaded into `process.env` when omitted */
  env?: Record<string, string | undefined>;
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;
  private readonly cwd: string;
  private readonly env: Record<string, string | undefined>;

  constructor(options: ConfigLoaderOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();

    if (options.env) {
      this.env = options.env;
    } else {
      // Load .env file if it exists
      loadEnv({ path: join(this.cwd, '.env') });
      this.env = process.env;
    }

    // Start with defaults
    const raw = this.cloneDefaults();

    this.loadFromFile(raw);
    this.loadFromEnv(raw);

    this.config = this.validate(raw);
  }

  private cloneDefaults(): RawConfig {
    return {
      logging: { ...defaultConfig.logging },
      build: { ...defaultConfig.build, ignore: [...defaultConfig.build.ignore] },
      render: { ...defaultConfig.render },
    };
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(raw: RawConfig): void {
    const configPath = join(this.cwd, CONFIG_FILE);
    if (!existsSync(configPath)) {
      return;
    }

    let fileConfig: unknown;
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load config file: ${toError(error).message}`,
        { path: configPath },
        toError(error)
      );
    }

    if (!isRecord(fileConfig)) {
      throw new ConfigurationError('Config file must contain a JSON object', { path: configPath });
    }

    for (const section of SECTIONS) {
      const value = fileConfig[section];
      if (value === undefined) continue;
      if (!isRecord(value)) {
        throw new ConfigurationError(`Config section "${section}" must be an object`, {
          path: configPath,
        });
      }
      Object.assign(raw[section], value);
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(raw: RawConfig): void {
    const env = this.env;

    // Logging configuration
    if (env['MODSITE_LOG_LEVEL']) {
      raw.logging['level'] = env['MODSITE_LOG_LEVEL'];
    }
    if (env['MODSITE_LOG_FORMAT']) {
      raw.logging['format'] = env['MODSITE_LOG_FORMAT'];
    }
    if (env['MODSITE_LOG_DIR']) {
      raw.logging['dir'] = env['MODSITE_LOG_DIR'];
    }
    if (env['MODSITE_LOG_MAX_FILES']) {
      raw.logging['maxFiles'] = parseInt(env['MODSITE_LOG_MAX_FILES'], 10);
    }
    if (env['MODSITE_LOG_MAX_SIZE']) {
      raw.logging['maxSize'] = env['MODSITE_LOG_MAX_SIZE'];
    }

    // Build configuration
    if (env['MODSITE_OUTPUT_DIR']) {
      raw.build['outputDir'] = env['MODSITE_OUTPUT_DIR'];
    }
    if (env['MODSITE_ROOT']) {
      raw.build['root'] = env['MODSITE_ROOT'];
    }
    if (env['MODSITE_STDLIB']) {
      raw.build['includeStdlib'] = env['MODSITE_STDLIB'] === 'true';
    }
    if (env['MODSITE_CACHE']) {
      raw.build['cache'] = env['MODSITE_CACHE'] === 'true';
    }

    // Render configuration
    if (env['MODSITE_MATH']) {
      raw.render['math'] = env['MODSITE_MATH'] === 'true';
    }
    if (env['MODSITE_MERMAID']) {
      raw.render['mermaid'] = env['MODSITE_MERMAID'] === 'true';
    }
    if (env['MODSITE_SEARCH']) {
      raw.render['search'] = env['MODSITE_SEARCH'] === 'true';
    }
    if (env['MODSITE_DOCFORMAT']) {
      raw.render['docformat'] = env['MODSITE_DOCFORMAT'];
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(raw: RawConfig): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Configuration validation failed: ${issues}`, {
        issues: result.error.issues,
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
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
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
export type { Config, DocFormat, LogFormat, LogLevel } from './schema.js';
export { DEFAULT_IGNORE, defaultConfig } from './defaults.js';
