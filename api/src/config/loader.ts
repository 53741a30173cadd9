/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation and caching.
 * Sources are merged lowest priority first, so higher priorities override.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { type AppConfig, AppConfigSchema, type RawConfig } from './schema.js';
import { createModuleLogger } from '../logging/index.js';

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 */
export interface ConfigSource {
  /** Unique name for the source */
  name: string;
  /** Priority level (higher = overrides lower) */
  priority: number;
  load(): Promise<RawConfig>;
  isAvailable(): boolean;
}

type EnvLike = Readonly<Record<string, string | undefined>>;

/**
 * Map environment-style variables onto the configuration structure
 */
export function mapEnvironment(env: EnvLike): RawConfig {
  return filterUndefined({
    env: env.NODE_ENV,
    version: env.APP_VERSION,
    server: {
      host: env.HOST,
      port: env.PORT,
      corsOrigin: env.CORS_ORIGIN,
      bodyLimit: env.BODY_LIMIT,
    },
    logging: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY,
    },
    dashboard: {
      apiKey: env.MK_CSM_KEY,
      baseUrl: env.DASHBOARD_BASE_URL,
      organizationId: env.MK_MAIN_ORG,
      timeoutMs: env.DASHBOARD_TIMEOUT_MS,
      maxRetries: env.DASHBOARD_MAX_RETRIES,
      pageSize: env.DASHBOARD_PAGE_SIZE,
    },
    storage: {
      snapshotDir: env.SNAPSHOT_DIR,
    },
    comparison: {
      defaultMethod: env.COMPARISON_METHOD,
    },
  });
}

function isPlainObject(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively remove undefined values and empty sections
 */
function filterUndefined(obj: RawConfig): RawConfig {
  const result: RawConfig = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isPlainObject(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority: number;

  constructor(
    private readonly env: EnvLike = process.env,
    priority = 100
  ) {
    this.priority = priority;
  }

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    return mapEnvironment(this.env);
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 25
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<RawConfig> {
    const content = readFileSync(this.filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isPlainObject(parsed)) {
      throw new Error(`Configuration file ${this.filePath} must contain a JSON object`);
    }
    return parsed;
  }
}

// ============================================================================
// Dotenv Configuration Source
// ============================================================================

/**
 * .env file configuration source.
 * Uses the same variable names as the environment; process.env is left untouched.
 */
export class DotenvConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;
  private readonly fullPath: string;

  constructor(envFile = '.env', priority = 50) {
    this.name = `dotenv:${envFile}`;
    this.priority = priority;
    this.fullPath = resolve(process.cwd(), envFile);
  }

  isAvailable(): boolean {
    return existsSync(this.fullPath);
  }

  async load(): Promise<RawConfig> {
    return mapEnvironment(parseDotenv(readFileSync(this.fullPath)));
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Throw on validation errors (default: true) */
  throwOnError?: boolean;
  /** Custom config sources; defaults to .env, config/config.json and the environment */
  sources?: ConfigSource[];
}

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  public readonly errors: z.ZodError;
  public readonly fields: string[];

  constructor(zodError: z.ZodError) {
    const formattedErrors = zodError.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    }));

    super(`Configuration validation failed:\n${
      formattedErrors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    }`);

    this.name = 'ConfigValidationError';
    this.errors = zodError;
    this.fields = formattedErrors.map((e) => e.path);
  }
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private sources: ConfigSource[];
  private config: AppConfig | null = null;
  private readonly throwOnError: boolean;
  private readonly logger = createModuleLogger('config-loader');

  constructor(options: ConfigLoaderOptions = {}) {
    this.throwOnError = options.throwOnError ?? true;
    this.sources = options.sources ? [...options.sources] : ConfigLoader.defaultSources();
    this.sources.sort((a, b) => a.priority - b.priority);
  }

  private static defaultSources(): ConfigSource[] {
    return [
      new FileConfigSource(join(process.cwd(), 'config', 'config.json')),
      new DotenvConfigSource('.env'),
      new EnvironmentConfigSource(),
    ];
  }

  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    this.config = null;
    return this;
  }

  /**
   * Load and validate configuration from all sources
   */
  async load(): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    const merged: RawConfig = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        this.logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }

      try {
        deepMerge(merged, await source.load());
        this.logger.debug({ source: source.name }, 'Loaded config from source');
      } catch (error) {
        this.logger.error({ err: error, source: source.name }, 'Failed to load config from source');
        if (this.throwOnError) {
          throw error;
        }
      }
    }

    const result = AppConfigSchema.safeParse(merged);

    if (!result.success) {
      const validationError = new ConfigValidationError(result.error);
      this.logger.error({ fields: validationError.fields }, 'Configuration validation failed');
      if (this.throwOnError) {
        throw validationError;
      }
      this.config = AppConfigSchema.parse({});
      return this.config;
    }

    this.config = result.data;
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }
}

/**
 * Deep merge source into target, with source overwriting target
 */
function deepMerge(target: RawConfig, source: RawConfig): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      deepMerge(targetValue, sourceValue);
    } else if (isPlainObject(sourceValue)) {
      const copy: RawConfig = {};
      deepMerge(copy, sourceValue);
      target[key] = copy;
    } else {
      target[key] = sourceValue;
    }
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

export function createConfigLoader(options?: ConfigLoaderOptions): ConfigLoader {
  return new ConfigLoader(options);
}
