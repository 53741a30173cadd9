/**
 * Configuration Module
 * @module config
 *
 * Singleton access to the validated application configuration.
 *
 * @example
 * ```typescript
 * const config = await initConfig();
 * console.log(config.storage.snapshotDir);
 * ```
 */

import { createConfigLoader, type ConfigLoaderOptions } from './loader.js';
import type { AppConfig } from './schema.js';

let configInstance: AppConfig | null = null;

/**
 * Initialize configuration system.
 * Called once at startup; later calls return the loaded configuration.
 */
export async function initConfig(options: ConfigLoaderOptions = {}): Promise<AppConfig> {
  if (configInstance) {
    return configInstance;
  }
  configInstance = await createConfigLoader(options).load();
  return configInstance;
}

/**
 * Get the current configuration.
 * Throws if configuration has not been initialized.
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    throw new Error('Configuration not initialized. Call initConfig() first.');
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export {
  ConfigLoader,
  ConfigValidationError,
  EnvironmentConfigSource,
  FileConfigSource,
  DotenvConfigSource,
  createConfigLoader,
  mapEnvironment,
} from './loader.js';
export type { ConfigLoaderOptions, ConfigSource } from './loader.js';

export {
  AppConfigSchema,
  ServerConfigSchema,
  LoggingConfigSchema,
  DashboardConfigSchema,
  StorageConfigSchema,
  ComparisonConfigSchema,
  Environment,
  LogLevel,
} from './schema.js';
export type {
  AppConfig,
  ServerConfig,
  LoggingConfig,
  DashboardConfig,
  StorageConfig,
  ComparisonConfig,
  RawConfig,
} from './schema.js';
