/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating all application configuration.
 * Environment values arrive as strings, so numeric and boolean
 * fields accept their string forms.
 */

import { z } from 'zod';

// ============================================================================
// Shared Field Types
// ============================================================================

/**
 * Boolean accepting 'true' / 'false' strings from env files
 */
const BooleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

// ============================================================================
// Environment Enum
// ============================================================================

export const Environment = z.enum(['development', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Server Configuration
// ============================================================================

export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** Port to listen on */
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  /** Allowed CORS origin */
  corsOrigin: z.string().default('*'),
  /** Maximum body size in bytes */
  bodyLimit: z.coerce.number().int().min(1024).default(10 * 1024 * 1024),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

export const LoggingConfigSchema = z.object({
  level: LogLevel.default('info'),
  /** Use the pino-pretty transport */
  pretty: BooleanFlag.default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Dashboard API Configuration
// ============================================================================

export const DashboardConfigSchema = z.object({
  /** API key sent as a bearer token */
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default('https://api.meraki.com/api/v1'),
  /** Organization used when a request names none */
  organizationId: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().min(100).default(30000),
  /** Retries on HTTP 429 before giving up */
  maxRetries: z.coerce.number().int().min(0).max(10).default(3),
  /** Page size requested from paginated endpoints */
  pageSize: z.coerce.number().int().min(3).max(1000).default(1000),
});

export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;

// ============================================================================
// Storage Configuration
// ============================================================================

export const StorageConfigSchema = z.object({
  /** Root directory for saved snapshots */
  snapshotDir: z.string().min(1).default('saved_configs'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// ============================================================================
// Comparison Configuration
// ============================================================================

export const ComparisonConfigSchema = z.object({
  /** Engine used when a request names none */
  defaultMethod: z.string().min(1).default('structural'),
});

export type ComparisonConfig = z.infer<typeof ComparisonConfigSchema>;

// ============================================================================
// Complete Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  version: z.string().default('0.1.0'),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  dashboard: DashboardConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  comparison: ComparisonConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Unvalidated configuration fragment produced by a config source
 */
export type RawConfig = { [key: string]: unknown };
