/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the drift comparison service.
 * Adds domain-specific methods for comparison passes, entities and snapshots.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  module?: string;
  scope?: string;
  operation?: string;
  entity?: string;
  method?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific log methods layered on top of a Pino logger
 */
export interface DriftLogMethods {
  withContext(context: LogContext): StructuredLogger;

  // Comparison pass lifecycle
  comparisonStarted(scope: string, operation: string, method: string, entityCount: number): void;
  comparisonCompleted(scope: string, operation: string, comparedCount: number, duration: number): void;

  // Per-entity outcomes
  entityCompared(entityName: string, counts: Readonly<Record<string, number>>): void;
  entitySkipped(entityName: string, reason: string): void;
  entityFailed(entityName: string, error: Error): void;

  // Snapshot storage
  snapshotStored(location: string, bytes: number): void;
  snapshotLoaded(location: string): void;

  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

export type StructuredLogger = Logger & DriftLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true',
    redact: [
      'apiKey',
      'api_key',
      'authorization',
      'token',
      'headers.authorization',
      'dashboard.apiKey',
    ],
    service: process.env.SERVICE_NAME || 'config-drift',
    version: process.env.SERVICE_VERSION || '0.1.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

// ============================================================================
// Redaction Utilities
// ============================================================================

function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

function errorCodeOf(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DriftLogMethods = {
    withContext(context: LogContext): StructuredLogger {
      return extendWithDomainMethods(logger.child(context));
    },

    comparisonStarted(scope, operation, method, entityCount) {
      logger.info(
        {
          event: 'comparison_started',
          scope,
          operation,
          method,
          entityCount,
        },
        `Comparison started for ${scope}/${operation} using ${method}`
      );
    },

    comparisonCompleted(scope, operation, comparedCount, duration) {
      logger.info(
        {
          event: 'comparison_completed',
          scope,
          operation,
          comparedCount,
          durationMs: duration,
        },
        `Comparison completed for ${scope}/${operation}: ${comparedCount} entities in ${duration}ms`
      );
    },

    entityCompared(entityName, counts) {
      logger.debug(
        {
          event: 'entity_compared',
          entity: entityName,
          ...counts,
        },
        `Compared ${entityName}`
      );
    },

    entitySkipped(entityName, reason) {
      logger.warn(
        {
          event: 'entity_skipped',
          entity: entityName,
          reason,
        },
        `Skipping ${entityName}: ${reason}`
      );
    },

    entityFailed(entityName, error) {
      logger.error(
        {
          event: 'entity_failed',
          entity: entityName,
          err: error,
          errorCode: errorCodeOf(error),
        },
        `Comparison failed for ${entityName}: ${error.message}`
      );
    },

    snapshotStored(location, bytes) {
      logger.info(
        {
          event: 'snapshot_stored',
          location,
          bytes,
        },
        `Snapshot saved to ${location}`
      );
    },

    snapshotLoaded(location) {
      logger.debug(
        {
          event: 'snapshot_loaded',
          location,
        },
        `Snapshot loaded from ${location}`
      );
    },

    performanceMetric(operation, duration, metadata) {
      logger.debug(
        {
          event: 'performance_metric',
          operation,
          durationMs: duration,
          ...metadata,
        },
        `${operation}: ${duration}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config: LoggerConfig = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('config-drift');
  }
  return rootLogger;
}

/**
 * Initializes the root logger with explicit configuration
 */
export function initLogger(
  overrides: Partial<LoggerConfig> = {},
  context?: LogContext
): StructuredLogger {
  rootLogger = createLogger('config-drift', context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().withContext({ module: moduleName });
}
