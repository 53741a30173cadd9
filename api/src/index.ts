/**
 * Configuration Drift API
 * @module @config-drift/api
 *
 * Main entry point for the drift comparison service.
 *
 * @example
 * ```typescript
 * import { createDefaultEngineRegistry, isOk } from '@config-drift/api';
 *
 * const engine = createDefaultEngineRegistry().resolve('structural');
 * if (isOk(engine)) {
 *   const summary = engine.value.compare(baseline, current, 'name');
 * }
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export * from './types/snapshot.js';
export * from './types/entities.js';

// ============================================================================
// Comparison Engine
// ============================================================================

export * from './diff/index.js';

// ============================================================================
// Services and Storage
// ============================================================================

export * from './services/index.js';
export {
  FileSnapshotStore,
  createSnapshotStore,
  timestampedFileName,
} from './repositories/snapshot-store.js';
export type { ISnapshotStore, SnapshotStoreFailure, SnapshotStoreOptions } from './repositories/snapshot-store.js';
export * from './adapters/dashboard/index.js';

// ============================================================================
// Infrastructure
// ============================================================================

export * from './errors/index.js';
export * from './utils/index.js';
export {
  createLogger,
  createModuleLogger,
  getLogger,
  initLogger,
  resetLogger,
} from './logging/index.js';
export type { LogContext, LoggerConfig, StructuredLogger } from './logging/index.js';
export { initConfig, getConfig, resetConfig } from './config/index.js';
export type { AppConfig } from './config/index.js';

// ============================================================================
// HTTP
// ============================================================================

export * from './routes/schemas/index.js';
export { buildApp, buildTestApp, createAppServices } from './app.js';
export type { AppOptions, AppServices } from './app.js';
