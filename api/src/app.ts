/**
 * Fastify Application Factory
 * @module app
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';

import type { AppConfig } from './config/index.js';
import { createDashboardClient } from './adapters/dashboard/index.js';
import { createDefaultEngineRegistry } from './diff/index.js';
import { createSnapshotStore } from './repositories/snapshot-store.js';
import {
  type IDriftService,
  type IOperationRegistry,
  createComparisonOrchestrator,
  createDriftService,
  createEntitySource,
  createOperationFetchers,
  createOperationRegistry,
} from './services/index.js';
import { createModuleLogger } from './logging/index.js';
import errorHandler from './middleware/error-handler.js';
import routes from './routes/index.js';

/**
 * Services the routes depend on
 */
export interface AppServices {
  driftService: IDriftService;
  operationRegistry: IOperationRegistry;
}

/**
 * Application configuration options
 */
export interface AppOptions {
  services: AppServices;

  /**
   * Fastify logger configuration
   */
  logger?: boolean | { level: string };

  /**
   * Enable CORS
   * @default true
   */
  cors?: boolean;

  corsOrigin?: string;

  /**
   * Enable Helmet security headers
   * @default true
   */
  helmet?: boolean;

  /** Maximum request body size in bytes */
  bodyLimit?: number;
}

/**
 * Wire the dashboard client, store, engines and services from configuration
 */
export function createAppServices(config: AppConfig, fetchFn?: typeof fetch): AppServices {
  const context = { organizationId: config.dashboard.organizationId };
  const client = createDashboardClient({
    apiKey: config.dashboard.apiKey ?? '',
    baseUrl: config.dashboard.baseUrl,
    timeoutMs: config.dashboard.timeoutMs,
    maxRetries: config.dashboard.maxRetries,
    pageSize: config.dashboard.pageSize,
    fetch: fetchFn,
  });
  const operationRegistry = createOperationRegistry();

  const driftService = createDriftService({
    registry: operationRegistry,
    store: createSnapshotStore(config.storage.snapshotDir),
    entities: createEntitySource(client, context),
    fetchers: createOperationFetchers(client, context),
    engines: createDefaultEngineRegistry(),
    orchestrator: createComparisonOrchestrator(),
    context,
    defaultMethod: config.comparison.defaultMethod,
  });

  return { driftService, operationRegistry };
}

/**
 * Create and configure Fastify application instance
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const logger = createModuleLogger('app-factory');

  const app = Fastify({
    logger: options.logger ?? { level: process.env.LOG_LEVEL || 'info' },
    bodyLimit: options.bodyLimit,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  app.decorate('driftService', options.services.driftService);
  app.decorate('operationRegistry', options.services.operationRegistry);

  if (options.cors ?? true) {
    await app.register(cors, {
      origin: options.corsOrigin ?? true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
    });
    logger.debug('CORS plugin registered');
  }

  if (options.helmet ?? true) {
    await app.register(helmet, {
      contentSecurityPolicy: process.env.NODE_ENV === 'production',
      crossOriginEmbedderPolicy: false,
    });
    logger.debug('Helmet plugin registered');
  }

  // Error handler must be registered before routes
  await app.register(errorHandler);

  await app.register(routes);
  logger.debug('Routes registered');

  app.addHook('onClose', async () => {
    logger.info('Application closing...');
  });

  return app;
}

/**
 * Create application for testing (disabled logging)
 */
export async function buildTestApp(services: AppServices): Promise<FastifyInstance> {
  return buildApp({ services, logger: false, helmet: false });
}

export default buildApp;

// ============================================================================
// Type Declarations
// ============================================================================

declare module 'fastify' {
  interface FastifyInstance {
    driftService: IDriftService;
    operationRegistry: IOperationRegistry;
  }
}
