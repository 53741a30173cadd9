/**
 * Health Check Routes
 * @module routes/health
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { HealthResponseSchema, type HealthResponse } from './schemas/drift.js';

/**
 * Application start time for uptime calculation
 */
const startTime = Date.now();

/**
 * Get application version from the environment
 */
function getVersion(): string {
  return process.env.APP_VERSION || process.env.npm_package_version || '0.1.0';
}

/**
 * Calculate uptime in seconds
 */
function getUptime(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

const healthRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  /**
   * GET /health
   */
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    {
      schema: {
        tags: ['Health'],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      return reply.status(200).send({
        status: 'ok',
        timestamp: new Date().toISOString(),
        version: getVersion(),
        uptime: getUptime(),
      });
    }
  );
};

export default healthRoutes;
