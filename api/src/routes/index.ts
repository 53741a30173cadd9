/**
 * Route Registration
 * @module routes
 *
 * Registers all route plugins with their prefixes.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import healthRoutes from './health.js';
import scopeRoutes from './scopes.js';
import snapshotRoutes from './snapshots.js';
import comparisonRoutes from './comparisons.js';

const routes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  // Health check at root
  await fastify.register(healthRoutes);

  await fastify.register(scopeRoutes, { prefix: '/api/v1/scopes' });
  await fastify.register(snapshotRoutes, { prefix: '/api/v1/snapshots' });
  await fastify.register(comparisonRoutes, { prefix: '/api/v1/comparisons' });
};

export default routes;
