/**
 * Scope Routes
 * @module routes/scopes
 *
 * Endpoints:
 * - GET /api/v1/scopes - List scopes and their operations
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { ScopeListResponseSchema, type ScopeListResponse } from './schemas/drift.js';

const scopeRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  fastify.get<{ Reply: ScopeListResponse }>(
    '/',
    {
      schema: {
        description: 'List scopes and the operations available in each',
        tags: ['Scopes'],
        response: {
          200: ScopeListResponseSchema,
        },
      },
    },
    async () => {
      const scopes = fastify.operationRegistry.listScopes().map((scope) => ({
        scope: scope.scope,
        folder: scope.folder,
        operations: scope.operations.map((operation) => ({
          name: operation.name,
          groupingKey: operation.groupingKey ?? null,
          productType: operation.productType ?? null,
        })),
      }));
      return { scopes };
    }
  );
};

export default scopeRoutes;
