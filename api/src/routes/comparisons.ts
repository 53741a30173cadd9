/**
 * Comparison Routes
 * @module routes/comparisons
 *
 * Endpoints:
 * - POST /api/v1/comparisons - Compare live state against a stored baseline
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { ErrorCodes } from '../errors/index.js';
import { OperationTask, isOperationError } from '../services/index.js';
import { createErrorResponse } from '../middleware/error-handler.js';
import { ErrorResponseSchema } from './schemas/common.js';
import {
  ComparisonRequestSchema,
  ComparisonResponseSchema,
  type ComparisonRequestBody,
} from './schemas/drift.js';

const comparisonRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  fastify.post<{ Body: ComparisonRequestBody }>(
    '/',
    {
      schema: {
        description: 'Compare every selected entity against a baseline',
        tags: ['Comparisons'],
        body: ComparisonRequestSchema,
        response: {
          200: ComparisonResponseSchema,
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
          500: ErrorResponseSchema,
          502: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { scope, operation, filename, method, global, filters } = request.body;
      request.log.info({ scope, operation, filename, method }, 'Comparison requested');

      const outcome = await fastify.driftService.coreDataOperation({
        scope,
        operation,
        task: OperationTask.COMPARE,
        filename,
        method,
        global,
        filters,
      });

      if (isOperationError(outcome)) {
        const body = createErrorResponse(outcome.code, outcome.error);
        return reply.status(body.statusCode).send(body);
      }
      if (!('results' in outcome)) {
        const body = createErrorResponse(ErrorCodes.INTERNAL_ERROR, 'Comparison returned no results');
        return reply.status(body.statusCode).send(body);
      }
      return reply.status(200).send({ results: outcome.results });
    }
  );
};

export default comparisonRoutes;
