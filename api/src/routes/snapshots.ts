/**
 * Snapshot Routes
 * @module routes/snapshots
 *
 * Endpoints:
 * - GET /api/v1/snapshots/:scope/:operation - List stored baselines
 * - POST /api/v1/snapshots/:scope/:operation - Fetch and store a baseline
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { ErrorCodes } from '../errors/index.js';
import { isErr } from '../utils/result.js';
import { OperationTask, isOperationError } from '../services/index.js';
import { createErrorResponse } from '../middleware/error-handler.js';
import { ErrorResponseSchema, ScopeOperationParamsSchema, type ScopeOperationParams } from './schemas/common.js';
import {
  SnapshotListResponseSchema,
  StoreSnapshotBodySchema,
  StoreSnapshotResponseSchema,
  type StoreSnapshotBody,
} from './schemas/drift.js';

const snapshotRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  /**
   * GET /api/v1/snapshots/:scope/:operation
   */
  fastify.get<{ Params: ScopeOperationParams }>(
    '/:scope/:operation',
    {
      schema: {
        description: 'List stored baseline files for an operation',
        tags: ['Snapshots'],
        params: ScopeOperationParamsSchema,
        response: {
          200: SnapshotListResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request) => {
      const { scope, operation } = request.params;
      const files = await fastify.driftService.listSnapshots(scope, operation);
      if (isErr(files)) {
        throw files.error;
      }
      return { files: files.value };
    }
  );

  /**
   * POST /api/v1/snapshots/:scope/:operation
   */
  fastify.post<{ Params: ScopeOperationParams; Body: StoreSnapshotBody }>(
    '/:scope/:operation',
    {
      schema: {
        description: 'Fetch live configuration and store it as a baseline',
        tags: ['Snapshots'],
        params: ScopeOperationParamsSchema,
        body: StoreSnapshotBodySchema,
        response: {
          201: StoreSnapshotResponseSchema,
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
          500: ErrorResponseSchema,
          502: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { scope, operation } = request.params;
      const outcome = await fastify.driftService.coreDataOperation({
        scope,
        operation,
        task: OperationTask.STORE,
        identifier: request.body?.identifier,
      });

      if (isOperationError(outcome)) {
        const body = createErrorResponse(outcome.code, outcome.error);
        return reply.status(body.statusCode).send(body);
      }
      if (!('success' in outcome)) {
        const body = createErrorResponse(ErrorCodes.INTERNAL_ERROR, 'Store returned no file name');
        return reply.status(body.statusCode).send(body);
      }
      return reply.status(201).send(outcome);
    }
  );
};

export default snapshotRoutes;
