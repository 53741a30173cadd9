/**
 * Global Error Handler Middleware
 * @module middleware/error-handler
 *
 * Fastify error handler mapping domain errors to HTTP responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { type BaseError, ErrorCodes, getHttpStatusForCode, isBaseError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import type { ErrorResponse } from '../routes/schemas/common.js';

// ============================================================================
// Error Formatting
// ============================================================================

const HTTP_ERROR_NAMES: Readonly<Record<number, string>> = {
  400: 'Bad Request',
  404: 'Not Found',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

/**
 * Get HTTP error name from status code
 */
export function getHttpErrorName(statusCode: number): string {
  return HTTP_ERROR_NAMES[statusCode] ?? 'Error';
}

/**
 * Build the error body for a domain error code and message
 */
export function createErrorResponse(code: string, message: string, details?: unknown): ErrorResponse {
  const statusCode = getHttpStatusForCode(code);
  return {
    statusCode,
    error: getHttpErrorName(statusCode),
    message,
    code,
    ...(details === undefined ? {} : { details }),
  };
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

function formatBaseError(error: BaseError): ErrorResponse {
  if (isProduction()) {
    // Unexpected failures keep their code but not their internals
    return createErrorResponse(error.code, error.isOperational ? error.message : 'An unexpected error occurred');
  }
  return createErrorResponse(error.code, error.message, error.toJSON().details);
}

/**
 * Format any error thrown while handling a request
 */
export function formatError(error: FastifyError | Error): ErrorResponse {
  if (isBaseError(error)) {
    return formatBaseError(error);
  }

  if ('validation' in error && error.validation) {
    return {
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      code: ErrorCodes.VALIDATION_ERROR,
      ...(isProduction() ? {} : { details: error.validation }),
    };
  }

  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: 'code' in error && typeof error.code === 'string' ? error.code : ErrorCodes.BAD_REQUEST,
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: isProduction() ? 'An unexpected error occurred' : error.message,
    code: ErrorCodes.INTERNAL_ERROR,
  };
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

export interface ErrorHandlerOptions {
  logger?: StructuredLogger;
}

async function errorHandlerPlugin(fastify: FastifyInstance, options: ErrorHandlerOptions): Promise<void> {
  const logger = options.logger ?? createModuleLogger('error-handler');

  fastify.setErrorHandler(async (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const formatted = formatError(error);
    const logContext = {
      err: error,
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: formatted.statusCode,
      code: formatted.code,
    };

    if (formatted.statusCode >= 500) {
      logger.error(logContext, 'Server error');
    } else {
      logger.warn(logContext, 'Client error');
    }

    return reply.status(formatted.statusCode).send(formatted);
  });

  fastify.setNotFoundHandler(async (request: FastifyRequest, reply: FastifyReply) => {
    logger.warn({ method: request.method, url: request.url, requestId: request.id }, 'Route not found');

    return reply.status(404).send({
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
      code: ErrorCodes.NOT_FOUND,
    });
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '4.x',
});
