/**
 * Common API Schemas
 * @module routes/schemas/common
 *
 * Shared TypeBox schemas for API request/response validation.
 */

import { Type, type Static } from '@sinclair/typebox';

// ============================================================================
// Error Schemas
// ============================================================================

/**
 * API Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number({ description: 'HTTP status code' }),
  error: Type.String({ description: 'Error type' }),
  message: Type.String({ description: 'Human-readable error message' }),
  code: Type.Optional(Type.String({ description: 'Error code for programmatic handling' })),
  details: Type.Optional(Type.Unknown({ description: 'Additional error details' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

// ============================================================================
// Common Parameter Schemas
// ============================================================================

/**
 * Scope and operation path parameters
 */
export const ScopeOperationParamsSchema = Type.Object({
  scope: Type.String({ description: 'Scope name, e.g. network_level' }),
  operation: Type.String({ description: 'Operation name within the scope' }),
});

export type ScopeOperationParams = Static<typeof ScopeOperationParamsSchema>;
