/**
 * Drift API Schemas
 * @module routes/schemas/drift
 *
 * TypeBox schemas for scopes, snapshots and comparisons.
 */

import { Type, type Static } from '@sinclair/typebox';

// ============================================================================
// Health
// ============================================================================

export const HealthResponseSchema = Type.Object({
  status: Type.Literal('ok'),
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.String(),
  uptime: Type.Number({ description: 'Uptime in seconds' }),
});

export type HealthResponse = Static<typeof HealthResponseSchema>;

// ============================================================================
// Scopes
// ============================================================================

export const OperationSummarySchema = Type.Object({
  name: Type.String(),
  groupingKey: Type.Union([Type.String(), Type.Null()]),
  productType: Type.Union([Type.String(), Type.Null()]),
});

export const ScopeListResponseSchema = Type.Object({
  scopes: Type.Array(
    Type.Object({
      scope: Type.String(),
      folder: Type.String(),
      operations: Type.Array(OperationSummarySchema),
    })
  ),
});

export type ScopeListResponse = Static<typeof ScopeListResponseSchema>;

// ============================================================================
// Snapshots
// ============================================================================

export const SnapshotListResponseSchema = Type.Object({
  files: Type.Array(Type.String()),
});

export type SnapshotListResponse = Static<typeof SnapshotListResponseSchema>;

/**
 * The body may be omitted when the scope has a default identifier
 */
export const StoreSnapshotBodySchema = Type.Union([
  Type.Object({
    identifier: Type.Optional(Type.String({ minLength: 1, description: 'Organization id, network id or device serial' })),
  }),
  Type.Null(),
]);

export type StoreSnapshotBody = Static<typeof StoreSnapshotBodySchema>;

export const StoreSnapshotResponseSchema = Type.Object({
  success: Type.Literal(true),
  filename: Type.String(),
});

export type StoreSnapshotResponse = Static<typeof StoreSnapshotResponseSchema>;

// ============================================================================
// Comparisons
// ============================================================================

const StringList = Type.Array(Type.String({ minLength: 1 }));

export const ComparisonFiltersSchema = Type.Object(
  {
    organizationIds: Type.Optional(StringList),
    networkTags: Type.Optional(StringList),
    deviceTags: Type.Optional(StringList),
    deviceModels: Type.Optional(StringList),
    productTypes: Type.Optional(StringList),
  },
  { additionalProperties: false }
);

export const ComparisonRequestSchema = Type.Object({
  scope: Type.String(),
  operation: Type.String(),
  filename: Type.String({ minLength: 1, description: 'Baseline file to compare against' }),
  method: Type.Optional(Type.String({ description: 'structural or flat' })),
  global: Type.Optional(Type.Boolean({ description: 'Include every accessible organization' })),
  filters: Type.Optional(ComparisonFiltersSchema),
});

export type ComparisonRequestBody = Static<typeof ComparisonRequestSchema>;

export const ComparisonResponseSchema = Type.Object({
  results: Type.Record(Type.String(), Type.Unknown()),
});

export type ComparisonResponse = Static<typeof ComparisonResponseSchema>;
