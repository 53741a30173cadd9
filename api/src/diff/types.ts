/**
 * Drift Diff Type Definitions
 * @module diff/types
 *
 * Types shared by both comparison engines. Field names are snake_case
 * because summaries are returned over the API unchanged.
 */

import type { Snapshot } from '../types/snapshot.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Placeholder for the missing side of a whole added or removed item
 */
export const NOT_AVAILABLE = 'N/A';

/**
 * Synthetic item id for flat changes that cannot be attributed to an item
 */
export const GLOBAL_ITEM_ID = 'Global Configuration';

/**
 * Field name used when a non-map root is replaced wholesale
 */
export const ROOT_REPLACEMENT_FIELD = 'type_or_full_value_change';

// ============================================================================
// Structural Diff Events
// ============================================================================

export const DiffEventKind = {
  VALUE_CHANGED: 'value_changed',
  TYPE_CHANGED: 'type_changed',
  ITEM_ADDED: 'item_added',
  ITEM_REMOVED: 'item_removed',
  ITERABLE_ITEM_ADDED: 'iterable_item_added',
  ITERABLE_ITEM_REMOVED: 'iterable_item_removed',
  SET_ADDED: 'set_added',
  SET_REMOVED: 'set_removed',
} as const;

export type DiffEventKind = typeof DiffEventKind[keyof typeof DiffEventKind];

export type PathSegment = string | number;

/**
 * One difference found by the structural differ.
 * `old_value` is absent for additions, `new_value` for removals.
 */
export interface DiffEvent {
  readonly kind: DiffEventKind;
  readonly path: readonly PathSegment[];
  readonly old_value?: Snapshot;
  readonly new_value?: Snapshot;
}

export type ItemId = string | number;

// ============================================================================
// Classified Changes
// ============================================================================

export type ChangeStatus = 'added' | 'removed' | 'changed';

/**
 * A single field difference; `field: null` means the whole item
 */
export interface FieldChange {
  field: string | null;
  reference_value: Snapshot;
  current_value: Snapshot;
}

export interface EntityChange {
  item_id: ItemId;
  status: ChangeStatus;
  changes: FieldChange[];
}

/**
 * A change that could not be attributed to an item
 */
export interface OtherChange {
  item_id: ItemId | null;
  field: string;
  reference_value: Snapshot;
  current_value: Snapshot;
}

export type SummaryCounts = {
  added: number;
  removed: number;
  changed: number;
  other: number;
};

export interface ComparisonSummary {
  relevant_changes: EntityChange[];
  other_changes: OtherChange[];
  /** Engine-specific raw output: DiffEvent[] or FlatComparison */
  raw_diff: readonly DiffEvent[] | FlatComparison;
  summary_counts: SummaryCounts;
  has_diffs: boolean;
}

// ============================================================================
// Flat Comparison
// ============================================================================

/**
 * Leaf-path to scalar mapping, in traversal order
 */
export type FlatSnapshot = Map<string, Snapshot>;

export interface FlatChange {
  key: string;
  status: ChangeStatus;
  reference_value: Snapshot;
  current_value: Snapshot;
}

export interface FlatComparison {
  has_changes: boolean;
  detailed_changes: FlatChange[];
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Status precedence shared by both engines: removed > added > changed
 */
const STATUS_RANK: Record<ChangeStatus, number> = {
  changed: 0,
  added: 1,
  removed: 2,
};

export function mergeStatus(current: ChangeStatus, incoming: ChangeStatus): ChangeStatus {
  return STATUS_RANK[incoming] > STATUS_RANK[current] ? incoming : current;
}

/**
 * Count classified items by status
 */
export function countChanges(
  relevant: readonly EntityChange[],
  other: readonly OtherChange[]
): SummaryCounts {
  const counts: SummaryCounts = { added: 0, removed: 0, changed: 0, other: other.length };
  for (const item of relevant) {
    counts[item.status] += 1;
  }
  return counts;
}

/**
 * Summary for two identical (or unusable) inputs
 */
export function createEmptySummary(rawDiff: readonly DiffEvent[] | FlatComparison = []): ComparisonSummary {
  return {
    relevant_changes: [],
    other_changes: [],
    raw_diff: rawDiff,
    summary_counts: { added: 0, removed: 0, changed: 0, other: 0 },
    has_diffs: false,
  };
}
