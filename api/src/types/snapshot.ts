/**
 * Snapshot Type Definitions
 * @module types/snapshot
 *
 * A snapshot is an immutable JSON-compatible value describing configuration
 * state at one point in time: a map, an ordered sequence, or a scalar.
 */

// ============================================================================
// Core Types
// ============================================================================

export type SnapshotScalar = string | number | boolean | null;

export interface SnapshotMap {
  [key: string]: Snapshot;
}

export type SnapshotSequence = Snapshot[];

export type Snapshot = SnapshotScalar | SnapshotMap | SnapshotSequence;

/**
 * Kind of a snapshot value; two values of different kinds cannot be
 * compared field by field.
 */
export type SnapshotKind = 'map' | 'sequence' | 'string' | 'number' | 'boolean' | 'null';

// ============================================================================
// Type Guards
// ============================================================================

export function isSnapshotMap(value: Snapshot | undefined): value is SnapshotMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSnapshotSequence(value: Snapshot | undefined): value is SnapshotSequence {
  return Array.isArray(value);
}

/**
 * True for maps and sequences, the only valid comparison roots
 */
export function isContainer(value: Snapshot): value is SnapshotMap | SnapshotSequence {
  return typeof value === 'object' && value !== null;
}

/**
 * Validate that an arbitrary value (e.g. parsed JSON) is a snapshot
 */
export function isSnapshot(value: unknown): value is Snapshot {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isSnapshot);
      }
      return Object.values(value).every(isSnapshot);
    default:
      return false;
  }
}

export function kindOf(value: Snapshot): SnapshotKind {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'sequence';
  }
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'map';
  }
}

// ============================================================================
// Canonical Form
// ============================================================================

/**
 * Stable string form of a snapshot: map keys sorted, sequence elements
 * sorted by their own canonical form. Two snapshots share a canonical
 * form iff they are equal ignoring sequence order.
 */
export function canonicalize(value: Snapshot): string {
  if (isSnapshotSequence(value)) {
    return `[${value.map(canonicalize).sort().join(',')}]`;
  }
  if (isSnapshotMap(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalize(value[key] ?? null)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}
