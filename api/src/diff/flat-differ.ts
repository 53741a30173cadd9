/**
 * Flat Differ
 * @module diff/flat-differ
 *
 * Flattens snapshots into dotted leaf-path -> scalar mappings and compares
 * them key by key. Map keys contribute their name, sequence elements their
 * index; an empty container contributes no leaves.
 */

import {
  type Snapshot,
  type SnapshotMap,
  isContainer,
  isSnapshotMap,
  isSnapshotSequence,
  kindOf,
} from '../types/snapshot.js';
import { InvalidInputError } from '../errors/index.js';
import { type Result, ok, err } from '../utils/result.js';
import type { FlatChange, FlatComparison, FlatSnapshot } from './types.js';
import { FIELD_SEPARATOR } from './path-codec.js';

// ============================================================================
// Flattening
// ============================================================================

/**
 * Flatten a snapshot; a scalar root is stored under the empty key
 */
export function flatten(snapshot: Snapshot): FlatSnapshot {
  const flat: FlatSnapshot = new Map();
  flattenInto(snapshot, '', flat);
  return flat;
}

function flattenInto(value: Snapshot, parentKey: string, flat: FlatSnapshot): void {
  if (isSnapshotMap(value)) {
    for (const [key, child] of Object.entries(value)) {
      flattenInto(child, childKey(parentKey, key), flat);
    }
  } else if (isSnapshotSequence(value)) {
    value.forEach((child, index) => {
      flattenInto(child, childKey(parentKey, String(index)), flat);
    });
  } else {
    flat.set(parentKey, value);
  }
}

function childKey(parentKey: string, segment: string): string {
  return parentKey ? `${parentKey}${FIELD_SEPARATOR}${segment}` : segment;
}

// ============================================================================
// Unflattening
// ============================================================================

interface DraftNode {
  value: Snapshot;
  children: Map<string, DraftNode>;
}

const INDEX_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * Rebuild a tree from flattened paths. A node whose keys are exactly
 * 0..n-1 becomes a sequence.
 *
 * The dotted encoding records no container kinds, so `flatten` followed
 * by `unflatten` reproduces the input only when no map is keyed exactly
 * '0'..'n-1', no key contains FIELD_SEPARATOR and no container is empty.
 * `{ '0': 'x' }` comes back as `['x']`.
 */
export function unflatten(flat: FlatSnapshot): Snapshot {
  if (flat.size === 1 && flat.has('')) {
    return flat.get('') ?? null;
  }

  const root: DraftNode = { value: null, children: new Map() };

  for (const [key, value] of flat) {
    let node = root;
    for (const segment of key.split(FIELD_SEPARATOR)) {
      let child = node.children.get(segment);
      if (!child) {
        child = { value: null, children: new Map() };
        node.children.set(segment, child);
      }
      node = child;
    }
    node.value = value;
  }

  return materialize(root);
}

function materialize(node: DraftNode): Snapshot {
  if (node.children.size === 0) {
    return node.value;
  }

  const keys = [...node.children.keys()];
  const isSequence =
    keys.every((key) => INDEX_PATTERN.test(key)) &&
    keys.map(Number).sort((a, b) => a - b).every((index, position) => index === position);

  if (isSequence) {
    return keys
      .map((key) => ({ index: Number(key), child: node.children.get(key) }))
      .sort((a, b) => a.index - b.index)
      .map(({ child }) => (child ? materialize(child) : null));
  }

  const map: SnapshotMap = {};
  for (const [key, child] of node.children) {
    map[key] = materialize(child);
  }
  return map;
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Compare two snapshots over the sorted union of their flattened keys.
 * Presence decides additions and removals; the missing side is null.
 */
export function compareFlat(
  baseline: Snapshot,
  current: Snapshot
): Result<FlatComparison, InvalidInputError> {
  if (!isContainer(baseline) || !isContainer(current)) {
    return err(
      new InvalidInputError('Flat comparison requires map or sequence roots', {
        details: { baselineKind: kindOf(baseline), currentKind: kindOf(current) },
      })
    );
  }

  return ok(compareFlattened(flatten(baseline), flatten(current)));
}

export function compareFlattened(baseline: FlatSnapshot, current: FlatSnapshot): FlatComparison {
  const keys = [...new Set([...baseline.keys(), ...current.keys()])].sort();
  const detailedChanges: FlatChange[] = [];

  for (const key of keys) {
    const inBaseline = baseline.has(key);
    const inCurrent = current.has(key);
    const referenceValue = baseline.get(key) ?? null;
    const currentValue = current.get(key) ?? null;

    if (inBaseline && inCurrent) {
      if (referenceValue !== currentValue) {
        detailedChanges.push({
          key,
          status: 'changed',
          reference_value: referenceValue,
          current_value: currentValue,
        });
      }
    } else if (inCurrent) {
      detailedChanges.push({ key, status: 'added', reference_value: null, current_value: currentValue });
    } else {
      detailedChanges.push({ key, status: 'removed', reference_value: referenceValue, current_value: null });
    }
  }

  return {
    has_changes: detailedChanges.length > 0,
    detailed_changes: detailedChanges,
  };
}
