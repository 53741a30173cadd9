/**
 * Structural Differ
 * @module diff/structural-differ
 *
 * Order-insensitive tree diff between two snapshots. Maps are compared
 * key by key. Sequences are compared without positional ordering: by
 * grouping-key identity when every element carries the key, otherwise
 * as multisets of deep-equal elements.
 *
 * @example
 * ```typescript
 * const differ = createStructuralDiffer();
 * const result = differ.diff(
 *   [{ id: 1, val: 'a' }],
 *   [{ id: 1, val: 'b' }],
 *   'id'
 * );
 * // ok([{ kind: 'value_changed', path: [1, 'val'], old_value: 'a', new_value: 'b' }])
 * ```
 */

import {
  type Snapshot,
  type SnapshotMap,
  type SnapshotSequence,
  canonicalize,
  isContainer,
  isSnapshotMap,
  isSnapshotSequence,
  kindOf,
} from '../types/snapshot.js';
import { InvalidInputError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { type Result, ok, err } from '../utils/result.js';
import { type DiffEvent, DiffEventKind, type PathSegment } from './types.js';
import { joinPath } from './path-codec.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface IStructuralDiffer {
  /**
   * Compute the differences between two snapshots.
   * Fails with InvalidInputError when either root is not a map or sequence.
   */
  diff(
    baseline: Snapshot,
    current: Snapshot,
    groupingKey?: string
  ): Result<DiffEvent[], InvalidInputError>;
}

export interface StructuralDifferOptions {
  readonly logger?: StructuredLogger;
}

/**
 * Elements of one sequence indexed by their grouping-key value
 */
interface KeyedElements {
  /** canonical key value -> element */
  readonly elements: Map<string, { id: PathSegment; element: SnapshotMap }>;
}

// ============================================================================
// Implementation
// ============================================================================

export class StructuralDiffer implements IStructuralDiffer {
  private readonly logger: StructuredLogger;

  constructor(options: StructuralDifferOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('structural-differ');
  }

  diff(
    baseline: Snapshot,
    current: Snapshot,
    groupingKey?: string
  ): Result<DiffEvent[], InvalidInputError> {
    if (!isContainer(baseline) || !isContainer(current)) {
      return err(
        new InvalidInputError('Snapshot roots must be maps or sequences', {
          details: { baselineKind: kindOf(baseline), currentKind: kindOf(current) },
        })
      );
    }

    const events: DiffEvent[] = [];
    this.compareValues(baseline, current, [], groupingKey, events);
    return ok(events);
  }

  private compareValues(
    oldValue: Snapshot,
    newValue: Snapshot,
    path: PathSegment[],
    groupingKey: string | undefined,
    events: DiffEvent[]
  ): void {
    if (oldValue === newValue) {
      return;
    }

    if (kindOf(oldValue) !== kindOf(newValue)) {
      events.push({
        kind: DiffEventKind.TYPE_CHANGED,
        path,
        old_value: oldValue,
        new_value: newValue,
      });
      return;
    }

    if (isSnapshotMap(oldValue) && isSnapshotMap(newValue)) {
      this.compareMaps(oldValue, newValue, path, groupingKey, events);
    } else if (isSnapshotSequence(oldValue) && isSnapshotSequence(newValue)) {
      this.compareSequences(oldValue, newValue, path, groupingKey, events);
    } else {
      events.push({
        kind: DiffEventKind.VALUE_CHANGED,
        path,
        old_value: oldValue,
        new_value: newValue,
      });
    }
  }

  private compareMaps(
    oldMap: SnapshotMap,
    newMap: SnapshotMap,
    path: PathSegment[],
    groupingKey: string | undefined,
    events: DiffEvent[]
  ): void {
    for (const [key, oldChild] of Object.entries(oldMap)) {
      if (Object.hasOwn(newMap, key)) {
        this.compareValues(oldChild, newMap[key] ?? null, [...path, key], groupingKey, events);
      } else {
        events.push({ kind: DiffEventKind.ITEM_REMOVED, path: [...path, key], old_value: oldChild });
      }
    }

    for (const [key, newChild] of Object.entries(newMap)) {
      if (!Object.hasOwn(oldMap, key)) {
        events.push({ kind: DiffEventKind.ITEM_ADDED, path: [...path, key], new_value: newChild });
      }
    }
  }

  private compareSequences(
    oldSeq: SnapshotSequence,
    newSeq: SnapshotSequence,
    path: PathSegment[],
    groupingKey: string | undefined,
    events: DiffEvent[]
  ): void {
    if (groupingKey !== undefined) {
      const oldKeyed = this.indexByKey(oldSeq, groupingKey, path);
      const newKeyed = oldKeyed && this.indexByKey(newSeq, groupingKey, path);
      if (oldKeyed && newKeyed) {
        this.compareKeyedSequences(oldKeyed, newKeyed, path, groupingKey, events);
        return;
      }
    }

    this.compareUnorderedSequences(oldSeq, newSeq, path, events);
  }

  /**
   * Index sequence elements by grouping-key value.
   * Returns null when any element is not a map carrying a string or numeric key.
   */
  private indexByKey(
    sequence: SnapshotSequence,
    groupingKey: string,
    path: PathSegment[]
  ): KeyedElements | null {
    const elements: KeyedElements['elements'] = new Map();

    for (const element of sequence) {
      if (!isSnapshotMap(element)) {
        return null;
      }

      const id = element[groupingKey];
      if (typeof id !== 'string' && typeof id !== 'number') {
        // Nested sequences of other record types routinely lack the key
        const level = path.length === 0 ? 'warn' : 'debug';
        this.logger[level](
          { groupingKey, path: joinPath(path) },
          `Element missing usable grouping key '${groupingKey}', comparing sequence without grouping`
        );
        return null;
      }

      const canonical = canonicalize(id);
      if (elements.has(canonical)) {
        this.logger.warn(
          { groupingKey, id, path: joinPath(path) },
          `Duplicate grouping key value '${String(id)}', keeping the later element`
        );
      }
      elements.set(canonical, { id, element });
    }

    return { elements };
  }

  private compareKeyedSequences(
    oldKeyed: KeyedElements,
    newKeyed: KeyedElements,
    path: PathSegment[],
    groupingKey: string,
    events: DiffEvent[]
  ): void {
    const ids = [...new Set([...oldKeyed.elements.keys(), ...newKeyed.elements.keys()])].sort();

    for (const canonical of ids) {
      const before = oldKeyed.elements.get(canonical);
      const after = newKeyed.elements.get(canonical);

      if (before && after) {
        this.compareValues(before.element, after.element, [...path, before.id], groupingKey, events);
      } else if (before) {
        events.push({
          kind: DiffEventKind.ITERABLE_ITEM_REMOVED,
          path: [...path, before.id],
          old_value: before.element,
        });
      } else if (after) {
        events.push({
          kind: DiffEventKind.ITERABLE_ITEM_ADDED,
          path: [...path, after.id],
          new_value: after.element,
        });
      }
    }
  }

  /**
   * Multiset comparison: each current element consumes one equal
   * baseline element; leftovers on either side are removals or additions.
   */
  private compareUnorderedSequences(
    oldSeq: SnapshotSequence,
    newSeq: SnapshotSequence,
    path: PathSegment[],
    events: DiffEvent[]
  ): void {
    const unmatched = new Map<string, number[]>();
    oldSeq.forEach((element, index) => {
      const canonical = canonicalize(element);
      const bucket = unmatched.get(canonical);
      if (bucket) {
        bucket.push(index);
      } else {
        unmatched.set(canonical, [index]);
      }
    });

    const addedIndexes: number[] = [];
    newSeq.forEach((element, index) => {
      const bucket = unmatched.get(canonicalize(element));
      if (bucket && bucket.length > 0) {
        bucket.shift();
      } else {
        addedIndexes.push(index);
      }
    });

    const removedIndexes = [...unmatched.values()].flat().sort((a, b) => a - b);

    for (const index of removedIndexes) {
      events.push({
        kind: DiffEventKind.ITERABLE_ITEM_REMOVED,
        path: [...path, index],
        old_value: oldSeq[index] ?? null,
      });
    }

    for (const index of addedIndexes) {
      events.push({
        kind: DiffEventKind.ITERABLE_ITEM_ADDED,
        path: [...path, index],
        new_value: newSeq[index] ?? null,
      });
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createStructuralDiffer(options?: StructuralDifferOptions): IStructuralDiffer {
  return new StructuralDiffer(options);
}
