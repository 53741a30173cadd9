/**
 * Diff Classifier
 * @module diff/diff-classifier
 *
 * Groups structural diff events by the item they belong to and classifies
 * each item as added, removed or changed. Events that cannot be attributed
 * to an item are collected as other changes.
 *
 * Classification rules:
 * - A replaced root fans out into per-key removals/additions when the old
 *   or new root is a map; otherwise it becomes one other change.
 * - A whole item added or removed carries its full value as the only
 *   field change, replacing anything collected for it before or after.
 * - A whole removal and a whole addition under the same id (unmatched
 *   elements sharing an index in an ungrouped sequence) become one
 *   changed item carrying both values.
 * - Nested events become field changes of their item.
 * - Status precedence is removed > added > changed.
 */

import { type Snapshot, isSnapshotMap } from '../types/snapshot.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import {
  type ComparisonSummary,
  type DiffEvent,
  DiffEventKind,
  type EntityChange,
  type FieldChange,
  type ItemId,
  NOT_AVAILABLE,
  type OtherChange,
  ROOT_REPLACEMENT_FIELD,
  countChanges,
  mergeStatus,
} from './types.js';
import { decodePath, joinPath } from './path-codec.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface ClassifiedChanges {
  relevant: EntityChange[];
  other: OtherChange[];
}

export interface IDiffClassifier {
  classify(events: readonly DiffEvent[]): ClassifiedChanges;
  summarize(events: readonly DiffEvent[]): ComparisonSummary;
}

export interface DiffClassifierOptions {
  readonly logger?: StructuredLogger;
}

type WholeItemStatus = 'added' | 'removed';

// ============================================================================
// Classification State
// ============================================================================

/**
 * Per-call accumulator; never shared between comparisons
 */
class ClassificationState {
  readonly items = new Map<ItemId, EntityChange>();
  readonly other: OtherChange[] = [];
  /** Whole-item change recorded per id */
  private readonly wholeChanges = new Map<ItemId, FieldChange>();
  /** Ids whose removal and addition were merged into a replacement */
  private readonly replaced = new Set<ItemId>();

  setWholeItem(itemId: ItemId, status: WholeItemStatus, value: Snapshot): void {
    if (this.replaced.has(itemId)) {
      return;
    }

    const whole: FieldChange =
      status === 'added'
        ? { field: null, reference_value: NOT_AVAILABLE, current_value: value }
        : { field: null, reference_value: value, current_value: NOT_AVAILABLE };

    const existing = this.items.get(itemId);
    if (!existing) {
      this.items.set(itemId, { item_id: itemId, status, changes: [whole] });
      this.wholeChanges.set(itemId, whole);
      return;
    }

    const previous = this.wholeChanges.get(itemId);
    if (previous && existing.status !== status) {
      existing.status = 'changed';
      existing.changes = [
        {
          field: null,
          reference_value: status === 'removed' ? value : previous.reference_value,
          current_value: status === 'added' ? value : previous.current_value,
        },
      ];
      this.replaced.add(itemId);
      return;
    }

    if (mergeStatus(existing.status, status) === status) {
      existing.status = status;
      existing.changes = [whole];
      this.wholeChanges.set(itemId, whole);
    }
  }

  addFieldChange(itemId: ItemId, change: FieldChange): boolean {
    if (this.replaced.has(itemId)) {
      return false;
    }
    const existing = this.items.get(itemId);
    if (!existing) {
      this.items.set(itemId, { item_id: itemId, status: 'changed', changes: [change] });
      return true;
    }

    if (existing.status !== 'changed') {
      return false;
    }

    existing.changes.push(change);
    return true;
  }

  result(): ClassifiedChanges {
    return {
      relevant: [...this.items.values()].filter((item) => item.changes.length > 0),
      other: this.other,
    };
  }
}

// ============================================================================
// Implementation
// ============================================================================

export class DiffClassifier implements IDiffClassifier {
  private readonly logger: StructuredLogger;

  constructor(options: DiffClassifierOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('diff-classifier');
  }

  classify(events: readonly DiffEvent[]): ClassifiedChanges {
    const state = new ClassificationState();

    for (const event of events) {
      const { itemId, fieldPath, isRootItem } = decodePath(event.path);

      if (event.kind === DiffEventKind.SET_ADDED || event.kind === DiffEventKind.SET_REMOVED) {
        state.other.push({
          item_id: itemId,
          field: joinPath(event.path),
          reference_value: event.old_value ?? null,
          current_value: event.new_value ?? null,
        });
      } else if (itemId === null) {
        this.classifyRootEvent(event, state);
      } else if (isRootItem) {
        this.classifyRootItemEvent(itemId, event, state);
      } else {
        this.classifyFieldEvent(itemId, fieldPath, event, state);
      }
    }

    return state.result();
  }

  summarize(events: readonly DiffEvent[]): ComparisonSummary {
    const { relevant, other } = this.classify(events);
    return {
      relevant_changes: relevant,
      other_changes: other,
      raw_diff: events,
      summary_counts: countChanges(relevant, other),
      has_diffs: relevant.length > 0 || other.length > 0,
    };
  }

  /**
   * Root replaced entirely
   */
  private classifyRootEvent(event: DiffEvent, state: ClassificationState): void {
    const oldRoot = event.old_value ?? null;
    const newRoot = event.new_value ?? null;

    if (event.kind !== DiffEventKind.VALUE_CHANGED && event.kind !== DiffEventKind.TYPE_CHANGED) {
      this.logger.debug({ kind: event.kind }, 'Unattributable root event routed to other changes');
      state.other.push({
        item_id: null,
        field: joinPath(event.path),
        reference_value: oldRoot,
        current_value: newRoot,
      });
      return;
    }

    if (!isSnapshotMap(oldRoot) && !isSnapshotMap(newRoot)) {
      state.other.push({
        item_id: null,
        field: ROOT_REPLACEMENT_FIELD,
        reference_value: oldRoot,
        current_value: newRoot,
      });
      return;
    }

    if (isSnapshotMap(oldRoot)) {
      for (const [key, value] of Object.entries(oldRoot)) {
        state.setWholeItem(key, 'removed', value);
      }
    }
    if (isSnapshotMap(newRoot)) {
      for (const [key, value] of Object.entries(newRoot)) {
        state.setWholeItem(key, 'added', value);
      }
    }
  }

  private classifyRootItemEvent(itemId: ItemId, event: DiffEvent, state: ClassificationState): void {
    switch (event.kind) {
      case DiffEventKind.ITEM_ADDED:
      case DiffEventKind.ITERABLE_ITEM_ADDED:
        state.setWholeItem(itemId, 'added', event.new_value ?? null);
        break;
      case DiffEventKind.ITEM_REMOVED:
      case DiffEventKind.ITERABLE_ITEM_REMOVED:
        state.setWholeItem(itemId, 'removed', event.old_value ?? null);
        break;
      default:
        this.recordFieldChange(state, itemId, {
          field: null,
          reference_value: event.old_value ?? null,
          current_value: event.new_value ?? null,
        });
    }
  }

  private classifyFieldEvent(
    itemId: ItemId,
    fieldPath: string | null,
    event: DiffEvent,
    state: ClassificationState
  ): void {
    switch (event.kind) {
      case DiffEventKind.ITEM_ADDED:
      case DiffEventKind.ITERABLE_ITEM_ADDED:
        this.recordFieldChange(state, itemId, {
          field: fieldPath,
          reference_value: NOT_AVAILABLE,
          current_value: event.new_value ?? null,
        });
        break;
      case DiffEventKind.ITEM_REMOVED:
      case DiffEventKind.ITERABLE_ITEM_REMOVED:
        this.recordFieldChange(state, itemId, {
          field: fieldPath,
          reference_value: event.old_value ?? null,
          current_value: NOT_AVAILABLE,
        });
        break;
      default:
        this.recordFieldChange(state, itemId, {
          field: fieldPath,
          reference_value: event.old_value ?? null,
          current_value: event.new_value ?? null,
        });
    }
  }

  private recordFieldChange(state: ClassificationState, itemId: ItemId, change: FieldChange): void {
    if (!state.addFieldChange(itemId, change)) {
      this.logger.debug(
        { itemId, field: change.field },
        'Field change dropped for item already added or removed as a whole'
      );
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createDiffClassifier(options?: DiffClassifierOptions): IDiffClassifier {
  return new DiffClassifier(options);
}
