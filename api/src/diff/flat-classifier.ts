/**
 * Flat Classifier
 * @module diff/flat-classifier
 *
 * Groups flat key changes back into items. Sequences of maps are first
 * re-keyed by their grouping-key value so that each flattened key starts
 * with an item id; each changed key is then attributed to the longest
 * item id it starts with.
 */

import { type Snapshot, type SnapshotMap, isSnapshotMap, isSnapshotSequence } from '../types/snapshot.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import {
  type ComparisonSummary,
  type EntityChange,
  type FlatComparison,
  GLOBAL_ITEM_ID,
  NOT_AVAILABLE,
  countChanges,
  mergeStatus,
} from './types.js';
import { FIELD_SEPARATOR } from './path-codec.js';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Snapshots ready for flattening, with the item ids found while re-keying
 */
export interface PreparedFlatInput {
  baseline: Snapshot;
  current: Snapshot;
  /** True if either side was re-keyed by the grouping key */
  transformed: boolean;
  itemIds: string[];
}

export interface FlatSummaryOptions {
  /** Known item ids; keys are attributed only when non-empty */
  itemIds?: readonly string[];
  /** Re-keyed baseline used to recover whole removed items */
  processedBaseline?: SnapshotMap;
  /** Re-keyed current used to recover whole added items */
  processedCurrent?: SnapshotMap;
}

export interface IFlatClassifier {
  prepare(baseline: Snapshot, current: Snapshot, groupingKey?: string, label?: string): PreparedFlatInput;
  summarize(flat: FlatComparison, options?: FlatSummaryOptions): ComparisonSummary;
}

export interface FlatClassifierOptions {
  readonly logger?: StructuredLogger;
}

// ============================================================================
// Implementation
// ============================================================================

export class FlatClassifier implements IFlatClassifier {
  private readonly logger: StructuredLogger;

  constructor(options: FlatClassifierOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('flat-classifier');
  }

  /**
   * Re-key each side that is a sequence of maps by its grouping-key value
   */
  prepare(
    baseline: Snapshot,
    current: Snapshot,
    groupingKey?: string,
    label = 'snapshot'
  ): PreparedFlatInput {
    if (groupingKey === undefined) {
      return { baseline, current, transformed: false, itemIds: [] };
    }

    const itemIds = new Set<string>();
    const processedBaseline = this.transformListByKey(baseline, groupingKey, `${label} baseline`);
    const processedCurrent = this.transformListByKey(current, groupingKey, `${label} current`);

    for (const processed of [processedBaseline, processedCurrent]) {
      for (const id of Object.keys(processed ?? {})) {
        itemIds.add(id);
      }
    }

    return {
      baseline: processedBaseline ?? baseline,
      current: processedCurrent ?? current,
      transformed: processedBaseline !== null || processedCurrent !== null,
      itemIds: [...itemIds],
    };
  }

  /**
   * Convert a sequence of maps into a map keyed by String(element[key]).
   * Returns null when the value is not a sequence of maps.
   */
  transformListByKey(data: Snapshot, key: string, label: string): SnapshotMap | null {
    if (!isSnapshotSequence(data) || !data.every(isSnapshotMap)) {
      return null;
    }

    const transformed: SnapshotMap = {};
    for (const element of data) {
      if (!isSnapshotMap(element)) {
        continue;
      }

      const id = element[key];
      if (typeof id !== 'string' && typeof id !== 'number' && typeof id !== 'boolean') {
        this.logger.warn({ groupingKey: key, label }, `Item missing grouping key '${key}' in ${label}`);
        continue;
      }

      const itemId = String(id);
      if (Object.hasOwn(transformed, itemId)) {
        this.logger.warn(
          { groupingKey: key, itemId, label },
          `Duplicate grouping key '${itemId}' in ${label}, overwriting previous entry`
        );
      }
      transformed[itemId] = element;
    }

    return transformed;
  }

  summarize(flat: FlatComparison, options: FlatSummaryOptions = {}): ComparisonSummary {
    const itemIds = [...(options.itemIds ?? [])].sort((a, b) => b.length - a.length);
    const grouped = new Map<string, EntityChange>();

    for (const change of flat.detailed_changes) {
      const { itemId, field } = this.attribute(change.key, itemIds);

      const existing = grouped.get(itemId);
      const fieldChange = {
        field,
        reference_value: change.reference_value,
        current_value: change.current_value,
      };

      if (existing) {
        existing.status = mergeStatus(existing.status, change.status);
        existing.changes.push(fieldChange);
      } else {
        grouped.set(itemId, { item_id: itemId, status: change.status, changes: [fieldChange] });
      }
    }

    if (itemIds.length > 0) {
      for (const item of grouped.values()) {
        this.replaceWithWholeItem(item, options);
      }
    }

    const relevant = [...grouped.values()];
    return {
      relevant_changes: relevant,
      other_changes: [],
      raw_diff: flat,
      summary_counts: countChanges(relevant, []),
      has_diffs: flat.has_changes,
    };
  }

  /**
   * Longest item id that equals the key or prefixes it at a separator
   */
  private attribute(key: string, sortedItemIds: readonly string[]): { itemId: string; field: string | null } {
    if (sortedItemIds.length === 0) {
      return { itemId: GLOBAL_ITEM_ID, field: key };
    }

    for (const id of sortedItemIds) {
      if (key === id) {
        return { itemId: id, field: null };
      }
      if (key.startsWith(`${id}${FIELD_SEPARATOR}`)) {
        return { itemId: id, field: key.slice(id.length + FIELD_SEPARATOR.length) };
      }
    }

    this.logger.warn({ key }, `Could not determine item id for key '${key}', treating as global`);
    return { itemId: GLOBAL_ITEM_ID, field: key };
  }

  private replaceWithWholeItem(item: EntityChange, options: FlatSummaryOptions): void {
    if (item.status === 'changed') {
      return;
    }

    const source = item.status === 'added' ? options.processedCurrent : options.processedBaseline;
    const itemId = String(item.item_id);
    const whole = source && Object.hasOwn(source, itemId) ? source[itemId] : undefined;

    if (whole === undefined) {
      this.logger.warn({ itemId, status: item.status }, `Could not retrieve full ${item.status} object for item ${itemId}`);
      return;
    }

    item.changes = [
      item.status === 'added'
        ? { field: null, reference_value: NOT_AVAILABLE, current_value: whole }
        : { field: null, reference_value: whole, current_value: NOT_AVAILABLE },
    ];
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createFlatClassifier(options?: FlatClassifierOptions): IFlatClassifier {
  return new FlatClassifier(options);
}
