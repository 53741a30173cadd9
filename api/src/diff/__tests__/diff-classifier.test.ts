/**
 * Diff Classifier Tests
 * @module diff/__tests__/diff-classifier.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createDiffClassifier, type IDiffClassifier } from '../diff-classifier.js';
import { createStructuralDiffer } from '../structural-differ.js';
import { unwrap } from '../../utils/result.js';
import type { Snapshot } from '../../types/snapshot.js';
import type { ComparisonSummary, DiffEvent } from '../types.js';

// ============================================================================
// Helpers
// ============================================================================

function summarizeDiff(
  classifier: IDiffClassifier,
  baseline: Snapshot,
  current: Snapshot,
  groupingKey?: string
): ComparisonSummary {
  const events = unwrap(createStructuralDiffer().diff(baseline, current, groupingKey));
  return classifier.summarize(events);
}

describe('DiffClassifier', () => {
  let classifier: IDiffClassifier;

  beforeEach(() => {
    classifier = createDiffClassifier();
  });

  describe('summarize', () => {
    it('reports a changed field of a grouped item', () => {
      const summary = summarizeDiff(classifier, [{ id: 1, val: 'a' }], [{ id: 1, val: 'b' }], 'id');

      expect(summary.relevant_changes).toEqual([
        { item_id: 1, status: 'changed', changes: [{ field: 'val', reference_value: 'a', current_value: 'b' }] },
      ]);
      expect(summary.other_changes).toEqual([]);
      expect(summary.summary_counts).toEqual({ added: 0, removed: 0, changed: 1, other: 0 });
      expect(summary.has_diffs).toBe(true);
    });

    it('reports a new item with its full value', () => {
      const summary = summarizeDiff(classifier, [], [{ id: 2, val: 'x' }], 'id');

      expect(summary.relevant_changes).toEqual([
        {
          item_id: 2,
          status: 'added',
          changes: [{ field: null, reference_value: 'N/A', current_value: { id: 2, val: 'x' } }],
        },
      ]);
      expect(summary.summary_counts.added).toBe(1);
    });

    it('reports a missing item with its full baseline value', () => {
      const summary = summarizeDiff(classifier, [{ id: 1 }, { id: 2 }], [{ id: 1 }], 'id');

      expect(summary.relevant_changes).toEqual([
        { item_id: 2, status: 'removed', changes: [{ field: null, reference_value: { id: 2 }, current_value: 'N/A' }] },
      ]);
    });

    it('reports a changed value of a top-level key as a whole-item change', () => {
      const summary = summarizeDiff(classifier, { a: 1 }, { a: 2 });

      expect(summary.relevant_changes).toEqual([
        { item_id: 'a', status: 'changed', changes: [{ field: null, reference_value: 1, current_value: 2 }] },
      ]);
    });

    it('reports nothing for identical snapshots', () => {
      const summary = summarizeDiff(classifier, { a: [1, 2] }, { a: [2, 1] });

      expect(summary.has_diffs).toBe(false);
      expect(summary.raw_diff).toEqual([]);
      expect(summary.summary_counts).toEqual({ added: 0, removed: 0, changed: 0, other: 0 });
    });

    it('mirrors additions and removals when the sides are swapped', () => {
      const left = { x: 1, y: { z: 1 } };
      const right = { y: { z: 2 }, w: 3 };

      const forward = summarizeDiff(classifier, left, right);
      const backward = summarizeDiff(classifier, right, left);

      const statuses = (summary: ComparisonSummary): Record<string, string> =>
        Object.fromEntries(summary.relevant_changes.map((item) => [String(item.item_id), item.status]));

      expect(statuses(forward)).toEqual({ x: 'removed', y: 'changed', w: 'added' });
      expect(statuses(backward)).toEqual({ x: 'added', y: 'changed', w: 'removed' });
    });
  });

  describe('classify', () => {
    it('fans a replaced map root out into removed items', () => {
      const events: DiffEvent[] = [
        { kind: 'type_changed', path: [], old_value: { a: 1 }, new_value: [1] },
      ];

      expect(classifier.classify(events)).toEqual({
        relevant: [
          { item_id: 'a', status: 'removed', changes: [{ field: null, reference_value: 1, current_value: 'N/A' }] },
        ],
        other: [],
      });
    });

    it('fans a new map root out into added items', () => {
      const events: DiffEvent[] = [
        { kind: 'type_changed', path: [], old_value: [1], new_value: { b: true } },
      ];

      expect(classifier.classify(events).relevant).toEqual([
        { item_id: 'b', status: 'added', changes: [{ field: null, reference_value: 'N/A', current_value: true }] },
      ]);
    });

    it('records a replaced non-map root as an other change', () => {
      const events: DiffEvent[] = [{ kind: 'value_changed', path: [], old_value: 1, new_value: 2 }];

      expect(classifier.classify(events)).toEqual({
        relevant: [],
        other: [{ item_id: null, field: 'type_or_full_value_change', reference_value: 1, current_value: 2 }],
      });
    });

    it('lets a whole removal replace earlier field changes', () => {
      const events: DiffEvent[] = [
        { kind: 'value_changed', path: ['x', 'f'], old_value: 1, new_value: 2 },
        { kind: 'item_removed', path: ['x'], old_value: { f: 1 } },
      ];

      expect(classifier.classify(events).relevant).toEqual([
        { item_id: 'x', status: 'removed', changes: [{ field: null, reference_value: { f: 1 }, current_value: 'N/A' }] },
      ]);
    });

    it('drops field changes arriving after a whole removal', () => {
      const events: DiffEvent[] = [
        { kind: 'item_removed', path: ['x'], old_value: { f: 1 } },
        { kind: 'value_changed', path: ['x', 'f'], old_value: 1, new_value: 2 },
      ];

      expect(classifier.classify(events).relevant).toEqual([
        { item_id: 'x', status: 'removed', changes: [{ field: null, reference_value: { f: 1 }, current_value: 'N/A' }] },
      ]);
    });

    it('merges a whole removal and a whole addition under one id into a replacement', () => {
      const removedFirst: DiffEvent[] = [
        { kind: 'iterable_item_removed', path: [1], old_value: { name: 'old' } },
        { kind: 'iterable_item_added', path: [1], new_value: { name: 'new' } },
      ];
      const addedFirst: DiffEvent[] = [
        { kind: 'iterable_item_added', path: [1], new_value: { name: 'new' } },
        { kind: 'iterable_item_removed', path: [1], old_value: { name: 'old' } },
      ];
      const expected = [
        {
          item_id: 1,
          status: 'changed',
          changes: [{ field: null, reference_value: { name: 'old' }, current_value: { name: 'new' } }],
        },
      ];

      expect(classifier.classify(removedFirst).relevant).toEqual(expected);
      expect(classifier.classify(addedFirst).relevant).toEqual(expected);
    });

    it('ignores field changes for an item replaced as a whole', () => {
      const events: DiffEvent[] = [
        { kind: 'item_removed', path: ['x'], old_value: 2 },
        { kind: 'item_added', path: ['x'], new_value: 1 },
        { kind: 'value_changed', path: ['x', 'f'], old_value: 1, new_value: 2 },
      ];

      expect(classifier.classify(events).relevant).toEqual([
        { item_id: 'x', status: 'changed', changes: [{ field: null, reference_value: 2, current_value: 1 }] },
      ]);
    });

    it('drops field changes arriving after a whole addition', () => {
      const events: DiffEvent[] = [
        { kind: 'value_changed', path: ['x', 'f'], old_value: 1, new_value: 2 },
        { kind: 'item_added', path: ['y'], new_value: 3 },
        { kind: 'value_changed', path: ['y', 'g'], old_value: 1, new_value: 2 },
      ];

      expect(classifier.classify(events).relevant.map((item) => [item.item_id, item.status])).toEqual([
        ['x', 'changed'],
        ['y', 'added'],
      ]);
    });

    it('marks nested additions and removals with N/A', () => {
      const events: DiffEvent[] = [
        { kind: 'item_added', path: ['x', 'tags'], new_value: ['a'] },
        { kind: 'iterable_item_removed', path: ['x', 'list', 0], old_value: 5 },
      ];

      expect(classifier.classify(events).relevant).toEqual([
        {
          item_id: 'x',
          status: 'changed',
          changes: [
            { field: 'tags', reference_value: 'N/A', current_value: ['a'] },
            { field: 'list.0', reference_value: 5, current_value: 'N/A' },
          ],
        },
      ]);
    });

    it('routes set membership events to other changes', () => {
      const events: DiffEvent[] = [{ kind: 'set_added', path: ['x', 'members'], new_value: 'm' }];
      const summary = classifier.summarize(events);

      expect(summary.other_changes).toEqual([
        { item_id: 'x', field: 'x.members', reference_value: null, current_value: 'm' },
      ]);
      expect(summary.relevant_changes).toEqual([]);
      expect(summary.summary_counts.other).toBe(1);
      expect(summary.has_diffs).toBe(true);
    });
  });
});
