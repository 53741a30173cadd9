/**
 * Flat Classifier Tests
 * @module diff/__tests__/flat-classifier.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FlatClassifier } from '../flat-classifier.js';
import type { FlatComparison } from '../types.js';

describe('FlatClassifier', () => {
  let classifier: FlatClassifier;

  beforeEach(() => {
    classifier = new FlatClassifier();
  });

  describe('transformListByKey', () => {
    it('re-keys a sequence of maps by the grouping key', () => {
      const result = classifier.transformListByKey(
        [{ name: 'Guest', vlan: 1 }, { name: 'Corp', vlan: 2 }],
        'name',
        'ssids'
      );

      expect(result).toEqual({ Guest: { name: 'Guest', vlan: 1 }, Corp: { name: 'Corp', vlan: 2 } });
    });

    it('skips elements without the key and keeps the last duplicate', () => {
      const result = classifier.transformListByKey(
        [{ id: 1, v: 'a' }, { other: true }, { id: 1, v: 'b' }],
        'id',
        'rules'
      );

      expect(result).toEqual({ 1: { id: 1, v: 'b' } });
    });

    it('returns null for values that are not sequences of maps', () => {
      expect(classifier.transformListByKey([1, 2], 'id', 'x')).toBeNull();
      expect(classifier.transformListByKey({ id: 1 }, 'id', 'x')).toBeNull();
    });
  });

  describe('prepare', () => {
    it('leaves inputs untouched without a grouping key', () => {
      expect(classifier.prepare([{ id: 1 }], [{ id: 2 }])).toEqual({
        baseline: [{ id: 1 }],
        current: [{ id: 2 }],
        transformed: false,
        itemIds: [],
      });
    });

    it('collects item ids from both sides', () => {
      const prepared = classifier.prepare([{ id: 'a' }, { id: 'b' }], [{ id: 'b' }, { id: 'c' }], 'id');

      expect(prepared.transformed).toBe(true);
      expect(prepared.itemIds).toEqual(['a', 'b', 'c']);
      expect(prepared.baseline).toEqual({ a: { id: 'a' }, b: { id: 'b' } });
    });
  });

  describe('summarize', () => {
    it('groups everything under the global item without item ids', () => {
      const flat: FlatComparison = {
        has_changes: true,
        detailed_changes: [{ key: 'a.b', status: 'changed', reference_value: 1, current_value: 2 }],
      };

      const summary = classifier.summarize(flat);

      expect(summary.relevant_changes).toEqual([
        {
          item_id: 'Global Configuration',
          status: 'changed',
          changes: [{ field: 'a.b', reference_value: 1, current_value: 2 }],
        },
      ]);
      expect(summary.other_changes).toEqual([]);
      expect(summary.raw_diff).toBe(flat);
      expect(summary.has_diffs).toBe(true);
    });

    it('attributes each key to the longest matching item id', () => {
      const flat: FlatComparison = {
        has_changes: true,
        detailed_changes: [
          { key: 'net.1.vlan', status: 'changed', reference_value: 1, current_value: 2 },
          { key: 'net.vlan', status: 'changed', reference_value: 3, current_value: 4 },
          { key: 'zzz', status: 'changed', reference_value: 5, current_value: 6 },
        ],
      };

      const summary = classifier.summarize(flat, { itemIds: ['net', 'net.1'] });

      expect(summary.relevant_changes).toEqual([
        { item_id: 'net.1', status: 'changed', changes: [{ field: 'vlan', reference_value: 1, current_value: 2 }] },
        { item_id: 'net', status: 'changed', changes: [{ field: 'vlan', reference_value: 3, current_value: 4 }] },
        {
          item_id: 'Global Configuration',
          status: 'changed',
          changes: [{ field: 'zzz', reference_value: 5, current_value: 6 }],
        },
      ]);
    });

    it('replaces the changes of a removed item with its full baseline value', () => {
      const flat: FlatComparison = {
        has_changes: true,
        detailed_changes: [
          { key: 'x.a', status: 'removed', reference_value: 1, current_value: null },
          { key: 'x.b', status: 'removed', reference_value: 2, current_value: null },
        ],
      };

      const summary = classifier.summarize(flat, {
        itemIds: ['x'],
        processedBaseline: { x: { a: 1, b: 2 } },
        processedCurrent: {},
      });

      expect(summary.relevant_changes).toEqual([
        { item_id: 'x', status: 'removed', changes: [{ field: null, reference_value: { a: 1, b: 2 }, current_value: 'N/A' }] },
      ]);
      expect(summary.summary_counts).toEqual({ added: 0, removed: 1, changed: 0, other: 0 });
    });

    it('keeps field changes when the whole item cannot be found', () => {
      const flat: FlatComparison = {
        has_changes: true,
        detailed_changes: [{ key: 'x.a', status: 'added', reference_value: null, current_value: 1 }],
      };

      const summary = classifier.summarize(flat, { itemIds: ['x'], processedCurrent: {} });

      expect(summary.relevant_changes).toEqual([
        { item_id: 'x', status: 'added', changes: [{ field: 'a', reference_value: null, current_value: 1 }] },
      ]);
    });

    it('raises an item to the highest status among its keys', () => {
      const flat: FlatComparison = {
        has_changes: true,
        detailed_changes: [
          { key: 'x.a', status: 'changed', reference_value: 1, current_value: 2 },
          { key: 'x.b', status: 'added', reference_value: null, current_value: 3 },
        ],
      };

      const summary = classifier.summarize(flat, { itemIds: ['x'] });

      expect(summary.relevant_changes).toEqual([
        {
          item_id: 'x',
          status: 'added',
          changes: [
            { field: 'a', reference_value: 1, current_value: 2 },
            { field: 'b', reference_value: null, current_value: 3 },
          ],
        },
      ]);
    });
  });
});
