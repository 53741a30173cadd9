/**
 * Comparison Engine Tests
 * @module diff/__tests__/comparison-engine.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ComparisonEngineRegistry,
  FlatEngine,
  StructuralEngine,
  createDefaultEngineRegistry,
} from '../comparison-engine.js';
import { UnsupportedEngineError } from '../../errors/index.js';
import { isErr, isOk } from '../../utils/result.js';
import type { Snapshot } from '../../types/snapshot.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const BASELINE_SSIDS: Snapshot[] = [
  { name: 'Guest', enabled: true, vlan: 10 },
  { name: 'Corp', enabled: true },
];

const CURRENT_SSIDS: Snapshot[] = [
  { name: 'Guest', enabled: false, vlan: 10 },
  { name: 'Lab', enabled: true },
];

describe('ComparisonEngineRegistry', () => {
  let registry: ComparisonEngineRegistry;

  beforeEach(() => {
    registry = createDefaultEngineRegistry();
  });

  it('lists the registered methods', () => {
    expect(registry.listMethods()).toEqual(['structural', 'flat']);
  });

  it('resolves methods and aliases', () => {
    const structural = registry.resolve('structural');
    const alias = registry.resolve('tree');
    const flat = registry.resolve('flat');

    expect(isOk(structural) && structural.value.method).toBe('structural');
    expect(isOk(alias) && alias.value.method).toBe('structural');
    expect(isOk(flat) && flat.value.method).toBe('flat');
  });

  it('rejects unknown methods', () => {
    const result = registry.resolve('fuzzy');

    expect(isErr(result) && result.error).toBeInstanceOf(UnsupportedEngineError);
    expect(isErr(result) && result.error.message).toBe('Unsupported comparison method: fuzzy');
  });
});

describe('StructuralEngine', () => {
  const engine = new StructuralEngine();

  it('returns an empty summary for scalar roots', () => {
    expect(engine.compare('a', 'b')).toEqual({
      relevant_changes: [],
      other_changes: [],
      raw_diff: [],
      summary_counts: { added: 0, removed: 0, changed: 0, other: 0 },
      has_diffs: false,
    });
  });

  it('classifies grouped sequence changes', () => {
    const summary = engine.compare(BASELINE_SSIDS, CURRENT_SSIDS, 'name');

    expect(summary.relevant_changes).toEqual([
      {
        item_id: 'Corp',
        status: 'removed',
        changes: [{ field: null, reference_value: { name: 'Corp', enabled: true }, current_value: 'N/A' }],
      },
      {
        item_id: 'Guest',
        status: 'changed',
        changes: [{ field: 'enabled', reference_value: true, current_value: false }],
      },
      {
        item_id: 'Lab',
        status: 'added',
        changes: [{ field: null, reference_value: 'N/A', current_value: { name: 'Lab', enabled: true } }],
      },
    ]);
    expect(summary.summary_counts).toEqual({ added: 1, removed: 1, changed: 1, other: 0 });
  });

  it('keeps both sides when unmatched ungrouped elements share an index', () => {
    // One admin lacks the grouping key, so the list is compared without grouping
    const summary = engine.compare(
      [{ email: 'a@example.test', role: 'read' }, { name: 'no-email' }],
      [{ email: 'a@example.test', role: 'read' }, { email: 'b@example.test', role: 'admin' }],
      'email'
    );

    expect(summary.relevant_changes).toEqual([
      {
        item_id: 1,
        status: 'changed',
        changes: [
          {
            field: null,
            reference_value: { name: 'no-email' },
            current_value: { email: 'b@example.test', role: 'admin' },
          },
        ],
      },
    ]);
    expect(summary.summary_counts).toEqual({ added: 0, removed: 0, changed: 1, other: 0 });
  });

  it('does not depend on element order', () => {
    const reversed = [...CURRENT_SSIDS].reverse();
    expect(engine.compare(BASELINE_SSIDS, reversed, 'name')).toEqual(
      engine.compare(BASELINE_SSIDS, CURRENT_SSIDS, 'name')
    );
  });

  it('finds no differences between a snapshot and itself', () => {
    expect(engine.compare(BASELINE_SSIDS, BASELINE_SSIDS, 'name').has_diffs).toBe(false);
  });
});

describe('FlatEngine', () => {
  const engine = new FlatEngine();

  it('returns an empty summary for scalar roots', () => {
    const summary = engine.compare(1, 2);

    expect(summary.raw_diff).toEqual({ has_changes: false, detailed_changes: [] });
    expect(summary.has_diffs).toBe(false);
  });

  it('attributes ungrouped changes to the global item', () => {
    const summary = engine.compare({ a: { b: 1 } }, { a: { b: 2 } });

    expect(summary.raw_diff).toEqual({
      has_changes: true,
      detailed_changes: [{ key: 'a.b', status: 'changed', reference_value: 1, current_value: 2 }],
    });
    expect(summary.relevant_changes).toEqual([
      {
        item_id: 'Global Configuration',
        status: 'changed',
        changes: [{ field: 'a.b', reference_value: 1, current_value: 2 }],
      },
    ]);
  });

  it('classifies grouped sequence changes by item', () => {
    const summary = engine.compare(BASELINE_SSIDS, CURRENT_SSIDS, 'name');

    expect(summary.relevant_changes).toEqual([
      {
        item_id: 'Corp',
        status: 'removed',
        changes: [{ field: null, reference_value: { name: 'Corp', enabled: true }, current_value: 'N/A' }],
      },
      {
        item_id: 'Guest',
        status: 'changed',
        changes: [{ field: 'enabled', reference_value: true, current_value: false }],
      },
      {
        item_id: 'Lab',
        status: 'added',
        changes: [{ field: null, reference_value: 'N/A', current_value: { name: 'Lab', enabled: true } }],
      },
    ]);
    expect(summary.summary_counts).toEqual({ added: 1, removed: 1, changed: 1, other: 0 });
    expect(summary.has_diffs).toBe(true);
  });

  it('does not depend on element order when grouped', () => {
    const reversed = [...CURRENT_SSIDS].reverse();
    expect(engine.compare(BASELINE_SSIDS, reversed, 'name')).toEqual(
      engine.compare(BASELINE_SSIDS, CURRENT_SSIDS, 'name')
    );
  });

  it('finds no differences between a snapshot and itself', () => {
    expect(engine.compare(BASELINE_SSIDS, BASELINE_SSIDS, 'name').has_diffs).toBe(false);
  });
});
