/**
 * Path Codec Tests
 * @module diff/__tests__/path-codec.test
 */

import { describe, it, expect, vi } from 'vitest';
import { decodePath, joinPath } from '../path-codec.js';

const { debug } = vi.hoisted(() => ({ debug: vi.fn() }));

vi.mock('../../logging/index.js', () => ({
  createModuleLogger: () => ({ debug }),
}));

describe('decodePath', () => {
  it('treats the empty path as the root', () => {
    expect(decodePath([])).toEqual({ itemId: null, fieldPath: null, isRootItem: false });
    expect(debug).toHaveBeenCalledWith('Empty difference path decoded as the root');
  });

  it('logs nothing for item paths', () => {
    decodePath(['Guest', 'vlan']);

    expect(debug).not.toHaveBeenCalled();
  });

  it('treats a single segment as a whole item', () => {
    expect(decodePath(['Guest'])).toEqual({ itemId: 'Guest', fieldPath: null, isRootItem: true });
    expect(decodePath([3])).toEqual({ itemId: 3, fieldPath: null, isRootItem: true });
  });

  it('joins the remaining segments into a field path', () => {
    expect(decodePath([7, 'ports', 0, 'vlan'])).toEqual({
      itemId: 7,
      fieldPath: 'ports.0.vlan',
      isRootItem: false,
    });
  });
});

describe('joinPath', () => {
  it('stringifies numeric segments', () => {
    expect(joinPath(['rules', 2, 'policy'])).toBe('rules.2.policy');
  });

  it('returns an empty string for the root', () => {
    expect(joinPath([])).toBe('');
  });
});
