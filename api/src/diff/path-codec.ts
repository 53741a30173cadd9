/**
 * Path Codec
 * @module diff/path-codec
 *
 * Interprets the location of a structural difference as the item it
 * belongs to plus the field path inside that item.
 */

import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import type { ItemId, PathSegment } from './types.js';

export const FIELD_SEPARATOR = '.';

export interface DecodedPath {
  /** First path segment; null when the root itself changed */
  itemId: ItemId | null;
  /** Remaining segments joined with FIELD_SEPARATOR; null for root and root items */
  fieldPath: string | null;
  /** True iff the path addresses a whole item */
  isRootItem: boolean;
}

const ROOT_PATH: DecodedPath = { itemId: null, fieldPath: null, isRootItem: false };

let codecLogger: StructuredLogger | undefined;

function logger(): StructuredLogger {
  codecLogger ??= createModuleLogger('path-codec');
  return codecLogger;
}

/**
 * Decode a difference path into (itemId, fieldPath, isRootItem)
 */
export function decodePath(path: readonly PathSegment[]): DecodedPath {
  const [head, ...rest] = path;
  if (head === undefined) {
    logger().debug('Empty difference path decoded as the root');
    return { ...ROOT_PATH };
  }

  if (rest.length === 0) {
    return { itemId: head, fieldPath: null, isRootItem: true };
  }

  return {
    itemId: head,
    fieldPath: joinPath(rest),
    isRootItem: false,
  };
}

/**
 * Join path segments into a display path ('ports.0.vlan')
 */
export function joinPath(path: readonly PathSegment[]): string {
  return path.map((segment) => String(segment)).join(FIELD_SEPARATOR);
}
