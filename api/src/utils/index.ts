/**
 * @module utils
 */

export { ok, err, isOk, isErr, unwrap, map, tryCatch } from './result.js';
export type { Ok, Err, Result } from './result.js';
