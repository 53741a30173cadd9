/**
 * Route Schemas Module Index
 * @module routes/schemas
 */

export * from './common.js';
export * from './drift.js';
