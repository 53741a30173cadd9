/**
 * Drift Diff Module
 * @module diff
 *
 * Structural and flat comparison engines for configuration snapshots.
 */

export {
  NOT_AVAILABLE,
  GLOBAL_ITEM_ID,
  ROOT_REPLACEMENT_FIELD,
  DiffEventKind,
  mergeStatus,
  countChanges,
  createEmptySummary,
} from './types.js';
export type {
  PathSegment,
  DiffEvent,
  ItemId,
  ChangeStatus,
  FieldChange,
  EntityChange,
  OtherChange,
  SummaryCounts,
  ComparisonSummary,
  FlatSnapshot,
  FlatChange,
  FlatComparison,
} from './types.js';

export { decodePath, joinPath, FIELD_SEPARATOR } from './path-codec.js';
export type { DecodedPath } from './path-codec.js';

export { StructuralDiffer, createStructuralDiffer } from './structural-differ.js';
export type { IStructuralDiffer, StructuralDifferOptions } from './structural-differ.js';

export { DiffClassifier, createDiffClassifier } from './diff-classifier.js';
export type { IDiffClassifier, ClassifiedChanges, DiffClassifierOptions } from './diff-classifier.js';

export { flatten, unflatten, compareFlat, compareFlattened } from './flat-differ.js';

export { FlatClassifier, createFlatClassifier } from './flat-classifier.js';
export type {
  IFlatClassifier,
  PreparedFlatInput,
  FlatSummaryOptions,
  FlatClassifierOptions,
} from './flat-classifier.js';

export {
  ComparisonMethod,
  METHOD_ALIASES,
  StructuralEngine,
  FlatEngine,
  ComparisonEngineRegistry,
  createDefaultEngineRegistry,
} from './comparison-engine.js';
export type { IComparisonEngine, EngineOptions } from './comparison-engine.js';
