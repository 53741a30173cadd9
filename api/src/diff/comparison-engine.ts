/**
 * Comparison Engines
 * @module diff/comparison-engine
 *
 * The two comparison strategies behind one interface, plus the registry
 * that resolves a method name to an engine.
 *
 * @example
 * ```typescript
 * const registry = createDefaultEngineRegistry();
 * const engine = registry.resolve('flat');
 * if (isOk(engine)) {
 *   const summary = engine.value.compare(baseline, current, 'name');
 * }
 * ```
 */

import { type Snapshot, isSnapshotMap } from '../types/snapshot.js';
import { UnsupportedEngineError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { type Result, ok, err, isErr } from '../utils/result.js';
import { type ComparisonSummary, createEmptySummary } from './types.js';
import { type IStructuralDiffer, createStructuralDiffer } from './structural-differ.js';
import { type IDiffClassifier, createDiffClassifier } from './diff-classifier.js';
import { type IFlatClassifier, createFlatClassifier } from './flat-classifier.js';
import { compareFlat } from './flat-differ.js';

// ============================================================================
// Method Names
// ============================================================================

export const ComparisonMethod = {
  STRUCTURAL: 'structural',
  FLAT: 'flat',
} as const;

export type ComparisonMethod = typeof ComparisonMethod[keyof typeof ComparisonMethod];

/**
 * Alternative names accepted for a method
 */
export const METHOD_ALIASES: Readonly<Record<string, ComparisonMethod>> = {
  tree: ComparisonMethod.STRUCTURAL,
};

// ============================================================================
// Interfaces
// ============================================================================

export interface IComparisonEngine {
  readonly method: ComparisonMethod;
  /**
   * Compare a baseline against a current snapshot. Unusable roots are
   * logged and yield an empty summary.
   */
  compare(baseline: Snapshot, current: Snapshot, groupingKey?: string, entityName?: string): ComparisonSummary;
}

export interface EngineOptions {
  readonly logger?: StructuredLogger;
}

// ============================================================================
// Structural Engine
// ============================================================================

export class StructuralEngine implements IComparisonEngine {
  readonly method = ComparisonMethod.STRUCTURAL;
  private readonly differ: IStructuralDiffer;
  private readonly classifier: IDiffClassifier;
  private readonly logger: StructuredLogger;

  constructor(options: EngineOptions & { differ?: IStructuralDiffer; classifier?: IDiffClassifier } = {}) {
    this.logger = options.logger ?? createModuleLogger('structural-engine');
    this.differ = options.differ ?? createStructuralDiffer({ logger: this.logger });
    this.classifier = options.classifier ?? createDiffClassifier({ logger: this.logger });
  }

  compare(baseline: Snapshot, current: Snapshot, groupingKey?: string, entityName?: string): ComparisonSummary {
    const events = this.differ.diff(baseline, current, groupingKey);
    if (isErr(events)) {
      this.logger.warn({ err: events.error, entity: entityName }, events.error.message);
      return createEmptySummary();
    }
    return this.classifier.summarize(events.value);
  }
}

// ============================================================================
// Flat Engine
// ============================================================================

export class FlatEngine implements IComparisonEngine {
  readonly method = ComparisonMethod.FLAT;
  private readonly classifier: IFlatClassifier;
  private readonly logger: StructuredLogger;

  constructor(options: EngineOptions & { classifier?: IFlatClassifier } = {}) {
    this.logger = options.logger ?? createModuleLogger('flat-engine');
    this.classifier = options.classifier ?? createFlatClassifier({ logger: this.logger });
  }

  compare(baseline: Snapshot, current: Snapshot, groupingKey?: string, entityName?: string): ComparisonSummary {
    const prepared = this.classifier.prepare(baseline, current, groupingKey, entityName);
    const flat = compareFlat(prepared.baseline, prepared.current);

    if (isErr(flat)) {
      this.logger.warn({ err: flat.error, entity: entityName }, flat.error.message);
      return createEmptySummary({ has_changes: false, detailed_changes: [] });
    }

    if (!prepared.transformed) {
      return this.classifier.summarize(flat.value);
    }

    return this.classifier.summarize(flat.value, {
      itemIds: prepared.itemIds,
      processedBaseline: isSnapshotMap(prepared.baseline) ? prepared.baseline : undefined,
      processedCurrent: isSnapshotMap(prepared.current) ? prepared.current : undefined,
    });
  }
}

// ============================================================================
// Engine Registry
// ============================================================================

export class ComparisonEngineRegistry {
  private readonly engines = new Map<string, IComparisonEngine>();

  register(engine: IComparisonEngine): this {
    this.engines.set(engine.method, engine);
    return this;
  }

  /**
   * Resolve a method name (or alias) to its engine
   */
  resolve(method: string): Result<IComparisonEngine, UnsupportedEngineError> {
    const name = METHOD_ALIASES[method] ?? method;
    const engine = this.engines.get(name);
    return engine ? ok(engine) : err(new UnsupportedEngineError(method));
  }

  listMethods(): string[] {
    return [...this.engines.keys()];
  }
}

export function createDefaultEngineRegistry(options: EngineOptions = {}): ComparisonEngineRegistry {
  return new ComparisonEngineRegistry()
    .register(new StructuralEngine(options))
    .register(new FlatEngine(options));
}
