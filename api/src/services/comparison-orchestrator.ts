/**
 * Comparison Orchestrator
 * @module services/comparison-orchestrator
 *
 * Compares one baseline against the live snapshot of every selected
 * entity. Entities are processed one at a time; a failed fetch is
 * reported under the entity's name and does not stop the pass.
 */

import type { Snapshot } from '../types/snapshot.js';
import type { IComparisonEngine } from '../diff/comparison-engine.js';
import type { ComparisonSummary } from '../diff/types.js';
import { getErrorMessage } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import type { EntityFilter } from './filters.js';
import type { OperationFetcher } from './operation-fetchers.js';
import type { OperationDescriptor } from './operation-registry.js';

// ============================================================================
// Types
// ============================================================================

export interface EntityFailure {
  error: string;
}

export type EntityOutcome = ComparisonSummary | EntityFailure;

/**
 * Entity display name -> comparison outcome
 */
export type ComparisonReport = Record<string, EntityOutcome>;

/**
 * How to read an entity's id and display name
 */
export interface EntityIdentity<E> {
  id(entity: E): string | null;
  name(entity: E): string;
}

export interface ComparisonRequest<E> {
  readonly baseline: Snapshot;
  readonly entities: readonly E[];
  readonly operation: Pick<OperationDescriptor, 'scope' | 'name' | 'groupingKey'>;
  readonly engine: IComparisonEngine;
  readonly fetcher: OperationFetcher;
  readonly identity: EntityIdentity<E>;
  readonly filter?: EntityFilter<E>;
}

export interface IComparisonOrchestrator {
  compare<E>(request: ComparisonRequest<E>): Promise<ComparisonReport>;
}

export interface ComparisonOrchestratorOptions {
  readonly logger?: StructuredLogger;
}

export function isEntityFailure(outcome: EntityOutcome): outcome is EntityFailure {
  return 'error' in outcome;
}

// ============================================================================
// Implementation
// ============================================================================

export class ComparisonOrchestrator implements IComparisonOrchestrator {
  private readonly logger: StructuredLogger;

  constructor(options: ComparisonOrchestratorOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('comparison-orchestrator');
  }

  async compare<E>(request: ComparisonRequest<E>): Promise<ComparisonReport> {
    const { baseline, entities, operation, engine, fetcher, identity, filter } = request;
    const startTime = Date.now();
    // Keyed by display name; a Map keeps names such as '__proto__' as plain keys
    const outcomes = new Map<string, EntityOutcome>();
    let compared = 0;

    this.logger.comparisonStarted(operation.scope, operation.name, engine.method, entities.length);

    for (const entity of entities) {
      const id = identity.id(entity);
      const name = identity.name(entity);

      if (id === null) {
        this.logger.entitySkipped(name, 'missing id');
        continue;
      }
      if (filter && !filter(entity)) {
        continue;
      }

      const key = outcomes.has(name) ? `${name} (${id})` : name;

      let current: Snapshot | undefined;
      try {
        current = await fetcher(id);
      } catch (error) {
        const message = getErrorMessage(error);
        this.logger.entityFailed(key, error instanceof Error ? error : new Error(message));
        outcomes.set(key, { error: `Fetch failed for ${name}: ${message}` });
        continue;
      }

      if (current === null || current === undefined) {
        this.logger.entitySkipped(name, 'no current data');
        continue;
      }

      const summary = engine.compare(baseline, current, operation.groupingKey, name);
      this.logger.entityCompared(key, summary.summary_counts);
      outcomes.set(key, summary);
      compared++;
    }

    this.logger.comparisonCompleted(operation.scope, operation.name, compared, Date.now() - startTime);
    return Object.fromEntries(outcomes);
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createComparisonOrchestrator(options?: ComparisonOrchestratorOptions): IComparisonOrchestrator {
  return new ComparisonOrchestrator(options);
}
