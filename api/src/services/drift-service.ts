/**
 * Drift Service
 * @module services/drift-service
 *
 * Single entry point for storing baselines and comparing live state
 * against them. Failures are returned as `{ error, code }` outcomes and
 * logged; the service never throws to its caller.
 */

import type { Snapshot } from '../types/snapshot.js';
import { type DashboardContext, Scope } from '../types/entities.js';
import {
  type BaseError,
  type ErrorCode,
  FetchFailureError,
  InvalidInputError,
  isBaseError,
  wrapError,
} from '../errors/index.js';
import type { ComparisonEngineRegistry, IComparisonEngine } from '../diff/comparison-engine.js';
import type { ISnapshotStore } from '../repositories/snapshot-store.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { type Result, ok, err, isErr, tryCatch } from '../utils/result.js';
import type { IOperationRegistry, OperationDescriptor } from './operation-registry.js';
import type { OperationFetchers } from './operation-fetchers.js';
import type { IEntitySource } from './entity-source.js';
import {
  type ComparisonFilters,
  createDeviceFilter,
  createNetworkFilter,
  createOrganizationFilter,
} from './filters.js';
import type { ComparisonReport, IComparisonOrchestrator } from './comparison-orchestrator.js';

// ============================================================================
// Types
// ============================================================================

export const OperationTask = {
  STORE: 'store',
  COMPARE: 'compare',
} as const;

export type OperationTask = typeof OperationTask[keyof typeof OperationTask];

export interface OperationRequest {
  scope: string;
  operation: string;
  task: OperationTask;
  /** Entity to fetch when storing; organization scope defaults to the context organization */
  identifier?: string;
  /** Baseline file to compare against */
  filename?: string;
  /** Comparison engine; defaults to the configured method */
  method?: string;
  filters?: ComparisonFilters;
  /** List networks and devices across all organizations */
  global?: boolean;
}

export interface StoreOutcome {
  success: true;
  filename: string;
}

export interface CompareOutcome {
  results: ComparisonReport;
}

export interface OperationError {
  error: string;
  code: ErrorCode;
}

export type OperationOutcome = StoreOutcome | CompareOutcome | OperationError;

export function isOperationError(outcome: OperationOutcome): outcome is OperationError {
  return 'error' in outcome;
}

export interface DriftServiceDependencies {
  registry: IOperationRegistry;
  store: ISnapshotStore;
  entities: IEntitySource;
  fetchers: OperationFetchers;
  engines: ComparisonEngineRegistry;
  orchestrator: IComparisonOrchestrator;
  context?: DashboardContext;
  defaultMethod?: string;
  logger?: StructuredLogger;
}

export interface IDriftService {
  coreDataOperation(request: OperationRequest): Promise<OperationOutcome>;
  listSnapshots(scope: string, operation: string): Promise<Result<string[], BaseError>>;
}

// ============================================================================
// Implementation
// ============================================================================

export class DriftService implements IDriftService {
  private readonly logger: StructuredLogger;
  private readonly defaultMethod: string;

  constructor(private readonly deps: DriftServiceDependencies) {
    this.logger = deps.logger ?? createModuleLogger('drift-service');
    this.defaultMethod = deps.defaultMethod ?? 'structural';
  }

  async coreDataOperation(request: OperationRequest): Promise<OperationOutcome> {
    const { scope, operation, task } = request;
    const logger = this.logger.withContext({ scope, operation, task });

    try {
      const result = task === OperationTask.STORE ? await this.store(request) : await this.compare(request);
      if (isErr(result)) {
        logger.error({ err: result.error }, `${task} failed for ${scope}/${operation}`);
        return { error: result.error.message, code: result.error.code };
      }
      return result.value;
    } catch (error) {
      const wrapped = wrapError(error, `Unexpected error during ${task} for ${operation}`);
      logger.error({ err: error }, wrapped.message);
      return { error: wrapped.message, code: wrapped.code };
    }
  }

  async listSnapshots(scope: string, operation: string): Promise<Result<string[], BaseError>> {
    const descriptor = this.deps.registry.getOperation(scope, operation);
    if (isErr(descriptor)) {
      return descriptor;
    }
    const scopeFolder = this.deps.registry.getScopeFolderName(scope);
    if (isErr(scopeFolder)) {
      return scopeFolder;
    }
    return this.deps.store.list(scopeFolder.value, descriptor.value.folder);
  }

  // ==========================================================================
  // Store
  // ==========================================================================

  private async store(request: OperationRequest): Promise<Result<OperationOutcome, BaseError>> {
    const descriptor = this.deps.registry.getOperation(request.scope, request.operation);
    if (isErr(descriptor)) {
      return descriptor;
    }
    const operation = descriptor.value;
    const scopeFolder = this.deps.registry.getScopeFolderName(operation.scope);
    if (isErr(scopeFolder)) {
      return scopeFolder;
    }

    const identifier =
      request.identifier ??
      (operation.scope === Scope.ORGANIZATION ? this.deps.context?.organizationId : undefined);

    const fetched = await tryCatch<Snapshot, BaseError>(
      () => this.deps.fetchers[operation.fetcher](identifier),
      (error) =>
        isBaseError(error)
          ? error
          : new FetchFailureError(identifier ?? operation.scope, `Failed to fetch ${operation.name}`, {
              cause: error instanceof Error ? error : undefined,
            })
    );
    if (isErr(fetched)) {
      return fetched;
    }

    const saved = await this.deps.store.save(scopeFolder.value, operation.folder, operation.fileName, fetched.value);
    if (isErr(saved)) {
      return saved;
    }

    this.logger.info({ scope: operation.scope, operation: operation.name, filename: saved.value }, 'Baseline stored');
    return ok<OperationOutcome>({ success: true, filename: saved.value });
  }

  // ==========================================================================
  // Compare
  // ==========================================================================

  private async compare(request: OperationRequest): Promise<Result<OperationOutcome, BaseError>> {
    const descriptor = this.deps.registry.getOperation(request.scope, request.operation);
    if (isErr(descriptor)) {
      return descriptor;
    }
    const operation = descriptor.value;

    if (!request.filename) {
      return err(new InvalidInputError('A baseline filename is required for compare', {
        scope: operation.scope,
        operation: operation.name,
      }));
    }

    const engine = this.deps.engines.resolve(request.method ?? this.defaultMethod);
    if (isErr(engine)) {
      return engine;
    }

    const scopeFolder = this.deps.registry.getScopeFolderName(operation.scope);
    if (isErr(scopeFolder)) {
      return scopeFolder;
    }
    const baseline = await this.deps.store.load(scopeFolder.value, operation.folder, request.filename);
    if (isErr(baseline)) {
      return baseline;
    }

    const results = await this.runComparison(operation, baseline.value, engine.value, request);
    return ok<OperationOutcome>({ results });
  }

  private async runComparison(
    operation: OperationDescriptor,
    baseline: Snapshot,
    engine: IComparisonEngine,
    request: OperationRequest
  ): Promise<ComparisonReport> {
    const { entities, orchestrator, fetchers } = this.deps;
    const filters = request.filters ?? {};
    const fetcher = fetchers[operation.fetcher];
    const global = request.global ?? false;

    switch (operation.scope) {
      case Scope.ORGANIZATION:
        return orchestrator.compare({
          baseline,
          entities: await entities.listOrganizations(),
          operation,
          engine,
          fetcher,
          identity: { id: (org) => org.id, name: (org) => org.name },
          filter: createOrganizationFilter(filters.organizationIds),
        });

      case Scope.NETWORK:
        return orchestrator.compare({
          baseline,
          entities: await entities.listNetworks({ global }),
          operation,
          engine,
          fetcher,
          identity: { id: (network) => network.id, name: (network) => network.name },
          filter: createNetworkFilter({ networkTags: filters.networkTags, productType: operation.productType }),
        });

      case Scope.DEVICE: {
        const networkTags = filters.networkTags ?? [];
        const networkIdToTags = networkTags.length > 0 ? await entities.networkIdToTags({ global }) : {};
        const productTypes =
          filters.productTypes && filters.productTypes.length > 0
            ? filters.productTypes
            : operation.productType !== undefined
              ? [operation.productType]
              : undefined;

        return orchestrator.compare({
          baseline,
          entities: await entities.listDevices({ global }),
          operation,
          engine,
          fetcher,
          identity: { id: (device) => device.serial, name: (device) => device.name },
          filter: createDeviceFilter({
            deviceTags: filters.deviceTags,
            deviceModels: filters.deviceModels,
            productTypes,
            networkTags,
            networkIdToTags,
          }),
        });
      }
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createDriftService(deps: DriftServiceDependencies): IDriftService {
  return new DriftService(deps);
}
