/**
 * Services Module Exports
 * @module services
 */

export { USE_CASES, FetcherName } from './use-cases.js';
export type { OperationDefinition, ScopeDefinition } from './use-cases.js';

export { OperationRegistry, createOperationRegistry } from './operation-registry.js';
export type { IOperationRegistry, OperationDescriptor, ScopeDescriptor } from './operation-registry.js';

export { createOperationFetchers } from './operation-fetchers.js';
export type { OperationFetcher, OperationFetchers } from './operation-fetchers.js';

export {
  EntitySource,
  createEntitySource,
  SIMPLIFIED_KEYS,
  toDeviceRecord,
  toNetworkRecord,
  toOrganizationRecord,
} from './entity-source.js';
export type { IEntitySource, ListEntitiesOptions, EntitySourceOptions } from './entity-source.js';

export { createOrganizationFilter, createNetworkFilter, createDeviceFilter } from './filters.js';
export type { EntityFilter, ComparisonFilters, NetworkFilterOptions, DeviceFilterOptions } from './filters.js';

export {
  ComparisonOrchestrator,
  createComparisonOrchestrator,
  isEntityFailure,
} from './comparison-orchestrator.js';
export type {
  ComparisonReport,
  ComparisonRequest,
  EntityFailure,
  EntityIdentity,
  EntityOutcome,
  IComparisonOrchestrator,
} from './comparison-orchestrator.js';

export { DriftService, createDriftService, OperationTask, isOperationError } from './drift-service.js';
export type {
  CompareOutcome,
  DriftServiceDependencies,
  IDriftService,
  OperationError,
  OperationOutcome,
  OperationRequest,
  StoreOutcome,
} from './drift-service.js';
