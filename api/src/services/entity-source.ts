/**
 * Entity Source
 * @module services/entity-source
 *
 * Lists organizations, networks and devices from the dashboard, either
 * from the context organization or across every accessible organization.
 */

import {
  type SnapshotMap,
  isSnapshotSequence,
} from '../types/snapshot.js';
import {
  type DashboardContext,
  type DeviceRecord,
  type NetworkRecord,
  type OrganizationRecord,
  Scope,
  UNKNOWN_ENTITY_NAME,
} from '../types/entities.js';
import type { IDashboardClient } from '../adapters/dashboard/index.js';
import { InvalidInputError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ListEntitiesOptions {
  /** Keep only the documented keys of each entity */
  simplified?: boolean;
  /** Collect networks and devices across all organizations */
  global?: boolean;
}

export interface IEntitySource {
  /**
   * Raw (or key-projected) entity maps for a scope
   */
  listEntities(scope: Scope, options?: ListEntitiesOptions): Promise<SnapshotMap[]>;
  listOrganizations(): Promise<OrganizationRecord[]>;
  listNetworks(options?: Pick<ListEntitiesOptions, 'global'>): Promise<NetworkRecord[]>;
  listDevices(options?: Pick<ListEntitiesOptions, 'global'>): Promise<DeviceRecord[]>;
  /**
   * Network id -> network tags, used by the device filter
   */
  networkIdToTags(options?: Pick<ListEntitiesOptions, 'global'>): Promise<Record<string, string[]>>;
}

export interface EntitySourceOptions {
  readonly logger?: StructuredLogger;
}

export const SIMPLIFIED_KEYS: Readonly<Record<Scope, readonly string[]>> = {
  [Scope.ORGANIZATION]: ['id', 'name'],
  [Scope.NETWORK]: ['id', 'name', 'tags', 'productTypes'],
  [Scope.DEVICE]: ['serial', 'name', 'tags', 'productType', 'model', 'networkId'],
};

// ============================================================================
// Field Readers
// ============================================================================

function readString(record: SnapshotMap, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  return typeof value === 'number' ? String(value) : null;
}

function readStringList(record: SnapshotMap, key: string): string[] {
  const value = record[key];
  return isSnapshotSequence(value)
    ? value.filter((entry): entry is string => typeof entry === 'string')
    : [];
}

function project(record: SnapshotMap, keys: readonly string[]): SnapshotMap {
  const projected: SnapshotMap = {};
  for (const key of keys) {
    const value = record[key];
    if (Object.hasOwn(record, key) && value !== undefined) {
      projected[key] = value;
    }
  }
  return projected;
}

export function toOrganizationRecord(raw: SnapshotMap): OrganizationRecord {
  return {
    id: readString(raw, 'id'),
    name: readString(raw, 'name') ?? UNKNOWN_ENTITY_NAME,
  };
}

export function toNetworkRecord(raw: SnapshotMap): NetworkRecord {
  return {
    id: readString(raw, 'id'),
    name: readString(raw, 'name') ?? UNKNOWN_ENTITY_NAME,
    tags: readStringList(raw, 'tags'),
    productTypes: readStringList(raw, 'productTypes'),
  };
}

export function toDeviceRecord(raw: SnapshotMap): DeviceRecord {
  return {
    serial: readString(raw, 'serial'),
    name: readString(raw, 'name') ?? UNKNOWN_ENTITY_NAME,
    tags: readStringList(raw, 'tags'),
    productType: readString(raw, 'productType'),
    model: readString(raw, 'model'),
    networkId: readString(raw, 'networkId'),
  };
}

// ============================================================================
// Implementation
// ============================================================================

export class EntitySource implements IEntitySource {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly client: IDashboardClient,
    private readonly context: DashboardContext = {},
    options: EntitySourceOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('entity-source');
  }

  async listEntities(scope: Scope, options: ListEntitiesOptions = {}): Promise<SnapshotMap[]> {
    const raw = await this.fetchRaw(scope, options.global ?? false);
    return options.simplified ? raw.map((record) => project(record, SIMPLIFIED_KEYS[scope])) : raw;
  }

  async listOrganizations(): Promise<OrganizationRecord[]> {
    return (await this.fetchRaw(Scope.ORGANIZATION, true)).map(toOrganizationRecord);
  }

  async listNetworks(options: Pick<ListEntitiesOptions, 'global'> = {}): Promise<NetworkRecord[]> {
    return (await this.fetchRaw(Scope.NETWORK, options.global ?? false)).map(toNetworkRecord);
  }

  async listDevices(options: Pick<ListEntitiesOptions, 'global'> = {}): Promise<DeviceRecord[]> {
    return (await this.fetchRaw(Scope.DEVICE, options.global ?? false)).map(toDeviceRecord);
  }

  async networkIdToTags(options: Pick<ListEntitiesOptions, 'global'> = {}): Promise<Record<string, string[]>> {
    const mapping: Record<string, string[]> = {};
    for (const network of await this.listNetworks(options)) {
      if (network.id !== null) {
        mapping[network.id] = network.tags;
      }
    }
    return mapping;
  }

  private async fetchRaw(scope: Scope, global: boolean): Promise<SnapshotMap[]> {
    if (scope === Scope.ORGANIZATION) {
      return this.client.getOrganizations();
    }

    const fetchForOrganization = (organizationId: string): Promise<SnapshotMap[]> =>
      scope === Scope.NETWORK
        ? this.client.getOrganizationNetworks(organizationId)
        : this.client.getOrganizationDevices(organizationId);

    if (!global) {
      const organizationId = this.context.organizationId;
      if (!organizationId) {
        throw new InvalidInputError(`Organization id is not set; cannot list ${scope} entities`, { scope });
      }
      this.logger.info({ scope, organizationId }, 'Listing entities for organization');
      return fetchForOrganization(organizationId);
    }

    this.logger.info({ scope }, 'Listing entities across all organizations');
    const entities: SnapshotMap[] = [];
    for (const organization of (await this.client.getOrganizations()).map(toOrganizationRecord)) {
      if (organization.id === null) {
        continue;
      }
      entities.push(...(await fetchForOrganization(organization.id)));
    }
    return entities;
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createEntitySource(
  client: IDashboardClient,
  context?: DashboardContext,
  options?: EntitySourceOptions
): IEntitySource {
  return new EntitySource(client, context, options);
}
