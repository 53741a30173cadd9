/**
 * Entity Filters
 * @module services/filters
 *
 * Predicates deciding which entities take part in a comparison. An empty
 * or absent allow-list never filters.
 */

import type { DeviceRecord, NetworkRecord, OrganizationRecord } from '../types/entities.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';

export type EntityFilter<E> = (entity: E) => boolean;

/**
 * Filter criteria accepted by a comparison request
 */
export interface ComparisonFilters {
  organizationIds?: string[];
  networkTags?: string[];
  deviceTags?: string[];
  deviceModels?: string[];
  productTypes?: string[];
}

export interface NetworkFilterOptions {
  networkTags?: readonly string[];
  /** Product type the operation requires */
  productType?: string;
}

export interface DeviceFilterOptions {
  deviceTags?: readonly string[];
  deviceModels?: readonly string[];
  productTypes?: readonly string[];
  networkTags?: readonly string[];
  networkIdToTags?: Readonly<Record<string, readonly string[]>>;
}

let filterLogger: StructuredLogger | undefined;

function logger(): StructuredLogger {
  filterLogger ??= createModuleLogger('filters');
  return filterLogger;
}

function active(list: readonly string[] | undefined): list is readonly string[] {
  return list !== undefined && list.length > 0;
}

function intersects(allowed: readonly string[], values: readonly string[]): boolean {
  return allowed.some((value) => values.includes(value));
}

// ============================================================================
// Filters
// ============================================================================

export function createOrganizationFilter(organizationIds?: readonly string[]): EntityFilter<OrganizationRecord> {
  return (organization) => {
    if (active(organizationIds) && (organization.id === null || !organizationIds.includes(organization.id))) {
      logger().debug({ entity: organization.name }, 'Organization not in id filter');
      return false;
    }
    return true;
  };
}

export function createNetworkFilter(options: NetworkFilterOptions = {}): EntityFilter<NetworkRecord> {
  const { networkTags, productType } = options;

  return (network) => {
    if (active(networkTags) && !intersects(networkTags, network.tags)) {
      logger().debug({ entity: network.name }, 'Network excluded by tag filter');
      return false;
    }
    if (productType !== undefined && !network.productTypes.includes(productType)) {
      logger().debug({ entity: network.name, productType }, 'Network lacks product type');
      return false;
    }
    return true;
  };
}

export function createDeviceFilter(options: DeviceFilterOptions = {}): EntityFilter<DeviceRecord> {
  const { deviceTags, deviceModels, productTypes, networkTags, networkIdToTags = {} } = options;

  return (device) => {
    if (active(deviceTags) && !intersects(deviceTags, device.tags)) {
      logger().debug({ entity: device.name }, 'Device excluded by tag filter');
      return false;
    }
    if (active(deviceModels) && (device.model === null || !deviceModels.includes(device.model))) {
      logger().debug({ entity: device.name }, 'Device excluded by model filter');
      return false;
    }
    if (active(productTypes) && (device.productType === null || !productTypes.includes(device.productType))) {
      logger().debug({ entity: device.name }, 'Device excluded by product type filter');
      return false;
    }
    if (active(networkTags)) {
      const tags = device.networkId === null ? [] : networkIdToTags[device.networkId] ?? [];
      if (!intersects(networkTags, tags)) {
        logger().debug({ entity: device.name, networkId: device.networkId }, 'Device excluded by network tag filter');
        return false;
      }
    }
    return true;
  };
}
