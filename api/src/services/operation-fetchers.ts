/**
 * Operation Fetchers
 * @module services/operation-fetchers
 *
 * The fetch capability behind each catalogue operation. Fetchers strip
 * fields that change on every read so stored baselines stay comparable.
 */

import type { Snapshot, SnapshotMap } from '../types/snapshot.js';
import type { DashboardContext } from '../types/entities.js';
import type { IDashboardClient } from '../adapters/dashboard/index.js';
import { InvalidInputError } from '../errors/index.js';
import { FetcherName } from './use-cases.js';

/**
 * Fetch the live configuration of one entity; the identifier is an
 * organization id, network id or device serial depending on scope
 */
export type OperationFetcher = (identifier?: string) => Promise<Snapshot>;

export type OperationFetchers = Readonly<Record<FetcherName, OperationFetcher>>;

const VOLATILE_ADMIN_FIELDS = ['lastActive'] as const;
const ORGANIZATION_IDENTITY_FIELDS = ['id', 'name', 'url'] as const;

function omit(record: SnapshotMap, keys: readonly string[]): SnapshotMap {
  const result: SnapshotMap = {};
  for (const [key, value] of Object.entries(record)) {
    if (!keys.includes(key)) {
      result[key] = value;
    }
  }
  return result;
}

function requireIdentifier(fetcher: FetcherName, identifier: string | undefined): string {
  if (!identifier) {
    throw new InvalidInputError(`Fetcher '${fetcher}' requires an identifier`);
  }
  return identifier;
}

export function createOperationFetchers(
  client: IDashboardClient,
  context: DashboardContext = {}
): OperationFetchers {
  const organizationOf = (fetcher: FetcherName, identifier?: string): string => {
    const organizationId = identifier ?? context.organizationId;
    if (!organizationId) {
      throw new InvalidInputError(`Fetcher '${fetcher}' requires an organization id`);
    }
    return organizationId;
  };

  return {
    [FetcherName.ORGANIZATION_ADMINS]: async (identifier) => {
      const admins = await client.getOrganizationAdmins(
        organizationOf(FetcherName.ORGANIZATION_ADMINS, identifier)
      );
      return admins.map((admin) => omit(admin, VOLATILE_ADMIN_FIELDS));
    },

    [FetcherName.ORGANIZATION_SETTINGS]: async (identifier) => {
      const organization = await client.getOrganization(
        organizationOf(FetcherName.ORGANIZATION_SETTINGS, identifier)
      );
      return omit(organization, ORGANIZATION_IDENTITY_FIELDS);
    },

    [FetcherName.NETWORK_SSIDS]: async (identifier) =>
      client.getNetworkWirelessSsids(requireIdentifier(FetcherName.NETWORK_SSIDS, identifier)),

    [FetcherName.NETWORK_SETTINGS]: async (identifier) =>
      client.getNetworkSettings(requireIdentifier(FetcherName.NETWORK_SETTINGS, identifier)),

    [FetcherName.SWITCH_PORTS]: async (identifier) =>
      client.getDeviceSwitchPorts(requireIdentifier(FetcherName.SWITCH_PORTS, identifier)),

    [FetcherName.MANAGEMENT_INTERFACE]: async (identifier) =>
      client.getDeviceManagementInterface(requireIdentifier(FetcherName.MANAGEMENT_INTERFACE, identifier)),
  };
}
