/**
 * Operation Catalogue
 * @module services/use-cases
 *
 * The named operations that can be stored and compared, per scope.
 */

import { Scope } from '../types/entities.js';

// ============================================================================
// Fetcher Names
// ============================================================================

/**
 * Tagged names of the fetch capabilities in OperationFetchers
 */
export const FetcherName = {
  ORGANIZATION_ADMINS: 'organizationAdmins',
  ORGANIZATION_SETTINGS: 'organizationSettings',
  NETWORK_SSIDS: 'networkSsids',
  NETWORK_SETTINGS: 'networkSettings',
  SWITCH_PORTS: 'switchPorts',
  MANAGEMENT_INTERFACE: 'managementInterface',
} as const;

export type FetcherName = typeof FetcherName[keyof typeof FetcherName];

// ============================================================================
// Catalogue Shape
// ============================================================================

export interface OperationDefinition {
  /** Sub-folder of the scope folder holding saved snapshots */
  readonly folder: string;
  readonly fileName: string;
  readonly fetcher: FetcherName;
  /** Field identifying elements of list-shaped snapshots */
  readonly groupingKey?: string;
  /** Product type an entity must carry for the operation to apply */
  readonly productType?: string;
}

export interface ScopeDefinition {
  readonly folder: string;
  readonly operations: Readonly<Record<string, OperationDefinition>>;
}

export const USE_CASES = {
  [Scope.ORGANIZATION]: {
    folder: 'Organization_config',
    operations: {
      organization_admins: {
        folder: 'organization_admins',
        groupingKey: 'email',
        fileName: 'getOrganizationAdmins',
        fetcher: FetcherName.ORGANIZATION_ADMINS,
      },
      organization_settings: {
        folder: 'organization_settings',
        fileName: 'getOrganizationSettings',
        fetcher: FetcherName.ORGANIZATION_SETTINGS,
      },
    },
  },
  [Scope.NETWORK]: {
    folder: 'Network_config',
    operations: {
      network_ssids: {
        folder: 'network_ssids',
        productType: 'wireless',
        groupingKey: 'name',
        fileName: 'getNetworkWirelessSsids',
        fetcher: FetcherName.NETWORK_SSIDS,
      },
      network_settings: {
        folder: 'network_settings',
        fileName: 'getNetworkSettings',
        fetcher: FetcherName.NETWORK_SETTINGS,
      },
    },
  },
  [Scope.DEVICE]: {
    folder: 'Device_config',
    operations: {
      switchport_on_switch: {
        folder: 'switchport_on_switch',
        productType: 'switch',
        groupingKey: 'portId',
        fileName: 'getDeviceSwitchPorts',
        fetcher: FetcherName.SWITCH_PORTS,
      },
      appliance_management_interface: {
        folder: 'appliance_management_interface',
        productType: 'appliance',
        fileName: 'getDeviceManagementInterface',
        fetcher: FetcherName.MANAGEMENT_INTERFACE,
      },
    },
  },
} as const satisfies Record<Scope, ScopeDefinition>;
