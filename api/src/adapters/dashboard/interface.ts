/**
 * Dashboard Client Interface
 * @module adapters/dashboard/interface
 *
 * Read-only access to the network-management dashboard API. Every method
 * resolves to validated JSON; paged collections are returned whole.
 */

import type { SnapshotMap } from '../../types/snapshot.js';

/**
 * Client configuration
 */
export interface DashboardClientConfig {
  /** API key sent as a bearer token */
  apiKey: string;
  /** Base URL including the API version, e.g. https://api.example.com/api/v1 */
  baseUrl: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Retries on HTTP 429 (default: 3) */
  maxRetries?: number;
  /** perPage sent to paginated endpoints (default: 1000) */
  pageSize?: number;
  /** Custom fetch implementation (for testing) */
  fetch?: typeof fetch;
  /** Delay implementation used between retries (for testing) */
  sleep?: (ms: number) => Promise<void>;
}

export interface IDashboardClient {
  /**
   * List organizations the API key can access
   */
  getOrganizations(): Promise<SnapshotMap[]>;

  getOrganization(organizationId: string): Promise<SnapshotMap>;

  /**
   * List dashboard administrators of an organization
   */
  getOrganizationAdmins(organizationId: string): Promise<SnapshotMap[]>;

  getOrganizationNetworks(organizationId: string): Promise<SnapshotMap[]>;

  getOrganizationDevices(organizationId: string): Promise<SnapshotMap[]>;

  getNetworkSettings(networkId: string): Promise<SnapshotMap>;

  getNetworkWirelessSsids(networkId: string): Promise<SnapshotMap[]>;

  /**
   * List switch ports of a device by serial
   */
  getDeviceSwitchPorts(serial: string): Promise<SnapshotMap[]>;

  getDeviceManagementInterface(serial: string): Promise<SnapshotMap>;
}
