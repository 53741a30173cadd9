/**
 * Dashboard API Client
 * @module adapters/dashboard/dashboard-client
 *
 * fetch-based client for the dashboard REST API with bearer
 * authentication, Link-header paging and HTTP 429 retries.
 *
 * @example
 * ```typescript
 * const client = createDashboardClient({
 *   apiKey: 'your-api-key',
 *   baseUrl: 'https://api.meraki.com/api/v1',
 * });
 * const networks = await client.getOrganizationNetworks('123456');
 * ```
 */

import { type Snapshot, type SnapshotMap, isSnapshot, isSnapshotMap, isSnapshotSequence } from '../../types/snapshot.js';
import { DashboardApiError, DashboardTimeoutError } from '../../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../../logging/index.js';
import type { DashboardClientConfig, IDashboardClient } from './interface.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_PAGE_SIZE = 1000;
const DEFAULT_RETRY_AFTER_SECONDS = 1;

type QueryParams = Record<string, string | number | undefined>;

interface DashboardResponse {
  body: Snapshot;
  nextUrl: string | null;
}

// ============================================================================
// Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Extract the rel=next target from a Link header
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) {
    return null;
  }

  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/.exec(part.trim());
    if (match && match[2] === 'next' && match[1]) {
      return match[1];
    }
  }
  return null;
}

function parseRetryAfter(header: string | null): number {
  const seconds = header === null ? Number.NaN : Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

// ============================================================================
// Client Implementation
// ============================================================================

export class DashboardClient implements IDashboardClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly pageSize: number;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly config: DashboardClientConfig,
    logger?: StructuredLogger
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.fetchFn = config.fetch ?? globalThis.fetch;
    this.sleepFn = config.sleep ?? sleep;
    this.logger = logger ?? createModuleLogger('dashboard-client');
  }

  // ==========================================================================
  // Organizations
  // ==========================================================================

  async getOrganizations(): Promise<SnapshotMap[]> {
    return this.getPaged('/organizations');
  }

  async getOrganization(organizationId: string): Promise<SnapshotMap> {
    return this.getObject(`/organizations/${encodeURIComponent(organizationId)}`);
  }

  async getOrganizationAdmins(organizationId: string): Promise<SnapshotMap[]> {
    return this.getList(`/organizations/${encodeURIComponent(organizationId)}/admins`);
  }

  async getOrganizationNetworks(organizationId: string): Promise<SnapshotMap[]> {
    return this.getPaged(`/organizations/${encodeURIComponent(organizationId)}/networks`);
  }

  async getOrganizationDevices(organizationId: string): Promise<SnapshotMap[]> {
    return this.getPaged(`/organizations/${encodeURIComponent(organizationId)}/devices`);
  }

  // ==========================================================================
  // Networks
  // ==========================================================================

  async getNetworkSettings(networkId: string): Promise<SnapshotMap> {
    return this.getObject(`/networks/${encodeURIComponent(networkId)}/settings`);
  }

  async getNetworkWirelessSsids(networkId: string): Promise<SnapshotMap[]> {
    return this.getList(`/networks/${encodeURIComponent(networkId)}/wireless/ssids`);
  }

  // ==========================================================================
  // Devices
  // ==========================================================================

  async getDeviceSwitchPorts(serial: string): Promise<SnapshotMap[]> {
    return this.getList(`/devices/${encodeURIComponent(serial)}/switch/ports`);
  }

  async getDeviceManagementInterface(serial: string): Promise<SnapshotMap> {
    return this.getObject(`/devices/${encodeURIComponent(serial)}/managementInterface`);
  }

  // ==========================================================================
  // Request Plumbing
  // ==========================================================================

  private async getObject(path: string): Promise<SnapshotMap> {
    const { body } = await this.request(this.buildUrl(path));
    if (!isSnapshotMap(body)) {
      throw new DashboardApiError(`Expected an object from ${path}`);
    }
    return body;
  }

  private async getList(path: string): Promise<SnapshotMap[]> {
    const { body } = await this.request(this.buildUrl(path));
    return this.expectMapList(body, path);
  }

  /**
   * Follow rel=next links until the collection is exhausted
   */
  private async getPaged(path: string): Promise<SnapshotMap[]> {
    const items: SnapshotMap[] = [];
    let url: string | null = this.buildUrl(path, { perPage: this.pageSize });
    let pages = 0;

    while (url !== null) {
      const response: DashboardResponse = await this.request(url);
      items.push(...this.expectMapList(response.body, path));
      url = response.nextUrl;
      pages++;
    }

    this.logger.debug({ path, pages, count: items.length }, 'Fetched paged collection');
    return items;
  }

  private expectMapList(body: Snapshot, path: string): SnapshotMap[] {
    if (!isSnapshotSequence(body)) {
      throw new DashboardApiError(`Expected an array from ${path}`);
    }
    return body.filter(isSnapshotMap);
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  private buildHeaders(): Headers {
    return new Headers({
      Accept: 'application/json',
      Authorization: `Bearer ${this.config.apiKey}`,
    });
  }

  /**
   * Execute a GET request, retrying rate-limited responses
   */
  private async request(url: string): Promise<DashboardResponse> {
    for (let attempt = 0; ; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
      const startedAt = Date.now();

      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: 'GET',
          headers: this.buildHeaders(),
          signal: controller.signal,
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw new DashboardTimeoutError(url, this.timeoutMs);
        }
        throw new DashboardApiError(
          `Dashboard request failed: ${error instanceof Error ? error.message : String(error)}`,
          undefined,
          { cause: error instanceof Error ? error : undefined, details: { url } }
        );
      } finally {
        clearTimeout(timeoutId);
      }
      this.logger.performanceMetric('dashboard.request', Date.now() - startedAt, {
        url,
        status: response.status,
        attempt,
      });

      if (response.status === 429 && attempt < this.maxRetries) {
        const waitSeconds = parseRetryAfter(response.headers.get('Retry-After'));
        this.logger.warn({ url, attempt: attempt + 1, waitSeconds }, 'Rate limited by dashboard API, retrying');
        // Release the connection before waiting
        await response.body?.cancel();
        await this.sleepFn(waitSeconds * 1000);
        continue;
      }

      if (!response.ok) {
        throw new DashboardApiError(await this.describeFailure(response), response.status, {
          details: { url },
        });
      }

      return {
        body: await this.readJson(response, url),
        nextUrl: parseNextLink(response.headers.get('Link')),
      };
    }
  }

  private async readJson(response: Response, url: string): Promise<Snapshot> {
    if (response.status === 204) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (error) {
      throw new DashboardApiError('Dashboard returned malformed JSON', response.status, {
        cause: error instanceof Error ? error : undefined,
        details: { url },
      });
    }

    if (!isSnapshot(parsed)) {
      throw new DashboardApiError('Dashboard returned a non-JSON value', response.status, {
        details: { url },
      });
    }
    return parsed;
  }

  /**
   * Error message from the {"errors": [...]} body, or the status line
   */
  private async describeFailure(response: Response): Promise<string> {
    const fallback = `Dashboard request failed with status ${response.status}`;
    try {
      const body: unknown = await response.json();
      if (isSnapshot(body) && isSnapshotMap(body)) {
        const errors = body['errors'];
        if (isSnapshotSequence(errors) && errors.length > 0) {
          return `${fallback}: ${errors.map(String).join('; ')}`;
        }
      }
    } catch {
      return fallback;
    }
    return fallback;
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createDashboardClient(
  config: DashboardClientConfig,
  logger?: StructuredLogger
): IDashboardClient {
  return new DashboardClient(config, logger);
}
