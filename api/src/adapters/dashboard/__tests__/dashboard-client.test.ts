/**
 * Dashboard Client Tests
 * @module adapters/dashboard/__tests__/dashboard-client.test
 *
 * The client runs against a stubbed fetch; no request leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import { DashboardClient, parseNextLink } from '../dashboard-client.js';
import type { DashboardClientConfig } from '../interface.js';
import { DashboardApiError, DashboardTimeoutError } from '../../../errors/index.js';

// ============================================================================
// Test Helpers
// ============================================================================

const BASE_URL = 'https://api.test/api/v1';

interface RecordedRequest {
  url: string;
  headers: Headers;
}

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function createFetchStub(responses: Array<() => Response>): { fetchFn: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), headers: new Headers(init?.headers) });
    const next = responses.shift();
    if (!next) {
      throw new Error('Unexpected request');
    }
    return next();
  };
  return { fetchFn, requests };
}

function createClient(fetchFn: typeof fetch, overrides: Partial<DashboardClientConfig> = {}): {
  client: DashboardClient;
  sleeps: number[];
} {
  const sleeps: number[] = [];
  const client = new DashboardClient({
    apiKey: 'test-key',
    baseUrl: BASE_URL,
    fetch: fetchFn,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...overrides,
  });
  return { client, sleeps };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

// ============================================================================
// Tests
// ============================================================================

describe('parseNextLink', () => {
  it('returns the rel=next target', () => {
    const header = '<https://x.test/a?p=1>; rel=first, <https://x.test/a?p=2>; rel="next"';
    expect(parseNextLink(header)).toBe('https://x.test/a?p=2');
  });

  it('returns null without a next link', () => {
    expect(parseNextLink(null)).toBeNull();
    expect(parseNextLink('<https://x.test/a?p=1>; rel=prev')).toBeNull();
  });
});

describe('DashboardClient', () => {
  it('sends bearer authentication to the resource URL', async () => {
    const { fetchFn, requests } = createFetchStub([() => jsonResponse({ localStatusPageEnabled: true })]);
    const { client } = createClient(fetchFn, { baseUrl: `${BASE_URL}/` });

    await expect(client.getNetworkSettings('N1')).resolves.toEqual({ localStatusPageEnabled: true });

    expect(requests[0]?.url).toBe('https://api.test/api/v1/networks/N1/settings');
    expect(requests[0]?.headers.get('Authorization')).toBe('Bearer test-key');
    expect(requests[0]?.headers.get('Accept')).toBe('application/json');
  });

  it('follows Link headers across pages', async () => {
    const nextUrl = 'https://api.test/api/v1/organizations/O1/networks?perPage=1000&startingAfter=N1';
    const { fetchFn, requests } = createFetchStub([
      () => jsonResponse([{ id: 'N1' }], 200, { Link: `<${nextUrl}>; rel=next` }),
      () => jsonResponse([{ id: 'N2' }]),
    ]);
    const { client } = createClient(fetchFn);

    await expect(client.getOrganizationNetworks('O1')).resolves.toEqual([{ id: 'N1' }, { id: 'N2' }]);
    expect(requests.map((request) => request.url)).toEqual([
      'https://api.test/api/v1/organizations/O1/networks?perPage=1000',
      nextUrl,
    ]);
  });

  it('requests the configured page size', async () => {
    const { fetchFn, requests } = createFetchStub([() => jsonResponse([])]);
    const { client } = createClient(fetchFn, { pageSize: 50 });

    await client.getOrganizations();

    expect(requests[0]?.url).toBe('https://api.test/api/v1/organizations?perPage=50');
  });

  it('keeps only map elements of list responses', async () => {
    const { fetchFn } = createFetchStub([() => jsonResponse([{ name: 'Guest' }, 'stray', 3])]);
    const { client } = createClient(fetchFn);

    await expect(client.getNetworkWirelessSsids('N1')).resolves.toEqual([{ name: 'Guest' }]);
  });

  it('retries rate-limited requests after Retry-After seconds', async () => {
    const { fetchFn, requests } = createFetchStub([
      () => jsonResponse({ errors: ['Too many requests'] }, 429, { 'Retry-After': '2' }),
      () => jsonResponse({}, 429),
      () => jsonResponse([{ portId: '1' }]),
    ]);
    const { client, sleeps } = createClient(fetchFn);

    await expect(client.getDeviceSwitchPorts('Q2AA')).resolves.toEqual([{ portId: '1' }]);
    expect(sleeps).toEqual([2000, 1000]);
    expect(requests).toHaveLength(3);
  });

  it('discards the body of a rate-limited response before retrying', async () => {
    const limited = jsonResponse({ errors: ['Too many requests'] }, 429, { 'Retry-After': '0' });
    const body = limited.body;
    if (!body) {
      throw new Error('Expected a response body');
    }
    const cancel = vi.spyOn(body, 'cancel');
    const { fetchFn } = createFetchStub([() => limited, () => jsonResponse([])]);
    const { client } = createClient(fetchFn);

    await expect(client.getOrganizationAdmins('O1')).resolves.toEqual([]);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('gives up once retries are exhausted', async () => {
    const { fetchFn } = createFetchStub([
      () => jsonResponse({}, 429, { 'Retry-After': '0' }),
      () => jsonResponse({}, 429, { 'Retry-After': '0' }),
    ]);
    const { client } = createClient(fetchFn, { maxRetries: 1 });

    const error = await captureError(client.getOrganizationAdmins('O1'));

    expect(error).toBeInstanceOf(DashboardApiError);
    expect(error instanceof DashboardApiError && error.httpStatus).toBe(429);
    expect(error instanceof DashboardApiError && error.code).toBe('DASHBOARD_RATE_LIMITED');
  });

  it('reports the errors listed in a failure body', async () => {
    const { fetchFn } = createFetchStub([() => jsonResponse({ errors: ['Not found', 'Check the id'] }, 404)]);
    const { client } = createClient(fetchFn);

    const error = await captureError(client.getOrganization('O1'));

    expect(error instanceof DashboardApiError && error.message).toBe(
      'Dashboard request failed with status 404: Not found; Check the id'
    );
    expect(error instanceof DashboardApiError && error.httpStatus).toBe(404);
  });

  it('falls back to the status when the failure body is not JSON', async () => {
    const { fetchFn } = createFetchStub([() => new Response('upstream unavailable', { status: 502 })]);
    const { client } = createClient(fetchFn);

    await expect(client.getOrganization('O1')).rejects.toThrow('Dashboard request failed with status 502');
  });

  it('rejects an object response where a list is expected', async () => {
    const { fetchFn } = createFetchStub([() => jsonResponse({ name: 'Guest' })]);
    const { client } = createClient(fetchFn);

    await expect(client.getNetworkWirelessSsids('N1')).rejects.toThrow(
      'Expected an array from /networks/N1/wireless/ssids'
    );
  });

  it('rejects an empty response where an object is expected', async () => {
    const { fetchFn } = createFetchStub([() => new Response(null, { status: 204 })]);
    const { client } = createClient(fetchFn);

    await expect(client.getDeviceManagementInterface('Q2AA')).rejects.toThrow(
      'Expected an object from /devices/Q2AA/managementInterface'
    );
  });

  it('wraps transport failures', async () => {
    const fetchFn: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const { client } = createClient(fetchFn);

    const error = await captureError(client.getNetworkSettings('N1'));

    expect(error).toBeInstanceOf(DashboardApiError);
    expect(error instanceof DashboardApiError && error.message).toBe('Dashboard request failed: fetch failed');
    expect(error instanceof DashboardApiError && error.httpStatus).toBeUndefined();
  });

  it('times out slow requests', async () => {
    const fetchFn: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const abort = new Error('The operation was aborted');
          abort.name = 'AbortError';
          reject(abort);
        });
      });
    const { client } = createClient(fetchFn, { timeoutMs: 10 });

    await expect(client.getNetworkSettings('N1')).rejects.toBeInstanceOf(DashboardTimeoutError);
  });
});
