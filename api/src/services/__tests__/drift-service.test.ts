/**
 * Drift Service Tests
 * @module services/__tests__/drift-service.test
 *
 * Store and compare flows wired with real engines and registry over a
 * mocked dashboard client and an in-memory snapshot store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createDriftService, isOperationError, type IDriftService } from '../drift-service.js';
import { createOperationRegistry } from '../operation-registry.js';
import { createOperationFetchers } from '../operation-fetchers.js';
import { createEntitySource } from '../entity-source.js';
import { createComparisonOrchestrator, isEntityFailure } from '../comparison-orchestrator.js';
import { createDefaultEngineRegistry } from '../../diff/comparison-engine.js';
import { DashboardApiError } from '../../errors/index.js';
import { isErr, ok } from '../../utils/result.js';
import type { DashboardContext } from '../../types/entities.js';
import {
  InMemorySnapshotStore,
  createMockDashboardClient,
  type MockDashboardClient,
} from '../../../tests/mocks/index.js';
import {
  buildDevice,
  buildNetwork,
  buildOrganization,
  buildSsid,
  buildSwitchPort,
} from '../../../tests/factories/index.js';

// ============================================================================
// Test Setup
// ============================================================================

function buildService(
  client: MockDashboardClient,
  store: InMemorySnapshotStore,
  context: DashboardContext = { organizationId: 'O_1' }
): IDriftService {
  return createDriftService({
    registry: createOperationRegistry(),
    store,
    entities: createEntitySource(client, context),
    fetchers: createOperationFetchers(client, context),
    engines: createDefaultEngineRegistry(),
    orchestrator: createComparisonOrchestrator(),
    context,
  });
}

describe('DriftService', () => {
  let client: MockDashboardClient;
  let store: InMemorySnapshotStore;
  let service: IDriftService;

  beforeEach(() => {
    client = createMockDashboardClient();
    store = new InMemorySnapshotStore();
    service = buildService(client, store);
  });

  // ==========================================================================
  // Store
  // ==========================================================================

  describe('store', () => {
    it('saves the fetched snapshot under a timestamped name', async () => {
      client.getNetworkWirelessSsids.mockResolvedValue([buildSsid('Guest')]);

      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'store',
        identifier: 'N_1',
      });

      expect(outcome).toEqual({ success: true, filename: 'getNetworkWirelessSsids-2024-01-02_03-04-05.json' });
      expect(client.getNetworkWirelessSsids).toHaveBeenCalledWith('N_1');
      expect(store.files.get('Network_config/network_ssids/getNetworkWirelessSsids-2024-01-02_03-04-05.json')).toEqual([
        buildSsid('Guest'),
      ]);
    });

    it('defaults to the context organization for organization operations', async () => {
      await service.coreDataOperation({
        scope: 'organization_level',
        operation: 'organization_admins',
        task: 'store',
      });

      expect(client.getOrganizationAdmins).toHaveBeenCalledWith('O_1');
    });

    it('reports an unknown operation', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'bogus',
        task: 'store',
      });

      expect(outcome).toEqual({
        error: "Unknown operation 'bogus' for scope 'network_level'",
        code: 'UNKNOWN_OPERATION',
      });
    });

    it('passes dashboard errors through', async () => {
      client.getNetworkSettings.mockRejectedValue(
        new DashboardApiError('Dashboard request failed with status 500', 500)
      );

      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_settings',
        task: 'store',
        identifier: 'N_1',
      });

      expect(outcome).toEqual({ error: 'Dashboard request failed with status 500', code: 'DASHBOARD_API_ERROR' });
      expect(store.files.size).toBe(0);
    });

    it('wraps other fetch failures', async () => {
      client.getNetworkSettings.mockRejectedValue(new Error('socket hang up'));

      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_settings',
        task: 'store',
        identifier: 'N_1',
      });

      expect(outcome).toEqual({ error: 'Failed to fetch network_settings', code: 'FETCH_FAILURE' });
    });

    it('reports a missing identifier', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'device_level',
        operation: 'switchport_on_switch',
        task: 'store',
      });

      expect(outcome).toEqual({
        error: "Fetcher 'switchPorts' requires an identifier",
        code: 'INVALID_INPUT',
      });
    });
  });

  // ==========================================================================
  // Compare
  // ==========================================================================

  describe('compare', () => {
    beforeEach(() => {
      store.seed('Network_config', 'network_ssids', 'base.json', [buildSsid('Guest')]);
      client.getOrganizationNetworks.mockResolvedValue([
        buildNetwork({ id: 'N_1', name: 'HQ', tags: ['prod'] }),
        buildNetwork({ id: 'N_2', name: 'Lab', tags: ['lab'] }),
        buildNetwork({ id: 'N_3', name: 'Wired', tags: ['prod'], productTypes: ['switch'] }),
      ]);
      client.getNetworkWirelessSsids.mockImplementation(async (networkId) =>
        networkId === 'N_2' ? [buildSsid('Guest', { vlanId: 20 })] : [buildSsid('Guest')]
      );
    });

    it('compares every network carrying the operation product type', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'compare',
        filename: 'base.json',
      });

      expect(isOperationError(outcome)).toBe(false);
      if (isOperationError(outcome) || !('results' in outcome)) {
        return;
      }

      expect(Object.keys(outcome.results)).toEqual(['HQ', 'Lab']);
      const lab = outcome.results['Lab'];
      expect(lab && !isEntityFailure(lab) && lab.relevant_changes).toEqual([
        {
          item_id: 'Guest',
          status: 'changed',
          changes: [{ field: 'vlanId', reference_value: 10, current_value: 20 }],
        },
      ]);
    });

    it('applies network tag filters', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'compare',
        filename: 'base.json',
        filters: { networkTags: ['prod'] },
      });

      expect('results' in outcome && Object.keys(outcome.results)).toEqual(['HQ']);
      expect(client.getNetworkWirelessSsids).toHaveBeenCalledTimes(1);
    });

    it('uses the flat engine when asked', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'compare',
        filename: 'base.json',
        method: 'flat',
      });

      const lab = 'results' in outcome ? outcome.results['Lab'] : undefined;
      expect(lab && !isEntityFailure(lab) && lab.relevant_changes).toEqual([
        {
          item_id: 'Guest',
          status: 'changed',
          changes: [{ field: 'vlanId', reference_value: 10, current_value: 20 }],
        },
      ]);
    });

    it('requires a baseline filename', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'compare',
      });

      expect(outcome).toEqual({ error: 'A baseline filename is required for compare', code: 'INVALID_INPUT' });
    });

    it('reports a missing baseline', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'compare',
        filename: 'missing.json',
      });

      expect(outcome).toEqual({
        error: 'Snapshot not found: Network_config/network_ssids/missing.json',
        code: 'SNAPSHOT_NOT_FOUND',
      });
    });

    it('reports an unsupported method', async () => {
      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'compare',
        filename: 'base.json',
        method: 'fuzzy',
      });

      expect(outcome).toEqual({ error: 'Unsupported comparison method: fuzzy', code: 'UNSUPPORTED_ENGINE' });
    });

    it('turns unexpected failures into an error outcome', async () => {
      client.getOrganizationNetworks.mockRejectedValue(new Error('socket hang up'));

      const outcome = await service.coreDataOperation({
        scope: 'network_level',
        operation: 'network_ssids',
        task: 'compare',
        filename: 'base.json',
      });

      expect(outcome).toEqual({
        error: 'Unexpected error during compare for network_ssids',
        code: 'INTERNAL_ERROR',
      });
    });

    it('filters organizations by id', async () => {
      store.seed('Organization_config', 'organization_admins', 'admins.json', [
        { email: 'a@example.test', orgAccess: 'full' },
      ]);
      client.getOrganizations.mockResolvedValue([
        buildOrganization({ id: 'O_1', name: 'Main Org' }),
        buildOrganization({ id: 'O_2', name: 'Other' }),
      ]);
      client.getOrganizationAdmins.mockResolvedValue([
        { email: 'a@example.test', orgAccess: 'read-only', lastActive: 1700000000 },
      ]);

      const outcome = await service.coreDataOperation({
        scope: 'organization_level',
        operation: 'organization_admins',
        task: 'compare',
        filename: 'admins.json',
        filters: { organizationIds: ['O_2'] },
      });

      expect(client.getOrganizationAdmins).toHaveBeenCalledWith('O_2');
      const other = 'results' in outcome ? outcome.results['Other'] : undefined;
      expect(other && !isEntityFailure(other) && other.relevant_changes).toEqual([
        {
          item_id: 'a@example.test',
          status: 'changed',
          changes: [{ field: 'orgAccess', reference_value: 'full', current_value: 'read-only' }],
        },
      ]);
    });

    it('selects devices by operation product type and network tags', async () => {
      store.seed('Device_config', 'switchport_on_switch', 'ports.json', [buildSwitchPort('1')]);
      client.getOrganizationNetworks.mockResolvedValue([
        buildNetwork({ id: 'N_1', tags: ['prod'] }),
        buildNetwork({ id: 'N_2', tags: ['lab'] }),
      ]);
      client.getOrganizationDevices.mockResolvedValue([
        buildDevice({ serial: 'S1', name: 'sw1', networkId: 'N_1' }),
        buildDevice({ serial: 'S2', name: 'sw2', networkId: 'N_2' }),
        buildDevice({ serial: 'A1', name: 'mx', productType: 'appliance', model: 'MX68', networkId: 'N_1' }),
      ]);
      client.getDeviceSwitchPorts.mockResolvedValue([buildSwitchPort('1')]);

      const outcome = await service.coreDataOperation({
        scope: 'device_level',
        operation: 'switchport_on_switch',
        task: 'compare',
        filename: 'ports.json',
        filters: { networkTags: ['prod'] },
      });

      expect('results' in outcome && Object.keys(outcome.results)).toEqual(['sw1']);
      expect(client.getDeviceSwitchPorts).toHaveBeenCalledTimes(1);
      expect(client.getDeviceSwitchPorts).toHaveBeenCalledWith('S1');
    });
  });

  // ==========================================================================
  // Listing
  // ==========================================================================

  describe('listSnapshots', () => {
    it('lists stored baselines of an operation', async () => {
      store
        .seed('Network_config', 'network_ssids', 'b.json', [])
        .seed('Network_config', 'network_ssids', 'a.json', [])
        .seed('Network_config', 'network_settings', 'c.json', {});

      await expect(service.listSnapshots('network_level', 'network_ssids')).resolves.toEqual(ok(['a.json', 'b.json']));
    });

    it('rejects an unknown scope', async () => {
      const result = await service.listSnapshots('galaxy_level', 'network_ssids');

      expect(isErr(result) && result.error.code).toBe('UNKNOWN_SCOPE');
    });
  });
});
