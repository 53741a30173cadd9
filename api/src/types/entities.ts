/**
 * Entity Type Definitions
 * @module types/entities
 *
 * Scopes and the simplified entity records listed per scope.
 */

// ============================================================================
// Scopes
// ============================================================================

export const Scope = {
  ORGANIZATION: 'organization_level',
  NETWORK: 'network_level',
  DEVICE: 'device_level',
} as const;

export type Scope = typeof Scope[keyof typeof Scope];

export const ALL_SCOPES: readonly Scope[] = [Scope.ORGANIZATION, Scope.NETWORK, Scope.DEVICE];

export function isScope(value: string): value is Scope {
  return ALL_SCOPES.some((scope) => scope === value);
}

// ============================================================================
// Entity Records
// ============================================================================

/**
 * Fallback display name for entities that have none
 */
export const UNKNOWN_ENTITY_NAME = 'Unknown';

export interface OrganizationRecord {
  id: string | null;
  name: string;
}

export interface NetworkRecord {
  id: string | null;
  name: string;
  tags: string[];
  productTypes: string[];
}

export interface DeviceRecord {
  serial: string | null;
  name: string;
  tags: string[];
  productType: string | null;
  model: string | null;
  networkId: string | null;
}

export interface EntityRecordByScope {
  organization_level: OrganizationRecord;
  network_level: NetworkRecord;
  device_level: DeviceRecord;
}

export type EntityRecord = EntityRecordByScope[Scope];

/**
 * Explicit context replacing process-wide organization state
 */
export interface DashboardContext {
  /** Organization the request operates on */
  organizationId?: string;
}
