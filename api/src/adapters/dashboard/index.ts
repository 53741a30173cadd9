/**
 * Dashboard Adapter
 * @module adapters/dashboard
 */

export { DashboardClient, createDashboardClient, parseNextLink } from './dashboard-client.js';
export type { DashboardClientConfig, IDashboardClient } from './interface.js';
