/**
 * Shared test data and helpers
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { CLUSTER_SCHEMA, type CollectionDefinition } from '@/config/registry';
import type { ValidationContext } from '@/validation/core-types';

export const SUBNET_ID =
  '/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg-test/providers/Microsoft.Network/virtualNetworks/vnet-test/subnets/snet-nodes';

export const ENDPOINT_SUBNET_ID =
  '/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg-test/providers/Microsoft.Network/virtualNetworks/vnet-test/subnets/snet-endpoints';

export const IDENTITY_ID =
  '/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg-test/providers/Microsoft.ManagedIdentity/userAssignedIdentities/id-test';

export function privateDnsZoneId(zone: string): string {
  return `/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg-dns/providers/Microsoft.Network/privateDnsZones/${zone}`;
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function createTestContext(logger: Logger = silentLogger()): ValidationContext {
  return { logger };
}

/**
 * Smallest document the engine accepts
 */
export function minimalConfig(): Record<string, unknown> {
  return {
    name: 'aks-test',
    network: {
      node_subnet_id: SUBNET_ID,
      pod_cidr: '10.244.0.0/16',
    },
  };
}

/**
 * Canonical form of `minimalConfig()`
 */
export function minimalCanonical(): Record<string, unknown> {
  return {
    name: 'aks-test',
    location: null,
    resource_group_name: null,
    kubernetes_version: null,
    automatic_upgrade_channel: 'stable',
    private_dns_zone_id: null,
    api_server_private_dns_zone_id: null,
    image_cleaner_interval_hours: 168,
    tags: {},
    network: {
      node_subnet_id: SUBNET_ID,
      pod_cidr: '10.244.0.0/16',
      service_cidr: null,
      dns_service_ip: null,
      api_server_subnet_id: null,
      network_policy: 'cilium',
    },
    default_node_pool: {
      vm_size: 'Standard_D4d_v5',
      min_count: 3,
      max_count: 9,
      max_pods: 110,
      os_sku: 'AzureLinux',
      zones: ['1', '2', '3'],
    },
    acr: null,
    lock: null,
    managed_identities: {
      system_assigned: false,
      user_assigned_resource_ids: [],
    },
    monitor_metrics: null,
    ingress_profile: null,
    safeguard_profile: null,
    maintenance_window_auto_upgrade: null,
    maintenance_window_node_os: null,
    node_pools: {},
  };
}

export function workloadPool(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'work',
    vm_size: 'Standard_D8d_v5',
    orchestrator_version: '1.30',
    min_count: 1,
    max_count: 5,
    ...overrides,
  };
}

export function nodePoolCollection(): CollectionDefinition {
  const collection = CLUSTER_SCHEMA.collections?.node_pools;
  if (!collection) {
    throw new Error('node_pools collection is not registered');
  }
  return collection;
}
