/**
 * Canonical output contract
 *
 * Shape of a fully normalized ClusterConfig. Every declared field is present;
 * optional values are `null`. The Output Assembler parses its result through
 * this schema, so the exported types are exactly what callers receive.
 *
 * Value rules (patterns, ranges) live in the Schema Registry; this schema only
 * pins the shape and the enum types.
 */

import { z } from 'zod';
import { ALLOWED } from '@/config/constants';

const stringMap = z.record(z.string(), z.string()).readonly();
const stringArray = z.array(z.string()).readonly();
const zones = z.array(z.enum(ALLOWED.zones)).readonly();

export const networkConfigSchema = z
  .object({
    node_subnet_id: z.string(),
    pod_cidr: z.string(),
    service_cidr: z.string().nullable(),
    dns_service_ip: z.string().nullable(),
    api_server_subnet_id: z.string().nullable(),
    network_policy: z.enum(ALLOWED.networkPolicy),
  })
  .strict()
  .readonly();

export const defaultNodePoolConfigSchema = z
  .object({
    vm_size: z.string(),
    min_count: z.number().int(),
    max_count: z.number().int(),
    max_pods: z.number().int(),
    os_sku: z.enum(ALLOWED.osSku),
    zones,
  })
  .strict()
  .readonly();

export const nodePoolConfigSchema = z
  .object({
    name: z.string(),
    vm_size: z.string(),
    orchestrator_version: z.string(),
    min_count: z.number().int().nullable(),
    max_count: z.number().int().nullable(),
    os_sku: z.enum(ALLOWED.osSku),
    mode: z.enum(ALLOWED.nodePoolMode),
    os_disk_size_gb: z.number().int().nullable(),
    tags: stringMap,
    labels: stringMap,
    zones,
  })
  .strict()
  .readonly();

export const blackoutPeriodSchema = z
  .object({
    start: z.string(),
    end: z.string(),
  })
  .strict()
  .readonly();

export const maintenanceWindowSchema = z
  .object({
    frequency: z.enum(ALLOWED.nodeOsFrequency).nullable(),
    interval: z.number().int(),
    duration: z.number().int(),
    day_of_month: z.number().int().nullable(),
    day_of_week: z.enum(ALLOWED.dayOfWeek).nullable(),
    start_date: z.string().nullable(),
    start_time: z.string().nullable(),
    utc_offset: z.string().nullable(),
    week_index: z.enum(ALLOWED.weekIndex).nullable(),
    not_allowed: z.array(blackoutPeriodSchema).readonly(),
  })
  .strict()
  .readonly();

export const acrConfigSchema = z
  .object({
    name: z.string(),
    subnet_resource_id: z.string(),
    private_dns_zone_resource_ids: stringArray,
    zone_redundancy_enabled: z.boolean(),
  })
  .strict()
  .readonly();

export const lockConfigSchema = z
  .object({
    kind: z.enum(ALLOWED.lockKind),
    name: z.string().nullable(),
  })
  .strict()
  .readonly();

export const managedIdentityConfigSchema = z
  .object({
    system_assigned: z.boolean(),
    user_assigned_resource_ids: stringArray,
  })
  .strict()
  .readonly();

export const monitorMetricsConfigSchema = z
  .object({
    annotations_allowed: z.string().nullable(),
    labels_allowed: z.string().nullable(),
  })
  .strict()
  .readonly();

export const ingressProfileSchema = z
  .object({
    dns_zone_resource_ids: stringArray,
    nginx: z
      .object({
        default_ingress_controller_type: z.enum(ALLOWED.ingressControllerType),
      })
      .strict()
      .readonly(),
  })
  .strict()
  .readonly();

export const safeguardProfileSchema = z
  .object({
    level: z.enum(ALLOWED.safeguardLevel),
    version: z.enum(ALLOWED.safeguardVersion),
    excluded_namespaces: stringArray,
  })
  .strict()
  .readonly();

export const clusterConfigSchema = z
  .object({
    name: z.string(),
    location: z.string().nullable(),
    resource_group_name: z.string().nullable(),
    kubernetes_version: z.string().nullable(),
    automatic_upgrade_channel: z.enum(ALLOWED.automaticUpgradeChannel),
    private_dns_zone_id: z.string().nullable(),
    api_server_private_dns_zone_id: z.string().nullable(),
    image_cleaner_interval_hours: z.number().int(),
    tags: stringMap,
    network: networkConfigSchema,
    default_node_pool: defaultNodePoolConfigSchema,
    acr: acrConfigSchema.nullable(),
    lock: lockConfigSchema.nullable(),
    managed_identities: managedIdentityConfigSchema,
    monitor_metrics: monitorMetricsConfigSchema.nullable(),
    ingress_profile: ingressProfileSchema.nullable(),
    safeguard_profile: safeguardProfileSchema.nullable(),
    maintenance_window_auto_upgrade: maintenanceWindowSchema.nullable(),
    maintenance_window_node_os: maintenanceWindowSchema.nullable(),
    node_pools: z.record(z.string(), nodePoolConfigSchema).readonly(),
  })
  .strict()
  .readonly();

export type ClusterConfig = z.infer<typeof clusterConfigSchema>;
export type NetworkConfig = z.infer<typeof networkConfigSchema>;
export type DefaultNodePoolConfig = z.infer<typeof defaultNodePoolConfigSchema>;
export type NodePoolConfig = z.infer<typeof nodePoolConfigSchema>;
export type MaintenanceWindow = z.infer<typeof maintenanceWindowSchema>;
export type BlackoutPeriod = z.infer<typeof blackoutPeriodSchema>;
export type AcrConfig = z.infer<typeof acrConfigSchema>;
export type LockConfig = z.infer<typeof lockConfigSchema>;
export type ManagedIdentityConfig = z.infer<typeof managedIdentityConfigSchema>;
export type MonitorMetricsConfig = z.infer<typeof monitorMetricsConfigSchema>;
export type IngressProfile = z.infer<typeof ingressProfileSchema>;
export type SafeguardProfile = z.infer<typeof safeguardProfileSchema>;
