/**
 * Application Constants and Defaults
 *
 * Consolidated configuration values for the engine: environment schemas,
 * allowed-value sets, resource-reference patterns and limits. The Schema
 * Registry (`./registry`) is built from these values.
 */

import { z } from 'zod';

/**
 * Environment Schema
 * Zod schema for environment validation across the application.
 */
export const environmentSchema = z
  .enum(['development', 'staging', 'production', 'testing'])
  .describe('Runtime environment');

export type Environment = z.infer<typeof environmentSchema>;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const logLevelSchema = z.enum(LOG_LEVELS).describe('Logging level');

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Allowed-value sets
 */
export const ALLOWED = {
  automaticUpgradeChannel: ['stable', 'rapid', 'patch', 'node-image', 'none'],
  networkPolicy: ['azure', 'calico', 'cilium'],
  osSku: ['Ubuntu', 'AzureLinux'],
  nodePoolMode: ['System', 'User'],
  zones: ['1', '2', '3'],
  lockKind: ['CanNotDelete', 'ReadOnly'],
  ingressControllerType: ['AnnotationControlled', 'External', 'Internal', 'None'],
  safeguardLevel: ['Enforcement', 'Warning', 'Off'],
  safeguardVersion: ['v1', 'v2'],
  autoUpgradeFrequency: ['Weekly', 'AbsoluteMonthly', 'RelativeMonthly'],
  nodeOsFrequency: ['Daily', 'Weekly', 'AbsoluteMonthly', 'RelativeMonthly'],
  dayOfWeek: ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'],
  weekIndex: ['First', 'Second', 'Third', 'Fourth', 'Last'],
} as const;

export type MaintenanceFrequency = (typeof ALLOWED.nodeOsFrequency)[number];

/**
 * Regular expressions used by the registry.
 * Kept as source strings so the registry stays plain data.
 */
export const PATTERNS = {
  clusterName: '^[a-zA-Z0-9]$|^[a-zA-Z0-9][-_a-zA-Z0-9]{0,61}[a-zA-Z0-9]$',
  location: '^[a-z0-9]+$',
  resourceGroupName: '^[-\\w._()]{0,89}[-\\w_()]$',
  kubernetesMinorVersion: '^[0-9]+\\.[0-9]+$',
  orchestratorVersion: '^[0-9]+\\.[0-9]+(\\.[0-9]+)?$',
  nodePoolName: '^[a-z][a-z0-9]{0,11}$',
  nodePoolKey: '^(?!__proto__$)\\S+$',
  /** Keys of string maps (tags, labels); `__proto__` cannot be stored as a plain key */
  mapKey: '^(?!__proto__$)',
  vmSize: '^Standard_[A-Za-z0-9_]+$',
  acrName: '^[a-zA-Z0-9]{5,50}$',
  privateDnsZoneId:
    '^/subscriptions/[^/]+/resourceGroups/[^/]+/providers/Microsoft\\.Network/privateDnsZones/[^/]+$',
  dnsZoneId: '^/subscriptions/[^/]+/resourceGroups/[^/]+/providers/Microsoft\\.Network/dnszones/[^/]+$',
  subnetId:
    '^/subscriptions/[^/]+/resourceGroups/[^/]+/providers/Microsoft\\.Network/virtualNetworks/[^/]+/subnets/[^/]+$',
  userAssignedIdentityId:
    '^/subscriptions/[^/]+/resourceGroups/[^/]+/providers/Microsoft\\.ManagedIdentity/userAssignedIdentities/[^/]+$',
  ipv4: '^((25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])\\.){3}(25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])$',
  ipv4Cidr:
    '^((25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])\\.){3}(25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])/(3[0-2]|[12]?[0-9])$',
  metricsAllowList: '^[a-z]+=\\[[^\\]]*\\](,[a-z]+=\\[[^\\]]*\\])*$',
  namespace: '^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$',
  date: '^[0-9]{4}-[0-9]{2}-[0-9]{2}$',
  startTime: '^([01][0-9]|2[0-3]):[0-5][0-9]$',
  utcOffset: '^[+-]([01][0-9]|2[0-3]):[0-5][0-9]$',
  timestamp:
    '^[0-9]{4}-[0-9]{2}-[0-9]{2}T([01][0-9]|2[0-3]):[0-5][0-9]:[0-5][0-9](\\.[0-9]{1,3})?(Z|[+-]([01][0-9]|2[0-3]):[0-5][0-9])$',
} as const;

/**
 * Maintenance window bounds
 */
export const MAINTENANCE = {
  /** Minimum window length in hours */
  MIN_DURATION: 4,
  /** Maximum window length in hours */
  MAX_DURATION: 24,
  /** Upper bound of `interval` per frequency */
  MAX_INTERVAL: {
    Daily: 7,
    Weekly: 4,
    AbsoluteMonthly: 6,
    RelativeMonthly: 6,
  },
} as const satisfies {
  MIN_DURATION: number;
  MAX_DURATION: number;
  MAX_INTERVAL: Record<MaintenanceFrequency, number>;
};

/**
 * Input limits
 */
export const LIMITS = {
  /** Maximum configuration document size (bytes): 1MB */
  MAX_DOCUMENT_SIZE: 1_048_576,
} as const;

/**
 * CLI process exit codes
 */
export const EXIT_CODES = {
  /** Validation succeeded */
  VALID: 0,
  /** One or more diagnostics were produced */
  INVALID: 1,
  /** The input could not be parsed into a document */
  STRUCTURAL: 2,
  /** The command failed after validation, e.g. the output file could not be written */
  INTERNAL: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
