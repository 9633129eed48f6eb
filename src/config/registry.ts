/**
 * Schema Registry
 *
 * Static table of field definitions for every configuration section. Pure
 * data: the Field Validator compiles each entry into a checker, the Normalizer
 * reads the defaults. Declaration order here is the canonical output order and
 * the order diagnostics are reported in.
 */

import { ALLOWED, MAINTENANCE, PATTERNS } from './constants';

export type FieldType =
  | 'string'
  | 'integer'
  | 'boolean'
  | 'string-set'
  | 'string-list'
  | 'string-map';

export type FieldValue = string | number | boolean | readonly string[] | Readonly<Record<string, string>>;

export interface PatternRule {
  /** RegExp source */
  readonly source: string;
  readonly flags?: string;
  /** Short name shown in diagnostics, e.g. "subnet resource ID" */
  readonly label: string;
}

export interface FieldDefinition {
  readonly type: FieldType;
  readonly description: string;
  /** Absent value is a `MissingRequiredField` when the owning section is present */
  readonly required?: boolean;
  /** Value used when the field is absent; `null` when omitted */
  readonly default?: FieldValue;
  /** Allowed values; for collections, applies to every element */
  readonly allowed?: readonly string[];
  /** For collections, applies to every element */
  readonly pattern?: PatternRule;
  /** Inclusive numeric bounds (integers) or length bounds (strings) */
  readonly min?: number;
  readonly max?: number;
}

/**
 * - `required`: absence is a diagnostic
 * - `optional`: absence yields `null` and skips every nested check
 * - `defaulted`: absence yields the section filled with defaults
 */
export type SectionPresence = 'required' | 'optional' | 'defaulted';

export interface CollectionDefinition {
  readonly kind: 'map' | 'set';
  readonly description: string;
  readonly entry: SectionDefinition;
  /** Pattern for map keys */
  readonly keyPattern?: PatternRule;
}

export interface SectionDefinition {
  readonly description: string;
  readonly presence: SectionPresence;
  readonly fields: Readonly<Record<string, FieldDefinition>>;
  readonly sections?: Readonly<Record<string, SectionDefinition>>;
  /** Keys validated by a specialized checker rather than the generic walk */
  readonly collections?: Readonly<Record<string, CollectionDefinition>>;
}

const pattern = (source: string, label: string, flags?: string): PatternRule =>
  flags === undefined ? { source, label } : { source, label, flags };

const SUBNET_ID = pattern(PATTERNS.subnetId, 'subnet resource ID', 'i');
const PRIVATE_DNS_ZONE_ID = pattern(PATTERNS.privateDnsZoneId, 'private DNS zone resource ID', 'i');
const VM_SIZE = pattern(PATTERNS.vmSize, 'VM size');
const ZONES: FieldDefinition = {
  type: 'string-set',
  description: 'Availability zones',
  allowed: ALLOWED.zones,
  default: ['1', '2', '3'],
};

export const NETWORK_SECTION: SectionDefinition = {
  description: 'Cluster networking',
  presence: 'required',
  fields: {
    node_subnet_id: {
      type: 'string',
      description: 'Subnet the nodes are placed in',
      required: true,
      pattern: SUBNET_ID,
    },
    pod_cidr: {
      type: 'string',
      description: 'Pod address range (overlay)',
      required: true,
      pattern: pattern(PATTERNS.ipv4Cidr, 'IPv4 CIDR'),
    },
    service_cidr: {
      type: 'string',
      description: 'Kubernetes service address range',
      pattern: pattern(PATTERNS.ipv4Cidr, 'IPv4 CIDR'),
    },
    dns_service_ip: {
      type: 'string',
      description: 'Cluster DNS service address, inside service_cidr',
      pattern: pattern(PATTERNS.ipv4, 'IPv4 address'),
    },
    api_server_subnet_id: {
      type: 'string',
      description: 'Subnet for API server VNet integration',
      pattern: SUBNET_ID,
    },
    network_policy: {
      type: 'string',
      description: 'Network policy engine',
      allowed: ALLOWED.networkPolicy,
      default: 'cilium',
    },
  },
};

export const DEFAULT_NODE_POOL_SECTION: SectionDefinition = {
  description: 'System node pool created with the cluster',
  presence: 'defaulted',
  fields: {
    vm_size: {
      type: 'string',
      description: 'VM size of the system pool',
      pattern: VM_SIZE,
      default: 'Standard_D4d_v5',
    },
    min_count: { type: 'integer', description: 'Autoscaler minimum', min: 1, max: 1000, default: 3 },
    max_count: { type: 'integer', description: 'Autoscaler maximum', min: 1, max: 1000, default: 9 },
    max_pods: { type: 'integer', description: 'Pods per node', min: 10, max: 250, default: 110 },
    os_sku: {
      type: 'string',
      description: 'Node OS',
      allowed: ALLOWED.osSku,
      default: 'AzureLinux',
    },
    zones: ZONES,
  },
};

export const NODE_POOL_SECTION: SectionDefinition = {
  description: 'User-defined node pool',
  presence: 'required',
  fields: {
    name: {
      type: 'string',
      description: 'Pool name as created in the cluster',
      required: true,
      pattern: pattern(PATTERNS.nodePoolName, 'node pool name'),
    },
    vm_size: { type: 'string', description: 'VM size', required: true, pattern: VM_SIZE },
    orchestrator_version: {
      type: 'string',
      description: 'Kubernetes version of the pool',
      required: true,
      pattern: pattern(PATTERNS.orchestratorVersion, 'Kubernetes version'),
    },
    min_count: { type: 'integer', description: 'Autoscaler minimum', min: 0, max: 1000 },
    max_count: { type: 'integer', description: 'Autoscaler maximum', min: 1, max: 1000 },
    os_sku: { type: 'string', description: 'Node OS', allowed: ALLOWED.osSku, default: 'AzureLinux' },
    mode: { type: 'string', description: 'Pool mode', allowed: ALLOWED.nodePoolMode, default: 'User' },
    os_disk_size_gb: { type: 'integer', description: 'OS disk size in GB', min: 30, max: 2048 },
    tags: { type: 'string-map', description: 'Resource tags', default: {} },
    labels: { type: 'string-map', description: 'Kubernetes node labels', default: {} },
    zones: ZONES,
  },
};

export const BLACKOUT_PERIOD_SECTION: SectionDefinition = {
  description: 'Time range during which maintenance must not run',
  presence: 'required',
  fields: {
    start: {
      type: 'string',
      description: 'Start of the blackout (RFC 3339)',
      required: true,
      pattern: pattern(PATTERNS.timestamp, 'RFC 3339 timestamp'),
    },
    end: {
      type: 'string',
      description: 'End of the blackout (RFC 3339)',
      required: true,
      pattern: pattern(PATTERNS.timestamp, 'RFC 3339 timestamp'),
    },
  },
};

/**
 * Both maintenance windows share one rule set; only the frequency set differs.
 */
export function maintenanceWindowSection(
  description: string,
  frequencies: readonly string[],
): SectionDefinition {
  return {
    description,
    presence: 'optional',
    fields: {
      frequency: { type: 'string', description: 'Recurrence', allowed: frequencies },
      interval: { type: 'integer', description: 'Recurrence interval', min: 1, default: 1 },
      duration: {
        type: 'integer',
        description: 'Window length in hours',
        min: MAINTENANCE.MIN_DURATION,
        max: MAINTENANCE.MAX_DURATION,
        default: MAINTENANCE.MIN_DURATION,
      },
      day_of_month: { type: 'integer', description: 'Day of month', min: 1, max: 31 },
      day_of_week: { type: 'string', description: 'Day of week', allowed: ALLOWED.dayOfWeek },
      start_date: {
        type: 'string',
        description: 'First date the schedule applies',
        pattern: pattern(PATTERNS.date, 'YYYY-MM-DD'),
      },
      start_time: {
        type: 'string',
        description: 'Window start time',
        pattern: pattern(PATTERNS.startTime, 'HH:mm'),
      },
      utc_offset: {
        type: 'string',
        description: 'Offset of start_time from UTC',
        pattern: pattern(PATTERNS.utcOffset, '±HH:MM'),
      },
      week_index: { type: 'string', description: 'Week of month', allowed: ALLOWED.weekIndex },
    },
    collections: {
      not_allowed: {
        kind: 'set',
        description: 'Blackout periods',
        entry: BLACKOUT_PERIOD_SECTION,
      },
    },
  };
}

export const CLUSTER_SCHEMA: SectionDefinition = {
  description: 'Managed Kubernetes cluster',
  presence: 'required',
  fields: {
    name: {
      type: 'string',
      description: 'Cluster name',
      required: true,
      pattern: pattern(PATTERNS.clusterName, 'cluster name'),
    },
    location: {
      type: 'string',
      description: 'Azure region; inherited from the resource group when null',
      pattern: pattern(PATTERNS.location, 'region name'),
    },
    resource_group_name: {
      type: 'string',
      description: 'Resource group the cluster is created in',
      pattern: pattern(PATTERNS.resourceGroupName, 'resource group name'),
    },
    kubernetes_version: {
      type: 'string',
      description: 'Kubernetes minor version; latest when null',
      pattern: pattern(PATTERNS.kubernetesMinorVersion, 'minor version (e.g. 1.30)'),
    },
    automatic_upgrade_channel: {
      type: 'string',
      description: 'Automatic upgrade channel',
      allowed: ALLOWED.automaticUpgradeChannel,
      default: 'stable',
    },
    private_dns_zone_id: {
      type: 'string',
      description: 'Private DNS zone for the private cluster',
      pattern: PRIVATE_DNS_ZONE_ID,
    },
    api_server_private_dns_zone_id: {
      type: 'string',
      description: 'Private DNS zone for the API server',
      pattern: PRIVATE_DNS_ZONE_ID,
    },
    image_cleaner_interval_hours: {
      type: 'integer',
      description: 'Image cleaner scan interval',
      min: 24,
      max: 2160,
      default: 168,
    },
    tags: { type: 'string-map', description: 'Resource tags', default: {} },
  },
  sections: {
    network: NETWORK_SECTION,
    default_node_pool: DEFAULT_NODE_POOL_SECTION,
    acr: {
      description: 'Container registry with private endpoint',
      presence: 'optional',
      fields: {
        name: {
          type: 'string',
          description: 'Registry name',
          required: true,
          pattern: pattern(PATTERNS.acrName, 'registry name'),
        },
        subnet_resource_id: {
          type: 'string',
          description: 'Subnet of the private endpoint',
          required: true,
          pattern: SUBNET_ID,
        },
        private_dns_zone_resource_ids: {
          type: 'string-set',
          description: 'Private DNS zones linked to the endpoint',
          pattern: PRIVATE_DNS_ZONE_ID,
          default: [],
        },
        zone_redundancy_enabled: {
          type: 'boolean',
          description: 'Zone redundant registry',
          default: true,
        },
      },
    },
    lock: {
      description: 'Management lock',
      presence: 'optional',
      fields: {
        kind: { type: 'string', description: 'Lock kind', required: true, allowed: ALLOWED.lockKind },
        name: { type: 'string', description: 'Lock name', min: 1, max: 90 },
      },
    },
    managed_identities: {
      description: 'Cluster identity',
      presence: 'defaulted',
      fields: {
        system_assigned: {
          type: 'boolean',
          description: 'Use a system-assigned identity',
          default: false,
        },
        user_assigned_resource_ids: {
          type: 'string-set',
          description: 'User-assigned identities',
          pattern: pattern(PATTERNS.userAssignedIdentityId, 'user-assigned identity resource ID', 'i'),
          default: [],
        },
      },
    },
    monitor_metrics: {
      description: 'Managed Prometheus metric allow lists',
      presence: 'optional',
      fields: {
        annotations_allowed: {
          type: 'string',
          description: 'Kubernetes annotation allow list',
          pattern: pattern(PATTERNS.metricsAllowList, 'resource=[names] list'),
        },
        labels_allowed: {
          type: 'string',
          description: 'Kubernetes label allow list',
          pattern: pattern(PATTERNS.metricsAllowList, 'resource=[names] list'),
        },
      },
    },
    ingress_profile: {
      description: 'Application routing add-on',
      presence: 'optional',
      fields: {
        dns_zone_resource_ids: {
          type: 'string-list',
          description: 'DNS zones managed by the add-on',
          pattern: pattern(PATTERNS.dnsZoneId, 'DNS zone resource ID', 'i'),
          default: [],
        },
      },
      sections: {
        nginx: {
          description: 'Default NGINX ingress controller',
          presence: 'defaulted',
          fields: {
            default_ingress_controller_type: {
              type: 'string',
              description: 'Exposure of the default controller',
              allowed: ALLOWED.ingressControllerType,
              default: 'AnnotationControlled',
            },
          },
        },
      },
    },
    safeguard_profile: {
      description: 'Deployment safeguards',
      presence: 'optional',
      fields: {
        level: {
          type: 'string',
          description: 'Enforcement level',
          required: true,
          allowed: ALLOWED.safeguardLevel,
        },
        version: {
          type: 'string',
          description: 'Safeguard policy version',
          allowed: ALLOWED.safeguardVersion,
          default: 'v2',
        },
        excluded_namespaces: {
          type: 'string-set',
          description: 'Namespaces the safeguards ignore',
          pattern: pattern(PATTERNS.namespace, 'namespace name'),
          default: [],
        },
      },
    },
    maintenance_window_auto_upgrade: maintenanceWindowSection(
      'Window for automatic cluster upgrades',
      ALLOWED.autoUpgradeFrequency,
    ),
    maintenance_window_node_os: maintenanceWindowSection(
      'Window for node OS patching',
      ALLOWED.nodeOsFrequency,
    ),
  },
  collections: {
    node_pools: {
      kind: 'map',
      description: 'Additional node pools keyed by a stable identifier',
      entry: NODE_POOL_SECTION,
      keyPattern: pattern(PATTERNS.nodePoolKey, 'non-blank, non-reserved key'),
    },
  },
};
