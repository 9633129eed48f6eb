/**
 * Cross-Field Validator
 *
 * Section-level rules that relate two or more fields of the same section.
 * Rules run after the section's field checks and only see values that passed
 * them, so a malformed field never produces a second, derived diagnostic.
 * Absent optional sections are never visited.
 */

import { parseCidr, parseIpv4, rangeContains, rangesOverlap } from '@/lib/cidr';
import { diagnostic, joinPath, type Diagnostic } from './core-types';
import {
  booleanField,
  integerField,
  stringField,
  stringsField,
  type SectionCheck,
} from './section-validator';

export type CrossFieldRule = (section: SectionCheck) => Diagnostic[];

/**
 * Autoscaler bounds: min_count must not exceed max_count when both are known
 */
export const minCountNotAboveMax: CrossFieldRule = (section) => {
  const min = integerField(section, 'min_count');
  const max = integerField(section, 'max_count');
  if (min === undefined || max === undefined || min <= max) return [];

  return [
    diagnostic(
      'CrossFieldConstraintViolation',
      section.path,
      `min_count (${min}) must not be greater than max_count (${max})`,
      { value: { min_count: min, max_count: max } },
    ),
  ];
};

const serviceCidrDisjointFromPods: CrossFieldRule = (section) => {
  const podCidr = stringField(section, 'pod_cidr');
  const serviceCidr = stringField(section, 'service_cidr');
  if (podCidr === undefined || serviceCidr === undefined) return [];

  const pods = parseCidr(podCidr);
  const services = parseCidr(serviceCidr);
  if (!pods || !services || !rangesOverlap(pods, services)) return [];

  return [
    diagnostic(
      'ConflictingFields',
      section.path,
      `service_cidr ${serviceCidr} overlaps pod_cidr ${podCidr}`,
      { value: { pod_cidr: podCidr, service_cidr: serviceCidr } },
    ),
  ];
};

const dnsServiceIpInsideServiceCidr: CrossFieldRule = (section) => {
  const dnsServiceIp = stringField(section, 'dns_service_ip');
  if (dnsServiceIp === undefined) return [];

  const serviceCidr = stringField(section, 'service_cidr');
  if (serviceCidr === undefined) {
    if (section.rejected.has('service_cidr')) return [];
    return [
      diagnostic(
        'MissingRequiredField',
        joinPath(section.path, 'service_cidr'),
        'service_cidr is required when dns_service_ip is set',
      ),
    ];
  }

  const range = parseCidr(serviceCidr);
  const address = parseIpv4(dnsServiceIp);
  if (!range || address === null || rangeContains(range, address)) return [];

  return [
    diagnostic(
      'CrossFieldConstraintViolation',
      section.path,
      `dns_service_ip ${dnsServiceIp} is outside service_cidr ${serviceCidr}`,
      { value: { dns_service_ip: dnsServiceIp, service_cidr: serviceCidr } },
    ),
  ];
};

/**
 * The cluster identity is either system-assigned or user-assigned
 */
const singleIdentityKind: CrossFieldRule = (section) => {
  const systemAssigned = booleanField(section, 'system_assigned');
  const userAssigned = stringsField(section, 'user_assigned_resource_ids') ?? [];
  if (systemAssigned !== true || userAssigned.length === 0) return [];

  return [
    diagnostic(
      'ConflictingFields',
      section.path,
      'system_assigned cannot be combined with user_assigned_resource_ids',
    ),
  ];
};

const exclusionsRequireActiveSafeguards: CrossFieldRule = (section) => {
  const level = stringField(section, 'level');
  const excluded = stringsField(section, 'excluded_namespaces') ?? [];
  if (level !== 'Off' || excluded.length === 0) return [];

  return [
    diagnostic(
      'ConflictingFields',
      section.path,
      'excluded_namespaces has no effect when level is Off',
      { value: excluded },
    ),
  ];
};

/**
 * Rules per section, keyed by the section's path
 */
export const CROSS_FIELD_RULES: Readonly<Record<string, readonly CrossFieldRule[]>> = {
  network: [serviceCidrDisjointFromPods, dnsServiceIpInsideServiceCidr],
  default_node_pool: [minCountNotAboveMax],
  managed_identities: [singleIdentityKind],
  safeguard_profile: [exclusionsRequireActiveSafeguards],
};

/**
 * Apply section-level rules to a checked section and its nested sections
 */
export function checkCrossFields(
  section: SectionCheck,
  rules: Readonly<Record<string, readonly CrossFieldRule[]>> = CROSS_FIELD_RULES,
): Diagnostic[] {
  if (!section.present) return [];

  const diagnostics = (rules[section.path] ?? []).flatMap((rule) => rule(section));
  for (const nested of section.sections.values()) {
    diagnostics.push(...checkCrossFields(nested, rules));
  }
  return diagnostics;
}
