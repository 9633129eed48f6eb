import { describe, it, expect } from '@jest/globals';
import { CLUSTER_SCHEMA, NETWORK_SECTION } from '@/config/registry';
import { checkCrossFields, type CrossFieldRule } from '@/validation/cross-field-validator';
import { diagnostic } from '@/validation/core-types';
import { checkSection } from '@/validation/section-validator';
import { IDENTITY_ID, SUBNET_ID, createTestContext } from '@test/__support__/fixtures';

const context = createTestContext();

function crossFieldDiagnostics(key: string, raw: unknown) {
  const def = key === 'network' ? NETWORK_SECTION : CLUSTER_SCHEMA.sections?.[key];
  if (!def) throw new Error(`unknown section ${key}`);
  const check = checkSection(raw, def, key, context);
  return checkCrossFields(check);
}

function network(overrides: Record<string, unknown>): Record<string, unknown> {
  return { node_subnet_id: SUBNET_ID, pod_cidr: '10.244.0.0/16', ...overrides };
}

describe('checkCrossFields', () => {
  describe('network', () => {
    it('accepts disjoint ranges with the DNS address inside the service range', () => {
      expect(
        crossFieldDiagnostics('network', network({ service_cidr: '10.0.0.0/16', dns_service_ip: '10.0.0.10' })),
      ).toEqual([]);
    });

    it('reports a service range overlapping the pod range', () => {
      expect(crossFieldDiagnostics('network', network({ service_cidr: '10.244.8.0/24' }))).toEqual([
        {
          path: 'network',
          kind: 'ConflictingFields',
          message: 'service_cidr 10.244.8.0/24 overlaps pod_cidr 10.244.0.0/16',
          value: { pod_cidr: '10.244.0.0/16', service_cidr: '10.244.8.0/24' },
        },
      ]);
    });

    it('requires service_cidr alongside dns_service_ip', () => {
      expect(crossFieldDiagnostics('network', network({ dns_service_ip: '10.0.0.10' }))).toEqual([
        {
          path: 'network.service_cidr',
          kind: 'MissingRequiredField',
          message: 'service_cidr is required when dns_service_ip is set',
        },
      ]);
    });

    it('reports a DNS address outside the service range', () => {
      const [d] = crossFieldDiagnostics(
        'network',
        network({ service_cidr: '10.0.0.0/16', dns_service_ip: '10.1.0.10' }),
      );

      expect(d?.kind).toBe('CrossFieldConstraintViolation');
      expect(d?.message).toBe('dns_service_ip 10.1.0.10 is outside service_cidr 10.0.0.0/16');
    });

    it('stays silent when a related field already failed', () => {
      expect(
        crossFieldDiagnostics('network', network({ service_cidr: '10.0.0.0', dns_service_ip: '10.0.0.10' })),
      ).toEqual([]);
    });
  });

  describe('default_node_pool', () => {
    it('compares an explicit minimum with the default maximum', () => {
      expect(crossFieldDiagnostics('default_node_pool', { min_count: 12 })).toEqual([
        {
          path: 'default_node_pool',
          kind: 'CrossFieldConstraintViolation',
          message: 'min_count (12) must not be greater than max_count (9)',
          value: { min_count: 12, max_count: 9 },
        },
      ]);
    });

    it('accepts equal bounds', () => {
      expect(crossFieldDiagnostics('default_node_pool', { min_count: 4, max_count: 4 })).toEqual([]);
    });

    it('skips the comparison when a bound is out of range', () => {
      expect(crossFieldDiagnostics('default_node_pool', { min_count: 5000, max_count: 2 })).toEqual([]);
    });
  });

  it('rejects mixing identity kinds', () => {
    const [d] = crossFieldDiagnostics('managed_identities', {
      system_assigned: true,
      user_assigned_resource_ids: [IDENTITY_ID],
    });

    expect(d?.path).toBe('managed_identities');
    expect(d?.kind).toBe('ConflictingFields');
  });

  it('rejects namespace exclusions when safeguards are off', () => {
    expect(
      crossFieldDiagnostics('safeguard_profile', { level: 'Off', excluded_namespaces: ['kube-system'] }),
    ).toEqual([
      {
        path: 'safeguard_profile',
        kind: 'ConflictingFields',
        message: 'excluded_namespaces has no effect when level is Off',
        value: ['kube-system'],
      },
    ]);
  });

  it('never visits an absent optional section', () => {
    expect(crossFieldDiagnostics('safeguard_profile', null)).toEqual([]);
  });

  it('applies rules to nested sections by path', () => {
    const rule: CrossFieldRule = (section) => [
      diagnostic('ConflictingFields', section.path, 'nested rule ran'),
    ];
    const def = CLUSTER_SCHEMA.sections?.ingress_profile;
    if (!def) throw new Error('ingress_profile missing');

    const check = checkSection({}, def, 'ingress_profile', context);

    expect(checkCrossFields(check, { 'ingress_profile.nginx': [rule] })).toEqual([
      { path: 'ingress_profile.nginx', kind: 'ConflictingFields', message: 'nested rule ran' },
    ]);
  });
});
