import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createClusterConfigEngine, type ClusterConfigEngine } from '@/app/engine';
import { findSection, runSchemaCommand, runValidateCommand, type CommandIO } from '@/cli/commands';
import { CLUSTER_SCHEMA, NODE_POOL_SECTION } from '@/config/registry';
import { minimalCanonical, minimalConfig, silentLogger } from '@test/__support__/fixtures';

interface CapturedIO extends CommandIO {
  out: string[];
  err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

describe('runValidateCommand', () => {
  let dir: string;
  let engine: ClusterConfigEngine;
  let io: CapturedIO;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cluster-config-cli-'));
    engine = createClusterConfigEngine({ logger: silentLogger() });
    io = captureIO();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeDocument(name: string, content: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(content));
    return path;
  }

  it('prints the canonical configuration and exits 0', () => {
    const file = writeDocument('cluster.json', minimalConfig());

    expect(runValidateCommand(file, {}, engine, io)).toBe(0);
    expect(io.out).toHaveLength(1);
    expect(JSON.parse(io.out[0] ?? '')).toEqual(minimalCanonical());
    expect(io.err).toEqual([]);
  });

  it('writes the canonical configuration to a file', () => {
    const file = writeDocument('cluster.json', minimalConfig());
    const output = join(dir, 'resolved.json');

    expect(runValidateCommand(file, { output }, engine, io)).toBe(0);
    expect(JSON.parse(readFileSync(output, 'utf-8'))).toEqual(minimalCanonical());
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([`✓ ${file} is valid; canonical configuration written to ${output}`]);
  });

  it('lists diagnostics and exits 1', () => {
    const file = writeDocument('cluster.json', { ...minimalConfig(), lock: { kind: 'Delete' } });

    expect(runValidateCommand(file, {}, engine, io)).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      '✗ lock.kind [EnumViolation] Value "Delete" is not one of: CanNotDelete, ReadOnly\n    allowed: CanNotDelete, ReadOnly',
      '',
      `1 problem found in ${file}`,
      '',
      'Next steps:',
      '  • Use one of the listed values; matching is case-sensitive',
    ]);
  });

  it('prints diagnostics as JSON', () => {
    const file = writeDocument('cluster.json', { ...minimalConfig(), name: null });

    expect(runValidateCommand(file, { json: true }, engine, io)).toBe(1);
    expect(JSON.parse(io.out[0] ?? '')).toEqual({
      valid: false,
      diagnostics: [{ path: 'name', kind: 'MissingRequiredField', message: 'Required field is missing' }],
    });
  });

  it('exits 2 for a document that cannot be decoded', () => {
    const file = join(dir, 'cluster.json');
    writeFileSync(file, '{"name": ');

    expect(runValidateCommand(file, {}, engine, io)).toBe(2);
    expect(io.err[0]?.startsWith('✗ Document is not valid JSON: ')).toBe(true);
    expect(io.err.slice(1)).toEqual([
      '',
      'Next steps:',
      '  • Check the syntax near the reported position',
      '  • Force the decoder with --format json|yaml',
    ]);
  });

  it('reports a structural failure as JSON', () => {
    const file = join(dir, 'missing.yaml');

    expect(runValidateCommand(file, { json: true }, engine, io)).toBe(2);
    expect(JSON.parse(io.out[0] ?? '')).toMatchObject({
      valid: false,
      error: { name: 'StructuralError', code: 'DOCUMENT_UNREADABLE', details: { path: file } },
    });
  });

  it('exits 3 when the canonical configuration cannot be written', () => {
    const file = writeDocument('cluster.json', minimalConfig());
    const output = join(dir, 'missing', 'resolved.json');
    const logger = silentLogger();
    const logError = jest.spyOn(logger, 'error');

    expect(runValidateCommand(file, { output }, engine, io, logger)).toBe(3);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      `Error: ENOENT: no such file or directory, open '${output}'`,
      'This is not a problem with the configuration document.',
      'For detailed error information, use --dev',
    ]);
    expect(logError).toHaveBeenCalledTimes(1);
  });

  it('prints the stack trace of an internal failure in dev mode', () => {
    const file = writeDocument('cluster.json', minimalConfig());
    const output = join(dir, 'missing', 'resolved.json');

    expect(runValidateCommand(file, { output, dev: true }, engine, io)).toBe(3);
    expect(io.err[2]).toBe('Stack trace:');
  });

  it('honours an explicit format', () => {
    const file = join(dir, 'cluster.conf');
    writeFileSync(file, JSON.stringify(minimalConfig()));

    expect(runValidateCommand(file, { format: 'json' }, engine, io)).toBe(0);
  });
});

describe('runSchemaCommand', () => {
  it('prints the whole registry', () => {
    const io = captureIO();

    expect(runSchemaCommand(undefined, io)).toBe(0);
    expect(JSON.parse(io.out[0] ?? '')).toEqual(JSON.parse(JSON.stringify(CLUSTER_SCHEMA)));
  });

  it('prints one nested section', () => {
    const io = captureIO();

    expect(runSchemaCommand('ingress_profile.nginx', io)).toBe(0);
    expect(JSON.parse(io.out[0] ?? '')).toMatchObject({ presence: 'defaulted' });
  });

  it('rejects an unknown section', () => {
    const io = captureIO();

    expect(runSchemaCommand('storage', io)).toBe(1);
    expect(io.err[0]).toBe('✗ Unknown section: storage');
  });
});

describe('findSection', () => {
  it('resolves a collection to its entry definition', () => {
    expect(findSection('node_pools')).toBe(NODE_POOL_SECTION);
  });

  it('returns null past a leaf', () => {
    expect(findSection('network.pod_cidr.x')).toBeNull();
  });
});
