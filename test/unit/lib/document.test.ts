import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { detectFormat, parseClusterDocument, readClusterDocument } from '@/lib/document';
import { StructuralError } from '@/lib/errors';

describe('detectFormat', () => {
  it.each([
    ['cluster.json', 'json'],
    ['CLUSTER.JSON', 'json'],
    ['cluster.yaml', 'yaml'],
    ['cluster.yml', 'yaml'],
    ['cluster', 'yaml'],
  ])('%s -> %s', (path, format) => {
    expect(detectFormat(path)).toBe(format);
  });
});

describe('parseClusterDocument', () => {
  it('decodes JSON', () => {
    expect(parseClusterDocument('{"name":"aks-test","tags":{}}', 'json')).toEqual({
      ok: true,
      value: { name: 'aks-test', tags: {} },
    });
  });

  it('keeps YAML dates and timestamps as strings', () => {
    const result = parseClusterDocument(
      'start_date: 2025-07-01\nstart: 2025-12-24T00:00:00Z\nzones: ["1", "2"]\n',
      'yaml',
    );

    expect(result).toEqual({
      ok: true,
      value: { start_date: '2025-07-01', start: '2025-12-24T00:00:00Z', zones: ['1', '2'] },
    });
  });

  it('reports invalid JSON', () => {
    const result = parseClusterDocument('{"name": ', 'json');
    if (result.ok) throw new Error('expected failure');

    expect(result.error).toBeInstanceOf(StructuralError);
    expect(result.error.code).toBe('DOCUMENT_UNPARSEABLE');
    expect(result.error.message.startsWith('Document is not valid JSON: ')).toBe(true);
  });

  it('reports invalid YAML', () => {
    const result = parseClusterDocument('network: [a, b\n', 'yaml');
    if (result.ok) throw new Error('expected failure');

    expect(result.error.code).toBe('DOCUMENT_UNPARSEABLE');
    expect(result.error.details).toEqual({ format: 'yaml' });
  });

  it('rejects a document over the size limit before decoding', () => {
    const result = parseClusterDocument('{"name":"aks"}', 'json', { maxBytes: 8 });
    if (result.ok) throw new Error('expected failure');

    expect(result.error.code).toBe('DOCUMENT_TOO_LARGE');
    expect(result.error.message).toBe('Document is 14 bytes, larger than the 8 byte limit');
  });

  it('counts bytes, not characters', () => {
    const result = parseClusterDocument('"äö"', 'json', { maxBytes: 5 });
    expect(result.ok).toBe(false);
  });
});

describe('readClusterDocument', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cluster-document-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('picks the decoder from the extension', () => {
    const path = join(dir, 'cluster.yml');
    writeFileSync(path, 'name: aks-test\n');

    expect(readClusterDocument(path)).toEqual({ ok: true, value: { name: 'aks-test' } });
  });

  it('honours an explicit format', () => {
    const path = join(dir, 'cluster.txt');
    writeFileSync(path, '{"name":"aks-test"}');

    expect(readClusterDocument(path, 'json')).toEqual({ ok: true, value: { name: 'aks-test' } });
  });

  it('reports an unreadable file', () => {
    const path = join(dir, 'missing.json');
    const result = readClusterDocument(path);
    if (result.ok) throw new Error('expected failure');

    expect(result.error.code).toBe('DOCUMENT_UNREADABLE');
    expect(result.error.details).toEqual({ path });
    expect(result.error.message.startsWith(`Cannot read ${path}: `)).toBe(true);
  });
});
