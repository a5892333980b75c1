import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import type { MonitoredEvent } from '@detonate/shared';
import {
  SignatureLoadError,
  appliesToPlatform,
  clearSignatureCache,
  compileSignature,
  loadSignatures,
  matchesSignature,
  parseSignatureSet,
} from './signatures.js';

function event(category: MonitoredEvent['category'], attributes: MonitoredEvent['attributes']): MonitoredEvent {
  return { sessionId: 's', sequence: 0, timestamp: 0, category, attributes };
}

describe('default signature set', () => {
  afterEach(() => {
    clearSignatureCache();
  });

  it('loads, validates and filters by platform', () => {
    const linux = loadSignatures(undefined, 'linux').map((s) => s.signature.id);
    expect(linux).toContain('SIG-001');
    expect(linux).toContain('SIG-003');
    expect(linux).not.toContain('SIG-002');

    const win = loadSignatures(undefined, 'win32').map((s) => s.signature.id);
    expect(win).toContain('SIG-002');
    expect(win).toContain('SIG-007');
  });

  it('is loaded once and shared', () => {
    expect(loadSignatures(undefined, 'linux')).toBe(loadSignatures(undefined, 'linux'));
  });

  it('is frozen', () => {
    const [first] = loadSignatures(undefined, 'linux');
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first?.signature.pattern)).toBe(true);
  });

  it('flags a connection to a known bad port', () => {
    const sig = loadSignatures(undefined, 'linux').find((s) => s.signature.id === 'SIG-003');
    expect(sig).toBeDefined();
    if (!sig) return;
    expect(matchesSignature(sig, event('NetworkOp', { endpoint: '203.0.113.9:4444' }))).toBe(true);
    expect(matchesSignature(sig, event('NetworkOp', { endpoint: '203.0.113.9:44445' }))).toBe(false);
  });

  it('marks destructive commands as conclusive', () => {
    const sig = loadSignatures(undefined, 'linux').find((s) => s.signature.id === 'SIG-006');
    expect(sig?.signature.conclusive).toBe(true);
    if (!sig) return;
    expect(matchesSignature(sig, event('ProcessOp', { command: 'rm -rf /' }))).toBe(true);
    expect(matchesSignature(sig, event('ProcessOp', { command: 'rm -rf ./build' }))).toBe(false);
  });
});

describe('loadSignatures errors', () => {
  let dir: string;

  afterEach(() => {
    clearSignatureCache();
    rmSync(dir, { recursive: true, force: true });
  });

  it('rejects a set with duplicate ids', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'detonate-sigs-'));
    const file = path.join(dir, 'dup.yaml');
    writeFileSync(
      file,
      [
        'signatures:',
        '  - { id: A, name: a, pattern: { indicators: [x] }, severityWeight: 0.1 }',
        '  - { id: A, name: b, pattern: { indicators: [y] }, severityWeight: 0.1 }',
      ].join('\n')
    );
    expect(() => loadSignatures(file)).toThrow(SignatureLoadError);
  });

  it('rejects a missing file', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'detonate-sigs-'));
    expect(() => loadSignatures(path.join(dir, 'absent.yaml'))).toThrow(SignatureLoadError);
  });
});

describe('parseSignatureSet', () => {
  it('rejects patterns with neither indicators nor regex', () => {
    expect(() =>
      parseSignatureSet({ signatures: [{ id: 'A', name: 'a', pattern: { field: 'path' }, severityWeight: 0.5 }] })
    ).toThrow();
  });

  it('rejects weights outside (0, 1]', () => {
    expect(() =>
      parseSignatureSet({ signatures: [{ id: 'A', name: 'a', pattern: { indicators: ['x'] }, severityWeight: 0 }] })
    ).toThrow();
  });
});

describe('appliesToPlatform', () => {
  const base = { id: 'A', name: 'a', description: '', pattern: { indicators: ['x'] }, severityWeight: 0.1, conclusive: false };

  it('accepts missing platforms, all, and aliases', () => {
    expect(appliesToPlatform(base, 'linux')).toBe(true);
    expect(appliesToPlatform({ ...base, platforms: ['all'] }, 'darwin')).toBe(true);
    expect(appliesToPlatform({ ...base, platforms: ['windows'] }, 'win32')).toBe(true);
    expect(appliesToPlatform({ ...base, platforms: ['macos'] }, 'linux')).toBe(false);
  });
});

describe('matchesSignature', () => {
  const sig = compileSignature({
    id: 'A',
    name: 'a',
    description: '',
    pattern: { category: 'FileOp', field: 'path', indicators: ['/ETC/Shadow'] },
    severityWeight: 0.1,
    conclusive: false,
  });

  it('compares case-insensitively on the chosen field', () => {
    expect(matchesSignature(sig, event('FileOp', { path: '/etc/shadow' }))).toBe(true);
  });

  it('requires the category to agree', () => {
    expect(matchesSignature(sig, event('ProcessOp', { path: '/etc/shadow' }))).toBe(false);
  });

  it('does not match a missing or null field', () => {
    expect(matchesSignature(sig, event('FileOp', { command: '/etc/shadow' }))).toBe(false);
    expect(matchesSignature(sig, event('FileOp', { path: null }))).toBe(false);
  });
});
