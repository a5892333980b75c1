import { describe, it, expect } from 'vitest';
import {
  AnalysisConfigSchema,
  type EventAttributes,
  type EventCategory,
  type MonitoredEvent,
  type Signature,
} from '@detonate/shared';
import { ThreatDetector, EMPTY_SCORE, detectorSettings } from './threat-detector.js';
import { BEHAVIOR_RULES } from './behaviors.js';
import { compileSignature } from './signatures.js';

let sequence = 0;

function event(category: EventCategory, attributes: EventAttributes): MonitoredEvent {
  return { sessionId: 's-1', sequence: sequence++, timestamp: 1000 + sequence, category, attributes };
}

function signature(overrides: Partial<Signature> & Pick<Signature, 'id' | 'pattern'>): Signature {
  return {
    name: overrides.id,
    description: '',
    severityWeight: 0.4,
    conclusive: false,
    ...overrides,
  };
}

const settings = detectorSettings(AnalysisConfigSchema.parse({}));

const SIGNATURES = [
  signature({ id: 'SIG-PASSWD', pattern: { indicators: ['/etc/passwd'] }, severityWeight: 0.4 }),
  signature({
    id: 'SIG-PORT',
    pattern: { category: 'NetworkOp', field: 'endpoint', regex: ':(4444|1337)$' },
    severityWeight: 0.4,
  }),
  signature({
    id: 'SIG-WIPE',
    pattern: { category: 'ProcessOp', field: 'command', indicators: ['vssadmin delete shadows'] },
    severityWeight: 0.1,
    conclusive: true,
  }),
].map(compileSignature);

const detector = new ThreatDetector(SIGNATURES, settings);

const benign = () => event('ProcessOp', { action: 'spawn', pid: 10, name: 'ls', command: 'ls -la' });
const injection = () =>
  event('ProcessOp', { action: 'inject', pid: 11, targetPid: 10, name: 'gdb', command: 'gdb' });
const passwdRead = () =>
  event('ProcessOp', { action: 'spawn', pid: 12, name: 'cat', command: 'cat /etc/passwd' });

describe('ThreatDetector.observe', () => {
  it('leaves the score untouched for benign events', () => {
    expect(detector.observe(benign(), EMPTY_SCORE)).toBe(EMPTY_SCORE);
  });

  it('adds a signature weight once per session', () => {
    const first = detector.observe(passwdRead(), EMPTY_SCORE);
    expect(first).toEqual({ aggregateValue: 0.4, matchedSignatures: ['SIG-PASSWD'], behaviorFlags: [] });

    const again = detector.observe(passwdRead(), first);
    expect(again.aggregateValue).toBe(0.4);
    expect(again.matchedSignatures).toEqual(['SIG-PASSWD']);
  });

  it('adds each behaviour weight once per session', () => {
    const once = detector.observe(injection(), EMPTY_SCORE);
    const twice = detector.observe(injection(), once);
    expect(twice).toEqual({
      aggregateValue: 0.8,
      matchedSignatures: [],
      behaviorFlags: ['process_injection'],
    });
  });

  it('combines signatures and behaviours additively, clamped to 1', () => {
    const score = detector.score([
      injection(),
      passwdRead(),
      event('NetworkOp', { action: 'connect', endpoint: '10.0.0.5:4444', distinctRemotePorts: 1 }),
    ]);
    expect(score.aggregateValue).toBe(1);
    expect(score.matchedSignatures).toEqual(['SIG-PASSWD', 'SIG-PORT']);
    expect(score.behaviorFlags).toEqual(['process_injection']);
  });

  it('scores malformed events as zero contribution', () => {
    const malformed = {
      sessionId: 's-1',
      sequence: -1,
      timestamp: 1,
      category: 'ProcessOp' as const,
      attributes: { action: 'inject' },
    };
    expect(detector.observe(malformed, EMPTY_SCORE)).toBe(EMPTY_SCORE);
  });

  it('ignores behaviour kinds that are not enabled', () => {
    const narrow = new ThreatDetector(
      [],
      detectorSettings(AnalysisConfigSchema.parse({ suspicious_behaviors: ['network_scanning'] }))
    );
    expect(narrow.observe(injection(), EMPTY_SCORE)).toBe(EMPTY_SCORE);
  });

  it('never decreases the aggregate and stays within [0, 1]', () => {
    const events = [
      benign(),
      passwdRead(),
      benign(),
      event('FileOp', { action: 'create', path: '/sandbox/notes.txt.locked', extension: '.locked', entropy: 7.9 }),
      event('RegistryOp', {
        action: 'set',
        key: 'HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Run',
        valueName: 'updater',
      }),
      event('ResourceUsage', { memoryRatio: 0.95, cpuRatio: 0.1 }),
      injection(),
      benign(),
    ];
    let score = EMPTY_SCORE;
    for (const e of events) {
      const next = detector.observe(e, score);
      expect(next.aggregateValue).toBeGreaterThanOrEqual(score.aggregateValue);
      expect(next.aggregateValue).toBeLessThanOrEqual(1);
      expect(next.aggregateValue).toBeGreaterThanOrEqual(0);
      score = next;
    }
  });

  it('is deterministic for a fixed event sequence', () => {
    const events = [benign(), passwdRead(), injection(), benign()];
    const a = detector.score(events);
    const b = new ThreatDetector(SIGNATURES, settings).score(events);
    expect(JSON.stringify(b)).toBe(JSON.stringify(a));
    expect(detector.classify(b)).toBe(detector.classify(a));
  });
});

describe('ThreatDetector.classify', () => {
  const at = (aggregateValue: number, matchedSignatures: string[] = []) => ({
    aggregateValue,
    matchedSignatures,
    behaviorFlags: [],
  });

  it('buckets the aggregate against the thresholds', () => {
    expect(detector.classify(at(0))).toBe('none');
    expect(detector.classify(at(0.05))).toBe('none');
    expect(detector.classify(at(0.1))).toBe('low');
    expect(detector.classify(at(0.29))).toBe('low');
    expect(detector.classify(at(0.5))).toBe('medium');
    expect(detector.classify(at(0.89))).toBe('high');
    expect(detector.classify(at(0.9))).toBe('critical');
  });

  it('uses closed lower bounds at the suspicious and malicious thresholds', () => {
    expect(detector.classify(at(0.3))).toBe('medium');
    expect(detector.classify(at(0.7))).toBe('high');
  });

  it('classifies a single injection as high, and later benign events keep it there', () => {
    let score = detector.observe(injection(), EMPTY_SCORE);
    expect(detector.classify(score)).toBe('high');
    for (let i = 0; i < 5; i++) score = detector.observe(benign(), score);
    expect(detector.classify(score)).toBe('high');
    expect(score.aggregateValue).toBe(0.8);
  });

  it('reaches a threshold when the weights sum to it exactly', () => {
    const weighted = new ThreatDetector(
      [
        signature({ id: 'SIG-A', pattern: { indicators: ['alpha'] }, severityWeight: 0.1 }),
        signature({ id: 'SIG-B', pattern: { indicators: ['bravo'] }, severityWeight: 0.2 }),
        signature({ id: 'SIG-C', pattern: { indicators: ['charlie'] }, severityWeight: 0.3 }),
        signature({ id: 'SIG-D', pattern: { indicators: ['delta'] }, severityWeight: 0.6 }),
      ].map(compileSignature),
      settings
    );
    const run = (...words: string[]) =>
      weighted.score(words.map((w) => event('ProcessOp', { action: 'spawn', pid: 20, name: w, command: w })));

    const suspicious = run('alpha', 'bravo');
    expect(suspicious.aggregateValue).toBe(0.3);
    expect(weighted.classify(suspicious)).toBe('medium');

    const critical = run('charlie', 'delta');
    expect(critical.aggregateValue).toBe(0.9);
    expect(weighted.classify(critical)).toBe('critical');
  });

  it('escalates a conclusive signature to critical regardless of the aggregate', () => {
    const score = detector.observe(
      event('ProcessOp', {
        action: 'spawn',
        pid: 20,
        name: 'vssadmin.exe',
        command: 'vssadmin delete shadows /all /quiet',
      }),
      EMPTY_SCORE
    );
    expect(score.aggregateValue).toBe(0.1);
    expect(detector.classify(score)).toBe('critical');
  });
});

describe('behaviour rules', () => {
  it('recognises registry writes but not reads', () => {
    expect(BEHAVIOR_RULES.registry_modification(event('RegistryOp', { action: 'delete', key: 'HKCU\\X' }))).toBe(true);
    expect(BEHAVIOR_RULES.registry_modification(event('RegistryOp', { action: 'query', key: 'HKCU\\X' }))).toBe(false);
  });

  it('recognises encryption by extension or entropy', () => {
    const rule = BEHAVIOR_RULES.file_encryption;
    expect(rule(event('FileOp', { action: 'create', path: '/w/report.docx.encrypted', entropy: null }))).toBe(true);
    expect(rule(event('FileOp', { action: 'modify', path: '/w/data.bin', entropy: 7.6 }))).toBe(true);
    expect(rule(event('FileOp', { action: 'modify', path: '/w/notes.txt', entropy: 4.2 }))).toBe(false);
  });

  it('recognises tracer command lines as injection', () => {
    const rule = BEHAVIOR_RULES.process_injection;
    expect(rule(event('ProcessOp', { action: 'spawn', command: 'gdb -p 4242 -batch' }))).toBe(true);
    expect(rule(event('ProcessOp', { action: 'spawn', command: 'strace -f ls' }))).toBe(false);
  });

  it('recognises autostart locations on every platform', () => {
    const rule = BEHAVIOR_RULES.persistence_mechanism;
    expect(rule(event('FileOp', { action: 'create', path: '/etc/cron.d/job' }))).toBe(true);
    expect(rule(event('FileOp', { action: 'create', path: '/Users/x/Library/LaunchAgents/a.plist' }))).toBe(true);
    expect(
      rule(
        event('FileOp', {
          action: 'create',
          path: 'C:\\Users\\x\\AppData\\Roaming\\Microsoft\\Windows\\Start Menu\\Programs\\Startup\\a.lnk',
        })
      )
    ).toBe(true);
    expect(rule(event('RegistryOp', { action: 'set', key: 'HKLM\\Software\\Microsoft\\Windows\\CurrentVersion\\RunOnce' }))).toBe(true);
    expect(rule(event('FileOp', { action: 'create', path: '/tmp/cron-notes.txt' }))).toBe(false);
  });

  it('recognises scans by distinct remote ports or hosts', () => {
    const rule = BEHAVIOR_RULES.network_scanning;
    expect(rule(event('NetworkOp', { distinctRemotePorts: 10, distinctRemoteHosts: 1 }))).toBe(true);
    expect(rule(event('NetworkOp', { distinctRemotePorts: 2, distinctRemoteHosts: 20 }))).toBe(true);
    expect(rule(event('NetworkOp', { distinctRemotePorts: 9, distinctRemoteHosts: 19 }))).toBe(false);
  });

  it('recognises usage at 90% of a limit', () => {
    const rule = BEHAVIOR_RULES.high_resource_usage;
    expect(rule(event('ResourceUsage', { memoryRatio: 0.2, cpuRatio: 0.9 }))).toBe(true);
    expect(rule(event('ResourceUsage', { memoryRatio: 0.89, cpuRatio: 0.5 }))).toBe(false);
  });
});
