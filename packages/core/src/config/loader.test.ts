import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import { ConfigError, loadConfig, mergeConfigs, normalizeDocument, parseConfig } from './loader.js';
import { resolveLimits } from './profiles.js';

const MB = 1024 * 1024;

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'detonate-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: unknown): string {
    const file = join(dir, name);
    writeFileSync(file, stringifyYaml(content));
    return file;
  }

  it('should load default configuration when no file or env vars are set', () => {
    const config = loadConfig({ skipEnv: true, skipDiscovery: true });

    expect(config.default_security_level).toBe('medium');
    expect(config.isolation_method).toBe('container');
    expect(config.resource_limits).toEqual({ memory_mb: 512, cpu_percent: 50, execution_time_seconds: 120 });
    expect(config.blacklisted_applications).toContain('nmap');
    expect(config.suspicious_threshold).toBe(0.3);
    expect(config.malicious_threshold).toBe(0.7);
    expect(config.behavior_weights.process_injection).toBe(0.8);
    expect(config.container.image).toBe('alpine:3.19');
  });

  it('should read an explicit YAML file', () => {
    const file = writeConfig('detonate.yaml', {
      default_security_level: 'high',
      blacklisted_applications: ['curl'],
    });
    const config = loadConfig({ configPath: file, skipEnv: true });

    expect(config.default_security_level).toBe('high');
    expect(config.blacklisted_applications).toEqual(['curl']);
  });

  it('should accept files that group keys under sandbox and threat_detection', () => {
    const file = writeConfig('legacy.yaml', {
      sandbox: {
        isolation_method: 'process',
        resource_limits: { memory_mb: 256, network_access: false },
        auto_detect_downloads: true,
      },
      threat_detection: { suspicious_threshold: 0.4 },
    });
    const config = loadConfig({ configPath: file, skipEnv: true });

    expect(config.isolation_method).toBe('process');
    expect(config.resource_limits.memory_mb).toBe(256);
    expect(config.resource_limits.network_access).toBe(false);
    expect(config.suspicious_threshold).toBe(0.4);
  });

  it('should throw error for explicit config file that does not exist', () => {
    expect(() => loadConfig({ configPath: join(dir, 'absent.yaml'), skipEnv: true })).toThrow(
      'Config file not found'
    );
  });

  it('should wrap unparseable YAML in a ConfigError', () => {
    const file = join(dir, 'broken.yaml');
    writeFileSync(file, 'resource_limits: [unclosed');
    expect(() => loadConfig({ configPath: file, skipEnv: true })).toThrow(ConfigError);
  });

  it('should load environment variables when not skipped', () => {
    const config = loadConfig({
      skipDiscovery: true,
      env: {
        DETONATE_SECURITY_LEVEL: 'low',
        DETONATE_ISOLATION: 'process',
        DETONATE_LOG_LEVEL: 'debug',
        DETONATE_TIMEOUT_SECONDS: '30',
        DETONATE_IMAGE: 'busybox:1.36',
      },
    });

    expect(config.default_security_level).toBe('low');
    expect(config.isolation_method).toBe('process');
    expect(config.logging.level).toBe('debug');
    expect(config.resource_limits.execution_time_seconds).toBe(30);
    expect(config.resource_limits.memory_mb).toBe(512);
    expect(config.container.image).toBe('busybox:1.36');
  });

  it('should ignore a non-numeric timeout environment variable', () => {
    const config = loadConfig({ skipDiscovery: true, env: { DETONATE_TIMEOUT_SECONDS: 'soon' } });
    expect(config.resource_limits.execution_time_seconds).toBe(120);
  });

  it('should let overrides win over file and environment', () => {
    const file = writeConfig('detonate.yaml', { resource_limits: { cpu_percent: 20, memory_mb: 128 } });
    const config = loadConfig({
      configPath: file,
      env: { DETONATE_TIMEOUT_SECONDS: '30' },
      overrides: { resource_limits: { cpu_percent: 75 } },
    });

    expect(config.resource_limits).toEqual({ cpu_percent: 75, memory_mb: 128, execution_time_seconds: 30 });
  });

  it('should reject thresholds out of order', () => {
    expect(() =>
      loadConfig({
        skipEnv: true,
        skipDiscovery: true,
        overrides: { suspicious_threshold: 0.8, malicious_threshold: 0.7 },
      })
    ).toThrow(/suspicious_threshold/);
  });

  it('should reject unknown behaviour kinds', () => {
    expect(() => parseConfig({ suspicious_behaviors: ['keylogging'] })).toThrow(ConfigError);
  });
});

describe('mergeConfigs', () => {
  it('should merge nested mappings and replace arrays', () => {
    expect(
      mergeConfigs(
        { a: { b: 1, c: [1, 2] }, d: 'x' },
        { a: { c: [3] }, e: true, d: undefined }
      )
    ).toEqual({ a: { b: 1, c: [3] }, d: 'x', e: true });
  });
});

describe('normalizeDocument', () => {
  it('should treat an empty document as no configuration', () => {
    expect(normalizeDocument(null)).toEqual({});
  });

  it('should reject a scalar document', () => {
    expect(() => normalizeDocument('high')).toThrow(ConfigError);
  });
});

describe('resolveLimits', () => {
  const config = parseConfig({});

  it('should apply per-level defaults', () => {
    expect(resolveLimits(config, 'high')).toEqual({
      memoryBytes: 256 * MB,
      cpuPercent: 25,
      executionTimeoutSeconds: 60,
      networkAccessAllowed: false,
      restrictedDomains: [],
    });
    expect(resolveLimits(config, 'medium')).toEqual({
      memoryBytes: 512 * MB,
      cpuPercent: 50,
      executionTimeoutSeconds: 120,
      networkAccessAllowed: true,
      restrictedDomains: ['*.malware.com'],
    });
    expect(resolveLimits(config, 'low').memoryBytes).toBe(1024 * MB);
  });

  it('should deny network when network_access is false even if the level allows outbound', () => {
    const denied = parseConfig({ resource_limits: { network_access: false } });
    expect(resolveLimits(denied, 'low').networkAccessAllowed).toBe(false);
  });

  it('should let request overrides win and deduplicate domains', () => {
    const limits = resolveLimits(config, 'high', {
      executionTimeoutSeconds: 5,
      restrictedDomains: ['Evil.test', 'evil.test'],
    });
    expect(limits.executionTimeoutSeconds).toBe(5);
    expect(limits.restrictedDomains).toEqual(['evil.test']);
  });
});
