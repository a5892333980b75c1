/**
 * Configuration Loader for Detonate
 *
 * Security considerations:
 * - Config files are validated against strict schemas
 * - Path traversal is prevented in configured paths
 * - Defaults are restrictive (no network at the high level, small limits)
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AnalysisConfigSchema, type AnalysisConfig, type AnalysisConfigInput } from '@detonate/shared';
import { toErrorMessage } from '../utils/errors.js';

// Default config file locations (checked in order)
const DEFAULT_CONFIG_PATHS = [
  './detonate.yaml',
  './detonate.yml',
  './config/detonate.yaml',
  '~/.detonate/config.yaml',
];

// Sections older config files group their keys under
const LEGACY_SECTIONS = ['sandbox', 'threat_detection'];

type ConfigDocument = Record<string, unknown>;

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

function isPlainObject(value: unknown): value is ConfigDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand ~ to home directory
 */
function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

/**
 * Lift keys out of `sandbox:` / `threat_detection:` sections so both layouts load.
 */
export function normalizeDocument(document: unknown): ConfigDocument {
  if (document === null || document === undefined) return {};
  if (!isPlainObject(document)) {
    throw new ConfigError('Configuration must be a mapping');
  }

  const result: ConfigDocument = {};
  for (const [key, value] of Object.entries(document)) {
    if (LEGACY_SECTIONS.includes(key) && isPlainObject(value)) {
      Object.assign(result, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load configuration from a YAML file
 */
function loadConfigFile(path: string): ConfigDocument | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  try {
    return normalizeDocument(parseYaml(readFileSync(expandedPath, 'utf-8')));
  } catch (error) {
    throw new ConfigError(`Failed to load config from ${expandedPath}: ${toErrorMessage(error)}`, error);
  }
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): ConfigDocument {
  const config: ConfigDocument = {};

  if (env.DETONATE_SECURITY_LEVEL) {
    config.default_security_level = env.DETONATE_SECURITY_LEVEL;
  }
  if (env.DETONATE_ISOLATION) {
    config.isolation_method = env.DETONATE_ISOLATION;
  }
  if (env.DETONATE_LOG_LEVEL) {
    config.logging = { level: env.DETONATE_LOG_LEVEL };
  }
  if (env.DETONATE_TIMEOUT_SECONDS) {
    const seconds = Number(env.DETONATE_TIMEOUT_SECONDS);
    if (!Number.isNaN(seconds)) {
      config.resource_limits = { execution_time_seconds: seconds };
    }
  }
  if (env.DETONATE_IMAGE) {
    config.container = { image: env.DETONATE_IMAGE };
  }

  return config;
}

/**
 * Deep merge two config documents
 * Later values override earlier ones; arrays are replaced, not concatenated
 */
export function mergeConfigs(base: ConfigDocument, override: ConfigDocument): ConfigDocument {
  const result: ConfigDocument = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: AnalysisConfigInput;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Skip config file auto-discovery (an explicit configPath is still read) */
  skipDiscovery?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): AnalysisConfig {
  let fileConfig: ConfigDocument = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new ConfigError(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else if (!options.skipDiscovery) {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig(options.env ?? process.env);

  let mergedConfig = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    mergedConfig = mergeConfigs(mergedConfig, normalizeDocument(options.overrides));
  }

  return parseConfig(mergedConfig);
}

/** Validate a configuration value and apply defaults. */
export function parseConfig(value: unknown): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(normalizeDocument(value));

  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${errors}`, result.error);
  }

  return result.data;
}
