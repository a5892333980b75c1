/**
 * analyze() — one-call submission: configuration, backend selection,
 * signatures and orchestration wired together for a single target.
 */

import { resolve } from 'node:path';
import {
  ExecutionRequestSchema,
  type AnalysisConfig,
  type ExecutionReport,
  type IsolationMethod,
  type ResourceLimits,
  type SecurityLevel,
} from '@detonate/shared';
import { loadConfig } from '../config/loader.js';
import { resolveLimits } from '../config/profiles.js';
import { loadSignatures, type CompiledSignature } from '../detection/signatures.js';
import { ThreatDetector, detectorSettings } from '../detection/threat-detector.js';
import type { SecureLogger } from '../logging/logger.js';
import { createBackend, type BackendSelection } from '../sandbox/backend-factory.js';
import { deepFreeze } from '../utils/freeze.js';
import { SandboxOrchestrator, type OrchestratorEvents } from './orchestrator.js';

export interface AnalyzeOptions {
  /** Effective configuration; loaded from file and environment when omitted. */
  config?: AnalysisConfig;
  /** Per-request limit overrides applied over the level's profile. */
  limits?: Partial<ResourceLimits>;
  signal?: AbortSignal;
  logger?: SecureLogger;
  /** Use this backend instead of selecting one from the configuration. */
  backend?: BackendSelection;
  signatures?: readonly CompiledSignature[];
  /** Receives lifecycle states as the session progresses. */
  onState?: (...args: OrchestratorEvents['state']) => void;
}

/**
 * Run `filePath` in a sandbox and report what it did.
 *
 * Configuration and signature errors are thrown before any sandbox exists;
 * everything after that is reported through the returned ExecutionReport.
 */
export async function analyze(
  filePath: string,
  securityLevel?: SecurityLevel,
  isolationMethod?: IsolationMethod,
  options: AnalyzeOptions = {}
): Promise<ExecutionReport> {
  const config = options.config ?? loadConfig();
  const level = securityLevel ?? config.default_security_level;
  const method = isolationMethod ?? config.isolation_method;

  const request = deepFreeze(
    ExecutionRequestSchema.parse({
      targetFilePath: resolve(filePath),
      securityLevel: level,
      isolationMethod: method,
      limits: resolveLimits(config, level, options.limits),
    })
  );

  const signatures = options.signatures ?? loadSignatures(config.signatures_path);
  const { backend, fallbackFrom } =
    options.backend ?? (await createBackend(method, config, level, { logger: options.logger }));

  const orchestrator = new SandboxOrchestrator({
    backend,
    detector: new ThreatDetector(signatures, detectorSettings(config)),
    blacklist: config.blacklisted_applications,
    fallbackFrom,
    pollIntervalMs: config.monitoring.poll_interval_ms,
    sampleIntervalMs: config.monitoring.sample_interval_ms,
    breachGraceMs: config.monitoring.breach_grace_ms,
    logger: options.logger,
  });
  if (options.onState) orchestrator.on('state', options.onState);

  return orchestrator.execute(request, { signal: options.signal });
}
