/**
 * @detonate/core
 *
 * Sandboxed execution and behavioural threat scoring for untrusted files.
 */

// Submission
export { analyze, type AnalyzeOptions } from './orchestrator/analyze.js';
export {
  SandboxOrchestrator,
  executableName,
  resolveTerminalState,
  type OrchestratorEvents,
  type OrchestratorOptions,
  type ExecuteOptions,
} from './orchestrator/orchestrator.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  mergeConfigs,
  ConfigError,
  type LoadConfigOptions,
} from './config/loader.js';
export { resolveLimits } from './config/profiles.js';

// Logging
export {
  createLogger,
  initializeLogger,
  getLogger,
  createNoopLogger,
  type SecureLogger,
  type LogLevel,
  type LogContext,
} from './logging/logger.js';

// Isolation
export * from './sandbox/index.js';

// Monitoring
export { ActivityMonitor, type ActivityMonitorOptions } from './monitor/activity-monitor.js';
export type { CollectedEvent, EventCollector } from './monitor/types.js';

// Detection
export {
  ThreatDetector,
  detectorSettings,
  EMPTY_SCORE,
  type DetectorSettings,
} from './detection/threat-detector.js';
export {
  loadSignatures,
  parseSignatureSet,
  compileSignature,
  matchesSignature,
  DEFAULT_SIGNATURES_PATH,
  SignatureLoadError,
  type CompiledSignature,
} from './detection/signatures.js';
export { BEHAVIOR_RULES } from './detection/behaviors.js';

// Shared types
export * from '@detonate/shared';
