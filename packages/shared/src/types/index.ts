/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Analysis types
export {
  SecurityLevel,
  SecurityLevelSchema,
  IsolationMethod,
  IsolationMethodSchema,
  ResourceLimitsSchema,
  ExecutionRequestSchema,
  EventCategory,
  EventCategorySchema,
  EVENT_CATEGORY_PRIORITY,
  EventAttributeValueSchema,
  MonitoredEventSchema,
  BehaviorKind,
  BehaviorKindSchema,
  SignaturePatternSchema,
  SignatureSchema,
  SignatureSetSchema,
  ThreatScoreSchema,
  ThreatLevel,
  ThreatLevelSchema,
  SessionState,
  TerminalStateSchema,
  TERMINAL_STATES,
  isTerminalState,
  ReportCauseSchema,
  SessionSummarySchema,
  ExecutionReportSchema,
  type ResourceLimits,
  type ExecutionRequest,
  type EventAttributeValue,
  type EventAttributes,
  type MonitoredEvent,
  type SignaturePattern,
  type Signature,
  type ThreatScore,
  type TerminalState,
  type ReportCause,
  type SessionSummary,
  type ExecutionReport,
} from './analysis.js';

// Configuration types
export {
  ResourceLimitsConfigSchema,
  LevelLimitsOverrideSchema,
  NetworkRuleSchema,
  BehaviorWeightsSchema,
  ContainerConfigSchema,
  MonitoringConfigSchema,
  LoggingConfigSchema,
  AnalysisConfigSchema,
  type ResourceLimitsConfig,
  type LevelLimitsOverride,
  type NetworkRule,
  type BehaviorWeights,
  type ContainerConfig,
  type MonitoringConfig,
  type LoggingConfig,
  type AnalysisConfig,
  type AnalysisConfigInput,
} from './config.js';
