/**
 * Analysis Types for Detonate
 *
 * Data model of a single detonation run: the request, the behavioural events
 * observed while the target runs, the threat score built from them and the
 * report handed back to the caller.
 *
 * - Timestamps use numbers (Unix ms)
 * - Events and reports are frozen once created
 */

import { z } from 'zod';

// Security level - bundles resource limits and network policy
export const SecurityLevel = {
  LOW: 'low',
  MEDIUM: 'medium',
  HIGH: 'high',
} as const;

export type SecurityLevel = (typeof SecurityLevel)[keyof typeof SecurityLevel];

export const SecurityLevelSchema = z.enum(['low', 'medium', 'high']);

// Isolation method - selects the backend variant
export const IsolationMethod = {
  CONTAINER: 'container',
  PROCESS: 'process',
} as const;

export type IsolationMethod = (typeof IsolationMethod)[keyof typeof IsolationMethod];

export const IsolationMethodSchema = z.enum(['container', 'process']);

export const ResourceLimitsSchema = z.object({
  memoryBytes: z.number().int().positive(),
  cpuPercent: z.number().positive().max(100),
  executionTimeoutSeconds: z.number().positive(),
  networkAccessAllowed: z.boolean(),
  restrictedDomains: z
    .array(z.string().min(1).max(253))
    .transform((domains) => [...new Set(domains.map((d) => d.toLowerCase()))]),
});

export type ResourceLimits = z.infer<typeof ResourceLimitsSchema>;

export const ExecutionRequestSchema = z.object({
  targetFilePath: z.string().min(1).max(4096),
  securityLevel: SecurityLevelSchema,
  isolationMethod: IsolationMethodSchema,
  limits: ResourceLimitsSchema,
});

export type ExecutionRequest = z.infer<typeof ExecutionRequestSchema>;

// ─── Events ──────────────────────────────────────────────────────────

export const EventCategory = {
  FILE: 'FileOp',
  NETWORK: 'NetworkOp',
  PROCESS: 'ProcessOp',
  REGISTRY: 'RegistryOp',
  RESOURCE: 'ResourceUsage',
} as const;

export type EventCategory = (typeof EventCategory)[keyof typeof EventCategory];

export const EventCategorySchema = z.enum([
  'FileOp',
  'NetworkOp',
  'ProcessOp',
  'RegistryOp',
  'ResourceUsage',
]);

/** Delivery priority for events sharing a timestamp (lower delivers first). */
export const EVENT_CATEGORY_PRIORITY: Readonly<Record<EventCategory, number>> = {
  ProcessOp: 0,
  FileOp: 1,
  NetworkOp: 2,
  RegistryOp: 3,
  ResourceUsage: 4,
};

export const EventAttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type EventAttributeValue = z.infer<typeof EventAttributeValueSchema>;

export type EventAttributes = Record<string, EventAttributeValue>;

export const MonitoredEventSchema = z.object({
  sessionId: z.string(),
  sequence: z.number().int().nonnegative(),
  timestamp: z.number().int().nonnegative(),
  category: EventCategorySchema,
  attributes: z.record(z.string(), EventAttributeValueSchema),
});

export type MonitoredEvent = z.infer<typeof MonitoredEventSchema>;

// ─── Detection ───────────────────────────────────────────────────────

export const BehaviorKind = {
  REGISTRY_MODIFICATION: 'registry_modification',
  FILE_ENCRYPTION: 'file_encryption',
  PROCESS_INJECTION: 'process_injection',
  PERSISTENCE_MECHANISM: 'persistence_mechanism',
  NETWORK_SCANNING: 'network_scanning',
  HIGH_RESOURCE_USAGE: 'high_resource_usage',
} as const;

export type BehaviorKind = (typeof BehaviorKind)[keyof typeof BehaviorKind];

export const BehaviorKindSchema = z.enum([
  'registry_modification',
  'file_encryption',
  'process_injection',
  'persistence_mechanism',
  'network_scanning',
  'high_resource_usage',
]);

export const SignaturePatternSchema = z
  .object({
    category: EventCategorySchema.optional(),
    field: z.string().min(1).optional(),
    indicators: z.array(z.string().min(1)).optional(),
    regex: z
      .string()
      .refine(
        (source) => {
          try {
            new RegExp(source, 'i');
            return true;
          } catch {
            return false;
          }
        },
        { message: 'Invalid regular expression' }
      )
      .optional(),
  })
  .refine((p) => (p.indicators?.length ?? 0) > 0 || p.regex !== undefined, {
    message: 'A signature pattern needs indicators or a regex',
  });

export type SignaturePattern = z.infer<typeof SignaturePatternSchema>;

export const SignatureSchema = z.object({
  id: z.string().min(1).max(64),
  name: z.string().min(1).max(256),
  description: z.string().max(1024).default(''),
  pattern: SignaturePatternSchema,
  severityWeight: z.number().gt(0).max(1),
  conclusive: z.boolean().default(false),
  platforms: z.array(z.string()).optional(),
});

export type Signature = z.infer<typeof SignatureSchema>;

export const SignatureSetSchema = z.object({
  signatures: z.array(SignatureSchema).refine(
    (sigs) => new Set(sigs.map((s) => s.id)).size === sigs.length,
    { message: 'Signature ids must be unique' }
  ),
});

export const ThreatScoreSchema = z.object({
  aggregateValue: z.number().min(0).max(1),
  matchedSignatures: z.array(z.string()),
  behaviorFlags: z.array(BehaviorKindSchema),
});

export type ThreatScore = z.infer<typeof ThreatScoreSchema>;

export const ThreatLevel = {
  NONE: 'none',
  LOW: 'low',
  MEDIUM: 'medium',
  HIGH: 'high',
  CRITICAL: 'critical',
} as const;

export type ThreatLevel = (typeof ThreatLevel)[keyof typeof ThreatLevel];

export const ThreatLevelSchema = z.enum(['none', 'low', 'medium', 'high', 'critical']);

// ─── Session & report ────────────────────────────────────────────────

export const SessionState = {
  PENDING: 'pending',
  PREPARING: 'preparing',
  RUNNING: 'running',
  MONITORING: 'monitoring',
  COMPLETED: 'completed',
  TIMED_OUT: 'timed_out',
  BLOCKED: 'blocked',
  FAILED: 'failed',
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

export const TerminalStateSchema = z.enum(['completed', 'timed_out', 'blocked', 'failed']);

export type TerminalState = z.infer<typeof TerminalStateSchema>;

export const TERMINAL_STATES: readonly TerminalState[] = [
  'completed',
  'timed_out',
  'blocked',
  'failed',
];

export function isTerminalState(state: SessionState): state is TerminalState {
  return (TERMINAL_STATES as readonly string[]).includes(state);
}

export const ReportCauseSchema = z.object({
  code: z.string(),
  message: z.string(),
});

export type ReportCause = z.infer<typeof ReportCauseSchema>;

export const SessionSummarySchema = z.object({
  sessionId: z.string(),
  backend: IsolationMethodSchema.nullable(),
  fallbackFrom: IsolationMethodSchema.optional(),
  startTime: z.number().int().nonnegative(),
  endTime: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  exitCode: z.number().int().nullable(),
  exitSignal: z.string().nullable(),
  eventCount: z.number().int().nonnegative(),
  peakMemoryBytes: z.number().nonnegative(),
  peakCpuPercent: z.number().nonnegative(),
});

export type SessionSummary = z.infer<typeof SessionSummarySchema>;

export const ExecutionReportSchema = z.object({
  request: ExecutionRequestSchema,
  finalState: TerminalStateSchema,
  session: SessionSummarySchema,
  score: ThreatScoreSchema,
  threatLevel: ThreatLevelSchema,
  events: z.array(MonitoredEventSchema),
  cause: ReportCauseSchema.optional(),
  generatedAt: z.number().int().positive(),
});

export type ExecutionReport = z.infer<typeof ExecutionReportSchema>;
