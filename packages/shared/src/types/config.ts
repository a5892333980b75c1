/**
 * Configuration Types for Detonate
 *
 * The configuration arrives as a plain value (usually parsed from YAML by the
 * core loader) using the snake_case keys of the on-disk format. Everything has
 * a default so that an empty document yields a usable configuration.
 *
 * - Paths are validated to prevent path traversal
 * - Timeouts and limits have maximum bounds
 * - Thresholds must be strictly ordered
 */

import { z } from 'zod';
import { BehaviorKindSchema, IsolationMethodSchema, SecurityLevelSchema } from './analysis.js';

// Safe path validation (no path traversal)
const SafePathSchema = z
  .string()
  .min(1)
  .max(4096)
  .refine((path) => !path.includes('..') && !path.includes('\0'), {
    message: 'Path contains forbidden characters',
  });

const WeightSchema = z.number().min(0).max(1);

const ThresholdSchema = z.number().min(0).max(1);

// Baseline limits, shared by every security level unless overridden
export const ResourceLimitsConfigSchema = z.object({
  memory_mb: z.number().int().positive().max(65536).default(512),
  cpu_percent: z.number().positive().max(100).default(50),
  execution_time_seconds: z.number().positive().max(3600).default(120),
  // When unset, network access follows network_rules for the level
  network_access: z.boolean().optional(),
});

export type ResourceLimitsConfig = z.infer<typeof ResourceLimitsConfigSchema>;

export const LevelLimitsOverrideSchema = z.object({
  memory_mb: z.number().int().positive().max(65536).optional(),
  cpu_percent: z.number().positive().max(100).optional(),
  execution_time_seconds: z.number().positive().max(3600).optional(),
  network_access: z.boolean().optional(),
});

export type LevelLimitsOverride = z.infer<typeof LevelLimitsOverrideSchema>;

export const NetworkRuleSchema = z.object({
  outbound: z.boolean().default(false),
  inbound: z.boolean().default(false),
  restricted_domains: z.array(z.string().min(1).max(253)).default([]),
});

export type NetworkRule = z.infer<typeof NetworkRuleSchema>;

const SecurityLevelsConfigSchema = z
  .object({
    low: LevelLimitsOverrideSchema.default({
      memory_mb: 1024,
      cpu_percent: 80,
      execution_time_seconds: 300,
    }),
    medium: LevelLimitsOverrideSchema.default({}),
    high: LevelLimitsOverrideSchema.default({
      memory_mb: 256,
      cpu_percent: 25,
      execution_time_seconds: 60,
    }),
  })
  .default({});

const NetworkRulesConfigSchema = z
  .object({
    low: NetworkRuleSchema.default({ outbound: true, inbound: false }),
    medium: NetworkRuleSchema.default({
      outbound: true,
      inbound: false,
      restricted_domains: ['*.malware.com'],
    }),
    high: NetworkRuleSchema.default({ outbound: false, inbound: false }),
  })
  .default({});

export const BehaviorWeightsSchema = z
  .object({
    registry_modification: WeightSchema.default(0.3),
    file_encryption: WeightSchema.default(0.6),
    process_injection: WeightSchema.default(0.8),
    persistence_mechanism: WeightSchema.default(0.5),
    network_scanning: WeightSchema.default(0.4),
    high_resource_usage: WeightSchema.default(0.2),
  })
  .default({});

export type BehaviorWeights = z.infer<typeof BehaviorWeightsSchema>;

export const ContainerConfigSchema = z
  .object({
    image: z.string().min(1).max(256).default('alpine:3.19'),
    pids_limit: z.number().int().positive().max(32768).default(64),
    allow_fallback: z.boolean().default(true),
    socket_path: SafePathSchema.optional(),
  })
  .default({});

export type ContainerConfig = z.infer<typeof ContainerConfigSchema>;

export const MonitoringConfigSchema = z
  .object({
    poll_interval_ms: z.number().int().min(10).max(60000).default(250),
    sample_interval_ms: z.number().int().min(10).max(60000).default(500),
    breach_grace_ms: z.number().int().min(0).max(60000).default(1500),
    watch_paths: z.array(SafePathSchema).default([]),
  })
  .default({});

export type MonitoringConfig = z.infer<typeof MonitoringConfigSchema>;

// Logging configuration
export const LoggingConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
    output: z
      .array(
        z.discriminatedUnion('type', [
          z.object({
            type: z.literal('file'),
            path: SafePathSchema,
          }),
          z.object({
            type: z.literal('stdout'),
            format: z.enum(['json', 'pretty']).default('pretty'),
          }),
        ])
      )
      .default([{ type: 'stdout', format: 'pretty' }]),
  })
  .default({});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const AnalysisConfigSchema = z
  .object({
    default_security_level: SecurityLevelSchema.default('medium'),
    isolation_method: IsolationMethodSchema.default('container'),
    resource_limits: ResourceLimitsConfigSchema.default({}),
    security_levels: SecurityLevelsConfigSchema,
    blacklisted_applications: z
      .array(z.string().min(1).max(256))
      .default(['netcat', 'nc', 'ncat', 'nmap', 'wireshark', 'tshark']),
    network_rules: NetworkRulesConfigSchema,
    minor_threshold: ThresholdSchema.default(0.1),
    suspicious_threshold: ThresholdSchema.default(0.3),
    malicious_threshold: ThresholdSchema.default(0.7),
    critical_threshold: ThresholdSchema.default(0.9),
    suspicious_behaviors: z
      .array(BehaviorKindSchema)
      .default([
        'registry_modification',
        'file_encryption',
        'process_injection',
        'persistence_mechanism',
        'network_scanning',
        'high_resource_usage',
      ]),
    behavior_weights: BehaviorWeightsSchema,
    container: ContainerConfigSchema,
    monitoring: MonitoringConfigSchema,
    signatures_path: SafePathSchema.optional(),
    logging: LoggingConfigSchema,
  })
  .superRefine((config, ctx) => {
    const ordered =
      config.minor_threshold <= config.suspicious_threshold &&
      config.suspicious_threshold < config.malicious_threshold &&
      config.malicious_threshold <= config.critical_threshold;
    if (!ordered) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['suspicious_threshold'],
        message:
          'Thresholds must satisfy minor <= suspicious < malicious <= critical',
      });
    }
  });

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

/** Shape accepted before defaults are applied (what a YAML file may contain). */
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
