/**
 * Security level profiles: the mapping from a level to enforceable limits.
 */

import {
  ResourceLimitsSchema,
  type AnalysisConfig,
  type ResourceLimits,
  type SecurityLevel,
} from '@detonate/shared';

const MB = 1024 * 1024;

/**
 * Limits for `level`: the level's overrides over the baseline `resource_limits`,
 * with network policy from `network_rules`, then any explicit request overrides.
 *
 * Network access needs both `network_access` not set to false and an outbound
 * rule for the level. Restricted domains apply whenever the level permits
 * traffic in either direction.
 */
export function resolveLimits(
  config: AnalysisConfig,
  level: SecurityLevel,
  overrides: Partial<ResourceLimits> = {}
): ResourceLimits {
  const base = config.resource_limits;
  const levelLimits = config.security_levels[level];
  const rule = config.network_rules[level];

  const networkAccess = levelLimits.network_access ?? base.network_access;
  const networkAccessAllowed = networkAccess !== false && rule.outbound;

  return ResourceLimitsSchema.parse({
    memoryBytes: (levelLimits.memory_mb ?? base.memory_mb) * MB,
    cpuPercent: levelLimits.cpu_percent ?? base.cpu_percent,
    executionTimeoutSeconds: levelLimits.execution_time_seconds ?? base.execution_time_seconds,
    networkAccessAllowed,
    restrictedDomains: rule.outbound || rule.inbound ? rule.restricted_domains : [],
    ...overrides,
  });
}
