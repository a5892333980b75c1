/**
 * ResourceLimiter — samples a running sandbox and raises a limit signal.
 *
 * Usage above the memory or CPU limit is tolerated for `breachGraceMs`, after
 * which a HardResourceBreachError is signalled. The execution deadline is armed
 * as its own timer and also checked on every sample. When the deadline timer
 * fires it takes one last sample first, so a breach that becomes due at the
 * same instant wins over the timeout. At most one signal is raised per limiter.
 */

import type { ResourceLimits } from '@detonate/shared';
import { componentLogger, type SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { HardResourceBreachError, TimeoutExceededError } from './errors.js';
import type { BackendHandle, IsolationBackend, ResourceUsageSample } from './types.js';

export type LimitSignal = HardResourceBreachError | TimeoutExceededError;

export interface UsageRatios {
  memoryRatio: number;
  cpuRatio: number;
}

export interface ResourceLimiterOptions {
  backend: IsolationBackend;
  handle: BackendHandle;
  limits: ResourceLimits;
  onSignal: (signal: LimitSignal) => void;
  onSample?: (sample: ResourceUsageSample, ratios: UsageRatios) => void;
  sampleIntervalMs?: number;
  breachGraceMs?: number;
  now?: () => number;
  logger?: SecureLogger;
}

const round = (value: number) => Math.round(value * 1000) / 1000;

export function usageRatios(sample: ResourceUsageSample, limits: ResourceLimits): UsageRatios {
  return {
    memoryRatio: round(sample.memoryBytes / limits.memoryBytes),
    cpuRatio: round(sample.cpuPercent / limits.cpuPercent),
  };
}

export class ResourceLimiter {
  private readonly opts: ResourceLimiterOptions;
  private readonly sampleIntervalMs: number;
  private readonly breachGraceMs: number;
  private readonly now: () => number;
  private readonly logger: SecureLogger;

  private startedAt = 0;
  private interval: NodeJS.Timeout | null = null;
  private deadline: NodeJS.Timeout | null = null;
  private sampling: Promise<void> | null = null;
  private overSince: { memory: number | null; cpu: number | null } = { memory: null, cpu: null };
  private peak = { memoryBytes: 0, cpuPercent: 0 };
  private signalled = false;
  private stopped = false;
  private expired = false;

  constructor(opts: ResourceLimiterOptions) {
    this.opts = opts;
    this.sampleIntervalMs = opts.sampleIntervalMs ?? 500;
    this.breachGraceMs = opts.breachGraceMs ?? 1500;
    this.now = opts.now ?? Date.now;
    this.logger = componentLogger('ResourceLimiter', opts.logger);
  }

  get peakMemoryBytes(): number {
    return this.peak.memoryBytes;
  }

  get peakCpuPercent(): number {
    return this.peak.cpuPercent;
  }

  start(): void {
    if (this.interval || this.stopped) return;
    this.startedAt = this.now();
    const timeoutMs = this.opts.limits.executionTimeoutSeconds * 1000;

    this.deadline = setTimeout(() => {
      void this.expire();
    }, timeoutMs);
    this.interval = setInterval(() => {
      void this.tick();
    }, this.sampleIntervalMs);
  }

  /** Stop sampling; resolves once an in-flight sample has finished. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.interval) clearInterval(this.interval);
    if (this.deadline) clearTimeout(this.deadline);
    this.interval = null;
    this.deadline = null;
    await this.sampling;
  }

  /** Take one sample now. Exposed for the final sample after the target exits. */
  async sample(): Promise<void> {
    let sample: ResourceUsageSample;
    try {
      sample = await this.opts.backend.collectStats(this.opts.handle);
    } catch (err) {
      this.logger.debug('Resource sample failed', {
        handleId: this.opts.handle.id,
        error: toErrorMessage(err),
      });
      return;
    }

    const { limits } = this.opts;
    const ratios = usageRatios(sample, limits);
    this.peak.memoryBytes = Math.max(this.peak.memoryBytes, sample.memoryBytes);
    this.peak.cpuPercent = Math.max(this.peak.cpuPercent, sample.cpuPercent);
    this.opts.onSample?.(sample, ratios);
    if (this.stopped) return;

    const at = this.now();
    const breach =
      this.check('memory', sample.memoryBytes > limits.memoryBytes, at, () =>
        new HardResourceBreachError(
          'memory',
          `${String(sample.memoryBytes)} bytes used, limit ${String(limits.memoryBytes)}`
        )
      ) ??
      this.check('cpu', sample.cpuPercent > limits.cpuPercent, at, () =>
        new HardResourceBreachError(
          'cpu',
          `${sample.cpuPercent.toFixed(1)}% used, limit ${String(limits.cpuPercent)}%`
        )
      );

    if (breach) {
      this.raise(breach);
    } else if (this.expired || at - this.startedAt >= limits.executionTimeoutSeconds * 1000) {
      this.raise(new TimeoutExceededError(limits.executionTimeoutSeconds));
    }
  }

  /** Sample unless a sample is already in flight; either way resolve when it is done. */
  private tick(): Promise<void> {
    this.sampling ??= this.sample().finally(() => {
      this.sampling = null;
    });
    return this.sampling;
  }

  private async expire(): Promise<void> {
    this.expired = true;
    await this.tick();
    this.raise(new TimeoutExceededError(this.opts.limits.executionTimeoutSeconds));
  }

  private check(
    resource: 'memory' | 'cpu',
    over: boolean,
    at: number,
    build: () => HardResourceBreachError
  ): HardResourceBreachError | null {
    if (!over) {
      this.overSince[resource] = null;
      return null;
    }
    const since = (this.overSince[resource] ??= at);
    return at - since >= this.breachGraceMs ? build() : null;
  }

  private raise(signal: LimitSignal): void {
    if (this.signalled || this.stopped) return;
    this.signalled = true;
    this.logger.warn('Resource limit signalled', {
      handleId: this.opts.handle.id,
      code: signal.code,
      reason: signal.message,
    });
    this.opts.onSignal(signal);
  }
}
