import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ResourceLimits } from '@detonate/shared';
import { ResourceLimiter, usageRatios } from './limiter.js';
import { HardResourceBreachError, TimeoutExceededError } from './errors.js';
import { FakeBackend, makeLogger } from '../test-setup.js';

const LIMITS: ResourceLimits = {
  memoryBytes: 100,
  cpuPercent: 50,
  executionTimeoutSeconds: 10,
  networkAccessAllowed: false,
  restrictedDomains: [],
};

const HANDLE = { id: 'h-1', method: 'process' as const };

describe('usageRatios', () => {
  it('divides usage by the limits', () => {
    expect(
      usageRatios(
        {
          timestamp: 0,
          memoryBytes: 95,
          cpuPercent: 10,
          networkRxBytes: 0,
          networkTxBytes: 0,
          processCount: 1,
        },
        LIMITS
      )
    ).toEqual({ memoryRatio: 0.95, cpuRatio: 0.2 });
  });
});

describe('ResourceLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('signals a memory breach once usage stays over the limit past the grace period', async () => {
    const onSignal = vi.fn();
    const limiter = new ResourceLimiter({
      backend: new FakeBackend({ stats: () => ({ memoryBytes: 200 }) }),
      handle: HANDLE,
      limits: LIMITS,
      onSignal,
      sampleIntervalMs: 100,
      breachGraceMs: 250,
    });
    limiter.start();

    await vi.advanceTimersByTimeAsync(300);
    expect(onSignal).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(100);
    expect(onSignal).toHaveBeenCalledOnce();
    const signal: unknown = onSignal.mock.lastCall?.[0];
    expect(signal).toBeInstanceOf(HardResourceBreachError);
    expect(signal).toMatchObject({ resource: 'memory', code: 'HARD_RESOURCE_BREACH' });

    await vi.advanceTimersByTimeAsync(1000);
    expect(onSignal).toHaveBeenCalledOnce();
    await limiter.stop();
  });

  it('forgives a spike shorter than the grace period', async () => {
    const onSignal = vi.fn();
    const limiter = new ResourceLimiter({
      backend: new FakeBackend({ stats: (n) => ({ cpuPercent: n === 2 ? 10 : 90 }) }),
      handle: HANDLE,
      limits: LIMITS,
      onSignal,
      sampleIntervalMs: 100,
      breachGraceMs: 250,
    });
    limiter.start();

    await vi.advanceTimersByTimeAsync(600);
    expect(onSignal).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(100);
    expect(onSignal.mock.lastCall?.[0]).toMatchObject({ resource: 'cpu' });
    await limiter.stop();
  });

  it('signals a timeout at the execution deadline', async () => {
    const onSignal = vi.fn();
    const limiter = new ResourceLimiter({
      backend: new FakeBackend(),
      handle: HANDLE,
      limits: { ...LIMITS, executionTimeoutSeconds: 1 },
      onSignal,
      sampleIntervalMs: 300,
    });
    limiter.start();

    await vi.advanceTimersByTimeAsync(999);
    expect(onSignal).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(onSignal).toHaveBeenCalledOnce();
    expect(onSignal.mock.lastCall?.[0]).toBeInstanceOf(TimeoutExceededError);
    await limiter.stop();
  });

  it('prefers a breach over a timeout seen on the same sample', async () => {
    const breachSignal = vi.fn();
    await new ResourceLimiter({
      backend: new FakeBackend({ stats: () => ({ memoryBytes: 500 }) }),
      handle: HANDLE,
      limits: LIMITS,
      onSignal: breachSignal,
      breachGraceMs: 0,
      now: () => 20_000,
    }).sample();
    expect(breachSignal.mock.lastCall?.[0]).toBeInstanceOf(HardResourceBreachError);

    const timeoutSignal = vi.fn();
    await new ResourceLimiter({
      backend: new FakeBackend(),
      handle: HANDLE,
      limits: LIMITS,
      onSignal: timeoutSignal,
      breachGraceMs: 0,
      now: () => 20_000,
    }).sample();
    expect(timeoutSignal.mock.lastCall?.[0]).toBeInstanceOf(TimeoutExceededError);
  });

  it('takes a final sample at the deadline so a breach due then still wins', async () => {
    const onSignal = vi.fn();
    const limiter = new ResourceLimiter({
      backend: new FakeBackend({ stats: () => ({ memoryBytes: 200 }) }),
      handle: HANDLE,
      limits: { ...LIMITS, executionTimeoutSeconds: 1 },
      onSignal,
      sampleIntervalMs: 100,
      breachGraceMs: 900,
    });
    limiter.start();

    await vi.advanceTimersByTimeAsync(1000);
    expect(onSignal).toHaveBeenCalledOnce();
    expect(onSignal.mock.lastCall?.[0]).toBeInstanceOf(HardResourceBreachError);
    await limiter.stop();
  });

  it('forwards every sample with its ratios and tracks peaks', async () => {
    const onSample = vi.fn();
    const limiter = new ResourceLimiter({
      backend: new FakeBackend({
        stats: (n) => ({ memoryBytes: n === 0 ? 50 : 30, cpuPercent: n === 0 ? 5 : 25 }),
      }),
      handle: HANDLE,
      limits: LIMITS,
      onSignal: vi.fn(),
      sampleIntervalMs: 100,
    });
    limiter.start();
    await vi.advanceTimersByTimeAsync(200);
    await limiter.stop();

    expect(limiter.peakMemoryBytes).toBe(50);
    expect(limiter.peakCpuPercent).toBe(25);

    const forwarding = new ResourceLimiter({
      backend: new FakeBackend({ stats: () => ({ memoryBytes: 50, cpuPercent: 25 }) }),
      handle: HANDLE,
      limits: LIMITS,
      onSignal: vi.fn(),
      onSample,
    });
    await forwarding.sample();
    expect(onSample).toHaveBeenCalledWith(
      expect.objectContaining({ memoryBytes: 50, cpuPercent: 25 }),
      { memoryRatio: 0.5, cpuRatio: 0.5 }
    );
  });

  it('logs and skips samples that fail', async () => {
    const logger = makeLogger();
    const onSample = vi.fn();
    const limiter = new ResourceLimiter({
      backend: new FakeBackend({ statsError: new Error('stats unavailable') }),
      handle: HANDLE,
      limits: LIMITS,
      onSignal: vi.fn(),
      onSample,
      logger,
    });
    await limiter.sample();

    expect(onSample).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith('Resource sample failed', {
      handleId: 'h-1',
      error: 'stats unavailable',
    });
  });

  it('raises nothing once stopped', async () => {
    const onSignal = vi.fn();
    const limiter = new ResourceLimiter({
      backend: new FakeBackend({ stats: () => ({ memoryBytes: 500 }) }),
      handle: HANDLE,
      limits: { ...LIMITS, executionTimeoutSeconds: 1 },
      onSignal,
      sampleIntervalMs: 100,
      breachGraceMs: 0,
    });
    limiter.start();
    await limiter.stop();

    await vi.advanceTimersByTimeAsync(5000);
    expect(onSignal).not.toHaveBeenCalled();
  });
});
