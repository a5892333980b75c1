/**
 * Test Setup — in-process stand-ins for isolation backends and collectors.
 *
 * FakeBackend records every capability call and lets a test decide when the
 * target exits; QueueCollector hands out whatever events a test pushed since
 * the last poll. createStreams captures CLI output.
 */

import { Writable } from 'node:stream';
import { vi } from 'vitest';
import type { IsolationMethod, ResourceLimits } from '@detonate/shared';
import type { SecureLogger } from './logging/logger.js';
import type { CollectedEvent, EventCollector } from './monitor/types.js';
import type {
  BackendCapabilities,
  BackendHandle,
  ExitStatus,
  IsolationBackend,
  ResourceUsageSample,
} from './sandbox/types.js';

export function makeLogger() {
  const logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
    level: 'info' as const,
  };
  logger.child.mockReturnValue(logger);
  return logger satisfies SecureLogger;
}

export class QueueCollector implements EventCollector {
  private queue: CollectedEvent[] = [];
  closed = false;

  constructor(readonly name = 'queue') {}

  push(...events: CollectedEvent[]): void {
    this.queue.push(...events);
  }

  async poll(): Promise<CollectedEvent[]> {
    const batch = this.queue;
    this.queue = [];
    return batch;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export interface FakeBackendOptions {
  method?: IsolationMethod;
  available?: boolean;
  prepareError?: Error;
  /** prepare() does not settle until this resolves. */
  prepareGate?: Promise<void>;
  stageError?: Error;
  launchError?: Error;
  killError?: Error;
  teardownError?: Error;
  statsError?: Error;
  /** Usage reported by the n-th collectStats call (0-based). */
  stats?: (call: number) => Partial<ResourceUsageSample>;
  collectors?: EventCollector[];
}

export class FakeBackend implements IsolationBackend {
  readonly method: IsolationMethod;
  readonly calls: string[] = [];
  limits: ResourceLimits | null = null;
  launchedTarget: string | null = null;

  private readonly opts: FakeBackendOptions;
  private statsCalls = 0;
  private resolveExit: (status: ExitStatus) => void = () => {};
  private readonly exit: Promise<ExitStatus>;

  constructor(opts: FakeBackendOptions = {}) {
    this.opts = opts;
    this.method = opts.method ?? 'process';
    this.exit = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  /** Let the launched target exit. */
  exitTarget(status: ExitStatus = { exitCode: 0, signal: null }): void {
    this.resolveExit(status);
  }

  async isAvailable(): Promise<boolean> {
    return this.opts.available ?? true;
  }

  getCapabilities(): BackendCapabilities {
    return {
      method: this.method,
      platform: 'linux',
      networkIsolation: true,
      memoryLimit: true,
      domainRestriction: this.method === 'container',
    };
  }

  async prepare(limits: ResourceLimits): Promise<BackendHandle> {
    this.calls.push('prepare');
    await this.opts.prepareGate;
    if (this.opts.prepareError) throw this.opts.prepareError;
    this.limits = limits;
    return { id: 'fake-handle', method: this.method };
  }

  async stage(_handle: BackendHandle, _targetFilePath: string): Promise<void> {
    this.calls.push('stage');
    if (this.opts.stageError) throw this.opts.stageError;
  }

  async launch(_handle: BackendHandle, targetFilePath: string): Promise<void> {
    this.calls.push('launch');
    if (this.opts.launchError) throw this.opts.launchError;
    this.launchedTarget = targetFilePath;
  }

  wait(_handle: BackendHandle): Promise<ExitStatus> {
    this.calls.push('wait');
    return this.exit;
  }

  async collectStats(_handle: BackendHandle): Promise<ResourceUsageSample> {
    const call = this.statsCalls++;
    if (this.opts.statsError) throw this.opts.statsError;
    return {
      timestamp: Date.now(),
      memoryBytes: 0,
      cpuPercent: 0,
      networkRxBytes: 0,
      networkTxBytes: 0,
      processCount: 1,
      ...this.opts.stats?.(call),
    };
  }

  async enforceKill(_handle: BackendHandle): Promise<void> {
    this.calls.push('enforceKill');
    if (this.opts.killError) throw this.opts.killError;
    this.resolveExit({ exitCode: null, signal: 'SIGKILL' });
  }

  async teardown(_handle: BackendHandle): Promise<void> {
    this.calls.push('teardown');
    if (this.opts.teardownError) throw this.opts.teardownError;
  }

  collectors(_handle: BackendHandle): EventCollector[] {
    this.calls.push('collectors');
    return this.opts.collectors ?? [];
  }
}

/** stdout/stderr pair that keeps what was written. */
export function createStreams() {
  const capture = () => {
    let buffer = '';
    const stream = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        buffer += chunk.toString();
        callback();
      },
    });
    return { stream, text: () => buffer };
  };
  const out = capture();
  const err = capture();
  return { stdout: out.stream, stderr: err.stream, getStdout: out.text, getStderr: err.text };
}
