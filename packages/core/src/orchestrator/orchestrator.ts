/**
 * SandboxOrchestrator — drives one analysis through its lifecycle.
 *
 *   pending → preparing → running → monitoring → completed | timed_out | blocked | failed
 *
 * `execute` never rejects: every outcome, including a sandbox that could not
 * be established, is returned as a frozen ExecutionReport. Once `prepare` has
 * produced a handle, `teardown` runs exactly once whatever happens next.
 *
 * While the target runs, four signals race: target exit, the execution
 * deadline, a blocking breach (resource limit or blacklisted process) and
 * external cancellation. The first one ends the run; the monitor is then
 * drained, and every signal seen up to that point is resolved by precedence
 * blocked > timed_out > completed.
 */

import { EventEmitter } from 'node:events';
import * as path from 'node:path';
import type {
  ExecutionReport,
  ExecutionRequest,
  IsolationMethod,
  MonitoredEvent,
  ReportCause,
  SessionState,
  TerminalState,
  ThreatScore,
} from '@detonate/shared';
import { EMPTY_SCORE, type ThreatDetector } from '../detection/threat-detector.js';
import { componentLogger, type SecureLogger } from '../logging/logger.js';
import { ActivityMonitor } from '../monitor/activity-monitor.js';
import {
  BackendBusyError,
  BlacklistedOperationError,
  CancelledError,
  SandboxError,
  toSandboxError,
} from '../sandbox/errors.js';
import { ResourceLimiter } from '../sandbox/limiter.js';
import type { BackendHandle, ExitStatus, IsolationBackend } from '../sandbox/types.js';
import { uuidv7 } from '../utils/crypto.js';
import { toErrorMessage } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';

export interface OrchestratorEvents {
  state: [state: SessionState, sessionId: string];
  event: [event: MonitoredEvent];
  score: [score: ThreatScore, event: MonitoredEvent];
}

export interface OrchestratorOptions {
  backend: IsolationBackend;
  detector: ThreatDetector;
  /** Application names whose start blocks the run. */
  blacklist?: readonly string[];
  /** Isolation method that was requested but unavailable. */
  fallbackFrom?: IsolationMethod;
  pollIntervalMs?: number;
  sampleIntervalMs?: number;
  breachGraceMs?: number;
  logger?: SecureLogger;
  now?: () => number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

interface SandboxSession {
  sessionId: string;
  handle: BackendHandle | null;
  state: SessionState;
  startTime: number;
  events: MonitoredEvent[];
  currentScore: ThreatScore;
  exit: ExitStatus | null;
  peakMemoryBytes: number;
  peakCpuPercent: number;
}

/** What ended the monitoring phase. */
type RunSignal = { kind: 'exit' } | { kind: 'error'; error: SandboxError };

const PRECEDENCE: Readonly<Record<TerminalState, number>> = {
  failed: 3,
  blocked: 2,
  timed_out: 1,
  completed: 0,
};

/** Executable name without directory or Windows extension, lower-cased. */
export function executableName(value: string): string {
  const first = value.trim().split(/\s+/)[0] ?? '';
  const base = path.win32.basename(path.posix.basename(first)).toLowerCase();
  return base.replace(/\.(exe|com|bat|cmd)$/, '');
}

/** Pick the outcome among the signals seen in one window. Errors beat a plain exit. */
export function resolveTerminalState(signals: readonly RunSignal[]): RunSignal {
  let chosen: RunSignal = { kind: 'exit' };
  let rank = PRECEDENCE.completed;
  for (const signal of signals) {
    if (signal.kind !== 'error') continue;
    const r = PRECEDENCE[signal.error.terminalState];
    if (r > rank) {
      chosen = signal;
      rank = r;
    }
  }
  return chosen;
}

export class SandboxOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly backend: IsolationBackend;
  private readonly detector: ThreatDetector;
  private readonly blacklist: ReadonlySet<string>;
  private readonly fallbackFrom: IsolationMethod | undefined;
  private readonly pollIntervalMs: number | undefined;
  private readonly sampleIntervalMs: number | undefined;
  private readonly breachGraceMs: number | undefined;
  private readonly logger: SecureLogger;
  private readonly now: () => number;
  private active = false;

  constructor(opts: OrchestratorOptions) {
    super();
    this.backend = opts.backend;
    this.detector = opts.detector;
    this.blacklist = new Set((opts.blacklist ?? []).map(executableName));
    this.fallbackFrom = opts.fallbackFrom;
    this.pollIntervalMs = opts.pollIntervalMs;
    this.sampleIntervalMs = opts.sampleIntervalMs;
    this.breachGraceMs = opts.breachGraceMs;
    this.logger = componentLogger('SandboxOrchestrator', opts.logger);
    this.now = opts.now ?? Date.now;
  }

  get busy(): boolean {
    return this.active;
  }

  async execute(request: ExecutionRequest, options: ExecuteOptions = {}): Promise<ExecutionReport> {
    const session = this.newSession();
    if (this.active) {
      return this.finalize(request, session, 'failed', new BackendBusyError());
    }

    this.active = true;
    try {
      return await this.run(request, session, options.signal);
    } catch (err) {
      // Anything that slipped past the lifecycle still becomes a report
      return this.finalize(request, session, 'failed', toSandboxError(err));
    } finally {
      this.active = false;
    }
  }

  private newSession(): SandboxSession {
    return {
      sessionId: uuidv7(),
      handle: null,
      state: 'pending',
      startTime: this.now(),
      events: [],
      currentScore: EMPTY_SCORE,
      exit: null,
      peakMemoryBytes: 0,
      peakCpuPercent: 0,
    };
  }

  private async run(
    request: ExecutionRequest,
    session: SandboxSession,
    signal: AbortSignal | undefined
  ): Promise<ExecutionReport> {
    const log = this.logger.child({ sessionId: session.sessionId });
    log.info('Analysis started', {
      target: request.targetFilePath,
      securityLevel: request.securityLevel,
      backend: this.backend.method,
    });

    if (signal?.aborted) {
      return this.finalize(request, session, 'blocked', this.cancellation(signal));
    }

    this.transition(session, 'preparing');
    let handle: BackendHandle;
    try {
      handle = await this.backend.prepare(request.limits);
    } catch (err) {
      const error = toSandboxError(err);
      log.error('Sandbox preparation failed', { code: error.code, error: error.message });
      return this.finalize(request, session, 'failed', error);
    }
    session.handle = handle;

    let outcome: RunSignal;
    try {
      outcome = signal?.aborted
        ? { kind: 'error', error: this.cancellation(signal) }
        : await this.monitorRun(request, session, handle, signal, log);
    } catch (err) {
      outcome = { kind: 'error', error: toSandboxError(err) };
    }

    try {
      await this.backend.teardown(handle);
    } catch (err) {
      log.warn('Sandbox teardown failed', { error: toErrorMessage(err) });
    }

    if (outcome.kind === 'exit') {
      return this.finalize(request, session, 'completed');
    }
    return this.finalize(request, session, outcome.error.terminalState, outcome.error);
  }

  private async monitorRun(
    request: ExecutionRequest,
    session: SandboxSession,
    handle: BackendHandle,
    abort: AbortSignal | undefined,
    log: SecureLogger
  ): Promise<RunSignal> {
    this.transition(session, 'running');
    await this.backend.stage(handle, request.targetFilePath);

    const monitor = new ActivityMonitor({
      sessionId: session.sessionId,
      collectors: this.backend.collectors(handle),
      pollIntervalMs: this.pollIntervalMs,
      logger: this.logger,
    });
    await monitor.start();

    try {
      await this.backend.launch(handle, request.targetFilePath);
    } catch (err) {
      await monitor.stop();
      await this.consume(session, monitor, () => {});
      throw err;
    }

    const signals: RunSignal[] = [];
    let settle: () => void = () => {};
    const ended = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const raise = (s: RunSignal) => {
      signals.push(s);
      settle();
    };

    const consumer = this.consume(session, monitor, (error) => raise({ kind: 'error', error }));

    const limiter = new ResourceLimiter({
      backend: this.backend,
      handle,
      limits: request.limits,
      sampleIntervalMs: this.sampleIntervalMs,
      breachGraceMs: this.breachGraceMs,
      now: this.now,
      logger: this.logger,
      onSignal: (error) => raise({ kind: 'error', error }),
      onSample: (sample, ratios) => {
        monitor.record({
          timestamp: sample.timestamp,
          category: 'ResourceUsage',
          attributes: {
            memoryBytes: sample.memoryBytes,
            cpuPercent: Math.round(sample.cpuPercent * 100) / 100,
            networkRxBytes: sample.networkRxBytes,
            networkTxBytes: sample.networkTxBytes,
            processCount: sample.processCount,
            memoryRatio: ratios.memoryRatio,
            cpuRatio: ratios.cpuRatio,
          },
        });
      },
    });

    const onAbort = () => raise({ kind: 'error', error: this.cancellation(abort) });
    abort?.addEventListener('abort', onAbort, { once: true });

    void this.backend.wait(handle).then(
      (status) => {
        session.exit = status;
        raise({ kind: 'exit' });
      },
      (err: unknown) => raise({ kind: 'error', error: toSandboxError(err) })
    );

    this.transition(session, 'monitoring');
    limiter.start();

    try {
      await ended;
      const first = signals[0];
      if (first?.kind === 'error') {
        log.warn('Stopping target', { code: first.error.code, reason: first.error.message });
        try {
          await this.backend.enforceKill(handle);
        } catch (err) {
          // The verdict is already decided; teardown still follows
          log.warn('Failed to stop target', { error: toErrorMessage(err) });
        }
      }
    } finally {
      abort?.removeEventListener('abort', onAbort);
      await limiter.stop();
      await monitor.stop();
      await consumer;
      session.peakMemoryBytes = limiter.peakMemoryBytes;
      session.peakCpuPercent = limiter.peakCpuPercent;
    }

    return resolveTerminalState(signals);
  }

  /** Feed delivered events to the detector until the stream ends. */
  private async consume(
    session: SandboxSession,
    monitor: ActivityMonitor,
    onBlocked: (error: SandboxError) => void
  ): Promise<void> {
    for await (const event of monitor) {
      session.events.push(event);
      session.currentScore = this.detector.observe(event, session.currentScore);
      this.publish(event, session.currentScore);

      const blocked = this.blacklisted(event);
      if (blocked) onBlocked(new BlacklistedOperationError(blocked));
    }
  }

  private blacklisted(event: MonitoredEvent): string | null {
    if (event.category !== 'ProcessOp' || this.blacklist.size === 0) return null;
    if (event.attributes['action'] !== 'spawn') return null;

    for (const key of ['name', 'command']) {
      const value = event.attributes[key];
      if (typeof value !== 'string') continue;
      const name = executableName(value);
      if (this.blacklist.has(name)) return name;
    }
    return null;
  }

  private publish(event: MonitoredEvent, score: ThreatScore): void {
    try {
      this.emit('event', event);
      this.emit('score', score, event);
    } catch (err) {
      this.logger.warn('Event listener failed', { error: toErrorMessage(err) });
    }
  }

  private transition(session: SandboxSession, state: SessionState): void {
    session.state = state;
    try {
      this.emit('state', state, session.sessionId);
    } catch (err) {
      this.logger.warn('State listener failed', { error: toErrorMessage(err) });
    }
  }

  private cancellation(signal: AbortSignal | undefined): CancelledError {
    const reason: unknown = signal?.reason;
    return new CancelledError(reason instanceof Error ? reason.message : undefined);
  }

  private finalize(
    request: ExecutionRequest,
    session: SandboxSession,
    finalState: TerminalState,
    error?: SandboxError
  ): ExecutionReport {
    this.transition(session, finalState);
    const endTime = Math.max(this.now(), session.startTime);
    const failed = finalState === 'failed';
    const score = failed ? EMPTY_SCORE : session.currentScore;
    const cause: ReportCause | undefined = error ? { code: error.code, message: error.message } : undefined;

    const report: ExecutionReport = {
      request,
      finalState,
      session: {
        sessionId: session.sessionId,
        backend: session.handle ? this.backend.method : null,
        ...(this.fallbackFrom ? { fallbackFrom: this.fallbackFrom } : {}),
        startTime: session.startTime,
        endTime,
        durationMs: endTime - session.startTime,
        exitCode: session.exit?.exitCode ?? null,
        exitSignal: session.exit?.signal ?? null,
        eventCount: session.events.length,
        peakMemoryBytes: session.peakMemoryBytes,
        peakCpuPercent: session.peakCpuPercent,
      },
      score: { ...score, matchedSignatures: [...score.matchedSignatures], behaviorFlags: [...score.behaviorFlags] },
      threatLevel: failed ? 'none' : this.detector.classify(score),
      events: [...session.events],
      ...(cause ? { cause } : {}),
      generatedAt: Math.max(endTime, 1),
    };

    this.logger.info('Analysis finished', {
      sessionId: session.sessionId,
      finalState,
      threatLevel: report.threatLevel,
      score: report.score.aggregateValue,
      events: report.events.length,
      ...(cause ? { cause: cause.code } : {}),
    });
    return deepFreeze(report);
  }
}
