/**
 * Sandbox Error Types
 *
 * Every failure the orchestrator can meet while establishing or running a
 * sandbox carries a stable `code` and the terminal state it maps to. Failed
 * states mean the sandbox itself could not be established; blocked and
 * timed-out states mean the target ran and was stopped.
 */

import type { TerminalState } from '@detonate/shared';

export type SandboxErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'RESOURCE_ALLOCATION_FAILED'
  | 'LAUNCH_FAILED'
  | 'BACKEND_BUSY'
  | 'TIMEOUT_EXCEEDED'
  | 'BLACKLISTED_OPERATION'
  | 'HARD_RESOURCE_BREACH'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export class SandboxError extends Error {
  readonly code: SandboxErrorCode;
  readonly terminalState: TerminalState;

  constructor(
    message: string,
    options: { code: SandboxErrorCode; terminalState: TerminalState; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'SandboxError';
    this.code = options.code;
    this.terminalState = options.terminalState;
  }
}

export class BackendUnavailableError extends SandboxError {
  readonly backend: string;

  constructor(backend: string, detail: string, cause?: unknown) {
    super(`${backend} isolation is unavailable: ${detail}`, {
      code: 'BACKEND_UNAVAILABLE',
      terminalState: 'failed',
      cause,
    });
    this.name = 'BackendUnavailableError';
    this.backend = backend;
  }
}

export class ResourceAllocationFailedError extends SandboxError {
  constructor(detail: string, cause?: unknown) {
    super(`Could not allocate sandbox resources: ${detail}`, {
      code: 'RESOURCE_ALLOCATION_FAILED',
      terminalState: 'failed',
      cause,
    });
    this.name = 'ResourceAllocationFailedError';
  }
}

export class LaunchFailedError extends SandboxError {
  readonly targetFilePath: string;

  constructor(targetFilePath: string, detail: string, cause?: unknown) {
    super(`Could not launch ${targetFilePath}: ${detail}`, {
      code: 'LAUNCH_FAILED',
      terminalState: 'failed',
      cause,
    });
    this.name = 'LaunchFailedError';
    this.targetFilePath = targetFilePath;
  }
}

export class BackendBusyError extends SandboxError {
  constructor() {
    super('Isolation backend is already running a session', {
      code: 'BACKEND_BUSY',
      terminalState: 'failed',
    });
    this.name = 'BackendBusyError';
  }
}

export class TimeoutExceededError extends SandboxError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super(`Execution exceeded ${String(timeoutSeconds)}s`, {
      code: 'TIMEOUT_EXCEEDED',
      terminalState: 'timed_out',
    });
    this.name = 'TimeoutExceededError';
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class BlacklistedOperationError extends SandboxError {
  readonly application: string;

  constructor(application: string) {
    super(`Blacklisted application started: ${application}`, {
      code: 'BLACKLISTED_OPERATION',
      terminalState: 'blocked',
    });
    this.name = 'BlacklistedOperationError';
    this.application = application;
  }
}

export class HardResourceBreachError extends SandboxError {
  readonly resource: 'memory' | 'cpu';

  constructor(resource: 'memory' | 'cpu', detail: string) {
    super(`Hard ${resource} limit breached: ${detail}`, {
      code: 'HARD_RESOURCE_BREACH',
      terminalState: 'blocked',
    });
    this.name = 'HardResourceBreachError';
    this.resource = resource;
  }
}

export class CancelledError extends SandboxError {
  constructor(reason?: string) {
    super(reason ? `Analysis cancelled: ${reason}` : 'Analysis cancelled', {
      code: 'CANCELLED',
      terminalState: 'blocked',
    });
    this.name = 'CancelledError';
  }
}

/** Wrap anything thrown by a backend into the taxonomy. */
export function toSandboxError(err: unknown): SandboxError {
  if (err instanceof SandboxError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SandboxError(`Unexpected sandbox failure: ${message}`, {
    code: 'INTERNAL_ERROR',
    terminalState: 'failed',
    cause: err,
  });
}
