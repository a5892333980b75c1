/**
 * Isolation backend abstraction.
 *
 * A backend creates and tears down one isolated environment per handle and
 * exposes the same capability set whichever mechanism (container engine or a
 * constrained process group) sits underneath.
 */

import type { IsolationMethod, ResourceLimits } from '@detonate/shared';
import type { EventCollector } from '../monitor/types.js';

/** Opaque token for an allocated environment. State stays inside the backend. */
export interface BackendHandle {
  readonly id: string;
  readonly method: IsolationMethod;
}

export interface ExitStatus {
  exitCode: number | null;
  signal: string | null;
}

export interface ResourceUsageSample {
  timestamp: number;
  memoryBytes: number;
  cpuPercent: number;
  networkRxBytes: number;
  networkTxBytes: number;
  processCount: number;
}

export interface BackendCapabilities {
  method: IsolationMethod;
  platform: 'linux' | 'darwin' | 'win32' | 'other';
  networkIsolation: boolean;
  memoryLimit: boolean;
  domainRestriction: boolean;
}

export interface IsolationBackend {
  readonly method: IsolationMethod;

  /** Cheap availability probe, used when choosing or falling back between backends. */
  isAvailable(): Promise<boolean>;

  getCapabilities(): BackendCapabilities;

  /**
   * Allocate the environment with limits applied.
   * Throws BackendUnavailableError or ResourceAllocationFailedError.
   */
  prepare(limits: ResourceLimits): Promise<BackendHandle>;

  /**
   * Copy the target into the environment. Called before the collectors start,
   * so staging is never reported as activity of the target. Idempotent.
   * Throws LaunchFailedError.
   */
  stage(handle: BackendHandle, targetFilePath: string): Promise<void>;

  /** Start the target, staging it first if that has not happened. Throws LaunchFailedError. */
  launch(handle: BackendHandle, targetFilePath: string): Promise<void>;

  /** Resolves once the launched target has exited. */
  wait(handle: BackendHandle): Promise<ExitStatus>;

  collectStats(handle: BackendHandle): Promise<ResourceUsageSample>;

  /** Kill everything inside the environment. Idempotent. */
  enforceKill(handle: BackendHandle): Promise<void>;

  /** Release the environment. Idempotent. */
  teardown(handle: BackendHandle): Promise<void>;

  /** Collectors observing this environment's activity. */
  collectors(handle: BackendHandle): EventCollector[];
}
