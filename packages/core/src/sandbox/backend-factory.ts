/**
 * Backend factory — picks the isolation backend for a requested method.
 *
 * Container isolation is probed before use. When the engine cannot be reached
 * and `container.allow_fallback` is set, the process backend takes over and
 * the result records which method was asked for. Without fallback the
 * container backend is returned as is, and the session fails when it cannot
 * be prepared.
 */

import type { AnalysisConfig, IsolationMethod, SecurityLevel } from '@detonate/shared';
import { componentLogger, type SecureLogger } from '../logging/logger.js';
import { ContainerBackend, type ContainerBackendOptions } from './container-backend.js';
import { ProcessBackend, type ProcessBackendOptions } from './process-backend.js';
import type { IsolationBackend } from './types.js';

export interface BackendSelection {
  backend: IsolationBackend;
  /** Set when the requested method was unavailable and another was used. */
  fallbackFrom?: IsolationMethod;
}

export interface BackendFactoryDeps {
  logger?: SecureLogger;
  createContainer?: (opts: ContainerBackendOptions) => IsolationBackend;
  createProcess?: (opts: ProcessBackendOptions) => IsolationBackend;
}

export async function createBackend(
  method: IsolationMethod,
  config: AnalysisConfig,
  securityLevel: SecurityLevel,
  deps: BackendFactoryDeps = {}
): Promise<BackendSelection> {
  const logger = componentLogger('BackendFactory', deps.logger);
  const createContainer = deps.createContainer ?? ((opts) => new ContainerBackend(opts));
  const createProcess = deps.createProcess ?? ((opts) => new ProcessBackend(opts));

  const processBackend = () =>
    createProcess({ logger: deps.logger, watchPaths: [...config.monitoring.watch_paths] });

  if (method === 'process') {
    return { backend: processBackend() };
  }

  const container = createContainer({
    image: config.container.image,
    pidsLimit: config.container.pids_limit,
    securityLevel,
    socketPath: config.container.socket_path,
    logger: deps.logger,
  });
  if (!config.container.allow_fallback || (await container.isAvailable())) {
    return { backend: container };
  }

  logger.warn('Container engine unavailable, falling back to process isolation', {
    image: config.container.image,
  });
  return { backend: processBackend(), fallbackFrom: 'container' };
}
