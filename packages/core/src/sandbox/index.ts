/**
 * Sandbox Module — isolation backends, their selection and resource limits.
 */

export type {
  BackendCapabilities,
  BackendHandle,
  ExitStatus,
  IsolationBackend,
  ResourceUsageSample,
} from './types.js';

export {
  SandboxError,
  BackendUnavailableError,
  ResourceAllocationFailedError,
  LaunchFailedError,
  BackendBusyError,
  TimeoutExceededError,
  BlacklistedOperationError,
  HardResourceBreachError,
  CancelledError,
  toSandboxError,
  type SandboxErrorCode,
} from './errors.js';

export { ProcessBackend, type ProcessBackendOptions } from './process-backend.js';
export { ContainerBackend, type ContainerBackendOptions } from './container-backend.js';
export {
  createBackend,
  type BackendSelection,
  type BackendFactoryDeps,
} from './backend-factory.js';
export {
  ResourceLimiter,
  usageRatios,
  type LimitSignal,
  type ResourceLimiterOptions,
  type UsageRatios,
} from './limiter.js';
export { detectNamespaceSupport, type NamespaceCapabilities } from './namespaces.js';
