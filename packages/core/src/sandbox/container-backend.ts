/**
 * Container Isolation Backend
 *
 * Runs the target inside a throwaway container on a Docker-compatible engine.
 * The container is created with a keep-alive command so it outlives the
 * target; the target is then started with `exec`, which lets the backend
 * observe and kill it without losing the container's filesystem diff.
 *
 * Security features:
 * - Memory (no swap), CPU share and PID limits
 * - Capabilities dropped per security level, no-new-privileges always
 * - No network at all when network access is denied
 * - Restricted domains sinkholed through /etc/hosts entries
 */

import { PassThrough } from 'node:stream';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import Docker from 'dockerode';
import { z } from 'zod';
import type { ResourceLimits, SecurityLevel } from '@detonate/shared';
import { componentLogger, type SecureLogger } from '../logging/logger.js';
import { FileChangeCollector, type FilesystemChange } from '../monitor/collectors/file-change-collector.js';
import { FileWatchCollector, type WatchStarter } from '../monitor/collectors/file-watch-collector.js';
import { NetworkCollector } from '../monitor/collectors/network-collector.js';
import { ProcessCollector } from '../monitor/collectors/process-collector.js';
import type { ProcessInfo } from '../monitor/process-table.js';
import { parsePsTime } from '../monitor/process-table.js';
import { parseProcNetTcp, type SocketInfo } from '../monitor/socket-table.js';
import type { EventCollector } from '../monitor/types.js';
import { uuidv7 } from '../utils/crypto.js';
import { errorStatusCode, toErrorMessage } from '../utils/errors.js';
import {
  BackendUnavailableError,
  LaunchFailedError,
  ResourceAllocationFailedError,
  SandboxError,
} from './errors.js';
import { commandFor } from './process-backend.js';
import { execFailure, stageTarget } from './staging.js';
import type {
  BackendCapabilities,
  BackendHandle,
  ExitStatus,
  IsolationBackend,
  ResourceUsageSample,
} from './types.js';

const SANDBOX_DIR = '/sandbox';
const KEEP_ALIVE = ['tail', '-f', '/dev/null'];
const SOCKET_PROBE = ['cat', '/proc/net/tcp', '/proc/net/tcp6'];
const PS_ARGS = '-o pid,ppid,pgid,rss,time,args';

const CAP_DROPS: Readonly<Record<SecurityLevel, string[]>> = {
  low: ['SYS_ADMIN', 'SYS_MODULE'],
  medium: ['NET_ADMIN', 'SYS_ADMIN', 'SYS_MODULE', 'SYS_PTRACE'],
  high: ['ALL'],
};

/** /etc/hosts entries that send restricted domains nowhere. Wildcards block their base domain. */
export function buildSinkholes(domains: string[]): string[] {
  const hosts = new Set<string>();
  for (const domain of domains) {
    const host = domain.replace(/^\*\./, '').toLowerCase();
    if (host.length > 0 && !host.includes('*')) hosts.add(`${host}:0.0.0.0`);
  }
  return [...hosts];
}

export function buildCreateOptions(
  handleId: string,
  limits: ResourceLimits,
  opts: { image: string; pidsLimit: number; securityLevel: SecurityLevel; stagingDir: string }
): Docker.ContainerCreateOptions {
  const network = limits.networkAccessAllowed;
  return {
    Image: opts.image,
    Cmd: KEEP_ALIVE,
    WorkingDir: SANDBOX_DIR,
    Env: [`HOME=${SANDBOX_DIR}`, 'TMPDIR=/tmp'],
    Labels: { 'detonate.handle': handleId },
    NetworkDisabled: !network,
    HostConfig: {
      Memory: limits.memoryBytes,
      MemorySwap: limits.memoryBytes,
      NanoCpus: Math.round((limits.cpuPercent / 100) * 1e9),
      PidsLimit: opts.pidsLimit,
      CapDrop: CAP_DROPS[opts.securityLevel],
      SecurityOpt: ['no-new-privileges:true'],
      NetworkMode: network ? 'bridge' : 'none',
      ExtraHosts: network ? buildSinkholes(limits.restrictedDomains) : [],
      Binds: [`${opts.stagingDir}:${SANDBOX_DIR}:rw`],
      Privileged: false,
      AutoRemove: false,
    },
  };
}

const StatsSchema = z.object({
  memory_stats: z
    .object({
      usage: z.number().default(0),
      stats: z.record(z.string(), z.number()).default({}),
    })
    .default({}),
  cpu_stats: z
    .object({
      cpu_usage: z.object({ total_usage: z.number().default(0) }).default({}),
      system_cpu_usage: z.number().default(0),
      online_cpus: z.number().optional(),
    })
    .default({}),
  precpu_stats: z
    .object({
      cpu_usage: z.object({ total_usage: z.number().default(0) }).default({}),
      system_cpu_usage: z.number().default(0),
    })
    .default({}),
  pids_stats: z.object({ current: z.number().default(0) }).default({}),
  networks: z
    .record(z.string(), z.object({ rx_bytes: z.number().default(0), tx_bytes: z.number().default(0) }))
    .default({}),
});

/** Reduce an engine stats document to a usage sample. */
export function parseContainerStats(raw: unknown, timestamp: number): ResourceUsageSample {
  const stats = StatsSchema.parse(raw);
  const cache = stats.memory_stats.stats['inactive_file'] ?? stats.memory_stats.stats['cache'] ?? 0;

  const cpuDelta = stats.cpu_stats.cpu_usage.total_usage - stats.precpu_stats.cpu_usage.total_usage;
  const systemDelta = stats.cpu_stats.system_cpu_usage - stats.precpu_stats.system_cpu_usage;
  const online = stats.cpu_stats.online_cpus ?? 1;
  const cpuPercent = cpuDelta > 0 && systemDelta > 0 ? (cpuDelta / systemDelta) * online * 100 : 0;

  let networkRxBytes = 0;
  let networkTxBytes = 0;
  for (const iface of Object.values(stats.networks)) {
    networkRxBytes += iface.rx_bytes;
    networkTxBytes += iface.tx_bytes;
  }

  return {
    timestamp,
    memoryBytes: Math.max(0, stats.memory_stats.usage - cache),
    cpuPercent,
    networkRxBytes,
    networkTxBytes,
    processCount: stats.pids_stats.current,
  };
}

const TopSchema = z.object({
  Titles: z.array(z.string()),
  Processes: z.array(z.array(z.string())).nullable().default([]),
});

/** Parse `container.top` output requested with PS_ARGS, minus our own helpers. */
export function parseContainerTop(raw: unknown): ProcessInfo[] {
  const top = TopSchema.parse(raw);
  const col = (name: string) => top.Titles.findIndex((t) => t.toUpperCase() === name);
  const [pid, ppid, pgid, rss, time] = ['PID', 'PPID', 'PGID', 'RSS', 'TIME'].map(col);
  const args = top.Titles.findIndex((t) => ['COMMAND', 'ARGS', 'CMD'].includes(t.toUpperCase()));
  const helpers = [KEEP_ALIVE.join(' '), SOCKET_PROBE.join(' ')];

  const processes: ProcessInfo[] = [];
  for (const row of top.Processes ?? []) {
    const at = (i: number | undefined) => (i === undefined || i < 0 ? '' : (row[i] ?? ''));
    const command = at(args);
    if (helpers.includes(command)) continue;
    processes.push({
      pid: Number(at(pid)),
      ppid: Number(at(ppid)),
      pgid: Number(at(pgid)),
      rssBytes: Number(at(rss)) * 1024,
      cpuSeconds: parsePsTime(at(time)),
      command,
      name: path.posix.basename(command.split(/\s+/)[0] ?? ''),
    });
  }
  return processes;
}

const ChangesSchema = z
  .array(z.object({ Path: z.string(), Kind: z.number() }))
  .nullable()
  .transform((changes): FilesystemChange[] =>
    (changes ?? []).map((c) => ({ path: c.Path, kind: c.Kind }))
  );

interface ContainerSandbox {
  handle: BackendHandle;
  container: Docker.Container;
  stagingDir: string;
  staged: string | null;
  exit: Promise<ExitStatus> | null;
}

export interface ContainerBackendOptions {
  image: string;
  pidsLimit: number;
  securityLevel?: SecurityLevel;
  socketPath?: string;
  logger?: SecureLogger;
  tmpRoot?: string;
  now?: () => number;
  /** How often a running target's exec state is checked. Default 200ms. */
  exitPollMs?: number;
  /** Delay before the first exec check; an exit 126/127 by then fails the launch. Default 100ms. */
  launchCheckMs?: number;
  watchStarter?: WatchStarter;
}

export class ContainerBackend implements IsolationBackend {
  readonly method = 'container' as const;

  private readonly docker: Docker;
  private readonly image: string;
  private readonly pidsLimit: number;
  private readonly securityLevel: SecurityLevel;
  private readonly logger: SecureLogger;
  private readonly tmpRoot: string;
  private readonly now: () => number;
  private readonly exitPollMs: number;
  private readonly launchCheckMs: number;
  private readonly watchStarter: WatchStarter | undefined;
  private readonly sandboxes = new Map<string, ContainerSandbox>();

  constructor(opts: ContainerBackendOptions) {
    this.docker = opts.socketPath ? new Docker({ socketPath: opts.socketPath }) : new Docker();
    this.image = opts.image;
    this.pidsLimit = opts.pidsLimit;
    this.securityLevel = opts.securityLevel ?? 'high';
    this.logger = componentLogger('ContainerBackend', opts.logger);
    this.tmpRoot = opts.tmpRoot ?? tmpdir();
    this.now = opts.now ?? Date.now;
    this.exitPollMs = opts.exitPollMs ?? 200;
    this.launchCheckMs = opts.launchCheckMs ?? 100;
    this.watchStarter = opts.watchStarter;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.docker.ping();
      return true;
    } catch {
      return false;
    }
  }

  getCapabilities(): BackendCapabilities {
    return {
      method: 'container',
      platform: 'linux',
      networkIsolation: true,
      memoryLimit: true,
      domainRestriction: true,
    };
  }

  async prepare(limits: ResourceLimits): Promise<BackendHandle> {
    try {
      await this.docker.ping();
    } catch (err) {
      throw new BackendUnavailableError('container', 'engine is not reachable', err);
    }

    try {
      await this.ensureImage();
    } catch (err) {
      throw new ResourceAllocationFailedError(`image ${this.image} is not available`, err);
    }

    let stagingDir: string;
    try {
      stagingDir = await mkdtemp(path.join(this.tmpRoot, 'detonate-stage-'));
    } catch (err) {
      throw new ResourceAllocationFailedError('could not create staging directory', err);
    }

    const handle: BackendHandle = Object.freeze({ id: uuidv7(), method: this.method });
    let container: Docker.Container | null = null;
    try {
      container = await this.docker.createContainer(
        buildCreateOptions(handle.id, limits, {
          image: this.image,
          pidsLimit: this.pidsLimit,
          securityLevel: this.securityLevel,
          stagingDir,
        })
      );
      await container.start();
    } catch (err) {
      if (container) await this.removeContainer(container);
      await rm(stagingDir, { recursive: true, force: true });
      throw new ResourceAllocationFailedError(`container could not be started: ${toErrorMessage(err)}`, err);
    }

    this.sandboxes.set(handle.id, { handle, container, stagingDir, staged: null, exit: null });
    this.logger.info('Container sandbox prepared', {
      handleId: handle.id,
      containerId: container.id,
      image: this.image,
      network: limits.networkAccessAllowed,
    });
    return handle;
  }

  async stage(handle: BackendHandle, targetFilePath: string): Promise<void> {
    const sandbox = this.require(handle);
    sandbox.staged ??= await stageTarget(targetFilePath, sandbox.stagingDir);
  }

  async launch(handle: BackendHandle, targetFilePath: string): Promise<void> {
    const sandbox = this.require(handle);
    if (sandbox.exit) {
      throw new LaunchFailedError(targetFilePath, 'target already launched in this sandbox');
    }

    await this.stage(handle, targetFilePath);
    const command = commandFor(path.posix.join(SANDBOX_DIR, path.basename(targetFilePath)), 'linux');
    let exec: Docker.Exec;
    try {
      exec = await sandbox.container.exec({
        Cmd: command,
        WorkingDir: SANDBOX_DIR,
        AttachStdout: false,
        AttachStderr: false,
      });
      await exec.start({ Detach: true });
    } catch (err) {
      throw new LaunchFailedError(targetFilePath, toErrorMessage(err), err);
    }

    const exit = this.watchExit(handle.id, exec);
    sandbox.exit = exit;
    try {
      await this.checkLaunch(targetFilePath, exec);
    } catch (err) {
      // Nobody waits on a target that never started
      void exit.catch((watchErr: unknown) => {
        this.logger.debug('Exec watch ended', { handleId: handle.id, error: toErrorMessage(watchErr) });
      });
      throw err;
    }
    this.logger.info('Target launched', {
      handleId: handle.id,
      containerId: sandbox.container.id,
      command: command.join(' '),
    });
  }

  async wait(handle: BackendHandle): Promise<ExitStatus> {
    const sandbox = this.require(handle);
    if (!sandbox.exit) {
      throw new SandboxError('Target has not been launched', {
        code: 'INTERNAL_ERROR',
        terminalState: 'failed',
      });
    }
    return sandbox.exit;
  }

  async collectStats(handle: BackendHandle): Promise<ResourceUsageSample> {
    const sandbox = this.require(handle);
    const raw: unknown = await sandbox.container.stats({ stream: false });
    return parseContainerStats(raw, this.now());
  }

  async enforceKill(handle: BackendHandle): Promise<void> {
    const sandbox = this.sandboxes.get(handle.id);
    if (!sandbox) return;
    try {
      await sandbox.container.kill();
    } catch (err) {
      // 404: already gone, 409: not running
      const status = errorStatusCode(err);
      if (status !== 404 && status !== 409) throw err;
    }
  }

  async teardown(handle: BackendHandle): Promise<void> {
    const sandbox = this.sandboxes.get(handle.id);
    if (!sandbox) return;
    this.sandboxes.delete(handle.id);

    await this.removeContainer(sandbox.container);
    await rm(sandbox.stagingDir, { recursive: true, force: true });
    this.logger.debug('Container sandbox torn down', {
      handleId: handle.id,
      containerId: sandbox.container.id,
    });
  }

  collectors(handle: BackendHandle): EventCollector[] {
    const sandbox = this.require(handle);
    return [
      new ProcessCollector(() => this.processes(sandbox), this.now),
      new FileChangeCollector(() => this.changes(sandbox), this.now),
      new NetworkCollector(() => this.sockets(sandbox), this.now),
      // The engine's diff leaves out bind mounts, so the working directory is watched from the host
      new FileWatchCollector([sandbox.stagingDir], {
        watchStarter: this.watchStarter,
        now: this.now,
        logger: this.logger,
      }),
    ];
  }

  private async ensureImage(): Promise<void> {
    try {
      await this.docker.getImage(this.image).inspect();
      return;
    } catch (err) {
      if (errorStatusCode(err) !== 404) throw err;
    }

    this.logger.info('Pulling image', { image: this.image });
    const stream = await this.docker.pull(this.image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.logger.info('Image pulled', { image: this.image });
  }

  /** A detached exec that could not start its program exits 126/127 almost at once. */
  private async checkLaunch(targetFilePath: string, exec: Docker.Exec): Promise<void> {
    await new Promise<void>((resolve) => setTimeout(resolve, this.launchCheckMs));
    let info: Docker.ExecInspectInfo;
    try {
      info = await exec.inspect();
    } catch (err) {
      this.logger.debug('Exec inspect after launch failed', { error: toErrorMessage(err) });
      return;
    }
    const failure = info.Running ? null : execFailure(info.ExitCode);
    if (failure) throw new LaunchFailedError(targetFilePath, failure);
  }

  private async watchExit(handleId: string, exec: Docker.Exec): Promise<ExitStatus> {
    while (this.sandboxes.has(handleId)) {
      let info: Docker.ExecInspectInfo;
      try {
        info = await exec.inspect();
      } catch (err) {
        // The container was removed underneath the exec
        if (errorStatusCode(err) === 404) return { exitCode: null, signal: 'SIGKILL' };
        throw err;
      }
      if (!info.Running) {
        return { exitCode: info.ExitCode, signal: null };
      }
      await new Promise<void>((resolve) => setTimeout(resolve, this.exitPollMs));
    }
    return { exitCode: null, signal: 'SIGKILL' };
  }

  private async processes(sandbox: ContainerSandbox): Promise<ProcessInfo[]> {
    if (!sandbox.exit) return [];
    const raw: unknown = await sandbox.container.top({ ps_args: PS_ARGS });
    return parseContainerTop(raw);
  }

  private async changes(sandbox: ContainerSandbox): Promise<FilesystemChange[]> {
    const raw: unknown = await sandbox.container.changes();
    return ChangesSchema.parse(raw);
  }

  private async sockets(sandbox: ContainerSandbox): Promise<SocketInfo[]> {
    if (!sandbox.exit) return [];
    const output = await this.execOutput(sandbox.container, SOCKET_PROBE);
    return parseProcNetTcp(output);
  }

  private async execOutput(container: Docker.Container, cmd: string[]): Promise<string> {
    const exec = await container.exec({ Cmd: cmd, AttachStdout: true, AttachStderr: true });
    const stream = await exec.start({ hijack: true, stdin: false });

    const stdout = new PassThrough();
    const chunks: Buffer[] = [];
    stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    this.docker.modem.demuxStream(stream, stdout, new PassThrough());

    await new Promise<void>((resolve, reject) => {
      stream.on('end', resolve);
      stream.on('error', reject);
    });
    return Buffer.concat(chunks).toString('utf8');
  }

  private async removeContainer(container: Docker.Container): Promise<void> {
    try {
      await container.remove({ force: true, v: true });
    } catch (err) {
      const status = errorStatusCode(err);
      if (status !== 404 && status !== 409) {
        this.logger.warn('Failed to remove container', {
          containerId: container.id,
          error: toErrorMessage(err),
        });
      }
    }
  }

  private require(handle: BackendHandle): ContainerSandbox {
    const sandbox = this.sandboxes.get(handle.id);
    if (!sandbox) {
      throw new SandboxError(`Unknown sandbox handle ${handle.id}`, {
        code: 'INTERNAL_ERROR',
        terminalState: 'failed',
      });
    }
    return sandbox;
  }
}
