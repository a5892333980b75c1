/**
 * Process Isolation Backend
 *
 * Runs the target as a detached process group in a private working directory.
 * Weaker than container isolation, but needs nothing beyond the host OS:
 *
 * - memory ceiling through `ulimit -v` (POSIX)
 * - network denied through an unshared network namespace (Linux only)
 * - stats from the platform process table
 * - file, process, socket and (win32) autorun registry collectors
 *
 * Restricted domains cannot be enforced here and are only logged.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import type { ResourceLimits } from '@detonate/shared';
import { componentLogger, type SecureLogger } from '../logging/logger.js';
import { ProcessCollector } from '../monitor/collectors/process-collector.js';
import { NetworkCollector } from '../monitor/collectors/network-collector.js';
import { FileWatchCollector, type WatchStarter } from '../monitor/collectors/file-watch-collector.js';
import { RegistryCollector } from '../monitor/collectors/registry-collector.js';
import { createProcessTable, type ProcessInfo, type ProcessTable } from '../monitor/process-table.js';
import { createSocketTable, type SocketTable } from '../monitor/socket-table.js';
import type { EventCollector } from '../monitor/types.js';
import { isCommandAvailable, runCommand, type CommandRunner } from '../utils/command.js';
import { uuidv7 } from '../utils/crypto.js';
import { errorCode, toErrorMessage } from '../utils/errors.js';
import { buildUnshareArgs, detectNamespaceSupport, type NamespaceCapabilities } from './namespaces.js';
import { LaunchFailedError, ResourceAllocationFailedError, SandboxError } from './errors.js';
import { execFailure, preflightCommand, stageTarget } from './staging.js';
import type {
  BackendCapabilities,
  BackendHandle,
  ExitStatus,
  IsolationBackend,
  ResourceUsageSample,
} from './types.js';

const INTERPRETERS: Readonly<Record<string, string[]>> = {
  '.sh': ['sh'],
  '.py': ['python3'],
  '.js': ['node'],
  '.mjs': ['node'],
  '.pl': ['perl'],
};

const WIN32_INTERPRETERS: Readonly<Record<string, string[]>> = {
  '.bat': ['cmd.exe', '/c'],
  '.cmd': ['cmd.exe', '/c'],
  '.ps1': ['powershell.exe', '-NoProfile', '-ExecutionPolicy', 'Bypass', '-File'],
  '.py': ['python'],
  '.js': ['node'],
};

/** Command vector that runs `file`, chosen from its extension. */
export function commandFor(file: string, platform: NodeJS.Platform = process.platform): string[] {
  const ext = path.extname(file).toLowerCase();
  const table = platform === 'win32' ? WIN32_INTERPRETERS : INTERPRETERS;
  const interpreter = table[ext];
  return interpreter ? [...interpreter, file] : [file];
}

const PASSTHROUGH_ENV = ['PATH', 'LANG', 'SystemRoot', 'WINDIR', 'COMSPEC', 'PATHEXT'];

/** Minimal environment for the target: no inherited secrets, home inside the sandbox. */
export function buildSandboxEnv(
  workDir: string,
  source: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const name of PASSTHROUGH_ENV) {
    const value = source[name];
    if (value !== undefined) env[name] = value;
  }
  env.PATH ??= '/usr/local/bin:/usr/bin:/bin';
  env.HOME = workDir;
  env.USERPROFILE = workDir;
  env.TMPDIR = workDir;
  env.TEMP = workDir;
  return env;
}

/** POSIX launcher: apply the memory ceiling, then exec the real command in place. */
export function buildPosixLauncher(memoryBytes: number, command: string[]): string[] {
  const kb = Math.max(1, Math.floor(memoryBytes / 1024));
  return ['-c', `ulimit -v ${String(kb)} 2>/dev/null; exec "$0" "$@"`, ...command];
}

interface ProcessSandbox {
  handle: BackendHandle;
  limits: ResourceLimits;
  workDir: string;
  isolateNetwork: boolean;
  staged: string | null;
  child: ChildProcess | null;
  exit: Promise<ExitStatus> | null;
  processes: ProcessInfo[];
  lastCpu: { seconds: number; at: number } | null;
}

export interface ProcessBackendOptions {
  logger?: SecureLogger;
  platform?: NodeJS.Platform;
  processTable?: ProcessTable;
  socketTable?: SocketTable;
  detectNamespaces?: () => NamespaceCapabilities;
  /** Watched in addition to each sandbox's working directory. */
  watchPaths?: string[];
  watchStarter?: WatchStarter;
  run?: CommandRunner;
  tmpRoot?: string;
  now?: () => number;
  /** How long teardown waits for a killed target to be reaped. Default 2000ms. */
  reapTimeoutMs?: number;
  /** An exit 126/127 within this window after spawn fails the launch. Default 100ms. */
  launchCheckMs?: number;
  commandAvailable?: (cmd: string) => boolean;
}

export class ProcessBackend implements IsolationBackend {
  readonly method = 'process' as const;

  private readonly logger: SecureLogger;
  private readonly platform: NodeJS.Platform;
  private readonly processTable: ProcessTable;
  private readonly socketTable: SocketTable;
  private readonly detectNamespaces: () => NamespaceCapabilities;
  private readonly watchPaths: string[];
  private readonly watchStarter: WatchStarter | undefined;
  private readonly run: CommandRunner;
  private readonly tmpRoot: string;
  private readonly now: () => number;
  private readonly reapTimeoutMs: number;
  private readonly launchCheckMs: number;
  private readonly commandAvailable: (cmd: string) => boolean;
  private readonly sandboxes = new Map<string, ProcessSandbox>();
  private namespaces: NamespaceCapabilities | null = null;

  constructor(opts: ProcessBackendOptions = {}) {
    this.logger = componentLogger('ProcessBackend', opts.logger);
    this.platform = opts.platform ?? process.platform;
    this.processTable = opts.processTable ?? createProcessTable(this.platform);
    this.socketTable = opts.socketTable ?? createSocketTable(this.platform);
    this.detectNamespaces = opts.detectNamespaces ?? (() => detectNamespaceSupport());
    this.watchPaths = opts.watchPaths ?? [];
    this.watchStarter = opts.watchStarter;
    this.run = opts.run ?? runCommand;
    this.tmpRoot = opts.tmpRoot ?? tmpdir();
    this.now = opts.now ?? Date.now;
    this.reapTimeoutMs = opts.reapTimeoutMs ?? 2000;
    this.launchCheckMs = opts.launchCheckMs ?? 100;
    this.commandAvailable = opts.commandAvailable ?? isCommandAvailable;
  }

  async isAvailable(): Promise<boolean> {
    return this.platform === 'win32' || isCommandAvailable('sh');
  }

  getCapabilities(): BackendCapabilities {
    const platform =
      this.platform === 'linux' || this.platform === 'darwin' || this.platform === 'win32'
        ? this.platform
        : 'other';
    return {
      method: 'process',
      platform,
      networkIsolation: this.platform === 'linux' && this.namespaceSupport().networkNamespaces,
      memoryLimit: this.platform !== 'win32',
      domainRestriction: false,
    };
  }

  async prepare(limits: ResourceLimits): Promise<BackendHandle> {
    const isolateNetwork = !limits.networkAccessAllowed;
    if (isolateNetwork && !this.getCapabilities().networkIsolation) {
      throw new ResourceAllocationFailedError(
        'network access must be denied but network namespaces are not available'
      );
    }
    if (!isolateNetwork && limits.restrictedDomains.length > 0) {
      this.logger.warn('Restricted domains are not enforced in process isolation', {
        restrictedDomains: limits.restrictedDomains,
      });
    }

    let workDir: string;
    try {
      workDir = await mkdtemp(path.join(this.tmpRoot, 'detonate-'));
    } catch (err) {
      throw new ResourceAllocationFailedError('could not create working directory', err);
    }

    const handle: BackendHandle = Object.freeze({ id: uuidv7(), method: this.method });
    this.sandboxes.set(handle.id, {
      handle,
      limits,
      workDir,
      isolateNetwork,
      staged: null,
      child: null,
      exit: null,
      processes: [],
      lastCpu: null,
    });

    this.logger.debug('Process sandbox prepared', { handleId: handle.id, workDir, isolateNetwork });
    return handle;
  }

  async stage(handle: BackendHandle, targetFilePath: string): Promise<void> {
    await this.stageInto(this.require(handle), targetFilePath);
  }

  async launch(handle: BackendHandle, targetFilePath: string): Promise<void> {
    const sandbox = this.require(handle);
    if (sandbox.child) {
      throw new LaunchFailedError(targetFilePath, 'target already launched in this sandbox');
    }

    const staged = await this.stageInto(sandbox, targetFilePath);
    const target = commandFor(staged, this.platform);
    if (this.platform !== 'win32') {
      await preflightCommand(targetFilePath, target, staged, { commandAvailable: this.commandAvailable });
    }

    const command = sandbox.isolateNetwork ? buildUnshareArgs(target) : target;
    const [file, ...args] =
      this.platform === 'win32'
        ? command
        : ['sh', ...buildPosixLauncher(sandbox.limits.memoryBytes, command)];
    if (!file) throw new LaunchFailedError(targetFilePath, 'empty command');

    const child = spawn(file, args, {
      cwd: sandbox.workDir,
      env: buildSandboxEnv(sandbox.workDir),
      detached: this.platform !== 'win32',
      stdio: 'ignore',
      windowsHide: true,
    });

    const exit = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => resolve({ exitCode: code, signal }));
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', resolve);
        child.once('error', reject);
      });
    } catch (err) {
      throw new LaunchFailedError(targetFilePath, toErrorMessage(err), err);
    }

    child.on('error', (err) => {
      this.logger.warn('Target process error', { handleId: handle.id, error: err.message });
    });

    sandbox.child = child;
    sandbox.exit = exit;

    // The launcher shell reports a failed exec as 126/127 right away
    let timer: NodeJS.Timeout | undefined;
    const early = await Promise.race([
      exit,
      new Promise<null>((resolve) => {
        timer = setTimeout(() => resolve(null), this.launchCheckMs);
      }),
    ]);
    clearTimeout(timer);
    const failure = early ? execFailure(early.exitCode) : null;
    if (failure) throw new LaunchFailedError(targetFilePath, failure);

    this.logger.info('Target launched', {
      handleId: handle.id,
      pid: child.pid,
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
    const processes = await this.snapshot(sandbox);
    const timestamp = this.now();

    const memoryBytes = processes.reduce((sum, p) => sum + p.rssBytes, 0);
    const cpuSeconds = processes.reduce((sum, p) => sum + p.cpuSeconds, 0);

    let cpuPercent = 0;
    if (sandbox.lastCpu && timestamp > sandbox.lastCpu.at) {
      const used = Math.max(0, cpuSeconds - sandbox.lastCpu.seconds);
      cpuPercent = (used / ((timestamp - sandbox.lastCpu.at) / 1000)) * 100;
    }
    sandbox.lastCpu = { seconds: cpuSeconds, at: timestamp };

    return {
      timestamp,
      memoryBytes,
      cpuPercent,
      networkRxBytes: 0,
      networkTxBytes: 0,
      processCount: processes.length,
    };
  }

  async enforceKill(handle: BackendHandle): Promise<void> {
    const sandbox = this.sandboxes.get(handle.id);
    const pid = sandbox?.child?.pid;
    if (!sandbox || pid === undefined) return;

    if (this.platform === 'win32') {
      try {
        await this.run('taskkill', ['/PID', String(pid), '/T', '/F']);
      } catch (err) {
        this.logger.debug('taskkill failed', { handleId: handle.id, error: toErrorMessage(err) });
      }
      return;
    }

    // The whole group first, then anything that left it
    this.signal(-pid);
    for (const p of sandbox.processes) this.signal(p.pid);
  }

  async teardown(handle: BackendHandle): Promise<void> {
    const sandbox = this.sandboxes.get(handle.id);
    if (!sandbox) return;

    await this.enforceKill(handle);
    const child = sandbox.child;
    if (sandbox.exit && child && child.exitCode === null && child.signalCode === null) {
      let timer: NodeJS.Timeout | undefined;
      await Promise.race([
        sandbox.exit,
        new Promise<void>((resolve) => {
          timer = setTimeout(resolve, this.reapTimeoutMs);
        }),
      ]);
      clearTimeout(timer);
    }

    await rm(sandbox.workDir, { recursive: true, force: true });
    this.sandboxes.delete(handle.id);
    this.logger.debug('Process sandbox torn down', { handleId: handle.id });
  }

  collectors(handle: BackendHandle): EventCollector[] {
    const sandbox = this.require(handle);
    const collectors: EventCollector[] = [
      new ProcessCollector(() => this.snapshot(sandbox), this.now),
      new NetworkCollector(() => this.socketTable.snapshot(this.sandboxPids(sandbox)), this.now),
      new FileWatchCollector([sandbox.workDir, ...this.watchPaths], {
        watchStarter: this.watchStarter,
        now: this.now,
        logger: this.logger,
      }),
    ];
    if (this.platform === 'win32') {
      collectors.push(new RegistryCollector(undefined, this.run, this.now));
    }
    return collectors;
  }

  /** Working directory of a live sandbox. */
  workDirOf(handle: BackendHandle): string {
    return this.require(handle).workDir;
  }

  private async stageInto(sandbox: ProcessSandbox, targetFilePath: string): Promise<string> {
    sandbox.staged ??= await stageTarget(targetFilePath, sandbox.workDir);
    return sandbox.staged;
  }

  private async snapshot(sandbox: ProcessSandbox): Promise<ProcessInfo[]> {
    const pid = sandbox.child?.pid;
    if (pid === undefined) return [];
    sandbox.processes = await this.processTable.snapshot(pid);
    return sandbox.processes;
  }

  private sandboxPids(sandbox: ProcessSandbox): number[] {
    if (sandbox.processes.length > 0) return sandbox.processes.map((p) => p.pid);
    const pid = sandbox.child?.pid;
    return pid === undefined ? [] : [pid];
  }

  private signal(pid: number): void {
    try {
      process.kill(pid, 'SIGKILL');
    } catch (err) {
      if (errorCode(err) !== 'ESRCH') {
        this.logger.warn('Failed to kill sandbox process', { pid, error: toErrorMessage(err) });
      }
    }
  }

  private namespaceSupport(): NamespaceCapabilities {
    this.namespaces ??= this.detectNamespaces();
    return this.namespaces;
  }

  private require(handle: BackendHandle): ProcessSandbox {
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
