/**
 * Process Table
 *
 * Per-platform view of the processes belonging to a sandboxed target: the
 * target's process group plus every descendant of its root pid. Used both for
 * resource sampling and for process-creation events.
 *
 * - linux: /proc
 * - darwin and other POSIX systems: ps
 * - win32: CIM via PowerShell
 */

import { readdir, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { runCommand, type CommandRunner } from '../utils/command.js';

export interface ProcessInfo {
  pid: number;
  ppid: number;
  pgid: number;
  name: string;
  command: string;
  rssBytes: number;
  /** Cumulative user + system CPU time. */
  cpuSeconds: number;
  /** Pid of a process tracing this one (linux only, 0 when untraced). */
  tracerPid?: number;
}

export interface ProcessTable {
  snapshot(rootPid: number): Promise<ProcessInfo[]>;
}

/** Keep the root, its process group and everything descended from either. */
export function selectSandboxProcesses(rootPid: number, all: ProcessInfo[]): ProcessInfo[] {
  const members = new Set<number>();
  for (const p of all) {
    if (p.pid === rootPid || (p.pgid !== 0 && p.pgid === rootPid)) members.add(p.pid);
  }

  let grew = true;
  while (grew) {
    grew = false;
    for (const p of all) {
      if (!members.has(p.pid) && members.has(p.ppid)) {
        members.add(p.pid);
        grew = true;
      }
    }
  }

  return all.filter((p) => members.has(p.pid)).sort((a, b) => a.pid - b.pid);
}

// ─── linux ───────────────────────────────────────────────────────────

export interface ProcfsReader {
  readdir(dir: string): Promise<string[]>;
  readFile(file: string): Promise<string>;
}

const defaultProcfsReader: ProcfsReader = {
  readdir: (dir) => readdir(dir),
  readFile: (file) => readFile(file, 'utf8'),
};

const CLOCK_TICKS_PER_SECOND = 100;
const PAGE_SIZE_BYTES = 4096;

interface StatFields {
  pid: number;
  name: string;
  ppid: number;
  pgid: number;
  cpuSeconds: number;
  rssBytes: number;
}

/** Parse /proc/<pid>/stat. The comm field may itself contain spaces and parens. */
export function parseProcStat(content: string): StatFields | null {
  const open = content.indexOf('(');
  const close = content.lastIndexOf(')');
  if (open < 0 || close < open) return null;

  const pid = Number(content.slice(0, open).trim());
  const rest = content
    .slice(close + 1)
    .trim()
    .split(/\s+/);
  if (!Number.isInteger(pid) || rest.length < 22) return null;

  const utime = Number(rest[11]);
  const stime = Number(rest[12]);
  return {
    pid,
    name: content.slice(open + 1, close),
    ppid: Number(rest[1]),
    pgid: Number(rest[2]),
    cpuSeconds: (utime + stime) / CLOCK_TICKS_PER_SECOND,
    rssBytes: Number(rest[21]) * PAGE_SIZE_BYTES,
  };
}

export class ProcfsProcessTable implements ProcessTable {
  constructor(
    private readonly reader: ProcfsReader = defaultProcfsReader,
    private readonly procRoot = '/proc'
  ) {}

  async snapshot(rootPid: number): Promise<ProcessInfo[]> {
    const entries = await this.reader.readdir(this.procRoot);
    const stats = await Promise.all(
      entries.filter((e) => /^\d+$/.test(e)).map((e) => this.readStat(e))
    );

    const all: ProcessInfo[] = stats
      .filter((s): s is StatFields => s !== null)
      .map((s) => ({ ...s, command: s.name }));

    const selected = selectSandboxProcesses(rootPid, all);
    return Promise.all(selected.map((p) => this.withDetails(p)));
  }

  private async readStat(pid: string): Promise<StatFields | null> {
    try {
      return parseProcStat(await this.reader.readFile(path.posix.join(this.procRoot, pid, 'stat')));
    } catch {
      // Process exited between readdir and read
      return null;
    }
  }

  private async withDetails(p: ProcessInfo): Promise<ProcessInfo> {
    const dir = path.posix.join(this.procRoot, String(p.pid));
    let command = p.command;
    let tracerPid = 0;
    try {
      const cmdline = await this.reader.readFile(path.posix.join(dir, 'cmdline'));
      const args = cmdline.split('\0').filter((a) => a.length > 0);
      if (args.length > 0) command = args.join(' ');
      const status = await this.reader.readFile(path.posix.join(dir, 'status'));
      const match = /^TracerPid:\s+(\d+)/m.exec(status);
      if (match?.[1]) tracerPid = Number(match[1]);
    } catch {
      // Keep what stat gave us
    }
    return { ...p, command, tracerPid };
  }
}

// ─── darwin / POSIX ps ───────────────────────────────────────────────

/** Parse ps TIME values: "[dd-]hh:mm:ss", "mm:ss" or "m:ss.cc". */
export function parsePsTime(value: string): number {
  let days = 0;
  let clock = value.trim();
  const dash = clock.indexOf('-');
  if (dash >= 0) {
    days = Number(clock.slice(0, dash));
    clock = clock.slice(dash + 1);
  }
  const parts = clock.split(':').map(Number);
  if (parts.some((n) => Number.isNaN(n))) return 0;
  let seconds = 0;
  for (const part of parts) seconds = seconds * 60 + part;
  return days * 86400 + seconds;
}

export function parsePsOutput(stdout: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\S+)\s+(.+)$/.exec(line);
    if (!match) continue;
    const [, pid, ppid, pgid, rss, time, args] = match;
    const command = (args ?? '').trim();
    processes.push({
      pid: Number(pid),
      ppid: Number(ppid),
      pgid: Number(pgid),
      rssBytes: Number(rss) * 1024,
      cpuSeconds: parsePsTime(time ?? '0'),
      command,
      name: path.posix.basename(command.split(/\s+/)[0] ?? ''),
    });
  }
  return processes;
}

export class PsProcessTable implements ProcessTable {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async snapshot(rootPid: number): Promise<ProcessInfo[]> {
    const { stdout } = await this.run('ps', ['-A', '-o', 'pid=,ppid=,pgid=,rss=,time=,args=']);
    return selectSandboxProcesses(rootPid, parsePsOutput(stdout));
  }
}

// ─── win32 ───────────────────────────────────────────────────────────

const CimProcessSchema = z.object({
  ProcessId: z.number(),
  ParentProcessId: z.number(),
  Name: z.string().nullable().default(''),
  CommandLine: z.string().nullable().default(null),
  WorkingSetSize: z.number().nullable().default(0),
  KernelModeTime: z.number().nullable().default(0),
  UserModeTime: z.number().nullable().default(0),
});

const CIM_QUERY =
  'Get-CimInstance Win32_Process | Select-Object ProcessId,ParentProcessId,Name,CommandLine,' +
  'WorkingSetSize,KernelModeTime,UserModeTime | ConvertTo-Json -Compress';

export function parseCimOutput(stdout: string): ProcessInfo[] {
  if (stdout.trim().length === 0) return [];
  const raw: unknown = JSON.parse(stdout);
  const parsed = z.array(CimProcessSchema).safeParse(Array.isArray(raw) ? raw : [raw]);
  if (!parsed.success) return [];

  return parsed.data.map((p) => ({
    pid: p.ProcessId,
    ppid: p.ParentProcessId,
    pgid: 0,
    name: p.Name ?? '',
    command: p.CommandLine ?? p.Name ?? '',
    rssBytes: p.WorkingSetSize ?? 0,
    // 100ns units
    cpuSeconds: ((p.KernelModeTime ?? 0) + (p.UserModeTime ?? 0)) / 1e7,
  }));
}

export class CimProcessTable implements ProcessTable {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async snapshot(rootPid: number): Promise<ProcessInfo[]> {
    const { stdout } = await this.run(
      'powershell',
      ['-NoProfile', '-NonInteractive', '-Command', CIM_QUERY],
      { timeoutMs: 15_000 }
    );
    return selectSandboxProcesses(rootPid, parseCimOutput(stdout));
  }
}

export function createProcessTable(platform: NodeJS.Platform = process.platform): ProcessTable {
  if (platform === 'linux') return new ProcfsProcessTable();
  if (platform === 'win32') return new CimProcessTable();
  return new PsProcessTable();
}
