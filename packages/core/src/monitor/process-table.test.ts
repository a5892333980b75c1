import { describe, it, expect, vi } from 'vitest';
import {
  selectSandboxProcesses,
  parseProcStat,
  parsePsTime,
  parsePsOutput,
  parseCimOutput,
  ProcfsProcessTable,
  PsProcessTable,
  CimProcessTable,
  createProcessTable,
  type ProcessInfo,
  type ProcfsReader,
} from './process-table.js';

function proc(pid: number, ppid: number, pgid = 0): ProcessInfo {
  return { pid, ppid, pgid, name: `p${pid}`, command: `p${pid}`, rssBytes: 0, cpuSeconds: 0 };
}

function stat(pid: number, comm: string, ppid: number, pgid: number, utime = 0, rss = 0): string {
  return `${pid} (${comm}) S ${ppid} ${pgid} ${pgid} 0 -1 4194560 100 0 0 0 ${utime} 0 0 0 20 0 1 0 5000 10000000 ${rss}`;
}

describe('selectSandboxProcesses', () => {
  it('keeps the root and its descendants', () => {
    const all = [proc(1, 0), proc(100, 1), proc(101, 100), proc(102, 101), proc(200, 1)];
    expect(selectSandboxProcesses(100, all).map((p) => p.pid)).toEqual([100, 101, 102]);
  });

  it('keeps reparented members of the root process group', () => {
    const all = [proc(1, 0), proc(100, 1, 100), proc(150, 1, 100), proc(151, 150, 150)];
    expect(selectSandboxProcesses(100, all).map((p) => p.pid)).toEqual([100, 150, 151]);
  });

  it('returns nothing when the root is gone', () => {
    expect(selectSandboxProcesses(42, [proc(1, 0), proc(2, 1)])).toEqual([]);
  });
});

describe('parseProcStat', () => {
  it('parses fields after a comm containing spaces and parens', () => {
    const parsed = parseProcStat(stat(1234, 'my (prog)', 1, 1234, 250, 300));
    expect(parsed).toEqual({
      pid: 1234,
      name: 'my (prog)',
      ppid: 1,
      pgid: 1234,
      cpuSeconds: 2.5,
      rssBytes: 300 * 4096,
    });
  });

  it('rejects truncated content', () => {
    expect(parseProcStat('12 (x) S 1')).toBeNull();
    expect(parseProcStat('garbage')).toBeNull();
  });
});

describe('parsePsTime', () => {
  it('parses linux and macOS formats', () => {
    expect(parsePsTime('00:01:05')).toBe(65);
    expect(parsePsTime('0:02.50')).toBe(2.5);
    expect(parsePsTime('1-00:00:01')).toBe(86401);
  });

  it('returns zero for unparseable input', () => {
    expect(parsePsTime('n/a')).toBe(0);
  });
});

describe('parsePsOutput', () => {
  it('parses rows and derives the executable name', () => {
    const out = '  300   1   300  2048 00:00:01 /tmp/box/payload.sh --fast\n  301 300 300 1024 0:00.10 nc -l 4444\n';
    const rows = parsePsOutput(out);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      pid: 300,
      ppid: 1,
      pgid: 300,
      rssBytes: 2048 * 1024,
      cpuSeconds: 1,
      command: '/tmp/box/payload.sh --fast',
      name: 'payload.sh',
    });
    expect(rows[1]?.name).toBe('nc');
  });
});

describe('parseCimOutput', () => {
  it('accepts a single object as well as an array', () => {
    const one = JSON.stringify({
      ProcessId: 10,
      ParentProcessId: 4,
      Name: 'cmd.exe',
      CommandLine: null,
      WorkingSetSize: 4096,
      KernelModeTime: 10_000_000,
      UserModeTime: 5_000_000,
    });
    expect(parseCimOutput(one)).toEqual([
      {
        pid: 10,
        ppid: 4,
        pgid: 0,
        name: 'cmd.exe',
        command: 'cmd.exe',
        rssBytes: 4096,
        cpuSeconds: 1.5,
      },
    ]);
  });

  it('returns an empty list for empty output', () => {
    expect(parseCimOutput('  ')).toEqual([]);
  });
});

describe('ProcfsProcessTable', () => {
  it('reads stat for every pid and details for sandbox members only', async () => {
    const files: Record<string, string> = {
      '/proc/1/stat': stat(1, 'init', 0, 1),
      '/proc/500/stat': stat(500, 'sh', 1, 500, 10, 100),
      '/proc/501/stat': stat(501, 'gdb', 500, 500),
      '/proc/500/cmdline': 'sh\0/tmp/box/run.sh\0',
      '/proc/500/status': 'Name:\tsh\nTracerPid:\t0\n',
      '/proc/501/cmdline': 'gdb\0-p\x00900\0',
      '/proc/501/status': 'Name:\tgdb\nTracerPid:\t0\n',
    };
    const reader: ProcfsReader = {
      readdir: vi.fn(async () => ['1', '500', '501', 'self', 'meminfo']),
      readFile: vi.fn(async (file: string) => {
        const content = files[file];
        if (content === undefined) throw new Error(`ENOENT ${file}`);
        return content;
      }),
    };

    const table = new ProcfsProcessTable(reader);
    const snapshot = await table.snapshot(500);

    expect(snapshot.map((p) => p.pid)).toEqual([500, 501]);
    expect(snapshot[0]?.command).toBe('sh /tmp/box/run.sh');
    expect(snapshot[1]?.command).toBe('gdb -p 900');
    expect(snapshot[0]?.cpuSeconds).toBe(0.1);
    expect(reader.readFile).not.toHaveBeenCalledWith('/proc/1/cmdline');
  });

  it('skips processes that vanish mid-scan', async () => {
    const reader: ProcfsReader = {
      readdir: async () => ['700'],
      readFile: async () => {
        throw new Error('ENOENT');
      },
    };
    await expect(new ProcfsProcessTable(reader).snapshot(700)).resolves.toEqual([]);
  });
});

describe('PsProcessTable', () => {
  it('runs ps and filters to the sandbox tree', async () => {
    const run = vi.fn(async () => ({
      stdout: '  1 0 1 10 00:00:00 /sbin/launchd\n 40 1 40 20 00:00:00 ./sample\n',
      stderr: '',
    }));
    const rows = await new PsProcessTable(run).snapshot(40);
    expect(run).toHaveBeenCalledWith('ps', ['-A', '-o', 'pid=,ppid=,pgid=,rss=,time=,args=']);
    expect(rows.map((r) => r.pid)).toEqual([40]);
  });
});

describe('CimProcessTable', () => {
  it('queries CIM through powershell', async () => {
    const run = vi.fn(async () => ({
      stdout: JSON.stringify([
        { ProcessId: 8, ParentProcessId: 4, Name: 'sample.exe', CommandLine: 'sample.exe' },
        { ProcessId: 9, ParentProcessId: 8, Name: 'child.exe', CommandLine: 'child.exe /q' },
      ]),
      stderr: '',
    }));
    const rows = await new CimProcessTable(run).snapshot(8);
    expect(rows.map((r) => r.command)).toEqual(['sample.exe', 'child.exe /q']);
    expect(run).toHaveBeenCalledWith('powershell', expect.any(Array), { timeoutMs: 15_000 });
  });
});

describe('createProcessTable', () => {
  it('picks the implementation per platform', () => {
    expect(createProcessTable('linux')).toBeInstanceOf(ProcfsProcessTable);
    expect(createProcessTable('win32')).toBeInstanceOf(CimProcessTable);
    expect(createProcessTable('darwin')).toBeInstanceOf(PsProcessTable);
  });
});
