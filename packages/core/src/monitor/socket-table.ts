/**
 * Socket Table
 *
 * Open sockets held by the sandboxed processes.
 *
 * - linux: socket inodes from /proc/<pid>/fd matched against the
 *   /proc/<pid>/net/tcp{,6} tables of the process's own network namespace
 * - darwin: lsof field output
 * - win32: netstat -ano
 */

import { readdir, readFile, readlink } from 'node:fs/promises';
import * as path from 'node:path';
import { CommandError, runCommand, type CommandRunner } from '../utils/command.js';

export type SocketProtocol = 'tcp' | 'tcp6' | 'udp' | 'udp6';

export interface SocketInfo {
  protocol: SocketProtocol;
  localAddress: string;
  localPort: number;
  remoteAddress: string;
  remotePort: number;
  /** TCP state name, e.g. ESTABLISHED or LISTEN. UNCONN for unconnected UDP. */
  state: string;
  pid?: number;
  inode?: number;
}

export interface SocketTable {
  snapshot(pids: number[]): Promise<SocketInfo[]>;
}

// ─── /proc/net/tcp ───────────────────────────────────────────────────

const TCP_STATES: Readonly<Record<string, string>> = {
  '01': 'ESTABLISHED',
  '02': 'SYN_SENT',
  '03': 'SYN_RECV',
  '04': 'FIN_WAIT1',
  '05': 'FIN_WAIT2',
  '06': 'TIME_WAIT',
  '07': 'CLOSE',
  '08': 'CLOSE_WAIT',
  '09': 'LAST_ACK',
  '0A': 'LISTEN',
  '0B': 'CLOSING',
};

function hexBytesReversed(word: string): number[] {
  const bytes: number[] = [];
  for (let i = word.length - 2; i >= 0; i -= 2) {
    bytes.push(parseInt(word.slice(i, i + 2), 16));
  }
  return bytes;
}

function formatIpv6(groups: number[]): string {
  // IPv4-mapped
  if (groups.slice(0, 5).every((g) => g === 0) && groups[5] === 0xffff) {
    const hi = groups[6] ?? 0;
    const lo = groups[7] ?? 0;
    return `::ffff:${String(hi >> 8)}.${String(hi & 0xff)}.${String(lo >> 8)}.${String(lo & 0xff)}`;
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLength < 2) return hex.join(':');
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}

/** Decode the little-endian hex address of a /proc/net/tcp row. */
export function decodeProcAddress(hex: string): string {
  if (hex.length === 8) return hexBytesReversed(hex).join('.');

  const bytes: number[] = [];
  for (let i = 0; i < hex.length; i += 8) bytes.push(...hexBytesReversed(hex.slice(i, i + 8)));
  const groups: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) groups.push(((bytes[i] ?? 0) << 8) | (bytes[i + 1] ?? 0));
  return formatIpv6(groups);
}

/**
 * Parse /proc/net/tcp and /proc/net/tcp6 content. Header lines are skipped,
 * so the two tables may be concatenated.
 */
export function parseProcNetTcp(content: string): SocketInfo[] {
  const sockets: SocketInfo[] = [];
  for (const line of content.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (!/^\d+:$/.test(fields[0] ?? '')) continue;

    const local = /^([0-9A-F]+):([0-9A-F]{4})$/i.exec(fields[1] ?? '');
    const remote = /^([0-9A-F]+):([0-9A-F]{4})$/i.exec(fields[2] ?? '');
    if (!local?.[1] || !local[2] || !remote?.[1] || !remote[2]) continue;

    const state = (fields[3] ?? '').toUpperCase();
    sockets.push({
      protocol: local[1].length === 8 ? 'tcp' : 'tcp6',
      localAddress: decodeProcAddress(local[1]),
      localPort: parseInt(local[2], 16),
      remoteAddress: decodeProcAddress(remote[1]),
      remotePort: parseInt(remote[2], 16),
      state: TCP_STATES[state] ?? 'UNKNOWN',
      inode: Number(fields[9]),
    });
  }
  return sockets;
}

export interface ProcfsSocketReader {
  readdir(dir: string): Promise<string[]>;
  readFile(file: string): Promise<string>;
  readlink(link: string): Promise<string>;
}

const defaultSocketReader: ProcfsSocketReader = {
  readdir: (dir) => readdir(dir),
  readFile: (file) => readFile(file, 'utf8'),
  readlink: (link) => readlink(link),
};

export class ProcfsSocketTable implements SocketTable {
  constructor(
    private readonly reader: ProcfsSocketReader = defaultSocketReader,
    private readonly procRoot = '/proc'
  ) {}

  async snapshot(pids: number[]): Promise<SocketInfo[]> {
    const owners = new Map<number, number>();
    for (const pid of pids) {
      for (const inode of await this.socketInodes(pid)) owners.set(inode, pid);
    }
    if (owners.size === 0) return [];

    // Every sandboxed process shares one network namespace; read it through the first.
    const [first] = pids;
    if (first === undefined) return [];
    const tables = await Promise.all(
      ['tcp', 'tcp6'].map((name) =>
        this.reader
          .readFile(path.posix.join(this.procRoot, String(first), 'net', name))
          .catch(() => '')
      )
    );

    return parseProcNetTcp(tables.join('\n'))
      .filter((s) => s.inode !== undefined && owners.has(s.inode))
      .map((s) => ({ ...s, pid: s.inode === undefined ? undefined : owners.get(s.inode) }));
  }

  private async socketInodes(pid: number): Promise<number[]> {
    const fdDir = path.posix.join(this.procRoot, String(pid), 'fd');
    let fds: string[];
    try {
      fds = await this.reader.readdir(fdDir);
    } catch {
      return [];
    }

    const targets = await Promise.all(
      fds.map((fd) => this.reader.readlink(path.posix.join(fdDir, fd)).catch(() => ''))
    );
    const inodes: number[] = [];
    for (const target of targets) {
      const match = /^socket:\[(\d+)\]$/.exec(target);
      if (match?.[1]) inodes.push(Number(match[1]));
    }
    return inodes;
  }
}

// ─── lsof ────────────────────────────────────────────────────────────

function splitHostPort(value: string): { address: string; port: number } {
  const idx = value.lastIndexOf(':');
  if (idx < 0) return { address: value, port: 0 };
  let address = value.slice(0, idx);
  const port = Number(value.slice(idx + 1));
  if (address.startsWith('[') && address.endsWith(']')) address = address.slice(1, -1);
  if (address === '*') address = '0.0.0.0';
  return { address, port: Number.isFinite(port) ? port : 0 };
}

interface LsofRecord {
  pid?: number;
  protocol?: string;
  name?: string;
  state?: string;
}

/** Parse `lsof -F pPnT` output. */
export function parseLsofOutput(stdout: string): SocketInfo[] {
  const sockets: SocketInfo[] = [];
  let pid: number | undefined;
  let current: LsofRecord | null = null;

  const flush = () => {
    if (!current?.name || !current.protocol) return;
    const [localPart = '', remotePart] = current.name.split('->');
    const local = splitHostPort(localPart);
    const remote = remotePart ? splitHostPort(remotePart) : { address: '', port: 0 };
    const v6 = local.address.includes(':');
    const udp = current.protocol.toUpperCase() === 'UDP';
    sockets.push({
      protocol: udp ? (v6 ? 'udp6' : 'udp') : v6 ? 'tcp6' : 'tcp',
      localAddress: local.address,
      localPort: local.port,
      remoteAddress: remote.address,
      remotePort: remote.port,
      state: current.state ?? (udp ? 'UNCONN' : 'UNKNOWN'),
      pid: current.pid,
    });
  };

  for (const line of stdout.split('\n')) {
    const tag = line.charAt(0);
    const value = line.slice(1);
    switch (tag) {
      case 'p':
        flush();
        current = null;
        pid = Number(value);
        break;
      case 'f':
        flush();
        current = { pid };
        break;
      case 'P':
        if (current) current.protocol = value;
        break;
      case 'n':
        if (current) current.name = value;
        break;
      case 'T':
        if (current && value.startsWith('ST=')) current.state = value.slice(3);
        break;
      default:
        break;
    }
  }
  flush();
  return sockets;
}

export class LsofSocketTable implements SocketTable {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async snapshot(pids: number[]): Promise<SocketInfo[]> {
    if (pids.length === 0) return [];
    try {
      const { stdout } = await this.run('lsof', ['-nP', '-a', '-i', '-p', pids.join(','), '-F', 'pPnT']);
      return parseLsofOutput(stdout);
    } catch (err) {
      // lsof exits 1 when nothing matched
      if (err instanceof CommandError && err.exitCode === 1) return parseLsofOutput(err.stdout);
      throw err;
    }
  }
}

// ─── netstat ─────────────────────────────────────────────────────────

/** Parse `netstat -ano` output. */
export function parseNetstatOutput(stdout: string): SocketInfo[] {
  const sockets: SocketInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(TCP|UDP)\s+(\S+)\s+(\S+)\s+(?:([A-Z_]+)\s+)?(\d+)\s*$/.exec(line);
    if (!match) continue;
    const [, proto = '', localRaw = '', remoteRaw = '', state, pid] = match;
    const local = splitHostPort(localRaw);
    const remote = remoteRaw === '*:*' ? { address: '', port: 0 } : splitHostPort(remoteRaw);
    const v6 = local.address.includes(':');
    const udp = proto === 'UDP';
    sockets.push({
      protocol: udp ? (v6 ? 'udp6' : 'udp') : v6 ? 'tcp6' : 'tcp',
      localAddress: local.address,
      localPort: local.port,
      remoteAddress: remote.address,
      remotePort: remote.port,
      state: state === 'LISTENING' ? 'LISTEN' : (state ?? 'UNCONN'),
      pid: Number(pid),
    });
  }
  return sockets;
}

export class NetstatSocketTable implements SocketTable {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async snapshot(pids: number[]): Promise<SocketInfo[]> {
    if (pids.length === 0) return [];
    const wanted = new Set(pids);
    const { stdout } = await this.run('netstat', ['-ano']);
    return parseNetstatOutput(stdout).filter((s) => s.pid !== undefined && wanted.has(s.pid));
  }
}

export function createSocketTable(platform: NodeJS.Platform = process.platform): SocketTable {
  if (platform === 'linux') return new ProcfsSocketTable();
  if (platform === 'win32') return new NetstatSocketTable();
  return new LsofSocketTable();
}
