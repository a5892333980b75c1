/**
 * File Watch Collector
 *
 * Watches the sandbox working directory (plus any configured paths) with
 * chokidar and turns filesystem notifications into FileOp events. Written
 * files are annotated with the Shannon entropy of their first 4 KiB, which is
 * what the detector uses to spot bulk encryption.
 */

import { open } from 'node:fs/promises';
import * as path from 'node:path';
import { watch } from 'chokidar';
import { createNoopLogger, type SecureLogger } from '../../logging/logger.js';
import { toErrorMessage } from '../../utils/errors.js';
import type { CollectedEvent, EventCollector } from '../types.js';

const HEAD_BYTES = 4096;

const ACTIONS: Readonly<Record<string, string>> = {
  add: 'create',
  change: 'modify',
  unlink: 'delete',
  addDir: 'mkdir',
  unlinkDir: 'rmdir',
};

export interface WatchHandlers {
  onEvent(kind: string, filePath: string): void;
  onError(err: unknown): void;
}

export interface WatchHandle {
  close(): Promise<void>;
}

/** Starts watching and resolves once the initial scan is complete. */
export type WatchStarter = (paths: string[], handlers: WatchHandlers) => Promise<WatchHandle>;

export const chokidarWatch: WatchStarter = async (paths, handlers) => {
  const watcher = watch(paths, {
    ignoreInitial: true,
    persistent: true,
    followSymlinks: false,
  });
  watcher.on('all', (eventName, filePath) => handlers.onEvent(eventName, filePath));
  watcher.on('error', (err) => handlers.onError(err));
  await new Promise<void>((resolve) => watcher.once('ready', resolve));
  return watcher;
};

/** Bits of entropy per byte, 0 for empty input. */
export function shannonEntropy(data: Uint8Array): number {
  if (data.length === 0) return 0;
  const counts = new Array<number>(256).fill(0);
  for (const byte of data) counts[byte] = (counts[byte] ?? 0) + 1;

  let entropy = 0;
  for (const count of counts) {
    if (count === 0) continue;
    const p = count / data.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export async function readHead(filePath: string, bytes = HEAD_BYTES): Promise<Uint8Array> {
  const file = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(bytes);
    const { bytesRead } = await file.read(buffer, 0, bytes, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await file.close();
  }
}

export interface FileWatchCollectorOptions {
  watchStarter?: WatchStarter;
  readHead?: (filePath: string) => Promise<Uint8Array>;
  now?: () => number;
  logger?: SecureLogger;
}

export class FileWatchCollector implements EventCollector {
  readonly name = 'file-watch';
  private readonly watchStarter: WatchStarter;
  private readonly readHead: (filePath: string) => Promise<Uint8Array>;
  private readonly now: () => number;
  private readonly logger: SecureLogger;
  private handle: WatchHandle | null = null;
  private pending: Promise<CollectedEvent>[] = [];

  constructor(
    private readonly paths: string[],
    opts: FileWatchCollectorOptions = {}
  ) {
    this.watchStarter = opts.watchStarter ?? chokidarWatch;
    this.readHead = opts.readHead ?? readHead;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? createNoopLogger();
  }

  async start(): Promise<void> {
    if (this.handle || this.paths.length === 0) return;
    this.handle = await this.watchStarter(this.paths, {
      onEvent: (kind, filePath) => this.record(kind, filePath),
      onError: (err) => {
        this.logger.warn('File watcher error', { error: toErrorMessage(err) });
      },
    });
  }

  async poll(): Promise<CollectedEvent[]> {
    const batch = this.pending;
    this.pending = [];
    return Promise.all(batch);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) await handle.close();
  }

  private record(kind: string, filePath: string): void {
    const action = ACTIONS[kind];
    if (!action) return;
    this.pending.push(this.describe(action, filePath, this.now()));
  }

  private async describe(action: string, filePath: string, timestamp: number): Promise<CollectedEvent> {
    let entropy: number | null = null;
    if (action === 'create' || action === 'modify') {
      try {
        const head = await this.readHead(filePath);
        if (head.length > 0) entropy = Math.round(shannonEntropy(head) * 1000) / 1000;
      } catch {
        // Already removed again
      }
    }

    return {
      timestamp,
      category: 'FileOp',
      attributes: {
        action,
        path: filePath,
        extension: path.extname(filePath).toLowerCase(),
        entropy,
      },
    };
  }
}
