import { describe, it, expect, vi } from 'vitest';
import {
  FileWatchCollector,
  shannonEntropy,
  type WatchHandlers,
  type WatchStarter,
} from './file-watch-collector.js';

function fakeWatcher() {
  let handlers: WatchHandlers | null = null;
  const close = vi.fn(async () => {});
  const starter: WatchStarter = vi.fn(async (_paths: string[], h: WatchHandlers) => {
    handlers = h;
    return { close };
  });
  return {
    starter,
    close,
    emit(kind: string, filePath: string) {
      handlers?.onEvent(kind, filePath);
    },
    fail(err: unknown) {
      handlers?.onError(err);
    },
  };
}

describe('shannonEntropy', () => {
  it('is 0 for empty and uniform data', () => {
    expect(shannonEntropy(new Uint8Array())).toBe(0);
    expect(shannonEntropy(new Uint8Array(64).fill(7))).toBe(0);
  });

  it('is 8 when every byte value occurs equally often', () => {
    const data = new Uint8Array(512);
    for (let i = 0; i < data.length; i++) data[i] = i % 256;
    expect(shannonEntropy(data)).toBe(8);
  });

  it('is 1 for two equally frequent values', () => {
    expect(shannonEntropy(new Uint8Array([0, 1, 0, 1]))).toBe(1);
  });
});

describe('FileWatchCollector', () => {
  it('buffers watcher notifications until the next poll', async () => {
    const watcher = fakeWatcher();
    const readHead = vi.fn(async () => new Uint8Array([0, 1, 0, 1]));
    const collector = new FileWatchCollector(['/tmp/box'], {
      watchStarter: watcher.starter,
      readHead,
      now: () => 42,
    });

    await collector.start();
    expect(watcher.starter).toHaveBeenCalledWith(['/tmp/box'], expect.any(Object));

    watcher.emit('add', '/tmp/box/Notes.TXT');
    watcher.emit('unlink', '/tmp/box/old.log');
    watcher.emit('raw', '/tmp/box/ignored');

    const events = await collector.poll();
    expect(events).toEqual([
      {
        timestamp: 42,
        category: 'FileOp',
        attributes: { action: 'create', path: '/tmp/box/Notes.TXT', extension: '.txt', entropy: 1 },
      },
      {
        timestamp: 42,
        category: 'FileOp',
        attributes: { action: 'delete', path: '/tmp/box/old.log', extension: '.log', entropy: null },
      },
    ]);
    expect(readHead).toHaveBeenCalledTimes(1);
    await expect(collector.poll()).resolves.toEqual([]);
  });

  it('leaves entropy unset when the file is gone before it is read', async () => {
    const watcher = fakeWatcher();
    const collector = new FileWatchCollector(['/tmp/box'], {
      watchStarter: watcher.starter,
      readHead: async () => {
        throw new Error('ENOENT');
      },
    });
    await collector.start();
    watcher.emit('change', '/tmp/box/a.bin');
    const [event] = await collector.poll();
    expect(event?.attributes).toMatchObject({ action: 'modify', entropy: null });
  });

  it('logs watcher errors and closes the watcher', async () => {
    const watcher = fakeWatcher();
    const logger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn(),
      level: 'info' as const,
    };
    const collector = new FileWatchCollector(['/tmp/box'], { watchStarter: watcher.starter, logger });
    await collector.start();
    watcher.fail(new Error('EMFILE'));
    expect(logger.warn).toHaveBeenCalledWith('File watcher error', { error: 'EMFILE' });

    await collector.close();
    await collector.close();
    expect(watcher.close).toHaveBeenCalledTimes(1);
  });

  it('does not start a watcher without paths', async () => {
    const watcher = fakeWatcher();
    const collector = new FileWatchCollector([], { watchStarter: watcher.starter });
    await collector.start();
    expect(watcher.starter).not.toHaveBeenCalled();
  });
});
