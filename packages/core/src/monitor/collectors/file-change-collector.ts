import * as path from 'node:path';
import type { CollectedEvent, EventCollector } from '../types.js';

/** One entry of a container filesystem diff. Kind: 0 modified, 1 added, 2 deleted. */
export interface FilesystemChange {
  path: string;
  kind: number;
}

const KIND_ACTIONS: Readonly<Record<number, string>> = {
  0: 'modify',
  1: 'create',
  2: 'delete',
};

/**
 * Turns a cumulative filesystem diff (the container engine's `changes`) into
 * FileOp events, reporting each path again only when its kind changes.
 */
export class FileChangeCollector implements EventCollector {
  readonly name = 'file-changes';
  private readonly lastKind = new Map<string, number>();

  constructor(
    private readonly changes: () => Promise<FilesystemChange[]>,
    private readonly now: () => number = Date.now
  ) {}

  async poll(): Promise<CollectedEvent[]> {
    const diff = await this.changes();
    const timestamp = this.now();
    const events: CollectedEvent[] = [];

    for (const change of diff) {
      if (this.lastKind.get(change.path) === change.kind) continue;
      this.lastKind.set(change.path, change.kind);
      events.push({
        timestamp,
        category: 'FileOp',
        attributes: {
          action: KIND_ACTIONS[change.kind] ?? 'modify',
          path: change.path,
          extension: path.posix.extname(change.path).toLowerCase(),
          entropy: null,
        },
      });
    }
    return events;
  }
}
