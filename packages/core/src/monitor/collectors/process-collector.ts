import type { ProcessInfo } from '../process-table.js';
import type { CollectedEvent, EventCollector } from '../types.js';

/**
 * Diffs successive process snapshots into ProcessOp events: `spawn` for a new
 * pid, `exit` for a vanished one and `inject` when a process gains a tracer.
 */
export class ProcessCollector implements EventCollector {
  readonly name = 'process';
  private readonly known = new Map<number, ProcessInfo>();

  constructor(
    private readonly snapshot: () => Promise<ProcessInfo[]>,
    private readonly now: () => number = Date.now
  ) {}

  async poll(): Promise<CollectedEvent[]> {
    const current = await this.snapshot();
    const timestamp = this.now();
    const events: CollectedEvent[] = [];
    const alive = new Set<number>();

    for (const p of current) {
      alive.add(p.pid);
      const previous = this.known.get(p.pid);
      if (!previous) {
        events.push({
          timestamp,
          category: 'ProcessOp',
          attributes: {
            action: 'spawn',
            pid: p.pid,
            ppid: p.ppid,
            name: p.name,
            command: p.command,
          },
        });
      }

      const tracer = p.tracerPid ?? 0;
      if (tracer !== 0 && tracer !== (previous?.tracerPid ?? 0)) {
        events.push({
          timestamp,
          category: 'ProcessOp',
          attributes: {
            action: 'inject',
            pid: tracer,
            targetPid: p.pid,
            name: p.name,
            command: p.command,
          },
        });
      }
      this.known.set(p.pid, p);
    }

    for (const [pid, p] of this.known) {
      if (alive.has(pid)) continue;
      events.push({
        timestamp,
        category: 'ProcessOp',
        attributes: { action: 'exit', pid, name: p.name, command: p.command },
      });
      this.known.delete(pid);
    }

    return events;
  }
}
