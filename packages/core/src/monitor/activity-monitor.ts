/**
 * Activity Monitor
 *
 * Merges what the collectors observe into one ordered event stream per
 * session. The stream is append-only and finite: it ends once `stop()` has
 * drained the collectors, and a stopped monitor cannot be started again.
 *
 * Ordering within one poll is (timestamp, category priority). Across polls a
 * late timestamp is raised to the last delivered one, so consumers always see
 * non-decreasing timestamps and strictly increasing sequence numbers.
 */

import { EVENT_CATEGORY_PRIORITY, type MonitoredEvent } from '@detonate/shared';
import { componentLogger, type SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type { CollectedEvent, EventCollector } from './types.js';

export interface ActivityMonitorOptions {
  sessionId: string;
  collectors: EventCollector[];
  /** Default 250ms */
  pollIntervalMs?: number;
  logger?: SecureLogger;
}

type MonitorState = 'idle' | 'running' | 'stopping' | 'closed';

export function compareCollected(a: CollectedEvent, b: CollectedEvent): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  return EVENT_CATEGORY_PRIORITY[a.category] - EVENT_CATEGORY_PRIORITY[b.category];
}

export class ActivityMonitor implements AsyncIterable<MonitoredEvent> {
  readonly sessionId: string;
  private collectors: EventCollector[];
  private readonly pollIntervalMs: number;
  private readonly logger: SecureLogger;

  private state: MonitorState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private polling: Promise<void> | null = null;
  private readonly queue: MonitoredEvent[] = [];
  private waiters: (() => void)[] = [];
  private sequence = 0;
  private lastTimestamp = 0;

  constructor(opts: ActivityMonitorOptions) {
    this.sessionId = opts.sessionId;
    this.collectors = [...opts.collectors];
    this.pollIntervalMs = opts.pollIntervalMs ?? 250;
    this.logger = componentLogger('ActivityMonitor', opts.logger);
  }

  /** Number of events delivered into the stream so far. */
  get eventCount(): number {
    return this.sequence;
  }

  get running(): boolean {
    return this.state === 'running';
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error('ActivityMonitor cannot be restarted');
    }
    this.state = 'running';

    const started = await Promise.all(
      this.collectors.map(async (collector) => {
        try {
          await collector.start?.();
          return collector;
        } catch (err) {
          this.logger.warn('Collector failed to start, disabling it', {
            sessionId: this.sessionId,
            collector: collector.name,
            error: toErrorMessage(err),
          });
          return null;
        }
      })
    );
    this.collectors = started.filter((c): c is EventCollector => c !== null);

    if (this.state !== 'running') return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.pollIntervalMs);

    this.logger.debug('Activity monitor started', {
      sessionId: this.sessionId,
      collectors: this.collectors.map((c) => c.name),
    });
  }

  /** Poll every collector once. Overlapping calls share the poll in flight. */
  tick(): Promise<void> {
    if (this.polling) return this.polling;
    this.polling = this.pollOnce().finally(() => {
      this.polling = null;
    });
    return this.polling;
  }

  /** Append events produced outside the collectors, such as resource samples. */
  record(event: CollectedEvent): void {
    if (this.state === 'closed') return;
    this.deliver([event]);
  }

  /** Next event in delivery order, or null once the stream has ended. */
  async nextEvent(): Promise<MonitoredEvent | null> {
    while (true) {
      const next = this.queue.shift();
      if (next) return next;
      if (this.state === 'closed') return null;
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<MonitoredEvent> {
    while (true) {
      const event = await this.nextEvent();
      if (!event) return;
      yield event;
    }
  }

  /**
   * Stop polling, collect whatever the collectors still hold, close them and
   * end the stream. Events already queued stay readable.
   */
  async stop(): Promise<void> {
    if (this.state === 'closed' || this.state === 'stopping') return;
    const wasRunning = this.state === 'running';
    this.state = 'stopping';

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (wasRunning) {
      if (this.polling) await this.polling;
      await this.pollOnce();
    }

    await Promise.all(
      this.collectors.map(async (collector) => {
        try {
          await collector.close?.();
        } catch (err) {
          this.logger.warn('Collector failed to close', {
            sessionId: this.sessionId,
            collector: collector.name,
            error: toErrorMessage(err),
          });
        }
      })
    );

    this.state = 'closed';
    this.wake();
    this.logger.debug('Activity monitor stopped', {
      sessionId: this.sessionId,
      events: this.sequence,
    });
  }

  private async pollOnce(): Promise<void> {
    const batches = await Promise.all(
      this.collectors.map(async (collector) => {
        try {
          return await collector.poll();
        } catch (err) {
          this.logger.warn('Collector poll failed', {
            sessionId: this.sessionId,
            collector: collector.name,
            error: toErrorMessage(err),
          });
          return [];
        }
      })
    );
    if (this.state === 'closed') return;
    this.deliver(batches.flat());
  }

  private deliver(batch: CollectedEvent[]): void {
    if (batch.length === 0) return;
    for (const collected of [...batch].sort(compareCollected)) {
      const timestamp = Math.max(Math.trunc(collected.timestamp), this.lastTimestamp);
      this.lastTimestamp = timestamp;
      const event: MonitoredEvent = Object.freeze({
        sessionId: this.sessionId,
        sequence: this.sequence++,
        timestamp,
        category: collected.category,
        attributes: Object.freeze({ ...collected.attributes }),
      });
      this.queue.push(event);
    }
    this.wake();
  }

  /** Release every pending nextEvent(); each re-checks the queue. */
  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
