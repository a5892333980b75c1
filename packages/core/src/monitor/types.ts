import type { EventAttributes, EventCategory } from '@detonate/shared';

/** An observation before the monitor stamps it with session and sequence. */
export interface CollectedEvent {
  timestamp: number;
  category: EventCategory;
  attributes: EventAttributes;
}

/**
 * A source of behavioural events. The monitor polls every collector on each
 * tick and merges what they return; a collector only reports what is new
 * since its previous poll.
 */
export interface EventCollector {
  readonly name: string;
  start?(): Promise<void>;
  poll(): Promise<CollectedEvent[]>;
  close?(): Promise<void>;
}
