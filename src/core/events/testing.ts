import { EventBus, type CanonicalEvent, type ConnectionDisconnected, type FeedEvent } from './EventBus';

/**
 * Create isolated EventBus for tests to avoid cross-test leakage.
 */
export function createTestEventBus(): EventBus {
  return new EventBus();
}

/**
 * Records every topic published on the bus, in order.
 */
export function recordBus(bus: EventBus): { events: FeedEvent[]; stop: () => void } {
  const events: FeedEvent[] = [];
  const stop = bus.subscribeAll((event) => events.push(event));
  return { events, stop };
}

export const marketEvents = (events: FeedEvent[]): CanonicalEvent[] =>
  events.flatMap((event) => (event.topic === 'market:event' ? [event.payload] : []));

export const stateChanges = (events: FeedEvent[]): string[] =>
  events.flatMap((event) => (event.topic === 'connection:state' ? [`${event.payload.from}->${event.payload.to}`] : []));

export const disconnects = (events: FeedEvent[]): ConnectionDisconnected[] =>
  events.flatMap((event) => (event.topic === 'connection:disconnected' ? [event.payload] : []));

export const topicsOf = (events: FeedEvent[]): string[] => events.map((event) => event.topic);
