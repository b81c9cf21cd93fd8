/**
 * Append-only event log
 * Emission order must be non-decreasing in time
 */

import type { SimulationEvent, SimulationEventType } from './types.js';

export class EventLog {
  private events: SimulationEvent[] = [];

  append(event: SimulationEvent): void {
    const last = this.events[this.events.length - 1];
    if (last !== undefined && event.time < last.time) {
      throw new Error(
        `Event ${event.type}@${event.time} emitted after ${last.type}@${last.time}`
      );
    }
    this.events.push(event);
  }

  get size(): number {
    return this.events.length;
  }

  /**
   * Snapshot of all events in emission order
   */
  toArray(): SimulationEvent[] {
    return [...this.events];
  }

  ofType<T extends SimulationEventType>(type: T): Array<EventOfType<T>> {
    return eventsOfType(this.events, type);
  }
}

export type EventOfType<T extends SimulationEventType> = Extract<SimulationEvent, { type: T }>;

/**
 * Narrow a list of events to one variant
 */
export function eventsOfType<T extends SimulationEventType>(
  events: readonly SimulationEvent[],
  type: T
): Array<EventOfType<T>> {
  return events.filter((e): e is EventOfType<T> => e.type === type);
}
