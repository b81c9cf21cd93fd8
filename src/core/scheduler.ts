/**
 * Cooperative discrete-event scheduler
 *
 * Owns virtual time and a min-heap of pending process resumptions keyed by
 * (wakeTime, submission sequence). Processes are state machines: each call to
 * `resume` runs one synchronous step and returns either a wait or `done`.
 * Entries scheduled past the horizon are dropped, not deferred.
 */

import type { ProcessId, ProcessKind, ProcessOutcome, SchedulerStats, SimTime } from './types.js';
import { RouteNotFoundError } from './errors.js';

/**
 * A logically concurrent process driven by the scheduler
 */
export interface SimProcess<C> {
  readonly id: ProcessId;
  readonly kind: ProcessKind;
  resume(ctx: C): ProcessOutcome;
}

export interface SchedulerHooks<C> {
  /** Called when a process step throws RouteNotFoundError; the run carries on */
  onProcessFailed?: (process: SimProcess<C>, error: RouteNotFoundError, ctx: C) => void;
}

interface QueueEntry<C> {
  wakeTime: SimTime;
  seq: number;
  process: SimProcess<C>;
}

function precedes<C>(a: QueueEntry<C>, b: QueueEntry<C>): boolean {
  return a.wakeTime < b.wakeTime || (a.wakeTime === b.wakeTime && a.seq < b.seq);
}

/**
 * Binary min-heap of pending resumptions
 */
class ResumptionQueue<C> {
  private heap: QueueEntry<C>[] = [];

  get size(): number {
    return this.heap.length;
  }

  peek(): QueueEntry<C> | undefined {
    return this.heap[0];
  }

  push(entry: QueueEntry<C>): void {
    const heap = this.heap;
    heap.push(entry);

    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!precedes(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  pop(): QueueEntry<C> | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (top === undefined || last === undefined || heap.length === 0) {
      return top;
    }

    heap[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < heap.length && precedes(heap[left], heap[smallest])) smallest = left;
      if (right < heap.length && precedes(heap[right], heap[smallest])) smallest = right;
      if (smallest === i) break;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
    return top;
  }

  clear(): void {
    this.heap = [];
  }
}

export class Scheduler<C> {
  private clock: SimTime = 0;
  private sequence = 0;
  private queue = new ResumptionQueue<C>();
  private stats: SchedulerStats = { spawned: 0, completed: 0, failed: 0, truncated: 0 };

  constructor(private readonly hooks: SchedulerHooks<C> = {}) {}

  /**
   * Current virtual time
   */
  get now(): SimTime {
    return this.clock;
  }

  /**
   * Number of resumptions still queued
   */
  get pending(): number {
    return this.queue.size;
  }

  getStats(): SchedulerStats {
    return { ...this.stats };
  }

  /**
   * Start a process at the current time, after everything already queued for it
   */
  spawn(process: SimProcess<C>): void {
    this.stats.spawned++;
    this.enqueue(process, this.clock);
  }

  /**
   * Resume processes in (wakeTime, sequence) order until the horizon.
   * Entries at exactly `until` still run.
   */
  run(ctx: C, until: SimTime): SchedulerStats {
    for (;;) {
      const next = this.queue.peek();
      if (next === undefined || next.wakeTime > until) break;
      this.queue.pop();

      this.clock = next.wakeTime;
      this.step(next.process, ctx);
    }

    this.stats.truncated += this.queue.size;
    this.queue.clear();
    this.clock = Math.max(this.clock, until);

    return this.getStats();
  }

  private step(process: SimProcess<C>, ctx: C): void {
    let outcome: ProcessOutcome;
    try {
      outcome = process.resume(ctx);
    } catch (error) {
      if (error instanceof RouteNotFoundError) {
        this.stats.failed++;
        this.hooks.onProcessFailed?.(process, error, ctx);
        return;
      }
      throw error;
    }

    if (outcome.kind === 'done') {
      this.stats.completed++;
      return;
    }

    if (!(outcome.duration >= 0)) {
      throw new Error(`Process ${process.id} requested an invalid wait of ${outcome.duration}`);
    }
    this.enqueue(process, this.clock + outcome.duration);
  }

  private enqueue(process: SimProcess<C>, wakeTime: SimTime): void {
    this.queue.push({ wakeTime, seq: this.sequence++, process });
  }
}
