import TinyQueue from 'tinyqueue';
import { InvalidDelayError } from './errors.js';
import { logger } from './logger.js';
import type { SimTime } from './types.js';

// Labels only; the scheduler treats every event the same way.
export type EventKind = 'Timeout' | 'Resolve' | 'Wake';

export interface Event {
  kind: EventKind;
  clock: SimTime;
  seq: number;
  fire: () => void;
}

export interface EventHandle {
  readonly kind: EventKind;
  readonly clock: SimTime;
  readonly seq: number;
}

/**
 * Simulated clock plus a min-heap of pending events ordered by (clock, seq).
 *
 * `seq` grows with every call to {@link Scheduler.scheduleAfter}, so events due at
 * the same time fire in the order they were scheduled. A zero-delay event scheduled
 * from inside a handler therefore runs after every same-time event already queued.
 */
export class Scheduler {
  private queue: TinyQueue<Event>;
  private _currentTime: SimTime = 0;
  private _eventsProcessed = 0;
  private nextSeq = 0;

  constructor() {
    this.queue = new TinyQueue<Event>([], (a, b) => a.clock - b.clock || a.seq - b.seq);
  }

  get now(): SimTime { return this._currentTime; }
  get eventsProcessed(): number { return this._eventsProcessed; }
  get pendingEvents(): number { return this.queue.length; }

  scheduleAfter(delay: SimTime, fire: () => void, kind: EventKind = 'Timeout'): EventHandle {
    if (!Number.isFinite(delay) || delay < 0) {
      throw new InvalidDelayError(delay);
    }
    const event: Event = {
      kind,
      clock: this._currentTime + delay,
      seq: this.nextSeq++,
      fire,
    };
    this.queue.push(event);
    return { kind: event.kind, clock: event.clock, seq: event.seq };
  }

  /** Fire the next event. Returns false once the queue is empty. */
  step(): boolean {
    const event = this.queue.pop();
    if (!event) return false;
    this._currentTime = event.clock;
    this._eventsProcessed++;
    if (logger.isLevelEnabled('trace')) {
      logger.trace({ clock: event.clock, seq: event.seq, kind: event.kind }, 'handle event');
    }
    event.fire();
    return true;
  }

  /** Drain the queue. An empty queue is the end of the experiment. */
  runUntilIdle(): void {
    while (this.step()) {
      // next event
    }
  }
}
