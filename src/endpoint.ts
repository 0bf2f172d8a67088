import type { Frame } from './frame.js';
import type { Scheduler } from './scheduler.js';
import type { NodeId } from './types.js';
import { logger } from './logger.js';

export type Receiver = (frame: Frame) => void;

/**
 * Inbound FIFO through which the medium delivers frames to one node.
 *
 * `get` registers a one-shot receiver. It is resumed by a zero-delay `Wake`
 * event, never synchronously, so a delivery made while the medium resolves a
 * tick is observed only after the resolution has finished.
 */
export class ChannelEndpoint {
  readonly nodeId: NodeId;
  readonly capacity: number;

  private readonly scheduler: Scheduler;
  private items: Frame[] = [];
  private receivers: Receiver[] = [];
  private _dropped = 0;

  constructor(scheduler: Scheduler, nodeId: NodeId, capacity = Infinity) {
    this.scheduler = scheduler;
    this.nodeId = nodeId;
    this.capacity = capacity;
  }

  get length(): number { return this.items.length; }
  get dropped(): number { return this._dropped; }
  get waiting(): boolean { return this.receivers.length > 0; }

  put(frame: Frame): boolean {
    if (this.items.length >= this.capacity) {
      this._dropped++;
      logger.debug({ clock: this.scheduler.now, node: this.nodeId, capacity: this.capacity }, 'endpoint full, frame dropped');
      return false;
    }
    this.items.push(frame);
    this.dispatch();
    return true;
  }

  get(receiver: Receiver): void {
    this.receivers.push(receiver);
    this.dispatch();
  }

  private dispatch(): void {
    while (this.items.length > 0 && this.receivers.length > 0) {
      const frame = this.items.shift();
      const receiver = this.receivers.shift();
      if (!frame || !receiver) break;
      this.scheduler.scheduleAfter(0, () => receiver(frame), 'Wake');
    }
  }
}
