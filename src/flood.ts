import { floodBeacon } from './frame.js';
import type { Frame } from './frame.js';
import { logger } from './logger.js';
import type { NodeBehavior, RadioNode } from './node.js';
import { randomHex } from './random.js';
import type { Rng } from './random.js';
import { DEFAULT_FLOOD_START } from './types.js';
import type { SimTime } from './types.js';

const FLOOD_ID_DIGITS = 32;

// Retransmit `remaining` times, one guard time apart.
const retransmit = (node: RadioNode, frame: Frame, remaining: number): void => {
  if (remaining <= 0) return;
  node.sleep(node.guardTime, () => {
    node.send(frame);
    retransmit(node, frame, remaining - 1);
  });
};

/** Sensor: relays every flood it hears for the first time. */
export class FloodRelay implements NodeBehavior {
  readonly role = 'sensor';

  start(_node: RadioNode): void {
    // passive until the first beacon arrives
  }

  onFrame(node: RadioNode, frame: Frame, isNew: boolean): void {
    if (frame.type === 'FLOOD_BEACON' && isNew) {
      retransmit(node, frame, node.maxTransmissions);
    }
  }
}

/**
 * Sink: starts one flood at `startTime`, then behaves like a relay.
 */
export class FloodInitiator implements NodeBehavior {
  readonly role = 'sink';

  private readonly rng: Rng;
  private readonly startTime: SimTime;
  private readonly relay = new FloodRelay();
  private msgSeq = -1;

  constructor(rng: Rng, startTime: SimTime = DEFAULT_FLOOD_START) {
    this.rng = rng;
    this.startTime = startTime;
  }

  get sequenceNumber(): number { return this.msgSeq; }

  start(node: RadioNode): void {
    node.sleep(this.startTime, () => this.triggerFlood(node));
  }

  onFrame(node: RadioNode, frame: Frame, isNew: boolean): void {
    this.relay.onFrame(node, frame, isNew);
  }

  triggerFlood(node: RadioNode): Frame {
    this.msgSeq++;
    const floodId = randomHex(this.rng, FLOOD_ID_DIGITS);
    node.recordFloodBeacon(floodId);
    const frame = floodBeacon(node.id, this.msgSeq, floodId);
    logger.info({ clock: node.now, node: node.id, floodId, seq: this.msgSeq }, 'flood triggered');
    node.send(frame);
    retransmit(node, frame, node.maxTransmissions);
    return frame;
  }
}
