import { ChannelEndpoint } from './endpoint.js';
import { ChannelUnavailableError } from './errors.js';
import { sameContent } from './frame.js';
import type { Frame, Transmission } from './frame.js';
import { logger } from './logger.js';
import type { RadioNode } from './node.js';
import type { Rng } from './random.js';
import type { NetworkRegistry } from './registry.js';
import type { Scheduler } from './scheduler.js';
import type { NodeId, SimTime } from './types.js';

export interface MediumConfig {
  baseLossRate: number;
  interference: boolean;    // constructive interference of identical frames
  endpointCapacity: number;
}

export type MediumState = 'Idle' | 'Buffering' | 'Resolving';

export interface MediumStats {
  transmissions: number;
  resolutions: number;
  delivered: number;
  lostFading: number;
  lostCollision: number;
}

/** Loss probability of one logical copy sent by `k` identical, simultaneous transmitters. */
export const effectiveLossRate = (baseLossRate: number, k: number): number =>
  baseLossRate ** Math.log2(k + 1);

// Out of range and channel mismatch are hard filters with no random component.
const inRange = (sender: RadioNode, receiver: RadioNode): boolean =>
  Math.hypot(sender.position.x - receiver.position.x, sender.position.y - receiver.position.y) <= sender.txRange;

/**
 * The shared wireless channel.
 *
 * Sends made during one tick are buffered; a zero-delay `Resolve` event, queued by
 * the first send of the tick, evaluates the whole batch once every same-tick send
 * has landed. Outcomes therefore depend on the simultaneous set, never on the
 * order in which nodes happened to call {@link Medium.send}.
 */
export class Medium {
  readonly config: MediumConfig;

  private readonly scheduler: Scheduler;
  private readonly registry: NetworkRegistry;
  private readonly rng: Rng;
  private endpoints: ChannelEndpoint[] = [];
  private pending: Transmission[] = [];
  private lastTxTime = new Map<NodeId, SimTime>();
  private _state: MediumState = 'Idle';
  private readonly _stats: MediumStats = {
    transmissions: 0,
    resolutions: 0,
    delivered: 0,
    lostFading: 0,
    lostCollision: 0,
  };

  constructor(scheduler: Scheduler, registry: NetworkRegistry, rng: Rng, config: MediumConfig) {
    this.scheduler = scheduler;
    this.registry = registry;
    this.rng = rng;
    this.config = config;
    registry.onRemove(node => this.disconnect(node.id));
  }

  get state(): MediumState { return this._state; }
  get stats(): Readonly<MediumStats> { return this._stats; }
  get pendingTransmissions(): readonly Transmission[] { return this.pending; }

  /** Register the inbound endpoint of a node. Registration order is delivery order. */
  connect(nodeId: NodeId, capacity: number = this.config.endpointCapacity): ChannelEndpoint {
    const endpoint = new ChannelEndpoint(this.scheduler, nodeId, capacity);
    this.endpoints.push(endpoint);
    return endpoint;
  }

  /** Stop delivering to every endpoint of `nodeId`. Frames already queued stay queued. */
  disconnect(nodeId: NodeId): void {
    this.endpoints = this.endpoints.filter(endpoint => endpoint.nodeId !== nodeId);
  }

  send(frame: Frame, senderId: NodeId): void {
    if (this.endpoints.length === 0) {
      throw new ChannelUnavailableError();
    }
    const now = this.scheduler.now;
    if (this.lastTxTime.get(senderId) === now) {
      logger.trace({ clock: now, node: senderId }, 'sender already on air this tick');
      return;
    }
    this.lastTxTime.set(senderId, now);
    this.pending.push({ frame, senderId });
    this._stats.transmissions++;

    if (this._state === 'Idle') {
      this._state = 'Buffering';
      this.scheduler.scheduleAfter(0, () => this.resolve(), 'Resolve');
    }
  }

  private resolve(): void {
    this._state = 'Resolving';
    const batch = this.pending;
    const clock = this.scheduler.now;
    const senders = new Set(batch.map(tx => tx.senderId));
    this._stats.resolutions++;

    // a sender removed from the registry since it sent is off the air
    const onAir = batch.flatMap(tx => {
      const sender = this.registered(tx.senderId);
      return sender ? [{ tx, sender }] : [];
    });

    for (const endpoint of this.endpoints) {
      // half-duplex: a node on air this tick cannot hear anything
      if (senders.has(endpoint.nodeId)) continue;
      const receiver = this.registered(endpoint.nodeId);
      // endpoint of a node that never made it into the registry
      if (!receiver || receiver.inbox !== endpoint) continue;

      const candidates = onAir
        .filter(({ tx, sender }) => {
          if (sender.channel !== receiver.channel) {
            if (inRange(sender, receiver)) {
              logger.debug({ clock, from: tx.senderId, to: receiver.id }, 'frame lost (wrong channel)');
            }
            return false;
          }
          return inRange(sender, receiver);
        })
        .map(({ tx }) => tx);

      const delivered = this.applyLoss(candidates, receiver.id, clock);
      if (delivered) {
        this._stats.delivered++;
        endpoint.put(delivered.frame);
      }
    }

    this.pending = [];
    this.lastTxTime.clear();
    this._state = 'Idle';
  }

  private registered(nodeId: NodeId): RadioNode | undefined {
    return this.registry.hasNode(nodeId) ? this.registry.getNode(nodeId) : undefined;
  }

  private applyLoss(candidates: Transmission[], receiverId: NodeId, clock: SimTime): Transmission | undefined {
    const first = candidates[0];
    if (!first) return undefined;

    if (candidates.length === 1) {
      if (this.rng() < this.config.baseLossRate) {
        this._stats.lostFading++;
        logger.debug({ clock, from: first.senderId, to: receiverId }, 'frame lost (fading)');
        return undefined;
      }
      return first;
    }

    const senders = candidates.map(tx => tx.senderId);
    if (!this.config.interference || !sameContent(candidates.map(tx => tx.frame))) {
      this._stats.lostCollision++;
      logger.debug({ clock, from: senders, to: receiverId, count: candidates.length }, 'frames lost (collision)');
      return undefined;
    }

    const loss = effectiveLossRate(this.config.baseLossRate, candidates.length);
    if (this.rng() < loss) {
      this._stats.lostFading++;
      logger.debug({ clock, from: senders, to: receiverId, effectiveLoss: loss }, 'frame lost (fading, constructive interference)');
      return undefined;
    }
    return first;
  }
}
