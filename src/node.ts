import type { ChannelEndpoint } from './endpoint.js';
import { createFrame, floodIdOf, frameToJson } from './frame.js';
import type { Frame, FrameType, Message } from './frame.js';
import { logger } from './logger.js';
import type { Medium } from './medium.js';
import type { Scheduler } from './scheduler.js';
import { BROADCAST } from './types.js';
import type { NodeConfig, NodeId, NodeRole, Position, RadioState, SimTime } from './types.js';

/**
 * Protocol logic layered on top of the radio. Sink and sensor differ only here.
 */
export interface NodeBehavior {
  readonly role: NodeRole;
  start(node: RadioNode): void;
  // `isNew`: the frame carries a flood id this node had not seen before admitting it.
  onFrame(node: RadioNode, frame: Frame, isNew: boolean): void;
}

export class RadioNode {

  public readonly id: NodeId;

  public readonly position: Position;

  // Chebyshev distance from the sink.
  public readonly hop: number;

  public readonly maxTransmissions: number;

  // Time the radio stays deaf after each transmission.
  public readonly guardTime: SimTime;

  public readonly txRange: number;

  private _channel: number;

  // False while the guard time after our own transmission has not elapsed.
  private _radioRxEnable = true;

  private _localTxCount = 0;

  // Reception bookkeeping read by the results after the run.
  private readonly _floodBeaconIds = new Set<string>();
  private readonly _floodBeaconTimes = new Map<string, Set<SimTime>>();

  // Frames delivered by the medium.
  public readonly inbox: ChannelEndpoint;

  private readonly scheduler: Scheduler;
  private readonly medium: Medium;
  private readonly behavior: NodeBehavior;

  constructor(scheduler: Scheduler, medium: Medium, config: NodeConfig, behavior: NodeBehavior) {
    this.id = config.id;
    this.position = config.position;
    this.hop = config.hop;
    this.maxTransmissions = config.maxTransmissions;
    this.guardTime = config.guardTime;
    this.txRange = config.txRange;
    this._channel = config.channel;
    this.scheduler = scheduler;
    this.medium = medium;
    this.behavior = behavior;
    this.inbox = medium.connect(this.id);
  }

  get role(): NodeRole { return this.behavior.role; }
  get channel(): number { return this._channel; }
  get radioRxEnable(): boolean { return this._radioRxEnable; }
  get state(): RadioState { return this._radioRxEnable ? 'Listening' : 'Transmitting'; }
  get localTxCount(): number { return this._localTxCount; }
  get now(): SimTime { return this.scheduler.now; }
  get floodBeaconIds(): ReadonlySet<string> { return this._floodBeaconIds; }
  get floodBeaconTimes(): ReadonlyMap<string, ReadonlySet<SimTime>> { return this._floodBeaconTimes; }

  setChannel(channel: number): void {
    this._channel = channel;
  }

  createFrame(type: FrameType, dst: NodeId, seq: number, payload: Message): Frame {
    return createFrame(type, this.id, dst, seq, payload);
  }

  /** Start the receive loop and the protocol behavior. Called once, before the run. */
  start(): void {
    this.log({ x: this.position.x, y: this.position.y }, `new ${this.role} node`);
    this.listen();
    this.behavior.start(this);
  }

  sleep(duration: SimTime, then: () => void): void {
    this.scheduler.scheduleAfter(duration, then);
  }

  /**
   * Put a frame on the air. The radio turns deaf for `guardTime`; a send issued
   * before then is ignored.
   */
  send(frame: Frame): boolean {
    if (!this._radioRxEnable) {
      this.log({ dst: frame.dst }, 'send ignored (radio busy with tx)');
      return false;
    }
    this._radioRxEnable = false;
    this._localTxCount++;
    this.log({ dst: frame.dst, seq: frame.seq }, 'transmit frame');
    this.medium.send(frame, this.id);
    this.scheduler.scheduleAfter(this.guardTime, () => {
      this._radioRxEnable = true;
    });
    return true;
  }

  /**
   * Admission filter. Returns the frame when it is for us and the radio listens,
   * recording flood beacons on the way.
   */
  receive(frame: Frame): Frame | undefined {
    if (!this._radioRxEnable) {
      this.log({ src: frame.src }, 'discard frame (radio busy with tx)');
      return undefined;
    }
    if (frame.dst !== BROADCAST && frame.dst !== this.id) {
      this.log({ src: frame.src, dst: frame.dst }, 'discard frame (not logical destination)');
      return undefined;
    }
    const floodId = floodIdOf(frame);
    if (floodId !== undefined) {
      this.recordFloodBeacon(floodId);
    }
    return frame;
  }

  recordFloodBeacon(floodId: string): void {
    this._floodBeaconIds.add(floodId);
    let times = this._floodBeaconTimes.get(floodId);
    if (!times) {
      times = new Set<SimTime>();
      this._floodBeaconTimes.set(floodId, times);
    }
    times.add(this.scheduler.now);
  }

  // Blocks on the endpoint; re-armed after every frame.
  private listen(): void {
    this.inbox.get(frame => {
      this.handleFrame(frame);
      this.listen();
    });
  }

  private handleFrame(frame: Frame): void {
    const floodId = floodIdOf(frame);
    const isNew = floodId !== undefined && !this._floodBeaconIds.has(floodId);
    if (this.receive(frame) === undefined) return;
    this.log({ frame: frameToJson(frame) }, 'receive frame');
    this.behavior.onFrame(this, frame, isNew);
  }

  private log(fields: Record<string, unknown>, msg: string): void {
    if (!logger.isLevelEnabled('debug')) return;
    logger.debug({ clock: this.scheduler.now, node: this.id, hop: this.hop, ...fields }, msg);
  }

}
