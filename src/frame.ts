import { BROADCAST } from './types.js';
import type { NodeId } from './types.js';

export type FrameType = 'FLOOD_BEACON' | 'DATA';

export interface FloodBeaconMessage {
  readonly kind: 'FloodBeacon';
  readonly floodId: string;
}

export interface DataMessage {
  readonly kind: 'Data';
  readonly body: string;
}

export type Message = FloodBeaconMessage | DataMessage;

export interface Frame {
  readonly type: FrameType;
  readonly src: NodeId;
  readonly dst: NodeId;  // BROADCAST for every node
  readonly seq: number;
  readonly payload: Message;
}

// Who put a frame on the air. Never part of the frame itself.
export interface Transmission {
  readonly frame: Frame;
  readonly senderId: NodeId;
}

export const createFrame = (
  type: FrameType,
  src: NodeId,
  dst: NodeId,
  seq: number,
  payload: Message,
): Frame => Object.freeze({
  type,
  src,
  dst,
  seq,
  payload: Object.freeze({ ...payload }),
});

export const floodBeacon = (src: NodeId, seq: number, floodId: string): Frame =>
  createFrame('FLOOD_BEACON', src, BROADCAST, seq, { kind: 'FloodBeacon', floodId });

export const floodIdOf = (frame: Frame): string | undefined =>
  frame.type === 'FLOOD_BEACON' && frame.payload.kind === 'FloodBeacon'
    ? frame.payload.floodId
    : undefined;

/**
 * Canonical value key over every field of the frame, payload content included.
 * Two frames are the same transmission content iff their keys are equal.
 */
export const frameIdentity = (frame: Frame): string => {
  const payload = Object.entries(frame.payload)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify([frame.type, frame.src, frame.dst, frame.seq, payload]);
};

export const sameContent = (frames: readonly Frame[]): boolean => {
  const first = frames[0];
  if (!first) return true;
  const key = frameIdentity(first);
  return frames.every(frame => frame === first || frameIdentity(frame) === key);
};

export const frameToJson = (frame: Frame): string => JSON.stringify(frame);
