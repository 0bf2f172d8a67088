export type NodeId = number;  // 0 is reserved for broadcast

export type SimTime = number;  // ticks, read as milliseconds

export const BROADCAST: NodeId = 0;

export const DEFAULT_TX_RANGE = 1.5;
export const DEFAULT_CHANNEL = 7;
export const DEFAULT_FLOOD_START = 100;

export interface Position {
  x: number;
  y: number;
}

export type RadioState = 'Listening' | 'Transmitting';

export type NodeRole = 'sink' | 'sensor';

export interface NodeConfig {
  id: NodeId;
  position: Position;
  hop: number;              // Chebyshev distance from the sink
  maxTransmissions: number; // retransmissions after first reception of a flood
  guardTime: SimTime;
  txRange: number;
  channel: number;
}

export interface SimulationResults {
  readonly maxTransmissions: number;
  readonly lossRate: number;
  readonly guardTime: number;
  readonly seed: number;
  readonly maxHops: number;
  readonly deviceCount: number;
  readonly floodSuccess: boolean;
  readonly floodCoverage: number;
  readonly completionTime: SimTime;
  readonly totalTransmissions: number;
}
