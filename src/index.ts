// Core types
export type { NodeId, SimTime, Position, RadioState, NodeRole, NodeConfig, SimulationResults } from './types.js';
export { BROADCAST, DEFAULT_TX_RANGE, DEFAULT_CHANNEL, DEFAULT_FLOOD_START } from './types.js';
export type { Frame, FrameType, Message, FloodBeaconMessage, DataMessage, Transmission } from './frame.js';
export { createFrame, floodBeacon, floodIdOf, frameIdentity, sameContent, frameToJson } from './frame.js';

// Errors
export {
  SimulationError,
  ConfigurationError,
  DuplicateNodeError,
  NotFoundError,
  ChannelUnavailableError,
  InvalidDelayError,
} from './errors.js';

// Kernel
export { Scheduler } from './scheduler.js';
export type { Event, EventHandle, EventKind } from './scheduler.js';
export { ChannelEndpoint } from './endpoint.js';
export type { Receiver } from './endpoint.js';
export { Medium, effectiveLossRate } from './medium.js';
export type { MediumConfig, MediumState, MediumStats } from './medium.js';
export { RadioNode } from './node.js';
export type { NodeBehavior } from './node.js';
export { FloodInitiator, FloodRelay } from './flood.js';
export { NetworkRegistry } from './registry.js';
export { mulberry32, randomHex, randomSeed } from './random.js';
export type { Rng } from './random.js';

// Experiment
export { DEFAULTS, simulationParamsSchema, validateSimulationParams } from './config.js';
export type { SimulationParams, SimulationInput } from './config.js';
export { gridLayout, buildGrid } from './topology.js';
export type { GridPlacement, GridOptions } from './topology.js';
export { Simulation, runSimulation } from './simulation.js';
export { collectResults, resultsToRow, logResults } from './results.js';
export type { ResultParams, ResultRow } from './results.js';
export { runSweep } from './monte-carlo.js';
export type { SweepOptions, SweepPoint } from './monte-carlo.js';

// Logger (for CLI usage)
export { logger, makeLogger } from './logger.js';
