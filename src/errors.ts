import type { NodeId } from './types.js';

/**
 * Base class of every error the kernel raises. All of them are fatal to the run:
 * frame losses are outcomes, never errors.
 */
export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A run parameter is out of range. Raised before any event is scheduled. */
export class ConfigurationError extends SimulationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class DuplicateNodeError extends SimulationError {
  readonly nodeId: NodeId;

  constructor(nodeId: NodeId) {
    super(`node ${nodeId} already registered`);
    this.nodeId = nodeId;
  }
}

export class NotFoundError extends SimulationError {
  readonly nodeId: NodeId;

  constructor(nodeId: NodeId) {
    super(`node ${nodeId} not found in the network`);
    this.nodeId = nodeId;
  }
}

/** The medium was used before any endpoint was connected to it. */
export class ChannelUnavailableError extends SimulationError {
  constructor() {
    super('no endpoints connected to the medium');
  }
}

export class InvalidDelayError extends SimulationError {
  readonly delay: number;

  constructor(delay: number) {
    super(`cannot schedule an event with delay ${delay}`);
    this.delay = delay;
  }
}
