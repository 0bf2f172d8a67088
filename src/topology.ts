import { FloodInitiator, FloodRelay } from './flood.js';
import { logger } from './logger.js';
import type { Medium } from './medium.js';
import { RadioNode } from './node.js';
import type { Rng } from './random.js';
import type { NetworkRegistry } from './registry.js';
import type { Scheduler } from './scheduler.js';
import type { NodeId, Position, SimTime } from './types.js';

export interface GridPlacement {
  id: NodeId;
  position: Position;
  hop: number;
}

export interface GridOptions {
  maxHops: number;
  maxTransmissions: number;
  guardTime: SimTime;
  txRange: number;
  channel: number;
  floodStartTime: SimTime;
}

/**
 * Square grid centred on the sink at (0, 0). Ids grow layer by layer (hop =
 * Chebyshev distance), and by (x, y) within a layer, starting with 1 for the sink.
 */
export function gridLayout(maxHops: number): GridPlacement[] {
  const layers: Position[][] = Array.from({ length: maxHops + 1 }, () => []);
  for (let y = -maxHops; y <= maxHops; y++) {
    for (let x = -maxHops; x <= maxHops; x++) {
      layers[Math.max(Math.abs(x), Math.abs(y))]?.push({ x, y });
    }
  }

  const placements: GridPlacement[] = [];
  let id = 1;
  layers.forEach((layer, hop) => {
    layer.sort((a, b) => a.x - b.x || a.y - b.y);
    for (const position of layer) {
      placements.push({ id: id++, position, hop });
    }
  });
  return placements;
}

/**
 * Create, register and start every grid node, and record radio neighbourhoods
 * in the registry.
 */
export function buildGrid(
  scheduler: Scheduler,
  medium: Medium,
  registry: NetworkRegistry,
  rng: Rng,
  options: GridOptions,
): RadioNode[] {
  const nodes: RadioNode[] = [];
  for (const { id, position, hop } of gridLayout(options.maxHops)) {
    const isSink = position.x === 0 && position.y === 0;
    const node = new RadioNode(
      scheduler,
      medium,
      {
        id,
        position,
        hop,
        maxTransmissions: options.maxTransmissions,
        guardTime: options.guardTime,
        txRange: options.txRange,
        channel: options.channel,
      },
      isSink ? new FloodInitiator(rng, options.floodStartTime) : new FloodRelay(),
    );
    registry.addNode(node);
    nodes.push(node);
  }

  for (let i = 0; i < nodes.length; i++) {
    for (let j = i + 1; j < nodes.length; j++) {
      const a = nodes[i];
      const b = nodes[j];
      if (!a || !b) continue;
      const distance = Math.hypot(a.position.x - b.position.x, a.position.y - b.position.y);
      if (distance <= Math.max(a.txRange, b.txRange)) {
        registry.link(a.id, b.id, distance);
      }
    }
  }

  logger.debug({ nodeCount: registry.size, linkCount: registry.linkCount }, 'grid created');

  for (const node of nodes) {
    node.start();
  }
  return nodes;
}
