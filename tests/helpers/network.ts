import { Medium } from '../../src/medium.js';
import { RadioNode } from '../../src/node.js';
import type { NodeBehavior } from '../../src/node.js';
import type { Frame } from '../../src/frame.js';
import type { Rng } from '../../src/random.js';
import { NetworkRegistry } from '../../src/registry.js';
import { Scheduler } from '../../src/scheduler.js';
import { DEFAULT_CHANNEL, DEFAULT_TX_RANGE } from '../../src/types.js';
import type { NodeConfig, NodeId } from '../../src/types.js';

/** Replays `values` in a loop and counts how many were drawn. */
export function sequenceRng(values: number[]): { rng: Rng; draws: () => number } {
  let i = 0;
  return {
    rng: () => values[i++ % values.length] ?? 0,
    draws: () => i,
  };
}

/** Keeps every frame the radio admitted. */
export class Recorder implements NodeBehavior {
  readonly role = 'sensor';
  readonly frames: { clock: number; frame: Frame }[] = [];

  start(): void {}

  onFrame(node: RadioNode, frame: Frame): void {
    this.frames.push({ clock: node.now, frame });
  }
}

export interface TestNet {
  scheduler: Scheduler;
  registry: NetworkRegistry;
  medium: Medium;
}

export function createNet(rng: Rng, baseLossRate: number, interference = true): TestNet {
  const scheduler = new Scheduler();
  const registry = new NetworkRegistry();
  const medium = new Medium(scheduler, registry, rng, {
    baseLossRate,
    interference,
    endpointCapacity: Infinity,
  });
  return { scheduler, registry, medium };
}

export function addNode(
  net: TestNet,
  id: NodeId,
  x: number,
  y: number,
  overrides: Partial<Omit<NodeConfig, 'id' | 'position'>> = {},
  behavior: NodeBehavior = new Recorder(),
): RadioNode {
  const node = new RadioNode(net.scheduler, net.medium, {
    id,
    position: { x, y },
    hop: Math.max(Math.abs(x), Math.abs(y)),
    maxTransmissions: 1,
    guardTime: 100,
    txRange: DEFAULT_TX_RANGE,
    channel: DEFAULT_CHANNEL,
    ...overrides,
  }, behavior);
  net.registry.addNode(node);
  return node;
}
