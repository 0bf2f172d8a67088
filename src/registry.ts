import { UndirectedGraph } from 'graphology';
import { DuplicateNodeError, NotFoundError } from './errors.js';
import type { RadioNode } from './node.js';
import type { NodeId } from './types.js';

type NodeEntry = { node: RadioNode };
type LinkEntry = { distance: number };

/**
 * Identity → node lookup for one run. Nodes are vertices; an edge joins two nodes
 * that are within radio range of each other when the topology is built.
 */
export class NetworkRegistry {
  private readonly graph = new UndirectedGraph<NodeEntry, LinkEntry>();
  private ordered: RadioNode[] = [];
  private readonly removalListeners: ((node: RadioNode) => void)[] = [];

  get size(): number { return this.graph.order; }
  get linkCount(): number { return this.graph.size; }

  addNode(node: RadioNode): void {
    const key = String(node.id);
    if (this.graph.hasNode(key)) {
      throw new DuplicateNodeError(node.id);
    }
    this.graph.addNode(key, { node });
    this.ordered.push(node);
  }

  removeNode(node: RadioNode): void {
    const key = String(node.id);
    if (!this.graph.hasNode(key) || this.graph.getNodeAttributes(key).node !== node) {
      throw new NotFoundError(node.id);
    }
    this.graph.dropNode(key);
    this.ordered = this.ordered.filter(n => n !== node);
    for (const listener of this.removalListeners) listener(node);
  }

  /** Called with every node after it leaves the registry. */
  onRemove(listener: (node: RadioNode) => void): void {
    this.removalListeners.push(listener);
  }

  hasNode(id: NodeId): boolean {
    return this.graph.hasNode(String(id));
  }

  getNode(id: NodeId): RadioNode {
    const key = String(id);
    if (!this.graph.hasNode(key)) {
      throw new NotFoundError(id);
    }
    return this.graph.getNodeAttributes(key).node;
  }

  /** Nodes in registration order. */
  nodes(): readonly RadioNode[] {
    return this.ordered;
  }

  link(a: NodeId, b: NodeId, distance: number): void {
    const from = this.getNode(a);
    const to = this.getNode(b);
    if (from === to || this.graph.hasEdge(String(a), String(b))) return;
    this.graph.addUndirectedEdge(String(a), String(b), { distance });
  }

  neighbors(id: NodeId): NodeId[] {
    const key = String(id);
    if (!this.graph.hasNode(key)) {
      throw new NotFoundError(id);
    }
    return this.graph.mapNeighbors(key, (_neighbor, attributes) => attributes.node.id);
  }
}
