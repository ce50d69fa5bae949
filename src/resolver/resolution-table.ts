import type { NodeId } from '../ast/nodes.js';

export interface Resolution {
  declarationId: NodeId;
  kind: 'struct' | 'enum';
  fqn: string;
}

/**
 * Side table binding each user type reference to the declaration it
 * names. Type nodes are never mutated; lookups go through their ids.
 */
export class ResolutionTable {
  private entries = new Map<NodeId, Resolution>();

  get(referenceId: NodeId): Resolution | undefined {
    return this.entries.get(referenceId);
  }

  has(referenceId: NodeId): boolean {
    return this.entries.has(referenceId);
  }

  record(referenceId: NodeId, resolution: Resolution): void {
    this.entries.set(referenceId, resolution);
  }

  fqnOf(referenceId: NodeId): string | undefined {
    return this.entries.get(referenceId)?.fqn;
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): IterableIterator<[NodeId, Resolution]> {
    return this.entries.entries();
  }
}
