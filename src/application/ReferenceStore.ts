import type { NodeReference } from '../domain/entities/NodeReference.js';
import type { NotificationHandler } from '../domain/ports/ISession.js';

export interface ReferenceEntry {
  reference: NodeReference;
  handler: NotificationHandler;
}

/**
 * Nodes the client is subscribed to, with the callback registered for each.
 * Keyed by display name + node id: references from separate browse calls
 * describe the same target without being the same object.
 * Insertion order is preserved; replacing an entry keeps its position.
 */
export class ReferenceStore {
  private readonly entries = new Map<string, ReferenceEntry>();

  private static key(displayName: string, nodeId: string): string {
    return `${displayName}\u0000${nodeId}`;
  }

  get size(): number {
    return this.entries.size;
  }

  find(displayName: string, nodeId: string): ReferenceEntry | undefined {
    return this.entries.get(ReferenceStore.key(displayName, nodeId));
  }

  has(reference: Pick<NodeReference, 'displayName' | 'nodeId'>): boolean {
    return this.find(reference.displayName, reference.nodeId) !== undefined;
  }

  /**
   * Inserts or replaces the entry of a reference.
   * Returns the entry it replaced, so the caller can cancel its monitored item.
   */
  put(reference: NodeReference, handler: NotificationHandler): ReferenceEntry | undefined {
    const key = ReferenceStore.key(reference.displayName, reference.nodeId);
    const previous = this.entries.get(key);
    this.entries.set(key, { reference, handler });
    return previous;
  }

  delete(reference: Pick<NodeReference, 'displayName' | 'nodeId'>): boolean {
    return this.entries.delete(ReferenceStore.key(reference.displayName, reference.nodeId));
  }

  clear(): void {
    this.entries.clear();
  }

  /** Copy of the entries, safe to iterate while the store changes */
  snapshot(): ReferenceEntry[] {
    return [...this.entries.values()];
  }
}
