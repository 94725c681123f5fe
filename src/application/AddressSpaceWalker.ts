import {
  DEFAULT_NODE_CLASS_MASK,
  SERVER_SUBTREE_MARKER,
  WellKnownNodes,
  type NodeReference,
} from '../domain/entities/NodeReference.js';
import { describeError } from '../domain/errors.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { usableSession, type SessionContext } from './SessionContext.js';

export interface BrowseNodeOptions {
  /** Node whose children are browsed; the Objects folder by default */
  rootId?: string;
  nodeClassMask?: number;
  /** Keep only the server's own nodes instead of dropping them */
  includeServerSubtree?: boolean;
}

/**
 * Browses the remote address space, one level at a time or a whole subtree.
 * Browsing is used speculatively (for instance while resubscribing), so every
 * failure degrades to an empty result.
 */
export class AddressSpaceWalker {
  constructor(
    private readonly context: SessionContext,
    private readonly logger: ILogger
  ) {}

  async browseNode(options: BrowseNodeOptions = {}): Promise<NodeReference[]> {
    const rootId = options.rootId ?? WellKnownNodes.ObjectsFolder;
    const nodeClassMask = options.nodeClassMask ?? DEFAULT_NODE_CLASS_MASK;
    const includeServerSubtree = options.includeServerSubtree ?? false;

    const session = usableSession(this.context);
    if (session === null) {
      this.logger.info('Cannot browse nodes due to bad connection', {
        endpoint: this.context.endpoint,
        rootId,
      });
      return [];
    }

    let references: NodeReference[];
    try {
      references = await session.browse({ nodeId: rootId, nodeClassMask });
    } catch (error) {
      this.logger.warn('Endpoint does not respond to browse', {
        endpoint: this.context.endpoint,
        rootId,
        error: describeError(error),
      });
      return [];
    }

    return references.filter(
      (reference) =>
        reference.displayName.includes(SERVER_SUBTREE_MARKER) === includeServerSubtree
    );
  }

  /**
   * Depth-first walk: the seed first, then the subtree of every seed reference
   * in order. A node id is listed and expanded at most once, so reference
   * cycles on the remote cannot keep the walk going.
   */
  async recursiveBrowse(
    seed: readonly NodeReference[],
    visited: Set<string> = new Set()
  ): Promise<NodeReference[]> {
    const fresh: NodeReference[] = [];
    for (const reference of seed) {
      if (visited.has(reference.nodeId)) continue;
      visited.add(reference.nodeId);
      fresh.push(reference);
    }

    const result = [...fresh];
    for (const reference of fresh) {
      const children = await this.browseNode({ rootId: reference.nodeId });
      result.push(...(await this.recursiveBrowse(children, visited)));
    }
    return result;
  }

  /** Every node reachable from the Objects folder, server nodes excluded */
  async browseObjectsNode(): Promise<NodeReference[]> {
    return this.recursiveBrowse(await this.browseNode({ includeServerSubtree: false }));
  }

  /** Every node reachable from the server's own nodes under the Objects folder */
  async browseServerNode(): Promise<NodeReference[]> {
    return this.recursiveBrowse(await this.browseNode({ includeServerSubtree: true }));
  }

  static displayNames(references: readonly NodeReference[]): string[] {
    return references.map((reference) => reference.displayName);
  }

  static nodeIds(references: readonly NodeReference[]): string[] {
    return references.map((reference) => reference.nodeId);
  }
}
