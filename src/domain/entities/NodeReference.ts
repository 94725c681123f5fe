/**
 * Class of a node in the remote address space.
 * Classes the client does not act on are reported as `Unspecified`.
 */
export type NodeClass = 'Unspecified' | 'Object' | 'Variable' | 'Method';

/**
 * Bit of each node class inside a browse mask
 */
export const NODE_CLASS_BITS: Record<NodeClass, number> = {
  Unspecified: 0,
  Object: 1,
  Variable: 2,
  Method: 4,
};

export const DEFAULT_NODE_CLASS_MASK =
  NODE_CLASS_BITS.Object | NODE_CLASS_BITS.Variable | NODE_CLASS_BITS.Method;

/**
 * Builds a browse mask from node classes; no classes means every class.
 */
export function nodeClassMask(...classes: NodeClass[]): number {
  return classes.reduce((mask, nodeClass) => mask | NODE_CLASS_BITS[nodeClass], 0);
}

export function nodeClassFromBits(bits: number): NodeClass {
  switch (bits) {
    case NODE_CLASS_BITS.Object:
      return 'Object';
    case NODE_CLASS_BITS.Variable:
      return 'Variable';
    case NODE_CLASS_BITS.Method:
      return 'Method';
    default:
      return 'Unspecified';
  }
}

/**
 * One addressable point of the remote address space, as returned by a browse.
 * References coming from separate browse calls are distinct objects; compare
 * them with `isSameTarget`, never by identity.
 */
export interface NodeReference {
  displayName: string;
  nodeClass: NodeClass;
  nodeId: string;
  typeDefinition: string;
}

export function isSameTarget(
  a: Pick<NodeReference, 'displayName' | 'nodeId'>,
  b: Pick<NodeReference, 'displayName' | 'nodeId'>
): boolean {
  return a.displayName === b.displayName && a.nodeId === b.nodeId;
}

/**
 * Well-known node ids of the standard address space
 */
export const WellKnownNodes = {
  ObjectsFolder: 'i=85',
  ServerStatusCurrentTime: 'i=2258',
  ServerStatusState: 'i=2259',
} as const;

export const SERVER_STATUS_DISPLAY_NAME = 'ServerStatusCurrentTime';

/**
 * Display names contain this marker for nodes that belong to the server's own
 * diagnostic subtree
 */
export const SERVER_SUBTREE_MARKER = 'Server';
