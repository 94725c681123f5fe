import type { DataValue, StatusCode } from '../entities/DataValue.js';
import type { NodeReference } from '../entities/NodeReference.js';

/**
 * Transport endpoint picked for an endpoint URL
 */
export interface EndpointDescriptor {
  endpointUrl: string;
  securityMode: string;
  securityPolicyUri: string;
}

export interface SessionOpenOptions {
  /** Requested session timeout (ms) */
  sessionTimeout: number;
  /** Interval between two liveness checks (ms) */
  keepAliveInterval: number;
}

/**
 * Periodic health signal of an open session
 */
export interface KeepAliveEvent {
  good: boolean;
  status: string;
  /** Last server state reported by the remote, when known */
  serverState: string | null;
  timestamp: Date;
}

export type KeepAliveHandler = (event: KeepAliveEvent) => void;

export interface BrowseRequest {
  nodeId: string;
  nodeClassMask: number;
}

/**
 * Outcome of restricting a value to an index range: the elements to write, or
 * why the range cannot be used with the value
 */
export type IndexRangeResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: string };

export interface WriteItem {
  nodeId: string;
  value: unknown;
  indexRange: string | null;
  sourceTimestamp: Date;
  statusCode: StatusCode;
}

/**
 * Information handed to a notification handler with every published value
 */
export interface MonitoredItemInfo {
  displayName: string;
  nodeId: string;
}

export type NotificationHandler = (item: MonitoredItemInfo, value: DataValue) => void;

export interface MonitoredItemRequest {
  displayName: string;
  nodeId: string;
  handler: NotificationHandler | null;
}

/**
 * Live binding of one node to a notification sink inside a subscription
 */
export interface MonitoredItem extends MonitoredItemInfo {
  readonly handler: NotificationHandler | null;
}

export interface SubscriptionOptions {
  publishingInterval: number;
}

/**
 * Subscription context bound to one session. `addItem` and `removeItem` only
 * stage changes; `applyChanges` pushes them to the remote in one batch.
 */
export interface ISubscriptionContext {
  readonly publishingInterval: number;

  /** Items currently active or staged for creation */
  readonly monitoredItems: readonly MonitoredItem[];

  addItem(request: MonitoredItemRequest): MonitoredItem;

  removeItem(item: MonitoredItem): void;

  applyChanges(): Promise<void>;

  /** Tears the subscription down on the remote side */
  delete(): Promise<void>;
}

/**
 * Session with a remote endpoint, as provided by the protocol stack
 */
export interface ISession {
  readonly connected: boolean;

  /**
   * Registers the liveness callback; it is called on the transport's own path
   * and must not block.
   */
  onKeepAlive(handler: KeepAliveHandler): void;

  /**
   * Re-establishes the secure channel and reactivates this session in place.
   * Throws a ProtocolFault when the remote side no longer knows the session.
   */
  reconnect(): Promise<void>;

  close(): Promise<void>;

  /** Forward hierarchical browse of the immediate children of a node */
  browse(request: BrowseRequest): Promise<NodeReference[]>;

  /** Reads the Value attribute of every node, in order */
  read(nodeIds: readonly string[]): Promise<DataValue[]>;

  /** Validates an index range and extracts the elements of the value it selects */
  applyIndexRange(value: unknown, indexRange: string): IndexRangeResult;

  /** Writes the Value attribute; one status per item, in order */
  write(items: readonly WriteItem[]): Promise<StatusCode[]>;

  /** Creates and activates a subscription on the remote */
  createSubscription(options: SubscriptionOptions): Promise<ISubscriptionContext>;

  removeSubscription(subscription: ISubscriptionContext): Promise<void>;
}

/**
 * Entry point into the protocol stack
 */
export interface ISessionFactory {
  /**
   * Verifies that the endpoint exists and picks the transport endpoint to use.
   * Throws a TransportFault when the URL is wrong or the server is down.
   */
  selectEndpoint(endpointUrl: string, operationTimeout: number): Promise<EndpointDescriptor>;

  openSession(endpoint: EndpointDescriptor, options: SessionOpenOptions): Promise<ISession>;
}
