import { vi, type Mock } from "vitest";
import { GOOD, type DataValue, type StatusCode } from "../domain/entities/DataValue.js";
import type { NodeClass, NodeReference } from "../domain/entities/NodeReference.js";
import { ProtocolFault, TransportFault } from "../domain/errors.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import type {
  BrowseRequest,
  EndpointDescriptor,
  IndexRangeResult,
  ISession,
  ISessionFactory,
  ISubscriptionContext,
  KeepAliveHandler,
  MonitoredItem,
  MonitoredItemRequest,
  SessionOpenOptions,
  SubscriptionOptions,
  WriteItem,
} from "../domain/ports/ISession.js";
import { applyIndexRange } from "../infrastructure/opcua/indexRange.js";

export type MockLogger = { [K in keyof ILogger]: Mock };

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    message: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

export function ref(displayName: string, nodeId: string, nodeClass: NodeClass = "Variable"): NodeReference {
  return { displayName, nodeClass, nodeId, typeDefinition: "i=63" };
}

export function dataValue(value: unknown, statusCode: StatusCode = GOOD): DataValue {
  return {
    value,
    statusCode,
    sourceTimestamp: new Date(0),
    serverTimestamp: new Date(0),
  };
}

export const BAD_NODE_ID_UNKNOWN: StatusCode = { code: 0x80340000, name: "BadNodeIdUnknown" };
export const BAD_NOT_WRITABLE: StatusCode = { code: 0x803b0000, name: "BadNotWritable" };

export class FakeSubscription implements ISubscriptionContext {
  readonly items: MonitoredItem[] = [];
  readonly added: MonitoredItemRequest[] = [];
  readonly removed: MonitoredItem[] = [];
  applyCount = 0;
  applyError: Error | null = null;
  deleteError: Error | null = null;
  deleted = false;

  constructor(readonly publishingInterval: number) {}

  get monitoredItems(): readonly MonitoredItem[] {
    return [...this.items];
  }

  addItem(request: MonitoredItemRequest): MonitoredItem {
    const item: MonitoredItem = { ...request };
    this.items.push(item);
    this.added.push(request);
    return item;
  }

  removeItem(item: MonitoredItem): void {
    const index = this.items.indexOf(item);
    if (index >= 0) this.items.splice(index, 1);
    this.removed.push(item);
  }

  async applyChanges(): Promise<void> {
    this.applyCount++;
    if (this.applyError) throw this.applyError;
  }

  async delete(): Promise<void> {
    if (this.deleteError) throw this.deleteError;
    this.deleted = true;
  }

  /** Delivers a value to every item monitoring the node */
  publish(nodeId: string, value: DataValue): void {
    for (const item of this.items) {
      if (item.nodeId === nodeId) item.handler?.(item, value);
    }
  }
}

/**
 * Session against an in-memory address space: node id → children
 */
export class FakeSession implements ISession {
  connected = true;
  keepAliveHandler: KeepAliveHandler | null = null;
  readonly browseRequests: BrowseRequest[] = [];
  readonly browseFailures = new Set<string>();
  readonly values = new Map<string, DataValue>();
  readonly writes: WriteItem[][] = [];
  writeStatuses: StatusCode[] = [];
  readError: Error | null = null;
  writeError: Error | null = null;
  createSubscriptionError: Error | null = null;
  reconnectError: Error | null = null;
  closeError: Error | null = null;
  readonly subscriptions: FakeSubscription[] = [];
  readonly removedSubscriptions: ISubscriptionContext[] = [];
  reconnectCalls = 0;
  closeCalls = 0;

  constructor(readonly addressSpace: Map<string, NodeReference[]> = new Map()) {}

  onKeepAlive(handler: KeepAliveHandler): void {
    this.keepAliveHandler = handler;
  }

  emitKeepAlive(good: boolean, status = good ? "Good" : "BadNoCommunication"): void {
    this.keepAliveHandler?.({
      good,
      status,
      serverState: good ? "Running" : null,
      timestamp: new Date(0),
    });
  }

  async reconnect(): Promise<void> {
    this.reconnectCalls++;
    if (this.reconnectError) throw this.reconnectError;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.connected = false;
    if (this.closeError) throw this.closeError;
  }

  async browse(request: BrowseRequest): Promise<NodeReference[]> {
    this.browseRequests.push(request);
    if (this.browseFailures.has(request.nodeId)) {
      throw new ProtocolFault(`Browse of ${request.nodeId} failed`, "BadNodeIdUnknown");
    }
    return [...(this.addressSpace.get(request.nodeId) ?? [])];
  }

  async read(nodeIds: readonly string[]): Promise<DataValue[]> {
    if (this.readError) throw this.readError;
    return nodeIds.map((nodeId) => this.values.get(nodeId) ?? dataValue(null, BAD_NODE_ID_UNKNOWN));
  }

  applyIndexRange(value: unknown, indexRange: string): IndexRangeResult {
    return applyIndexRange(value, indexRange);
  }

  async write(items: readonly WriteItem[]): Promise<StatusCode[]> {
    this.writes.push([...items]);
    if (this.writeError) throw this.writeError;
    return items.map((_, index) => this.writeStatuses[index] ?? GOOD);
  }

  async createSubscription(options: SubscriptionOptions): Promise<ISubscriptionContext> {
    if (this.createSubscriptionError) throw this.createSubscriptionError;
    const subscription = new FakeSubscription(options.publishingInterval);
    this.subscriptions.push(subscription);
    return subscription;
  }

  async removeSubscription(subscription: ISubscriptionContext): Promise<void> {
    this.removedSubscriptions.push(subscription);
  }
}

export class FakeSessionFactory implements ISessionFactory {
  /** Shared by every session the factory opens */
  readonly addressSpace = new Map<string, NodeReference[]>();
  readonly sessions: FakeSession[] = [];
  readonly selectedUrls: string[] = [];
  readonly openOptions: SessionOpenOptions[] = [];
  /** Number of upcoming attempts that fail */
  failures = 0;
  unreachable = false;

  get current(): FakeSession | undefined {
    return this.sessions[this.sessions.length - 1];
  }

  async selectEndpoint(endpointUrl: string): Promise<EndpointDescriptor> {
    this.selectedUrls.push(endpointUrl);
    if (this.unreachable || this.failures > 0) {
      this.failures = Math.max(0, this.failures - 1);
      throw new TransportFault(`Unable to reach ${endpointUrl}`);
    }
    return {
      endpointUrl,
      securityMode: "None",
      securityPolicyUri: "http://opcfoundation.org/UA/SecurityPolicy#None",
    };
  }

  async openSession(_endpoint: EndpointDescriptor, options: SessionOpenOptions): Promise<ISession> {
    this.openOptions.push(options);
    const session = new FakeSession(this.addressSpace);
    this.sessions.push(session);
    return session;
  }
}
