import {
  AttributeIds,
  BrowseDirection,
  DataType,
  ReferenceTypeIds,
  StatusCodes,
  VariantArrayType,
  resolveNodeId,
  type BrowseResult,
  type ClientSession,
  type OPCUAClient,
  type StatusCode as UaStatusCode,
  type WriteValueOptions,
} from 'node-opcua-client';
import { NumericRange } from 'node-opcua-numeric-range';
import { isGood, type DataValue, type StatusCode } from '../../domain/entities/DataValue.js';
import { WellKnownNodes, type NodeReference } from '../../domain/entities/NodeReference.js';
import { describeError, ProtocolFault, TransportFault } from '../../domain/errors.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type {
  BrowseRequest,
  IndexRangeResult,
  ISession,
  ISubscriptionContext,
  KeepAliveEvent,
  KeepAliveHandler,
  SubscriptionOptions,
  WriteItem,
} from '../../domain/ports/ISession.js';
import { applyIndexRange } from './indexRange.js';
import { NodeOpcuaSubscription } from './NodeOpcuaSubscription.js';
import { serverStateName, severityName, toDataValue, toNodeReference, toStatusCode } from './mappers.js';

/** Every field of a reference description */
const BROWSE_RESULT_MASK = 63;

/**
 * Session on a node-opcua client. Liveness is probed on a timer by reading the
 * server state; a failed probe, a keep-alive failure reported by the stack or
 * the remote closing the session all produce a bad keep-alive event.
 */
export class NodeOpcuaSession implements ISession {
  private handler: KeepAliveHandler | null = null;
  private timer: NodeJS.Timeout | null = null;
  private probing = false;
  private closed = false;

  constructor(
    private readonly client: OPCUAClient,
    private readonly session: ClientSession,
    private readonly endpointUrl: string,
    private readonly keepAliveInterval: number,
    private readonly logger: ILogger
  ) {
    this.session.on('keepalive_failure', () => {
      this.emit({ good: false, status: 'BadNoCommunication', serverState: null });
    });
    this.session.on('session_closed', (statusCode: UaStatusCode) => {
      this.closed = true;
      this.emit({ good: false, status: statusCode.name, serverState: null });
    });
  }

  get connected(): boolean {
    return !this.closed;
  }

  onKeepAlive(handler: KeepAliveHandler): void {
    this.handler = handler;
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      this.probe().catch((error: unknown) => {
        this.logger.warn('Keep-alive probe failed', { error: describeError(error) });
      });
    }, this.keepAliveInterval);
    this.timer.unref();
  }

  async reconnect(): Promise<void> {
    try {
      await this.client.reactivateSession(this.session);
    } catch (error) {
      throw new ProtocolFault('Unable to reactivate session', 'BadSessionIdInvalid', { cause: error });
    }
    this.closed = false;
  }

  async close(): Promise<void> {
    this.stop();
    const wasOpen = !this.closed;
    this.closed = true;
    try {
      if (wasOpen) {
        await this.session.close();
      }
    } catch (error) {
      throw new TransportFault(`Unable to close session on ${this.endpointUrl}`, { cause: error });
    } finally {
      await this.client.disconnect();
    }
  }

  async browse(request: BrowseRequest): Promise<NodeReference[]> {
    let result: BrowseResult = await this.call('browse', () =>
      this.session.browse({
        nodeId: request.nodeId,
        browseDirection: BrowseDirection.Forward,
        referenceTypeId: ReferenceTypeIds.HierarchicalReferences,
        includeSubtypes: true,
        nodeClassMask: request.nodeClassMask,
        resultMask: BROWSE_RESULT_MASK,
      })
    );

    const references: NodeReference[] = [];
    for (;;) {
      const status = toStatusCode(result.statusCode);
      if (!isGood(status)) {
        throw new ProtocolFault(`Browse of ${request.nodeId} failed`, status.name);
      }
      references.push(...(result.references ?? []).map(toNodeReference));

      const continuationPoint = result.continuationPoint;
      if (!continuationPoint || continuationPoint.length === 0) break;
      result = await this.call('browseNext', () => this.session.browseNext(continuationPoint, false));
    }
    return references;
  }

  async read(nodeIds: readonly string[]): Promise<DataValue[]> {
    const results = await this.call('read', () =>
      this.session.read(nodeIds.map((nodeId) => ({ nodeId, attributeId: AttributeIds.Value })))
    );
    return results.map(toDataValue);
  }

  applyIndexRange(value: unknown, indexRange: string): IndexRangeResult {
    return applyIndexRange(value, indexRange);
  }

  async write(items: readonly WriteItem[]): Promise<StatusCode[]> {
    const nodesToWrite: WriteValueOptions[] = [];
    for (const item of items) {
      nodesToWrite.push(await this.toWriteValue(item));
    }
    const results = await this.call('write', () => this.session.write(nodesToWrite));
    return results.map(toStatusCode);
  }

  async createSubscription(options: SubscriptionOptions): Promise<ISubscriptionContext> {
    const subscription = await this.call('createSubscription', () =>
      this.session.createSubscription2({
        requestedPublishingInterval: options.publishingInterval,
        requestedLifetimeCount: 100,
        requestedMaxKeepAliveCount: 10,
        maxNotificationsPerPublish: 100,
        publishingEnabled: true,
        priority: 10,
      })
    );
    return new NodeOpcuaSubscription(subscription, this.logger);
  }

  async removeSubscription(subscription: ISubscriptionContext): Promise<void> {
    if (subscription instanceof NodeOpcuaSubscription) {
      subscription.detach();
    }
  }

  private async toWriteValue(item: WriteItem): Promise<WriteValueOptions> {
    const dataType: DataType = await this.call('getBuiltInDataType', () =>
      this.session.getBuiltInDataType(resolveNodeId(item.nodeId))
    );
    return {
      nodeId: item.nodeId,
      attributeId: AttributeIds.Value,
      indexRange: item.indexRange === null ? undefined : new NumericRange(item.indexRange),
      value: {
        value: {
          dataType,
          arrayType: Array.isArray(item.value) ? VariantArrayType.Array : VariantArrayType.Scalar,
          value: item.value,
        },
        sourceTimestamp: item.sourceTimestamp,
        statusCode: StatusCodes[severityName(item.statusCode)],
      },
    };
  }

  private async probe(): Promise<void> {
    if (this.probing || this.closed) return;
    this.probing = true;
    try {
      const [state] = await this.session.read([
        { nodeId: WellKnownNodes.ServerStatusState, attributeId: AttributeIds.Value },
      ]);
      const status = toStatusCode(state?.statusCode ?? null);
      this.emit({
        good: isGood(status),
        status: status.name,
        serverState: serverStateName(state?.value.value),
      });
    } catch (error) {
      this.emit({ good: false, status: describeError(error), serverState: null });
    } finally {
      this.probing = false;
    }
  }

  private emit(event: Omit<KeepAliveEvent, 'timestamp'>): void {
    this.handler?.({ ...event, timestamp: new Date() });
  }

  private stop(): void {
    this.handler = null;
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new ProtocolFault(`${operation} failed: ${describeError(error)}`, 'BadCommunicationError', {
        cause: error,
      });
    }
  }
}
