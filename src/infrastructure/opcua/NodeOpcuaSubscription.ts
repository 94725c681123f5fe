import {
  AttributeIds,
  TimestampsToReturn,
  type DataValue as UaDataValue,
  type MonitoringParametersOptions,
  type ReadValueIdOptions,
} from 'node-opcua-client';
import { describeError, ProtocolFault } from '../../domain/errors.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type {
  ISubscriptionContext,
  MonitoredItem,
  MonitoredItemRequest,
} from '../../domain/ports/ISession.js';
import { toDataValue } from './mappers.js';

const QUEUE_SIZE = 10;

/** The parts of a node-opcua ClientMonitoredItem this adapter uses */
export interface MonitoredItemHandle {
  on(event: 'changed', listener: (dataValue: UaDataValue) => void): unknown;
  removeAllListeners(event: 'changed'): unknown;
  terminate(): Promise<void>;
}

/** The parts of a node-opcua ClientSubscription this adapter uses */
export interface SubscriptionHandle {
  readonly publishingInterval: number;
  monitor(
    itemToMonitor: ReadValueIdOptions,
    parameters: MonitoringParametersOptions,
    timestampsToReturn: TimestampsToReturn
  ): Promise<MonitoredItemHandle>;
  terminate(): Promise<void>;
}

/**
 * Subscription context on top of a node-opcua ClientSubscription.
 * Additions and removals are kept locally until `applyChanges`.
 */
export class NodeOpcuaSubscription implements ISubscriptionContext {
  private readonly items: MonitoredItem[] = [];
  private readonly live = new Map<MonitoredItem, MonitoredItemHandle>();
  private pendingAdd: MonitoredItem[] = [];
  private pendingRemove: MonitoredItemHandle[] = [];
  private detached = false;

  constructor(
    private readonly subscription: SubscriptionHandle,
    private readonly logger: ILogger
  ) {}

  get publishingInterval(): number {
    return this.subscription.publishingInterval;
  }

  get monitoredItems(): readonly MonitoredItem[] {
    return [...this.items];
  }

  addItem(request: MonitoredItemRequest): MonitoredItem {
    const item: MonitoredItem = {
      displayName: request.displayName,
      nodeId: request.nodeId,
      handler: request.handler,
    };
    this.items.push(item);
    this.pendingAdd.push(item);
    return item;
  }

  removeItem(item: MonitoredItem): void {
    const index = this.items.indexOf(item);
    if (index < 0) return;
    this.items.splice(index, 1);

    const staged = this.pendingAdd.indexOf(item);
    if (staged >= 0) {
      this.pendingAdd.splice(staged, 1);
      return;
    }

    const monitored = this.live.get(item);
    if (monitored) {
      this.live.delete(item);
      monitored.removeAllListeners('changed');
      this.pendingRemove.push(monitored);
    }
  }

  async applyChanges(): Promise<void> {
    const removals = this.pendingRemove;
    const additions = this.pendingAdd;
    this.pendingRemove = [];
    this.pendingAdd = [];
    const failures: string[] = [];

    for (const monitored of removals) {
      try {
        await monitored.terminate();
      } catch (error) {
        failures.push(describeError(error));
      }
    }

    for (const item of additions) {
      try {
        this.live.set(item, await this.monitor(item));
      } catch (error) {
        failures.push(`${item.displayName}: ${describeError(error)}`);
      }
    }

    if (failures.length > 0) {
      throw new ProtocolFault(`${failures.length} monitored item change(s) failed: ${failures.join('; ')}`, 'Bad');
    }
  }

  /** Stops dispatching notifications; the remote subscription stays until `delete` */
  detach(): void {
    this.detached = true;
    for (const monitored of this.live.values()) {
      monitored.removeAllListeners('changed');
    }
  }

  async delete(): Promise<void> {
    this.detach();
    this.live.clear();
    this.items.length = 0;
    this.pendingAdd = [];
    this.pendingRemove = [];
    try {
      await this.subscription.terminate();
    } catch (error) {
      throw new ProtocolFault('Unable to delete subscription', 'Bad', { cause: error });
    }
  }

  private async monitor(item: MonitoredItem): Promise<MonitoredItemHandle> {
    const monitored = await this.subscription.monitor(
      { nodeId: item.nodeId, attributeId: AttributeIds.Value },
      { samplingInterval: this.publishingInterval, discardOldest: true, queueSize: QUEUE_SIZE },
      TimestampsToReturn.Both
    );

    monitored.on('changed', (dataValue: UaDataValue) => {
      if (this.detached || item.handler === null) return;
      try {
        item.handler(item, toDataValue(dataValue));
      } catch (error) {
        this.logger.error('Notification handler failed', error, {
          displayName: item.displayName,
          nodeId: item.nodeId,
        });
      }
    });
    return monitored;
  }
}
