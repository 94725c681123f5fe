import type { DataValue } from '../domain/entities/DataValue.js';
import {
  SERVER_STATUS_DISPLAY_NAME,
  WellKnownNodes,
  type NodeClass,
  type NodeReference,
} from '../domain/entities/NodeReference.js';
import { describeError, faultStatus } from '../domain/errors.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type {
  ISession,
  ISessionFactory,
  KeepAliveEvent,
  KeepAliveHandler,
  MonitoredItem,
  MonitoredItemInfo,
  NotificationHandler,
} from '../domain/ports/ISession.js';
import { AddressSpaceWalker, type BrowseNodeOptions } from './AddressSpaceWalker.js';
import { BoundedChannel } from './BoundedChannel.js';
import { ReferenceStore, type ReferenceEntry } from './ReferenceStore.js';
import { SerialExecutor } from './SerialExecutor.js';
import type { SessionContext } from './SessionContext.js';
import { SubscriptionManager } from './SubscriptionManager.js';
import { ValueIO, type WriteOptions } from './ValueIO.js';

export interface ControllerConfig {
  endpoint: string;
  /** Failed connect attempts before giving up; negative retries forever */
  maxRetries: number;
  sessionTimeout: number;
  keepAliveInterval: number;
  publishingInterval: number;
  operationTimeout: number;
  /** Delay before the first retry, doubled on each further one; 0 retries at once */
  retryDelay: number;
  maxRetryDelay: number;
  /** Bad liveness signals that may wait for recovery at the same time */
  livenessQueueCapacity: number;
}

export const DEFAULT_CONTROLLER_CONFIG: Omit<ControllerConfig, 'endpoint'> = {
  maxRetries: 10,
  sessionTimeout: 60000,
  keepAliveInterval: 5000,
  publishingInterval: 1000,
  operationTimeout: 15000,
  retryDelay: 0,
  maxRetryDelay: 30000,
  livenessQueueCapacity: 4,
};

export interface ConnectOptions {
  /** Replaces the default recovery handler */
  keepAliveHandler?: KeepAliveHandler;
  sessionTimeout?: number;
  keepAliveInterval?: number;
}

export interface SubscribeOptions {
  handler?: NotificationHandler;
  /** Only references of this class are subscribed; `Unspecified` allows all */
  allowedClass?: NodeClass;
  /** Used only when this call creates the subscription context */
  publishingInterval?: number;
}

export type ConnectionState = 'Disconnected' | 'Connected-NoSubscription' | 'Connected-Subscribed';

export interface ControllerDependencies {
  sessionFactory: ISessionFactory;
  logger: ILogger;
  /** Default handler for subscriptions made without one */
  notificationHandler?: NotificationHandler;
  sleep?: (ms: number) => Promise<void>;
}

interface LivenessSignal {
  session: ISession;
  event: KeepAliveEvent;
}

/**
 * Mutable connection state shared with the components. Only the controller
 * writes to it.
 */
class ControllerState implements SessionContext {
  session: ISession | null = null;
  operating = true;
  retries = 0;

  constructor(
    public endpoint: string,
    private readonly connector: () => Promise<boolean>
  ) {}

  connect(): Promise<boolean> {
    return this.connector();
  }
}

const sleepFor = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Connection lifecycle of one endpoint: connect with bounded retries,
 * liveness handling, reconnect, and replay of every subscription against the
 * freshly created session.
 *
 * Every public operation runs on a serial executor, and bad liveness signals
 * are queued into a bounded channel drained by the same executor, so the
 * session is never used by two operations at once.
 */
export class ConnectionController {
  private readonly config: ControllerConfig;
  private readonly logger: ILogger;
  private readonly sessionFactory: ISessionFactory;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly state: ControllerState;
  private readonly serial = new SerialExecutor();
  private readonly liveness: BoundedChannel<LivenessSignal>;
  private readonly references = new ReferenceStore();
  private readonly subscriptions: SubscriptionManager;
  private readonly walker: AddressSpaceWalker;
  private readonly values: ValueIO;
  private readonly defaultNotificationHandler: NotificationHandler;

  private connectOptions: Required<Omit<ConnectOptions, 'keepAliveHandler'>> & {
    keepAliveHandler: KeepAliveHandler | null;
  };
  private serverStatusHandler: NotificationHandler | null = null;
  private serverStatusItem: MonitoredItem | null = null;
  /** Sessions with a bad liveness signal queued or being recovered */
  private readonly pendingRecovery = new Set<ISession>();

  constructor(
    config: Pick<ControllerConfig, 'endpoint'> & Partial<ControllerConfig>,
    dependencies: ControllerDependencies
  ) {
    this.config = { ...DEFAULT_CONTROLLER_CONFIG, ...config };
    this.logger = dependencies.logger.child({ component: 'ConnectionController' });
    this.sessionFactory = dependencies.sessionFactory;
    this.sleep = dependencies.sleep ?? sleepFor;
    this.state = new ControllerState(this.config.endpoint, () => this.openSession());
    this.subscriptions = new SubscriptionManager(
      this.state,
      dependencies.logger.child({ component: 'SubscriptionManager' }),
      this.config.publishingInterval
    );
    this.walker = new AddressSpaceWalker(
      this.state,
      dependencies.logger.child({ component: 'AddressSpaceWalker' })
    );
    this.values = new ValueIO(this.state, dependencies.logger.child({ component: 'ValueIO' }));
    this.defaultNotificationHandler =
      dependencies.notificationHandler ?? ((item, value) => this.logNotification(item, value));
    this.connectOptions = {
      keepAliveHandler: null,
      sessionTimeout: this.config.sessionTimeout,
      keepAliveInterval: this.config.keepAliveInterval,
    };
    this.liveness = new BoundedChannel<LivenessSignal>({
      capacity: this.config.livenessQueueCapacity,
      consume: (signal) =>
        this.serial.run(async () => {
          try {
            await this.recover(signal);
          } finally {
            this.pendingRecovery.delete(signal.session);
          }
        }),
      onDrop: (signal) => {
        this.pendingRecovery.delete(signal.session);
        this.logger.warn('Liveness queue full, dropping signal', {
          endpoint: this.state.endpoint,
          status: signal.event.status,
        });
      },
      onError: (error) => {
        this.logger.error('Liveness recovery failed', error, { endpoint: this.state.endpoint });
      },
    });

    this.logger.info('Initialized client', { endpoint: this.state.endpoint });
  }

  get endpoint(): string {
    return this.state.endpoint;
  }

  get isOperating(): boolean {
    return this.state.operating;
  }

  get retryCount(): number {
    return this.state.retries;
  }

  get connectionState(): ConnectionState {
    if (this.state.session === null) return 'Disconnected';
    return this.subscriptions.active === null ? 'Connected-NoSubscription' : 'Connected-Subscribed';
  }

  get publishingInterval(): number {
    return this.subscriptions.publishingInterval;
  }

  /**
   * Opens a session on the endpoint. The options are remembered and reused
   * by every automatic reconnect.
   */
  connect(options: ConnectOptions = {}): Promise<boolean> {
    return this.serial.run(() => {
      this.connectOptions = {
        keepAliveHandler: options.keepAliveHandler ?? null,
        sessionTimeout: options.sessionTimeout ?? this.config.sessionTimeout,
        keepAliveInterval: options.keepAliveInterval ?? this.config.keepAliveInterval,
      };
      return this.openSession();
    });
  }

  /** Closes the session and its subscription; subscribed references are kept */
  disconnect(): Promise<void> {
    return this.serial.run(() => this.release());
  }

  /**
   * Points the controller at another endpoint, forgetting every subscribed
   * reference.
   */
  resetEndpoint(endpoint: string): Promise<void> {
    return this.serial.run(async () => {
      const previous = this.state.endpoint;
      this.state.operating = true;
      this.state.retries = 0;
      this.state.endpoint = endpoint;
      this.references.clear();
      this.serverStatusHandler = null;
      await this.release();
      this.logger.info('Reset endpoint', { from: previous, to: endpoint });
    });
  }

  /**
   * Starts over with a new session and subscribes again to every stored
   * reference still present on the endpoint.
   */
  reconnect(): Promise<boolean> {
    return this.serial.run(async () => {
      await this.release();
      this.state.retries = 0;
      this.state.operating = true;
      return this.resubscribe();
    });
  }

  async subscribe(reference: NodeReference, options: SubscribeOptions = {}): Promise<boolean> {
    return (await this.subscribeMany([reference], options)) === 1;
  }

  /**
   * Subscribes to every reference of the allowed class. Returns how many were
   * subscribed.
   */
  subscribeMany(references: readonly NodeReference[], options: SubscribeOptions = {}): Promise<number> {
    return this.serial.run(async () => {
      if (options.publishingInterval !== undefined) {
        this.subscriptions.setPublishingInterval(options.publishingInterval);
      }
      if (!(await this.subscriptions.ensureReady())) return 0;

      const allowedClass = options.allowedClass ?? 'Unspecified';
      const handler = options.handler ?? this.defaultNotificationHandler;
      let count = 0;
      for (const reference of references) {
        if (allowedClass !== 'Unspecified' && reference.nodeClass !== allowedClass) continue;
        this.track(reference, handler);
        count++;
        this.logger.info('Started subscribing', {
          endpoint: this.state.endpoint,
          displayName: reference.displayName,
        });
      }

      if (count > 0) await this.subscriptions.applyChanges();
      return count;
    });
  }

  /**
   * Stops the subscription to a reference and forgets it. Returns whether the
   * reference was stored.
   */
  unsubscribe(reference: Pick<NodeReference, 'displayName' | 'nodeId'>): Promise<boolean> {
    return this.serial.run(async () => {
      if (this.subscriptions.removeMonitoredItem(reference)) {
        await this.subscriptions.applyChanges();
      }
      const removed = this.references.delete(reference);
      if (removed) {
        this.logger.info('Cancelled subscription', {
          endpoint: this.state.endpoint,
          displayName: reference.displayName,
        });
      }
      return removed;
    });
  }

  /**
   * Enables or disables monitoring of the server's current time. While
   * enabled, the monitor is re-armed after every reconnect.
   */
  monitorServerStatus(
    enable = true,
    handler?: NotificationHandler,
    publishingInterval?: number
  ): Promise<boolean> {
    return this.serial.run(async () => {
      if (publishingInterval !== undefined) {
        this.subscriptions.setPublishingInterval(publishingInterval);
      }
      return this.applyServerStatusMonitor(enable, handler);
    });
  }

  setPublishingInterval(interval: number): void {
    this.subscriptions.setPublishingInterval(interval);
  }

  browseNode(options: BrowseNodeOptions = {}): Promise<NodeReference[]> {
    return this.serial.run(() => this.walker.browseNode(options));
  }

  recursiveBrowse(seed: readonly NodeReference[]): Promise<NodeReference[]> {
    return this.serial.run(() => this.walker.recursiveBrowse(seed));
  }

  browseObjectsNode(): Promise<NodeReference[]> {
    return this.serial.run(() => this.walker.browseObjectsNode());
  }

  browseServerNode(): Promise<NodeReference[]> {
    return this.serial.run(() => this.walker.browseServerNode());
  }

  readNode(reference: NodeReference): Promise<DataValue | null> {
    return this.serial.run(() => this.values.readNode(reference));
  }

  readNodes(references: readonly NodeReference[]): Promise<DataValue[] | null> {
    return this.serial.run(() => this.values.readNodes(references));
  }

  writeNode(reference: NodeReference, value: unknown, options?: WriteOptions): Promise<boolean> {
    return this.serial.run(() => this.values.writeNode(reference, value, options));
  }

  writeNodes(references: readonly NodeReference[], value: unknown, options?: WriteOptions): Promise<boolean> {
    return this.serial.run(() => this.values.writeNodes(references, value, options));
  }

  getReference(displayName: string, nodeId: string): NodeReference | undefined {
    return this.references.find(displayName, nodeId)?.reference;
  }

  getReferences(): ReferenceEntry[] {
    return this.references.snapshot();
  }

  clearReferences(): void {
    this.references.clear();
    this.logger.info('Cleared references', { endpoint: this.state.endpoint });
  }

  getMonitoredItems(): readonly MonitoredItem[] {
    return this.subscriptions.monitoredItems();
  }

  /** Resolves once queued liveness work and foreground operations have finished */
  async idle(): Promise<void> {
    do {
      await this.liveness.idle();
      await this.serial.idle();
    } while (this.liveness.size > 0 || this.serial.size > 0);
  }

  private async openSession(): Promise<boolean> {
    if (this.state.session !== null) {
      await this.release();
    }

    const { keepAliveHandler, sessionTimeout, keepAliveInterval } = this.connectOptions;

    for (;;) {
      try {
        const endpoint = await this.sessionFactory.selectEndpoint(
          this.state.endpoint,
          this.config.operationTimeout
        );
        const session = await this.sessionFactory.openSession(endpoint, {
          sessionTimeout,
          keepAliveInterval,
        });
        session.onKeepAlive(keepAliveHandler ?? ((event) => this.onKeepAlive(session, event)));

        this.state.session = session;
        this.state.retries = 0;
        this.state.operating = true;
        this.logger.info('Connected client', { endpoint: this.state.endpoint });
        return true;
      } catch (error) {
        this.state.retries += 1;
        this.logger.error('Failed to connect client', error, {
          endpoint: this.state.endpoint,
          retries: this.state.retries,
        });

        if (this.config.maxRetries >= 0 && this.state.retries >= this.config.maxRetries) {
          await this.release();
          this.state.operating = false;
          this.logger.fatal('Client is no longer operating', undefined, {
            endpoint: this.state.endpoint,
            retries: this.state.retries,
          });
          return false;
        }

        this.state.operating = false;
        await this.backoff(this.state.retries);
      }
    }
  }

  private async backoff(attempt: number): Promise<void> {
    if (this.config.retryDelay <= 0) return;
    const delay = Math.min(this.config.retryDelay * 2 ** (attempt - 1), this.config.maxRetryDelay);
    this.logger.debug('Waiting before next connect attempt', { delay, attempt });
    await this.sleep(delay);
  }

  /**
   * Releases the subscription and closes the session. Never throws; the
   * session is closed even when the subscription cannot be released, and both
   * handles are cleared either way.
   */
  private async release(): Promise<void> {
    const session = this.state.session;
    this.serverStatusItem = null;
    if (session === null) {
      this.subscriptions.forget();
      return;
    }
    this.state.session = null;

    try {
      await this.subscriptions.release(session);
    } catch (error) {
      this.logger.warn('Unable to release subscription', {
        endpoint: this.state.endpoint,
        error: describeError(error),
        status: faultStatus(error),
      });
    }

    try {
      await session.close();
    } catch (error) {
      this.logger.warn('Error while disconnecting client', {
        endpoint: this.state.endpoint,
        error: describeError(error),
      });
    }

    this.logger.info('Disconnected client', { endpoint: this.state.endpoint });
  }

  private async resubscribe(): Promise<boolean> {
    if (!(await this.openSession())) return false;
    if (!(await this.subscriptions.ensureReady())) return false;

    const live = new Set(AddressSpaceWalker.displayNames(await this.walker.browseObjectsNode()));

    for (const { reference, handler } of this.references.snapshot()) {
      if (live.has(reference.displayName)) {
        this.track(reference, handler);
        await this.subscriptions.applyChanges();
        this.logger.info('Resubscribing', {
          endpoint: this.state.endpoint,
          displayName: reference.displayName,
        });
      } else {
        this.references.delete(reference);
        this.logger.warn('Node no longer exists on endpoint, removing reference', {
          endpoint: this.state.endpoint,
          displayName: reference.displayName,
        });
      }
    }

    if (this.serverStatusHandler !== null) {
      await this.applyServerStatusMonitor(true);
    }
    return true;
  }

  /**
   * Stores the reference and stages its monitored item. A stored entry for the
   * same target is cancelled first.
   */
  private track(reference: NodeReference, handler: NotificationHandler): void {
    const previous = this.references.find(reference.displayName, reference.nodeId);
    if (previous) {
      this.subscriptions.removeMonitoredItem(previous.reference);
    }
    this.references.put(reference, handler);
    this.subscriptions.addMonitoredItem(reference, handler);
  }

  private async applyServerStatusMonitor(enable: boolean, handler?: NotificationHandler): Promise<boolean> {
    if (!(await this.subscriptions.ensureReady())) return false;

    if (!enable) {
      if (this.serverStatusHandler !== null) {
        if (this.serverStatusItem !== null) {
          this.subscriptions.removeItem(this.serverStatusItem);
          await this.subscriptions.applyChanges();
        }
        this.serverStatusItem = null;
        this.serverStatusHandler = null;
        this.logger.info('Stopped monitoring server status', { endpoint: this.state.endpoint });
      }
      return true;
    }

    if (this.serverStatusHandler !== null && handler === undefined && this.serverStatusItem !== null) {
      this.serverStatusItem = this.subscriptions.readdItem(this.serverStatusItem);
    } else {
      if (this.serverStatusItem !== null) {
        this.subscriptions.removeItem(this.serverStatusItem);
      }
      this.serverStatusHandler = handler ?? this.serverStatusHandler ?? this.defaultNotificationHandler;
      this.serverStatusItem = this.subscriptions.addMonitoredItem(
        {
          displayName: SERVER_STATUS_DISPLAY_NAME,
          nodeClass: 'Variable',
          nodeId: WellKnownNodes.ServerStatusCurrentTime,
          typeDefinition: '',
        },
        this.serverStatusHandler
      );
    }

    await this.subscriptions.applyChanges();
    this.logger.info('Started monitoring server status', { endpoint: this.state.endpoint });
    return true;
  }

  private onKeepAlive(session: ISession, event: KeepAliveEvent): void {
    if (event.good) {
      this.logger.debug('Keep-alive', { endpoint: this.state.endpoint, serverState: event.serverState });
      return;
    }
    if (this.pendingRecovery.has(session)) {
      this.logger.debug('Recovery already pending, dropping signal', { status: event.status });
      return;
    }
    this.pendingRecovery.add(session);
    this.liveness.offer({ session, event });
  }

  private async recover({ session, event }: LivenessSignal): Promise<void> {
    if (session !== this.state.session) {
      this.logger.debug('Ignoring liveness signal of a closed session', { status: event.status });
      return;
    }

    this.logger.error('Connection is bad, trying to reconnect', undefined, {
      endpoint: this.state.endpoint,
      status: event.status,
    });

    try {
      await session.reconnect();
      this.logger.info('Session reconnected', { endpoint: this.state.endpoint });
      return;
    } catch (error) {
      this.logger.warn('Session could not be reactivated, resubscribing', {
        endpoint: this.state.endpoint,
        error: describeError(error),
        status: faultStatus(error),
      });
    }

    await this.release();
    if (!(await this.resubscribe())) {
      await this.release();
      this.state.operating = false;
      this.logger.fatal('Unable to re-establish a connection, client no longer operating', undefined, {
        endpoint: this.state.endpoint,
      });
    }
  }

  private logNotification(item: MonitoredItemInfo, value: DataValue): void {
    this.logger.message(item.displayName, {
      value: value.value,
      sourceTimestamp: value.sourceTimestamp?.toISOString() ?? null,
      statusCode: value.statusCode.name,
    });
  }
}
