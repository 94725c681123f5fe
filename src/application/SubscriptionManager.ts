import { isSameTarget, type NodeReference } from '../domain/entities/NodeReference.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type {
  ISession,
  ISubscriptionContext,
  MonitoredItem,
  NotificationHandler,
} from '../domain/ports/ISession.js';
import { usableSession, type SessionContext } from './SessionContext.js';

/**
 * Owns the single subscription context of a connection.
 *
 * The context is created lazily with the publishing interval current at that
 * moment. Changing the interval afterwards only affects the next context, so a
 * new interval needs a disconnect (or reconnect) to take effect.
 */
export class SubscriptionManager {
  private subscription: ISubscriptionContext | null = null;
  private interval: number;

  constructor(
    private readonly context: SessionContext,
    private readonly logger: ILogger,
    private readonly defaultPublishingInterval: number
  ) {
    this.interval = defaultPublishingInterval;
  }

  get active(): ISubscriptionContext | null {
    return this.subscription;
  }

  get publishingInterval(): number {
    return this.interval;
  }

  /** Negative values fall back to the configured default */
  setPublishingInterval(interval: number): void {
    this.interval = interval < 0 ? this.defaultPublishingInterval : interval;
  }

  /**
   * Makes sure a session and an active subscription context exist.
   * Connects first when no session exists yet.
   */
  async ensureReady(): Promise<boolean> {
    if (this.context.session === null && !(await this.context.connect())) {
      this.logger.info('Readiness check failed, no session', { endpoint: this.context.endpoint });
      return false;
    }

    const session = usableSession(this.context);
    if (session === null) {
      this.logger.info('Readiness check failed, session not usable', {
        endpoint: this.context.endpoint,
      });
      return false;
    }

    if (this.subscription !== null) {
      return true;
    }

    try {
      this.subscription = await session.createSubscription({
        publishingInterval: this.interval,
      });
    } catch (error) {
      this.logger.error('Failed to create subscription', error, {
        endpoint: this.context.endpoint,
        publishingInterval: this.interval,
      });
      return false;
    }

    this.logger.info('Subscription created', {
      endpoint: this.context.endpoint,
      publishingInterval: this.interval,
    });
    return true;
  }

  /**
   * Stages a monitored item for the reference. Returns null without an active
   * subscription context.
   */
  addMonitoredItem(reference: NodeReference, handler: NotificationHandler | null): MonitoredItem | null {
    if (this.subscription === null) return null;
    return this.subscription.addItem({
      displayName: reference.displayName,
      nodeId: reference.nodeId,
      handler,
    });
  }

  /**
   * Stages removal of the item monitoring the reference, matched by display
   * name and node id. Returns whether one was found.
   */
  removeMonitoredItem(reference: Pick<NodeReference, 'displayName' | 'nodeId'>): boolean {
    if (this.subscription === null) return false;
    const item = this.subscription.monitoredItems.find((candidate) => isSameTarget(candidate, reference));
    if (!item) return false;
    this.subscription.removeItem(item);
    return true;
  }

  removeItem(item: MonitoredItem): void {
    this.subscription?.removeItem(item);
  }

  readdItem(item: MonitoredItem): MonitoredItem | null {
    if (this.subscription === null) return null;
    this.subscription.removeItem(item);
    return this.subscription.addItem({
      displayName: item.displayName,
      nodeId: item.nodeId,
      handler: item.handler,
    });
  }

  /**
   * Pushes staged additions and removals. Failures are logged, never thrown.
   */
  async applyChanges(): Promise<void> {
    if (this.subscription === null) return;
    try {
      await this.subscription.applyChanges();
    } catch (error) {
      this.logger.error('Unable to update subscription', error, { endpoint: this.context.endpoint });
    }
  }

  monitoredItems(): readonly MonitoredItem[] {
    return this.subscription?.monitoredItems ?? [];
  }

  /**
   * Removes the context from the session (when it is still connected) and
   * forgets it. Errors propagate to the caller, the context is forgotten
   * either way.
   */
  async release(session: ISession): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription === null || !session.connected) return;

    await session.removeSubscription(subscription);
    await subscription.delete();
  }

  /** Drops the context without contacting the remote */
  forget(): void {
    this.subscription = null;
  }
}
