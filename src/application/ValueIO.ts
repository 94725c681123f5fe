import { GOOD, isBad, type DataValue, type StatusCode } from '../domain/entities/DataValue.js';
import type { NodeReference } from '../domain/entities/NodeReference.js';
import { describeError } from '../domain/errors.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ISession, WriteItem } from '../domain/ports/ISession.js';
import { usableSession, type SessionContext } from './SessionContext.js';

export interface WriteOptions {
  /** Index range restricting which elements of an array value are written */
  indexRange?: string;
}

/**
 * Reads and writes point values, independently of any subscription.
 * Failures are logged and reported as `null` / `false`, never thrown.
 */
export class ValueIO {
  constructor(
    private readonly context: SessionContext,
    private readonly logger: ILogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async readNode(reference: NodeReference): Promise<DataValue | null> {
    const values = await this.readNodes([reference]);
    return values?.[0] ?? null;
  }

  async readNodes(references: readonly NodeReference[]): Promise<DataValue[] | null> {
    const session = usableSession(this.context);
    if (session === null) {
      this.logger.debug('Read skipped, no usable session', { endpoint: this.context.endpoint });
      return null;
    }

    try {
      return await session.read(references.map((reference) => reference.nodeId));
    } catch (error) {
      this.logger.error('Unable to read nodes', error, {
        endpoint: this.context.endpoint,
        count: references.length,
      });
      return null;
    }
  }

  async writeNode(reference: NodeReference, value: unknown, options: WriteOptions = {}): Promise<boolean> {
    return this.writeNodes([reference], value, options);
  }

  /**
   * Writes the same value to every reference. True only if every item status
   * is non-bad; a false result does not tell whether some items were written.
   */
  async writeNodes(
    references: readonly NodeReference[],
    value: unknown,
    options: WriteOptions = {}
  ): Promise<boolean> {
    const session = usableSession(this.context);
    if (session === null) {
      this.logger.debug('Write skipped, no usable session', { endpoint: this.context.endpoint });
      return false;
    }

    const items = references.map((reference) => this.makeWriteItem(session, reference, value, options));

    let results: StatusCode[];
    try {
      results = await session.write(items);
    } catch (error) {
      this.logger.error('Unable to write to nodes', error, {
        endpoint: this.context.endpoint,
        reason: describeError(error),
      });
      return false;
    }

    const bad = results.filter(isBad);
    if (bad.length > 0) {
      this.logger.warn('Write rejected by endpoint', {
        endpoint: this.context.endpoint,
        statuses: bad.map((status) => status.name),
      });
      return false;
    }
    return true;
  }

  private makeWriteItem(
    session: ISession,
    reference: NodeReference,
    value: unknown,
    options: WriteOptions
  ): WriteItem {
    const item: WriteItem = {
      nodeId: reference.nodeId,
      value,
      indexRange: null,
      sourceTimestamp: this.now(),
      statusCode: GOOD,
    };
    if (options.indexRange === undefined) return item;

    // A range that cannot be used is not sent; the value goes out whole.
    const applied = session.applyIndexRange(value, options.indexRange);
    if (!applied.ok) {
      this.logger.debug('Index range not applied', {
        nodeId: reference.nodeId,
        indexRange: options.indexRange,
        reason: applied.reason,
      });
      return item;
    }
    return { ...item, value: applied.value, indexRange: options.indexRange };
  }
}
