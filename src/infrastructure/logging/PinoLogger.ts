import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

/** Published values sit between debug (20) and info (30) */
export const MESSAGE_LEVEL_VALUE = 25;

type OpcLogger = pino.Logger<'message'>;

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** Where entries are written; ignored when `pretty` is set */
  destination?: pino.DestinationStream;
}

export function toPinoLevel(level: LogLevel): string {
  switch (level) {
    case 'all':
      return 'trace';
    case 'none':
      return 'silent';
    default:
      return level;
  }
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: OpcLogger;

  constructor(options: PinoLoggerOptions = {}, base?: OpcLogger) {
    this.logger = base ?? PinoLogger.create(options);
  }

  private static create(options: PinoLoggerOptions): OpcLogger {
    const settings: pino.LoggerOptions<'message'> = {
      name: options.name ?? 'opcua-link',
      level: toPinoLevel(options.level ?? 'info'),
      customLevels: { message: MESSAGE_LEVEL_VALUE },
    };

    if (options.pretty) {
      return pino<'message'>({
        ...settings,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            customLevels: `message:${MESSAGE_LEVEL_VALUE}`,
          },
        },
      });
    }

    return options.destination
      ? pino<'message'>(settings, options.destination)
      : pino<'message'>(settings);
  }

  get level(): string {
    return this.logger.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.debug(data, message);
    } else {
      this.logger.debug(message);
    }
  }

  message(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.message(data, message);
    } else {
      this.logger.message(message);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.info(data, message);
    } else {
      this.logger.info(message);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger.warn(data, message);
    } else {
      this.logger.warn(message);
    }
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.error(PinoLogger.withError(error, data), message);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.fatal(PinoLogger.withError(error, data), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger({}, this.logger.child(bindings));
  }

  private static withError(error: unknown, data?: Record<string, unknown>): Record<string, unknown> {
    if (error instanceof Error) return { err: error, ...data };
    if (error === undefined) return { ...data };
    return { error, ...data };
  }
}
