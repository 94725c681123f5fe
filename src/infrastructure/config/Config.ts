import dotenv from 'dotenv';
import {
  DEFAULT_CONTROLLER_CONFIG,
  type ControllerConfig,
} from '../../application/ConnectionController.js';
import { LOG_LEVELS, type LogLevel } from '../../domain/ports/ILogger.js';

export type SecurityModeName = 'None' | 'Sign' | 'SignAndEncrypt';

export const SECURITY_MODES: readonly SecurityModeName[] = ['None', 'Sign', 'SignAndEncrypt'];

export interface AppConfig {
  opcua: ControllerConfig & {
    applicationName: string;
    securityMode: SecurityModeName;
    /** Security policy name, such as `None` or `Basic256Sha256` */
    securityPolicy: string;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

type Env = Record<string, string | undefined>;

function getEnvOrThrow(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isSecurityMode(value: string): value is SecurityModeName {
  return SECURITY_MODES.some((mode) => mode === value);
}

function getLogLevel(env: Env): LogLevel {
  const value = getEnvOrDefault(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(value)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return value;
}

function getSecurityMode(env: Env): SecurityModeName {
  const value = getEnvOrDefault(env, 'OPCUA_SECURITY_MODE', 'None');
  if (!isSecurityMode(value)) {
    throw new Error(`OPCUA_SECURITY_MODE must be one of ${SECURITY_MODES.join(', ')}, got "${value}"`);
  }
  return value;
}

/**
 * Reads a `.env` file from the working directory into `process.env`, leaving
 * variables that are already set untouched.
 */
export function loadEnvFile(): void {
  dotenv.config();
}

/**
 * Load configuration from the environment
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const defaults = DEFAULT_CONTROLLER_CONFIG;

  return {
    opcua: {
      endpoint: getEnvOrThrow(env, 'OPCUA_ENDPOINT'),
      maxRetries: getEnvNumber(env, 'OPCUA_MAX_RETRIES', defaults.maxRetries),
      sessionTimeout: getEnvNumber(env, 'OPCUA_SESSION_TIMEOUT', defaults.sessionTimeout),
      keepAliveInterval: getEnvNumber(env, 'OPCUA_KEEP_ALIVE_INTERVAL', defaults.keepAliveInterval),
      publishingInterval: getEnvNumber(env, 'OPCUA_PUBLISHING_INTERVAL', defaults.publishingInterval),
      operationTimeout: getEnvNumber(env, 'OPCUA_OPERATION_TIMEOUT', defaults.operationTimeout),
      retryDelay: getEnvNumber(env, 'OPCUA_RETRY_DELAY', defaults.retryDelay),
      maxRetryDelay: getEnvNumber(env, 'OPCUA_MAX_RETRY_DELAY', defaults.maxRetryDelay),
      livenessQueueCapacity: getEnvNumber(env, 'OPCUA_LIVENESS_QUEUE', defaults.livenessQueueCapacity),
      applicationName: getEnvOrDefault(env, 'OPCUA_APPLICATION_NAME', 'opcua-link'),
      securityMode: getSecurityMode(env),
      securityPolicy: getEnvOrDefault(env, 'OPCUA_SECURITY_POLICY', 'None'),
    },
    logging: {
      level: getLogLevel(env),
      pretty: env.LOG_PRETTY !== undefined ? env.LOG_PRETTY === 'true' : env.NODE_ENV !== 'production',
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  const { opcua } = config;

  if (!opcua.endpoint.startsWith('opc.tcp://')) {
    throw new Error('OPCUA_ENDPOINT must start with opc.tcp://');
  }

  const positive: Array<[string, number]> = [
    ['OPCUA_SESSION_TIMEOUT', opcua.sessionTimeout],
    ['OPCUA_KEEP_ALIVE_INTERVAL', opcua.keepAliveInterval],
    ['OPCUA_OPERATION_TIMEOUT', opcua.operationTimeout],
    ['OPCUA_LIVENESS_QUEUE', opcua.livenessQueueCapacity],
  ];
  for (const [key, value] of positive) {
    if (value <= 0) {
      throw new Error(`${key} must be greater than 0`);
    }
  }

  if (opcua.publishingInterval < 0) {
    throw new Error('OPCUA_PUBLISHING_INTERVAL must not be negative');
  }

  if (opcua.retryDelay < 0 || opcua.maxRetryDelay < opcua.retryDelay) {
    throw new Error('OPCUA_RETRY_DELAY must be between 0 and OPCUA_MAX_RETRY_DELAY');
  }

  if (opcua.securityMode === 'None' && opcua.securityPolicy !== 'None') {
    throw new Error('OPCUA_SECURITY_POLICY requires OPCUA_SECURITY_MODE Sign or SignAndEncrypt');
  }
}
