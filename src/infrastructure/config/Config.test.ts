import { describe, it, expect } from "vitest";
import { loadConfig, validateConfig } from "./Config.js";

const ENV = { OPCUA_ENDPOINT: "opc.tcp://localhost:4840" };

describe("loadConfig", () => {
  it("should apply the defaults", () => {
    const config = loadConfig({ ...ENV, NODE_ENV: "production" });

    expect(config).toEqual({
      opcua: {
        endpoint: "opc.tcp://localhost:4840",
        maxRetries: 10,
        sessionTimeout: 60000,
        keepAliveInterval: 5000,
        publishingInterval: 1000,
        operationTimeout: 15000,
        retryDelay: 0,
        maxRetryDelay: 30000,
        livenessQueueCapacity: 4,
        applicationName: "opcua-link",
        securityMode: "None",
        securityPolicy: "None",
      },
      logging: { level: "info", pretty: false },
    });
  });

  it("should read every variable", () => {
    const config = loadConfig({
      ...ENV,
      OPCUA_MAX_RETRIES: "3",
      OPCUA_SESSION_TIMEOUT: "30000",
      OPCUA_KEEP_ALIVE_INTERVAL: "2000",
      OPCUA_PUBLISHING_INTERVAL: "250",
      OPCUA_OPERATION_TIMEOUT: "5000",
      OPCUA_RETRY_DELAY: "500",
      OPCUA_MAX_RETRY_DELAY: "8000",
      OPCUA_LIVENESS_QUEUE: "2",
      OPCUA_APPLICATION_NAME: "line-3",
      OPCUA_SECURITY_MODE: "SignAndEncrypt",
      OPCUA_SECURITY_POLICY: "Basic256Sha256",
      LOG_LEVEL: "DEBUG",
      LOG_PRETTY: "true",
    });

    expect(config.opcua).toMatchObject({
      maxRetries: 3,
      sessionTimeout: 30000,
      keepAliveInterval: 2000,
      publishingInterval: 250,
      operationTimeout: 5000,
      retryDelay: 500,
      maxRetryDelay: 8000,
      livenessQueueCapacity: 2,
      applicationName: "line-3",
      securityMode: "SignAndEncrypt",
      securityPolicy: "Basic256Sha256",
    });
    expect(config.logging).toEqual({ level: "debug", pretty: true });
  });

  it("should fall back to defaults for numbers that do not parse", () => {
    expect(loadConfig({ ...ENV, OPCUA_MAX_RETRIES: "many" }).opcua.maxRetries).toBe(10);
  });

  it("should pretty print outside production unless told otherwise", () => {
    expect(loadConfig(ENV).logging.pretty).toBe(true);
    expect(loadConfig({ ...ENV, LOG_PRETTY: "false" }).logging.pretty).toBe(false);
  });

  it("should require the endpoint", () => {
    expect(() => loadConfig({})).toThrow("Missing required environment variable: OPCUA_ENDPOINT");
  });

  it("should reject unknown log levels and security modes", () => {
    expect(() => loadConfig({ ...ENV, LOG_LEVEL: "verbose" })).toThrow(
      'LOG_LEVEL must be one of all, none, debug, message, info, warn, error, fatal, got "verbose"'
    );
    expect(() => loadConfig({ ...ENV, OPCUA_SECURITY_MODE: "Encrypt" })).toThrow(
      'OPCUA_SECURITY_MODE must be one of None, Sign, SignAndEncrypt, got "Encrypt"'
    );
  });
});

describe("validateConfig", () => {
  it("should accept the defaults", () => {
    expect(() => validateConfig(loadConfig(ENV))).not.toThrow();
  });

  it("should require an opc.tcp endpoint", () => {
    expect(() => validateConfig(loadConfig({ OPCUA_ENDPOINT: "http://localhost:4840" }))).toThrow(
      "OPCUA_ENDPOINT must start with opc.tcp://"
    );
  });

  it("should require positive timeouts", () => {
    expect(() => validateConfig(loadConfig({ ...ENV, OPCUA_SESSION_TIMEOUT: "-5" }))).toThrow(
      "OPCUA_SESSION_TIMEOUT must be greater than 0"
    );
    expect(() => validateConfig(loadConfig({ ...ENV, OPCUA_LIVENESS_QUEUE: "-1" }))).toThrow(
      "OPCUA_LIVENESS_QUEUE must be greater than 0"
    );
  });

  it("should reject a retry delay above its maximum", () => {
    expect(() =>
      validateConfig(loadConfig({ ...ENV, OPCUA_RETRY_DELAY: "5000", OPCUA_MAX_RETRY_DELAY: "1000" }))
    ).toThrow("OPCUA_RETRY_DELAY must be between 0 and OPCUA_MAX_RETRY_DELAY");
  });

  it("should reject a security policy without message security", () => {
    expect(() => validateConfig(loadConfig({ ...ENV, OPCUA_SECURITY_POLICY: "Basic256Sha256" }))).toThrow(
      "OPCUA_SECURITY_POLICY requires OPCUA_SECURITY_MODE Sign or SignAndEncrypt"
    );
  });
});
