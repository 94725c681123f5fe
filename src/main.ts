import { ConnectionController } from "./application/ConnectionController.js";
import { loadConfig, loadEnvFile, validateConfig } from "./infrastructure/config/Config.js";
import { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
import { NodeOpcuaSessionFactory } from "./infrastructure/opcua/NodeOpcuaSessionFactory.js";

/**
 * Connects to the configured endpoint, lists its object tree and follows the
 * server clock until the process is stopped.
 */
async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  validateConfig(config);

  const logger = new PinoLogger({
    name: config.opcua.applicationName,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  logger.info("opcua-link starting", {
    endpoint: config.opcua.endpoint,
    securityMode: config.opcua.securityMode,
    securityPolicy: config.opcua.securityPolicy,
  });

  const sessionFactory = new NodeOpcuaSessionFactory(
    {
      applicationName: config.opcua.applicationName,
      securityMode: config.opcua.securityMode,
      securityPolicy: config.opcua.securityPolicy,
    },
    logger
  );
  const controller = new ConnectionController(config.opcua, { sessionFactory, logger });

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await controller.disconnect();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.fatal("Shutdown failed", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    if (!(await controller.connect())) {
      logger.fatal("Unable to connect", undefined, { endpoint: controller.endpoint });
      process.exit(1);
    }

    const nodes = await controller.browseObjectsNode();
    for (const node of nodes) {
      logger.info(node.displayName, { nodeId: node.nodeId, nodeClass: node.nodeClass });
    }
    logger.info("Browsed object tree", { count: nodes.length });

    await controller.monitorServerStatus(true);
    logger.info("Press Ctrl+C to stop.");
  } catch (error) {
    logger.fatal("Failed to start", error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
