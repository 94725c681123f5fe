export * from "./domain/index.js";
export * from "./application/index.js";
export { PinoLogger, type PinoLoggerOptions } from "./infrastructure/logging/PinoLogger.js";
export {
  loadConfig,
  loadEnvFile,
  validateConfig,
  type AppConfig,
  type SecurityModeName,
} from "./infrastructure/config/Config.js";
export {
  NodeOpcuaSessionFactory,
  type NodeOpcuaSessionFactoryOptions,
} from "./infrastructure/opcua/NodeOpcuaSessionFactory.js";
