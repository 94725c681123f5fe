// Entities
export * from "./entities/DataValue.js";
export * from "./entities/NodeReference.js";

// Errors
export * from "./errors.js";

// Ports
export type {
  BrowseRequest,
  EndpointDescriptor,
  ISession,
  ISessionFactory,
  IndexRangeResult,
  ISubscriptionContext,
  KeepAliveEvent,
  KeepAliveHandler,
  MonitoredItem,
  MonitoredItemInfo,
  MonitoredItemRequest,
  NotificationHandler,
  SessionOpenOptions,
  SubscriptionOptions,
  WriteItem,
} from "./ports/ISession.js";
export * from "./ports/ILogger.js";
