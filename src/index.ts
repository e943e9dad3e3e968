export { loadConfig, getConfig, defaultDataDir, ConfigError, ConfigSchema, LOG_LEVELS } from "./config.js";
export type { Config, LogLevel } from "./config.js";
export { createLogger, setLogLevel } from "./logger.js";
export type { Logger } from "./logger.js";
export { StoreError } from "./storage/json-file-store.js";
export * from "./options/index.js";
export * from "./quotes/index.js";
export * from "./orders/index.js";
export * from "./monitor/index.js";
export * from "./strategies/index.js";
export { gatewayHandlers } from "./gateway/server-methods/index.js";
export type {
  GatewayRequestHandlers,
  GatewayRequestHandler,
  GatewayContext,
  GatewayError,
  RespondFn,
  BroadcastFn,
} from "./gateway/server-methods/index.js";
