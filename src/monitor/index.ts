export { OrderMonitor, DEFAULT_TICK_INTERVAL_MS } from "./order-monitor.js";
export type {
  OrderMonitorOptions,
  OrderOutcome,
  TickReport,
  HeartbeatListener,
  SleepFn,
} from "./order-monitor.js";
export { decide, crossesLimit, executionPrice } from "./order-decision.js";
export type {
  OrderDecision,
  ChainResult,
  DeferReason,
  CancelReason,
  Quotes,
} from "./order-decision.js";
export { HeartbeatStore, isHeartbeatStale, DEFAULT_STALE_AFTER_MS } from "./heartbeat-store.js";

import { getConfig } from "../config.js";
import { setLogLevel } from "../logger.js";
import { OrderStore } from "../orders/order-store.js";
import { CachedQuoteProvider } from "../quotes/cached-provider.js";
import { NullQuoteProvider } from "../quotes/null-provider.js";
import { HeartbeatStore } from "./heartbeat-store.js";
import { OrderMonitor } from "./order-monitor.js";

export interface MonitorService {
  monitor: OrderMonitor;
  orderStore: OrderStore;
  heartbeats: HeartbeatStore;
}

let service: MonitorService | null = null;

/**
 * Lazily initialise and return the process-wide monitor and the stores it
 * shares with callers. The monitor is created stopped and without a data
 * source; call `setQuoteProvider` and `start` once one is configured.
 */
export function getMonitorService(): MonitorService {
  if (!service) {
    const config = getConfig();
    setLogLevel(config.logLevel);
    const orderStore = new OrderStore(config.dataDir);
    const heartbeats = new HeartbeatStore(config.dataDir);
    const monitor = new OrderMonitor({
      store: orderStore,
      heartbeats,
      provider: new CachedQuoteProvider(new NullQuoteProvider()),
      intervalMs: config.monitorIntervalMs,
      timeZone: config.marketTimeZone,
    });
    service = { monitor, orderStore, heartbeats };
  }
  return service;
}
