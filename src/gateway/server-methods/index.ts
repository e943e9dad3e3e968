import { monitorHandlers } from "./monitor.js";
import { ordersHandlers } from "./orders.js";
import { payoffHandlers } from "./payoff.js";
import { strategiesHandlers } from "./strategies.js";
import type { GatewayRequestHandlers } from "./types.js";

export { createMonitorHandlers, type MonitorHandlerDeps } from "./monitor.js";
export { createOrdersHandlers } from "./orders.js";
export { createStrategiesHandlers } from "./strategies.js";
export { payoffHandlers, monitorHandlers, ordersHandlers, strategiesHandlers };
export type {
  GatewayRequestHandlers,
  GatewayRequestHandler,
  GatewayRequest,
  GatewayContext,
  GatewayError,
  GatewayErrorCode,
  RespondFn,
  BroadcastFn,
} from "./types.js";

export const gatewayHandlers: GatewayRequestHandlers = {
  ...ordersHandlers,
  ...payoffHandlers,
  ...strategiesHandlers,
  ...monitorHandlers,
};
