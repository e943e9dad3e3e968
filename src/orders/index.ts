export { OrderStore } from "./order-store.js";
export type { StoreListener, OrderMutation } from "./order-store.js";
export {
  SavedOrderSchema,
  OrderStatusSchema,
  OrderInvariantError,
  checkOrderInvariants,
  assertOrderInvariants,
} from "./order-types.js";
export type { SavedOrder, OrderStatus, OrderRight, OrderSide, TimeInForce } from "./order-types.js";
export { OrderDesk } from "./order-desk.js";
export type {
  PlaceOrderRequest,
  BullCallSpreadRequest,
  OrderResult,
  OrderFilter,
  MonitoringStatus,
  OrderAnalysis,
  OrderDeskOptions,
} from "./order-desk.js";

import { getConfig } from "../config.js";
import { getMonitorService } from "../monitor/index.js";
import { OrderDesk } from "./order-desk.js";

let desk: OrderDesk | null = null;

/** Lazily initialise the order desk on top of the shared monitor service. */
export function getOrderDesk(): OrderDesk {
  if (!desk) {
    const { monitor, orderStore } = getMonitorService();
    desk = new OrderDesk(orderStore, monitor, { staleAfterMs: getConfig().heartbeatStaleMs });
  }
  return desk;
}
