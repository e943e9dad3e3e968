import crypto from "node:crypto";
import { createLogger } from "../logger.js";
import { formatOptionSymbol, type OptionLeg } from "../options/option-leg.js";
import type { MarketReferences } from "../options/options-chain.js";
import { formatMoney } from "../options/format.js";
import { metrics, type PayoffMetrics } from "../options/payoff-engine.js";
import {
  calcDaysToExpiry,
  isExpirationDate,
  isExpired,
  roundToCents,
} from "../options/options-pricing.js";
import { legFromOrder, scenarios, type ScenarioPair } from "../options/scenario-engine.js";
import { crossesLimit, executionPrice } from "../monitor/order-decision.js";
import { DEFAULT_STALE_AFTER_MS, isHeartbeatStale } from "../monitor/heartbeat-store.js";
import type { OrderMonitor } from "../monitor/order-monitor.js";
import { normalizeSymbol } from "../quotes/quote-provider.js";
import type { OrderStore } from "./order-store.js";
import type { OrderRight, OrderSide, OrderStatus, SavedOrder, TimeInForce } from "./order-types.js";

const log = createLogger("order-desk");

export interface PlaceOrderRequest {
  symbol: string;
  expiration: string; // YYYY-MM-DD
  right: OrderRight;
  strike: number;
  side: OrderSide;
  quantity: number;
  limit: number;
  tif?: TimeInForce;
  note?: string;
}

export interface BullCallSpreadRequest {
  symbol: string;
  expiration: string;
  lowerStrike: number;
  lowerLimit: number;
  upperStrike: number;
  upperLimit: number;
  quantity: number;
}

export interface OrderResult {
  success: boolean;
  message: string;
  order?: SavedOrder;
}

export interface OrderFilter {
  status?: OrderStatus;
  /** Only orders whose expiration is at most this many days away. */
  expiringWithinDays?: number;
}

export interface MonitoringStatus {
  lastHeartbeat?: string;
  stale: boolean;
  workingOrders: number;
}

export interface OrderAnalysis {
  order: SavedOrder;
  leg: OptionLeg;
  centerPrice: number;
  metrics: PayoffMetrics;
  scenarios: ScenarioPair;
  market: MarketReferences;
}

export interface OrderDeskOptions {
  clock?: () => Date;
  staleAfterMs?: number;
  generateId?: () => string;
}

/** A validated order not yet priced or saved. */
type NewOrder = SavedOrder & { expiration: string; limit: number };

type MarketSource = Pick<
  OrderMonitor,
  "fetchMarketReferences" | "fetchUnderlyingPrice" | "getLastHeartbeat"
>;

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * User-facing order actions: paper placement with an immediate fill check,
 * cancel, close, delete, and read-side helpers. Results carry a message
 * instead of throwing for anything the user can fix.
 */
export class OrderDesk {
  private readonly store: OrderStore;
  private readonly market: MarketSource;
  private readonly clock: () => Date;
  private readonly staleAfterMs: number;
  private readonly generateId: () => string;

  constructor(store: OrderStore, market: MarketSource, options: OrderDeskOptions = {}) {
    this.store = store;
    this.market = market;
    this.clock = options.clock ?? (() => new Date());
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  private validate(request: PlaceOrderRequest): string | undefined {
    if (!normalizeSymbol(request.symbol)) {
      return "Symbol is required.";
    }
    if (!isExpirationDate(request.expiration)) {
      return "Expiration must be a YYYY-MM-DD date.";
    }
    if (isExpired(request.expiration, this.clock())) {
      return "Expiration date has already passed.";
    }
    if (!Number.isFinite(request.strike) || request.strike < 0) {
      return "Strike must be zero or positive.";
    }
    if (!Number.isInteger(request.quantity) || request.quantity < 1) {
      return "Quantity must be a whole number of contracts, at least 1.";
    }
    if (!Number.isFinite(request.limit) || request.limit <= 0) {
      return "Limit price must be positive.";
    }
    return undefined;
  }

  private buildOrder(request: PlaceOrderRequest): NewOrder | string {
    const problem = this.validate(request);
    if (problem) {
      return problem;
    }
    return {
      id: this.generateId(),
      placedAt: this.clock().toISOString(),
      symbol: normalizeSymbol(request.symbol),
      expiration: request.expiration,
      right: request.right,
      strike: request.strike,
      side: request.side,
      quantity: request.quantity,
      limit: request.limit,
      tif: request.tif ?? "day",
      status: "working",
      ...(request.note ? { note: request.note } : {}),
    };
  }

  private fetchReferences(order: NewOrder): Promise<MarketReferences> {
    return this.market.fetchMarketReferences(
      order.symbol,
      order.expiration,
      order.right === "call",
      order.strike,
    );
  }

  /** Fill at once when the quotes cross, otherwise leave the order working. */
  private settle(order: NewOrder, refs: MarketReferences): OrderResult & { order: SavedOrder } {
    const { limit } = order;
    const label = formatOptionSymbol(order);
    if (crossesLimit(order.side, limit, refs)) {
      const price = roundToCents(executionPrice(order.side, limit, refs));
      const filled: SavedOrder = {
        ...order,
        status: "filled",
        fillPrice: price,
        fillQuantity: order.quantity,
      };
      return {
        success: true,
        message: `Filled ${order.quantity} ${label} @ ${formatMoney(price)}. Order ID: ${filled.id}`,
        order: filled,
      };
    }
    return {
      success: true,
      message: `Accepted. Working at ${formatMoney(limit)}. Order ID: ${order.id}`,
      order,
    };
  }

  /**
   * Validate, try an immediate paper fill against the current chain, and
   * persist the order as filled or working. If the chain cannot be fetched
   * the order is kept with status failed.
   */
  async placeOrder(request: PlaceOrderRequest): Promise<OrderResult> {
    const base = this.buildOrder(request);
    if (typeof base === "string") {
      return { success: false, message: base };
    }

    let refs: MarketReferences;
    try {
      refs = await this.fetchReferences(base);
    } catch (err) {
      const reason = describeError(err);
      const failed: SavedOrder = {
        ...base,
        status: "failed",
        note: base.note ? `${base.note} | Placement failed: ${reason}` : `Placement failed: ${reason}`,
      };
      await this.store.append(failed);
      log.warn({ orderId: failed.id, err }, "order placement failed");
      return {
        success: false,
        message: `Failed to fetch quotes for ${formatOptionSymbol(base)}: ${reason}`,
        order: failed,
      };
    }

    const result = this.settle(base, refs);
    await this.store.append(result.order);
    return result;
  }

  /**
   * Buy the lower-strike call and sell the higher-strike call, both day
   * orders. Both legs are priced before either is saved; if either quote
   * fetch fails nothing is saved.
   */
  async placeBullCallSpread(
    request: BullCallSpreadRequest,
  ): Promise<{ success: boolean; message: string; orders: SavedOrder[] }> {
    if (!(request.lowerStrike < request.upperStrike)) {
      return {
        success: false,
        message: "Lower strike must be below the upper strike.",
        orders: [],
      };
    }

    const shared = {
      symbol: request.symbol,
      expiration: request.expiration,
      right: "call" as const,
      quantity: request.quantity,
      tif: "day" as const,
    };
    const long = this.buildOrder({
      ...shared,
      side: "buy",
      strike: request.lowerStrike,
      limit: request.lowerLimit,
    });
    if (typeof long === "string") {
      return { success: false, message: `Long leg: ${long}`, orders: [] };
    }
    const short = this.buildOrder({
      ...shared,
      side: "sell",
      strike: request.upperStrike,
      limit: request.upperLimit,
    });
    if (typeof short === "string") {
      return { success: false, message: `Short leg: ${short}`, orders: [] };
    }

    let longRefs: MarketReferences;
    let shortRefs: MarketReferences;
    try {
      longRefs = await this.fetchReferences(long);
      shortRefs = await this.fetchReferences(short);
    } catch (err) {
      const reason = describeError(err);
      log.warn({ symbol: long.symbol, err }, "spread placement failed");
      return {
        success: false,
        message: `Failed to fetch quotes for ${formatOptionSymbol(long)} / ${formatOptionSymbol(short)}: ${reason}. Neither leg was placed.`,
        orders: [],
      };
    }

    const longResult = this.settle(long, longRefs);
    const shortResult = this.settle(short, shortRefs);
    await this.store.append(longResult.order);
    await this.store.append(shortResult.order);
    return {
      success: true,
      message: `Long leg: ${longResult.message} Short leg: ${shortResult.message}`,
      orders: [longResult.order, shortResult.order],
    };
  }

  /** User cancel; only working orders can be canceled. */
  async cancelOrder(id: string): Promise<OrderResult> {
    const seen: { status?: OrderStatus } = {};
    const updated = await this.store.update(id, (order) => {
      seen.status = order.status;
      if (order.status !== "working") {
        return undefined;
      }
      return { ...order, status: "canceled" };
    });

    if (!updated) {
      return { success: false, message: `Order ${id} not found.` };
    }
    if (seen.status !== "working") {
      return {
        success: false,
        message: `Order ${id} is ${updated.status} and can no longer be canceled.`,
        order: updated,
      };
    }
    return { success: true, message: `Order ${id} canceled.`, order: updated };
  }

  /**
   * Close a filled, unexpired position with an opposite-side working order
   * for the filled quantity.
   */
  async closeOrder(id: string, limit: number, tif: TimeInForce = "day"): Promise<OrderResult> {
    const order = await this.store.get(id);
    if (!order) {
      return { success: false, message: `Order ${id} not found.` };
    }
    if (order.status !== "filled") {
      return { success: false, message: `Only filled orders can be closed; ${id} is ${order.status}.` };
    }
    if (!order.expiration || isExpired(order.expiration, this.clock())) {
      return { success: false, message: `Order ${id} has expired and cannot be closed.` };
    }

    if (!Number.isFinite(limit) || limit <= 0) {
      return { success: false, message: "Limit price must be positive." };
    }

    // Closing orders rest as working; the monitor fills them on a later tick.
    const closing: SavedOrder = {
      id: this.generateId(),
      placedAt: this.clock().toISOString(),
      symbol: order.symbol,
      expiration: order.expiration,
      right: order.right,
      strike: order.strike,
      side: order.side === "buy" ? "sell" : "buy",
      quantity: order.fillQuantity ?? order.quantity,
      limit,
      tif,
      status: "working",
      note: `Close of ${order.id.slice(0, 6)}`,
    };
    await this.store.append(closing);
    return {
      success: true,
      message: `Close order working at ${formatMoney(limit)}. Order ID: ${closing.id}`,
      order: closing,
    };
  }

  getOrder(id: string): Promise<SavedOrder | undefined> {
    return this.store.get(id);
  }

  async deleteOrder(id: string): Promise<OrderResult> {
    const removed = await this.store.remove(id);
    return removed
      ? { success: true, message: `Order ${id} deleted.` }
      : { success: false, message: `Order ${id} not found.` };
  }

  /** Most recently placed first. */
  async listOrders(filter: OrderFilter = {}): Promise<SavedOrder[]> {
    const now = this.clock();
    const orders = await this.store.load();
    return orders
      .filter((o) => filter.status === undefined || o.status === filter.status)
      .filter((o) => {
        if (filter.expiringWithinDays === undefined) {
          return true;
        }
        if (!o.expiration || !isExpirationDate(o.expiration) || isExpired(o.expiration, now)) {
          return false;
        }
        return calcDaysToExpiry(o.expiration, now) <= filter.expiringWithinDays;
      })
      .toSorted((a, b) => b.placedAt.localeCompare(a.placedAt));
  }

  async monitoringStatus(): Promise<MonitoringStatus> {
    const [heartbeat, orders] = await Promise.all([
      this.market.getLastHeartbeat(),
      this.store.load(),
    ]);
    return {
      ...(heartbeat ? { lastHeartbeat: heartbeat.toISOString() } : {}),
      stale: isHeartbeatStale(heartbeat, this.clock(), this.staleAfterMs),
      workingOrders: orders.filter((o) => o.status === "working").length,
    };
  }

  /**
   * Payoff metrics and up/down scenarios for a single order. Centers on the
   * underlying price when available, else the strike. Market lookups are
   * best effort.
   */
  async analyzeOrder(
    id: string,
    moves: { upPct?: number; downPct?: number } = {},
  ): Promise<OrderAnalysis | undefined> {
    const order = await this.store.get(id);
    if (!order) {
      return undefined;
    }

    let market: MarketReferences = {};
    if (order.expiration) {
      try {
        market = await this.market.fetchMarketReferences(
          order.symbol,
          order.expiration,
          order.right === "call",
          order.strike,
        );
      } catch (err) {
        log.debug({ orderId: id, err }, "market references unavailable for analysis");
      }
    }

    let centerPrice = order.strike;
    try {
      centerPrice = await this.market.fetchUnderlyingPrice(order.symbol);
    } catch (err) {
      log.debug({ orderId: id, err }, "underlying price unavailable; centering on strike");
    }

    const leg = legFromOrder(order, market.mid);
    if (!leg) {
      return undefined;
    }
    return {
      order,
      leg,
      centerPrice,
      metrics: metrics([leg], centerPrice),
      scenarios: scenarios([leg], centerPrice, moves.upPct ?? 0.1, moves.downPct ?? 0.1),
      market,
    };
  }
}
