/**
 * Fill / expire / cancel rules for one working limit order, evaluated
 * against a single chain snapshot. No I/O: the monitor fetches, calls
 * `decide`, and applies the result.
 */
import { contractMid, findContract, type OptionChainData } from "../options/options-chain.js";
import { isExpirationDate, isExpired, isSameCalendarDay } from "../options/options-pricing.js";
import type { OrderSide, SavedOrder } from "../orders/order-types.js";

export type DeferReason = "malformedOrder" | "providerError" | "contractNotFound";
export type CancelReason = "expired" | "dayOrderElapsed";

export type OrderDecision =
  | { kind: "filled"; price: number; quantity: number }
  | { kind: "canceled"; reason: CancelReason }
  | { kind: "stillWorking" }
  | { kind: "deferred"; reason: DeferReason; detail?: string };

export type ChainResult =
  | { ok: true; chain: OptionChainData }
  | { ok: false; error: unknown };

export interface Quotes {
  bid?: number;
  ask?: number;
  mid?: number;
}

/**
 * Buy crosses when the ask or the mid is at or under the limit; sell when
 * the bid or the mid is at or over it. Either price is enough.
 */
export function crossesLimit(side: OrderSide, limit: number | undefined, quotes: Quotes): boolean {
  if (limit === undefined) {
    return false;
  }
  const { bid, ask, mid } = quotes;
  if (side === "buy") {
    return (ask !== undefined && ask <= limit) || (mid !== undefined && mid <= limit);
  }
  return (bid !== undefined && bid >= limit) || (mid !== undefined && mid >= limit);
}

/** Touch price first, then mid, then the limit itself; never worse than the limit. */
export function executionPrice(side: OrderSide, limit: number, quotes: Quotes): number {
  const { bid, ask, mid } = quotes;
  if (side === "buy") {
    if (ask !== undefined) {
      return Math.min(ask, limit);
    }
    return mid !== undefined ? Math.min(mid, limit) : limit;
  }
  if (bid !== undefined) {
    return Math.max(bid, limit);
  }
  return mid !== undefined ? Math.max(mid, limit) : limit;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decide what happens to a working order this tick.
 *
 * `chain` is undefined when the order has no expiration (nothing was fetched).
 * Provider errors and missing contracts defer even an expired order: the
 * decision waits for a readable chain.
 */
export function decide(
  order: SavedOrder,
  chain: ChainResult | undefined,
  now: Date,
  timeZone: string,
): OrderDecision {
  if (!order.expiration) {
    return { kind: "deferred", reason: "malformedOrder", detail: "missing expiration" };
  }
  if (!isExpirationDate(order.expiration)) {
    return { kind: "deferred", reason: "malformedOrder", detail: "unreadable expiration" };
  }
  if (!chain) {
    return { kind: "deferred", reason: "providerError", detail: "no chain fetched" };
  }
  if (!chain.ok) {
    return { kind: "deferred", reason: "providerError", detail: describeError(chain.error) };
  }

  const contract = findContract(chain.chain, order.right, order.strike);
  if (!contract) {
    return {
      kind: "deferred",
      reason: "contractNotFound",
      detail: `no ${order.right} at strike ${order.strike}`,
    };
  }

  const quotes: Quotes = { bid: contract.bid, ask: contract.ask, mid: contractMid(contract) };
  if (order.limit !== undefined && crossesLimit(order.side, order.limit, quotes)) {
    return {
      kind: "filled",
      price: executionPrice(order.side, order.limit, quotes),
      quantity: order.quantity,
    };
  }

  if (isExpired(order.expiration, now)) {
    return { kind: "canceled", reason: "expired" };
  }
  if (order.tif === "day") {
    const placedAt = new Date(order.placedAt);
    if (Number.isNaN(placedAt.getTime())) {
      return { kind: "deferred", reason: "malformedOrder", detail: "unreadable placedAt" };
    }
    if (!isSameCalendarDay(placedAt, now, timeZone)) {
      return { kind: "canceled", reason: "dayOrderElapsed" };
    }
  }
  return { kind: "stillWorking" };
}
