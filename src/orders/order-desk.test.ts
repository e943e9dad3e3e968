import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { HeartbeatStore } from "../monitor/heartbeat-store.js";
import { OrderMonitor } from "../monitor/order-monitor.js";
import { buildChainData, type OptionChainData } from "../options/options-chain.js";
import { QuoteError } from "../quotes/quote-provider.js";
import { OrderDesk, type PlaceOrderRequest } from "./order-desk.js";
import { OrderStore } from "./order-store.js";
import type { SavedOrder } from "./order-types.js";

const NOW = new Date("2026-03-10T15:00:00.000Z");

// bid 1.75 / ask 2.25 → mid 2.00
const CHAIN = buildChainData(
  ["2026-03-20"],
  [
    { kind: "call", strike: 100, bid: 1.75, ask: 2.25 },
    { kind: "put", strike: 95, bid: 0.5, ask: 0.7 },
  ],
);

function createMockProvider(
  fetchChain: (symbol: string, expiration?: string) => Promise<OptionChainData> = async () => CHAIN,
) {
  return {
    name: "mock",
    fetchDelayedPrice: vi.fn(async (_symbol: string) => 101.5),
    fetchOptionChain: vi.fn(fetchChain),
  };
}

function request(overrides: Partial<PlaceOrderRequest> = {}): PlaceOrderRequest {
  return {
    symbol: "XYZ",
    expiration: "2026-03-20",
    right: "call",
    strike: 100,
    side: "buy",
    quantity: 3,
    limit: 1,
    ...overrides,
  };
}

describe("OrderDesk", () => {
  let tmpDir: string;
  let store: OrderStore;
  let heartbeats: HeartbeatStore;
  let now: Date;
  let nextId: number;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "strike-desk-desk-"));
    store = new OrderStore(tmpDir);
    heartbeats = new HeartbeatStore(tmpDir);
    now = NOW;
    nextId = 0;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function createDesk(provider = createMockProvider()): OrderDesk {
    const monitor = new OrderMonitor({ store, heartbeats, provider, clock: () => now });
    return new OrderDesk(store, monitor, {
      clock: () => now,
      generateId: () => `ord${++nextId}-test`,
    });
  }

  describe("placeOrder", () => {
    it("should fill immediately when the limit crosses", async () => {
      const result = await createDesk().placeOrder(request({ limit: 2 }));

      expect(result.success).toBe(true);
      expect(result.message).toBe("Filled 3 XYZ-260320-C-100 @ $2.00. Order ID: ord1-test");
      expect(await store.get("ord1-test")).toEqual({
        id: "ord1-test",
        placedAt: "2026-03-10T15:00:00.000Z",
        symbol: "XYZ",
        expiration: "2026-03-20",
        right: "call",
        strike: 100,
        side: "buy",
        quantity: 3,
        limit: 2,
        tif: "day",
        status: "filled",
        fillPrice: 2,
        fillQuantity: 3,
      });
    });

    it("should fill at the touch price when it beats the limit", async () => {
      const result = await createDesk().placeOrder(request({ limit: 2.3 }));
      expect(result.order?.fillPrice).toBe(2.25);
    });

    it("should fill a sell at the limit when only the mid crosses", async () => {
      const result = await createDesk().placeOrder(
        request({ right: "put", strike: 95, side: "sell", limit: 0.55 }),
      );
      expect(result.order?.status).toBe("filled");
      expect(result.order?.fillPrice).toBe(0.55);
    });

    it("should rest as a working order otherwise", async () => {
      const result = await createDesk().placeOrder(request({ symbol: " xyz ", tif: "gtc" }));

      expect(result.success).toBe(true);
      expect(result.message).toBe("Accepted. Working at $1.00. Order ID: ord1-test");
      expect(result.order).toMatchObject({ symbol: "XYZ", status: "working", tif: "gtc" });
      expect(result.order?.fillPrice).toBeUndefined();
    });

    it("should persist a failed order when quotes cannot be fetched", async () => {
      const desk = createDesk(
        createMockProvider(async () => {
          throw new QuoteError("network", "connection reset");
        }),
      );

      const result = await desk.placeOrder(request({ note: "test" }));

      expect(result.success).toBe(false);
      expect(result.message).toBe("Failed to fetch quotes for XYZ-260320-C-100: connection reset");
      expect(await store.get("ord1-test")).toMatchObject({
        status: "failed",
        note: "test | Placement failed: connection reset",
      });
    });

    it("should reject invalid requests without persisting anything", async () => {
      const cases: Array<[Partial<PlaceOrderRequest>, string]> = [
        [{ symbol: "  " }, "Symbol is required."],
        [{ expiration: "03/20/2026" }, "Expiration must be a YYYY-MM-DD date."],
        [{ expiration: "2026-03-09" }, "Expiration date has already passed."],
        [{ strike: -1 }, "Strike must be zero or positive."],
        [{ quantity: 0 }, "Quantity must be a whole number of contracts, at least 1."],
        [{ quantity: 1.5 }, "Quantity must be a whole number of contracts, at least 1."],
        [{ limit: 0 }, "Limit price must be positive."],
      ];
      const provider = createMockProvider();
      const desk = createDesk(provider);

      for (const [overrides, message] of cases) {
        expect(await desk.placeOrder(request(overrides))).toEqual({ success: false, message });
      }
      expect(provider.fetchOptionChain).not.toHaveBeenCalled();
      expect(await store.load()).toEqual([]);
    });
  });

  describe("placeBullCallSpread", () => {
    it("should place a long lower call and a short upper call", async () => {
      const result = await createDesk().placeBullCallSpread({
        symbol: "XYZ",
        expiration: "2026-03-20",
        lowerStrike: 100,
        lowerLimit: 1,
        upperStrike: 105,
        upperLimit: 0.5,
        quantity: 2,
      });

      expect(result.success).toBe(true);
      expect(result.orders.map((o) => [o.side, o.right, o.strike, o.tif, o.status])).toEqual([
        ["buy", "call", 100, "day", "working"],
        ["sell", "call", 105, "day", "working"],
      ]);
      expect(await store.load()).toHaveLength(2);
    });

    for (const failingCall of [1, 2]) {
      it(`should save neither leg when quote fetch ${failingCall} fails`, async () => {
        let calls = 0;
        const desk = createDesk(
          createMockProvider(async () => {
            calls += 1;
            if (calls === failingCall) {
              throw new QuoteError("network", "connection reset");
            }
            return CHAIN;
          }),
        );

        const result = await desk.placeBullCallSpread({
          symbol: "XYZ",
          expiration: "2026-03-20",
          lowerStrike: 100,
          lowerLimit: 2,
          upperStrike: 105,
          upperLimit: 0.5,
          quantity: 1,
        });

        expect(result).toEqual({
          success: false,
          message:
            "Failed to fetch quotes for XYZ-260320-C-100 / XYZ-260320-C-105: connection reset. Neither leg was placed.",
          orders: [],
        });
        expect(await store.load()).toEqual([]);
      });
    }

    it("should refuse inverted strikes", async () => {
      const result = await createDesk().placeBullCallSpread({
        symbol: "XYZ",
        expiration: "2026-03-20",
        lowerStrike: 110,
        lowerLimit: 1,
        upperStrike: 100,
        upperLimit: 2,
        quantity: 1,
      });

      expect(result).toEqual({
        success: false,
        message: "Lower strike must be below the upper strike.",
        orders: [],
      });
    });
  });

  describe("cancelOrder", () => {
    it("should cancel a working order only once", async () => {
      const desk = createDesk();
      await desk.placeOrder(request());

      const first = await desk.cancelOrder("ord1-test");
      const second = await desk.cancelOrder("ord1-test");

      expect(first.success).toBe(true);
      expect(first.order?.status).toBe("canceled");
      expect(second).toMatchObject({
        success: false,
        message: "Order ord1-test is canceled and can no longer be canceled.",
      });
    });

    it("should not cancel a filled order", async () => {
      const desk = createDesk();
      await desk.placeOrder(request({ limit: 2 }));

      const result = await desk.cancelOrder("ord1-test");

      expect(result.success).toBe(false);
      expect((await store.get("ord1-test"))?.status).toBe("filled");
    });

    it("should report unknown ids", async () => {
      expect(await createDesk().cancelOrder("nope")).toEqual({
        success: false,
        message: "Order nope not found.",
      });
    });
  });

  describe("closeOrder", () => {
    it("should place an opposite working order for the filled quantity", async () => {
      const desk = createDesk();
      await desk.placeOrder(request({ limit: 2, quantity: 4 }));

      const result = await desk.closeOrder("ord1-test", 2.5);

      expect(result.success).toBe(true);
      expect(result.message).toBe("Close order working at $2.50. Order ID: ord2-test");
      expect(result.order).toMatchObject({
        side: "sell",
        quantity: 4,
        limit: 2.5,
        tif: "day",
        status: "working",
        note: "Close of ord1-t",
      });
    });

    it("should only close filled, unexpired orders", async () => {
      const desk = createDesk();
      await desk.placeOrder(request());
      const expired: SavedOrder = {
        id: "old-fill",
        placedAt: "2026-03-02T15:00:00.000Z",
        symbol: "XYZ",
        expiration: "2026-03-06",
        right: "call",
        strike: 100,
        side: "buy",
        quantity: 1,
        tif: "gtc",
        status: "filled",
        fillPrice: 1,
        fillQuantity: 1,
      };
      await store.append(expired);

      expect((await desk.closeOrder("ord1-test", 2)).message).toBe(
        "Only filled orders can be closed; ord1-test is working.",
      );
      expect((await desk.closeOrder("old-fill", 2)).message).toBe(
        "Order old-fill has expired and cannot be closed.",
      );
      expect((await desk.closeOrder("missing", 2)).message).toBe("Order missing not found.");
    });
  });

  describe("deleteOrder", () => {
    it("should delete once", async () => {
      const desk = createDesk();
      await desk.placeOrder(request());

      expect((await desk.deleteOrder("ord1-test")).success).toBe(true);
      expect((await desk.deleteOrder("ord1-test")).success).toBe(false);
      expect(await store.load()).toEqual([]);
    });
  });

  describe("listOrders", () => {
    it("should list newest first and filter by status and expiry window", async () => {
      const desk = createDesk();
      await desk.placeOrder(request());
      now = new Date("2026-03-10T15:05:00.000Z");
      await desk.placeOrder(request({ expiration: "2026-04-17", limit: 2 }));
      now = new Date("2026-03-10T15:10:00.000Z");
      await desk.placeOrder(request({ side: "sell", limit: 9 }));

      expect((await desk.listOrders()).map((o) => o.id)).toEqual([
        "ord3-test",
        "ord2-test",
        "ord1-test",
      ]);
      expect((await desk.listOrders({ status: "working" })).map((o) => o.id)).toEqual([
        "ord3-test",
        "ord1-test",
      ]);
      expect((await desk.listOrders({ expiringWithinDays: 14 })).map((o) => o.id)).toEqual([
        "ord3-test",
        "ord1-test",
      ]);
    });
  });

  describe("monitoringStatus", () => {
    it("should be stale before any tick", async () => {
      const desk = createDesk();
      await desk.placeOrder(request());

      expect(await desk.monitoringStatus()).toEqual({ stale: true, workingOrders: 1 });
    });

    it("should report a recent heartbeat as live", async () => {
      await heartbeats.write(new Date("2026-03-10T14:59:00.000Z"));

      expect(await createDesk().monitoringStatus()).toEqual({
        lastHeartbeat: "2026-03-10T14:59:00.000Z",
        stale: false,
        workingOrders: 0,
      });
    });
  });

  describe("analyzeOrder", () => {
    it("should center on the underlying and price the leg from the fill", async () => {
      const desk = createDesk();
      await desk.placeOrder(request({ limit: 2 }));

      const analysis = await desk.analyzeOrder("ord1-test");

      expect(analysis?.centerPrice).toBe(101.5);
      expect(analysis?.leg).toMatchObject({ premium: 2, contracts: 3, side: "long" });
      expect(analysis?.market).toEqual({ bid: 1.75, ask: 2.25, mid: 2 });
      expect(analysis?.metrics.maxLoss).toBeCloseTo(-600);
      expect(analysis?.metrics.breakeven).toBeCloseTo(102);
      expect(analysis?.scenarios[0].direction).toBe("up");
    });

    it("should fall back to the strike when no underlying price is available", async () => {
      const provider = createMockProvider();
      provider.fetchDelayedPrice.mockRejectedValue(new QuoteError("notFound", "no price"));
      const desk = createDesk(provider);
      await desk.placeOrder(request());

      expect((await desk.analyzeOrder("ord1-test"))?.centerPrice).toBe(100);
    });

    it("should return undefined for unknown orders", async () => {
      expect(await createDesk().analyzeOrder("nope")).toBeUndefined();
    });
  });
});
