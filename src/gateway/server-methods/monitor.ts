import { Type } from "@sinclair/typebox";
import { getConfig } from "../../config.js";
import { getMonitorService, type MonitorService } from "../../monitor/index.js";
import { getOrderDesk, type OrderDesk } from "../../orders/index.js";
import {
  CachedQuoteProvider,
  ManualMarketDataStore,
  ManualQuoteProvider,
  NullQuoteProvider,
  SimulatedQuoteProvider,
  normalizeSymbol,
  type QuoteProvider,
} from "../../quotes/index.js";
import { isExpirationDate } from "../../options/options-pricing.js";
import {
  internalError,
  parseParams,
  type BroadcastFn,
  type GatewayRequestHandlers,
} from "./types.js";

const ProviderParams = Type.Object({
  kind: Type.Union([Type.Literal("none"), Type.Literal("manual"), Type.Literal("simulated")]),
  /** Reference prices for the simulated provider. */
  prices: Type.Optional(Type.Record(Type.String(), Type.Number({ exclusiveMinimum: 0 }))),
});

const PriceParams = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  price: Type.Number({ minimum: 0 }),
});

const ContractParams = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  expiration: Type.String(),
  kind: Type.Union([Type.Literal("call"), Type.Literal("put")]),
  strike: Type.Number({ minimum: 0 }),
  bid: Type.Optional(Type.Number({ minimum: 0 })),
  ask: Type.Optional(Type.Number({ minimum: 0 })),
  last: Type.Optional(Type.Number({ minimum: 0 })),
});

const ChainParams = Type.Object({
  symbol: Type.String({ minLength: 1 }),
  expiration: Type.Optional(Type.String()),
});

export interface MonitorHandlerDeps {
  getService: () => MonitorService;
  getDesk: () => OrderDesk;
  getManualData: () => Promise<ManualMarketDataStore>;
}

let manualDataPromise: Promise<ManualMarketDataStore> | null = null;

function getManualData(): Promise<ManualMarketDataStore> {
  if (!manualDataPromise) {
    manualDataPromise = ManualMarketDataStore.create(getConfig().dataDir);
  }
  return manualDataPromise;
}

const defaultDeps: MonitorHandlerDeps = {
  getService: getMonitorService,
  getDesk: getOrderDesk,
  getManualData,
};

export function createMonitorHandlers(
  deps: MonitorHandlerDeps = defaultDeps,
): GatewayRequestHandlers {
  // One heartbeat forwarder per handler set, registered on first start.
  let forwarding: (() => void) | null = null;

  const forwardHeartbeats = (broadcast: BroadcastFn) => {
    if (forwarding) {
      return;
    }
    const { monitor, orderStore } = deps.getService();
    const offHeartbeat = monitor.onHeartbeat((at) => {
      broadcast("monitor.heartbeat", { at: at.toISOString() });
    });
    const offOrders = orderStore.subscribe(() => {
      broadcast("orders.changed", {});
    });
    forwarding = () => {
      offHeartbeat();
      offOrders();
    };
  };

  return {
    "monitor.status": async ({ respond }) => {
      try {
        const { monitor } = deps.getService();
        const status = await deps.getDesk().monitoringStatus();
        respond(true, { ...status, running: monitor.isRunning, provider: monitor.providerName });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "monitor.start": ({ respond, context }) => {
      try {
        forwardHeartbeats(context.broadcast);
        const { monitor } = deps.getService();
        monitor.start();
        respond(true, { running: monitor.isRunning });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "monitor.stop": ({ respond }) => {
      try {
        const { monitor } = deps.getService();
        // Replies without waiting for an in-flight tick.
        monitor.stop();
        forwarding?.();
        forwarding = null;
        respond(true, { running: monitor.isRunning });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "monitor.tick": async ({ respond, context }) => {
      try {
        const { monitor } = deps.getService();
        const report = await monitor.tick();
        const applied = report.outcomes.filter((o) => o.applied);
        if (applied.length > 0) {
          context.broadcast("orders.updated", {
            action: "tick",
            orderIds: applied.map((o) => o.orderId),
          });
        }
        respond(true, {
          startedAt: report.startedAt.toISOString(),
          completedAt: report.completedAt.toISOString(),
          outcomes: report.outcomes,
        });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "monitor.setProvider": async ({ params, respond, context }) => {
      const request = parseParams(ProviderParams, params, respond);
      if (!request) {
        return;
      }
      try {
        // Manual data is served straight from memory, uncached.
        let provider: QuoteProvider;
        if (request.kind === "manual") {
          provider = new ManualQuoteProvider(await deps.getManualData());
        } else if (request.kind === "simulated") {
          provider = new CachedQuoteProvider(new SimulatedQuoteProvider(request.prices ?? {}));
        } else {
          provider = new CachedQuoteProvider(new NullQuoteProvider());
        }
        const { monitor } = deps.getService();
        monitor.setQuoteProvider(provider);
        context.broadcast("monitor.provider", { provider: monitor.providerName });
        respond(true, { provider: monitor.providerName });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "market.chain": async ({ params, respond }) => {
      const request = parseParams(ChainParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const { monitor } = deps.getService();
        respond(true, await monitor.fetchOptionChain(request.symbol, request.expiration));
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "market.setUnderlying": async ({ params, respond }) => {
      const request = parseParams(PriceParams, params, respond);
      if (!request) {
        return;
      }
      try {
        const data = await deps.getManualData();
        await data.setUnderlying(request.symbol, request.price);
        respond(true, { symbol: normalizeSymbol(request.symbol), price: request.price });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "market.upsertContract": async ({ params, respond }) => {
      const request = parseParams(ContractParams, params, respond);
      if (!request) {
        return;
      }
      const { symbol, expiration, ...contract } = request;
      if (!isExpirationDate(expiration)) {
        respond(false, undefined, {
          code: "INVALID_PARAMS",
          message: `/expiration: expected YYYY-MM-DD, got "${expiration}"`,
        });
        return;
      }
      try {
        const data = await deps.getManualData();
        await data.upsertContract(symbol, expiration, contract);
        respond(true, { symbol, expiration, contracts: data.getChainContracts(symbol, expiration) });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },
  };
}

export const monitorHandlers: GatewayRequestHandlers = createMonitorHandlers();
