import { setTimeout as delay } from "node:timers/promises";
import { createLogger, type Logger } from "../logger.js";
import {
  findContract,
  marketReferences,
  type MarketReferences,
  type OptionChainData,
} from "../options/options-chain.js";
import { isExpirationDate } from "../options/options-pricing.js";
import type { OrderStore } from "../orders/order-store.js";
import type { SavedOrder } from "../orders/order-types.js";
import { NullQuoteProvider } from "../quotes/null-provider.js";
import type { QuoteProvider } from "../quotes/quote-provider.js";
import type { HeartbeatStore } from "./heartbeat-store.js";
import { decide, type ChainResult, type OrderDecision } from "./order-decision.js";

export const DEFAULT_TICK_INTERVAL_MS = 30_000;

export type HeartbeatListener = (at: Date) => void;
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface OrderMonitorOptions {
  store: Pick<OrderStore, "load" | "update">;
  heartbeats: Pick<HeartbeatStore, "read" | "write">;
  provider?: QuoteProvider;
  intervalMs?: number;
  /** Zone whose calendar decides when a day order has lapsed. */
  timeZone?: string;
  clock?: () => Date;
  sleep?: SleepFn;
  logger?: Logger;
}

export interface OrderOutcome {
  orderId: string;
  symbol: string;
  decision: OrderDecision;
  /** False when the decision was not written, e.g. the user canceled first. */
  applied: boolean;
}

export interface TickReport {
  startedAt: Date;
  completedAt: Date;
  outcomes: OrderOutcome[];
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Re-evaluates every working order against the current chain on a fixed
 * interval and records fills and cancellations.
 *
 * Ticks run one order at a time. `stop()` takes effect at the top of the next
 * iteration; a tick in progress always finishes and writes its heartbeat.
 */
export class OrderMonitor {
  private provider: QuoteProvider;
  private readonly store: Pick<OrderStore, "load" | "update">;
  private readonly heartbeats: Pick<HeartbeatStore, "read" | "write">;
  private readonly intervalMs: number;
  private readonly timeZone: string;
  private readonly clock: () => Date;
  private readonly sleep: SleepFn;
  private readonly log: Logger;
  private readonly listeners = new Set<HeartbeatListener>();

  private running = false;
  private loopPromise: Promise<void> | null = null;
  private inFlight: Promise<TickReport> | null = null;
  private pauseController: AbortController | null = null;

  constructor(options: OrderMonitorOptions) {
    this.store = options.store;
    this.heartbeats = options.heartbeats;
    this.provider = options.provider ?? new NullQuoteProvider();
    this.intervalMs = options.intervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.timeZone = options.timeZone ?? "America/New_York";
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger("order-monitor");
  }

  get isRunning(): boolean {
    return this.running;
  }

  get providerName(): string {
    return this.provider.name;
  }

  /** No-op when already running. */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.log.info({ intervalMs: this.intervalMs, provider: this.provider.name }, "order monitor started");
    // A loop that is still finishing its last tick picks the flag back up.
    if (!this.loopPromise) {
      this.loopPromise = this.loop();
    }
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.pauseController?.abort();
    this.log.info("order monitor stopping");
  }

  /** Resolves once the loop has exited. */
  async whenStopped(): Promise<void> {
    await this.loopPromise;
  }

  /** Swap the data source; the next order evaluated uses it. */
  setQuoteProvider(provider: QuoteProvider | undefined): void {
    this.provider = provider ?? new NullQuoteProvider();
    this.log.info({ provider: this.provider.name }, "quote provider changed");
  }

  getLastHeartbeat(): Promise<Date | undefined> {
    return this.heartbeats.read();
  }

  onHeartbeat(listener: HeartbeatListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Bid/ask/mid for one contract, matched the same way the tick loop does.
   * All fields are absent when the chain has no such contract; provider
   * errors propagate.
   */
  async fetchMarketReferences(
    symbol: string,
    expiration: string,
    isCall: boolean,
    strike: number,
  ): Promise<MarketReferences> {
    const chain = await this.provider.fetchOptionChain(symbol, expiration);
    return marketReferences(findContract(chain, isCall ? "call" : "put", strike));
  }

  fetchUnderlyingPrice(symbol: string): Promise<number> {
    return this.provider.fetchDelayedPrice(symbol);
  }

  fetchOptionChain(symbol: string, expiration?: string): Promise<OptionChainData> {
    return this.provider.fetchOptionChain(symbol, expiration);
  }

  /**
   * Run one sweep over the working orders, then record the heartbeat.
   * Calls made while a sweep is running share its result.
   */
  tick(): Promise<TickReport> {
    if (!this.inFlight) {
      this.inFlight = this.sweep().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async loop(): Promise<void> {
    try {
      while (this.running) {
        try {
          await this.tick();
        } catch (err) {
          this.log.error({ err }, "order monitor tick failed");
        }
        if (this.running) {
          await this.pause();
        }
      }
    } finally {
      this.loopPromise = null;
      this.log.info("order monitor stopped");
    }
  }

  private async pause(): Promise<void> {
    const controller = new AbortController();
    this.pauseController = controller;
    try {
      await this.sleep(this.intervalMs, controller.signal);
    } catch (err) {
      if (!controller.signal.aborted) {
        this.log.warn({ err }, "inter-tick sleep failed");
      }
    } finally {
      this.pauseController = null;
    }
  }

  private async sweep(): Promise<TickReport> {
    const startedAt = this.clock();
    const outcomes: OrderOutcome[] = [];

    let working: SavedOrder[] = [];
    try {
      working = (await this.store.load()).filter((o) => o.status === "working");
    } catch (err) {
      this.log.error({ err }, "could not load orders; skipping sweep");
    }

    for (const order of working) {
      try {
        outcomes.push(await this.evaluate(order));
      } catch (err) {
        this.log.error({ err, orderId: order.id }, "failed to apply order decision");
      }
    }

    const completedAt = this.clock();
    await this.recordHeartbeat(completedAt);
    this.log.debug(
      { evaluated: working.length, applied: outcomes.filter((o) => o.applied).length },
      "tick complete",
    );
    return { startedAt, completedAt, outcomes };
  }

  private async evaluate(order: SavedOrder): Promise<OrderOutcome> {
    let chain: ChainResult | undefined;
    if (order.expiration && isExpirationDate(order.expiration)) {
      try {
        chain = { ok: true, chain: await this.provider.fetchOptionChain(order.symbol, order.expiration) };
      } catch (error) {
        chain = { ok: false, error };
      }
    }

    const decision = decide(order, chain, this.clock(), this.timeZone);
    const outcome: OrderOutcome = { orderId: order.id, symbol: order.symbol, decision, applied: false };

    if (decision.kind === "deferred") {
      this.log.debug(
        { orderId: order.id, reason: decision.reason, detail: decision.detail },
        "order decision deferred",
      );
      return outcome;
    }
    if (decision.kind === "stillWorking") {
      return outcome;
    }

    let applied = false;
    await this.store.update(order.id, (current) => {
      // A user cancel or another writer got there first.
      if (current.status !== "working") {
        return undefined;
      }
      applied = true;
      if (decision.kind === "filled") {
        return {
          ...current,
          status: "filled",
          fillPrice: decision.price,
          fillQuantity: current.quantity,
        };
      }
      return { ...current, status: "canceled" };
    });

    if (applied) {
      this.log.info(
        decision.kind === "filled"
          ? { orderId: order.id, symbol: order.symbol, status: "filled", fillPrice: decision.price }
          : { orderId: order.id, symbol: order.symbol, status: "canceled", reason: decision.reason },
        "order transitioned",
      );
    }
    return { ...outcome, applied };
  }

  private async recordHeartbeat(at: Date): Promise<void> {
    try {
      await this.heartbeats.write(at);
    } catch (err) {
      this.log.error({ err }, "failed to persist heartbeat");
    }
    for (const listener of this.listeners) {
      try {
        listener(at);
      } catch (err) {
        this.log.warn({ err }, "heartbeat listener threw");
      }
    }
  }
}
