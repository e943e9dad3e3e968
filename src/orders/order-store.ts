import { Type } from "@sinclair/typebox";
import { defaultDataDir } from "../config.js";
import { createLogger } from "../logger.js";
import { JsonFileStore, MutationQueue } from "../storage/json-file-store.js";
import { SavedOrderSchema, assertOrderInvariants, type SavedOrder } from "./order-types.js";

const OrdersFileSchema = Type.Object({
  version: Type.Literal(1),
  orders: Type.Array(SavedOrderSchema),
});

const log = createLogger("order-store");

export type StoreListener = () => void;

/**
 * Receives a copy of the stored order and returns its replacement, or
 * undefined to leave the record untouched.
 */
export type OrderMutation = (order: SavedOrder) => SavedOrder | undefined;

/**
 * Persisted order collection. Every mutation runs through one queue, so two
 * read-modify-write sections on the same id never interleave. Listeners get
 * a payload-free notification after each change and reload what they need.
 */
export class OrderStore {
  private readonly file: JsonFileStore<typeof OrdersFileSchema>;
  private readonly queue = new MutationQueue();
  private readonly listeners = new Set<StoreListener>();

  constructor(dataDir: string = defaultDataDir()) {
    this.file = new JsonFileStore(dataDir, "orders.json", OrdersFileSchema, () => ({
      version: 1 as const,
      orders: [],
    }));
  }

  getPath(): string {
    return this.file.getPath();
  }

  async load(): Promise<SavedOrder[]> {
    const data = await this.file.read();
    return data.orders;
  }

  async get(id: string): Promise<SavedOrder | undefined> {
    const orders = await this.load();
    return orders.find((o) => o.id === id);
  }

  /** Insert, or replace the order with the same id. */
  append(order: SavedOrder): Promise<void> {
    return this.queue.run(async () => {
      assertOrderInvariants(order);
      const data = await this.file.read();
      const idx = data.orders.findIndex((o) => o.id === order.id);
      if (idx >= 0) {
        data.orders[idx] = order;
      } else {
        data.orders.push(order);
      }
      await this.file.write(data);
      this.notify();
    });
  }

  /**
   * Atomic read-modify-write of one order. Resolves to the stored order after
   * the mutation, or undefined when the id is unknown.
   */
  update(id: string, mutate: OrderMutation): Promise<SavedOrder | undefined> {
    return this.queue.run(async () => {
      const data = await this.file.read();
      const idx = data.orders.findIndex((o) => o.id === id);
      if (idx < 0) {
        return undefined;
      }

      const current = data.orders[idx];
      const next = mutate(structuredClone(current));
      if (!next) {
        return current;
      }
      if (next.id !== id) {
        throw new Error(`Mutation of order ${id} changed its id to ${next.id}`);
      }
      assertOrderInvariants(next);

      data.orders[idx] = next;
      await this.file.write(data);
      this.notify();
      return next;
    });
  }

  remove(id: string): Promise<boolean> {
    return this.queue.run(async () => {
      const data = await this.file.read();
      const remaining = data.orders.filter((o) => o.id !== id);
      if (remaining.length === data.orders.length) {
        return false;
      }
      await this.file.write({ ...data, orders: remaining });
      this.notify();
      return true;
    });
  }

  clear(): Promise<void> {
    return this.queue.run(async () => {
      await this.file.write({ version: 1, orders: [] });
      this.notify();
    });
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (err) {
        log.warn({ err }, "order store listener threw");
      }
    }
  }
}
