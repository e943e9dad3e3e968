import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { StrategyStore } from "./strategy-store.js";

describe("StrategyStore", () => {
  let tmpDir: string;
  let nextId: number;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "strike-desk-strategies-"));
    nextId = 0;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function createStore(): Promise<StrategyStore> {
    return StrategyStore.create(tmpDir, {
      clock: () => new Date("2026-03-10T15:00:00.000Z"),
      generateId: () => `strat-${++nextId}`,
    });
  }

  it("should save a strategy with clamped legs", async () => {
    const store = await createStore();

    const saved = await store.save({
      kind: "bullCallSpread",
      symbol: " xyz ",
      expiration: "2026-03-20",
      legs: [
        { type: "call", side: "long", strike: 100, premium: 5, contracts: 1.6 },
        { type: "call", side: "short", strike: 110, premium: -1 },
      ],
      marketPriceAtSave: 101.5,
    });

    expect(saved).toEqual({
      id: "strat-1",
      createdAt: "2026-03-10T15:00:00.000Z",
      kind: "bullCallSpread",
      symbol: "XYZ",
      expiration: "2026-03-20",
      legs: [
        { type: "call", side: "long", strike: 100, premium: 5, contracts: 2, multiplier: 100 },
        { type: "call", side: "short", strike: 110, premium: 0, contracts: 1, multiplier: 100 },
      ],
      marketPriceAtSave: 101.5,
    });
  });

  it("should reload saved strategies and remove them", async () => {
    const store = await createStore();
    await store.save({
      kind: "singlePut",
      symbol: "XYZ",
      legs: [{ type: "put", side: "long", strike: 95, premium: 2 }],
      note: "hedge",
    });

    const reopened = await createStore();
    expect(reopened.list().map((s) => [s.id, s.note])).toEqual([["strat-1", "hedge"]]);
    expect(reopened.get("strat-1")?.kind).toBe("singlePut");

    expect(await reopened.remove("strat-1")).toBe(true);
    expect(await reopened.remove("strat-1")).toBe(false);
    expect((await createStore()).list()).toEqual([]);
  });

  it("should hand out copies", async () => {
    const store = await createStore();
    await store.save({
      kind: "singleCall",
      symbol: "XYZ",
      legs: [{ type: "call", side: "long", strike: 100, premium: 5 }],
    });

    const copy = store.get("strat-1");
    if (copy) {
      copy.symbol = "ABC";
    }
    expect(store.get("strat-1")?.symbol).toBe("XYZ");
  });

  it("should reject strategies without legs or with a bad expiration", async () => {
    const store = await createStore();

    await expect(store.save({ kind: "singleCall", symbol: "XYZ", legs: [] })).rejects.toThrow(
      "at least one leg",
    );
    await expect(
      store.save({
        kind: "singleCall",
        symbol: "XYZ",
        expiration: "March",
        legs: [{ type: "call", side: "long", strike: 100, premium: 5 }],
      }),
    ).rejects.toThrow("Invalid expiration");
    expect(store.list()).toEqual([]);
  });

  it("should leave memory untouched when the file cannot be written", async () => {
    const dataDir = path.join(tmpDir, "data");
    const store = await StrategyStore.create(dataDir, { generateId: () => "strat-1" });
    await store.save({
      kind: "singleCall",
      symbol: "XYZ",
      legs: [{ type: "call", side: "long", strike: 100, premium: 5 }],
    });
    // A plain file where the data directory should be makes every write fail.
    fs.rmSync(dataDir, { recursive: true, force: true });
    fs.writeFileSync(dataDir, "", "utf-8");

    await expect(
      store.save({
        kind: "singlePut",
        symbol: "XYZ",
        legs: [{ type: "put", side: "long", strike: 95, premium: 2 }],
      }),
    ).rejects.toThrow();
    await expect(store.remove("strat-1")).rejects.toThrow();

    expect(store.list().map((s) => [s.id, s.kind])).toEqual([["strat-1", "singleCall"]]);
  });
});
