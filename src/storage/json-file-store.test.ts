import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Type } from "@sinclair/typebox";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { JsonFileStore, MutationQueue, StoreError } from "./json-file-store.js";

const CounterFile = Type.Object({
  version: Type.Literal(1),
  count: Type.Integer(),
});

describe("JsonFileStore", () => {
  let tmpDir: string;
  let store: JsonFileStore<typeof CounterFile>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "strike-desk-store-"));
    store = new JsonFileStore(path.join(tmpDir, "nested"), "counter.json", CounterFile, () => ({
      version: 1 as const,
      count: 0,
    }));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should return defaults when the file does not exist", async () => {
    expect(await store.read()).toEqual({ version: 1, count: 0 });
  });

  it("should write through a temp file and read back", async () => {
    await store.write({ version: 1, count: 7 });

    expect(await store.read()).toEqual({ version: 1, count: 7 });
    expect(fs.readdirSync(path.join(tmpDir, "nested"))).toEqual(["counter.json"]);
  });

  it("should reject invalid JSON", async () => {
    fs.mkdirSync(path.join(tmpDir, "nested"));
    fs.writeFileSync(store.getPath(), "{ not json", "utf-8");

    await expect(store.read()).rejects.toThrow("Store is not valid JSON");
  });

  it("should reject a document with the wrong shape", async () => {
    fs.mkdirSync(path.join(tmpDir, "nested"));
    fs.writeFileSync(store.getPath(), JSON.stringify({ version: 1, count: "seven" }), "utf-8");

    const err: unknown = await store.read().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreError);
    expect(err).toHaveProperty("filePath", store.getPath());
  });
});

describe("MutationQueue", () => {
  it("should run tasks one after another", async () => {
    const queue = new MutationQueue();
    const events: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run(async () => {
      events.push("first:start");
      await gate;
      events.push("first:end");
      return 1;
    });
    const second = queue.run(async () => {
      events.push("second");
      return 2;
    });

    await Promise.resolve();
    release();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("should keep going after a failed task", async () => {
    const queue = new MutationQueue();

    await expect(
      queue.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await queue.run(async () => "next")).toBe("next");
  });
});
