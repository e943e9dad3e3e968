import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { HeartbeatStore, isHeartbeatStale } from "./heartbeat-store.js";

describe("HeartbeatStore", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "strike-desk-heartbeat-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should have no heartbeat before the first tick", async () => {
    expect(await new HeartbeatStore(tmpDir).read()).toBeUndefined();
  });

  it("should persist the last tick time", async () => {
    const at = new Date("2026-03-10T15:00:00.000Z");
    await new HeartbeatStore(tmpDir).write(at);

    const reopened = await new HeartbeatStore(tmpDir).read();
    expect(reopened?.toISOString()).toBe("2026-03-10T15:00:00.000Z");

    const raw: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, "heartbeat.json"), "utf-8"));
    expect(raw).toEqual({ version: 1, lastTick: "2026-03-10T15:00:00.000Z" });
  });

  it("should ignore an unreadable timestamp", async () => {
    fs.writeFileSync(
      path.join(tmpDir, "heartbeat.json"),
      JSON.stringify({ version: 1, lastTick: "not a date" }),
      "utf-8",
    );
    expect(await new HeartbeatStore(tmpDir).read()).toBeUndefined();
  });
});

describe("isHeartbeatStale", () => {
  const hb = new Date("2026-03-10T15:00:00Z");

  it("should be stale without any heartbeat", () => {
    expect(isHeartbeatStale(undefined, hb)).toBe(true);
  });

  it("should allow exactly three minutes", () => {
    expect(isHeartbeatStale(hb, new Date("2026-03-10T15:03:00Z"))).toBe(false);
    expect(isHeartbeatStale(hb, new Date("2026-03-10T15:03:00.001Z"))).toBe(true);
  });

  it("should honour a custom window", () => {
    expect(isHeartbeatStale(hb, new Date("2026-03-10T15:00:31Z"), 30_000)).toBe(true);
  });
});
