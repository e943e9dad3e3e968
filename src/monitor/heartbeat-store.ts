import { Type } from "@sinclair/typebox";
import { defaultDataDir } from "../config.js";
import { JsonFileStore } from "../storage/json-file-store.js";

const HeartbeatFileSchema = Type.Object({
  version: Type.Literal(1),
  lastTick: Type.Optional(Type.String()), // ISO 8601
});

export const DEFAULT_STALE_AFTER_MS = 180_000; // 3 minutes

/** Persisted timestamp of the last completed monitor tick. */
export class HeartbeatStore {
  private readonly file: JsonFileStore<typeof HeartbeatFileSchema>;
  private last: Date | undefined;
  private loaded = false;

  constructor(dataDir: string = defaultDataDir()) {
    this.file = new JsonFileStore(dataDir, "heartbeat.json", HeartbeatFileSchema, () => ({
      version: 1 as const,
    }));
  }

  async read(): Promise<Date | undefined> {
    if (!this.loaded) {
      const data = await this.file.read();
      const parsed = data.lastTick ? new Date(data.lastTick) : undefined;
      this.last = parsed && !Number.isNaN(parsed.getTime()) ? parsed : undefined;
      this.loaded = true;
    }
    return this.last;
  }

  async write(at: Date): Promise<void> {
    await this.file.write({ version: 1, lastTick: at.toISOString() });
    this.last = at;
    this.loaded = true;
  }
}

/** Monitoring is stale when no tick completed within the window, or none ever did. */
export function isHeartbeatStale(
  heartbeat: Date | undefined,
  now: Date = new Date(),
  staleAfterMs: number = DEFAULT_STALE_AFTER_MS,
): boolean {
  if (!heartbeat) {
    return true;
  }
  return now.getTime() - heartbeat.getTime() > staleAfterMs;
}
