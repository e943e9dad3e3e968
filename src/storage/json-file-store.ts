import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class StoreError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${filePath})`, options);
    this.name = "StoreError";
    this.filePath = filePath;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * One JSON document on disk, validated against a TypeBox schema on every read.
 * Writes go to a temp file first and are renamed into place.
 */
export class JsonFileStore<S extends TSchema> {
  private readonly storagePath: string;
  private readonly schema: S;
  private readonly defaults: () => Static<S>;

  constructor(dir: string, fileName: string, schema: S, defaults: () => Static<S>) {
    this.storagePath = path.join(dir, fileName);
    this.schema = schema;
    this.defaults = defaults;
  }

  getPath(): string {
    return this.storagePath;
  }

  async read(): Promise<Static<S>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storagePath, "utf-8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return this.defaults();
      }
      throw new StoreError(this.storagePath, "Failed to read store", { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(this.storagePath, "Store is not valid JSON", { cause: err });
    }

    if (!Value.Check(this.schema, parsed)) {
      const first = Value.Errors(this.schema, parsed).First();
      const detail = first ? `${first.path || "/"}: ${first.message}` : "schema mismatch";
      throw new StoreError(this.storagePath, `Store has an unexpected shape (${detail})`);
    }
    return parsed;
  }

  async write(data: Static<S>): Promise<void> {
    const dir = path.dirname(this.storagePath);
    await fs.mkdir(dir, { recursive: true });

    const tmpPath = `${this.storagePath}.${crypto.randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
    await fs.rename(tmpPath, this.storagePath);
  }
}

/**
 * Serializes async read-modify-write sections. Each task starts only after the
 * previous one settled; a failed task does not poison the queue.
 */
export class MutationQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}
