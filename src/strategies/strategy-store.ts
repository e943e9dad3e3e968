import crypto from "node:crypto";
import { Type, type Static } from "@sinclair/typebox";
import { defaultDataDir } from "../config.js";
import { makeLeg, type LegInput, type StrategyKind } from "../options/option-leg.js";
import { isExpirationDate } from "../options/options-pricing.js";
import { normalizeSymbol } from "../quotes/quote-provider.js";
import { JsonFileStore, MutationQueue } from "../storage/json-file-store.js";

export const OptionLegSchema = Type.Object({
  type: Type.Union([Type.Literal("call"), Type.Literal("put")]),
  side: Type.Union([Type.Literal("long"), Type.Literal("short")]),
  strike: Type.Number({ minimum: 0 }),
  premium: Type.Number({ minimum: 0 }),
  contracts: Type.Integer({ minimum: 1 }),
  multiplier: Type.Number({ exclusiveMinimum: 0 }),
});

export const StrategyKindSchema = Type.Union([
  Type.Literal("singleCall"),
  Type.Literal("singlePut"),
  Type.Literal("bullCallSpread"),
]);

export const SavedStrategySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  createdAt: Type.String(), // ISO 8601
  kind: StrategyKindSchema,
  symbol: Type.String({ minLength: 1 }),
  expiration: Type.Optional(Type.String()),
  legs: Type.Array(OptionLegSchema, { minItems: 1 }),
  marketPriceAtSave: Type.Optional(Type.Number()),
  note: Type.Optional(Type.String()),
});

const StrategiesFileSchema = Type.Object({
  version: Type.Literal(1),
  strategies: Type.Array(SavedStrategySchema),
});

export type SavedStrategy = Static<typeof SavedStrategySchema>;
type StrategiesFile = Static<typeof StrategiesFileSchema>;

export interface NewStrategy {
  kind: StrategyKind;
  symbol: string;
  expiration?: string;
  legs: LegInput[];
  marketPriceAtSave?: number;
  note?: string;
}

export interface StrategyStoreOptions {
  clock?: () => Date;
  generateId?: () => string;
}

/** Strategies the user chose to keep, newest last in the file. */
export class StrategyStore {
  private data: StrategiesFile;
  private readonly file: JsonFileStore<typeof StrategiesFileSchema>;
  private readonly queue = new MutationQueue();
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  private constructor(
    file: JsonFileStore<typeof StrategiesFileSchema>,
    data: StrategiesFile,
    options: StrategyStoreOptions,
  ) {
    this.file = file;
    this.data = data;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  static async create(
    dataDir: string = defaultDataDir(),
    options: StrategyStoreOptions = {},
  ): Promise<StrategyStore> {
    const file = new JsonFileStore(dataDir, "strategies.json", StrategiesFileSchema, () => ({
      version: 1 as const,
      strategies: [],
    }));
    const data = await file.read();
    return new StrategyStore(file, data, options);
  }

  getPath(): string {
    return this.file.getPath();
  }

  list(): SavedStrategy[] {
    return this.data.strategies.map((s) => structuredClone(s));
  }

  get(id: string): SavedStrategy | undefined {
    const found = this.data.strategies.find((s) => s.id === id);
    return found ? structuredClone(found) : undefined;
  }

  /** Legs are clamped the same way the payoff engine's builders clamp them. */
  async save(input: NewStrategy): Promise<SavedStrategy> {
    const symbol = normalizeSymbol(input.symbol);
    if (!symbol) {
      throw new Error("Strategy symbol is required");
    }
    if (input.legs.length === 0) {
      throw new Error("A strategy needs at least one leg");
    }
    if (input.expiration !== undefined && !isExpirationDate(input.expiration)) {
      throw new Error(`Invalid expiration: ${input.expiration}`);
    }

    const strategy: SavedStrategy = {
      id: this.generateId(),
      createdAt: this.clock().toISOString(),
      kind: input.kind,
      symbol,
      legs: input.legs.map((leg) => ({ ...makeLeg(leg) })),
      ...(input.expiration !== undefined ? { expiration: input.expiration } : {}),
      ...(input.marketPriceAtSave !== undefined ? { marketPriceAtSave: input.marketPriceAtSave } : {}),
      ...(input.note ? { note: input.note } : {}),
    };
    await this.commit((draft) => {
      draft.strategies.push(strategy);
      return true;
    });
    return structuredClone(strategy);
  }

  async remove(id: string): Promise<boolean> {
    return this.commit((draft) => {
      const idx = draft.strategies.findIndex((s) => s.id === id);
      if (idx === -1) {
        return false;
      }
      draft.strategies.splice(idx, 1);
      return true;
    });
  }

  /**
   * Change a copy and write it; memory only moves on once the write lands.
   * `mutate` returns false when there is nothing to write.
   */
  private commit(mutate: (draft: StrategiesFile) => boolean): Promise<boolean> {
    return this.queue.run(async () => {
      const draft = structuredClone(this.data);
      if (!mutate(draft)) {
        return false;
      }
      await this.file.write(draft);
      this.data = draft;
      return true;
    });
  }
}
