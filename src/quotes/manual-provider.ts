import { Type, type Static } from "@sinclair/typebox";
import {
  STRIKE_TOLERANCE,
  buildChainData,
  emptyChain,
  type OptionChainData,
  type OptionContract,
} from "../options/options-chain.js";
import { isExpirationDate } from "../options/options-pricing.js";
import { JsonFileStore, MutationQueue } from "../storage/json-file-store.js";
import { QuoteError, normalizeSymbol, type QuoteProvider } from "./quote-provider.js";

const StoredContractSchema = Type.Object({
  kind: Type.Union([Type.Literal("call"), Type.Literal("put")]),
  strike: Type.Number({ minimum: 0 }),
  bid: Type.Optional(Type.Number({ minimum: 0 })),
  ask: Type.Optional(Type.Number({ minimum: 0 })),
  last: Type.Optional(Type.Number({ minimum: 0 })),
});

const ManualMarketDataSchema = Type.Object({
  version: Type.Literal(1),
  underlyings: Type.Record(Type.String(), Type.Number({ minimum: 0 })),
  // symbol → expiration (YYYY-MM-DD) → contracts
  chains: Type.Record(Type.String(), Type.Record(Type.String(), Type.Array(StoredContractSchema))),
});

type ManualMarketData = Static<typeof ManualMarketDataSchema>;

const FILE_NAME = "manual-market-data.json";

function emptyData(): ManualMarketData {
  return { version: 1, underlyings: {}, chains: {} };
}

function assertExpiration(expiration: string): void {
  if (!isExpirationDate(expiration)) {
    throw new RangeError(`Expiration must be YYYY-MM-DD, got "${expiration}"`);
  }
}

/** Contracts shed undefined quote fields so the JSON stays compact. */
function toStored(contract: OptionContract): OptionContract {
  return {
    kind: contract.kind,
    strike: contract.strike,
    ...(contract.bid !== undefined ? { bid: contract.bid } : {}),
    ...(contract.ask !== undefined ? { ask: contract.ask } : {}),
    ...(contract.last !== undefined ? { last: contract.last } : {}),
  };
}

/** User-entered underlying prices and option chains, persisted to disk. */
export class ManualMarketDataStore {
  private data: ManualMarketData;
  private readonly file: JsonFileStore<typeof ManualMarketDataSchema>;
  private readonly queue = new MutationQueue();

  private constructor(file: JsonFileStore<typeof ManualMarketDataSchema>, data: ManualMarketData) {
    this.file = file;
    this.data = data;
  }

  static async create(dataDir: string): Promise<ManualMarketDataStore> {
    const file = new JsonFileStore(dataDir, FILE_NAME, ManualMarketDataSchema, emptyData);
    return new ManualMarketDataStore(file, await file.read());
  }

  /** Change a copy and write it; memory only moves on once the write lands. */
  private commit(mutate: (draft: ManualMarketData) => void): Promise<void> {
    return this.queue.run(async () => {
      const draft = structuredClone(this.data);
      mutate(draft);
      await this.file.write(draft);
      this.data = draft;
    });
  }

  async setUnderlying(symbol: string, price: number): Promise<void> {
    const key = normalizeSymbol(symbol);
    if (!key) {
      throw new RangeError("Symbol must not be empty");
    }
    await this.commit((draft) => {
      draft.underlyings[key] = price;
    });
  }

  getUnderlying(symbol: string): number | undefined {
    return this.data.underlyings[normalizeSymbol(symbol)];
  }

  /** Replace the whole chain for one expiration. */
  async setChain(symbol: string, expiration: string, contracts: OptionContract[]): Promise<void> {
    const key = normalizeSymbol(symbol);
    assertExpiration(expiration);
    await this.commit((draft) => {
      const byDate = draft.chains[key] ?? {};
      byDate[expiration] = contracts.map(toStored);
      draft.chains[key] = byDate;
    });
  }

  /** Insert or replace the contract with the same kind and strike. */
  async upsertContract(symbol: string, expiration: string, contract: OptionContract): Promise<void> {
    const key = normalizeSymbol(symbol);
    assertExpiration(expiration);
    await this.commit((draft) => {
      const byDate = draft.chains[key] ?? {};
      const contracts = (byDate[expiration] ?? []).filter(
        (c) => c.kind !== contract.kind || Math.abs(c.strike - contract.strike) >= STRIKE_TOLERANCE,
      );
      contracts.push(toStored(contract));
      byDate[expiration] = contracts.toSorted((a, b) => a.strike - b.strike);
      draft.chains[key] = byDate;
    });
  }

  getChainContracts(symbol: string, expiration: string): OptionContract[] | undefined {
    return this.data.chains[normalizeSymbol(symbol)]?.[expiration];
  }

  getExpirations(symbol: string): string[] {
    return Object.keys(this.data.chains[normalizeSymbol(symbol)] ?? {}).toSorted();
  }

  async clearAll(): Promise<void> {
    await this.commit((draft) => {
      draft.underlyings = {};
      draft.chains = {};
    });
  }
}

/** Quote provider backed by manually entered market data. */
export class ManualQuoteProvider implements QuoteProvider {
  readonly name = "manual";
  private readonly store: ManualMarketDataStore;

  constructor(store: ManualMarketDataStore) {
    this.store = store;
  }

  async fetchDelayedPrice(symbol: string): Promise<number> {
    const price = this.store.getUnderlying(symbol);
    if (price === undefined) {
      throw new QuoteError("notFound", `No manual price entered for ${normalizeSymbol(symbol)}`);
    }
    return price;
  }

  /**
   * Exact expiration match only. Without an expiration the earliest one is
   * used. An unknown expiration yields an empty chain listing the known ones.
   */
  async fetchOptionChain(symbol: string, expiration?: string): Promise<OptionChainData> {
    const expirations = this.store.getExpirations(symbol);
    const selected = expiration ?? expirations[0];
    const contracts = selected ? this.store.getChainContracts(symbol, selected) : undefined;
    if (!contracts) {
      return emptyChain(expirations);
    }
    return buildChainData(expirations, contracts);
  }
}
