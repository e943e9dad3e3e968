import type { OptionChainData } from "../options/options-chain.js";
import { normalizeSymbol, type QuoteProvider } from "./quote-provider.js";

const CACHE_TTL_MS = 30_000; // 30 seconds

interface CachedPrice {
  price: number;
  timestamp: number;
}

/**
 * Caches delayed underlying prices for a short TTL. Option chains always go
 * to the wrapped provider so fill decisions see the latest quotes.
 */
export class CachedQuoteProvider implements QuoteProvider {
  private cache = new Map<string, CachedPrice>();
  private readonly inner: QuoteProvider;
  private readonly ttlMs: number;
  private readonly clock: () => number;

  constructor(inner: QuoteProvider, options: { ttlMs?: number; clock?: () => number } = {}) {
    this.inner = inner;
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS;
    this.clock = options.clock ?? Date.now;
  }

  get name(): string {
    return this.inner.name;
  }

  clearCache(): void {
    this.cache.clear();
  }

  async fetchDelayedPrice(symbol: string): Promise<number> {
    const key = normalizeSymbol(symbol);
    const cached = this.cache.get(key);
    if (cached && this.clock() - cached.timestamp < this.ttlMs) {
      return cached.price;
    }

    const price = await this.inner.fetchDelayedPrice(key);
    this.cache.set(key, { price, timestamp: this.clock() });
    return price;
  }

  fetchOptionChain(symbol: string, expiration?: string): Promise<OptionChainData> {
    return this.inner.fetchOptionChain(symbol, expiration);
  }
}
