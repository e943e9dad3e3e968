import { generateChain, type OptionChainData } from "../options/options-chain.js";
import { isExpirationDate } from "../options/options-pricing.js";
import { QuoteError, normalizeSymbol, type QuoteProvider } from "./quote-provider.js";

/**
 * Paper-trading data source. Underlying prices come from a reference table;
 * chains are synthesized around them (intrinsic + time value, ±spread).
 */
export class SimulatedQuoteProvider implements QuoteProvider {
  readonly name = "simulated";
  private readonly prices = new Map<string, number>();
  private readonly halfSpread: number;
  private readonly clock: () => Date;

  constructor(
    referencePrices: Record<string, number> = {},
    options: { halfSpread?: number; clock?: () => Date } = {},
  ) {
    for (const [symbol, price] of Object.entries(referencePrices)) {
      this.setPrice(symbol, price);
    }
    this.halfSpread = options.halfSpread ?? 0.05;
    this.clock = options.clock ?? (() => new Date());
  }

  setPrice(symbol: string, price: number): void {
    this.prices.set(normalizeSymbol(symbol), price);
  }

  async fetchDelayedPrice(symbol: string): Promise<number> {
    const key = normalizeSymbol(symbol);
    const price = this.prices.get(key);
    if (price === undefined) {
      throw new QuoteError("notFound", `No reference price for ${key}`);
    }
    return price;
  }

  async fetchOptionChain(symbol: string, expiration?: string): Promise<OptionChainData> {
    if (!expiration || !isExpirationDate(expiration)) {
      throw new QuoteError("notFound", "Simulated chains need an explicit YYYY-MM-DD expiration");
    }
    const key = normalizeSymbol(symbol);
    const price = await this.fetchDelayedPrice(key);
    return generateChain(key, price, expiration, {
      halfSpread: this.halfSpread,
      now: this.clock(),
    });
  }
}
