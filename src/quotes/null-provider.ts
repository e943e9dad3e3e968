import { emptyChain, type OptionChainData } from "../options/options-chain.js";
import { QuoteError, normalizeSymbol, type QuoteProvider } from "./quote-provider.js";

/** Used until a data source is configured: no prices, empty chains. */
export class NullQuoteProvider implements QuoteProvider {
  readonly name = "none";

  async fetchDelayedPrice(symbol: string): Promise<number> {
    throw new QuoteError("notFound", `No data source configured for ${normalizeSymbol(symbol)}`);
  }

  async fetchOptionChain(_symbol: string, expiration?: string): Promise<OptionChainData> {
    return emptyChain(expiration ? [expiration] : []);
  }
}
