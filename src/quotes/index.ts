export { QuoteError, isQuoteError, normalizeSymbol } from "./quote-provider.js";
export type { QuoteProvider, QuoteErrorKind } from "./quote-provider.js";
export { NullQuoteProvider } from "./null-provider.js";
export { CachedQuoteProvider } from "./cached-provider.js";
export { ManualQuoteProvider, ManualMarketDataStore } from "./manual-provider.js";
export { SimulatedQuoteProvider } from "./simulated-provider.js";
