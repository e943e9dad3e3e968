import type { OptionChainData } from "../options/options-chain.js";

export type QuoteErrorKind = "unauthorized" | "network" | "notFound";

export class QuoteError extends Error {
  readonly kind: QuoteErrorKind;

  constructor(kind: QuoteErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QuoteError";
    this.kind = kind;
  }
}

export function isQuoteError(err: unknown): err is QuoteError {
  return err instanceof QuoteError;
}

/** Source of delayed prices and option chain snapshots. */
export interface QuoteProvider {
  readonly name: string;
  fetchDelayedPrice(symbol: string): Promise<number>;
  /** `expiration` is YYYY-MM-DD; omitted means the nearest listed one. */
  fetchOptionChain(symbol: string, expiration?: string): Promise<OptionChainData>;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
