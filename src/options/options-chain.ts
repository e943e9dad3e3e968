import type { OptionType } from "./option-leg.js";
import { calcDaysToExpiry, calcPremium, getImpliedVol, roundToCents } from "./options-pricing.js";

/** Strikes closer than this are the same contract. */
export const STRIKE_TOLERANCE = 1e-4;

/** Quote fields are optional; providers fill in what they have. */
export interface OptionContract {
  kind: OptionType;
  strike: number;
  bid?: number;
  ask?: number;
  last?: number;
}

export interface OptionChainData {
  expirations: string[]; // YYYY-MM-DD, ascending
  callStrikes: number[];
  putStrikes: number[];
  callContracts: OptionContract[];
  putContracts: OptionContract[];
}

export interface MarketReferences {
  bid?: number;
  ask?: number;
  mid?: number;
}

/**
 * Midpoint with fallbacks: average of bid/ask when both are positive, then
 * bid, then ask, then last.
 */
export function contractMid(contract: Pick<OptionContract, "bid" | "ask" | "last">): number | undefined {
  const { bid, ask, last } = contract;
  if (bid !== undefined && ask !== undefined && bid > 0 && ask > 0) {
    return (bid + ask) / 2;
  }
  return bid ?? ask ?? last;
}

export function marketReferences(contract: OptionContract | undefined): MarketReferences {
  if (!contract) {
    return {};
  }
  return { bid: contract.bid, ask: contract.ask, mid: contractMid(contract) };
}

export function findContract(
  chain: OptionChainData,
  right: OptionType,
  strike: number,
): OptionContract | undefined {
  const contracts = right === "call" ? chain.callContracts : chain.putContracts;
  return contracts.find((c) => Math.abs(c.strike - strike) < STRIKE_TOLERANCE);
}

function uniqueSorted(values: number[]): number[] {
  return [...new Set(values)].toSorted((a, b) => a - b);
}

/** Assemble chain data from contract lists, deriving the strike sets. */
export function buildChainData(
  expirations: string[],
  contracts: OptionContract[],
): OptionChainData {
  const byStrike = (a: OptionContract, b: OptionContract) => a.strike - b.strike;
  const callContracts = contracts.filter((c) => c.kind === "call").toSorted(byStrike);
  const putContracts = contracts.filter((c) => c.kind === "put").toSorted(byStrike);
  return {
    expirations: [...new Set(expirations)].toSorted(),
    callStrikes: uniqueSorted(callContracts.map((c) => c.strike)),
    putStrikes: uniqueSorted(putContracts.map((c) => c.strike)),
    callContracts,
    putContracts,
  };
}

export function emptyChain(expirations: string[] = []): OptionChainData {
  return buildChainData(expirations, []);
}

/**
 * Strike prices centered around the reference price.
 * Spacing: <$50→$1, <$200→$5, <$500→$10, ≥$500→$25
 */
export function generateStrikes(referencePrice: number, count = 10): number[] {
  let step: number;
  if (referencePrice < 50) {
    step = 1;
  } else if (referencePrice < 200) {
    step = 5;
  } else if (referencePrice < 500) {
    step = 10;
  } else {
    step = 25;
  }

  const center = Math.round(referencePrice / step) * step;
  const strikes: number[] = [];
  for (let i = -count; i <= count; i++) {
    const strike = center + i * step;
    if (strike > 0) {
      strikes.push(strike);
    }
  }
  return strikes;
}

export interface SyntheticChainOptions {
  /** Fraction of the theoretical premium quoted on each side, e.g. 0.05 → ±5%. */
  halfSpread?: number;
  now?: Date;
}

/**
 * Synthetic chain for one expiration: every strike is quoted around
 * intrinsic + time value with a symmetric bid/ask spread. Bids never go
 * below one cent.
 */
export function generateChain(
  ticker: string,
  referencePrice: number,
  expiration: string,
  options: SyntheticChainOptions = {},
): OptionChainData {
  const halfSpread = options.halfSpread ?? 0.05;
  const iv = getImpliedVol(ticker);
  const dte = calcDaysToExpiry(expiration, options.now);

  const contracts: OptionContract[] = [];
  for (const strike of generateStrikes(referencePrice)) {
    for (const kind of ["call", "put"] as const) {
      const premium = calcPremium(referencePrice, strike, dte, iv, kind);
      contracts.push({
        kind,
        strike,
        bid: Math.max(0.01, roundToCents(premium * (1 - halfSpread))),
        ask: Math.max(0.01, roundToCents(premium * (1 + halfSpread))),
        last: roundToCents(premium),
      });
    }
  }
  return buildChainData([expiration], contracts);
}
