export type OptionType = "call" | "put";
export type OptionSide = "long" | "short";

export const DEFAULT_MULTIPLIER = 100;

/** One option position within a strategy. Compared by value. */
export interface OptionLeg {
  readonly type: OptionType;
  readonly side: OptionSide;
  readonly strike: number;
  readonly premium: number; // per share
  readonly contracts: number; // integer ≥ 1
  readonly multiplier: number; // shares per contract
}

export interface PayoffPoint {
  underlying: number;
  profitLoss: number;
}

export interface LegInput {
  type: OptionType;
  side: OptionSide;
  strike: number;
  premium: number;
  contracts?: number;
  multiplier?: number;
}

/**
 * Build a leg with inputs clamped to the ranges the payoff engine assumes:
 * strike and premium ≥ 0, contracts a whole number ≥ 1, multiplier > 0.
 */
export function makeLeg(input: LegInput): OptionLeg {
  const multiplier = input.multiplier ?? DEFAULT_MULTIPLIER;
  return Object.freeze({
    type: input.type,
    side: input.side,
    strike: Math.max(0, input.strike),
    premium: Math.max(0, input.premium),
    contracts: Math.max(1, Math.round(input.contracts ?? 1)),
    multiplier: multiplier > 0 ? multiplier : DEFAULT_MULTIPLIER,
  });
}

// ── Strategy builders ──

export type StrategyKind = "singleCall" | "singlePut" | "bullCallSpread";

export function singleCall(
  strike: number,
  premium: number,
  contracts = 1,
  side: OptionSide = "long",
): OptionLeg[] {
  return [makeLeg({ type: "call", side, strike, premium, contracts })];
}

export function singlePut(
  strike: number,
  premium: number,
  contracts = 1,
  side: OptionSide = "long",
): OptionLeg[] {
  return [makeLeg({ type: "put", side, strike, premium, contracts })];
}

/** Long the lower-strike call, short the higher-strike call. */
export function bullCallSpread(params: {
  lowerStrike: number;
  lowerPremium: number;
  upperStrike: number;
  upperPremium: number;
  contracts?: number;
  multiplier?: number;
}): OptionLeg[] {
  const { contracts, multiplier } = params;
  return [
    makeLeg({
      type: "call",
      side: "long",
      strike: params.lowerStrike,
      premium: params.lowerPremium,
      contracts,
      multiplier,
    }),
    makeLeg({
      type: "call",
      side: "short",
      strike: params.upperStrike,
      premium: params.upperPremium,
      contracts,
      multiplier,
    }),
  ];
}

/** Format: "NVDA-260214-C-800" */
export function formatOptionSymbol(contract: {
  symbol: string;
  expiration?: string;
  right: OptionType;
  strike: number;
}): string {
  const dateStr = contract.expiration ? contract.expiration.replace(/-/g, "").slice(2) : "NOEXP";
  const typeChar = contract.right === "call" ? "C" : "P";
  return `${contract.symbol}-${dateStr}-${typeChar}-${contract.strike}`;
}
