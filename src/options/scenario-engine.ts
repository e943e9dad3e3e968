import type { OptionLeg } from "./option-leg.js";
import { makeLeg } from "./option-leg.js";
import { formatMoney, formatNumber } from "./format.js";
import { calcIntrinsicValue } from "./options-pricing.js";

export type ScenarioDirection = "up" | "down";

export interface ScenarioLegBreakdown {
  title: string;
  intrinsic: number; // per share
  perSharePL: number;
  legPL: number;
  intrinsicExplanation: string;
  perShareExplanation: string;
  legPLExplanation: string;
}

export interface ScenarioResult {
  direction: ScenarioDirection;
  label: string;
  underlying: number;
  legs: ScenarioLegBreakdown[];
  totalPL: number;
}

/** Ordered by total P/L, higher first. */
export type ScenarioPair = [ScenarioResult, ScenarioResult];

function breakdownLeg(leg: OptionLeg, underlying: number): ScenarioLegBreakdown {
  const intrinsic = calcIntrinsicValue(underlying, leg.strike, leg.type);
  const rawPerShare = intrinsic - leg.premium;
  const perSharePL = leg.side === "long" ? rawPerShare : -rawPerShare;
  const legPL = perSharePL * leg.contracts * leg.multiplier;

  const S = formatNumber(underlying);
  const K = formatNumber(leg.strike);
  const sideText = leg.side === "long" ? "Long" : "Short";
  const typeText = leg.type === "call" ? "Call" : "Put";

  const intrinsicExplanation =
    leg.type === "call"
      ? `Intrinsic = max(0, S − K) = max(0, ${S} − ${K}) = ${formatNumber(intrinsic)}`
      : `Intrinsic = max(0, K − S) = max(0, ${K} − ${S}) = ${formatNumber(intrinsic)}`;

  const base = `Per-share P/L = Intrinsic − Premium = ${formatNumber(intrinsic)} − ${formatNumber(leg.premium)} = ${formatNumber(rawPerShare)}`;
  const perShareExplanation =
    leg.side === "long"
      ? base
      : `${base}; short flips sign: −(${formatNumber(rawPerShare)}) = ${formatNumber(perSharePL)}`;

  return {
    title: `${sideText} ${typeText} K=${K} Prem=${formatNumber(leg.premium)} ×${leg.contracts}`,
    intrinsic,
    perSharePL,
    legPL,
    intrinsicExplanation,
    perShareExplanation,
    legPLExplanation: `Leg P/L = per-share × contracts × multiplier = ${formatNumber(perSharePL)} × ${leg.contracts} × ${formatNumber(leg.multiplier)} = ${formatMoney(legPL)}`,
  };
}

function evaluate(
  legs: readonly OptionLeg[],
  underlying: number,
  direction: ScenarioDirection,
): ScenarioResult {
  const breakdown = legs.map((leg) => breakdownLeg(leg, underlying));
  const totalPL = breakdown.reduce((sum, leg) => sum + leg.legPL, 0);
  return { direction, label: "", underlying, legs: breakdown, totalPL };
}

function labelFor(a: ScenarioResult, b: ScenarioResult): string {
  if (a.totalPL > 0 && b.totalPL <= 0) {
    return "Money-making scenario";
  }
  if (a.totalPL <= 0 && b.totalPL > 0) {
    return "Money-losing scenario";
  }
  if (a.totalPL > b.totalPL) {
    return "More profitable scenario";
  }
  if (a.totalPL < b.totalPL) {
    return "Less profitable scenario";
  }
  return "Scenario";
}

/**
 * Two-outcome what-if at center·(1+upPct) and center·(1−downPct), both
 * floored at zero. The scenario with the strictly higher total P/L comes
 * first; on a tie the up-move stays first.
 */
export function scenarios(
  legs: readonly OptionLeg[],
  centerPrice: number,
  upPct: number,
  downPct: number,
): ScenarioPair {
  const up = evaluate(legs, Math.max(0, centerPrice * (1 + upPct)), "up");
  const down = evaluate(legs, Math.max(0, centerPrice * (1 - downPct)), "down");
  const [first, second] = down.totalPL > up.totalPL ? [down, up] : [up, down];
  return [
    { ...first, label: labelFor(first, second) },
    { ...second, label: labelFor(second, first) },
  ];
}

/**
 * Single leg for a saved order. Premium falls back from the fill price to the
 * limit to the market mid; undefined when none is known.
 */
export function legFromOrder(
  order: {
    right: "call" | "put";
    side: "buy" | "sell";
    strike: number;
    quantity: number;
    limit?: number;
    fillPrice?: number;
    fillQuantity?: number;
  },
  marketMid?: number,
): OptionLeg | undefined {
  const premium = order.fillPrice ?? order.limit ?? marketMid;
  if (premium === undefined) {
    return undefined;
  }
  return makeLeg({
    type: order.right,
    side: order.side === "buy" ? "long" : "short",
    strike: order.strike,
    premium,
    contracts: Math.max(1, order.fillQuantity ?? order.quantity),
  });
}
