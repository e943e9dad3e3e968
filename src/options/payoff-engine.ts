/**
 * Expiration payoff math for multi-leg option positions. Everything here is
 * pure; dollar amounts include contracts × multiplier.
 *
 * Sign convention: long legs pay premium (positive debit), short legs
 * collect it (negative debit).
 */
import type { OptionLeg, PayoffPoint } from "./option-leg.js";
import { calcIntrinsicValue } from "./options-pricing.js";

export interface PayoffMetrics {
  maxLoss: number;
  /** Undefined when upside is unlimited. */
  maxGain?: number;
  /** The crossing nearest the center price. */
  breakeven?: number;
  breakevens: number[];
}

const METRICS_WIDTH_FACTOR = 0.8;
const METRICS_STEPS = 200;

function sideSign(leg: OptionLeg): 1 | -1 {
  return leg.side === "long" ? 1 : -1;
}

/** Net debit (positive) or credit (negative) across all legs. */
export function totalDebit(legs: readonly OptionLeg[]): number {
  return legs.reduce(
    (sum, leg) => sum + sideSign(leg) * leg.premium * leg.contracts * leg.multiplier,
    0,
  );
}

/** Per-share P/L of one leg at expiration. */
export function legPerSharePL(leg: OptionLeg, underlyingPrice: number): number {
  const intrinsic = calcIntrinsicValue(underlyingPrice, leg.strike, leg.type);
  return sideSign(leg) * (intrinsic - leg.premium);
}

export function legPayoff(leg: OptionLeg, underlyingPrice: number): number {
  return legPerSharePL(leg, underlyingPrice) * leg.contracts * leg.multiplier;
}

export function payoff(legs: readonly OptionLeg[], underlyingPrice: number): number {
  return legs.reduce((sum, leg) => sum + legPayoff(leg, underlyingPrice), 0);
}

/**
 * `steps + 1` evenly spaced samples over [center·(1−w), center·(1+w)], both
 * bounds included. The lower bound is floored at zero. Each call returns a
 * new generator.
 */
export function* payoffCurve(
  legs: readonly OptionLeg[],
  center: number,
  widthFactor: number,
  steps: number,
): Generator<PayoffPoint, void, undefined> {
  const n = Math.max(1, Math.floor(steps));
  const lower = Math.max(0, center * (1 - widthFactor));
  const upper = center * (1 + widthFactor);
  const stepSize = (upper - lower) / n;

  for (let i = 0; i <= n; i++) {
    const underlying = i === n ? upper : lower + i * stepSize;
    yield { underlying, profitLoss: payoff(legs, underlying) };
  }
}

/**
 * Slope of the payoff as the underlying goes to infinity, in dollars per
 * dollar. Only calls contribute; a positive value means unlimited upside.
 */
export function upsideSlope(legs: readonly OptionLeg[]): number {
  return legs
    .filter((leg) => leg.type === "call")
    .reduce((sum, leg) => sum + sideSign(leg) * leg.contracts * leg.multiplier, 0);
}

/**
 * Sampled curve plus the domain floor (0) and every strike. The payoff is
 * piecewise linear with kinks only at strikes, so extremes and crossings
 * between samples are exact.
 */
function samplePoints(legs: readonly OptionLeg[], center: number): PayoffPoint[] {
  const byPrice = new Map<number, PayoffPoint>();
  for (const point of payoffCurve(legs, center, METRICS_WIDTH_FACTOR, METRICS_STEPS)) {
    byPrice.set(point.underlying, point);
  }
  for (const price of [0, ...legs.map((leg) => leg.strike)]) {
    if (!byPrice.has(price)) {
      byPrice.set(price, { underlying: price, profitLoss: payoff(legs, price) });
    }
  }
  return [...byPrice.values()].toSorted((a, b) => a.underlying - b.underlying);
}

/** Every zero crossing along the sampled points, ascending and de-duplicated. */
export function findBreakevens(points: readonly PayoffPoint[]): number[] {
  const crossings: number[] = [];
  const push = (x: number) => {
    if (crossings.length === 0 || Math.abs(crossings[crossings.length - 1] - x) > 1e-9) {
      crossings.push(x);
    }
  };

  for (let i = 0; i < points.length; i++) {
    const { underlying: x2, profitLoss: y2 } = points[i];
    if (y2 === 0) {
      push(x2);
      continue;
    }
    if (i === 0) {
      continue;
    }
    const { underlying: x1, profitLoss: y1 } = points[i - 1];
    if (y1 !== 0 && Math.sign(y1) !== Math.sign(y2)) {
      push(x1 + ((x2 - x1) * -y1) / (y2 - y1));
    }
  }
  return crossings;
}

/** Nearest to `center`; ties go to the lower price. */
function nearestTo(center: number, candidates: readonly number[]): number | undefined {
  let best: number | undefined;
  for (const x of candidates) {
    if (best === undefined || Math.abs(x - center) < Math.abs(best - center)) {
      best = x;
    }
  }
  return best;
}

/**
 * Max loss, max gain and breakeven derived numerically around `center`.
 *
 * Sampling covers [0, 1.8 × center] plus every strike. For strategies whose
 * loss keeps growing above that range (net short calls), `maxLoss` is the
 * worst sampled value, not the true floor.
 */
export function metrics(legs: readonly OptionLeg[], center: number): PayoffMetrics {
  if (legs.length === 0) {
    return { maxLoss: 0, maxGain: 0, breakevens: [] };
  }
  const points = samplePoints(legs, Math.max(0.01, center));
  const values = points.map((p) => p.profitLoss);
  const maxLoss = Math.min(...values);
  const maxGain = upsideSlope(legs) > 0 ? undefined : Math.max(...values);
  const breakevens = findBreakevens(points);

  return {
    maxLoss,
    ...(maxGain !== undefined ? { maxGain } : {}),
    ...(breakevens.length > 0 ? { breakeven: nearestTo(center, breakevens) } : {}),
    breakevens,
  };
}
