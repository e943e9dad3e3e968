/**
 * Pricing and calendar helpers shared by the payoff engine, the simulated
 * quote provider and the order monitor.
 *
 * Synthetic premium = intrinsicValue + timeValue, where
 * time value = referencePrice × impliedVol × sqrt(daysToExpiry / 365).
 */
import type { OptionType } from "./option-leg.js";

/** Fixed IV tiers by stock category. */
const IV_OVERRIDES: Record<string, number> = {
  // Blue chips / mega caps
  AAPL: 0.25,
  MSFT: 0.25,
  GOOGL: 0.25,
  AMZN: 0.3,
  META: 0.3,
  SPY: 0.18,
  QQQ: 0.22,
  // Growth / high-vol
  TSLA: 0.45,
  NVDA: 0.45,
  AMD: 0.45,
  COIN: 0.6,
};

const DEFAULT_IV = 0.35;
const MS_PER_DAY = 1000 * 60 * 60 * 24;

export function getImpliedVol(ticker: string): number {
  return IV_OVERRIDES[ticker.toUpperCase()] ?? DEFAULT_IV;
}

/** Intrinsic value per share at expiration. */
export function calcIntrinsicValue(
  underlyingPrice: number,
  strikePrice: number,
  type: OptionType,
): number {
  if (type === "call") {
    return Math.max(underlyingPrice - strikePrice, 0);
  }
  return Math.max(strikePrice - underlyingPrice, 0);
}

export function calcTimeValue(
  underlyingPrice: number,
  impliedVol: number,
  daysToExpiry: number,
): number {
  if (daysToExpiry <= 0) {
    return 0;
  }
  return underlyingPrice * impliedVol * Math.sqrt(daysToExpiry / 365);
}

export function calcPremium(
  underlyingPrice: number,
  strikePrice: number,
  daysToExpiry: number,
  impliedVol: number,
  type: OptionType,
): number {
  const intrinsic = calcIntrinsicValue(underlyingPrice, strikePrice, type);
  const time = calcTimeValue(underlyingPrice, impliedVol, daysToExpiry);
  return intrinsic + time;
}

/** Instant an expiration date stops trading: 4pm ET market close. */
export function expiryInstant(expiration: string): Date {
  return new Date(`${expiration}T16:00:00-05:00`);
}

export function calcDaysToExpiry(expiration: string, now: Date = new Date()): number {
  const diffMs = expiryInstant(expiration).getTime() - now.getTime();
  return Math.max(0, diffMs / MS_PER_DAY);
}

export function isExpired(expiration: string, now: Date = new Date()): boolean {
  return expiryInstant(expiration).getTime() < now.getTime();
}

/** Calendar day ("YYYY-MM-DD") of an instant in the given time zone. */
export function calendarDayKey(date: Date, timeZone: string): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(date);
}

export function isSameCalendarDay(a: Date, b: Date, timeZone: string): boolean {
  return calendarDayKey(a, timeZone) === calendarDayKey(b, timeZone);
}

export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

const EXPIRATION_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isExpirationDate(value: string): boolean {
  return EXPIRATION_PATTERN.test(value) && !Number.isNaN(expiryInstant(value).getTime());
}
