export type {
  OptionLeg,
  OptionType,
  OptionSide,
  PayoffPoint,
  LegInput,
  StrategyKind,
} from "./option-leg.js";
export {
  DEFAULT_MULTIPLIER,
  makeLeg,
  singleCall,
  singlePut,
  bullCallSpread,
  formatOptionSymbol,
} from "./option-leg.js";
export type { OptionContract, OptionChainData, MarketReferences } from "./options-chain.js";
export {
  STRIKE_TOLERANCE,
  contractMid,
  marketReferences,
  findContract,
  buildChainData,
  emptyChain,
  generateChain,
  generateStrikes,
} from "./options-chain.js";
export {
  calcPremium,
  calcDaysToExpiry,
  calcIntrinsicValue,
  calcTimeValue,
  getImpliedVol,
  expiryInstant,
  isExpired,
  isExpirationDate,
  calendarDayKey,
  isSameCalendarDay,
  roundToCents,
} from "./options-pricing.js";
export type { PayoffMetrics } from "./payoff-engine.js";
export {
  totalDebit,
  payoff,
  legPayoff,
  legPerSharePL,
  payoffCurve,
  upsideSlope,
  findBreakevens,
  metrics,
} from "./payoff-engine.js";
export type {
  ScenarioResult,
  ScenarioLegBreakdown,
  ScenarioPair,
  ScenarioDirection,
} from "./scenario-engine.js";
export { scenarios, legFromOrder } from "./scenario-engine.js";
export { formatMoney, formatNumber } from "./format.js";
