import { Type, type Static } from "@sinclair/typebox";
import { makeLeg, type OptionLeg } from "../../options/option-leg.js";
import { metrics, payoffCurve, totalDebit } from "../../options/payoff-engine.js";
import { scenarios } from "../../options/scenario-engine.js";
import { internalError, parseParams, type GatewayRequestHandlers } from "./types.js";

const LegParams = Type.Object({
  type: Type.Union([Type.Literal("call"), Type.Literal("put")]),
  side: Type.Union([Type.Literal("long"), Type.Literal("short")]),
  strike: Type.Number({ minimum: 0 }),
  premium: Type.Number({ minimum: 0 }),
  contracts: Type.Optional(Type.Integer({ minimum: 1 })),
  multiplier: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
});

const LegsParams = Type.Object({
  legs: Type.Array(LegParams),
  centerPrice: Type.Number({ minimum: 0 }),
});

const CurveParams = Type.Object({
  legs: Type.Array(LegParams),
  centerPrice: Type.Number({ minimum: 0 }),
  widthFactor: Type.Optional(Type.Number({ minimum: 0 })),
  steps: Type.Optional(Type.Integer({ minimum: 1, maximum: 2_000 })),
});

const ScenarioParams = Type.Object({
  legs: Type.Array(LegParams),
  centerPrice: Type.Number({ minimum: 0 }),
  upPct: Type.Number({ minimum: 0 }),
  downPct: Type.Number({ minimum: 0, maximum: 1 }),
});

function toLegs(legs: Static<typeof LegParams>[]): OptionLeg[] {
  return legs.map((leg) => makeLeg(leg));
}

/** Pure payoff math over caller-supplied legs; no stored state involved. */
export const payoffHandlers: GatewayRequestHandlers = {
  "payoff.metrics": ({ params, respond }) => {
    const request = parseParams(LegsParams, params, respond);
    if (!request) {
      return;
    }
    try {
      const legs = toLegs(request.legs);
      respond(true, { totalDebit: totalDebit(legs), ...metrics(legs, request.centerPrice) });
    } catch (err) {
      respond(false, undefined, internalError(err));
    }
  },

  "payoff.curve": ({ params, respond }) => {
    const request = parseParams(CurveParams, params, respond);
    if (!request) {
      return;
    }
    try {
      const points = [
        ...payoffCurve(
          toLegs(request.legs),
          request.centerPrice,
          request.widthFactor ?? 0.5,
          request.steps ?? 100,
        ),
      ];
      respond(true, { points });
    } catch (err) {
      respond(false, undefined, internalError(err));
    }
  },

  "payoff.scenarios": ({ params, respond }) => {
    const request = parseParams(ScenarioParams, params, respond);
    if (!request) {
      return;
    }
    try {
      const legs = toLegs(request.legs);
      respond(true, {
        scenarios: scenarios(legs, request.centerPrice, request.upPct, request.downPct),
      });
    } catch (err) {
      respond(false, undefined, internalError(err));
    }
  },
};
