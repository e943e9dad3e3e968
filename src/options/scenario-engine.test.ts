import { describe, it, expect } from "vitest";
import { makeLeg, singleCall, singlePut } from "./option-leg.js";
import { legFromOrder, scenarios } from "./scenario-engine.js";

describe("scenarios", () => {
  it("should put the winning move first and explain each step", () => {
    const [first, second] = scenarios(singleCall(200, 10), 200, 0.5, 0.5);

    expect(first.direction).toBe("up");
    expect(first.label).toBe("Money-making scenario");
    expect(first.underlying).toBe(300);
    expect(first.totalPL).toBe(9000);
    expect(first.legs).toEqual([
      {
        title: "Long Call K=200 Prem=10 ×1",
        intrinsic: 100,
        perSharePL: 90,
        legPL: 9000,
        intrinsicExplanation: "Intrinsic = max(0, S − K) = max(0, 300 − 200) = 100",
        perShareExplanation: "Per-share P/L = Intrinsic − Premium = 100 − 10 = 90",
        legPLExplanation:
          "Leg P/L = per-share × contracts × multiplier = 90 × 1 × 100 = $9,000.00",
      },
    ]);

    expect(second.direction).toBe("down");
    expect(second.label).toBe("Money-losing scenario");
    expect(second.underlying).toBe(100);
    expect(second.totalPL).toBe(-1000);
    expect(second.legs[0].legPLExplanation).toBe(
      "Leg P/L = per-share × contracts × multiplier = -10 × 1 × 100 = -$1,000.00",
    );
  });

  it("should order the down move first when it pays more", () => {
    const [first, second] = scenarios(singlePut(100, 4), 100, 0.5, 0.5);

    expect(first.direction).toBe("down");
    expect(first.totalPL).toBe(4600);
    expect(first.label).toBe("Money-making scenario");
    expect(second.direction).toBe("up");
    expect(second.totalPL).toBe(-400);
    expect(second.label).toBe("Money-losing scenario");
  });

  it("should spell out the sign flip for short legs", () => {
    const [up, down] = scenarios(singlePut(100, 4, 1, "short"), 100, 0.5, 0.5);

    expect(up.legs[0].title).toBe("Short Put K=100 Prem=4 ×1");
    expect(up.totalPL).toBe(400);
    expect(down.legs[0].intrinsicExplanation).toBe(
      "Intrinsic = max(0, K − S) = max(0, 100 − 50) = 50",
    );
    expect(down.legs[0].perShareExplanation).toBe(
      "Per-share P/L = Intrinsic − Premium = 50 − 4 = 46; short flips sign: −(46) = -46",
    );
    expect(down.totalPL).toBe(-4600);
  });

  it("should compare profits when both moves make money", () => {
    const [first, second] = scenarios(singleCall(20, 1), 100, 0.5, 0.5);

    expect(first.totalPL).toBe(12900);
    expect(first.label).toBe("More profitable scenario");
    expect(second.totalPL).toBe(2900);
    expect(second.label).toBe("Less profitable scenario");
  });

  it("should keep the up move first on a tie", () => {
    const [first, second] = scenarios(singleCall(200, 5), 100, 0.5, 0.5);

    expect(first.direction).toBe("up");
    expect(first.totalPL).toBe(-500);
    expect(second.totalPL).toBe(-500);
    expect(first.label).toBe("Scenario");
    expect(second.label).toBe("Scenario");
  });

  it("should floor the down move at zero", () => {
    const [, down] = scenarios(singleCall(200, 5), 100, 0.5, 1.5);
    expect(down.underlying).toBe(0);
  });

  it("should total every leg", () => {
    const legs = [
      makeLeg({ type: "call", side: "long", strike: 100, premium: 5 }),
      makeLeg({ type: "call", side: "short", strike: 110, premium: 2 }),
    ];
    const [up] = scenarios(legs, 100, 0.5, 0.5);

    expect(up.legs.map((leg) => leg.legPL)).toEqual([4500, -3800]);
    expect(up.totalPL).toBe(700);
  });
});

describe("legFromOrder", () => {
  const base = { right: "call" as const, side: "buy" as const, strike: 100, quantity: 2 };

  it("should prefer the fill price and quantity", () => {
    const leg = legFromOrder({ ...base, limit: 3, fillPrice: 2.5, fillQuantity: 1 }, 4);
    expect(leg).toMatchObject({ premium: 2.5, contracts: 1, side: "long", type: "call" });
  });

  it("should fall back to the limit, then the market mid", () => {
    expect(legFromOrder({ ...base, limit: 3 }, 4)?.premium).toBe(3);
    expect(legFromOrder(base, 4)?.premium).toBe(4);
    expect(legFromOrder(base, 4)?.contracts).toBe(2);
  });

  it("should return undefined without any premium source", () => {
    expect(legFromOrder(base)).toBeUndefined();
  });

  it("should map sells to short legs", () => {
    expect(legFromOrder({ ...base, side: "sell", limit: 1 })?.side).toBe("short");
  });
});
