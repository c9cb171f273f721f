import { describe, expect, it } from "vitest";
import { NotFoundError, ParseError, frequencySum, parseHand } from "@gto-broker/shared";
import { decodeOutput, parseActionLabel, parseOutput, solutionFromTable } from "../src/parser/outputParser";
import { createDialect, solverOutput } from "./utils/factories";

const dialect = createDialect();

describe("parseActionLabel", () => {
  it.each([
    ["CHECK", { type: "check" }],
    ["fold", { type: "fold" }],
    ["BET 3.3", { type: "bet", size: 3.3 }],
    ["RAISE 10", { type: "raise", size: 10 }],
    ["ALL-IN", { type: "allin" }],
    ["all_in", { type: "allin" }],
    ["bet:3.3", { type: "bet", size: 3.3 }]
  ])("reads %s", (label, expected) => {
    expect(parseActionLabel(label)).toEqual(expected);
  });

  it.each(["BET", "BET 0", "DONK 3", ""])("rejects %j", label => {
    expect(parseActionLabel(label)).toBeUndefined();
  });
});

describe("decodeOutput", () => {
  it("decodes a table into action keys", () => {
    const raw = solverOutput(
      {
        AhKd: { frequencies: { CHECK: 0.25, "BET 3.3": 0.75 }, ev: { CHECK: 1.5, "BET 3.3": 2 } },
        "Qs Qh": { frequencies: { CHECK: 1 }, ev: { CHECK: 0.8 } }
      },
      { exploitability: 0.4, iterations: 320 }
    );
    const solution = decodeOutput(raw, dialect);

    expect(solution.exploitability).toBe(0.4);
    expect(solution.iterations).toBe(320);
    expect(Object.keys(solution.strategies).sort()).toEqual(["AhKd", "QsQh"]);
    expect(solution.strategies.AhKd).toEqual({
      hand: "AhKd",
      frequencies: { check: 0.25, "bet:3.3": 0.75 },
      ev: { check: 1.5, "bet:3.3": 2 }
    });
    expect(Object.isFrozen(solution.strategies.AhKd.frequencies)).toBe(true);
  });

  it("renormalizes drift within the tolerance", () => {
    const raw = solverOutput({ AhKd: { frequencies: { CHECK: 0.5, "BET 3.3": 0.5005 }, ev: { CHECK: 1, "BET 3.3": 1 } } });
    const strategy = decodeOutput(raw, dialect, { tolerance: 0.001 }).strategies.AhKd;
    expect(frequencySum(strategy)).toBeCloseTo(1, 9);
    expect(strategy.frequencies.check).toBeCloseTo(0.5 / 1.0005, 9);
  });

  it("rejects sums beyond the tolerance", () => {
    const raw = solverOutput({ AhKd: { frequencies: { CHECK: 0.5, "BET 3.3": 0.75 }, ev: { CHECK: 1, "BET 3.3": 1 } } });
    expect(() => decodeOutput(raw, dialect, { tolerance: 0.001 })).toThrow("Frequencies for AhKd sum to 1.25");
  });

  it("requires an EV for every action that is played", () => {
    const played = solverOutput({ AhKd: { frequencies: { CHECK: 0.5, "BET 3.3": 0.5 }, ev: { CHECK: 1 } } });
    expect(() => decodeOutput(played, dialect)).toThrow("Missing EV for bet:3.3 with AhKd");

    const unplayed = solverOutput({ AhKd: { frequencies: { CHECK: 1, "BET 3.3": 0 }, ev: { CHECK: 1 } } });
    expect(decodeOutput(unplayed, dialect).strategies.AhKd.ev).toEqual({ check: 1 });
  });

  it("rejects truncated output", () => {
    const raw = solverOutput({ AhKd: { frequencies: { CHECK: 1 }, ev: { CHECK: 1 } } });
    const error = (() => {
      try {
        decodeOutput(raw.slice(0, raw.length / 2), dialect);
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(ParseError);
    expect(error instanceof ParseError ? error.message : "").toBe("Solver output is not valid JSON");
    expect(error instanceof ParseError ? error.rawExcerpt : "").toBe(raw.slice(0, raw.length / 2));
  });

  it("rejects output that does not match the dialect", () => {
    expect(() => decodeOutput(JSON.stringify({ exploitability: 0.1, iterations: 5 }), dialect)).toThrow(
      /^Solver output does not match dialect test-dialect: /
    );
    const outOfRange = solverOutput({ AhKd: { frequencies: { CHECK: 1.5 }, ev: { CHECK: 1 } } });
    expect(() => decodeOutput(outOfRange, dialect)).toThrow(ParseError);
  });

  it("rejects unknown labels and hands", () => {
    expect(() => decodeOutput(solverOutput({ AhKd: { frequencies: { DONK: 1 }, ev: { DONK: 1 } } }), dialect)).toThrow(
      "Unrecognized action label 'DONK' for AhKd"
    );
    expect(() => decodeOutput(solverOutput({ AhAh: { frequencies: { CHECK: 1 }, ev: { CHECK: 1 } } }), dialect)).toThrow(
      "Invalid hand 'AhAh' in solver output"
    );
  });

  it("follows the dialect's field names", () => {
    const custom = createDialect({
      name: "renamed",
      output: { exploitability: "expl", iterations: "iters", strategy: "hands", frequencies: "freq", ev: "value" }
    });
    const raw = JSON.stringify({ expl: 0.2, iters: 40, hands: { AsAd: { freq: { CHECK: 1 }, value: { CHECK: 3 } } } });
    const solution = decodeOutput(raw, custom);
    expect(solution.iterations).toBe(40);
    expect(solution.strategies.AsAd.ev).toEqual({ check: 3 });
  });
});

describe("solutionFromTable", () => {
  it("rejects an action listed twice", () => {
    expect(() =>
      solutionFromTable({ AhKd: { frequencies: { CHECK: 0.5, check: 0.5 }, ev: { check: 1 } } }, { exploitability: 0, iterations: 1 }, "")
    ).toThrow("Action 'check' appears twice for AhKd");
  });
});

describe("parseOutput", () => {
  const mapping = { s: "s", d: "h", c: "d", h: "c" } as const;
  const raw = solverOutput({ AcKh: { frequencies: { CHECK: 0.4, "BET 3.3": 0.6 }, ev: { CHECK: 1, "BET 3.3": 1.2 } } });

  it("relabels hands back to the caller's suits", () => {
    const solution = parseOutput(raw, mapping, dialect, { requestedHand: parseHand("AhKd") });
    expect(Object.keys(solution.strategies)).toEqual(["AhKd"]);
    expect(solution.strategies.AhKd.frequencies).toEqual({ check: 0.4, "bet:3.3": 0.6 });
  });

  it("raises NotFoundError for a hand missing from the table", () => {
    expect(() => parseOutput(raw, mapping, dialect, { requestedHand: parseHand("QhQs") })).toThrow(NotFoundError);
    expect(() => parseOutput(raw, mapping, dialect, { requestedHand: parseHand("QhQs") })).toThrow(
      "Solver output has no strategy for QsQh"
    );
  });
});
