import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  actionKey,
  expandHandClass,
  formatHand,
  frequencyOf,
  normalizeHandString,
  parseActionKey,
  parseCard,
  parseCards,
  parseHand,
  primaryAction,
  validateSituation,
  type Situation,
  type Strategy
} from "../src";

function flopSituation(overrides: Partial<Situation> = {}): Situation {
  return {
    street: "flop",
    board: parseCards("Ks7d2c"),
    pot: 6,
    effectiveStack: 97,
    position: "BTN",
    opponents: ["BB"],
    actions: [],
    ...overrides
  };
}

describe("cards", () => {
  it("parses and normalizes card text", () => {
    expect(parseCard("as")).toEqual({ rank: "A", suit: "s" });
    expect(parseCards("Qs, Jh 2h")).toEqual([
      { rank: "Q", suit: "s" },
      { rank: "J", suit: "h" },
      { rank: "2", suit: "h" }
    ]);
    expect(() => parseCard("1x")).toThrowError(ConfigurationError);
  });

  it("orders hands by rank then suit", () => {
    expect(formatHand(parseHand("QsAh"))).toBe("AhQs");
    expect(formatHand(parseHand("AdAs"))).toBe("AsAd");
    expect(normalizeHandString("7c7h")).toBe("7h7c");
    expect(normalizeHandString("AsAs")).toBeUndefined();
  });

  it("expands hand classes into combos", () => {
    expect(expandHandClass("QQ")).toEqual(["QsQh", "QsQd", "QsQc", "QhQd", "QhQc", "QdQc"]);
    expect(expandHandClass("KAs")).toEqual(["AsKs", "AhKh", "AdKd", "AcKc"]);
    expect(expandHandClass("AKo")).toHaveLength(12);
    expect(expandHandClass("AKo")?.slice(0, 3)).toEqual(["AsKh", "AsKd", "AsKc"]);
    expect(expandHandClass("AK")).toBeUndefined();
    expect(expandHandClass("AAs")).toBeUndefined();
    expect(expandHandClass("AhKd")).toBeUndefined();
  });
});

describe("actions and strategies", () => {
  it("round trips action keys", () => {
    expect(actionKey({ type: "bet", size: 3.3 })).toBe("bet:3.3");
    expect(parseActionKey("raise:10")).toEqual({ type: "raise", size: 10 });
    expect(parseActionKey("check")).toEqual({ type: "check" });
    expect(parseActionKey("bet:-1")).toBeUndefined();
    expect(parseActionKey("limp")).toBeUndefined();
  });

  it("reports the most frequent action", () => {
    const strategy: Strategy = {
      hand: "AsKs",
      frequencies: { check: 0.25, "bet:3.3": 0.75 },
      ev: { check: 4.1, "bet:3.3": 4.4 }
    };
    expect(primaryAction(strategy)).toBe("bet:3.3");
    expect(frequencyOf(strategy, { type: "bet", size: 3.3 })).toBe(0.75);
    expect(frequencyOf(strategy, "fold")).toBe(0);
  });
});

describe("validateSituation", () => {
  it("accepts a well-formed flop spot", () => {
    expect(() => validateSituation(flopSituation(), parseHand("AhQh"))).not.toThrow();
  });

  it("rejects a board that does not match the street", () => {
    expect(() => validateSituation(flopSituation({ street: "turn" }))).toThrowError(
      "Street turn requires 4 board cards, received 3"
    );
  });

  it("rejects duplicate cards and hand overlap", () => {
    expect(() => validateSituation(flopSituation({ board: parseCards("KsKs2c") }))).toThrowError("Duplicate card Ks");
    expect(() => validateSituation(flopSituation(), parseHand("Ks9h"))).toThrowError(
      "Hand card Ks is already on the board"
    );
  });

  it("rejects non-positive pot and stack", () => {
    let thrown: unknown;
    try {
      validateSituation(flopSituation({ pot: 0 }));
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(ConfigurationError);
    expect(thrown).toMatchObject({ field: "pot" });
    expect(() => validateSituation(flopSituation({ effectiveStack: Number.NaN }))).toThrowError(ConfigurationError);
  });

  it("rejects the acting seat listed as an opponent", () => {
    expect(() => validateSituation(flopSituation({ opponents: ["BTN"] }))).toThrowError(
      "Opponent BTN is listed twice or is the acting seat"
    );
  });
});
