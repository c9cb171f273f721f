import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  ConfigurationError,
  RANKS,
  SUITS,
  formatHand,
  parseCards,
  parseHand,
  type Card,
  type Hand,
  type Situation,
  type Suit
} from "@gto-broker/shared";
import { Canonicalizer } from "../src/canonical/canonicalizer";
import { bucketIndex, bucketStackAndPot, createSeatLabeler } from "../src/canonical/bucketing";
import { applyMapping, invertMapping, mappingFromScan, rankTieOrders, relabelHand } from "../src/canonical/suitMapping";
import type { SuitMapping } from "../src/canonical/types";
import { flopSituation } from "./utils/factories";

const canonicalizer = new Canonicalizer({ canonical: { stackStepBb: 5, potRatioStep: 0.05 }, treeTag: "tree-a" });

const DECK: Card[] = RANKS.flatMap(rank => SUITS.map(suit => ({ rank, suit })));

function permute(cards: readonly Card[], mapping: SuitMapping): Card[] {
  return cards.map(card => applyMapping(card, mapping));
}

const suitPermutation = fc
  .shuffledSubarray([...SUITS], { minLength: 4, maxLength: 4 })
  .map((order): SuitMapping => ({ s: order[0], h: order[1], d: order[2], c: order[3] }));

const spot = fc
  .tuple(fc.constantFrom(3, 4, 5), fc.shuffledSubarray(DECK, { minLength: 7, maxLength: 7 }))
  .map(([boardSize, cards]) => ({
    board: cards.slice(0, boardSize),
    hand: [cards[5], cards[6]] satisfies Hand
  }));

function streetFor(boardSize: number): Situation["street"] {
  return boardSize === 3 ? "flop" : boardSize === 4 ? "turn" : "river";
}

describe("suit mapping", () => {
  it("assigns suits by first occurrence and fills unseen suits in order", () => {
    const mapping = mappingFromScan(parseCards("Kd7d2h"));
    expect(mapping).toEqual({ d: "s", h: "h", s: "d", c: "c" });
    expect(invertMapping(mapping)).toEqual({ s: "d", h: "h", d: "s", c: "c" });
  });

  it("enumerates orderings of equal ranks only", () => {
    const orders = rankTieOrders(parseCards("8s8d2c"));
    expect(orders.map(order => order.map(card => card.suit).join(""))).toEqual(["sdc", "dsc"]);
  });

  it("relabels a hand into sorted text", () => {
    expect(relabelHand(parseHand("2cAh"), { s: "s", h: "d", d: "h", c: "c" })).toBe("Ad2c");
  });
});

describe("bucketing", () => {
  it("never returns a bucket below one", () => {
    expect(bucketIndex(0.01, 5)).toBe(1);
    expect(bucketIndex(97, 5)).toBe(19);
  });

  it("expresses the pot as a fraction of the bucketed stack", () => {
    expect(bucketStackAndPot(flopSituation(), 5, 0.05)).toEqual({
      stackBucket: 19,
      potBucket: 1,
      effectiveStack: 95,
      pot: 4.75
    });
  });

  it("labels seats by acting order", () => {
    const headsUp = createSeatLabeler(flopSituation({ position: "BTN", opponents: ["BB"] }));
    expect(headsUp("BTN")).toBe("IP");
    expect(headsUp("BB")).toBe("OOP");
    expect(headsUp("CO")).toBe("s5");

    const multiway = createSeatLabeler(flopSituation({ position: "BTN", opponents: ["SB", "BB"] }));
    expect(multiway("BTN")).toBe("P3/3");
    expect(multiway("SB")).toBe("P1/3");

    const opening = createSeatLabeler(flopSituation({ position: "CO", opponents: undefined }));
    expect(opening("CO")).toBe("open/3");
    expect(opening("BTN")).toBe("s1");
  });
});

describe("Canonicalizer", () => {
  it("produces the canonical board, hand and descriptor", () => {
    const canonical = canonicalizer.canonicalize(flopSituation(), parseHand("AhKd"));
    expect(canonical.mapping).toEqual({ s: "s", d: "h", c: "d", h: "c" });
    expect(canonical.hand).toBe("AcKh");
    expect(canonical.situation.board).toEqual(parseCards("Ks7h2d"));
    expect(canonical.situation.pot).toBe(4.75);
    expect(canonical.situation.effectiveStack).toBe(95);
    expect(canonical.relativePosition).toBe("IP");
    expect(canonical.tableDescriptor).toBe(
      '{"version":"v1","street":"flop","board":"Ks7h2d","stackBucket":95,"potBucket":1,"position":"IP","actions":[],"tree":"tree-a"}'
    );
    expect(canonical.key).toMatch(/^v1:[0-9a-f]{64}$/);
    expect(canonical.key).not.toBe(canonical.tableKey);
  });

  it("gives AhQs and AsQh the same preflop key", () => {
    const situation: Situation = {
      street: "preflop",
      board: [],
      pot: 7.5,
      effectiveStack: 100,
      position: "CO",
      actions: []
    };
    const first = canonicalizer.canonicalize(situation, parseHand("AhQs"));
    const second = canonicalizer.canonicalize(situation, parseHand("AsQh"));
    expect(first.key).toBe(second.key);
    expect(first.hand).toBe("AsQh");
    expect(second.hand).toBe("AsQh");
  });

  it("keeps hands that differ in suitedness apart", () => {
    const board = flopSituation();
    expect(canonicalizer.canonicalize(board, parseHand("AhKh")).key).not.toBe(
      canonicalizer.canonicalize(board, parseHand("AhKc")).key
    );
  });

  it("shares one table key across nearby stacks and all hands", () => {
    const base = canonicalizer.canonicalize(flopSituation({ effectiveStack: 97 }), parseHand("AhKd"));
    const nearby = canonicalizer.canonicalize(flopSituation({ effectiveStack: 96 }), parseHand("QcQd"));
    expect(nearby.tableKey).toBe(base.tableKey);
    const deeper = canonicalizer.canonicalize(flopSituation({ effectiveStack: 150 }));
    expect(deeper.tableKey).not.toBe(base.tableKey);
  });

  it("buckets prior action amounts against the stack", () => {
    const canonical = canonicalizer.canonicalize(
      flopSituation({
        actions: [
          { position: "BB", type: "check" },
          { position: "BTN", type: "bet", amount: 3 }
        ]
      })
    );
    expect(JSON.parse(canonical.tableDescriptor).actions).toEqual(["OOP:check", "IP:bet:1"]);
    expect(canonical.situation.actions[1]).toEqual({ position: "BTN", type: "bet", amount: 4.75 });
  });

  it("changes the key when the tree tag changes", () => {
    const other = new Canonicalizer({ canonical: { stackStepBb: 5, potRatioStep: 0.05 }, treeTag: "tree-b" });
    expect(other.canonicalize(flopSituation()).tableKey).not.toBe(canonicalizer.canonicalize(flopSituation()).tableKey);
  });

  it("rejects invalid grids and situations", () => {
    expect(() => new Canonicalizer({ canonical: { stackStepBb: 0, potRatioStep: 0.05 }, treeTag: "t" })).toThrow(
      ConfigurationError
    );
    expect(() => canonicalizer.canonicalize(flopSituation(), parseHand("Ks2h"))).toThrow(ConfigurationError);
    expect(() => canonicalizer.canonicalize(flopSituation({ pot: 0 }))).toThrow(ConfigurationError);
  });

  it("is invariant under any permutation of suits", () => {
    fc.assert(
      fc.property(spot, suitPermutation, ({ board, hand }, permutation) => {
        const street = streetFor(board.length);
        const original = canonicalizer.canonicalize(flopSituation({ street, board }), hand);
        const permutedHand: Hand = [applyMapping(hand[0], permutation), applyMapping(hand[1], permutation)];
        const permuted = canonicalizer.canonicalize(flopSituation({ street, board: permute(board, permutation) }), permutedHand);
        expect(permuted.key).toBe(original.key);
        expect(permuted.tableKey).toBe(original.tableKey);
        expect(permuted.hand).toBe(original.hand);
      })
    );
  });

  it("maps the caller's hand onto the canonical hand and back", () => {
    fc.assert(
      fc.property(spot, ({ board, hand }) => {
        const canonical = canonicalizer.canonicalize(flopSituation({ street: streetFor(board.length), board }), hand);
        expect(relabelHand(hand, canonical.mapping)).toBe(canonical.hand);
        const restored = parseHand(canonical.hand ?? "");
        expect(relabelHand(restored, invertMapping(canonical.mapping))).toBe(formatHand(hand));
        const suits = new Set<Suit>(Object.values(canonical.mapping));
        expect(suits.size).toBe(4);
      })
    );
  });
});
