import {
  SUITS,
  compareCards,
  formatCard,
  formatHand,
  freezeSolution,
  freezeStrategy,
  parseHand,
  rankValue,
  type Card,
  type Hand,
  type Solution,
  type Strategy,
  type Suit
} from "@gto-broker/shared";
import type { SuitMapping } from "./types";

/**
 * Assigns canonical suits by first occurrence along `scan`. Suits that never
 * appear pair up, in real-suit order, with the lowest canonical suits left.
 */
export function mappingFromScan(scan: readonly Card[]): SuitMapping {
  const assigned = new Map<Suit, Suit>();
  let next = 0;
  for (const card of scan) {
    if (!assigned.has(card.suit)) {
      assigned.set(card.suit, SUITS[next]);
      next += 1;
    }
  }
  const remaining = SUITS.filter(suit => ![...assigned.values()].includes(suit));
  for (const suit of SUITS) {
    if (!assigned.has(suit)) {
      const target = remaining.shift();
      if (target) {
        assigned.set(suit, target);
      }
    }
  }
  return {
    s: assigned.get("s") ?? "s",
    h: assigned.get("h") ?? "h",
    d: assigned.get("d") ?? "d",
    c: assigned.get("c") ?? "c"
  };
}

export function invertMapping(mapping: SuitMapping): SuitMapping {
  const inverse: Record<Suit, Suit> = { s: "s", h: "h", d: "d", c: "c" };
  for (const suit of SUITS) {
    inverse[mapping[suit]] = suit;
  }
  return inverse;
}

export function applyMapping(card: Card, mapping: SuitMapping): Card {
  return { rank: card.rank, suit: mapping[card.suit] };
}

export function relabelHand(hand: Hand, mapping: SuitMapping): string {
  return formatHand([applyMapping(hand[0], mapping), applyMapping(hand[1], mapping)]);
}

export function relabelStrategy(strategy: Strategy, mapping: SuitMapping): Strategy {
  return freezeStrategy({
    hand: relabelHand(parseHand(strategy.hand), mapping),
    frequencies: { ...strategy.frequencies },
    ev: { ...strategy.ev }
  });
}

/** Rewrites every hand of a table through `mapping`. */
export function relabelSolution(solution: Solution, mapping: SuitMapping): Solution {
  const strategies: Record<string, Strategy> = {};
  for (const strategy of Object.values(solution.strategies)) {
    const relabelled = relabelStrategy(strategy, mapping);
    strategies[relabelled.hand] = relabelled;
  }
  return freezeSolution({
    exploitability: solution.exploitability,
    iterations: solution.iterations,
    strategies
  });
}

/**
 * Every ordering of `cards` (already sorted by rank descending) that only
 * swaps cards of equal rank.
 */
export function rankTieOrders(cards: readonly Card[]): Card[][] {
  const groups: Card[][] = [];
  for (const card of [...cards].sort(compareCards)) {
    const last = groups[groups.length - 1];
    if (last && rankValue(last[0].rank) === rankValue(card.rank)) {
      last.push(card);
    } else {
      groups.push([card]);
    }
  }
  let orders: Card[][] = [[]];
  for (const group of groups) {
    const perms = permutations(group);
    orders = orders.flatMap(prefix => perms.map(perm => [...prefix, ...perm]));
  }
  return orders;
}

function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) {
    return [[...items]];
  }
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map(rest => [item, ...rest])
  );
}

export function formatBoard(cards: readonly Card[]): string {
  return cards.map(formatCard).join("");
}
