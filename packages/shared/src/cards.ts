import { ConfigurationError } from "./errors";
import type { Card, Hand, Rank, Suit } from "./types";

export const RANKS: readonly Rank[] = ["2", "3", "4", "5", "6", "7", "8", "9", "T", "J", "Q", "K", "A"];
export const SUITS: readonly Suit[] = ["s", "h", "d", "c"];

const RANK_SET: ReadonlySet<string> = new Set(RANKS);
const SUIT_SET: ReadonlySet<string> = new Set(SUITS);

function isRank(value: string): value is Rank {
  return RANK_SET.has(value);
}

function isSuit(value: string): value is Suit {
  return SUIT_SET.has(value);
}

export function rankValue(rank: Rank): number {
  return RANKS.indexOf(rank) + 2;
}

export function suitIndex(suit: Suit): number {
  return SUITS.indexOf(suit);
}

export function parseCard(text: string): Card {
  const trimmed = text.trim();
  if (trimmed.length !== 2) {
    throw new ConfigurationError(`Invalid card '${text}'`, "card");
  }
  const rank = trimmed[0].toUpperCase();
  const suit = trimmed[1].toLowerCase();
  if (!isRank(rank) || !isSuit(suit)) {
    throw new ConfigurationError(`Invalid card '${text}'`, "card");
  }
  return { rank, suit };
}

/** Parses concatenated or comma/space separated cards ("AsKd", "As,Kd", "As Kd"). */
export function parseCards(text: string): Card[] {
  const compact = text.replace(/[\s,]+/g, "");
  if (compact.length % 2 !== 0) {
    throw new ConfigurationError(`Invalid card list '${text}'`, "cards");
  }
  const cards: Card[] = [];
  for (let index = 0; index < compact.length; index += 2) {
    cards.push(parseCard(compact.slice(index, index + 2)));
  }
  return cards;
}

export function formatCard(card: Card): string {
  return `${card.rank}${card.suit}`;
}

export function cardEquals(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Rank descending, then suit order s, h, d, c. */
export function compareCards(a: Card, b: Card): number {
  const byRank = rankValue(b.rank) - rankValue(a.rank);
  if (byRank !== 0) {
    return byRank;
  }
  return suitIndex(a.suit) - suitIndex(b.suit);
}

export function parseHand(text: string): Hand {
  const cards = parseCards(text);
  if (cards.length !== 2) {
    throw new ConfigurationError(`A hand needs exactly two cards, received '${text}'`, "hand");
  }
  const [first, second] = cards;
  if (cardEquals(first, second)) {
    throw new ConfigurationError(`Hand '${text}' repeats a card`, "hand");
  }
  return [first, second];
}

export function formatHand(hand: Hand): string {
  const [first, second] = [...hand].sort(compareCards);
  return `${formatCard(first)}${formatCard(second)}`;
}

const HAND_CLASS = /^([2-9TJQKA])([2-9TJQKA])([so]?)$/;

/**
 * Combos of a hand class such as `AA`, `AKs` or `AKo`, each in canonical
 * text form. Undefined when `text` is not a class; non-pairs need `s` or `o`.
 */
export function expandHandClass(text: string): string[] | undefined {
  const match = HAND_CLASS.exec(text);
  if (!match) {
    return undefined;
  }
  const [, first, second, kind] = match;
  if (!isRank(first) || !isRank(second)) {
    return undefined;
  }
  const combos: string[] = [];
  if (first === second) {
    if (kind !== "") {
      return undefined;
    }
    SUITS.forEach((suit, index) => {
      for (const other of SUITS.slice(index + 1)) {
        combos.push(formatHand([{ rank: first, suit }, { rank: second, suit: other }]));
      }
    });
    return combos;
  }
  if (kind === "") {
    return undefined;
  }
  for (const suit of SUITS) {
    for (const other of SUITS) {
      if ((suit === other) === (kind === "s")) {
        combos.push(formatHand([{ rank: first, suit }, { rank: second, suit: other }]));
      }
    }
  }
  return combos;
}

/** Canonical text form of a hand string, or undefined when it is not a valid hand. */
export function normalizeHandString(text: string): string | undefined {
  try {
    return formatHand(parseHand(text));
  } catch {
    return undefined;
  }
}
