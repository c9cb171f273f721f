export type Suit = "s" | "h" | "d" | "c";
export type Rank = "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9" | "T" | "J" | "Q" | "K" | "A";
export type Position = "UTG" | "MP" | "CO" | "BTN" | "SB" | "BB";
export type Street = "preflop" | "flop" | "turn" | "river";

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export type Hand = readonly [Card, Card];

export type ActionType = "fold" | "check" | "call" | "bet" | "raise" | "allin";

export interface PriorAction {
  position: Position;
  type: ActionType;
  /** Amount in big blinds, for bets, raises and calls. */
  amount?: number;
}

/**
 * A decision point. Pot and stack are expressed in big blinds.
 * `opponents` lists the seats still contesting the pot; when omitted the
 * acting seat is treated as opening the action.
 */
export interface Situation {
  street: Street;
  board: readonly Card[];
  pot: number;
  effectiveStack: number;
  position: Position;
  opponents?: readonly Position[];
  actions: readonly PriorAction[];
}

export type SolverAction =
  | { type: "fold" | "check" | "call" | "allin" }
  | { type: "bet" | "raise"; size: number };

export type ActionKey = string;

export interface Strategy {
  readonly hand: string;
  readonly frequencies: Readonly<Record<ActionKey, number>>;
  readonly ev: Readonly<Record<ActionKey, number>>;
}

export interface Solution {
  readonly exploitability: number;
  readonly iterations: number;
  readonly strategies: Readonly<Record<string, Strategy>>;
}

export type Provenance = "precomputed" | "dynamic";

export interface CacheEntry {
  readonly key: string;
  readonly descriptor: string;
  readonly solution: Solution;
  readonly provenance: Provenance;
  readonly createdAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  inFlight: number;
  /** Callers that joined a computation already in flight. */
  coalesced: number;
}

export const STREET_BOARD_LENGTH: Readonly<Record<Street, number>> = {
  preflop: 0,
  flop: 3,
  turn: 4,
  river: 5
};

export const FREQUENCY_TOLERANCE = 1e-6;

export function actionKey(action: SolverAction): ActionKey {
  if (action.type === "bet" || action.type === "raise") {
    return `${action.type}:${formatSize(action.size)}`;
  }
  return action.type;
}

export function parseActionKey(key: ActionKey): SolverAction | undefined {
  const [type, size] = key.split(":");
  switch (type) {
    case "fold":
    case "check":
    case "call":
    case "allin":
      return size === undefined ? { type } : undefined;
    case "bet":
    case "raise": {
      const parsed = Number(size);
      if (size === undefined || !Number.isFinite(parsed) || parsed <= 0) {
        return undefined;
      }
      return { type, size: parsed };
    }
    default:
      return undefined;
  }
}

export function primaryAction(strategy: Strategy): ActionKey | undefined {
  let best: ActionKey | undefined;
  let bestFrequency = -1;
  for (const [key, frequency] of Object.entries(strategy.frequencies)) {
    if (frequency > bestFrequency) {
      best = key;
      bestFrequency = frequency;
    }
  }
  return best;
}

export function frequencyOf(strategy: Strategy, action: SolverAction | ActionKey): number {
  const key = typeof action === "string" ? action : actionKey(action);
  return strategy.frequencies[key] ?? 0;
}

export function evOf(strategy: Strategy, action: SolverAction | ActionKey): number | undefined {
  const key = typeof action === "string" ? action : actionKey(action);
  return strategy.ev[key];
}

function formatSize(size: number): string {
  return Number(size.toFixed(4)).toString();
}
