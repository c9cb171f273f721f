import { cardEquals, formatCard, parseCard, parseCards } from "./cards";
import { ConfigurationError } from "./errors";
import {
  STREET_BOARD_LENGTH,
  type ActionType,
  type Card,
  type Hand,
  type Position,
  type PriorAction,
  type Situation,
  type Street
} from "./types";

export const POSITIONS: readonly Position[] = ["UTG", "MP", "CO", "BTN", "SB", "BB"];

/** Seat order for postflop betting rounds: first to act comes first. */
export const POSTFLOP_ORDER: readonly Position[] = ["SB", "BB", "UTG", "MP", "CO", "BTN"];

/** Seat order for the preflop betting round. */
export const PREFLOP_ORDER: readonly Position[] = ["UTG", "MP", "CO", "BTN", "SB", "BB"];

export function isPosition(value: unknown): value is Position {
  return POSITIONS.some(position => position === value);
}

/**
 * Throws ConfigurationError when the situation (and hand, if given) is not
 * structurally valid.
 */
export function validateSituation(situation: Situation, hand?: Hand): void {
  const expected = STREET_BOARD_LENGTH[situation.street];
  if (expected === undefined) {
    throw new ConfigurationError(`Unknown street '${String(situation.street)}'`, "street");
  }
  if (situation.board.length !== expected) {
    throw new ConfigurationError(
      `Street ${situation.street} requires ${expected} board cards, received ${situation.board.length}`,
      "board"
    );
  }
  assertDistinct(situation.board, "board");

  if (!Number.isFinite(situation.pot) || situation.pot <= 0) {
    throw new ConfigurationError(`Pot must be a positive number, received ${situation.pot}`, "pot");
  }
  if (!Number.isFinite(situation.effectiveStack) || situation.effectiveStack <= 0) {
    throw new ConfigurationError(
      `Effective stack must be a positive number, received ${situation.effectiveStack}`,
      "effectiveStack"
    );
  }
  if (!isPosition(situation.position)) {
    throw new ConfigurationError(`Unknown position '${String(situation.position)}'`, "position");
  }

  const opponents = situation.opponents ?? [];
  const seen = new Set<Position>([situation.position]);
  for (const opponent of opponents) {
    if (!isPosition(opponent)) {
      throw new ConfigurationError(`Unknown opponent position '${String(opponent)}'`, "opponents");
    }
    if (seen.has(opponent)) {
      throw new ConfigurationError(`Opponent ${opponent} is listed twice or is the acting seat`, "opponents");
    }
    seen.add(opponent);
  }

  for (const action of situation.actions) {
    if (!isPosition(action.position)) {
      throw new ConfigurationError(`Unknown action position '${String(action.position)}'`, "actions");
    }
    if (action.amount !== undefined && (!Number.isFinite(action.amount) || action.amount < 0)) {
      throw new ConfigurationError(`Action amount must be a non-negative number, received ${action.amount}`, "actions");
    }
  }

  if (hand) {
    if (hand.length !== 2) {
      throw new ConfigurationError("A hand needs exactly two cards", "hand");
    }
    assertDistinct(hand, "hand");
    const overlap = hand.find(card => situation.board.some(boardCard => cardEquals(card, boardCard)));
    if (overlap) {
      throw new ConfigurationError(`Hand card ${formatCard(overlap)} is already on the board`, "hand");
    }
  }
}

function assertDistinct(cards: readonly Card[], field: string): void {
  const seen = new Set<string>();
  for (const card of cards) {
    const text = formatCard(card);
    if (seen.has(text)) {
      throw new ConfigurationError(`Duplicate card ${text}`, field);
    }
    seen.add(text);
  }
}

const STREETS: readonly Street[] = ["preflop", "flop", "turn", "river"];
const ACTION_TYPES: readonly ActionType[] = ["fold", "check", "call", "bet", "raise", "allin"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBoard(value: unknown): Card[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === "string") {
    return parseCards(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => {
      if (typeof item !== "string") {
        throw new ConfigurationError("Board cards must be strings", "board");
      }
      return parseCard(item);
    });
  }
  throw new ConfigurationError("Board must be a string or an array of cards", "board");
}

function readPositions(value: unknown, field: string): Position[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be an array of positions`, field);
  }
  return value.map(item => {
    if (!isPosition(item)) {
      throw new ConfigurationError(`Unknown position '${String(item)}'`, field);
    }
    return item;
  });
}

function readAction(value: unknown): PriorAction {
  if (!isRecord(value)) {
    throw new ConfigurationError("Each action must be an object", "actions");
  }
  const position = value.position;
  if (!isPosition(position)) {
    throw new ConfigurationError(`Unknown action position '${String(position)}'`, "actions");
  }
  const type = ACTION_TYPES.find(candidate => candidate === value.type);
  if (!type) {
    throw new ConfigurationError(`Unknown action type '${String(value.type)}'`, "actions");
  }
  const amount = value.amount;
  if (amount === undefined) {
    return { position, type };
  }
  if (typeof amount !== "number") {
    throw new ConfigurationError("Action amount must be a number", "actions");
  }
  return { position, type, amount };
}

/**
 * Reads a situation from parsed JSON, e.g. a CLI input or a precomputed spot
 * file. Cards may be given as "Qs Jh 2d" or ["Qs", "Jh", "2d"].
 */
export function situationFromJson(value: unknown): Situation {
  if (!isRecord(value)) {
    throw new ConfigurationError("Situation must be a JSON object", "situation");
  }
  const street = STREETS.find(candidate => candidate === value.street);
  if (!street) {
    throw new ConfigurationError(`Unknown street '${String(value.street)}'`, "street");
  }
  const { pot, effectiveStack, position } = value;
  if (typeof pot !== "number") {
    throw new ConfigurationError("Pot must be a number", "pot");
  }
  if (typeof effectiveStack !== "number") {
    throw new ConfigurationError("Effective stack must be a number", "effectiveStack");
  }
  if (!isPosition(position)) {
    throw new ConfigurationError(`Unknown position '${String(position)}'`, "position");
  }
  const actions = value.actions ?? [];
  if (!Array.isArray(actions)) {
    throw new ConfigurationError("Actions must be an array", "actions");
  }
  const situation: Situation = {
    street,
    board: readBoard(value.board),
    pot,
    effectiveStack,
    position,
    actions: actions.map(readAction),
    ...(value.opponents === undefined ? {} : { opponents: readPositions(value.opponents, "opponents") })
  };
  validateSituation(situation);
  return situation;
}
