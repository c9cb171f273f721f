import Ajv2020 from "ajv/dist/2020";
import type { ValidateFunction } from "ajv";
import {
  FREQUENCY_TOLERANCE,
  NotFoundError,
  ParseError,
  actionKey,
  formatHand,
  freezeSolution,
  normalizeHandString,
  parseActionKey,
  type ActionKey,
  type Hand,
  type Solution,
  type SolverAction,
  type SolverDialect,
  type StrategyInput
} from "@gto-broker/shared";
import { invertMapping, relabelSolution } from "../canonical/suitMapping";
import type { SuitMapping } from "../canonical/types";

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validators = new WeakMap<SolverDialect["output"], ValidateFunction>();

export interface DecodeOptions {
  /** Largest frequency-sum drift that is renormalized rather than rejected. */
  tolerance?: number;
}

export interface ParseOptions extends DecodeOptions {
  requestedHand?: Hand;
}

export interface StrategyTable {
  [hand: string]: { frequencies: Record<string, number | null | undefined>; ev: Record<string, number | null | undefined> };
}

function outputSchema(fields: SolverDialect["output"]) {
  return {
    type: "object",
    required: [fields.exploitability, fields.iterations, fields.strategy],
    properties: {
      [fields.exploitability]: { type: "number", minimum: 0 },
      [fields.iterations]: { type: "integer", minimum: 0 },
      [fields.strategy]: {
        type: "object",
        minProperties: 1,
        additionalProperties: {
          type: "object",
          required: [fields.frequencies],
          properties: {
            [fields.frequencies]: {
              type: "object",
              minProperties: 1,
              additionalProperties: { type: "number", minimum: 0, maximum: 1 }
            },
            [fields.ev]: {
              type: "object",
              additionalProperties: { type: ["number", "null"] }
            }
          }
        }
      }
    }
  };
}

function validatorFor(fields: SolverDialect["output"]): ValidateFunction {
  let validate = validators.get(fields);
  if (!validate) {
    validate = ajv.compile(outputSchema(fields));
    validators.set(fields, validate);
  }
  return validate;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, field: string, raw: string): number {
  const value = record[field];
  if (typeof value !== "number") {
    throw new ParseError(`Field '${field}' is not a number`, raw);
  }
  return value;
}

function readRecord(record: Record<string, unknown>, field: string, raw: string): Record<string, unknown> {
  const value = record[field];
  if (!isRecord(value)) {
    throw new ParseError(`Field '${field}' is not an object`, raw);
  }
  return value;
}

const LABEL_PATTERN = /^(BET|RAISE)\s+(\d+(?:\.\d+)?|\.\d+)$/;

/**
 * Reads a solver action label (`CHECK`, `BET 3.3`, `RAISE 10`, `ALLIN`) or an
 * action key (`bet:3.3`).
 */
export function parseActionLabel(label: string): SolverAction | undefined {
  const fromKey = parseActionKey(label.trim().toLowerCase());
  if (fromKey) {
    return fromKey;
  }
  const normalized = label.trim().toUpperCase().replace(/[-_]/g, "");
  switch (normalized) {
    case "FOLD":
      return { type: "fold" };
    case "CHECK":
      return { type: "check" };
    case "CALL":
      return { type: "call" };
    case "ALLIN":
      return { type: "allin" };
    default: {
      const match = LABEL_PATTERN.exec(normalized);
      if (!match) {
        return undefined;
      }
      const size = Number(match[2]);
      if (!Number.isFinite(size) || size <= 0) {
        return undefined;
      }
      return { type: match[1] === "BET" ? "bet" : "raise", size };
    }
  }
}

function readActions(source: Record<string, number | null | undefined>, hand: string, raw: string): Map<ActionKey, number | null | undefined> {
  const actions = new Map<ActionKey, number | null | undefined>();
  for (const [label, value] of Object.entries(source)) {
    const action = parseActionLabel(label);
    if (!action) {
      throw new ParseError(`Unrecognized action label '${label}' for ${hand}`, raw);
    }
    const key = actionKey(action);
    if (actions.has(key)) {
      throw new ParseError(`Action '${label}' appears twice for ${hand}`, raw);
    }
    actions.set(key, value);
  }
  return actions;
}

/**
 * Builds a frozen solution from a per-hand table, enforcing the strategy
 * invariants: frequencies sum to one (drift up to `tolerance` is
 * renormalized) and every played action has a finite EV.
 */
export function solutionFromTable(
  table: StrategyTable,
  meta: { exploitability: number; iterations: number },
  raw: string,
  tolerance = FREQUENCY_TOLERANCE
): Solution {
  const strategies: Record<string, StrategyInput> = {};
  for (const [handText, entry] of Object.entries(table)) {
    const hand = normalizeHandString(handText);
    if (!hand) {
      throw new ParseError(`Invalid hand '${handText}' in solver output`, raw);
    }
    if (strategies[hand]) {
      throw new ParseError(`Hand ${hand} appears twice in solver output`, raw);
    }

    const frequencies = readActions(entry.frequencies, hand, raw);
    const evs = readActions(entry.ev, hand, raw);
    let sum = 0;
    for (const [key, frequency] of frequencies) {
      if (typeof frequency !== "number" || !Number.isFinite(frequency) || frequency < 0 || frequency > 1) {
        throw new ParseError(`Frequency for ${key} with ${hand} is not in [0, 1]`, raw);
      }
      sum += frequency;
    }
    const drift = Math.abs(sum - 1);
    if (drift > Math.max(tolerance, FREQUENCY_TOLERANCE) || sum <= 0) {
      throw new ParseError(`Frequencies for ${hand} sum to ${sum}`, raw);
    }

    const strategy: StrategyInput = { hand, frequencies: {}, ev: {} };
    for (const [key, frequency] of frequencies) {
      const value = frequency ?? 0;
      strategy.frequencies[key] = drift > FREQUENCY_TOLERANCE ? value / sum : value;
      const ev = evs.get(key);
      if (typeof ev === "number" && Number.isFinite(ev)) {
        strategy.ev[key] = ev;
      } else if (value > 0) {
        throw new ParseError(`Missing EV for ${key} with ${hand}`, raw);
      }
    }
    strategies[hand] = strategy;
  }
  return freezeSolution({ exploitability: meta.exploitability, iterations: meta.iterations, strategies });
}

/** Decodes raw solver output into a solution keyed by canonical hands. */
export function decodeOutput(raw: string, dialect: SolverDialect, options: DecodeOptions = {}): Solution {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ParseError("Solver output is not valid JSON", raw, { cause: error });
  }

  const fields = dialect.output;
  const validate = validatorFor(fields);
  if (!validate(data) || !isRecord(data)) {
    const details = ajv.errorsText(validate.errors, { separator: "; " });
    throw new ParseError(`Solver output does not match dialect ${dialect.name}: ${details}`, raw);
  }

  const table: StrategyTable = {};
  for (const [hand, entry] of Object.entries(readRecord(data, fields.strategy, raw))) {
    if (!isRecord(entry)) {
      throw new ParseError(`Strategy for ${hand} is not an object`, raw);
    }
    table[hand] = {
      frequencies: numberRecord(readRecord(entry, fields.frequencies, raw)),
      ev: isRecord(entry[fields.ev]) ? numberRecord(readRecord(entry, fields.ev, raw)) : {}
    };
  }

  return solutionFromTable(
    table,
    {
      exploitability: readNumber(data, fields.exploitability, raw),
      iterations: readNumber(data, fields.iterations, raw)
    },
    raw,
    options.tolerance
  );
}

function numberRecord(record: Record<string, unknown>): Record<string, number | null> {
  const result: Record<string, number | null> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = typeof value === "number" ? value : null;
  }
  return result;
}

/**
 * Decodes raw output and rewrites every hand back to the caller's real suits.
 * With `requestedHand`, fails with NotFoundError when that hand is absent.
 */
export function parseOutput(raw: string, mapping: SuitMapping, dialect: SolverDialect, options: ParseOptions = {}): Solution {
  const solution = relabelSolution(decodeOutput(raw, dialect, options), invertMapping(mapping));
  if (options.requestedHand) {
    const hand = formatHand(options.requestedHand);
    if (!solution.strategies[hand]) {
      throw new NotFoundError(`Solver output has no strategy for ${hand}`, hand);
    }
  }
  return solution;
}
