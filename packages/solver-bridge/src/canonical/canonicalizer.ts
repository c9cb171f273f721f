import { createHash } from "node:crypto";
import {
  ConfigurationError,
  compareCards,
  validateSituation,
  type Card,
  type CanonicalConfig,
  type Hand,
  type PriorAction,
  type Situation
} from "@gto-broker/shared";
import { amountBucket, bucketStackAndPot, createSeatLabeler, roundAmount } from "./bucketing";
import { applyMapping, formatBoard, mappingFromScan, rankTieOrders, relabelHand } from "./suitMapping";
import type { CanonicalSituation, SuitMapping } from "./types";

export const KEY_VERSION = "v1";

export interface CanonicalizerOptions {
  canonical: CanonicalConfig;
  /** Folded into every key so tables solved under another tree never match. */
  treeTag: string;
}

interface SuitChoice {
  mapping: SuitMapping;
  board: Card[];
  boardText: string;
  handText: string;
}

function canonicalBoard(board: readonly Card[], mapping: SuitMapping): Card[] {
  const flop = board
    .slice(0, 3)
    .map(card => applyMapping(card, mapping))
    .sort(compareCards);
  return [...flop, ...board.slice(3).map(card => applyMapping(card, mapping))];
}

/**
 * Tries every ordering of equal-rank cards and keeps the smallest canonical
 * form (board first, then hand), which makes the result independent of the
 * order and suits the caller used.
 */
function chooseSuits(board: readonly Card[], hand: Hand | undefined): SuitChoice {
  const later = board.slice(3);
  let best: SuitChoice | undefined;
  for (const flopOrder of rankTieOrders(board.slice(0, 3))) {
    for (const handOrder of rankTieOrders(hand ?? [])) {
      const mapping = mappingFromScan([...flopOrder, ...later, ...handOrder]);
      const cards = canonicalBoard(board, mapping);
      const candidate: SuitChoice = {
        mapping,
        board: cards,
        boardText: formatBoard(cards),
        handText: hand ? relabelHand(hand, mapping) : ""
      };
      if (
        !best ||
        candidate.boardText < best.boardText ||
        (candidate.boardText === best.boardText && candidate.handText < best.handText)
      ) {
        best = candidate;
      }
    }
  }
  if (!best) {
    throw new ConfigurationError("No canonical suit assignment found", "board");
  }
  return best;
}

function hashDescriptor(descriptor: string): string {
  return `${KEY_VERSION}:${createHash("sha256").update(descriptor).digest("hex")}`;
}

export class Canonicalizer {
  private readonly stackStepBb: number;
  private readonly potRatioStep: number;

  constructor(private readonly options: CanonicalizerOptions) {
    const { stackStepBb, potRatioStep } = options.canonical;
    if (!Number.isFinite(stackStepBb) || stackStepBb <= 0) {
      throw new ConfigurationError(`canonical.stackStepBb must be positive, received ${stackStepBb}`, "canonical.stackStepBb");
    }
    if (!Number.isFinite(potRatioStep) || potRatioStep <= 0) {
      throw new ConfigurationError(`canonical.potRatioStep must be positive, received ${potRatioStep}`, "canonical.potRatioStep");
    }
    this.stackStepBb = stackStepBb;
    this.potRatioStep = potRatioStep;
  }

  get treeTag(): string {
    return this.options.treeTag;
  }

  canonicalize(situation: Situation, hand?: Hand): CanonicalSituation {
    validateSituation(situation, hand);

    const buckets = bucketStackAndPot(situation, this.stackStepBb, this.potRatioStep);
    const label = createSeatLabeler(situation);
    const suits = chooseSuits(situation.board, hand);

    const actionBuckets = situation.actions.map(action =>
      action.amount === undefined ? undefined : amountBucket(action.amount, situation.effectiveStack, this.potRatioStep)
    );
    const actions: PriorAction[] = situation.actions.map((action, index) => {
      const bucket = actionBuckets[index];
      return bucket === undefined
        ? { position: action.position, type: action.type }
        : {
            position: action.position,
            type: action.type,
            amount: roundAmount(bucket * this.potRatioStep * buckets.effectiveStack)
          };
    });

    const relativePosition = label(situation.position);
    const line = actions.map(action => {
      const head = `${label(action.position)}:${action.type}`;
      return action.amount === undefined ? head : `${head}:${action.amount}`;
    });
    const components = {
      version: KEY_VERSION,
      street: situation.street,
      board: suits.boardText,
      stackBucket: buckets.stackBucket * this.stackStepBb,
      potBucket: buckets.potBucket,
      position: relativePosition,
      actions: situation.actions.map((action, index) => {
        const bucket = actionBuckets[index];
        const head = `${label(action.position)}:${action.type}`;
        return bucket === undefined ? head : `${head}:${bucket}`;
      }),
      tree: this.options.treeTag
    };
    const tableDescriptor = JSON.stringify(components);
    const descriptor = hand ? JSON.stringify({ ...components, hand: suits.handText }) : tableDescriptor;

    return {
      key: hashDescriptor(descriptor),
      tableKey: hashDescriptor(tableDescriptor),
      descriptor,
      tableDescriptor,
      mapping: suits.mapping,
      relativePosition,
      line,
      situation: {
        street: situation.street,
        board: suits.board,
        pot: buckets.pot,
        effectiveStack: buckets.effectiveStack,
        position: situation.position,
        ...(situation.opponents ? { opponents: [...situation.opponents] } : {}),
        actions
      },
      ...(hand ? { hand: suits.handText } : {})
    };
  }
}
