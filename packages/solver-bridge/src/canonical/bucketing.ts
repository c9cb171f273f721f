import { PREFLOP_ORDER, POSTFLOP_ORDER, type Position, type Situation } from "@gto-broker/shared";

/** Nearest grid index, never below the first step. */
export function bucketIndex(value: number, step: number): number {
  return Math.max(1, Math.round(value / step));
}

export function roundAmount(value: number): number {
  return Number(value.toFixed(4));
}

export interface StackPotBuckets {
  stackBucket: number;
  potBucket: number;
  effectiveStack: number;
  pot: number;
}

/**
 * Stack snaps to the `stackStepBb` grid; pot is expressed as a fraction of the
 * effective stack on the `potRatioStep` grid. The representative values are
 * rebuilt from the bucket indices.
 */
export function bucketStackAndPot(situation: Situation, stackStepBb: number, potRatioStep: number): StackPotBuckets {
  const stackBucket = bucketIndex(situation.effectiveStack, stackStepBb);
  const effectiveStack = roundAmount(stackBucket * stackStepBb);
  const potBucket = bucketIndex(situation.pot / situation.effectiveStack, potRatioStep);
  return {
    stackBucket,
    potBucket,
    effectiveStack,
    pot: roundAmount(potBucket * potRatioStep * effectiveStack)
  };
}

/** Amount as a stack fraction on the ratio grid; may be zero. */
export function amountBucket(amount: number, effectiveStack: number, potRatioStep: number): number {
  return Math.round(amount / effectiveStack / potRatioStep);
}

function seatOffset(from: Position, to: Position): number {
  const size = PREFLOP_ORDER.length;
  return (PREFLOP_ORDER.indexOf(to) - PREFLOP_ORDER.indexOf(from) + size) % size;
}

/**
 * Maps absolute seats to labels that only depend on acting order:
 * `IP`/`OOP` heads-up, `P<i>/<n>` multiway, `open/<seats behind>` when the
 * acting seat has no listed opponents. Seats outside the hand are labelled by
 * their offset from the acting seat.
 */
export function createSeatLabeler(situation: Situation): (position: Position) => string {
  const opponents = situation.opponents ?? [];
  const hero = situation.position;
  if (opponents.length === 0) {
    const behind = PREFLOP_ORDER.length - 1 - PREFLOP_ORDER.indexOf(hero);
    return position => (position === hero ? `open/${behind}` : `s${seatOffset(hero, position)}`);
  }
  const participants = [hero, ...opponents].sort(
    (a, b) => POSTFLOP_ORDER.indexOf(a) - POSTFLOP_ORDER.indexOf(b)
  );
  const count = participants.length;
  return position => {
    const index = participants.indexOf(position);
    if (index < 0) {
      return `s${seatOffset(hero, position)}`;
    }
    if (count === 2) {
      return index === 1 ? "IP" : "OOP";
    }
    return `P${index + 1}/${count}`;
  };
}
