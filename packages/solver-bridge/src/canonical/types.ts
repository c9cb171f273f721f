import type { Situation, Suit } from "@gto-broker/shared";

/** Real suit → canonical suit. Always a bijection over all four suits. */
export type SuitMapping = Readonly<Record<Suit, Suit>>;

export interface CanonicalSituation {
  /** Situation plus hand. */
  readonly key: string;
  /** Situation only; the solver table for every hand lives under this key. */
  readonly tableKey: string;
  readonly descriptor: string;
  readonly tableDescriptor: string;
  readonly mapping: SuitMapping;
  readonly relativePosition: string;
  /** Prior actions as `<seat label>:<type>[:<representative amount>]`. */
  readonly line: readonly string[];
  /** Canonical suits with representative (bucketed) pot, stack and amounts. */
  readonly situation: Situation;
  /** Canonical text form of the hand, when one was given. */
  readonly hand?: string;
}

