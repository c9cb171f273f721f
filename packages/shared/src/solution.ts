import type { ActionKey, Solution, Strategy } from "./types";

export interface StrategyInput {
  hand: string;
  frequencies: Record<ActionKey, number>;
  ev: Record<ActionKey, number>;
}

export interface SolutionInput {
  exploitability: number;
  iterations: number;
  strategies: Record<string, StrategyInput>;
}

export function freezeStrategy(input: StrategyInput): Strategy {
  return Object.freeze({
    hand: input.hand,
    frequencies: Object.freeze({ ...input.frequencies }),
    ev: Object.freeze({ ...input.ev })
  });
}

/** Copies and deep-freezes a solution table. */
export function freezeSolution(input: SolutionInput): Solution {
  const strategies: Record<string, Strategy> = {};
  for (const [hand, strategy] of Object.entries(input.strategies)) {
    strategies[hand] = freezeStrategy(strategy);
  }
  return Object.freeze({
    exploitability: input.exploitability,
    iterations: input.iterations,
    strategies: Object.freeze(strategies)
  });
}

export function frequencySum(strategy: Pick<Strategy, "frequencies">): number {
  return Object.values(strategy.frequencies).reduce((sum, value) => sum + value, 0);
}
