import type { ActionKey, Hand, Situation, Solution, SolverAction, Strategy } from "@gto-broker/shared";

export interface RequestOptions {
  /** Abandons this caller's wait. A shared computation keeps running. */
  signal?: AbortSignal;
}

export interface SolveOptions extends RequestOptions {
  /** Re-run the solver even when the table is cached, replacing the entry. */
  force?: boolean;
}

export interface ActionComparison {
  action: ActionKey;
  ev: number;
  frequency: number;
}

/** What callers can ask of a solver, whichever source backs it. */
export interface SolverBackend {
  solve(situation: Situation, options?: RequestOptions): Promise<Solution>;
  getStrategy(situation: Situation, hand: Hand, options?: RequestOptions): Promise<Strategy>;
  getEv(situation: Situation, hand: Hand, action: SolverAction | ActionKey, options?: RequestOptions): Promise<number>;
  compareActions(
    situation: Situation,
    hand: Hand,
    actions: ReadonlyArray<SolverAction | ActionKey>,
    options?: RequestOptions
  ): Promise<ActionComparison[]>;
}
