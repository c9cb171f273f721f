import {
  LogLevel,
  NotFoundError,
  SolverBridgeError,
  actionKey,
  evOf,
  formatHand,
  frequencyOf,
  type ActionKey,
  type Hand,
  type RequestPhase,
  type Situation,
  type Solution,
  type SolverAction,
  type Strategy
} from "@gto-broker/shared";
import { silentLogger, type ComponentLogger } from "@gto-broker/logger";
import type { Canonicalizer } from "../canonical/canonicalizer";
import { invertMapping, relabelSolution, relabelStrategy } from "../canonical/suitMapping";
import type { CanonicalSituation } from "../canonical/types";
import type { SolutionCache } from "../cache/solutionCache";
import type { ActionComparison, RequestOptions, SolverBackend } from "./types";

export interface BaseSolverBridgeOptions {
  canonicalizer: Canonicalizer;
  cache: SolutionCache;
  logger?: ComponentLogger;
  now?: () => number;
}

function toKey(action: SolverAction | ActionKey): ActionKey {
  return typeof action === "string" ? action : actionKey(action);
}

/**
 * Shared request flow: canonicalize, fetch the canonical table from the
 * subclass, then translate back to the caller's suits. Every request logs
 * `solver.request.start` and ends with `done` or `failed`.
 */
export abstract class BaseSolverBridge<TOptions extends RequestOptions = RequestOptions> implements SolverBackend {
  protected readonly canonicalizer: Canonicalizer;
  protected readonly cache: SolutionCache;
  protected readonly logger: ComponentLogger;
  private readonly now: () => number;

  protected constructor(options: BaseSolverBridgeOptions) {
    this.canonicalizer = options.canonicalizer;
    this.cache = options.cache;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async solve(situation: Situation, options?: TOptions): Promise<Solution> {
    const canonical = this.canonicalizer.canonicalize(situation);
    return this.request(canonical, options, table => relabelSolution(table, invertMapping(canonical.mapping)));
  }

  async getStrategy(situation: Situation, hand: Hand, options?: TOptions): Promise<Strategy> {
    const canonical = this.canonicalizer.canonicalize(situation, hand);
    return this.request(canonical, options, table => {
      const strategy = canonical.hand === undefined ? undefined : table.strategies[canonical.hand];
      if (!strategy) {
        const requested = formatHand(hand);
        throw new NotFoundError(`No strategy for ${requested} in table ${canonical.tableKey}`, requested);
      }
      return relabelStrategy(strategy, invertMapping(canonical.mapping));
    });
  }

  async getEv(
    situation: Situation,
    hand: Hand,
    action: SolverAction | ActionKey,
    options?: TOptions
  ): Promise<number> {
    const strategy = await this.getStrategy(situation, hand, options);
    const key = toKey(action);
    const ev = evOf(strategy, key);
    if (ev === undefined) {
      throw new NotFoundError(`No EV for ${key} with ${strategy.hand}`, key);
    }
    return ev;
  }

  /** EV and frequency of each action, best EV first. */
  async compareActions(
    situation: Situation,
    hand: Hand,
    actions: ReadonlyArray<SolverAction | ActionKey>,
    options?: TOptions
  ): Promise<ActionComparison[]> {
    const strategy = await this.getStrategy(situation, hand, options);
    const comparisons = actions.map(action => {
      const key = toKey(action);
      const ev = evOf(strategy, key);
      if (ev === undefined) {
        throw new NotFoundError(`No EV for ${key} with ${strategy.hand}`, key);
      }
      return { action: key, ev, frequency: frequencyOf(strategy, key) };
    });
    return comparisons.sort((a, b) => b.ev - a.ev);
  }

  /** Returns the table for `canonical.tableKey`, in canonical suits. */
  protected abstract lookup(canonical: CanonicalSituation, options: TOptions | undefined): Promise<Solution>;

  protected logPhase(
    phase: RequestPhase,
    canonical: CanonicalSituation,
    payload: Record<string, unknown> = {},
    level: LogLevel = LogLevel.DEBUG
  ): void {
    this.logger.log(level, `solver.request.${phase}`, { key: canonical.tableKey, ...payload });
  }

  private async request<T>(
    canonical: CanonicalSituation,
    options: TOptions | undefined,
    select: (table: Solution) => T
  ): Promise<T> {
    const startedAt = this.now();
    this.logPhase("start", canonical, {
      street: canonical.situation.street,
      position: canonical.relativePosition
    });
    try {
      const signal = options?.signal;
      if (signal?.aborted) {
        throw signal.reason;
      }
      const result = select(await this.lookup(canonical, options));
      this.logPhase("done", canonical, { durationMs: this.now() - startedAt }, LogLevel.INFO);
      return result;
    } catch (error) {
      this.logPhase(
        "failed",
        canonical,
        {
          durationMs: this.now() - startedAt,
          code: error instanceof SolverBridgeError ? error.code : "UNKNOWN",
          error: error instanceof Error ? error.message : String(error)
        },
        error instanceof NotFoundError ? LogLevel.INFO : LogLevel.ERROR
      );
      throw error;
    }
  }
}
