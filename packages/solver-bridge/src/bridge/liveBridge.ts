import { ConfigurationError, LogLevel, type Solution, type SolverConfig } from "@gto-broker/shared";
import type { CanonicalSituation } from "../canonical/types";
import { buildInvocation } from "../command/builder";
import { decodeOutput } from "../parser/outputParser";
import type { SlotPool } from "../runner/slotPool";
import type { ProcessRunner } from "../runner/types";
import { BaseSolverBridge, type BaseSolverBridgeOptions } from "./baseBridge";
import type { SolveOptions } from "./types";

export interface LiveSolverBridgeOptions extends BaseSolverBridgeOptions {
  solver: SolverConfig;
  runner: ProcessRunner;
  pool: SlotPool;
}

/** Serves cached tables and runs the solver binary on a miss. */
export class LiveSolverBridge extends BaseSolverBridge<SolveOptions> {
  private readonly solver: SolverConfig;
  private timeoutMs: number;
  private readonly runner: ProcessRunner;
  private readonly pool: SlotPool;

  constructor(options: LiveSolverBridgeOptions) {
    super(options);
    this.solver = options.solver;
    this.timeoutMs = options.solver.timeoutMs;
    this.runner = options.runner;
    this.pool = options.pool;
  }

  /** Applies to solves started after the call. */
  setTimeoutMs(timeoutMs: number): void {
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
      throw new ConfigurationError(`solver.timeoutMs must be a positive integer, received ${timeoutMs}`, "solver.timeoutMs");
    }
    this.timeoutMs = timeoutMs;
  }

  protected async lookup(canonical: CanonicalSituation, options: SolveOptions | undefined): Promise<Solution> {
    this.logPhase("cache-lookup", canonical, { force: options?.force ?? false });
    let computed = false;
    const table = await this.cache.getOrCompute(
      canonical.tableKey,
      () => {
        computed = true;
        this.logPhase("miss", canonical);
        return this.compute(canonical);
      },
      { signal: options?.signal, force: options?.force, descriptor: canonical.tableDescriptor }
    );
    if (computed) {
      this.logPhase("cache-write", canonical, { stored: this.cache.has(canonical.tableKey) });
    } else {
      this.logPhase("hit", canonical);
    }
    return table;
  }

  private compute(canonical: CanonicalSituation): Promise<Solution> {
    return this.pool.run(async () => {
      this.logPhase("compute", canonical, { descriptor: canonical.tableDescriptor }, LogLevel.INFO);
      const invocation = buildInvocation(canonical, this.solver);
      const raw = await this.runner.run(invocation, this.timeoutMs);
      const solution = decodeOutput(raw.output, this.solver.dialect, {
        tolerance: this.solver.normalizationTolerance
      });
      this.logPhase("success", canonical, {
        durationMs: raw.durationMs,
        exploitability: solution.exploitability,
        iterations: solution.iterations,
        hands: Object.keys(solution.strategies).length
      });
      return solution;
    });
  }
}
