import { NotFoundError, type Solution } from "@gto-broker/shared";
import type { CanonicalSituation } from "../canonical/types";
import { BaseSolverBridge, type BaseSolverBridgeOptions } from "./baseBridge";

/** Answers from imported and previously solved tables only. */
export class PrecomputedSolverBridge extends BaseSolverBridge {
  constructor(options: BaseSolverBridgeOptions) {
    super(options);
  }

  protected async lookup(canonical: CanonicalSituation): Promise<Solution> {
    this.logPhase("cache-lookup", canonical);
    const table = await this.cache.get(canonical.tableKey);
    if (!table) {
      this.logPhase("miss", canonical);
      throw new NotFoundError(`No precomputed solution for ${canonical.tableDescriptor}`, canonical.tableKey);
    }
    this.logPhase("hit", canonical);
    return table;
  }
}
