export { buildInvocation, describeTree, remainingStreets, validateSolverConfig } from "./builder";
export type { ProcessInvocation } from "./types";
