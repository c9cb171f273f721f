export { decodeOutput, parseActionLabel, parseOutput, solutionFromTable } from "./outputParser";
export type { DecodeOptions, ParseOptions, StrategyTable } from "./outputParser";
