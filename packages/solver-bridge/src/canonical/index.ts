export { Canonicalizer, KEY_VERSION } from "./canonicalizer";
export type { CanonicalizerOptions } from "./canonicalizer";
export {
  applyMapping,
  invertMapping,
  mappingFromScan,
  relabelHand,
  relabelSolution,
  relabelStrategy
} from "./suitMapping";
export { bucketIndex, bucketStackAndPot, createSeatLabeler } from "./bucketing";
export type { CanonicalSituation, SuitMapping } from "./types";
