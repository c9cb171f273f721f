import type { JSONSchemaType } from "ajv";
import type { LogLevel } from "../observability";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export type JsonSchema = JSONSchemaType<unknown>;
export type CacheCompression = "none" | "gzip";
export type PostflopStreet = "flop" | "turn" | "river";

export interface StreetBetSizes {
  /** Bet sizes as a percentage of the pot. */
  bet: number[];
  /** Raise sizes as a percentage of the pot. */
  raise: number[];
  allin: boolean;
}

/**
 * Command names, argv and output field names of one solver binary release.
 * Pinned here so a binary upgrade is a config change.
 */
export interface SolverDialect {
  name: string;
  inputFlag: string;
  extraArgs: string[];
  inputFile: string;
  outputFile?: string;
  commands: {
    pot: string;
    effectiveStack: string;
    board: string;
    rangeIp: string;
    rangeOop: string;
    betSizes: string;
    allinThreshold: string;
    threads: string;
    accuracy: string;
    maxIterations: string;
    isomorphism: string;
    buildTree: string;
    startSolve: string;
    /** Points the dump at the acting seat's node: `<cmd> <seat> <line|root>`. */
    selectNode: string;
    dumpResult?: string;
  };
  output: {
    exploitability: string;
    iterations: string;
    strategy: string;
    frequencies: string;
    ev: string;
  };
}

export interface SolverRetryConfig {
  backoffMs: number;
  retryOnTimeout: boolean;
  transientExitCodes: number[];
}

export interface SolverConfig {
  binaryPath: string;
  threads: number;
  /** Target exploitability, percent of the pot. */
  accuracy: number;
  maxIterations: number;
  useIsomorphism: boolean;
  allinThreshold: number;
  timeoutMs: number;
  killGraceMs: number;
  workerPoolSize: number;
  normalizationTolerance: number;
  retry: SolverRetryConfig;
  betSizes: Record<PostflopStreet, StreetBetSizes>;
  ranges: { ip: string; oop: string };
  dialect: SolverDialect;
}

export interface CanonicalConfig {
  stackStepBb: number;
  potRatioStep: number;
}

export interface CacheConfig {
  directory: string;
  compression: CacheCompression;
}

export interface LoggingConfig {
  level: LogLevel;
  console: { enabled: boolean };
  file: {
    enabled: boolean;
    outputDir?: string;
    maxFileSizeMb?: number;
    maxFiles?: number;
  };
}

export interface BrokerConfig {
  solver: SolverConfig;
  canonical: CanonicalConfig;
  cache: CacheConfig;
  logging: LoggingConfig;
}
