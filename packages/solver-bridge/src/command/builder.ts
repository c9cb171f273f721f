import { createHash } from "node:crypto";
import {
  ConfigurationError,
  formatCard,
  type PostflopStreet,
  type SolverConfig,
  type Street,
  type StreetBetSizes
} from "@gto-broker/shared";
import type { CanonicalSituation } from "../canonical/types";
import type { ProcessInvocation } from "./types";

const POSTFLOP_STREETS: readonly PostflopStreet[] = ["flop", "turn", "river"];
const SEATS = ["oop", "ip"] as const;

function fail(field: string, message: string): never {
  throw new ConfigurationError(message, field);
}

function requirePositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    fail(field, `${field} must be a positive number, received ${value}`);
  }
}

function requireInteger(value: number, minimum: number, field: string): void {
  if (!Number.isInteger(value) || value < minimum) {
    fail(field, `${field} must be an integer >= ${minimum}, received ${value}`);
  }
}

function requireCommand(value: string | undefined, field: string): string {
  if (!value || !value.trim()) {
    fail(field, `${field} is required`);
  }
  return value.trim();
}

function validateBetSizes(street: PostflopStreet, sizes: StreetBetSizes | undefined): StreetBetSizes {
  if (!sizes) {
    fail(`solver.betSizes.${street}`, `solver.betSizes.${street} is required`);
  }
  for (const kind of ["bet", "raise"] as const) {
    sizes[kind].forEach((size, index) => requirePositive(size, `solver.betSizes.${street}.${kind}[${index}]`));
  }
  return sizes;
}

/** Throws ConfigurationError naming the first field that cannot drive a solve. */
export function validateSolverConfig(config: SolverConfig): void {
  if (!config.binaryPath || !config.binaryPath.trim()) {
    fail("solver.binaryPath", "solver.binaryPath is required");
  }
  requireInteger(config.threads, 1, "solver.threads");
  requirePositive(config.accuracy, "solver.accuracy");
  requireInteger(config.maxIterations, 1, "solver.maxIterations");
  if (!Number.isFinite(config.allinThreshold) || config.allinThreshold <= 0 || config.allinThreshold > 1) {
    fail("solver.allinThreshold", `solver.allinThreshold must be in (0, 1], received ${config.allinThreshold}`);
  }
  requirePositive(config.timeoutMs, "solver.timeoutMs");
  requireInteger(config.workerPoolSize, 1, "solver.workerPoolSize");
  if (!config.ranges?.ip?.trim()) {
    fail("solver.ranges.ip", "solver.ranges.ip is required");
  }
  if (!config.ranges?.oop?.trim()) {
    fail("solver.ranges.oop", "solver.ranges.oop is required");
  }
  POSTFLOP_STREETS.forEach(street => validateBetSizes(street, config.betSizes?.[street]));
  const dialect = config.dialect;
  if (!dialect) {
    fail("solver.dialect", "solver.dialect is required");
  }
  requireCommand(dialect.inputFlag, "solver.dialect.inputFlag");
  requireCommand(dialect.inputFile, "solver.dialect.inputFile");
}

/** Streets the tree still has to cover from `street` onwards. */
export function remainingStreets(street: Street): PostflopStreet[] {
  if (street === "preflop") {
    return [...POSTFLOP_STREETS];
  }
  return POSTFLOP_STREETS.slice(POSTFLOP_STREETS.indexOf(street));
}

/**
 * Short hash of everything in the solver config that shapes the game tree.
 * Accuracy, threads and iteration caps change quality, not the tree.
 */
export function describeTree(config: SolverConfig): string {
  const shape = {
    betSizes: POSTFLOP_STREETS.map(street => {
      const sizes = config.betSizes[street];
      return [street, sizes.bet, sizes.raise, sizes.allin];
    }),
    ranges: [config.ranges.ip, config.ranges.oop],
    allinThreshold: config.allinThreshold
  };
  return createHash("sha256").update(JSON.stringify(shape)).digest("hex").slice(0, 16);
}

function formatNumber(value: number): string {
  return Number(value.toFixed(4)).toString();
}

/**
 * Writes the command file for one canonical situation, one command per line,
 * using the command names pinned in `config.dialect`.
 */
export function buildInvocation(canonical: CanonicalSituation, config: SolverConfig): ProcessInvocation {
  validateSolverConfig(config);
  const { situation } = canonical;
  requirePositive(situation.pot, "situation.pot");
  requirePositive(situation.effectiveStack, "situation.effectiveStack");

  const { commands } = config.dialect;
  const command = (field: keyof typeof commands, ...args: string[]) => {
    const name = requireCommand(commands[field], `solver.dialect.commands.${field}`);
    return args.length > 0 ? `${name} ${args.join(" ")}` : name;
  };

  const lines: string[] = [
    command("pot", formatNumber(situation.pot)),
    command("effectiveStack", formatNumber(situation.effectiveStack))
  ];
  if (situation.board.length > 0) {
    lines.push(command("board", situation.board.map(formatCard).join(",")));
  }
  lines.push(command("rangeIp", config.ranges.ip), command("rangeOop", config.ranges.oop));

  for (const street of remainingStreets(situation.street)) {
    const sizes = config.betSizes[street];
    for (const seat of SEATS) {
      if (sizes.bet.length > 0) {
        lines.push(command("betSizes", [seat, street, "bet", ...sizes.bet.map(formatNumber)].join(",")));
      }
      if (sizes.raise.length > 0) {
        lines.push(command("betSizes", [seat, street, "raise", ...sizes.raise.map(formatNumber)].join(",")));
      }
      if (sizes.allin) {
        lines.push(command("betSizes", [seat, street, "allin"].join(",")));
      }
    }
  }

  lines.push(
    command("allinThreshold", formatNumber(config.allinThreshold)),
    command("buildTree"),
    command("threads", String(config.threads)),
    command("accuracy", formatNumber(config.accuracy)),
    command("maxIterations", String(config.maxIterations)),
    command("isomorphism", config.useIsomorphism ? "1" : "0"),
    command("startSolve"),
    command("selectNode", canonical.relativePosition, canonical.line.length > 0 ? canonical.line.join(",") : "root")
  );

  const { dialect } = config;
  if (dialect.outputFile) {
    lines.push(command("dumpResult", dialect.outputFile));
  }

  return {
    binaryPath: config.binaryPath,
    args: [dialect.inputFlag, dialect.inputFile, ...dialect.extraArgs],
    inputFile: dialect.inputFile,
    input: `${lines.join("\n")}\n`,
    ...(dialect.outputFile ? { outputFile: dialect.outputFile } : {}),
    descriptor: canonical.tableDescriptor
  };
}
