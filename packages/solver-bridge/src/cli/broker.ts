#!/usr/bin/env node
import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
  EnvValidationError,
  SolverBridgeError,
  assertEnvVars,
  loadConfig,
  parseHand,
  readOptionalEnv,
  situationFromJson,
  type BrokerConfig,
  type Situation
} from "@gto-broker/shared";
import { createBrokerLogger, type StructuredLogger } from "@gto-broker/logger";
import { seedPrecomputed } from "../cache/seed";
import { createSolverBridge, type BridgeMode } from "../bridge/factory";
import { Canonicalizer } from "../canonical/canonicalizer";
import { describeTree } from "../command/builder";

const stderrConsole = {
  debug: console.error,
  info: console.error,
  warn: console.error,
  error: console.error
};

function resolveFromCwd(value: string | undefined): string | undefined {
  return value === undefined ? undefined : path.resolve(process.cwd(), value);
}

function readBrokerConfig(): BrokerConfig {
  assertEnvVars("cli");
  const configPath = readOptionalEnv("BROKER_CONFIG") ?? "config/broker/default.broker.json";
  return loadConfig(path.resolve(process.cwd(), configPath), undefined, {
    binaryPath: resolveFromCwd(readOptionalEnv("SOLVER_BINARY_PATH")),
    cacheDirectory: resolveFromCwd(readOptionalEnv("SOLVER_CACHE_DIR"))
  });
}

function createLogger(config: BrokerConfig): StructuredLogger {
  return createBrokerLogger(config.logging, {
    sessionId: readOptionalEnv("BROKER_SESSION_ID") ?? randomUUID(),
    level: readOptionalEnv("BROKER_LOG_LEVEL"),
    format: "line",
    consoleImpl: stderrConsole
  });
}

async function readSituation(file: string): Promise<Situation> {
  const raw = await readFile(path.resolve(process.cwd(), file), "utf-8");
  return situationFromJson(JSON.parse(raw));
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function withLogger(config: BrokerConfig, task: (logger: StructuredLogger) => Promise<void>): Promise<void> {
  const logger = createLogger(config);
  await logger.start();
  try {
    await task(logger);
  } finally {
    await logger.stop();
  }
}

async function runSolve(args: { situation: string; hand?: string; mode?: BridgeMode; force: boolean }): Promise<void> {
  const config = readBrokerConfig();
  await withLogger(config, async logger => {
    const { bridge } = await createSolverBridge(config, { mode: args.mode ?? "live", logger });
    const situation = await readSituation(args.situation);
    if (args.hand) {
      print(await bridge.getStrategy(situation, parseHand(args.hand), { force: args.force }));
    } else {
      print(await bridge.solve(situation, { force: args.force }));
    }
  });
}

async function runSeed(args: { dir?: string }): Promise<void> {
  const config = readBrokerConfig();
  const directory = args.dir ?? readOptionalEnv("PRECOMPUTED_DIR");
  if (!directory) {
    throw new EnvValidationError("seed", ["PRECOMPUTED_DIR"]);
  }
  await withLogger(config, async logger => {
    const { cache, canonicalizer } = await createSolverBridge(config, { mode: "precomputed", logger });
    const report = await seedPrecomputed(cache, path.resolve(process.cwd(), directory), canonicalizer, {
      logger: logger.child("seed"),
      tolerance: config.solver.normalizationTolerance
    });
    print(report);
    if (report.failed.length > 0) {
      process.exitCode = 1;
    }
  });
}

async function runStats(): Promise<void> {
  const config = readBrokerConfig();
  await withLogger(config, async logger => {
    const { cache } = await createSolverBridge(config, { mode: "precomputed", logger });
    const byProvenance = { precomputed: 0, dynamic: 0 };
    for (const entry of cache.entries()) {
      byProvenance[entry.provenance] += 1;
    }
    print({ location: cache.location, ...cache.stats(), ...byProvenance });
  });
}

async function runKey(args: { situation: string; hand?: string }): Promise<void> {
  const config = readBrokerConfig();
  const canonicalizer = new Canonicalizer({ canonical: config.canonical, treeTag: describeTree(config.solver) });
  const situation = await readSituation(args.situation);
  const canonical = canonicalizer.canonicalize(situation, args.hand ? parseHand(args.hand) : undefined);
  print({
    key: canonical.key,
    tableKey: canonical.tableKey,
    descriptor: canonical.descriptor,
    mapping: canonical.mapping,
    relativePosition: canonical.relativePosition,
    hand: canonical.hand
  });
}

loadDotenv();

void yargs(hideBin(process.argv))
  .scriptName("gto-broker")
  .command(
    "solve",
    "Solve a situation and print the strategy table, or one hand's strategy",
    builder => builder
      .option("situation", { type: "string", demandOption: true, describe: "Situation JSON file" })
      .option("hand", { type: "string", describe: "Hero hand, e.g. AhKd" })
      .option("mode", { choices: ["live", "precomputed"] as const, describe: "Run the solver on a miss (live, the default) or answer from the cache only" })
      .option("force", { type: "boolean", default: false, describe: "Re-solve even when cached" }),
    async args => {
      await runSolve(args);
    }
  )
  .command(
    "seed [dir]",
    "Import precomputed spot files into the cache",
    builder => builder.positional("dir", { type: "string", describe: "Directory of spot JSON files (defaults to PRECOMPUTED_DIR)" }),
    async args => {
      await runSeed(args);
    }
  )
  .command("stats", "Print cache statistics", builder => builder, async () => {
    await runStats();
  })
  .command(
    "key",
    "Print the canonical key and descriptor of a situation",
    builder => builder
      .option("situation", { type: "string", demandOption: true, describe: "Situation JSON file" })
      .option("hand", { type: "string", describe: "Hero hand, e.g. AhKd" }),
    async args => {
      await runKey(args);
    }
  )
  .demandCommand()
  .help()
  .strict()
  .fail((message, error) => {
    const detail = error instanceof SolverBridgeError ? `${error.name} [${error.code}]: ${error.message}` : error?.message ?? message;
    console.error(`[gto-broker] ${detail}`);
    process.exit(1);
  })
  .parse();
