import fs from "node:fs/promises";
import path from "node:path";
import {
  CacheIOError,
  ConfigurationError,
  LogLevel,
  ParseError,
  expandHandClass,
  formatCard,
  normalizeHandString,
  situationFromJson,
  type Card
} from "@gto-broker/shared";
import { silentLogger, type ComponentLogger } from "@gto-broker/logger";
import type { Canonicalizer } from "../canonical/canonicalizer";
import { relabelSolution } from "../canonical/suitMapping";
import { solutionFromTable, type StrategyTable } from "../parser/outputParser";
import type { SolutionCache } from "./solutionCache";

export interface SeedOptions {
  logger?: ComponentLogger;
  tolerance?: number;
}

export interface SeedFailure {
  file: string;
  error: string;
}

export interface SeedReport {
  imported: number;
  /** Spots whose key already had an entry. */
  skipped: number;
  failed: SeedFailure[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a spot's strategies. Hand classes (`AA`, `AKs`, `AKo`) stand for
 * every combo not blocked by the board; a combo listed on its own wins
 * over its class.
 */
function readTable(value: unknown, board: readonly Card[], raw: string): StrategyTable {
  if (!isRecord(value)) {
    throw new ParseError("Spot solution has no strategies object", raw);
  }
  const dead = new Set(board.map(formatCard));
  const table: StrategyTable = {};
  const combos: StrategyTable = {};
  for (const [hand, entry] of Object.entries(value)) {
    if (!isRecord(entry) || !isRecord(entry.frequencies)) {
      throw new ParseError(`Strategy for ${hand} has no frequencies`, raw);
    }
    const strategy = { frequencies: numbers(entry.frequencies, raw), ev: isRecord(entry.ev) ? numbers(entry.ev, raw) : {} };
    const expanded = normalizeHandString(hand) === undefined ? expandHandClass(hand) : undefined;
    if (!expanded) {
      combos[hand] = strategy;
      continue;
    }
    for (const combo of expanded) {
      if (!dead.has(combo.slice(0, 2)) && !dead.has(combo.slice(2))) {
        table[combo] = strategy;
      }
    }
  }
  for (const [hand, strategy] of Object.entries(combos)) {
    const normalized = normalizeHandString(hand);
    if (normalized !== undefined) {
      delete table[normalized];
    }
    table[hand] = strategy;
  }
  return table;
}

function numbers(record: Record<string, unknown>, raw: string): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value !== "number") {
      throw new ParseError(`Value for ${key} is not a number`, raw);
    }
    result[key] = value;
  }
  return result;
}

async function discoverSpotFiles(directory: string): Promise<string[]> {
  const results: string[] = [];
  const entries = await fs.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await discoverSpotFiles(entryPath)));
    } else if (entry.isFile() && entry.name.endsWith(".json")) {
      results.push(entryPath);
    }
  }
  return results.sort();
}

/**
 * Imports precomputed spot files (`{ situation, solution }` in real suits,
 * one spot or an array of spots per file) as `precomputed` entries in
 * canonical form. Existing entries are kept.
 */
export async function seedPrecomputed(
  cache: SolutionCache,
  directory: string,
  canonicalizer: Canonicalizer,
  options: SeedOptions = {}
): Promise<SeedReport> {
  const logger = options.logger ?? silentLogger;
  const report: SeedReport = { imported: 0, skipped: 0, failed: [] };

  let files: string[];
  try {
    files = await discoverSpotFiles(directory);
  } catch (error) {
    throw new CacheIOError("list", directory, error);
  }

  for (const file of files) {
    try {
      const raw = await fs.readFile(file, "utf-8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        throw new ParseError("Spot file is not valid JSON", raw, { cause: error });
      }
      const spots = Array.isArray(parsed) ? parsed : [parsed];
      for (const spot of spots) {
        if (!isRecord(spot) || !isRecord(spot.solution)) {
          throw new ParseError("Spot needs a situation and a solution", raw);
        }
        const { exploitability = 0, iterations = 0, strategies } = spot.solution;
        if (typeof exploitability !== "number" || typeof iterations !== "number") {
          throw new ParseError("Spot exploitability and iterations must be numbers", raw);
        }
        const situation = situationFromJson(spot.situation);
        const canonical = canonicalizer.canonicalize(situation);
        if (cache.has(canonical.tableKey)) {
          report.skipped += 1;
          continue;
        }
        const real = solutionFromTable(readTable(strategies, situation.board, raw), { exploitability, iterations }, raw, options.tolerance);
        const stored = await cache.put(canonical.tableKey, relabelSolution(real, canonical.mapping), "precomputed", {
          descriptor: canonical.tableDescriptor
        });
        if (!stored) {
          throw new CacheIOError("write", cache.location, `entry ${canonical.tableKey} was not stored`);
        }
        report.imported += 1;
      }
    } catch (error) {
      if (!(error instanceof ParseError || error instanceof ConfigurationError || error instanceof CacheIOError)) {
        throw error;
      }
      logger.log(LogLevel.WARN, "cache.seed.failed", { file, error: error.message });
      report.failed.push({ file, error: error.message });
    }
  }

  logger.log(LogLevel.INFO, "cache.seed.complete", {
    directory,
    imported: report.imported,
    skipped: report.skipped,
    failed: report.failed.length
  });
  return report;
}
