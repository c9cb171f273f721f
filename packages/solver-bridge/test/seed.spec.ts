import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CacheIOError, situationFromJson, type Solution } from "@gto-broker/shared";
import { Canonicalizer } from "../src/canonical/canonicalizer";
import { seedPrecomputed } from "../src/cache/seed";
import { SolutionCache } from "../src/cache/solutionCache";
import { MemoryCacheStore, createTestLogger } from "./utils/factories";

const canonicalizer = new Canonicalizer({ canonical: { stackStepBb: 5, potRatioStep: 0.05 }, treeTag: "tree-a" });

const flopSituation = {
  street: "flop",
  board: "Ks7d2c",
  pot: 6,
  effectiveStack: 97,
  position: "BTN",
  opponents: ["BB"],
  actions: []
};

const flopSpot = {
  situation: flopSituation,
  solution: {
    exploitability: 0.2,
    iterations: 500,
    strategies: {
      AhKd: { frequencies: { CHECK: 0.3, "BET 3.3": 0.7 }, ev: { CHECK: 1, "BET 3.3": 1.4 } }
    }
  }
};

const turnSpot = {
  situation: { ...flopSituation, street: "turn", board: ["Ks", "7d", "2c", "9h"] },
  solution: { strategies: { QsQh: { frequencies: { CHECK: 1 }, ev: { CHECK: 0.5 } } } }
};

describe("seedPrecomputed", () => {
  let dir: string;

  async function writeSpot(name: string, contents: unknown): Promise<string> {
    const file = path.join(dir, name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, typeof contents === "string" ? contents : JSON.stringify(contents), "utf-8");
    return file;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "spots-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("imports spots in canonical suits and reports failures per file", async () => {
    await writeSpot("a-flop.json", flopSpot);
    const broken = await writeSpot("b-broken.json", "{");
    const invalid = await writeSpot("c-bad.json", { ...flopSpot, situation: { ...flopSituation, pot: -1 } });
    await writeSpot("nested/d-turn.json", [turnSpot]);
    await writeSpot("notes.txt", "ignored");
    const { logger, events } = createTestLogger();
    const cache = new SolutionCache(new MemoryCacheStore());

    const report = await seedPrecomputed(cache, dir, canonicalizer, { logger });

    expect(report).toEqual({
      imported: 2,
      skipped: 0,
      failed: [
        { file: broken, error: "Spot file is not valid JSON" },
        { file: invalid, error: "Pot must be a positive number, received -1" }
      ]
    });

    const canonical = canonicalizer.canonicalize(situationFromJson(flopSituation));
    const entry = await cache.getEntry(canonical.tableKey);
    expect(entry?.provenance).toBe("precomputed");
    expect(entry?.descriptor).toBe(canonical.tableDescriptor);
    expect(entry?.solution.iterations).toBe(500);
    expect(Object.keys(entry?.solution.strategies ?? {})).toEqual(["AcKh"]);
    expect(entry?.solution.strategies.AcKh.frequencies).toEqual({ check: 0.3, "bet:3.3": 0.7 });

    const logged = await events();
    expect(logged.filter(event => event === "cache.seed.failed")).toHaveLength(2);
    expect(logged).toContain("cache.seed.complete");
  });

  it("expands hand classes into the combos the board leaves live", async () => {
    await writeSpot("classes.json", {
      situation: flopSituation,
      solution: {
        strategies: {
          KK: { frequencies: { CHECK: 1 }, ev: { CHECK: 2 } },
          AKs: { frequencies: { CHECK: 1 }, ev: { CHECK: 1.5 } },
          KdKh: { frequencies: { CHECK: 0.5, "BET 3.3": 0.5 }, ev: { CHECK: 2, "BET 3.3": 2 } }
        }
      }
    });
    const cache = new SolutionCache(new MemoryCacheStore());

    const report = await seedPrecomputed(cache, dir, canonicalizer);

    expect(report).toEqual({ imported: 1, skipped: 0, failed: [] });
    const canonical = canonicalizer.canonicalize(situationFromJson(flopSituation));
    const strategies: Solution["strategies"] = (await cache.get(canonical.tableKey))?.strategies ?? {};
    expect(Object.keys(strategies)).toHaveLength(6);
    expect(Object.keys(strategies).filter(hand => hand.startsWith("K")).sort()).toEqual(["KdKc", "KhKc", "KhKd"]);
    expect(strategies.KhKc.frequencies).toEqual({ check: 0.5, "bet:3.3": 0.5 });
    expect(strategies.KdKc.frequencies).toEqual({ check: 1 });
    expect(strategies.AsKs).toBeUndefined();
  });

  it("skips spots that are already cached", async () => {
    await writeSpot("a-flop.json", flopSpot);
    const cache = new SolutionCache(new MemoryCacheStore());
    await seedPrecomputed(cache, dir, canonicalizer);

    expect(await seedPrecomputed(cache, dir, canonicalizer)).toEqual({ imported: 0, skipped: 1, failed: [] });
  });

  it("reports a spot whose table breaks the strategy rules", async () => {
    const file = await writeSpot("bad-sum.json", {
      ...flopSpot,
      solution: { strategies: { AhKd: { frequencies: { CHECK: 0.3, "BET 3.3": 0.3 }, ev: { CHECK: 1, "BET 3.3": 1 } } } }
    });
    const report = await seedPrecomputed(new SolutionCache(new MemoryCacheStore()), dir, canonicalizer);
    expect(report.failed).toEqual([{ file, error: "Frequencies for AhKd sum to 0.6" }]);
  });

  it("fails when the directory cannot be read", async () => {
    await expect(
      seedPrecomputed(new SolutionCache(new MemoryCacheStore()), path.join(dir, "missing"), canonicalizer)
    ).rejects.toBeInstanceOf(CacheIOError);
  });
});
