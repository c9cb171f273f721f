import { describe, it, expect, afterEach, beforeEach } from "vitest";
import path from "path";
import fs from "fs";
import os from "os";
import { loadConfig, validateConfig } from "../src/config/loader";
import { ConfigurationManager, createConfigManager } from "../src/config/manager";
import type { BrokerConfig } from "../src/config/types";
import { ConfigurationError } from "../src/errors";
import type { LogLevel } from "../src/observability";

const defaultConfigPath = path.resolve(__dirname, "../../../config/broker/default.broker.json");
const schemaPath = path.resolve(__dirname, "../../../config/schema/broker-config.schema.json");

function readDefault(): BrokerConfig {
  return JSON.parse(fs.readFileSync(defaultConfigPath, "utf-8"));
}

describe("config loader", () => {
  it("loads and validates default config", () => {
    const cfg = loadConfig(defaultConfigPath, schemaPath);
    expect(cfg.solver.threads).toBe(6);
    expect(cfg.canonical.stackStepBb).toBe(5);
    expect(cfg.solver.dialect.commands.startSolve).toBe("start_solve");
  });

  it("resolves binary and cache paths against the config directory", () => {
    const cfg = loadConfig(defaultConfigPath, schemaPath);
    const configDir = path.dirname(defaultConfigPath);
    expect(cfg.solver.binaryPath).toBe(path.resolve(configDir, "../../bin/console_solver"));
    expect(cfg.cache.directory).toBe(path.resolve(configDir, "../../cache/solutions"));
  });

  it("applies overrides before resolving", () => {
    const cfg = loadConfig(defaultConfigPath, schemaPath, {
      binaryPath: "/opt/solver/console_solver",
      cacheDirectory: "/var/cache/gto"
    });
    expect(cfg.solver.binaryPath).toBe("/opt/solver/console_solver");
    expect(cfg.cache.directory).toBe("/var/cache/gto");
  });

  it("rejects a dialect missing a required command", () => {
    const cfg = readDefault();
    const { buildTree: _dropped, ...commands } = cfg.solver.dialect.commands;
    const broken = { ...cfg, solver: { ...cfg.solver, dialect: { ...cfg.solver.dialect, commands } } };
    const result = validateConfig(broken, schemaPath);
    expect(result.valid).toBe(false);
    expect(result.errors?.some(err => err.includes("buildTree"))).toBe(true);
  });

  it("rejects a non-positive worker pool size", () => {
    const cfg = readDefault();
    const broken = { ...cfg, solver: { ...cfg.solver, workerPoolSize: 0 } };
    expect(validateConfig(broken, schemaPath).valid).toBe(false);
  });
});

describe("ConfigurationManager", () => {
  let tempDir: string;
  let tempConfigPath: string;
  const managers: ConfigurationManager[] = [];

  async function track(pending: Promise<ConfigurationManager>): Promise<ConfigurationManager> {
    const created = await pending;
    managers.push(created);
    return created;
  }

  async function rewrite(mutate: (config: BrokerConfig) => void): Promise<void> {
    const config: BrokerConfig = JSON.parse(await fs.promises.readFile(tempConfigPath, "utf-8"));
    mutate(config);
    await fs.promises.writeFile(tempConfigPath, JSON.stringify(config, null, 2), "utf-8");
  }

  function recordingLogger() {
    const events: string[] = [];
    return { events, logger: { log: (_level: LogLevel, event: string) => void events.push(event) } };
  }

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "config-test-"));
    tempConfigPath = path.join(tempDir, "test-config.json");
    const defaultConfig = await fs.promises.readFile(defaultConfigPath, "utf-8");
    await fs.promises.writeFile(tempConfigPath, defaultConfig, "utf-8");
  });

  afterEach(async () => {
    for (const manager of managers.splice(0)) {
      await manager.unwatch();
    }
    if (tempDir && fs.existsSync(tempDir)) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  });

  describe("loading", () => {
    it("loads a valid config and resolves its paths", async () => {
      const manager = new ConfigurationManager({ schemaPath });
      const cfg = await manager.load(tempConfigPath);
      expect(cfg.cache.compression).toBe("none");
      expect(cfg.cache.directory).toBe(path.resolve(tempDir, "../../cache/solutions"));
      expect(manager.current()).toBe(cfg);
    });

    it("rejects a config that fails the schema", async () => {
      const invalidConfigPath = path.join(tempDir, "invalid.json");
      await fs.promises.writeFile(invalidConfigPath, JSON.stringify({ invalid: "config" }), "utf-8");

      const manager = new ConfigurationManager({ schemaPath });
      await expect(manager.load(invalidConfigPath)).rejects.toThrow("Config validation failed");
    });

    it("rejects a file that is not JSON", async () => {
      await fs.promises.writeFile(tempConfigPath, "{", "utf-8");
      const manager = new ConfigurationManager({ schemaPath });
      await expect(manager.load(tempConfigPath)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it("validateConfig returns correct ValidationResult", () => {
      const result = validateConfig(readDefault(), schemaPath);
      expect(result.valid).toBe(true);
      expect(result.errors).toBeUndefined();
    });

    it("validateConfig returns errors for invalid config", () => {
      const result = validateConfig({ invalid: "config" }, schemaPath);
      expect(result.valid).toBe(false);
      expect(result.errors?.length ?? 0).toBeGreaterThan(0);
    });

    it("current() throws before the first load", () => {
      const manager = new ConfigurationManager({ schemaPath });
      expect(() => manager.current()).toThrow(ConfigurationError);
    });

    it("reload() fails before the first load", async () => {
      await expect(new ConfigurationManager({ schemaPath }).reload()).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe("reload", () => {
    it("replaces the current config", async () => {
      const { events, logger } = recordingLogger();
      const manager = await track(createConfigManager(tempConfigPath, { schemaPath, logger }));
      await rewrite(config => {
        config.solver.timeoutMs = 120000;
      });

      const next = await manager.reload();

      expect(next.solver.timeoutMs).toBe(120000);
      expect(manager.current().solver.timeoutMs).toBe(120000);
      expect(events).toEqual(["config.reloaded"]);
    });

    it("keeps the last good config when the file turns invalid", async () => {
      const { events, logger } = recordingLogger();
      const manager = await track(createConfigManager(tempConfigPath, { schemaPath, logger }));
      await fs.promises.writeFile(tempConfigPath, JSON.stringify({ invalid: "config" }), "utf-8");

      await expect(manager.reload()).rejects.toThrow("Config validation failed");

      expect(manager.current().solver.timeoutMs).toBe(300000);
      expect(events).toEqual(["config.reload.failed"]);
    });

    it("runs concurrent reloads one after another", async () => {
      const manager = await track(createConfigManager(tempConfigPath, { schemaPath }));
      const seen: number[] = [];
      manager.subscribe(config => config.canonical.potRatioStep, value => seen.push(value));
      await rewrite(config => {
        config.canonical.potRatioStep = 0.1;
      });

      await Promise.all([manager.reload(), manager.reload(), manager.reload()]);

      expect(manager.current().canonical.potRatioStep).toBe(0.1);
      expect(seen).toEqual([0.1]);
    });

    it("keeps reloading after a failed reload", async () => {
      const manager = await track(createConfigManager(tempConfigPath, { schemaPath }));
      const good = await fs.promises.readFile(tempConfigPath, "utf-8");
      await fs.promises.writeFile(tempConfigPath, "{", "utf-8");
      await expect(manager.reload()).rejects.toBeInstanceOf(ConfigurationError);

      await fs.promises.writeFile(tempConfigPath, good, "utf-8");
      await rewrite(config => {
        config.solver.threads = 2;
      });
      await expect(manager.reload()).resolves.toMatchObject({ solver: { threads: 2 } });
    });
  });

  describe("watching", () => {
    it("reloads when the file changes", async () => {
      const manager = await track(createConfigManager(tempConfigPath, { schemaPath, settleMs: 50 }));
      await manager.watch();
      await rewrite(config => {
        config.solver.workerPoolSize = 3;
      });
      await new Promise(resolve => setTimeout(resolve, 400));
      expect(manager.current().solver.workerPoolSize).toBe(3);
    });

    it("stops reloading after unwatch", async () => {
      const manager = await track(createConfigManager(tempConfigPath, { schemaPath, settleMs: 50 }));
      await manager.watch();
      await manager.unwatch();
      await rewrite(config => {
        config.solver.workerPoolSize = 4;
      });
      await new Promise(resolve => setTimeout(resolve, 400));
      expect(manager.current().solver.workerPoolSize).toBe(1);
    });
  });

  describe("subscriptions", () => {
    let manager: ConfigurationManager;

    beforeEach(async () => {
      manager = await track(createConfigManager(tempConfigPath, { schemaPath }));
    });

    it("calls every listener of a changed value", async () => {
      const seen: number[] = [];
      manager.subscribe(config => config.canonical.potRatioStep, value => seen.push(value));
      manager.subscribe(config => config.canonical.potRatioStep, value => seen.push(value * 10));

      await rewrite(config => {
        config.canonical.potRatioStep = 0.025;
      });
      await manager.reload();

      expect(seen).toEqual([0.025, 0.25]);
    });

    it("compares selected objects by value", async () => {
      const seen: Array<{ bet: number[] }> = [];
      manager.subscribe(config => ({ bet: config.solver.betSizes.flop.bet }), value => seen.push(value));

      await manager.reload();
      await rewrite(config => {
        config.solver.betSizes.flop.bet = [50];
      });
      await manager.reload();

      expect(seen).toEqual([{ bet: [50] }]);
    });

    it("ignores changes outside the selection", async () => {
      let called = false;
      manager.subscribe(
        config => config.canonical.potRatioStep,
        () => {
          called = true;
        }
      );

      await rewrite(config => {
        config.solver.accuracy = 0.5;
      });
      await manager.reload();

      expect(called).toBe(false);
      expect(manager.current().solver.accuracy).toBe(0.5);
    });

    it("hears the first load when subscribed before it", async () => {
      const fresh = new ConfigurationManager({ schemaPath });
      const seen: number[] = [];
      fresh.subscribe(config => config.solver.threads, value => seen.push(value));
      await fresh.load(tempConfigPath);
      expect(seen).toEqual([6]);
    });

    it("logs a failing listener and still calls the rest", async () => {
      const { events, logger } = recordingLogger();
      const logged = await track(createConfigManager(tempConfigPath, { schemaPath, logger }));
      const seen: number[] = [];
      logged.subscribe(
        config => config.solver.threads,
        () => {
          throw new Error("listener broke");
        }
      );
      logged.subscribe(config => config.solver.threads, value => seen.push(value));

      await rewrite(config => {
        config.solver.threads = 3;
      });
      await logged.reload();

      expect(seen).toEqual([3]);
      expect(events).toEqual(["config.listener.failed", "config.reloaded"]);
    });

    it("stops notifying after unsubscribe", async () => {
      const seen: number[] = [];
      const unsubscribe = manager.subscribe(config => config.solver.threads, value => seen.push(value));
      unsubscribe();

      await rewrite(config => {
        config.solver.threads = 2;
      });
      await manager.reload();

      expect(seen).toEqual([]);
    });
  });
});
