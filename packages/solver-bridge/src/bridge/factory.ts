import { ConfigurationManager, LogLevel, type BrokerConfig } from "@gto-broker/shared";
import { silentLogger, type ComponentLogger } from "@gto-broker/logger";
import { Canonicalizer } from "../canonical/canonicalizer";
import { SolutionCache } from "../cache/solutionCache";
import { FileCacheStore } from "../cache/storage";
import type { CacheStore } from "../cache/types";
import { describeTree, validateSolverConfig } from "../command/builder";
import { ChildProcessRunner } from "../runner/childProcessRunner";
import { RetryingRunner } from "../runner/retryingRunner";
import { SlotPool } from "../runner/slotPool";
import type { ProcessRunner, SpawnFunction } from "../runner/types";
import type { BaseSolverBridge } from "./baseBridge";
import { LiveSolverBridge } from "./liveBridge";
import { PrecomputedSolverBridge } from "./precomputedBridge";
import type { SolveOptions } from "./types";

export type BridgeMode = "live" | "precomputed";

export interface CreateSolverBridgeOptions {
  mode?: BridgeMode;
  /** Replaces the child-process runner, retry wrapper included. */
  runner?: ProcessRunner;
  store?: CacheStore;
  spawn?: SpawnFunction;
  logger?: ComponentLogger;
  now?: () => number;
}

export interface SolverBridgeHandle {
  bridge: BaseSolverBridge<SolveOptions>;
  cache: SolutionCache;
  canonicalizer: Canonicalizer;
  pool?: SlotPool;
  /** Stops following config reloads. */
  close(): void;
}

/** Settings baked into cache keys or the store; a reload cannot change them in place. */
function fixedSettings(config: BrokerConfig) {
  return {
    canonical: config.canonical,
    tree: describeTree(config.solver),
    dialect: config.solver.dialect,
    cache: config.cache
  };
}

/**
 * Wires a bridge from broker config and bulk-loads the cache. One handle
 * should own a cache directory at a time.
 *
 * Given a {@link ConfigurationManager}, the handle follows reloads of
 * `solver.timeoutMs` and `solver.workerPoolSize`; other changes are
 * logged as needing a restart.
 */
export async function createSolverBridge(
  source: BrokerConfig | ConfigurationManager,
  options: CreateSolverBridgeOptions = {}
): Promise<SolverBridgeHandle> {
  const manager = source instanceof ConfigurationManager ? source : undefined;
  const config = source instanceof ConfigurationManager ? source.current() : source;
  const mode = options.mode ?? "live";
  const logger = options.logger ?? silentLogger;
  validateSolverConfig(config.solver);

  const canonicalizer = new Canonicalizer({ canonical: config.canonical, treeTag: describeTree(config.solver) });
  const store =
    options.store ??
    new FileCacheStore(config.cache.directory, {
      compression: config.cache.compression,
      logger: logger.child("cache-store")
    });
  const cache = new SolutionCache(store, { logger: logger.child("solution-cache"), now: options.now });
  const loaded = await cache.load();
  logger.log(LogLevel.INFO, "solver.bridge.ready", { mode, entries: loaded, tree: canonicalizer.treeTag });

  const bridgeLogger = logger.child("solver-bridge", { mode });
  const unsubscribe: Array<() => void> = [];
  const close = () => {
    for (const stop of unsubscribe.splice(0)) {
      stop();
    }
  };
  if (manager) {
    unsubscribe.push(
      manager.subscribe(fixedSettings, () => {
        bridgeLogger.log(LogLevel.WARN, "solver.bridge.restart-required", {
          reason: "canonical, tree, dialect or cache settings changed"
        });
      })
    );
  }

  if (mode === "precomputed") {
    return {
      bridge: new PrecomputedSolverBridge({ canonicalizer, cache, logger: bridgeLogger, now: options.now }),
      cache,
      canonicalizer,
      close
    };
  }

  const runner =
    options.runner ??
    new RetryingRunner(
      new ChildProcessRunner({
        spawn: options.spawn,
        killGraceMs: config.solver.killGraceMs,
        transientExitCodes: config.solver.retry.transientExitCodes,
        logger: logger.child("solver-process")
      }),
      {
        backoffMs: config.solver.retry.backoffMs,
        retryOnTimeout: config.solver.retry.retryOnTimeout,
        logger: logger.child("solver-retry")
      }
    );
  const pool = new SlotPool(config.solver.workerPoolSize);
  const bridge = new LiveSolverBridge({
    canonicalizer,
    cache,
    solver: config.solver,
    runner,
    pool,
    logger: bridgeLogger,
    now: options.now
  });
  if (manager) {
    unsubscribe.push(
      manager.subscribe(
        next => next.solver.timeoutMs,
        timeoutMs => {
          bridge.setTimeoutMs(timeoutMs);
          bridgeLogger.log(LogLevel.INFO, "solver.bridge.reconfigured", { timeoutMs });
        }
      ),
      manager.subscribe(
        next => next.solver.workerPoolSize,
        workerPoolSize => {
          pool.resize(workerPoolSize);
          bridgeLogger.log(LogLevel.INFO, "solver.bridge.reconfigured", { workerPoolSize });
        }
      )
    );
  }
  return { bridge, cache, canonicalizer, pool, close };
}
