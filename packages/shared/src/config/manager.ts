import fs from "fs/promises";
import path from "path";
import { isDeepStrictEqual } from "util";
import type { FSWatcher } from "chokidar";
import { ConfigurationError } from "../errors";
import { LogLevel } from "../observability";
import type { BrokerConfig } from "./types";
import { defaultSchemaPath, resolveConfigPaths, validateConfig } from "./loader";

/** Structural match for the broker's component logger. */
export interface ConfigEventLogger {
  log(level: LogLevel, event: string, payload?: Record<string, unknown>): void;
}

export interface ConfigurationManagerOptions {
  schemaPath?: string;
  logger?: ConfigEventLogger;
  /** Quiet period after the last write before a watched file is reloaded. */
  settleMs?: number;
}

interface Subscription {
  /** Re-reads the selected value and calls the listener when it differs. */
  update(config: BrokerConfig): void;
}

const noopLogger: ConfigEventLogger = { log: () => undefined };

/**
 * Owns the live broker config. Reloads are validated before they replace
 * the current value, so a bad file leaves the last good config in place.
 * Listeners subscribe through a selector and hear only about changes to
 * the part they selected.
 */
export class ConfigurationManager {
  private config: BrokerConfig | undefined;
  private source: string | undefined;
  private watcher: FSWatcher | undefined;
  private reloads: Promise<BrokerConfig | undefined> = Promise.resolve(undefined);
  private readonly subscriptions = new Set<Subscription>();
  private readonly schemaPath: string;
  private readonly logger: ConfigEventLogger;
  private readonly settleMs: number;

  constructor(options: ConfigurationManagerOptions = {}) {
    this.schemaPath = options.schemaPath ?? defaultSchemaPath;
    this.logger = options.logger ?? noopLogger;
    this.settleMs = options.settleMs ?? 100;
  }

  async load(configPath: string): Promise<BrokerConfig> {
    const next = await this.read(configPath);
    this.source = configPath;
    this.apply(next);
    return next;
  }

  /** The current configuration. Throws before the first load. */
  current(): BrokerConfig {
    if (!this.config) {
      throw new ConfigurationError("Config not loaded", "config");
    }
    return this.config;
  }

  /**
   * Re-reads the loaded file. Reloads run one at a time; a failed one is
   * logged and rethrown with the previous config still current.
   */
  reload(): Promise<BrokerConfig> {
    const source = this.source;
    if (!source) {
      return Promise.reject(new ConfigurationError("No config file loaded", "configPath"));
    }
    const next = this.reloads.then(() => this.reloadFrom(source));
    this.reloads = next.catch(() => undefined);
    return next;
  }

  /**
   * Calls `listener` with the selected value whenever a load or reload
   * changes it. Subscribing after a load records the current value
   * without calling the listener.
   */
  subscribe<T>(select: (config: BrokerConfig) => T, listener: (value: T, config: BrokerConfig) => void): () => void {
    let last: { value: T } | undefined = this.config ? { value: select(this.config) } : undefined;
    const subscription: Subscription = {
      update: config => {
        const value = select(config);
        if (last && isDeepStrictEqual(last.value, value)) {
          return;
        }
        last = { value };
        listener(value, config);
      }
    };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  /** Reloads whenever the loaded file changes on disk. */
  async watch(): Promise<void> {
    const source = this.source;
    if (!source) {
      throw new ConfigurationError("No config file loaded", "configPath");
    }
    await this.unwatch();

    const chokidar = await import("chokidar");
    const watcher = chokidar.watch(source, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: this.settleMs, pollInterval: Math.max(10, Math.floor(this.settleMs / 2)) }
    });
    this.watcher = watcher;

    watcher.on("change", () => {
      // reload() already logged the failure; the file stays watched.
      this.reload().catch(() => undefined);
    });
    watcher.on("unlink", () => {
      this.logger.log(LogLevel.WARN, "config.file.removed", { path: source });
    });
    watcher.on("error", (error: unknown) => {
      this.logger.log(LogLevel.ERROR, "config.watch.error", { path: source, error: messageOf(error) });
    });
  }

  async unwatch(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = undefined;
    if (watcher) {
      await watcher.close();
    }
  }

  private async reloadFrom(source: string): Promise<BrokerConfig> {
    try {
      const next = await this.read(source);
      this.apply(next);
      this.logger.log(LogLevel.INFO, "config.reloaded", { path: source });
      return next;
    } catch (error) {
      this.logger.log(LogLevel.ERROR, "config.reload.failed", { path: source, error: messageOf(error) });
      throw error;
    }
  }

  private apply(next: BrokerConfig): void {
    this.config = next;
    for (const subscription of this.subscriptions) {
      try {
        subscription.update(next);
      } catch (error) {
        this.logger.log(LogLevel.ERROR, "config.listener.failed", { error: messageOf(error) });
      }
    }
  }

  private async read(configPath: string): Promise<BrokerConfig> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(configPath, "utf-8"));
    } catch (error) {
      throw new ConfigurationError(`Cannot read config ${configPath}: ${messageOf(error)}`, "config");
    }
    const result = validateConfig(parsed, this.schemaPath);
    if (!result.valid || !isBrokerConfigShape(parsed)) {
      throw new ConfigurationError(`Config validation failed:\n${result.errors?.join("\n") ?? ""}`, "config");
    }
    return resolveConfigPaths(parsed, path.dirname(path.resolve(configPath)));
  }
}

function isBrokerConfigShape(value: unknown): value is BrokerConfig {
  return typeof value === "object" && value !== null && "solver" in value && "cache" in value;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Creates a manager and loads `configPath` into it. */
export async function createConfigManager(
  configPath: string,
  options: ConfigurationManagerOptions = {}
): Promise<ConfigurationManager> {
  const manager = new ConfigurationManager(options);
  await manager.load(configPath);
  return manager;
}
