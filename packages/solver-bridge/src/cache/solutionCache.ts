import {
  CacheIOError,
  LogLevel,
  freezeSolution,
  type CacheEntry,
  type CacheStats,
  type Provenance,
  type Solution
} from "@gto-broker/shared";
import { silentLogger, type ComponentLogger } from "@gto-broker/logger";
import type { CacheStore } from "./types";

export interface SolutionCacheOptions {
  logger?: ComponentLogger;
  now?: () => number;
}

export interface PutOptions {
  /** Replace an existing entry. Without it the first entry for a key wins. */
  force?: boolean;
  descriptor?: string;
}

export interface GetOrComputeOptions {
  /** Cancels this caller's wait only; the computation keeps running. */
  signal?: AbortSignal;
  /** Skip the cached entry and overwrite it with a fresh result. */
  force?: boolean;
  descriptor?: string;
}

type FlightResult = { ok: true; solution: Solution } | { ok: false; error: unknown };

function waitFor<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * In-memory index over a CacheStore with single-flight computation per key.
 * Storage failures are logged and turn into misses; they never fail a
 * caller whose solution was computed.
 */
export class SolutionCache {
  private readonly index = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<FlightResult>>();
  private readonly writeChains = new Map<string, Promise<void>>();
  /** Frozen copies made by this cache; callers never hold a mutable alias. */
  private readonly owned = new WeakSet<Solution>();
  private readonly logger: ComponentLogger;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private coalesced = 0;

  constructor(private readonly store: CacheStore, options: SolutionCacheOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get location(): string {
    return this.store.location;
  }

  /** Bulk-loads stored entries. Returns how many were indexed. */
  async load(): Promise<number> {
    let entries: CacheEntry[];
    try {
      await this.store.init();
      entries = await this.store.list();
    } catch (error) {
      if (error instanceof CacheIOError) {
        this.logger.log(LogLevel.ERROR, "cache.load.failed", { path: error.path, error: error.message });
        return 0;
      }
      throw error;
    }
    for (const entry of entries) {
      this.index.set(entry.key, entry);
    }
    this.logger.log(LogLevel.INFO, "cache.load.complete", { entries: entries.length, location: this.store.location });
    return entries.length;
  }

  async getEntry(key: string): Promise<CacheEntry | undefined> {
    const cached = this.index.get(key);
    if (cached) {
      return cached;
    }
    const stored = await this.readStore(key);
    if (stored) {
      this.index.set(key, stored);
    }
    return stored;
  }

  async get(key: string): Promise<Solution | undefined> {
    const entry = await this.getEntry(key);
    if (entry) {
      this.hits += 1;
    } else {
      this.misses += 1;
    }
    return entry?.solution;
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  /** Resolves to true when the entry was persisted and indexed. */
  put(key: string, solution: Solution, provenance: Provenance, options: PutOptions = {}): Promise<boolean> {
    return this.persist(key, solution, provenance, options.descriptor ?? key, options.force ?? false);
  }

  async getOrCompute(key: string, compute: () => Promise<Solution>, options: GetOrComputeOptions = {}): Promise<Solution> {
    const { signal, force = false } = options;
    if (signal?.aborted) {
      throw signal.reason;
    }

    if (!force) {
      const cached = this.index.get(key);
      if (cached) {
        this.hits += 1;
        return cached.solution;
      }
    }

    let flight = this.inFlight.get(key);
    if (!flight && !force) {
      const stored = await this.readStore(key);
      // Another caller may have finished or started this key during the read.
      const entry = this.index.get(key) ?? stored;
      if (entry) {
        this.index.set(key, entry);
        this.hits += 1;
        return entry.solution;
      }
      flight = this.inFlight.get(key);
    }

    if (flight) {
      this.coalesced += 1;
      this.logger.log(LogLevel.DEBUG, "cache.flight.joined", { key });
    } else {
      this.misses += 1;
      flight = this.startFlight(key, compute, options.descriptor ?? key);
    }

    const result = await waitFor(flight, signal);
    if (!result.ok) {
      throw result.error;
    }
    return result.solution;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.index.size,
      inFlight: this.inFlight.size,
      coalesced: this.coalesced
    };
  }

  entries(): CacheEntry[] {
    return [...this.index.values()];
  }

  private startFlight(key: string, compute: () => Promise<Solution>, descriptor: string): Promise<FlightResult> {
    const flight = Promise.resolve()
      .then(compute)
      .then(async (computed): Promise<FlightResult> => {
        const solution = this.own(computed);
        await this.persist(key, solution, "dynamic", descriptor, true);
        return { ok: true, solution };
      })
      .catch((error: unknown): FlightResult => ({ ok: false, error }))
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, flight);
    return flight;
  }

  private async readStore(key: string): Promise<CacheEntry | undefined> {
    try {
      return await this.store.read(key);
    } catch (error) {
      if (error instanceof CacheIOError) {
        this.logger.log(LogLevel.WARN, "cache.read.failed", { key, path: error.path, error: error.message });
        return undefined;
      }
      throw error;
    }
  }

  /** Serializes writes per key; later writes start after earlier ones settle. */
  private persist(key: string, solution: Solution, provenance: Provenance, descriptor: string, force: boolean): Promise<boolean> {
    const previous = this.writeChains.get(key) ?? Promise.resolve();
    const write = previous.then(() => this.writeEntry(key, solution, provenance, descriptor, force));
    const tail = write.then(
      () => undefined,
      () => undefined
    );
    this.writeChains.set(key, tail);
    void tail.then(() => {
      if (this.writeChains.get(key) === tail) {
        this.writeChains.delete(key);
      }
    });
    return write;
  }

  private async writeEntry(
    key: string,
    solution: Solution,
    provenance: Provenance,
    descriptor: string,
    force: boolean
  ): Promise<boolean> {
    if (!force && this.index.has(key)) {
      return false;
    }
    const entry: CacheEntry = Object.freeze({
      key,
      descriptor,
      solution: this.own(solution),
      provenance,
      createdAt: this.now()
    });
    try {
      await this.store.write(entry);
    } catch (error) {
      if (error instanceof CacheIOError) {
        this.logger.log(LogLevel.WARN, "cache.write.failed", { key, path: error.path, error: error.message });
        return false;
      }
      throw error;
    }
    this.index.set(key, entry);
    return true;
  }

  private own(solution: Solution): Solution {
    if (this.owned.has(solution)) {
      return solution;
    }
    const copy = freezeSolution(solution);
    this.owned.add(copy);
    return copy;
  }
}
