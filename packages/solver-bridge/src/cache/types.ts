import type { CacheEntry, Provenance } from "@gto-broker/shared";

export const CACHE_VERSION = "1";
export const KEY_ALGORITHM = "sha256-canonical-v1";
export const MANIFEST_FILENAME = "cache_manifest.json";
export const ENTRIES_DIRNAME = "entries";

export interface CacheManifest {
  version: string;
  keyAlgorithm: string;
  compression: string;
  createdAt: string;
}

/** On-disk form of one entry. */
export interface StoredEntry {
  version: string;
  key: string;
  descriptor: string;
  provenance: Provenance;
  createdAt: number;
  solution: {
    exploitability: number;
    iterations: number;
    strategies: Record<string, { hand: string; frequencies: Record<string, number>; ev: Record<string, number> }>;
  };
}

/**
 * Durable key → entry storage. Implementations throw CacheIOError for
 * storage failures and resolve `read` to undefined for absent keys.
 */
export interface CacheStore {
  readonly location: string;
  init(): Promise<void>;
  read(key: string): Promise<CacheEntry | undefined>;
  write(entry: CacheEntry): Promise<void>;
  list(): Promise<CacheEntry[]>;
}
