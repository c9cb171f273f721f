export { SolutionCache } from "./solutionCache";
export type { GetOrComputeOptions, PutOptions, SolutionCacheOptions } from "./solutionCache";
export { FileCacheStore, entryStem } from "./storage";
export type { FileCacheStoreOptions } from "./storage";
export { seedPrecomputed } from "./seed";
export type { SeedFailure, SeedOptions, SeedReport } from "./seed";
export { CACHE_VERSION, KEY_ALGORITHM, MANIFEST_FILENAME } from "./types";
export type { CacheManifest, CacheStore, StoredEntry } from "./types";
