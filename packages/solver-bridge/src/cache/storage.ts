import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import Ajv2020 from "ajv/dist/2020";
import {
  CacheIOError,
  LogLevel,
  freezeSolution,
  type CacheCompression,
  type CacheEntry
} from "@gto-broker/shared";
import { silentLogger, type ComponentLogger } from "@gto-broker/logger";
import {
  CACHE_VERSION,
  ENTRIES_DIRNAME,
  KEY_ALGORITHM,
  MANIFEST_FILENAME,
  type CacheManifest,
  type CacheStore,
  type StoredEntry
} from "./types";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const numberMap = { type: "object", additionalProperties: { type: "number" } };

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateStoredEntry = ajv.compile<StoredEntry>({
  type: "object",
  required: ["version", "key", "descriptor", "provenance", "createdAt", "solution"],
  properties: {
    version: { type: "string" },
    key: { type: "string", minLength: 1 },
    descriptor: { type: "string" },
    provenance: { enum: ["precomputed", "dynamic"] },
    createdAt: { type: "number" },
    solution: {
      type: "object",
      required: ["exploitability", "iterations", "strategies"],
      properties: {
        exploitability: { type: "number", minimum: 0 },
        iterations: { type: "number", minimum: 0 },
        strategies: {
          type: "object",
          additionalProperties: {
            type: "object",
            required: ["hand", "frequencies", "ev"],
            properties: { hand: { type: "string" }, frequencies: numberMap, ev: numberMap }
          }
        }
      }
    }
  }
});
const validateManifest = ajv.compile<CacheManifest>({
  type: "object",
  required: ["version", "keyAlgorithm", "compression", "createdAt"],
  properties: {
    version: { type: "string" },
    keyAlgorithm: { type: "string" },
    compression: { type: "string" },
    createdAt: { type: "string" }
  }
});

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Content-addressed file stem for a key, sharded by its first two hex digits. */
export function entryStem(key: string): string {
  const digest = createHash("sha256").update(key).digest("hex");
  return path.join(digest.slice(0, 2), digest);
}

export interface FileCacheStoreOptions {
  compression?: CacheCompression;
  logger?: ComponentLogger;
}

/**
 * One JSON file per key under `<root>/entries/<xx>/<sha256(key)>.json[.gz]`,
 * next to a manifest that pins the format. Writes go to a temp file that is
 * renamed into place, so readers never see a partial entry.
 */
export class FileCacheStore implements CacheStore {
  readonly location: string;
  private readonly compression: CacheCompression;
  private readonly logger: ComponentLogger;
  private initialized?: Promise<void>;
  private tempCounter = 0;

  constructor(rootPath: string, options: FileCacheStoreOptions = {}) {
    this.location = path.resolve(rootPath);
    this.compression = options.compression ?? "none";
    this.logger = options.logger ?? silentLogger;
  }

  init(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.prepare();
    }
    return this.initialized;
  }

  async read(key: string): Promise<CacheEntry | undefined> {
    await this.init();
    for (const filePath of this.candidates(key)) {
      let raw: Buffer;
      try {
        raw = await fs.readFile(filePath);
      } catch (error) {
        if (isMissing(error)) {
          continue;
        }
        throw new CacheIOError("read", filePath, error);
      }
      const entry = await this.decode(filePath, raw);
      if (entry.key !== key) {
        throw new CacheIOError("read", filePath, `file holds key ${entry.key}`);
      }
      return entry;
    }
    return undefined;
  }

  async write(entry: CacheEntry): Promise<void> {
    await this.init();
    const [target, stale] = this.candidates(entry.key);
    const stored: StoredEntry = {
      version: CACHE_VERSION,
      key: entry.key,
      descriptor: entry.descriptor,
      provenance: entry.provenance,
      createdAt: entry.createdAt,
      solution: {
        exploitability: entry.solution.exploitability,
        iterations: entry.solution.iterations,
        strategies: Object.fromEntries(
          Object.entries(entry.solution.strategies).map(([hand, strategy]) => [
            hand,
            { hand: strategy.hand, frequencies: { ...strategy.frequencies }, ev: { ...strategy.ev } }
          ])
        )
      }
    };
    const json = Buffer.from(JSON.stringify(stored), "utf-8");
    this.tempCounter += 1;
    const tempPath = `${target}.${process.pid}.${this.tempCounter}.tmp`;
    try {
      const payload = this.compression === "gzip" ? await gzipAsync(json) : json;
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(tempPath, payload);
      await fs.rename(tempPath, target);
      await fs.rm(stale, { force: true });
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.log(LogLevel.DEBUG, "cache.write.cleanup_failed", { path: tempPath, error: String(cleanupError) });
      });
      throw new CacheIOError("write", target, error);
    }
  }

  async list(): Promise<CacheEntry[]> {
    await this.init();
    const root = path.join(this.location, ENTRIES_DIRNAME);
    let shards: string[];
    try {
      shards = await fs.readdir(root);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw new CacheIOError("list", root, error);
    }

    const entries: CacheEntry[] = [];
    for (const shard of shards) {
      const shardPath = path.join(root, shard);
      let files: string[];
      try {
        files = await fs.readdir(shardPath);
      } catch (error) {
        throw new CacheIOError("list", shardPath, error);
      }
      for (const file of files) {
        if (!file.endsWith(".json") && !file.endsWith(".json.gz")) {
          continue;
        }
        const filePath = path.join(shardPath, file);
        try {
          entries.push(await this.decode(filePath, await fs.readFile(filePath)));
        } catch (error) {
          this.logger.log(LogLevel.WARN, "cache.entry.unreadable", { path: filePath, error: String(error) });
        }
      }
    }
    return entries;
  }

  private candidates(key: string): [string, string] {
    const base = path.join(this.location, ENTRIES_DIRNAME, entryStem(key));
    return this.compression === "gzip" ? [`${base}.json.gz`, `${base}.json`] : [`${base}.json`, `${base}.json.gz`];
  }

  private async decode(filePath: string, raw: Buffer): Promise<CacheEntry> {
    let data: unknown;
    try {
      const text = filePath.endsWith(".gz") ? (await gunzipAsync(raw)).toString("utf-8") : raw.toString("utf-8");
      data = JSON.parse(text);
    } catch (error) {
      throw new CacheIOError("read", filePath, error);
    }
    if (!validateStoredEntry(data)) {
      throw new CacheIOError("read", filePath, ajv.errorsText(validateStoredEntry.errors));
    }
    if (data.version !== CACHE_VERSION) {
      throw new CacheIOError("read", filePath, `entry version ${data.version}, expected ${CACHE_VERSION}`);
    }
    return Object.freeze({
      key: data.key,
      descriptor: data.descriptor,
      provenance: data.provenance,
      createdAt: data.createdAt,
      solution: freezeSolution(data.solution)
    });
  }

  private async prepare(): Promise<void> {
    const manifestPath = path.join(this.location, MANIFEST_FILENAME);
    let raw: string | undefined;
    try {
      raw = await fs.readFile(manifestPath, "utf-8");
    } catch (error) {
      if (!isMissing(error)) {
        throw new CacheIOError("manifest", manifestPath, error);
      }
    }

    if (raw === undefined) {
      const manifest: CacheManifest = {
        version: CACHE_VERSION,
        keyAlgorithm: KEY_ALGORITHM,
        compression: this.compression,
        createdAt: new Date().toISOString()
      };
      try {
        await fs.mkdir(path.join(this.location, ENTRIES_DIRNAME), { recursive: true });
        await fs.writeFile(manifestPath, JSON.stringify(manifest, null, 2), "utf-8");
      } catch (error) {
        throw new CacheIOError("manifest", manifestPath, error);
      }
      this.logger.log(LogLevel.INFO, "cache.manifest.created", { path: manifestPath });
      return;
    }

    let manifest: unknown;
    try {
      manifest = JSON.parse(raw);
    } catch (error) {
      throw new CacheIOError("manifest", manifestPath, error);
    }
    if (!validateManifest(manifest)) {
      throw new CacheIOError("manifest", manifestPath, ajv.errorsText(validateManifest.errors));
    }
    if (manifest.version !== CACHE_VERSION) {
      throw new CacheIOError("manifest", manifestPath, `version ${manifest.version}, expected ${CACHE_VERSION}`);
    }
    if (manifest.keyAlgorithm !== KEY_ALGORITHM) {
      throw new CacheIOError("manifest", manifestPath, `key algorithm ${manifest.keyAlgorithm}, expected ${KEY_ALGORITHM}`);
    }
    if (manifest.compression !== this.compression) {
      this.logger.log(LogLevel.WARN, "cache.manifest.compression_changed", {
        path: manifestPath,
        manifest: manifest.compression,
        configured: this.compression
      });
    }
  }
}
