/**
 * Response Cache
 *
 * Durable key/value storage for previously fetched response payloads.
 * Each entry lives in its own file under the cache directory so entries
 * survive process restarts and can be listed to hydrate an offline view.
 */

import { createHash, randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import type { CacheEntry } from "@kennelcast/types";
import { createLogger } from "@kennelcast/telemetry";
import { KeyedLock } from "./keyedLock";
import { errnoCode, StorageError, type StorageOperation } from "./storageError";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const log = createLogger("ResponseCache");

const PLAIN_EXTENSION = ".json";
const COMPRESSED_EXTENSION = ".json.gz";

// ============================================================================
// Types
// ============================================================================

export interface ResponseCacheConfig {
  /** Directory holding one file per entry */
  directory: string;
  /** Gzip records on write */
  compress: boolean;
  /** Clock used for `storedAt` */
  now: () => number;
}

interface StoredRecord {
  key: string;
  payload: string;
  storedAt: number;
}

const DEFAULT_CONFIG: Omit<ResponseCacheConfig, "directory"> = {
  compress: false,
  now: Date.now,
};

// ============================================================================
// Helpers
// ============================================================================

function fileStem(key: string): string {
  return createHash("sha256").update(key).digest("hex");
}

function isRecord(value: unknown): value is StoredRecord {
  if (typeof value !== "object" || value === null) return false;
  return (
    "key" in value &&
    typeof value.key === "string" &&
    "payload" in value &&
    typeof value.payload === "string" &&
    "storedAt" in value &&
    typeof value.storedAt === "number"
  );
}

function isMissing(error: unknown): boolean {
  return errnoCode(error) === "ENOENT";
}

// ============================================================================
// Response Cache
// ============================================================================

export class ResponseCache {
  private config: ResponseCacheConfig;
  private lock = new KeyedLock();

  constructor(config: Pick<ResponseCacheConfig, "directory"> & Partial<ResponseCacheConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get directory(): string {
    return this.config.directory;
  }

  /**
   * Store a payload, replacing any existing entry for the key
   */
  async put(key: string, payload: Uint8Array): Promise<CacheEntry> {
    this.assertKey(key, "write");
    const copy = new Uint8Array(payload);

    return this.lock.run(key, async () => {
      const entry: CacheEntry = {
        key,
        payload: copy,
        storedAt: this.config.now(),
      };

      try {
        await mkdir(this.config.directory, { recursive: true });
        await this.writeRecord(entry);
      } catch (error) {
        throw new StorageError("write", `Failed to store cache entry "${key}"`, {
          key,
          cause: error,
        });
      }

      log.debug("Stored", key, `${entry.payload.byteLength} bytes`);
      return { ...entry, payload: new Uint8Array(entry.payload) };
    });
  }

  /**
   * Payload for a key, or null when nothing is stored
   */
  async get(key: string): Promise<Uint8Array | null> {
    const entry = await this.getEntry(key);
    return entry ? entry.payload : null;
  }

  async getEntry(key: string): Promise<CacheEntry | null> {
    this.assertKey(key, "read");
    return this.lock.run(key, () => this.readEntry(key));
  }

  async has(key: string): Promise<boolean> {
    return (await this.getEntry(key)) !== null;
  }

  /**
   * Delete the entry for a key
   *
   * @returns Whether an entry existed
   */
  async remove(key: string): Promise<boolean> {
    this.assertKey(key, "remove");

    return this.lock.run(key, async () => {
      let removed = false;
      for (const path of this.pathsFor(key)) {
        try {
          await rm(path);
          removed = true;
        } catch (error) {
          if (isMissing(error)) continue;
          throw new StorageError("remove", `Failed to remove cache entry "${key}"`, {
            key,
            cause: error,
          });
        }
      }
      return removed;
    });
  }

  /**
   * All stored entries, oldest first. Unreadable records are skipped.
   */
  async list(): Promise<CacheEntry[]> {
    await this.lock.drain();

    const names = await this.recordFileNames("list");
    const entries: CacheEntry[] = [];

    for (const name of names) {
      const path = join(this.config.directory, name);
      try {
        const entry = await this.readRecordFile(path);
        if (entry) entries.push(entry);
      } catch (error) {
        log.warn("Skipping unreadable cache record", name, error);
      }
    }

    return entries.sort(
      (a, b) => a.storedAt - b.storedAt || a.key.localeCompare(b.key),
    );
  }

  /**
   * Remove every entry
   */
  async clear(): Promise<void> {
    await this.lock.drain();

    const names = await this.recordFileNames("clear");
    try {
      await Promise.all(
        names.map((name) => rm(join(this.config.directory, name), { force: true })),
      );
    } catch (error) {
      throw new StorageError("clear", "Failed to clear the response cache", {
        cause: error,
      });
    }
  }

  // ==========================================================================
  // File access
  // ==========================================================================

  private pathsFor(key: string): string[] {
    const stem = join(this.config.directory, fileStem(key));
    return this.config.compress
      ? [stem + COMPRESSED_EXTENSION, stem + PLAIN_EXTENSION]
      : [stem + PLAIN_EXTENSION, stem + COMPRESSED_EXTENSION];
  }

  private async writeRecord(entry: CacheEntry): Promise<void> {
    const record: StoredRecord = {
      key: entry.key,
      payload: Buffer.from(entry.payload).toString("base64"),
      storedAt: entry.storedAt,
    };
    const json = Buffer.from(JSON.stringify(record), "utf8");
    const data = this.config.compress ? await gzipAsync(json) : json;

    const [target, stale] = this.pathsFor(entry.key);
    const temp = `${target}.${randomUUID()}.tmp`;

    try {
      await writeFile(temp, data);
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
    // The same key may be stored under the other format from an earlier run
    await rm(stale, { force: true });
  }

  private async readEntry(key: string): Promise<CacheEntry | null> {
    for (const path of this.pathsFor(key)) {
      let entry: CacheEntry | null;
      try {
        entry = await this.readRecordFile(path);
      } catch (error) {
        throw new StorageError("read", `Failed to read cache entry "${key}"`, {
          key,
          cause: error,
        });
      }
      if (entry) return entry;
    }
    return null;
  }

  /**
   * Parse one record file; null when the file does not exist
   */
  private async readRecordFile(path: string): Promise<CacheEntry | null> {
    let raw: Buffer;
    try {
      raw = await readFile(path);
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    const json = path.endsWith(COMPRESSED_EXTENSION) ? await gunzipAsync(raw) : raw;
    const parsed: unknown = JSON.parse(json.toString("utf8"));
    if (!isRecord(parsed)) {
      throw new Error(`Malformed cache record at ${path}`);
    }

    return {
      key: parsed.key,
      payload: new Uint8Array(Buffer.from(parsed.payload, "base64")),
      storedAt: parsed.storedAt,
    };
  }

  private async recordFileNames(operation: StorageOperation): Promise<string[]> {
    try {
      const names = await readdir(this.config.directory);
      return names
        .filter(
          (name) => name.endsWith(PLAIN_EXTENSION) || name.endsWith(COMPRESSED_EXTENSION),
        )
        .sort();
    } catch (error) {
      if (isMissing(error)) return [];
      throw new StorageError(operation, "Failed to list the response cache", {
        cause: error,
      });
    }
  }

  private assertKey(key: string, operation: StorageOperation): void {
    if (key.length === 0) {
      throw new StorageError(operation, "Cache keys must not be empty");
    }
  }
}

export function createResponseCache(
  directory: string,
  options: Partial<Omit<ResponseCacheConfig, "directory">> = {},
): ResponseCache {
  return new ResponseCache({ directory, ...options });
}
