/**
 * Response Cache Unit Tests
 * Runs against a throwaway directory under the OS temp dir
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createHash } from "node:crypto";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ResponseCache, createResponseCache } from "./responseCache";
import { StorageError } from "./storageError";
import { KeyedLock } from "./keyedLock";

const bytes = (text: string) => new TextEncoder().encode(text);
const stem = (key: string) => createHash("sha256").update(key).digest("hex");

describe("ResponseCache", () => {
  let directory: string;
  let clock: number;
  let cache: ResponseCache;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "kennelcast-cache-"));
    clock = 100;
    cache = createResponseCache(directory, { now: () => clock });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe("put/get", () => {
    it("round-trips payload bytes exactly", async () => {
      const payload = new Uint8Array([0, 255, 10, 13, 0, 128]);
      await cache.put("GET /api/v1/content", payload);

      expect(await cache.get("GET /api/v1/content")).toEqual(payload);
    });

    it("returns null for a missing key", async () => {
      expect(await cache.get("missing")).toBeNull();
      expect(await cache.getEntry("missing")).toBeNull();
      expect(await cache.has("missing")).toBe(false);
    });

    it("overwrites an existing entry", async () => {
      await cache.put("content", bytes("first"));
      clock = 200;
      await cache.put("content", bytes("second"));

      expect(await cache.getEntry("content")).toEqual({
        key: "content",
        payload: bytes("second"),
        storedAt: 200,
      });
      expect(await cache.list()).toHaveLength(1);
    });

    it("returns the stored entry from put", async () => {
      const entry = await cache.put("updates", bytes("{}"));

      expect(entry).toEqual({ key: "updates", payload: bytes("{}"), storedAt: 100 });
    });

    it("is not affected by later mutation of the caller's buffer", async () => {
      const payload = bytes("abc");
      const pending = cache.put("k", payload);
      payload[0] = 0x7a;
      await pending;

      expect(await cache.get("k")).toEqual(bytes("abc"));
    });

    it("serialises operations on the same key in call order", async () => {
      const first = cache.put("sync", bytes("one"));
      const second = cache.put("sync", bytes("two"));
      const read = cache.get("sync");

      await Promise.all([first, second]);
      expect(await read).toEqual(bytes("two"));
    });

    it("survives a new cache instance on the same directory", async () => {
      await cache.put("content", bytes("persisted"));

      const reopened = new ResponseCache({ directory });
      expect(await reopened.get("content")).toEqual(bytes("persisted"));
    });

    it("creates the directory on first write", async () => {
      const nested = createResponseCache(join(directory, "a", "b"));
      await nested.put("k", bytes("v"));

      expect(await readdir(join(directory, "a", "b"))).toEqual([`${stem("k")}.json`]);
    });
  });

  describe("compression", () => {
    it("writes gzip records readable by either setting", async () => {
      const compressed = createResponseCache(directory, { compress: true });
      await compressed.put("content", bytes("zipped"));

      expect(await readdir(directory)).toEqual([`${stem("content")}.json.gz`]);
      expect(await compressed.get("content")).toEqual(bytes("zipped"));
      expect(await cache.get("content")).toEqual(bytes("zipped"));
    });

    it("replaces a record stored in the other format", async () => {
      await cache.put("content", bytes("plain"));
      const compressed = createResponseCache(directory, { compress: true });
      await compressed.put("content", bytes("zipped"));

      expect(await readdir(directory)).toEqual([`${stem("content")}.json.gz`]);
      expect(await cache.get("content")).toEqual(bytes("zipped"));
    });
  });

  describe("list", () => {
    it("returns every entry ordered by storage time", async () => {
      clock = 300;
      await cache.put("b", bytes("2"));
      clock = 100;
      await cache.put("a", bytes("1"));
      clock = 300;
      await cache.put("c", bytes("3"));

      const entries = await cache.list();
      expect(entries.map((e) => e.key)).toEqual(["a", "b", "c"]);
      expect(entries[0]).toEqual({ key: "a", payload: bytes("1"), storedAt: 100 });
    });

    it("is empty when the directory does not exist", async () => {
      const absent = createResponseCache(join(directory, "never-created"));
      expect(await absent.list()).toEqual([]);
    });

    it("skips unreadable records", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      await cache.put("good", bytes("ok"));
      await writeFile(join(directory, "broken.json"), "not json");

      const entries = await cache.list();
      expect(entries.map((e) => e.key)).toEqual(["good"]);
      vi.mocked(console.warn).mockRestore();
    });

    it("waits for writes that started before it", async () => {
      const write = cache.put("late", bytes("x"));
      const entries = await cache.list();
      await write;

      expect(entries.map((e) => e.key)).toEqual(["late"]);
    });
  });

  describe("remove/clear", () => {
    it("reports whether an entry was removed", async () => {
      await cache.put("content", bytes("x"));

      expect(await cache.remove("content")).toBe(true);
      expect(await cache.remove("content")).toBe(false);
      expect(await cache.get("content")).toBeNull();
    });

    it("clears all entries", async () => {
      await cache.put("a", bytes("1"));
      await cache.put("b", bytes("2"));
      await cache.clear();

      expect(await cache.list()).toEqual([]);
      expect(await readdir(directory)).toEqual([]);
    });
  });

  describe("storage errors", () => {
    it("raises StorageError when the medium cannot be written", async () => {
      const blocker = join(directory, "blocker");
      await writeFile(blocker, "a file, not a directory");
      const blocked = createResponseCache(join(blocker, "cache"));

      const failure = await blocked.put("content", bytes("x")).catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(StorageError);
      expect(failure).toMatchObject({ operation: "write", key: "content" });
    });

    it("removes the temporary file when the record cannot be moved into place", async () => {
      const target = `${stem("content")}.json`;
      await mkdir(join(directory, target, "occupied"), { recursive: true });

      const failure = await cache.put("content", bytes("x")).catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(StorageError);
      expect(failure).toMatchObject({ operation: "write", key: "content" });
      expect(await readdir(directory)).toEqual([target]);
    });

    it("raises StorageError for a corrupt record on get", async () => {
      await writeFile(join(directory, `${stem("content")}.json`), "{ nope");

      const failure = await cache.get("content").catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(StorageError);
      expect(failure).toMatchObject({ operation: "read", key: "content" });
    });

    it("rejects empty keys", async () => {
      await expect(cache.put("", bytes("x"))).rejects.toBeInstanceOf(StorageError);
      await expect(cache.get("")).rejects.toBeInstanceOf(StorageError);
    });
  });
});

describe("KeyedLock", () => {
  it("runs tasks for one key in order and other keys concurrently", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => {};

    const first = lock.run("a", async () => {
      events.push("a1:start");
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push("a1:end");
    });
    const second = lock.run("a", async () => {
      events.push("a2");
    });
    const other = lock.run("b", async () => {
      events.push("b");
    });

    await other;
    expect(events).toEqual(["a1:start", "b"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(["a1:start", "b", "a1:end", "a2"]);
  });

  it("continues after a failed task", async () => {
    const lock = new KeyedLock();
    const failed = lock.run("a", async () => {
      throw new Error("boom");
    });
    const next = lock.run("a", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
