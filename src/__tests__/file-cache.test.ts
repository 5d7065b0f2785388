import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileCache } from "../cache/file-cache.js";
import { createWindowUsage } from "../window-usage.js";
import type { CacheEntry, Clock } from "../types.js";

const NOW = Date.parse("2026-03-01T12:00:00Z");

function okEntry(fetchedAt: number): CacheEntry {
  return {
    providerId: "claude",
    fetchedAt,
    ttlSeconds: 60,
    status: "ok",
    fiveHour: createWindowUsage(45.5, NOW + 3_600_000, true),
    sevenDay: createWindowUsage(0, null, false),
  };
}

describe("FileCache", () => {
  let testDir: string;
  let now: number;
  let cache: FileCache;
  const clock: Clock = { now: () => now };

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "ai-usage-bar-cache-"));
    now = NOW;
    cache = new FileCache({ dir: testDir, clock });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("read / write", () => {
    it("returns null when nothing is cached", async () => {
      expect(await cache.read("claude")).toBeNull();
    });

    it("reads back exactly what was written", async () => {
      const entry = okEntry(NOW);
      await cache.write("claude", entry);
      expect(await cache.read("claude")).toEqual(entry);
    });

    it("round-trips error entries", async () => {
      const entry: CacheEntry = {
        providerId: "codex",
        fetchedAt: NOW,
        ttlSeconds: 60,
        status: "refresh_failed",
        message: "Token refresh failed (400).",
      };
      await cache.write("codex", entry);
      expect(await cache.read("codex")).toEqual(entry);
    });

    it("overwrites the previous entry", async () => {
      await cache.write("claude", okEntry(NOW));
      await cache.write("claude", okEntry(NOW + 1000));
      expect((await cache.read("claude"))?.fetchedAt).toBe(NOW + 1000);
    });

    it("leaves no temporary files behind", async () => {
      await cache.write("claude", okEntry(NOW));
      expect(await readdir(testDir)).toEqual(["claude.json"]);
    });

    it("keeps providers separate", async () => {
      await cache.write("claude", okEntry(NOW));
      expect(await cache.read("codex")).toBeNull();
    });

    it("treats a corrupt file as a miss", async () => {
      await writeFile(cache.entryPath("claude"), "{not json");
      expect(await cache.read("claude")).toBeNull();
    });

    it("treats a file with the wrong shape as a miss", async () => {
      await writeFile(
        cache.entryPath("claude"),
        JSON.stringify({ providerId: "claude", status: "ok" })
      );
      expect(await cache.read("claude")).toBeNull();
    });

    it("treats an entry for another provider as a miss", async () => {
      await writeFile(
        cache.entryPath("codex"),
        JSON.stringify(okEntry(NOW))
      );
      expect(await cache.read("codex")).toBeNull();
    });
  });

  describe("isFresh", () => {
    it("is fresh within the TTL", () => {
      now = NOW + 59_999;
      expect(cache.isFresh(okEntry(NOW))).toBe(true);
    });

    it("is stale once the TTL has elapsed", () => {
      now = NOW + 60_000;
      expect(cache.isFresh(okEntry(NOW))).toBe(false);
    });
  });

  describe("tryAcquire / release", () => {
    it("only one of two caches sharing a directory acquires", async () => {
      const other = new FileCache({ dir: testDir, clock });

      expect(await cache.tryAcquire("codex")).toBe(true);
      expect(await other.tryAcquire("codex")).toBe(false);

      await cache.release("codex");
      expect(await other.tryAcquire("codex")).toBe(true);
    });

    it("locks each provider independently", async () => {
      expect(await cache.tryAcquire("claude")).toBe(true);
      expect(await cache.tryAcquire("codex")).toBe(true);
    });

    it("release without a held lock is a no-op", async () => {
      await expect(cache.release("claude")).resolves.toBeUndefined();
    });
  });
});
