import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, stat, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileLock } from "../cache/file-lock.js";
import type { Clock } from "../types.js";

describe("FileLock", () => {
  let testDir: string;
  let lockPath: string;
  const clock: Clock = { now: () => Date.now() };

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "ai-usage-bar-lock-"));
    lockPath = join(testDir, "codex.updating");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("creates the marker on acquire and removes it on release", async () => {
    const lock = new FileLock(lockPath, { clock });

    expect(await lock.tryAcquire()).toBe(true);
    expect(lock.held).toBe(true);
    await expect(stat(lockPath)).resolves.toBeDefined();

    await lock.release();
    expect(lock.held).toBe(false);
    await expect(stat(lockPath)).rejects.toThrow();
  });

  it("is exclusive between holders", async () => {
    const first = new FileLock(lockPath, { clock });
    const second = new FileLock(lockPath, { clock });

    const results = await Promise.all([first.tryAcquire(), second.tryAcquire()]);

    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it("can be acquired again after release", async () => {
    const first = new FileLock(lockPath, { clock });
    const second = new FileLock(lockPath, { clock });

    expect(await first.tryAcquire()).toBe(true);
    expect(await second.tryAcquire()).toBe(false);
    await first.release();
    expect(await second.tryAcquire()).toBe(true);
  });

  it("does not re-acquire a lock the same instance already holds", async () => {
    const lock = new FileLock(lockPath, { clock });
    expect(await lock.tryAcquire()).toBe(true);
    expect(await lock.tryAcquire()).toBe(false);
  });

  it("reclaims a marker older than the staleness threshold", async () => {
    await writeFile(lockPath, "crashed-holder");
    const backdated = new Date(Date.now() - 60_000);
    await utimes(lockPath, backdated, backdated);

    const lock = new FileLock(lockPath, { clock, staleMs: 30_000 });

    expect(await lock.isStale()).toBe(true);
    expect(await lock.tryAcquire()).toBe(true);
    expect(await readFile(lockPath, "utf-8")).not.toBe("crashed-holder");
  });

  it("treats staleness through the injected clock", async () => {
    await writeFile(lockPath, "other-holder");
    let now = Date.now();
    const fakeClock: Clock = { now: () => now };
    const lock = new FileLock(lockPath, { clock: fakeClock, staleMs: 30_000 });

    expect(await lock.tryAcquire()).toBe(false);

    now += 31_000;
    expect(await lock.tryAcquire()).toBe(true);
  });

  it("reports a missing marker as not stale", async () => {
    const lock = new FileLock(lockPath, { clock });
    expect(await lock.isStale()).toBe(false);
  });

  it("release is idempotent", async () => {
    const lock = new FileLock(lockPath, { clock });
    await lock.release();

    expect(await lock.tryAcquire()).toBe(true);
    await lock.release();
    await expect(lock.release()).resolves.toBeUndefined();
  });

  it("does not delete a marker that another holder reclaimed", async () => {
    const lock = new FileLock(lockPath, { clock });
    expect(await lock.tryAcquire()).toBe(true);

    await writeFile(lockPath, "new-holder");
    await lock.release();

    expect(await readFile(lockPath, "utf-8")).toBe("new-holder");
  });

  it("lets only one of two contenders take over an abandoned marker", async () => {
    const backdated = new Date(Date.now() - 60_000);
    const winners: number[] = [];

    for (let trial = 0; trial < 200; trial++) {
      await writeFile(lockPath, `crashed-holder-${trial}`);
      await utimes(lockPath, backdated, backdated);
      const a = new FileLock(lockPath, { clock, staleMs: 30_000 });
      const b = new FileLock(lockPath, { clock, staleMs: 30_000 });

      const results = await Promise.all([a.tryAcquire(), b.tryAcquire()]);
      winners.push(results.filter(Boolean).length);

      await a.release();
      await b.release();
    }

    expect(winners.filter((count) => count !== 1)).toEqual([]);
    expect(await readdir(testDir)).toEqual([]);
  });

  it("keeps a long-running holder from looking abandoned", async () => {
    let now = Date.now();
    const fakeClock: Clock = { now: () => now };
    const holder = new FileLock(lockPath, { clock: fakeClock, staleMs: 30_000 });
    const peer = new FileLock(lockPath, { clock: fakeClock, staleMs: 30_000 });
    expect(await holder.tryAcquire()).toBe(true);

    now += 25_000;
    await holder.touch();
    now += 15_000;

    expect(await peer.isStale()).toBe(false);
    expect(await peer.tryAcquire()).toBe(false);

    now += 20_000;
    expect(await peer.isStale()).toBe(true);
  });

  it("does not touch a marker it no longer owns", async () => {
    const lock = new FileLock(lockPath, { clock });
    expect(await lock.tryAcquire()).toBe(true);

    await writeFile(lockPath, "new-holder");
    const backdated = new Date(Date.now() - 60_000);
    await utimes(lockPath, backdated, backdated);
    await lock.touch();

    expect(await lock.isStale()).toBe(true);
  });
});
