/**
 * Per-provider on-disk cache shared by every running instance.
 *
 * Layout inside the cache directory:
 *   <provider>.json      serialized CacheEntry, replaced atomically
 *   <provider>.updating  lock marker held while a fetch is in flight
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { CACHE_TTL_SECONDS, getCacheDir } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { createWindowUsage } from "../window-usage.js";
import {
  systemClock,
  type CacheEntry,
  type Clock,
  type ProviderId,
} from "../types.js";
import { FileLock } from "./file-lock.js";

const log = createLogger("cache");

const windowSchema = z
  .object({
    utilization: z.number(),
    resetsAt: z.number().nullable(),
    started: z.boolean(),
  })
  .transform((w) => createWindowUsage(w.utilization, w.resetsAt, w.started));

const baseSchema = {
  providerId: z.enum(["claude", "codex"]),
  fetchedAt: z.number(),
  ttlSeconds: z.number().int().positive(),
};

const cacheEntrySchema = z.discriminatedUnion("status", [
  z.object({
    ...baseSchema,
    status: z.literal("ok"),
    fiveHour: windowSchema,
    sevenDay: windowSchema,
  }),
  z.object({
    ...baseSchema,
    status: z.enum([
      "no_credentials",
      "token_expired",
      "refresh_failed",
      "auth_error",
      "network_error",
    ]),
    message: z.string(),
  }),
]);

export type FileCacheOptions = {
  dir?: string;
  ttlSeconds?: number;
  lockStaleMs?: number;
  clock?: Clock;
};

export class FileCache {
  readonly dir: string;
  readonly ttlSeconds: number;
  private readonly clock: Clock;
  private readonly lockStaleMs: number | undefined;
  private readonly locks = new Map<ProviderId, FileLock>();

  constructor(options: FileCacheOptions = {}) {
    this.dir = options.dir ?? getCacheDir();
    this.ttlSeconds = options.ttlSeconds ?? CACHE_TTL_SECONDS;
    this.clock = options.clock ?? systemClock;
    this.lockStaleMs = options.lockStaleMs;
  }

  entryPath(providerId: ProviderId): string {
    return join(this.dir, `${providerId}.json`);
  }

  lockPath(providerId: ProviderId): string {
    return join(this.dir, `${providerId}.updating`);
  }

  /**
   * Read the cached entry. Missing, unparseable or mismatched files all read
   * as a miss.
   */
  async read(providerId: ProviderId): Promise<CacheEntry | null> {
    const path = this.entryPath(providerId);
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      log.debug(`ignoring corrupt cache file ${path}`);
      return null;
    }

    const parsed = cacheEntrySchema.safeParse(json);
    if (!parsed.success || parsed.data.providerId !== providerId) {
      log.debug(`ignoring invalid cache entry in ${path}`);
      return null;
    }
    return parsed.data;
  }

  isFresh(entry: CacheEntry): boolean {
    return this.clock.now() - entry.fetchedAt < entry.ttlSeconds * 1000;
  }

  /** Atomic replace: temp file in the same directory, then rename */
  async write(providerId: ProviderId, entry: CacheEntry): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = this.entryPath(providerId);
    const tmpPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmpPath, JSON.stringify(entry) + "\n", "utf-8");
      await rename(tmpPath, path);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw err;
    }
  }

  async tryAcquire(providerId: ProviderId): Promise<boolean> {
    const lock = new FileLock(this.lockPath(providerId), {
      staleMs: this.lockStaleMs,
      clock: this.clock,
    });
    if (!(await lock.tryAcquire())) return false;
    this.locks.set(providerId, lock);
    return true;
  }

  /** Mark a held lock as still in use; a no-op when it is not held */
  async touchLock(providerId: ProviderId): Promise<void> {
    const lock = this.locks.get(providerId);
    if (!lock) return;
    try {
      await lock.touch();
    } catch (err) {
      log.warn(`failed to touch ${lock.path}: ${errorMessage(err)}`);
    }
  }

  async release(providerId: ProviderId): Promise<void> {
    const lock = this.locks.get(providerId);
    if (!lock) return;
    this.locks.delete(providerId);
    try {
      await lock.release();
    } catch (err) {
      log.warn(`failed to remove ${lock.path}: ${errorMessage(err)}`);
    }
  }
}
