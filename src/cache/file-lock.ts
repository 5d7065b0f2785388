/**
 * Cross-process lock marker built on exclusive file creation.
 *
 * Existence of the marker means "a fetch is in progress". Each holder writes
 * a unique token into the marker so that `release` never deletes a marker
 * that was reclaimed by another process after this one went stale.
 */

import { randomUUID } from "node:crypto";
import {
  link,
  mkdir,
  open,
  readFile,
  rename,
  stat,
  unlink,
  utimes,
  writeFile,
  type FileHandle,
} from "node:fs/promises";
import { dirname } from "node:path";
import { isErrnoCode } from "../errors.js";
import { LOCK_STALE_MS } from "../config.js";
import { systemClock, type Clock } from "../types.js";

export type FileLockOptions = {
  staleMs?: number;
  clock?: Clock;
};

export class FileLock {
  readonly path: string;
  private readonly staleMs: number;
  private readonly clock: Clock;
  private token: string | null = null;

  constructor(path: string, options: FileLockOptions = {}) {
    this.path = path;
    this.staleMs = options.staleMs ?? LOCK_STALE_MS;
    this.clock = options.clock ?? systemClock;
  }

  get held(): boolean {
    return this.token !== null;
  }

  async tryAcquire(): Promise<boolean> {
    if (this.token !== null) return false;
    await mkdir(dirname(this.path), { recursive: true });

    if (await this.create()) return true;

    const staleToken = await this.readStaleToken();
    if (staleToken === null) return false;
    if (!(await this.takeOver(staleToken))) return false;
    return this.create();
  }

  /**
   * Move an abandoned marker out of the way. Only one contender can rename a
   * given marker; a contender that renamed a marker other than the stale one
   * it inspected puts it back and gives up.
   */
  private async takeOver(staleToken: string): Promise<boolean> {
    const grave = `${this.path}.${randomUUID()}.stale`;
    try {
      await rename(this.path, grave);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw err;
    }

    try {
      const taken = await readFile(grave, "utf-8");
      if (taken === staleToken) return true;
      try {
        await link(grave, this.path);
      } catch (err) {
        if (!isErrnoCode(err, "EEXIST")) throw err;
      }
      return false;
    } finally {
      await unlink(grave);
    }
  }

  /** Bump the marker's mtime so a long fetch is not mistaken for a crash */
  async touch(): Promise<void> {
    if (this.token === null) return;
    let current: string;
    try {
      current = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return;
      throw err;
    }
    if (current !== this.token) return;
    const now = new Date(this.clock.now());
    await utimes(this.path, now, now);
  }

  async release(): Promise<void> {
    const token = this.token;
    this.token = null;
    if (token === null) return;

    let current: string;
    try {
      current = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return;
      throw err;
    }
    if (current !== token) return;
    await this.removeMarker();
  }

  /** True when a marker exists and is older than the staleness threshold */
  async isStale(): Promise<boolean> {
    try {
      const info = await stat(this.path);
      return this.clock.now() - info.mtimeMs > this.staleMs;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw err;
    }
  }

  /**
   * Token of the marker when it is stale, else null. Age and content come
   * from one open handle so they describe the same file.
   */
  private async readStaleToken(): Promise<string | null> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, "r");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
    try {
      const info = await handle.stat();
      if (this.clock.now() - info.mtimeMs <= this.staleMs) return null;
      return await handle.readFile("utf-8");
    } finally {
      await handle.close();
    }
  }

  private async create(): Promise<boolean> {
    const token = `${process.pid}:${randomUUID()}`;
    try {
      await writeFile(this.path, token, { flag: "wx" });
    } catch (err) {
      if (isErrnoCode(err, "EEXIST")) return false;
      throw err;
    }
    this.token = token;
    return true;
  }

  private async removeMarker(): Promise<void> {
    try {
      await unlink(this.path);
    } catch (err) {
      if (!isErrnoCode(err, "ENOENT")) throw err;
    }
  }
}
