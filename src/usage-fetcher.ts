/**
 * Shared fetch orchestration for every provider:
 *
 *   cache lookup -> lock -> credential -> (refresh) -> API call -> cache write
 *
 * Only one process per provider talks to the network at a time. Everyone
 * else is served from the cache, stale if need be, so a status bar never
 * hangs on a slow upstream. Every outcome, errors included, is cached with
 * the normal TTL so a failing upstream is not hit on every poll.
 */

import { setTimeout as delay } from "node:timers/promises";
import { FileCache } from "./cache/file-cache.js";
import { PEER_POLL_MS, PEER_WAIT_MS } from "./config.js";
import { errorMessage, UsageError } from "./errors.js";
import { createLogger } from "./logger.js";
import {
  systemClock,
  type ApiResponse,
  type CacheEntry,
  type Clock,
  type Credential,
  type ErrorStatus,
  type UsageProvider,
  type UsageResult,
  type UsageWindows,
} from "./types.js";

const log = createLogger("fetch");

const MAX_API_ATTEMPTS = 2;

export type FetchOptions = {
  cache?: FileCache;
  clock?: Clock;
  /** How long to wait for a peer's result when there is nothing cached */
  peerWaitMs?: number;
  peerPollMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => delay(ms);

export async function fetchUsage<C extends Credential>(
  provider: UsageProvider<C>,
  options: FetchOptions = {}
): Promise<UsageResult> {
  const clock = options.clock ?? systemClock;
  const cache = options.cache ?? new FileCache({ clock });

  const cached = await cache.read(provider.id);
  if (cached && cache.isFresh(cached)) {
    log.debug(`${provider.id}: serving fresh cache entry`);
    return { entry: cached, source: "cache" };
  }

  if (!(await cache.tryAcquire(provider.id))) {
    log.debug(`${provider.id}: fetch already in progress elsewhere`);
    return waitForPeer(provider, cache, cached, clock, options);
  }

  try {
    const keepAlive = () => cache.touchLock(provider.id);
    const entry = await fetchEntry(provider, clock, cache.ttlSeconds, keepAlive);
    try {
      await cache.write(provider.id, entry);
    } catch (err) {
      log.warn(`${provider.id}: failed to write cache: ${errorMessage(err)}`);
    }
    return { entry, source: "network" };
  } finally {
    await cache.release(provider.id);
  }
}

async function waitForPeer<C extends Credential>(
  provider: UsageProvider<C>,
  cache: FileCache,
  stale: CacheEntry | null,
  clock: Clock,
  options: FetchOptions
): Promise<UsageResult> {
  if (stale) return { entry: stale, source: "stale" };

  const waitMs = options.peerWaitMs ?? PEER_WAIT_MS;
  const pollMs = options.peerPollMs ?? PEER_POLL_MS;
  const sleep = options.sleep ?? defaultSleep;

  for (let waited = 0; waited < waitMs; waited += pollMs) {
    await sleep(pollMs);
    const entry = await cache.read(provider.id);
    if (entry) return { entry, source: "peer" };
  }

  return {
    entry: errorEntry(
      provider,
      clock.now(),
      cache.ttlSeconds,
      "no_credentials",
      `No cached ${provider.displayName} usage yet; another fetch is in progress.`
    ),
    source: "stale",
  };
}

/** Runs the credential and API steps; never throws */
async function fetchEntry<C extends Credential>(
  provider: UsageProvider<C>,
  clock: Clock,
  ttlSeconds: number,
  keepAlive: () => Promise<void>
): Promise<CacheEntry> {
  try {
    const windows = await loadAndCall(provider, clock, keepAlive);
    return {
      providerId: provider.id,
      fetchedAt: clock.now(),
      ttlSeconds,
      status: "ok",
      ...windows,
    };
  } catch (err) {
    const status: ErrorStatus =
      err instanceof UsageError ? err.status : "network_error";
    log.debug(`${provider.id}: ${status}: ${errorMessage(err)}`);
    return errorEntry(provider, clock.now(), ttlSeconds, status, errorMessage(err));
  }
}

async function loadAndCall<C extends Credential>(
  provider: UsageProvider<C>,
  clock: Clock,
  keepAlive: () => Promise<void>
): Promise<UsageWindows> {
  let credential = await provider.loadCredential();

  if (provider.refresh && provider.needsRefresh?.(credential, clock.now())) {
    await keepAlive();
    credential = await provider.refresh(credential);
  }

  // At most MAX_API_ATTEMPTS calls, whether the retry follows a transport
  // failure or a refresh after a 401
  for (let attempt = 1; ; attempt++) {
    const canRetry = attempt < MAX_API_ATTEMPTS;
    await keepAlive();

    let response: ApiResponse;
    try {
      response = await provider.callApi(credential);
    } catch (err) {
      if (canRetry) {
        log.debug(`${provider.id}: request failed, retrying: ${errorMessage(err)}`);
        continue;
      }
      throw new UsageError(
        "network_error",
        `Request failed: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    if (response.status === 401) {
      if (provider.refresh && canRetry) {
        log.debug(`${provider.id}: 401, refreshing token and retrying`);
        await keepAlive();
        credential = await provider.refresh(credential);
        continue;
      }
      throw new UsageError(
        "auth_error",
        `401 Unauthorized: ${provider.displayName} token rejected.`
      );
    }

    if (response.status === 403) {
      throw new UsageError(
        "auth_error",
        `403 Forbidden: access denied to ${provider.displayName} usage API.`
      );
    }

    if (response.status < 200 || response.status >= 300) {
      if (canRetry) {
        log.debug(`${provider.id}: HTTP ${response.status}, retrying`);
        continue;
      }
      throw new UsageError(
        "network_error",
        `Request failed: HTTP ${response.status}`
      );
    }

    return provider.parseResponse(response.body, clock.now());
  }
}

function errorEntry<C extends Credential>(
  provider: UsageProvider<C>,
  now: number,
  ttlSeconds: number,
  status: ErrorStatus,
  message: string
): CacheEntry {
  return {
    providerId: provider.id,
    fetchedAt: now,
    ttlSeconds,
    status,
    message,
  };
}
