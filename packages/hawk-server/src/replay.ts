/**
 * @hawk-auth/server - Nonce validators
 *
 * A nonce is accepted once per (nonce, key id, timestamp) triple for the
 * lifetime of the cache entry. `validate` is synchronous, so the
 * check-and-insert cannot interleave with another verification on the same
 * event loop.
 *
 * @packageDocumentation
 */

import type { Logger } from 'pino';
import { logger as defaultLogger } from './logging.js';

/**
 * Replay check consulted after a request's MAC has verified.
 */
export interface NonceValidator {
  /**
   * Record the nonce and report whether it was fresh.
   *
   * @returns true if the nonce has not been seen for this key and timestamp
   */
  validate(nonce: string, keyId: string, ts: number): boolean;
}

export interface CachingNonceValidatorOptions {
  /** Lifetime of each entry, measured from first sight */
  ttlMs: number;
  /** Capacity; the oldest entry is evicted when full */
  maxEntries: number;
  /** Clock in milliseconds, for tests */
  now?: () => number;
}

/**
 * In-memory nonce cache with per-entry absolute expiry.
 *
 * Best-effort only - not shared between processes.
 *
 * @example
 * ```typescript
 * const nonceValidator = new CachingNonceValidator({
 *   ttlMs: nonceCacheTtlMs(config),
 *   maxEntries: config.nonceCache.maxEntries,
 * });
 * ```
 */
export class CachingNonceValidator implements NonceValidator {
  private cache = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: CachingNonceValidatorOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSize = options.maxEntries;
    this.now = options.now ?? (() => Date.now());
  }

  validate(nonce: string, keyId: string, ts: number): boolean {
    const key = `${nonce}_${keyId}_${ts}`;
    const now = this.now();

    this.sweep(now);

    const existingExpiry = this.cache.get(key);
    if (existingExpiry !== undefined && existingExpiry > now) {
      return false;
    }
    this.cache.delete(key);

    if (this.cache.size >= this.maxSize) {
      this.evictOldest();
    }

    this.cache.set(key, now + this.ttlMs);
    return true;
  }

  /**
   * Get current size of the cache.
   */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Clear all entries from the cache.
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * Drop expired entries from the front. Entries are inserted in expiry
   * order since the TTL is fixed.
   */
  private sweep(now: number): void {
    for (const [key, expiry] of this.cache) {
      if (expiry > now) break;
      this.cache.delete(key);
    }
  }

  /**
   * Evict the oldest entry (first in map iteration order).
   */
  private evictOldest(): void {
    const first = this.cache.keys().next();
    if (!first.done) {
      this.cache.delete(first.value);
    }
  }
}

/**
 * Validator that accepts every nonce.
 *
 * WARNING: This validator does NOT provide replay protection.
 */
export class NoOpNonceValidator implements NonceValidator {
  constructor(log: Logger = defaultLogger) {
    log.warn('nonce replay protection is disabled');
  }

  validate(_nonce: string, _keyId: string, _ts: number): boolean {
    return true;
  }
}
