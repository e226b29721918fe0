/**
 * HMAC computation and constant-time comparison.
 *
 * All MACs are base64 (standard alphabet, padded) over the UTF-8 bytes of a
 * canonical string, keyed with the UTF-8 bytes of the principal's key.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { HAWK_ALGORITHMS } from './constants.js';
import { normalizeString, normalizeTimestamp } from './normalize.js';
import type { HawkOptions, HawkPrincipal, MessageType } from './types.js';

/**
 * MAC an already-built canonical string.
 */
export function computeMac(principal: HawkPrincipal, normalized: string): string {
  return createHmac(HAWK_ALGORITHMS[principal.algorithm].hmac, principal.key)
    .update(normalized, 'utf8')
    .digest('base64');
}

/**
 * Canonicalize `options` as `type` and MAC the result.
 */
export function calculateMac(
  principal: HawkPrincipal,
  type: MessageType,
  options: HawkOptions
): string {
  return computeMac(principal, normalizeString(type, options));
}

/**
 * MAC of the server time, sent as `tsm` in stale-timestamp challenges.
 */
export function calculateTimestampMac(principal: HawkPrincipal, ts: number): string {
  return computeMac(principal, normalizeTimestamp(ts));
}

/**
 * Compare two strings in constant time.
 *
 * Strings of different length still cost one comparison so the length check
 * does not short-circuit faster than a content mismatch.
 */
export function fixedTimeEqual(expected: string, actual: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(actual, 'utf8');
  if (a.length !== b.length) {
    timingSafeEqual(a, a);
    return false;
  }
  return timingSafeEqual(a, b);
}
