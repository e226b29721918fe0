/**
 * @hawk-auth/client - Bewit generation
 */

import {
  BEWIT_PARAM,
  calculateMac,
  encodeBewit,
  nowSeconds,
  type HawkCredentials,
} from '@hawk-auth/core';
import { HawkClientError } from './errors.js';
import { resolveTarget } from './target.js';

export interface BewitOptions {
  /** Lifetime in seconds */
  ttlSec: number;
  /** Must be non-empty: a bewit cannot carry an empty field */
  ext: string;
  /** Unix seconds; defaults to the current time */
  timestamp?: number;
}

/**
 * Create a bewit token granting GET access to `url` until `now + ttlSec`.
 *
 * @returns The token, not yet URL-encoded
 * @throws HawkClientError on an empty `ext`, a non-positive TTL or a relative URL
 */
export function getBewit(
  credentials: HawkCredentials,
  url: string | URL,
  options: BewitOptions
): string {
  if (!options.ext.trim()) {
    throw new HawkClientError('Bewit ext must not be empty');
  }
  if (!Number.isInteger(options.ttlSec) || options.ttlSec <= 0) {
    throw new HawkClientError(`Invalid bewit ttlSec: ${options.ttlSec}`);
  }

  const target = resolveTarget(url);
  const exp = (options.timestamp ?? nowSeconds()) + options.ttlSec;
  const mac = calculateMac(credentials, 'bewit', {
    method: 'GET',
    uri: target.uri,
    host: target.host,
    port: String(target.port),
    ts: String(exp),
    nonce: '',
    ext: options.ext,
  });

  return encodeBewit({ id: credentials.id, exp, mac, ext: options.ext });
}

/**
 * Append a bewit for `url` as its last query parameter.
 */
export function createBewitUrl(
  credentials: HawkCredentials,
  url: string | URL,
  options: BewitOptions
): string {
  const token = getBewit(credentials, url, options);
  const target = new URL(resolveTarget(url).url.href);
  const param = `${BEWIT_PARAM}=${encodeURIComponent(token)}`;
  target.search = target.search ? `${target.search}&${param}` : `?${param}`;
  return target.href;
}
