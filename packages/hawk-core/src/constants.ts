/**
 * Protocol constants
 */

import type { HawkAlgorithm } from './types.js';

/** Header scheme name; matched case-sensitively */
export const HAWK_SCHEME = 'Hawk';

/** Protocol version folded into every canonical string */
export const HAWK_VERSION = 1;

/** Query parameter carrying a bewit */
export const BEWIT_PARAM = 'bewit';

/** Separator between the four bewit fields */
export const BEWIT_SEPARATOR = '\\';

export const MIN_NONCE_LENGTH = 6;

export const DEFAULT_NONCE_LENGTH = 12;

/**
 * Digest names (as understood by node:crypto) for each algorithm pair.
 */
export const HAWK_ALGORITHMS: Readonly<
  Record<HawkAlgorithm, { readonly hmac: string; readonly hash: string }>
> = {
  sha1: { hmac: 'sha1', hash: 'sha1' },
  sha256: { hmac: 'sha256', hash: 'sha256' },
};

/**
 * Type guard for algorithm identifiers coming from untyped sources.
 */
export function isHawkAlgorithm(value: unknown): value is HawkAlgorithm {
  return value === 'sha1' || value === 'sha256';
}
