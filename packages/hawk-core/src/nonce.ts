import { randomInt } from 'node:crypto';
import { DEFAULT_NONCE_LENGTH, MIN_NONCE_LENGTH } from './constants.js';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Generate a random alphanumeric nonce from a CSPRNG.
 *
 * Lengths below 6 are raised to 6.
 */
export function generateNonce(length: number = DEFAULT_NONCE_LENGTH): string {
  const size = Number.isFinite(length)
    ? Math.max(MIN_NONCE_LENGTH, Math.floor(length))
    : DEFAULT_NONCE_LENGTH;
  let nonce = '';
  for (let i = 0; i < size; i++) {
    nonce += ALPHABET.charAt(randomInt(ALPHABET.length));
  }
  return nonce;
}

/**
 * Current Unix time in whole seconds.
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
