/**
 * Payload hashing for body binding.
 */

import { createHash } from 'node:crypto';
import { HAWK_ALGORITHMS } from './constants.js';
import { normalizePayload } from './normalize.js';
import type { HawkAlgorithm } from './types.js';

/**
 * Body bytes or text. Bytes are decoded as UTF-8 before hashing.
 */
export type Payload = Uint8Array | string;

/**
 * Reduce a Content-Type header to its bare, lowercased media type.
 *
 * `"Text/Plain; charset=utf-8"` becomes `"text/plain"`; an absent header
 * becomes `""`.
 */
export function parseContentType(header: string | undefined): string {
  if (!header) {
    return '';
  }
  const [mediaType = ''] = header.split(';');
  return mediaType.trim().toLowerCase();
}

/**
 * Compute the `hash` attribute for a payload.
 *
 * @param payload - Body bytes or text
 * @param contentType - Content-Type header value (parameters are stripped)
 * @param algorithm - Credential algorithm pair; its hash digest is used
 * @returns Base64 digest
 */
export function calculatePayloadHash(
  payload: Payload,
  contentType: string | undefined,
  algorithm: HawkAlgorithm
): string {
  const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
  return createHash(HAWK_ALGORITHMS[algorithm].hash)
    .update(normalizePayload(text, parseContentType(contentType)), 'utf8')
    .digest('base64');
}
