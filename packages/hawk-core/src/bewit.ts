/**
 * Bewit token codec.
 *
 * A bewit is `base64("<id>\<exp>\<mac>\<ext>")`. Encoding emits the standard
 * alphabet with padding; decoding also accepts the URL-safe alphabet and
 * missing padding.
 */

import { BEWIT_SEPARATOR } from './constants.js';
import { ErrorCodes, type BewitErrorCode } from './errors.js';
import type { BewitAttributes } from './types.js';

export type BewitDecodeResult =
  | { ok: true; attributes: BewitAttributes }
  | { ok: false; code: BewitErrorCode };

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;
const EXPIRY = /^\d+(\.\d+)?$/;

/**
 * Encode bewit attributes as a token (not yet URL-encoded).
 */
export function encodeBewit(attributes: BewitAttributes): string {
  const raw = [attributes.id, String(attributes.exp), attributes.mac, attributes.ext].join(
    BEWIT_SEPARATOR
  );
  return Buffer.from(raw, 'utf8').toString('base64');
}

function toStandardBase64(token: string): string | null {
  const standard = token.replace(/-/g, '+').replace(/_/g, '/');
  const padded = standard.includes('=')
    ? standard
    : standard + '='.repeat((4 - (standard.length % 4)) % 4);
  if (!BASE64.test(padded) || padded.length % 4 !== 0) {
    return null;
  }
  return padded;
}

/**
 * Decode and structurally validate a bewit token.
 *
 * Checks run in order: base64 validity, exactly four fields, no empty field,
 * numeric expiry within the safe integer range. A fractional expiry is
 * truncated to whole seconds.
 */
export function decodeBewit(token: string): BewitDecodeResult {
  const base64 = toStandardBase64(token);
  if (base64 === null || base64.length === 0) {
    return { ok: false, code: ErrorCodes.INVALID_BEWIT_ENCODING };
  }

  const fields = Buffer.from(base64, 'base64').toString('utf8').split(BEWIT_SEPARATOR);
  if (fields.length !== 4) {
    return { ok: false, code: ErrorCodes.INVALID_BEWIT_STRUCTURE };
  }

  const [id = '', exp = '', mac = '', ext = ''] = fields;
  if (!id.trim() || !exp.trim() || !mac.trim() || !ext.trim()) {
    return { ok: false, code: ErrorCodes.MISSING_BEWIT_ATTRIBUTES };
  }

  const expiry = EXPIRY.test(exp) ? Math.trunc(Number(exp)) : NaN;
  if (!Number.isSafeInteger(expiry)) {
    return { ok: false, code: ErrorCodes.INVALID_BEWIT_STRUCTURE };
  }

  return {
    ok: true,
    attributes: { id, exp: expiry, mac, ext },
  };
}
