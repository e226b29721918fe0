/**
 * @hawk-auth/server - Credential attribute extraction
 *
 * Reads the Hawk `Authorization` header and the `bewit` query parameter.
 *
 * @packageDocumentation
 */

import {
  BEWIT_PARAM,
  decodeBewit,
  hasAuthorizationScheme,
  parseAuthorizationHeader,
  type AuthHeaderAttributes,
  type BewitDecodeResult,
  type HawkOptions,
} from '@hawk-auth/core';
import { getHeader, type HawkRequest, type RequestAttributes } from './request.js';

const INTEGER = /^\d+$/;

export type AuthHeaderExtraction =
  | { present: false }
  | {
      present: true;
      /** `null` when the parameter list is malformed */
      attributes: AuthHeaderAttributes | null;
    };

/**
 * Read the Hawk `Authorization` header.
 *
 * The header is present whenever its value uses the `Hawk` scheme, whatever
 * its parameters; other schemes such as Basic count as absent. A missing
 * `id` reads as `''`.
 */
export function extractAuthHeaderAttributes(request: HawkRequest): AuthHeaderExtraction {
  const value = getHeader(request, 'authorization');
  if (!hasAuthorizationScheme(value)) {
    return { present: false };
  }

  const params = parseAuthorizationHeader(value);
  if (!params) {
    return { present: true, attributes: null };
  }

  const ts = params.get('ts');
  const digits = ts !== undefined && INTEGER.test(ts) ? ts : undefined;
  const seconds = Number(digits ?? 0);
  return {
    present: true,
    attributes: {
      id: params.get('id') ?? '',
      ts: Number.isSafeInteger(seconds) ? seconds : 0,
      rawTs: digits ?? '0',
      nonce: params.get('nonce'),
      ext: params.get('ext'),
      hash: params.get('hash'),
      mac: params.get('mac'),
      app: params.get('app'),
      dlg: params.get('dlg'),
    },
  };
}

export type BewitExtraction =
  | { present: false }
  | {
      present: true;
      result: BewitDecodeResult;
      /** Request uri with the bewit parameter removed */
      uriWithoutBewit: string;
    };

function decodeQueryValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Find and decode the `bewit` query parameter.
 *
 * The parameter is removed from the uri exactly as written, leaving every
 * other parameter untouched. `+` is not treated as a space since it is part
 * of the base64 alphabet.
 */
export function extractBewit(uri: string): BewitExtraction {
  const queryStart = uri.indexOf('?');
  if (queryStart === -1) {
    return { present: false };
  }

  const path = uri.slice(0, queryStart);
  const pairs = uri.slice(queryStart + 1).split('&');
  const index = pairs.findIndex(
    (pair) => pair === BEWIT_PARAM || pair.startsWith(`${BEWIT_PARAM}=`)
  );
  if (index === -1) {
    return { present: false };
  }

  const [pair = ''] = pairs.splice(index, 1);
  const token = decodeQueryValue(pair.slice(BEWIT_PARAM.length + 1));
  const query = pairs.join('&');

  return {
    present: true,
    result: decodeBewit(token),
    uriWithoutBewit: query ? `${path}?${query}` : path,
  };
}

/**
 * Combine request and header attributes into canonicalization options.
 */
export function buildHawkOptions(
  request: RequestAttributes,
  header: AuthHeaderAttributes
): HawkOptions {
  return {
    method: request.method,
    uri: request.uri,
    host: request.host,
    port: String(request.port),
    ts: header.rawTs,
    nonce: header.nonce,
    hash: header.hash,
    ext: header.ext,
    app: header.app,
    dlg: header.dlg,
  };
}
