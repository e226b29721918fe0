/**
 * @hawk-auth/client - Stateful client
 *
 * @packageDocumentation
 */

import {
  DEFAULT_NONCE_LENGTH,
  generateNonce,
  nowSeconds,
  type HawkArtifacts,
  type HawkCredentials,
  type NonceProvider,
  type TimestampProvider,
} from '@hawk-auth/core';
import { createBewitUrl } from './bewit.js';
import {
  parseTimestampChallenge,
  verifyServerAuthorization,
  type ServerResponse,
} from './response.js';
import { signRequest, type ClientRequest, type SignedRequest } from './signer.js';

export interface HawkClientOptions {
  /** Local clock in Unix seconds */
  timestampProvider?: TimestampProvider;
  nonceProvider?: NonceProvider;
  /** Length of generated nonces when no `nonceProvider` is given (at least 6) */
  nonceLength?: number;
  /** Default `ext` for signed requests */
  ext?: string;
  /** Hash payloads into the MAC (default true) */
  payloadValidation?: boolean;
}

/**
 * Signs requests with one set of credentials and tracks the offset between
 * the local clock and the server's.
 *
 * @example
 * ```typescript
 * const client = new HawkClient(credentials, { ext: 'mobile-app' });
 * const { header, artifacts } = client.sign({ method: 'GET', url });
 * const res = await fetch(url, { headers: { authorization: header } });
 * if (res.status === 401 && client.syncClock(res.headers.get('www-authenticate') ?? undefined)) {
 *   // retry with the corrected clock
 * }
 * ```
 */
export class HawkClient {
  private offsetSeconds = 0;
  private readonly timestampProvider: TimestampProvider;
  private readonly nonceProvider: NonceProvider;
  private readonly ext: string | undefined;
  private readonly payloadValidation: boolean;

  constructor(
    readonly credentials: HawkCredentials,
    options: HawkClientOptions = {}
  ) {
    const nonceLength = options.nonceLength ?? DEFAULT_NONCE_LENGTH;
    this.timestampProvider = options.timestampProvider ?? nowSeconds;
    this.nonceProvider = options.nonceProvider ?? (() => generateNonce(nonceLength));
    this.ext = options.ext;
    this.payloadValidation = options.payloadValidation ?? true;
  }

  /**
   * Seconds to add to the local clock to match the server.
   */
  get clockOffset(): number {
    return this.offsetSeconds;
  }

  /**
   * Local time corrected by the clock offset.
   */
  now(): number {
    return this.timestampProvider() + this.offsetSeconds;
  }

  sign(
    request: ClientRequest,
    options: { ext?: string; app?: string; dlg?: string } = {}
  ): SignedRequest {
    return signRequest(this.credentials, request, {
      timestamp: this.now(),
      nonce: this.nonceProvider(),
      ext: options.ext ?? this.ext,
      app: options.app,
      dlg: options.dlg,
      payloadValidation: this.payloadValidation,
    });
  }

  /**
   * URL granting GET access for `ttlSec` seconds.
   */
  bewitUrl(url: string | URL, ttlSec: number, ext: string): string {
    return createBewitUrl(this.credentials, url, { ttlSec, ext, timestamp: this.now() });
  }

  verifyResponse(
    header: string | undefined,
    artifacts: HawkArtifacts,
    response: ServerResponse = {}
  ): boolean {
    return verifyServerAuthorization(header, this.credentials, artifacts, response);
  }

  /**
   * Adopt the server time from a stale-timestamp challenge.
   *
   * @returns true if the challenge carried a verifiable server time
   */
  syncClock(wwwAuthenticate: string | undefined): boolean {
    const serverTime = parseTimestampChallenge(wwwAuthenticate, this.credentials);
    if (serverTime === undefined) {
      return false;
    }
    this.offsetSeconds = serverTime - this.timestampProvider();
    return true;
  }
}
