/**
 * @hawk-auth/server - Request verification
 *
 * Header path: credential lookup, MAC, payload hash, nonce, timestamp.
 * Bewit path: structure, method, expiry, credential lookup, MAC.
 * Each step short-circuits, so the first failing check is the one reported.
 *
 * @packageDocumentation
 */

import type { Logger } from 'pino';
import {
  ErrorCodes,
  ErrorMessages,
  calculateMac,
  calculatePayloadHash,
  fixedTimeEqual,
  nowSeconds,
  type AuthHeaderAttributes,
  type BewitAttributes,
  type HawkArtifacts,
  type HawkError,
  type HawkPrincipal,
  type TimestampProvider,
} from '@hawk-auth/core';
import {
  buildHawkOptions,
  extractAuthHeaderAttributes,
  extractBewit,
  type BewitExtraction,
} from './attributes.js';
import {
  formatChallenge,
  formatTimestampChallenge,
  toRejection,
  type HawkRejection,
} from './challenge.js';
import {
  nonceCacheTtlMs,
  resolveConfig,
  type HawkServerConfig,
  type HawkServerConfigInput,
} from './config.js';
import { logger as defaultLogger } from './logging.js';
import { CachingNonceValidator, type NonceValidator } from './replay.js';
import {
  extractRequestAttributes,
  getHeader,
  type HawkRequest,
  type RequestAttributes,
} from './request.js';
import { buildServerAuthorizationHeader, type ResponsePayload } from './response.js';

/**
 * Resolves a key id to its user. May throw or reject; that surfaces as
 * `E_USER_RETRIEVAL` rather than escaping `authenticate`.
 */
export type UserRetriever<U extends HawkPrincipal> = (
  id: string
) => Promise<U | null | undefined> | U | null | undefined;

export interface HawkAuthenticatorOptions<U extends HawkPrincipal> {
  /** Realm advertised in every challenge */
  realm: string;
  userRetriever: UserRetriever<U>;
  config?: HawkServerConfigInput;
  /** Defaults to an in-memory cache sized from `config` */
  nonceValidator?: NonceValidator;
  /** Server clock in Unix seconds */
  timestampProvider?: TimestampProvider;
  logger?: Logger;
}

export interface AuthenticateOptions {
  /** Checked once the credential lookup settles, before the nonce is recorded */
  signal?: AbortSignal;
}

export type AuthenticationSuccess<U extends HawkPrincipal> =
  | {
      ok: true;
      mode: 'header';
      id: string;
      user: U;
      artifacts: HawkArtifacts;
    }
  | {
      ok: true;
      mode: 'bewit';
      id: string;
      user: U;
      bewit: BewitAttributes;
    };

export interface AuthenticationFailure<U extends HawkPrincipal> {
  ok: false;
  error: HawkError<U>;
  rejection: HawkRejection;
}

export type AuthenticationResult<U extends HawkPrincipal> =
  | AuthenticationSuccess<U>
  | AuthenticationFailure<U>;

type LookupResult<U> = { ok: true; user: U | undefined } | { ok: false; cause: unknown };

/** MAC'd against when the id is unknown, so both outcomes cost one HMAC */
const UNKNOWN_PRINCIPAL: HawkPrincipal = {
  key: 'hawk-auth-unknown-credentials',
  algorithm: 'sha256',
};

/**
 * Verifies Hawk-authenticated requests against a shared nonce cache.
 *
 * @example
 * ```typescript
 * const authenticator = new HawkAuthenticator({
 *   realm: 'api',
 *   userRetriever: (id) => users.findByKeyId(id),
 * });
 *
 * const result = await authenticator.authenticate({
 *   method: 'GET',
 *   url: '/resource/1?b=1&a=2',
 *   headers: { host: 'example.com:8000', authorization },
 * });
 * if (!result.ok) {
 *   res.writeHead(result.rejection.httpStatus, result.rejection.headers);
 * }
 * ```
 */
export class HawkAuthenticator<U extends HawkPrincipal> {
  readonly realm: string;
  readonly config: HawkServerConfig;
  private readonly userRetriever: UserRetriever<U>;
  private readonly nonceValidator: NonceValidator;
  private readonly now: TimestampProvider;
  private readonly log: Logger;

  constructor(options: HawkAuthenticatorOptions<U>) {
    this.realm = options.realm;
    this.config = resolveConfig(options.config);
    this.userRetriever = options.userRetriever;
    this.now = options.timestampProvider ?? nowSeconds;
    this.log = options.logger ?? defaultLogger;
    this.nonceValidator =
      options.nonceValidator ??
      new CachingNonceValidator({
        ttlMs: nonceCacheTtlMs(this.config),
        maxEntries: this.config.nonceCache.maxEntries,
      });
  }

  /**
   * Verify a request.
   *
   * Resolves with a success or a rejection; rejects only when `signal` is
   * aborted (with the signal's reason).
   */
  async authenticate(
    request: HawkRequest,
    options: AuthenticateOptions = {}
  ): Promise<AuthenticationResult<U>> {
    const { signal } = options;
    signal?.throwIfAborted();

    const attributes = extractRequestAttributes(request);
    const header = extractAuthHeaderAttributes(request);
    const bewit = extractBewit(attributes.uri);

    if (header.present && bewit.present) {
      return this.fail({ code: ErrorCodes.MULTIPLE_AUTHENTICATION }, header.attributes?.id);
    }
    if (bewit.present) {
      return this.authenticateBewit(attributes, bewit, signal);
    }
    if (!header.present) {
      return this.fail({ code: ErrorCodes.CREDENTIALS_MISSING });
    }
    if (!header.attributes) {
      return this.fail({ code: ErrorCodes.INVALID_CREDENTIALS });
    }
    return this.authenticateHeader(request, attributes, header.attributes, signal);
  }

  /**
   * Build the rejection for an error at the current server time.
   */
  reject(error: HawkError<U>): HawkRejection {
    return toRejection(error, this.realm, this.now());
  }

  /**
   * Recompute a `WWW-Authenticate` value for a request outside of
   * `authenticate`.
   *
   * The credential lookup is repeated under `challengeLookupTimeoutMs`. If it
   * finds the user and the request's timestamp is outside the skew window,
   * the challenge carries `ts`/`tsm`. A timeout or lookup failure yields the
   * bare realm challenge.
   */
  async challenge(request: HawkRequest): Promise<string> {
    const extraction = extractAuthHeaderAttributes(request);
    const header = extraction.present ? extraction.attributes : null;
    if (!header) {
      return formatChallenge(this.realm);
    }

    let user: U | undefined;
    try {
      user = await this.retrieveWithTimeout(header.id);
    } catch (err) {
      this.log.warn({ err, id: header.id }, 'hawk challenge lookup failed, sending bare challenge');
      return formatChallenge(this.realm);
    }

    const now = this.now();
    if (!user || !this.config.timeSkewValidation || this.isWithinSkew(header.ts, now)) {
      return formatChallenge(this.realm);
    }
    return formatTimestampChallenge(
      this.realm,
      user,
      now,
      ErrorMessages[ErrorCodes.STALE_TIMESTAMP]
    );
  }

  /**
   * Build the `Server-Authorization` value for a response.
   *
   * @returns undefined for bewit-authenticated requests
   */
  serverAuthorization(
    result: AuthenticationSuccess<U>,
    response: ResponsePayload = {}
  ): string | undefined {
    if (result.mode !== 'header') {
      return undefined;
    }
    return buildServerAuthorizationHeader(
      result.user,
      result.artifacts,
      this.config.serverAuthorizationExt,
      response
    );
  }

  private async authenticateHeader(
    request: HawkRequest,
    attributes: RequestAttributes,
    header: AuthHeaderAttributes,
    signal: AbortSignal | undefined
  ): Promise<AuthenticationResult<U>> {
    const { id } = header;

    const lookup = await this.lookup(id);
    signal?.throwIfAborted();
    if (!lookup.ok) {
      return this.fail({ code: ErrorCodes.USER_RETRIEVAL, cause: lookup.cause }, id);
    }

    const options = buildHawkOptions(attributes, header);
    const { user } = lookup;
    if (!user) {
      calculateMac(UNKNOWN_PRINCIPAL, 'header', options);
      return this.fail({ code: ErrorCodes.INVALID_CREDENTIALS }, id);
    }

    const mac = calculateMac(user, 'header', options);
    if (header.mac === undefined || !fixedTimeEqual(mac, header.mac)) {
      return this.fail({ code: ErrorCodes.INVALID_MAC }, id);
    }

    if (this.config.payloadValidation && header.hash !== undefined) {
      const hash = calculatePayloadHash(
        request.body ?? '',
        getHeader(request, 'content-type'),
        user.algorithm
      );
      if (!fixedTimeEqual(hash, header.hash)) {
        return this.fail({ code: ErrorCodes.INVALID_PAYLOAD_HASH }, id);
      }
    }

    if (!header.nonce || !this.nonceValidator.validate(header.nonce, id, header.ts)) {
      return this.fail({ code: ErrorCodes.INVALID_NONCE }, id);
    }

    if (this.config.timeSkewValidation && !this.isWithinSkew(header.ts, this.now())) {
      return this.fail({ code: ErrorCodes.STALE_TIMESTAMP, user }, id);
    }

    return {
      ok: true,
      mode: 'header',
      id,
      user,
      artifacts: {
        method: attributes.method,
        host: attributes.host,
        port: attributes.port,
        uri: attributes.uri,
        ts: header.ts,
        nonce: header.nonce,
        hash: header.hash,
        ext: header.ext,
        app: header.app,
        dlg: header.dlg,
      },
    };
  }

  private async authenticateBewit(
    attributes: RequestAttributes,
    extraction: Extract<BewitExtraction, { present: true }>,
    signal: AbortSignal | undefined
  ): Promise<AuthenticationResult<U>> {
    const { result } = extraction;
    if (!result.ok) {
      return this.fail({ code: result.code });
    }
    const bewit = result.attributes;
    const { id } = bewit;

    if (attributes.method !== 'GET') {
      return this.fail({ code: ErrorCodes.INVALID_METHOD }, id);
    }
    if (bewit.exp <= this.now()) {
      return this.fail({ code: ErrorCodes.ACCESS_EXPIRED }, id);
    }

    const lookup = await this.lookup(id);
    signal?.throwIfAborted();
    if (!lookup.ok) {
      return this.fail({ code: ErrorCodes.USER_RETRIEVAL, cause: lookup.cause }, id);
    }

    const options = {
      method: 'GET',
      uri: extraction.uriWithoutBewit,
      host: attributes.host,
      port: String(attributes.port),
      ts: String(bewit.exp),
      nonce: '',
      ext: bewit.ext,
    };
    const { user } = lookup;
    if (!user) {
      calculateMac(UNKNOWN_PRINCIPAL, 'bewit', options);
      return this.fail({ code: ErrorCodes.INVALID_CREDENTIALS }, id);
    }

    const mac = calculateMac(user, 'bewit', options);
    if (!fixedTimeEqual(mac, bewit.mac)) {
      return this.fail({ code: ErrorCodes.INVALID_MAC }, id);
    }

    return { ok: true, mode: 'bewit', id, user, bewit };
  }

  private isWithinSkew(ts: number, now: number): boolean {
    const skew = this.config.timeSkewSeconds;
    return ts >= now - skew && ts <= now + skew;
  }

  private async lookup(id: string): Promise<LookupResult<U>> {
    try {
      const user = await this.userRetriever(id);
      return { ok: true, user: user ?? undefined };
    } catch (cause) {
      this.log.error({ err: cause, id }, 'hawk user retrieval failed');
      return { ok: false, cause };
    }
  }

  private async retrieveWithTimeout(id: string): Promise<U | undefined> {
    const timeoutMs = this.config.challengeLookupTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`user retrieval timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });

    try {
      const user = await Promise.race([
        Promise.resolve().then(() => this.userRetriever(id)),
        timeout,
      ]);
      return user ?? undefined;
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(error: HawkError<U>, id?: string): AuthenticationFailure<U> {
    this.log.debug({ code: error.code, id }, 'hawk authentication rejected');
    return { ok: false, error, rejection: this.reject(error) };
  }
}
