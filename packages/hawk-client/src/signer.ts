/**
 * @hawk-auth/client - Authorization header signing
 *
 * @packageDocumentation
 */

import {
  artifactsToOptions,
  calculateMac,
  calculatePayloadHash,
  formatHeader,
  generateNonce,
  nowSeconds,
  type HawkArtifacts,
  type HawkCredentials,
  type Payload,
} from '@hawk-auth/core';
import { resolveTarget } from './target.js';

/**
 * Outbound request to sign.
 */
export interface ClientRequest {
  method: string;
  /** Absolute URL */
  url: string | URL;
  payload?: Payload;
  contentType?: string;
}

export interface SignOptions {
  /** Unix seconds; defaults to the current time */
  timestamp?: number;
  /** Defaults to a fresh 12-character nonce */
  nonce?: string;
  ext?: string;
  app?: string;
  dlg?: string;
  /** Hash the payload into the MAC when one is given (default true) */
  payloadValidation?: boolean;
}

/**
 * A signed request: the header to send and the artifacts needed to verify
 * the server's response.
 */
export interface SignedRequest {
  header: string;
  artifacts: HawkArtifacts;
}

/**
 * Sign a request.
 *
 * The header lists `id, ts, nonce, [hash,] ext, [app, dlg,] mac`.
 *
 * @example
 * ```typescript
 * const { header, artifacts } = signRequest(credentials, {
 *   method: 'POST',
 *   url: 'https://api.example.com/orders',
 *   payload: body,
 *   contentType: 'application/json',
 * });
 * ```
 *
 * @throws HawkClientError if the URL is not absolute
 */
export function signRequest(
  credentials: HawkCredentials,
  request: ClientRequest,
  options: SignOptions = {}
): SignedRequest {
  const target = resolveTarget(request.url);
  const payloadValidation = options.payloadValidation ?? true;

  const artifacts: HawkArtifacts = {
    method: request.method.toUpperCase(),
    host: target.host,
    port: target.port,
    uri: target.uri,
    ts: options.timestamp ?? nowSeconds(),
    nonce: options.nonce ?? generateNonce(),
    hash:
      payloadValidation && request.payload !== undefined
        ? calculatePayloadHash(request.payload, request.contentType, credentials.algorithm)
        : undefined,
    ext: options.ext ?? '',
  };
  if (options.app !== undefined && options.dlg !== undefined) {
    artifacts.app = options.app;
    artifacts.dlg = options.dlg;
  }

  const mac = calculateMac(credentials, 'header', artifactsToOptions(artifacts));

  const header = formatHeader([
    ['id', credentials.id],
    ['ts', String(artifacts.ts)],
    ['nonce', artifacts.nonce],
    ['hash', artifacts.hash],
    ['ext', artifacts.ext],
    ['app', artifacts.app],
    ['dlg', artifacts.dlg],
    ['mac', mac],
  ]);

  return { header, artifacts };
}

/**
 * Sign a request and return only the `Authorization` value.
 */
export function getAuthorizationHeader(
  credentials: HawkCredentials,
  request: ClientRequest,
  options: SignOptions = {}
): string {
  return signRequest(credentials, request, options).header;
}
