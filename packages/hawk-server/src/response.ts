/**
 * @hawk-auth/server - Server-Authorization signing
 */

import {
  artifactsToOptions,
  calculateMac,
  calculatePayloadHash,
  formatHeader,
  type HawkArtifacts,
  type HawkPrincipal,
} from '@hawk-auth/core';

/**
 * Response body and its Content-Type.
 */
export interface ResponsePayload {
  body?: Uint8Array | string;
  contentType?: string;
}

/**
 * Build a `Server-Authorization` value for a response to an authenticated
 * request.
 *
 * The request's ts/nonce/method/uri/host/port are carried over; `hash` and
 * `ext` are replaced by the response's own. An empty body gets no `hash`.
 */
export function buildServerAuthorizationHeader(
  principal: HawkPrincipal,
  artifacts: HawkArtifacts,
  ext: string,
  response: ResponsePayload = {}
): string {
  const { body } = response;
  const hash =
    body !== undefined && body.length > 0
      ? calculatePayloadHash(body, response.contentType, principal.algorithm)
      : undefined;

  const mac = calculateMac(principal, 'response', {
    ...artifactsToOptions(artifacts),
    hash,
    ext,
  });

  return formatHeader([
    ['mac', mac],
    ['hash', hash],
    ['ext', ext],
  ]);
}
