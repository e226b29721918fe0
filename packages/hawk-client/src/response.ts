/**
 * @hawk-auth/client - Response verification
 */

import {
  artifactsToOptions,
  calculateMac,
  calculatePayloadHash,
  calculateTimestampMac,
  fixedTimeEqual,
  parseAuthorizationHeader,
  type HawkArtifacts,
  type HawkCredentials,
  type Payload,
} from '@hawk-auth/core';

export interface ServerResponse {
  body?: Payload;
  contentType?: string;
}

/**
 * Verify a `Server-Authorization` header against the request it answers.
 *
 * The MAC is always checked. The body hash is checked when the header
 * carries one.
 *
 * @param artifacts - Artifacts returned by `signRequest` for the request
 */
export function verifyServerAuthorization(
  header: string | undefined,
  credentials: HawkCredentials,
  artifacts: HawkArtifacts,
  response: ServerResponse = {}
): boolean {
  const params = parseAuthorizationHeader(header);
  const mac = params?.get('mac');
  if (!params || !mac) {
    return false;
  }

  const hash = params.get('hash');
  const expectedMac = calculateMac(credentials, 'response', {
    ...artifactsToOptions(artifacts),
    hash,
    ext: params.get('ext'),
  });
  if (!fixedTimeEqual(expectedMac, mac)) {
    return false;
  }

  if (hash === undefined) {
    return true;
  }
  const expectedHash = calculatePayloadHash(
    response.body ?? '',
    response.contentType,
    credentials.algorithm
  );
  return fixedTimeEqual(expectedHash, hash);
}

const INTEGER = /^\d+$/;

/**
 * Read the server time from a stale-timestamp challenge.
 *
 * @returns Server time in Unix seconds, or undefined when the challenge has
 *   no `ts`/`tsm` or the `tsm` does not verify
 */
export function parseTimestampChallenge(
  wwwAuthenticate: string | undefined,
  credentials: HawkCredentials
): number | undefined {
  const params = parseAuthorizationHeader(wwwAuthenticate);
  const ts = params?.get('ts');
  const tsm = params?.get('tsm');
  if (ts === undefined || tsm === undefined || !INTEGER.test(ts)) {
    return undefined;
  }

  const serverTime = Number(ts);
  return fixedTimeEqual(calculateTimestampMac(credentials, serverTime), tsm)
    ? serverTime
    : undefined;
}
