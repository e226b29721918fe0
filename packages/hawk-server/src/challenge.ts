/**
 * @hawk-auth/server - Rejections and WWW-Authenticate challenges
 */

import {
  ErrorCodes,
  ErrorHttpStatus,
  ErrorMessages,
  calculateTimestampMac,
  formatHeader,
  type ErrorCode,
  type HawkError,
  type HawkPrincipal,
} from '@hawk-auth/core';

/**
 * Structured rejection handed to the HTTP layer.
 */
export interface HawkRejection {
  httpStatus: number;
  code: ErrorCode;
  message: string;
  headers: { 'WWW-Authenticate': string };
}

export interface ChallengeAttributes {
  ts?: number;
  tsm?: string;
  error?: string;
}

/**
 * Format `Hawk realm="..."[, ts="...", tsm="...", error="..."]`.
 */
export function formatChallenge(realm: string, attributes: ChallengeAttributes = {}): string {
  return formatHeader([
    ['realm', realm],
    ['ts', attributes.ts === undefined ? undefined : String(attributes.ts)],
    ['tsm', attributes.tsm],
    ['error', attributes.error],
  ]);
}

/**
 * Challenge carrying a MAC'd server time so the client can resync its clock.
 */
export function formatTimestampChallenge(
  realm: string,
  principal: HawkPrincipal,
  now: number,
  error?: string
): string {
  return formatChallenge(realm, {
    ts: now,
    tsm: calculateTimestampMac(principal, now),
    error,
  });
}

/**
 * Map a verification error to a rejection.
 *
 * A request with no credentials gets a bare realm challenge; a stale
 * timestamp additionally gets `ts`/`tsm` for the current server time.
 *
 * @param now - Server time in Unix seconds
 */
export function toRejection<U extends HawkPrincipal>(
  error: HawkError<U>,
  realm: string,
  now: number
): HawkRejection {
  const message = ErrorMessages[error.code];

  let challenge: string;
  switch (error.code) {
    case ErrorCodes.CREDENTIALS_MISSING:
      challenge = formatChallenge(realm);
      break;
    case ErrorCodes.STALE_TIMESTAMP:
      challenge = formatTimestampChallenge(realm, error.user, now, message);
      break;
    default:
      challenge = formatChallenge(realm, { error: message });
  }

  return {
    httpStatus: ErrorHttpStatus[error.code],
    code: error.code,
    message,
    headers: { 'WWW-Authenticate': challenge },
  };
}
