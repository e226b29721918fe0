/**
 * Hawk rejection codes.
 *
 * Every rejection is a value, not a thrown exception. `HawkError` is a
 * discriminated union keyed by `code`; only the stale-timestamp and
 * user-retrieval variants carry extra data.
 */

import type { HawkPrincipal } from './types.js';

export const ErrorCodes = {
  /** Neither a Hawk Authorization header nor a bewit was presented */
  CREDENTIALS_MISSING: 'E_CREDENTIALS_MISSING',
  /** Key id unknown to the credential lookup */
  INVALID_CREDENTIALS: 'E_INVALID_CREDENTIALS',
  /** MAC missing or mismatched */
  INVALID_MAC: 'E_INVALID_MAC',
  /** Payload hash mismatched */
  INVALID_PAYLOAD_HASH: 'E_INVALID_PAYLOAD_HASH',
  /** Nonce missing or replayed */
  INVALID_NONCE: 'E_INVALID_NONCE',
  /** Timestamp outside the skew window */
  STALE_TIMESTAMP: 'E_STALE_TIMESTAMP',
  /** Both an Authorization header and a bewit were presented */
  MULTIPLE_AUTHENTICATION: 'E_MULTIPLE_AUTHENTICATION',
  /** Bewit is not valid base64 */
  INVALID_BEWIT_ENCODING: 'E_INVALID_BEWIT_ENCODING',
  /** Bewit does not decode to four fields */
  INVALID_BEWIT_STRUCTURE: 'E_INVALID_BEWIT_STRUCTURE',
  /** Bewit has an empty field */
  MISSING_BEWIT_ATTRIBUTES: 'E_MISSING_BEWIT_ATTRIBUTES',
  /** Bewit used with a method other than GET */
  INVALID_METHOD: 'E_INVALID_METHOD',
  /** Bewit past its expiry */
  ACCESS_EXPIRED: 'E_ACCESS_EXPIRED',
  /** Credential lookup callback failed */
  USER_RETRIEVAL: 'E_USER_RETRIEVAL',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status codes for each error.
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  [ErrorCodes.CREDENTIALS_MISSING]: 401,
  [ErrorCodes.INVALID_CREDENTIALS]: 401,
  [ErrorCodes.INVALID_MAC]: 401,
  [ErrorCodes.INVALID_PAYLOAD_HASH]: 401,
  [ErrorCodes.INVALID_NONCE]: 401,
  [ErrorCodes.STALE_TIMESTAMP]: 401,
  [ErrorCodes.MULTIPLE_AUTHENTICATION]: 400,
  [ErrorCodes.INVALID_BEWIT_ENCODING]: 400,
  [ErrorCodes.INVALID_BEWIT_STRUCTURE]: 400,
  [ErrorCodes.MISSING_BEWIT_ATTRIBUTES]: 400,
  [ErrorCodes.INVALID_METHOD]: 401,
  [ErrorCodes.ACCESS_EXPIRED]: 401,
  [ErrorCodes.USER_RETRIEVAL]: 500,
};

/**
 * Short messages, safe to expose in the `error` challenge attribute.
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CREDENTIALS_MISSING]: 'Missing credentials',
  [ErrorCodes.INVALID_CREDENTIALS]: 'Invalid credentials',
  [ErrorCodes.INVALID_MAC]: 'Bad mac',
  [ErrorCodes.INVALID_PAYLOAD_HASH]: 'Bad payload hash',
  [ErrorCodes.INVALID_NONCE]: 'Invalid nonce',
  [ErrorCodes.STALE_TIMESTAMP]: 'Stale timestamp',
  [ErrorCodes.MULTIPLE_AUTHENTICATION]: 'Multiple authentications',
  [ErrorCodes.INVALID_BEWIT_ENCODING]: 'Invalid bewit encoding',
  [ErrorCodes.INVALID_BEWIT_STRUCTURE]: 'Invalid bewit structure',
  [ErrorCodes.MISSING_BEWIT_ATTRIBUTES]: 'Missing bewit attributes',
  [ErrorCodes.INVALID_METHOD]: 'Invalid method',
  [ErrorCodes.ACCESS_EXPIRED]: 'Access expired',
  [ErrorCodes.USER_RETRIEVAL]: 'An error occurred while retrieving a hawk user',
};

export type BewitErrorCode =
  | typeof ErrorCodes.INVALID_BEWIT_ENCODING
  | typeof ErrorCodes.INVALID_BEWIT_STRUCTURE
  | typeof ErrorCodes.MISSING_BEWIT_ATTRIBUTES;

type PlainErrorCode = Exclude<
  ErrorCode,
  typeof ErrorCodes.STALE_TIMESTAMP | typeof ErrorCodes.USER_RETRIEVAL
>;

/**
 * A verification rejection.
 */
export type HawkError<U extends HawkPrincipal = HawkPrincipal> =
  | { readonly code: PlainErrorCode }
  | { readonly code: typeof ErrorCodes.STALE_TIMESTAMP; readonly user: U }
  | { readonly code: typeof ErrorCodes.USER_RETRIEVAL; readonly cause: unknown };

