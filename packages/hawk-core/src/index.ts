/**
 * @hawk-auth/core
 *
 * Hawk canonical strings, MACs, payload hashes and wire codecs.
 * Shared by the server verifier and the client signer.
 */

// Types
export type {
  HawkAlgorithm,
  HawkPrincipal,
  HawkCredentials,
  MessageType,
  HawkOptionKey,
  HawkOptions,
  HawkArtifacts,
  AuthHeaderAttributes,
  BewitAttributes,
  TimestampProvider,
  NonceProvider,
} from './types.js';

// Constants
export {
  HAWK_SCHEME,
  HAWK_VERSION,
  BEWIT_PARAM,
  BEWIT_SEPARATOR,
  MIN_NONCE_LENGTH,
  DEFAULT_NONCE_LENGTH,
  HAWK_ALGORITHMS,
  isHawkAlgorithm,
} from './constants.js';

// Canonicalization
export {
  normalizeString,
  normalizeTimestamp,
  normalizePayload,
  artifactsToOptions,
} from './normalize.js';

// MACs and hashes
export { computeMac, calculateMac, calculateTimestampMac, fixedTimeEqual } from './mac.js';
export { parseContentType, calculatePayloadHash } from './payload.js';
export type { Payload } from './payload.js';

// Wire codecs
export {
  parseHeaderParameters,
  parseAuthorizationHeader,
  hasAuthorizationScheme,
  formatHeaderParameters,
  formatHeader,
} from './header.js';
export type { HeaderEntries } from './header.js';
export { encodeBewit, decodeBewit } from './bewit.js';
export type { BewitDecodeResult } from './bewit.js';

// Nonces
export { generateNonce, nowSeconds } from './nonce.js';

// Errors
export { ErrorCodes, ErrorHttpStatus, ErrorMessages } from './errors.js';
export type { ErrorCode, BewitErrorCode, HawkError } from './errors.js';
