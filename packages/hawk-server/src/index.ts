/**
 * @hawk-auth/server
 *
 * Hawk request verification for servers: attribute extraction, nonce
 * replay protection, WWW-Authenticate challenges and Server-Authorization
 * signing. Framework-neutral; see @hawk-auth/middleware-express for Express.
 */

// Verification
export { HawkAuthenticator } from './authenticator.js';
export type {
  UserRetriever,
  HawkAuthenticatorOptions,
  AuthenticateOptions,
  AuthenticationSuccess,
  AuthenticationFailure,
  AuthenticationResult,
} from './authenticator.js';

// Request view
export { extractRequestAttributes, getHeader } from './request.js';
export type { HawkRequest, HeaderValue, RequestAttributes } from './request.js';
export { extractAuthHeaderAttributes, extractBewit, buildHawkOptions } from './attributes.js';
export type { AuthHeaderExtraction, BewitExtraction } from './attributes.js';

// Challenges and response signing
export { formatChallenge, formatTimestampChallenge, toRejection } from './challenge.js';
export type { HawkRejection, ChallengeAttributes } from './challenge.js';
export { buildServerAuthorizationHeader } from './response.js';
export type { ResponsePayload } from './response.js';

// Replay protection
export { CachingNonceValidator, NoOpNonceValidator } from './replay.js';
export type { NonceValidator, CachingNonceValidatorOptions } from './replay.js';

// Configuration
export {
  CONFIG_DEFAULTS,
  ConfigError,
  resolveConfig,
  parseBool,
  parseConfigFromEnv,
  nonceCacheTtlMs,
} from './config.js';
export type {
  HawkServerConfig,
  HawkServerConfigInput,
  ConfigValidationError,
} from './config.js';

// Logging
export { logger } from './logging.js';
