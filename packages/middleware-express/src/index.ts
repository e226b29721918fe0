/**
 * Hawk Middleware for Express.js
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { HawkAuthenticator } from '@hawk-auth/server';
 * import { hawkMiddleware } from '@hawk-auth/middleware-express';
 *
 * const hawk = hawkMiddleware(
 *   new HawkAuthenticator({
 *     realm: 'api',
 *     userRetriever: (id) => credentialStore.get(id),
 *   })
 * );
 *
 * const app = express();
 * app.use(express.raw({ type: '*\/*' }));
 * app.use(hawk.authenticate, hawk.serverAuthorization);
 * ```
 *
 * @packageDocumentation
 */

// Middleware
export { hawkMiddleware, toHawkRequest, toProblemDetails } from './middleware.js';

// Types
export type { HawkMiddleware, HawkMiddlewareOptions, ProblemDetails } from './middleware.js';

// Re-export server types for convenience
export type {
  AuthenticationSuccess,
  HawkAuthenticatorOptions,
  HawkRejection,
  UserRetriever,
} from '@hawk-auth/server';
