/**
 * @hawk-auth/client
 *
 * Hawk request signing for clients, bewit URLs, and verification of the
 * server's Server-Authorization and stale-timestamp challenges.
 */

export { HawkClient } from './client.js';
export type { HawkClientOptions } from './client.js';

export { signRequest, getAuthorizationHeader } from './signer.js';
export type { ClientRequest, SignOptions, SignedRequest } from './signer.js';

export { getBewit, createBewitUrl } from './bewit.js';
export type { BewitOptions } from './bewit.js';

export { verifyServerAuthorization, parseTimestampChallenge } from './response.js';
export type { ServerResponse } from './response.js';

export { resolveTarget } from './target.js';
export type { RequestTarget } from './target.js';

export { HawkClientError } from './errors.js';
