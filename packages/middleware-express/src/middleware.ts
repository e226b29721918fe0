/**
 * Express.js Middleware for Hawk Authentication
 *
 * `authenticate` verifies requests and rejects failures with a problem+json
 * body and a `WWW-Authenticate` challenge. `serverAuthorization` intercepts
 * `res.send()` to add a `Server-Authorization` header over the response body.
 *
 * @packageDocumentation
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from 'pino';
import type { HawkPrincipal } from '@hawk-auth/core';
import {
  logger as defaultLogger,
  type AuthenticationResult,
  type AuthenticationSuccess,
  type HawkAuthenticator,
  type HawkRejection,
  type HawkRequest,
} from '@hawk-auth/server';

/**
 * Express-specific middleware configuration
 */
export interface HawkMiddlewareOptions {
  /** Skip authentication for certain routes */
  skip?: (req: Request) => boolean;

  /**
   * Raw request body used for payload validation. Defaults to `req.body`
   * when it is a Buffer or string (as left by `express.raw()` or
   * `express.text()`).
   */
  bodyExtractor?: (req: Request) => Uint8Array | string | undefined;

  /** Error handler for response signing failures */
  onError?: (error: unknown, req: Request, res: Response) => void;

  logger?: Logger;
}

/**
 * RFC 9457 problem details sent with every rejection
 */
export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  code: string;
}

export interface HawkMiddleware<U extends HawkPrincipal> {
  /** Verifies the request; on success stores the result and calls `next()` */
  authenticate: RequestHandler;
  /** Signs responses to header-authenticated requests */
  serverAuthorization: RequestHandler;
  /** Result of a successful `authenticate` for this response */
  getAuthentication(res: Response): AuthenticationSuccess<U> | undefined;
}

function defaultBodyExtractor(req: Request): Uint8Array | string | undefined {
  const body: unknown = req.body;
  if (Buffer.isBuffer(body) || typeof body === 'string') {
    return body;
  }
  return undefined;
}

/**
 * Convert an Express request to the verifier's request view
 */
export function toHawkRequest(
  req: Request,
  bodyExtractor: (req: Request) => Uint8Array | string | undefined = defaultBodyExtractor
): HawkRequest {
  return {
    method: req.method,
    url: req.originalUrl,
    headers: req.headers,
    protocol: req.protocol,
    body: bodyExtractor(req),
  };
}

/**
 * Build the problem details for a rejection
 */
export function toProblemDetails(rejection: HawkRejection): ProblemDetails {
  return {
    type: 'about:blank',
    title: rejection.message,
    status: rejection.httpStatus,
    code: rejection.code,
  };
}

function sendRejection(res: Response, rejection: HawkRejection): void {
  res
    .status(rejection.httpStatus)
    .set('WWW-Authenticate', rejection.headers['WWW-Authenticate'])
    .set('Cache-Control', 'no-store')
    .type('application/problem+json')
    .json(toProblemDetails(rejection));
}

function isSignableBody(body: unknown): body is string | Buffer | null | undefined {
  return body === undefined || body === null || typeof body === 'string' || Buffer.isBuffer(body);
}

/**
 * Content-Type Express will send for `body` when none is set.
 */
function effectiveContentType(res: Response, body: string | Buffer | undefined): string | undefined {
  const explicit = res.get('Content-Type');
  if (explicit) {
    return explicit;
  }
  if (typeof body === 'string') {
    return 'text/html';
  }
  if (body !== undefined) {
    return 'application/octet-stream';
  }
  return undefined;
}

/**
 * Express middleware for Hawk authentication
 *
 * @param authenticator - Shared authenticator (owns the nonce cache)
 * @param options - Middleware options
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { HawkAuthenticator } from '@hawk-auth/server';
 * import { hawkMiddleware } from '@hawk-auth/middleware-express';
 *
 * const hawk = hawkMiddleware(
 *   new HawkAuthenticator({ realm: 'api', userRetriever: findUserByKeyId })
 * );
 *
 * const app = express();
 * app.use(express.raw({ type: '*\/*' }));
 * app.use(hawk.authenticate, hawk.serverAuthorization);
 *
 * app.get('/api/data', (_req, res) => {
 *   res.json({ user: hawk.getAuthentication(res)?.id });
 *   // Server-Authorization header automatically added
 * });
 * ```
 */
export function hawkMiddleware<U extends HawkPrincipal>(
  authenticator: HawkAuthenticator<U>,
  options: HawkMiddlewareOptions = {}
): HawkMiddleware<U> {
  const log = options.logger ?? defaultLogger;
  const results = new WeakMap<Response, AuthenticationSuccess<U>>();

  async function hawkAuthenticate(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (options.skip?.(req)) {
      next();
      return;
    }

    const controller = new AbortController();
    const abortOnClose = (): void => {
      if (!res.writableEnded) {
        controller.abort(new Error('client closed the connection'));
      }
    };
    res.once('close', abortOnClose);

    let result: AuthenticationResult<U>;
    try {
      result = await authenticator.authenticate(toHawkRequest(req, options.bodyExtractor), {
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        log.debug({ path: req.path }, 'hawk verification aborted, client went away');
        return;
      }
      next(err);
      return;
    } finally {
      res.off('close', abortOnClose);
    }

    if (!result.ok) {
      sendRejection(res, result.rejection);
      return;
    }

    results.set(res, result);
    res.locals['hawk'] = result;
    next();
  }

  function hawkServerAuthorization(req: Request, res: Response, next: NextFunction): void {
    const originalSend = res.send.bind(res);

    // res.json() and res.send(object) re-enter send() with a string
    res.send = function sendWithServerAuthorization(body?: unknown): Response {
      const result = results.get(res);
      if (result && isSignableBody(body) && !res.headersSent) {
        const bodyless = req.method === 'HEAD' || res.statusCode === 204 || res.statusCode === 304;
        const payload = bodyless || body === null ? undefined : body;
        try {
          const header = authenticator.serverAuthorization(result, {
            body: payload,
            contentType: effectiveContentType(res, payload),
          });
          if (header) {
            res.setHeader('Server-Authorization', header);
          }
        } catch (error) {
          if (options.onError) {
            options.onError(error, req, res);
          } else {
            log.error({ err: error, path: req.path }, 'hawk response signing failed');
          }
        }
      }

      return originalSend(body);
    };

    next();
  }

  return {
    authenticate: hawkAuthenticate,
    serverAuthorization: hawkServerAuthorization,
    getAuthentication: (res) => results.get(res),
  };
}
