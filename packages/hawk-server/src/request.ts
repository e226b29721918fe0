/**
 * @hawk-auth/server - Request view
 *
 * Framework-neutral shape of an inbound request, and extraction of the
 * method/host/port/uri that enter the canonical string.
 *
 * @packageDocumentation
 */

export type HeaderValue = string | readonly string[] | undefined;

/**
 * Inbound request as seen by the verifier.
 */
export interface HawkRequest {
  method: string;
  /** Absolute URL, or origin-form target (path and query) resolved against the Host header */
  url: string;
  /** Header names in any case */
  headers: Readonly<Record<string, HeaderValue>>;
  /** Transport scheme (`http` or `https`) for origin-form targets */
  protocol?: string;
  /** Raw body; required only for payload validation */
  body?: Uint8Array | string;
}

/**
 * Request attributes that enter the canonical string.
 */
export interface RequestAttributes {
  method: string;
  /** Lowercased host name (IPv6 literals keep their brackets) */
  host: string;
  /** Explicit port, else derived from the scheme; 0 when unknown */
  port: number;
  /** Path and query exactly as sent, `/` when empty */
  uri: string;
}

/**
 * Case-insensitive header lookup. Repeated headers yield their first value.
 */
export function getHeader(request: HawkRequest, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() !== lower || value === undefined) continue;
    return typeof value === 'string' ? value : value[0];
  }
  return undefined;
}

const ABSOLUTE_URL = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/?#]*)([^#]*)/;
const AUTHORITY = /^(\[[^\]]*\]|[^:]*)(?::(\d*))?$/;

interface Authority {
  host: string;
  port: number | undefined;
}

function parseAuthority(raw: string): Authority {
  const hostPort = raw.slice(raw.lastIndexOf('@') + 1).trim();
  const match = AUTHORITY.exec(hostPort);
  if (!match) {
    return { host: hostPort.toLowerCase(), port: undefined };
  }
  const [, host = '', port = ''] = match;
  return {
    host: host.toLowerCase(),
    port: port ? Number(port) : undefined,
  };
}

function defaultPort(scheme: string | undefined): number {
  switch (scheme?.trim().toLowerCase()) {
    case 'http':
      return 80;
    case 'https':
      return 443;
    default:
      return 0;
  }
}

/**
 * Derive the canonical-string request attributes.
 *
 * Port resolution: explicit port in the authority, else a non-empty
 * `X-Forwarded-Proto` (set by reverse proxies), else the request's own scheme.
 */
export function extractRequestAttributes(request: HawkRequest): RequestAttributes {
  let authority: string;
  let scheme: string | undefined;
  let uri: string;

  const absolute = ABSOLUTE_URL.exec(request.url);
  if (absolute) {
    const [, urlScheme = '', urlAuthority = '', rest = ''] = absolute;
    scheme = urlScheme;
    authority = urlAuthority;
    uri = rest;
  } else {
    scheme = request.protocol;
    authority = getHeader(request, 'host') ?? '';
    uri = request.url.split('#')[0] ?? '';
  }

  if (uri === '') {
    uri = '/';
  } else if (uri.startsWith('?')) {
    uri = `/${uri}`;
  }

  const { host, port } = parseAuthority(authority);
  const forwardedProto = getHeader(request, 'x-forwarded-proto')?.split(',')[0]?.trim();

  return {
    method: request.method.toUpperCase(),
    host,
    port: port ?? defaultPort(forwardedProto || scheme),
    uri,
  };
}
