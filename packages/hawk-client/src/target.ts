import { HawkClientError } from './errors.js';

/**
 * Host, port and uri of a request target as they enter the canonical string.
 */
export interface RequestTarget {
  url: URL;
  host: string;
  port: number;
  uri: string;
}

function defaultPort(protocol: string): number {
  switch (protocol) {
    case 'http:':
      return 80;
    case 'https:':
      return 443;
    default:
      return 0;
  }
}

/**
 * Parse an absolute URL into its signing target.
 *
 * @throws HawkClientError if `url` is not an absolute URL
 */
export function resolveTarget(url: string | URL): RequestTarget {
  let parsed: URL;
  try {
    parsed = typeof url === 'string' ? new URL(url) : url;
  } catch (err) {
    throw new HawkClientError(`Invalid request URL: ${String(url)}`, { cause: err });
  }

  return {
    url: parsed,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : defaultPort(parsed.protocol),
    uri: `${parsed.pathname}${parsed.search}`,
  };
}
