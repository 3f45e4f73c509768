import { UrlParseError } from '../errors';
import { DEFAULT_TLS_PORT } from '../fetcher';
import { TlsTarget } from './types';

/**
 * Only https URLs need trust to be established; case-insensitive.
 */
export function needsTrust(url: string): boolean {
  return url.toLowerCase().startsWith('https://');
}

/**
 * Resolve the host and port to fetch a URL's certificate from
 */
export function parseTarget(url: string): TlsTarget {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new UrlParseError(url, error);
  }

  // IPv6 hosts come back bracketed
  const hostname = parsed.hostname.replace(/^\[(.*)\]$/, '$1');
  if (hostname === '') {
    throw new UrlParseError(url);
  }

  const port = parsed.port === '' ? DEFAULT_TLS_PORT : Number(parsed.port);
  if (port < 1 || port > 65535) {
    throw new UrlParseError(url);
  }

  return { hostname, port };
}
