/**
 * Certificate Fetcher Types
 */

/** Port used when the URL names none */
export const DEFAULT_TLS_PORT = 443;

/** Handshake timeout in milliseconds */
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export interface FetchOptions {
  /** TCP port (default: 443) */
  port?: number;
  /** Bound on connect + handshake in milliseconds (default: 10s) */
  timeoutMs?: number;
}

/**
 * Returns the PEM text of the leaf certificate a server presents.
 */
export type CertificateFetcher = (hostname: string, options?: FetchOptions) => Promise<string>;
