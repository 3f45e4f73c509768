/**
 * Error taxonomy for trust store maintenance.
 *
 * Every fatal failure an operation can hit is one of these classes. The
 * operation boundary turns them into a warning line and a non-zero status.
 */

/**
 * Machine-readable error codes
 */
export enum ErrorCode {
  URL_PARSE = 'URL_PARSE',
  NETWORK = 'NETWORK',
  TLS_HANDSHAKE = 'TLS_HANDSHAKE',
  USER_DECLINED = 'USER_DECLINED',
  STORE_READ = 'STORE_READ',
  STORE_WRITE = 'STORE_WRITE',
  CONFIG = 'CONFIG',
}

/**
 * Base class for all errors raised by this package.
 */
export class DepotTrustError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DepotTrustError';
    this.code = code;
  }
}

export class UrlParseError extends DepotTrustError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(ErrorCode.URL_PARSE, `Couldn't parse the provided URL ${url}`, { cause });
    this.name = 'UrlParseError';
    this.url = url;
  }
}

/**
 * TCP connect failure or timeout.
 */
export class NetworkError extends DepotTrustError {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, message: string, cause?: unknown) {
    super(ErrorCode.NETWORK, `Unable to connect to ${host}:${port}: ${message}`, { cause });
    this.name = 'NetworkError';
    this.host = host;
    this.port = port;
  }
}

/**
 * The TCP connection was up but the TLS handshake did not yield a certificate.
 */
export class TlsHandshakeError extends DepotTrustError {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, message: string, cause?: unknown) {
    super(ErrorCode.TLS_HANDSHAKE, `TLS handshake with ${host}:${port} failed: ${message}`, { cause });
    this.name = 'TlsHandshakeError';
    this.host = host;
    this.port = port;
  }
}

export class UserDeclinedError extends DepotTrustError {
  readonly answer: string;

  constructor(answer: string) {
    super(ErrorCode.USER_DECLINED, 'User did not agree, stopping the operation');
    this.name = 'UserDeclinedError';
    this.answer = answer;
  }
}

export class StoreReadError extends DepotTrustError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(ErrorCode.STORE_READ, `Unable to read trust store at ${path}: ${message}`, { cause });
    this.name = 'StoreReadError';
    this.path = path;
  }
}

export class StoreWriteError extends DepotTrustError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(ErrorCode.STORE_WRITE, `Unable to write trust store at ${path}: ${message}`, { cause });
    this.name = 'StoreWriteError';
    this.path = path;
  }
}

export class ConfigError extends DepotTrustError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(ErrorCode.CONFIG, message, { cause });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
