/**
 * Errors Module
 */

export {
  ErrorCode,
  DepotTrustError,
  UrlParseError,
  NetworkError,
  TlsHandshakeError,
  UserDeclinedError,
  StoreReadError,
  StoreWriteError,
  ConfigError,
  describeError,
} from './errors';
