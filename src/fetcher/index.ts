/**
 * Certificate Fetcher Module
 */

export {
  DEFAULT_TLS_PORT,
  DEFAULT_FETCH_TIMEOUT_MS,
  type FetchOptions,
  type CertificateFetcher,
} from './types';

export {
  PEM_HEADER,
  PEM_FOOTER,
  derToPem,
  pemToDer,
  certificateFingerprint,
} from './pem';

export { fetchLeafCertificate } from './fetch-leaf-certificate';
