/**
 * Trust Operations Module
 */

export {
  ExitStatus,
  type OutputWriter,
  type OperationContext,
  type InstallCertOptions,
  type TlsTarget,
} from './types';

export { needsTrust, parseTarget } from './url';

export {
  CONFIRMATION_QUESTION,
  installCert,
  uninstallCert,
  disableTrust,
  enableTrust,
  clearTrust,
  listTrust,
} from './trust-operations';
