/**
 * Trust Operation Types
 */

import type { CertificateFetcher } from '../fetcher';
import type { OperationLogger } from '../logging';
import type { ConfirmationPrompt } from '../prompt';

/**
 * Process exit status returned by every operation
 */
export enum ExitStatus {
  /** Success or a benign no-op */
  SUCCESS = 0,
  /** Any failure; the store was left untouched */
  FAILURE = 1,
}

/**
 * Sink for command output that isn't logging (e.g. list-trust rows)
 */
export interface OutputWriter {
  write(text: string): unknown;
}

/**
 * Collaborators shared by all operations.
 */
export interface OperationContext {
  /** Path of the trust file */
  trustFile: string;
  log: OperationLogger;
  /** Used by install-cert only */
  fetchCertificate: CertificateFetcher;
  /** Used by install-cert only */
  prompt: ConfirmationPrompt;
  /** Used by list-trust only */
  output: OutputWriter;
}

export interface InstallCertOptions {
  /** Pin without asking for confirmation */
  autoAccept?: boolean;
  /** Port to connect to instead of the URL's */
  port?: number;
  /** Handshake timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Host and port a URL points at
 */
export interface TlsTarget {
  hostname: string;
  port: number;
}
