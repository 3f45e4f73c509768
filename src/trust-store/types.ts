/**
 * Trust Store Types
 *
 * A trust store maps a URL, taken literally, to the single trust decision
 * recorded for it.
 */

import { z } from 'zod';

/**
 * Value stored on disk for a URL that may be accessed without establishing trust.
 */
export const DISABLED_MARKER = 'AnyCertificate';

/**
 * File mode applied after every write: owner rw, group r, other r.
 */
export const TRUST_FILE_MODE = 0o644;

/**
 * Kinds of trust entry
 */
export enum TrustEntryKind {
  /** A specific certificate is the only trusted credential */
  PINNED = 'pinned',
  /** Connect without establishing any trust */
  DISABLED = 'disabled',
}

export interface PinnedEntry {
  kind: TrustEntryKind.PINNED;
  /** Exact PEM text of the pinned certificate */
  certificate: string;
}

export interface DisabledEntry {
  kind: TrustEntryKind.DISABLED;
}

export type TrustEntry = PinnedEntry | DisabledEntry;

/**
 * Serialized form: URL -> PEM text or the disabled marker.
 */
export const TrustStoreFileSchema = z.record(z.string(), z.string());

export type TrustStoreFile = z.infer<typeof TrustStoreFileSchema>;
