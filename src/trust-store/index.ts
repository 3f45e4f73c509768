/**
 * Trust Store Module
 *
 * URL -> pinned certificate or disabled-trust marker, persisted as JSON.
 */

// Types
export {
  DISABLED_MARKER,
  TRUST_FILE_MODE,
  TrustEntryKind,
  TrustStoreFileSchema,
  type TrustEntry,
  type PinnedEntry,
  type DisabledEntry,
  type TrustStoreFile,
} from './types';

// Entries
export {
  pinnedEntry,
  disabledEntry,
  isPinned,
  isDisabled,
  encodeEntry,
  decodeEntry,
} from './trust-entry';

// Store
export { TrustStore } from './trust-store';

// Persistence
export {
  loadTrustStore,
  saveTrustStore,
  trustStoreExists,
  parseTrustStore,
  serializeTrustStore,
} from './persistence';
