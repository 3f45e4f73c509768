/**
 * Trust Entry helpers
 *
 * Conversions between the in-memory tagged entry and the string stored on disk.
 */

import {
  DISABLED_MARKER,
  TrustEntry,
  TrustEntryKind,
  PinnedEntry,
  DisabledEntry,
} from './types';

/**
 * Create an entry pinning the given PEM certificate
 */
export function pinnedEntry(certificate: string): PinnedEntry {
  return { kind: TrustEntryKind.PINNED, certificate };
}

/**
 * Create an entry marking the URL as accessible without trust
 */
export function disabledEntry(): DisabledEntry {
  return { kind: TrustEntryKind.DISABLED };
}

export function isPinned(entry: TrustEntry | undefined): entry is PinnedEntry {
  return entry?.kind === TrustEntryKind.PINNED;
}

export function isDisabled(entry: TrustEntry | undefined): entry is DisabledEntry {
  return entry?.kind === TrustEntryKind.DISABLED;
}

/**
 * Encode an entry to its on-disk value
 */
export function encodeEntry(entry: TrustEntry): string {
  switch (entry.kind) {
    case TrustEntryKind.PINNED:
      return entry.certificate;
    case TrustEntryKind.DISABLED:
      return DISABLED_MARKER;
  }
}

/**
 * Decode an on-disk value. Only the exact marker string means "disabled".
 */
export function decodeEntry(value: string): TrustEntry {
  return value === DISABLED_MARKER ? disabledEntry() : pinnedEntry(value);
}
