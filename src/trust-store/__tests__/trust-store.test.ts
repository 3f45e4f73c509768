/**
 * Trust Store Tests
 */

import { describe, it, expect } from 'vitest';
import { TrustStore } from '../trust-store';
import {
  pinnedEntry,
  disabledEntry,
  isPinned,
  isDisabled,
  encodeEntry,
  decodeEntry,
} from '../trust-entry';
import { DISABLED_MARKER, TrustEntryKind } from '../types';

const CERT = '-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----\n';

describe('trust entries', () => {
  it('encodes a pin as its certificate text', () => {
    expect(encodeEntry(pinnedEntry(CERT))).toBe(CERT);
  });

  it('encodes disabled trust as the marker', () => {
    expect(encodeEntry(disabledEntry())).toBe('AnyCertificate');
    expect(DISABLED_MARKER).toBe('AnyCertificate');
  });

  it('decodes only the exact marker as disabled', () => {
    expect(decodeEntry('AnyCertificate')).toEqual({ kind: TrustEntryKind.DISABLED });
    expect(decodeEntry('anycertificate')).toEqual({
      kind: TrustEntryKind.PINNED,
      certificate: 'anycertificate',
    });
  });

  it('narrows entry kinds', () => {
    expect(isPinned(pinnedEntry(CERT))).toBe(true);
    expect(isPinned(disabledEntry())).toBe(false);
    expect(isPinned(undefined)).toBe(false);
    expect(isDisabled(disabledEntry())).toBe(true);
    expect(isDisabled(pinnedEntry(CERT))).toBe(false);
    expect(isDisabled(undefined)).toBe(false);
  });
});

describe('TrustStore', () => {
  it('starts empty', () => {
    const store = new TrustStore();
    expect(store.size).toBe(0);
    expect(store.toJSON()).toEqual({});
  });

  it('keys URLs literally', () => {
    const store = new TrustStore();
    store.pin('https://host', CERT);

    expect(store.has('https://host')).toBe(true);
    expect(store.has('https://host/')).toBe(false);
    expect(store.has('HTTPS://host')).toBe(false);
  });

  it('replaces entries instead of merging', () => {
    const store = new TrustStore();
    store.pin('https://a.example', CERT);
    store.disable('https://a.example');

    expect(store.size).toBe(1);
    expect(store.get('https://a.example')).toEqual({ kind: TrustEntryKind.DISABLED });

    store.pin('https://a.example', 'other');
    expect(store.get('https://a.example')).toEqual({
      kind: TrustEntryKind.PINNED,
      certificate: 'other',
    });
  });

  it('remove reports whether an entry existed', () => {
    const store = new TrustStore();
    store.disable('https://a.example');

    expect(store.remove('https://a.example')).toBe(true);
    expect(store.remove('https://a.example')).toBe(false);
  });

  it('serializes to URL -> string in insertion order', () => {
    const store = new TrustStore();
    store.pin('https://b.example', CERT);
    store.disable('https://a.example');

    expect(store.toJSON()).toEqual({
      'https://b.example': CERT,
      'https://a.example': 'AnyCertificate',
    });
    expect(store.urls()).toEqual(['https://b.example', 'https://a.example']);
  });

  it('rebuilds from its serialized form', () => {
    const store = TrustStore.fromJSON({
      'https://a.example': CERT,
      'https://b.example': 'AnyCertificate',
    });

    expect(store.entries()).toEqual([
      ['https://a.example', { kind: TrustEntryKind.PINNED, certificate: CERT }],
      ['https://b.example', { kind: TrustEntryKind.DISABLED }],
    ]);
  });

  it('keeps a __proto__ URL as an ordinary key', () => {
    const store = TrustStore.fromJSON(JSON.parse('{"__proto__": "AnyCertificate"}'));

    expect(store.urls()).toEqual(['__proto__']);
    expect(Object.keys(store.toJSON())).toEqual(['__proto__']);
  });
});
