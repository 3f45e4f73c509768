/**
 * Trust Store
 *
 * In-memory view of the trust file. Keys are URLs exactly as the caller
 * typed them; `https://host` and `https://host/` are different entries.
 */

import { TrustEntry, TrustStoreFile } from './types';
import {
  pinnedEntry,
  disabledEntry,
  encodeEntry,
  decodeEntry,
} from './trust-entry';

export class TrustStore {
  private records: Map<string, TrustEntry>;

  constructor(entries: Iterable<[string, TrustEntry]> = []) {
    this.records = new Map(entries);
  }

  /**
   * Build a store from its serialized form
   */
  static fromJSON(data: TrustStoreFile): TrustStore {
    const store = new TrustStore();
    for (const [url, value] of Object.entries(data)) {
      store.set(url, decodeEntry(value));
    }
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  get(url: string): TrustEntry | undefined {
    return this.records.get(url);
  }

  has(url: string): boolean {
    return this.records.has(url);
  }

  /**
   * Replace whatever is recorded for the URL
   */
  set(url: string, entry: TrustEntry): void {
    this.records.set(url, entry);
  }

  pin(url: string, certificate: string): void {
    this.set(url, pinnedEntry(certificate));
  }

  disable(url: string): void {
    this.set(url, disabledEntry());
  }

  /**
   * Remove the entry for a URL
   * @returns whether an entry existed
   */
  remove(url: string): boolean {
    return this.records.delete(url);
  }

  urls(): string[] {
    return [...this.records.keys()];
  }

  entries(): Array<[string, TrustEntry]> {
    return [...this.records.entries()];
  }

  toJSON(): TrustStoreFile {
    return Object.fromEntries(
      this.entries().map(([url, entry]) => [url, encodeEntry(entry)]),
    );
  }
}
