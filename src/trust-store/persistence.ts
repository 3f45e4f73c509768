/**
 * Trust Persistence Layer
 *
 * Loads and saves the trust file. Writes go to a temp file that is renamed
 * over the target, then the target's mode is forced to 0644.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { StoreReadError, StoreWriteError, describeError } from '../errors';
import type { OperationLogger } from '../logging';
import { TrustStore } from './trust-store';
import { TRUST_FILE_MODE, TrustStoreFileSchema } from './types';

/** JSON indentation used in the trust file */
const INDENT = 3;

/**
 * Whether a trust file exists at the path
 */
export function trustStoreExists(storePath: string): boolean {
  return fs.existsSync(storePath);
}

/**
 * Parse the contents of a trust file
 */
export function parseTrustStore(storePath: string, content: string): TrustStore {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StoreReadError(storePath, `invalid JSON (${describeError(error)})`, error);
  }

  try {
    return TrustStore.fromJSON(TrustStoreFileSchema.parse(raw));
  } catch (error) {
    const detail = error instanceof ZodError
      ? error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      : describeError(error);
    throw new StoreReadError(storePath, `unexpected content (${detail})`, error);
  }
}

/**
 * Serialize a store to the text written on disk
 */
export function serializeTrustStore(store: TrustStore): string {
  return JSON.stringify(store.toJSON(), null, INDENT);
}

/**
 * Load trust store from file.
 * Returns an empty store if the file doesn't exist.
 */
export async function loadTrustStore(storePath: string, log: OperationLogger): Promise<TrustStore> {
  if (!trustStoreExists(storePath)) {
    log.info({ path: storePath }, `Trust doesn't exist at ${storePath}, using empty trust`);
    return new TrustStore();
  }

  log.info({ path: storePath }, `Loading trust from ${storePath}`);
  let content: string;
  try {
    content = await fs.promises.readFile(storePath, 'utf-8');
  } catch (error) {
    throw new StoreReadError(storePath, describeError(error), error);
  }

  return parseTrustStore(storePath, content);
}

/**
 * Save the full trust store, replacing the file's prior content
 */
export async function saveTrustStore(
  storePath: string,
  store: TrustStore,
  log: OperationLogger,
): Promise<void> {
  log.info({ path: storePath, entries: store.size }, `Storing trust to ${storePath}`);

  const tempPath = storePath + '.tmp';
  try {
    await fs.promises.mkdir(path.dirname(storePath), { recursive: true });
    await fs.promises.writeFile(tempPath, serializeTrustStore(store), {
      encoding: 'utf-8',
      mode: TRUST_FILE_MODE,
    });
    await fs.promises.rename(tempPath, storePath);
    // rename keeps the temp file's mode, which umask may have narrowed
    await fs.promises.chmod(storePath, TRUST_FILE_MODE);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw new StoreWriteError(storePath, describeError(error), error);
  }
}
