/**
 * Trust Operations
 *
 * install-cert, uninstall-cert, disable-trust, enable-trust, clear-trust and
 * list-trust. Each resolves to an exit status and never rejects: failures
 * are logged as a single warning and the store is left as it was.
 */

import { UserDeclinedError, describeError } from '../errors';
import { certificateFingerprint } from '../fetcher';
import { isConfirmed } from '../prompt';
import {
  TrustStore,
  TrustEntryKind,
  isPinned,
  isDisabled,
  loadTrustStore,
  saveTrustStore,
  trustStoreExists,
} from '../trust-store';
import { ExitStatus, InstallCertOptions, OperationContext, TlsTarget } from './types';
import { needsTrust, parseTarget } from './url';

export const CONFIRMATION_QUESTION =
  'Do you want to associate (pin) this certificate to this URL as trust (enter "y" to confirm):';

function cantModifyMessage(trustFile: string): string {
  return `Unable to read or modify trust at ${trustFile}`;
}

/**
 * Load the store, let `mutate` change it, and save if it reports a change.
 */
async function modifyTrust(
  ctx: OperationContext,
  mutate: (store: TrustStore) => boolean,
): Promise<ExitStatus> {
  try {
    const store = await loadTrustStore(ctx.trustFile, ctx.log);
    if (mutate(store)) {
      await saveTrustStore(ctx.trustFile, store, ctx.log);
    }
    return ExitStatus.SUCCESS;
  } catch (error) {
    ctx.log.warn({ err: error, path: ctx.trustFile }, cantModifyMessage(ctx.trustFile));
    return ExitStatus.FAILURE;
  }
}

function fingerprintOf(certificate: string): string {
  try {
    return certificateFingerprint(certificate);
  } catch {
    return 'unreadable';
  }
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

function ignoreInsecure(ctx: OperationContext, url: string): ExitStatus {
  ctx.log.info({ url }, `URL "${url}" doesn't require trust to access. Ignoring command`);
  return ExitStatus.SUCCESS;
}

/**
 * Pin the leaf certificate currently served behind an https URL.
 */
export async function installCert(
  ctx: OperationContext,
  url: string,
  options: InstallCertOptions = {},
): Promise<ExitStatus> {
  if (!needsTrust(url)) {
    return ignoreInsecure(ctx, url);
  }

  let target: TlsTarget;
  try {
    target = parseTarget(url);
  } catch (error) {
    ctx.log.warn({ err: error, url }, `Couldn't parse the provided URL ${url}`);
    return ExitStatus.FAILURE;
  }

  let certificate: string;
  try {
    certificate = await ctx.fetchCertificate(target.hostname, {
      port: options.port ?? target.port,
      timeoutMs: options.timeoutMs,
    });
  } catch (error) {
    ctx.log.warn({ err: error, url }, `Unable to obtain the certificate from ${url}`);
    return ExitStatus.FAILURE;
  }

  if (!options.autoAccept) {
    const fingerprint = fingerprintOf(certificate);
    ctx.log.info({ url, fingerprint }, `Certificate behind URL "${url}" has SHA-256 fingerprint ${fingerprint}`);
    ctx.output.write(`PEM encoding of certificate behind URL "${url}":\n${withTrailingNewline(certificate)}`);

    let answer: string;
    try {
      answer = await ctx.prompt.ask(CONFIRMATION_QUESTION);
    } catch (error) {
      ctx.log.warn({ err: error, url }, `Unable to read confirmation: ${describeError(error)}`);
      return ExitStatus.FAILURE;
    }

    if (!isConfirmed(answer)) {
      const declined = new UserDeclinedError(answer);
      ctx.log.info({ err: declined, url }, declined.message);
      return ExitStatus.FAILURE;
    }
  }

  return modifyTrust(ctx, (store) => {
    ctx.log.info({ url }, `Pinning certificate for URL ${url}`);
    store.pin(url, certificate);
    return true;
  });
}

/**
 * Remove a pinned certificate. Entries with disabled trust are left alone.
 */
export function uninstallCert(ctx: OperationContext, url: string): Promise<ExitStatus> {
  return modifyTrust(ctx, (store) => {
    if (!isPinned(store.get(url))) {
      ctx.log.info({ url }, `URL "${url}" doesn't have a pinned trust certificate. Ignoring command`);
      return false;
    }
    ctx.log.info({ url }, `Removing certificate pinning for URL ${url} trust`);
    store.remove(url);
    return true;
  });
}

/**
 * Allow access to an https URL without establishing trust. Replaces any
 * pinned certificate.
 */
export async function disableTrust(ctx: OperationContext, url: string): Promise<ExitStatus> {
  if (!needsTrust(url)) {
    return ignoreInsecure(ctx, url);
  }

  return modifyTrust(ctx, (store) => {
    if (isDisabled(store.get(url))) {
      ctx.log.info({ url }, `URL "${url}" already with disabled trust. Ignoring command`);
      return false;
    }
    ctx.log.info({ url }, `Allowing URL "${url}" access without establishing trust`);
    store.disable(url);
    return true;
  });
}

/**
 * Withdraw a disabled-trust marking. Pinned certificates are left alone.
 */
export function enableTrust(ctx: OperationContext, url: string): Promise<ExitStatus> {
  return modifyTrust(ctx, (store) => {
    if (!isDisabled(store.get(url))) {
      ctx.log.info({ url }, `URL "${url}" is not with disabled trust. Ignoring command`);
      return false;
    }
    ctx.log.info({ url }, `Removing permission to access URL ${url} without establishing trust`);
    store.remove(url);
    return true;
  });
}

/**
 * Empty an existing trust file.
 */
export async function clearTrust(ctx: OperationContext): Promise<ExitStatus> {
  if (!trustStoreExists(ctx.trustFile)) {
    ctx.log.info(
      { path: ctx.trustFile },
      `Trust not found at ${ctx.trustFile}. Ignoring command`,
    );
    return ExitStatus.SUCCESS;
  }

  ctx.log.info({ path: ctx.trustFile }, 'Clearing trust');
  try {
    await saveTrustStore(ctx.trustFile, new TrustStore(), ctx.log);
    return ExitStatus.SUCCESS;
  } catch (error) {
    ctx.log.warn({ err: error, path: ctx.trustFile }, cantModifyMessage(ctx.trustFile));
    return ExitStatus.FAILURE;
  }
}

/**
 * Write one tab-separated row per entry: URL, kind, and for pins the
 * SHA-256 fingerprint.
 */
export async function listTrust(ctx: OperationContext): Promise<ExitStatus> {
  let store: TrustStore;
  try {
    store = await loadTrustStore(ctx.trustFile, ctx.log);
  } catch (error) {
    ctx.log.warn({ err: error, path: ctx.trustFile }, cantModifyMessage(ctx.trustFile));
    return ExitStatus.FAILURE;
  }

  for (const [url, entry] of store.entries()) {
    if (entry.kind === TrustEntryKind.PINNED) {
      ctx.output.write(`${url}\t${TrustEntryKind.PINNED}\t${fingerprintOf(entry.certificate)}\n`);
    } else {
      ctx.output.write(`${url}\t${TrustEntryKind.DISABLED}\n`);
    }
  }
  return ExitStatus.SUCCESS;
}
