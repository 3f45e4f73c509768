/**
 * depot-trust
 *
 * Maintains a local store of TLS leaf certificates pinned per URL, so a
 * management service can reach those hosts trusting only the pinned
 * certificate, or nothing at all where trust has been disabled.
 *
 * @license Apache-2.0
 */

export * from './errors';
export * from './trust-store';
export * from './fetcher';
export * from './prompt';
export * from './logging';
export * from './config';
export * from './operations';
export * from './cli';
