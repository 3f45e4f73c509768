/**
 * PEM encoding for X.509 certificates
 */

import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex } from '@noble/hashes/utils.js';

export const PEM_HEADER = '-----BEGIN CERTIFICATE-----';
export const PEM_FOOTER = '-----END CERTIFICATE-----';

/** Base64 characters per PEM body line */
const LINE_WIDTH = 64;

/**
 * Convert a DER certificate to PEM text (trailing newline included)
 */
export function derToPem(der: Uint8Array): string {
  const body = Buffer.from(der).toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < body.length; i += LINE_WIDTH) {
    lines.push(body.slice(i, i + LINE_WIDTH));
  }
  return `${PEM_HEADER}\n${lines.join('\n')}\n${PEM_FOOTER}\n`;
}

/**
 * Extract the DER bytes of the first certificate in PEM text
 */
export function pemToDer(pem: string): Uint8Array {
  const start = pem.indexOf(PEM_HEADER);
  const end = pem.indexOf(PEM_FOOTER, start + PEM_HEADER.length);
  if (start < 0 || end < 0) {
    throw new Error('Not a PEM certificate');
  }
  const body = pem.slice(start + PEM_HEADER.length, end).replace(/\s+/g, '');
  return new Uint8Array(Buffer.from(body, 'base64'));
}

/**
 * SHA-256 fingerprint of a PEM certificate, as `AB:CD:...`
 */
export function certificateFingerprint(pem: string): string {
  const hex = bytesToHex(sha256(pemToDer(pem))).toUpperCase();
  return hex.match(/.{2}/g)?.join(':') ?? hex;
}
