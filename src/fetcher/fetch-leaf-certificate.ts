/**
 * Leaf certificate harvesting (trust-on-first-use)
 *
 * WARNING: the handshake below verifies NOTHING. Hostname checks and chain
 * validation are switched off so that whatever certificate the server
 * presents can be shown to an operator and pinned. The socket never carries
 * application data and is destroyed as soon as the certificate is read.
 * Do not reuse this code path for any communication that must be trusted.
 */

import * as net from 'net';
import * as tls from 'tls';
import { NetworkError, TlsHandshakeError, describeError } from '../errors';
import { derToPem } from './pem';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_TLS_PORT,
  FetchOptions,
} from './types';

/**
 * Connect to `hostname:port`, complete an unverified TLS handshake and
 * return the peer's leaf certificate as PEM.
 *
 * Fails with {@link NetworkError} when the TCP connection can't be made or
 * the timeout expires, and with {@link TlsHandshakeError} when the handshake
 * fails or yields no certificate. No retries.
 */
export function fetchLeafCertificate(hostname: string, options: FetchOptions = {}): Promise<string> {
  const port = options.port ?? DEFAULT_TLS_PORT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  return new Promise<string>((resolve, reject) => {
    let tcpConnected = false;
    let settled = false;

    const socket = tls.connect({
      host: hostname,
      port,
      // SNI is not allowed for IP literals
      servername: net.isIP(hostname) === 0 ? hostname : undefined,
      rejectUnauthorized: false,
      checkServerIdentity: () => undefined,
    });

    const settle = (error: Error | null, pem?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      if (error !== null) {
        reject(error);
      } else if (pem !== undefined) {
        resolve(pem);
      }
    };

    const fail = (message: string, cause?: unknown): void => {
      settle(
        tcpConnected
          ? new TlsHandshakeError(hostname, port, message, cause)
          : new NetworkError(hostname, port, message, cause),
      );
    };

    const timer = setTimeout(() => {
      settle(new NetworkError(hostname, port, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('connect', () => {
      tcpConnected = true;
    });

    socket.once('secureConnect', () => {
      const raw: Buffer | undefined = socket.getPeerCertificate().raw;
      if (raw === undefined || raw.length === 0) {
        fail('server presented no certificate');
        return;
      }
      settle(null, derToPem(raw));
    });

    socket.once('error', (error) => {
      fail(describeError(error), error);
    });

    socket.once('close', () => {
      fail('connection closed before the handshake completed');
    });
  });
}
