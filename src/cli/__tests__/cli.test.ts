/**
 * Tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { runCli, USAGE_ERROR_STATUS, type CliDependencies } from '../cli';
import {
  FIXTURE_CERT,
  FIXTURE_FINGERPRINT,
  MemoryOutput,
  ScriptedPrompt,
  createFakeFetcher,
  createMemoryLogger,
} from '../../__tests__/helpers';

const URL_A = 'https://a.example';

describe('runCli', () => {
  let tempDir: string;
  let trustFile: string;
  let output: MemoryOutput;
  let errorOutput: MemoryOutput;
  let fetcher: ReturnType<typeof createFakeFetcher>;

  function deps(answers: string[] = [], env: Record<string, string> = {}): CliDependencies {
    return {
      env: { DEPOT_TRUST_FILE: trustFile, ...env },
      log: createMemoryLogger().log,
      fetchCertificate: fetcher.fetchCertificate,
      prompt: new ScriptedPrompt(answers),
      output,
      errorOutput,
    };
  }

  function readTrust(file = trustFile): unknown {
    return JSON.parse(readFileSync(file, 'utf-8'));
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'depot-trust-cli-'));
    trustFile = join(tempDir, 'depot-trust.json');
    output = new MemoryOutput();
    errorOutput = new MemoryOutput();
    fetcher = createFakeFetcher();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('install-cert', () => {
    it('pins without confirmation when -y is given', async () => {
      const status = await runCli(['install-cert', URL_A, '-y'], deps());

      expect(status).toBe(0);
      expect(readTrust()).toEqual({ [URL_A]: FIXTURE_CERT });
    });

    it('asks for confirmation otherwise', async () => {
      const status = await runCli(['install-cert', URL_A], deps(['n']));

      expect(status).toBe(1);
      expect(existsSync(trustFile)).toBe(false);
    });

    it('uses the configured timeout by default', async () => {
      await runCli(['install-cert', URL_A, '-y'], deps([], { DEPOT_TRUST_TIMEOUT: '3' }));

      expect(fetcher.calls).toEqual([
        { hostname: 'a.example', options: { port: 443, timeoutMs: 3000 } },
      ]);
    });

    it('accepts --port and --timeout', async () => {
      await runCli(['install-cert', URL_A, '-y', '--port', '9443', '--timeout', '1.5'], deps());

      expect(fetcher.calls).toEqual([
        { hostname: 'a.example', options: { port: 9443, timeoutMs: 1500 } },
      ]);
    });

    it('rejects an invalid port', async () => {
      const status = await runCli(['install-cert', URL_A, '--port', 'abc'], deps());

      expect(status).toBe(USAGE_ERROR_STATUS);
      expect(errorOutput.text).toContain('Not a TCP port.');
      expect(fetcher.calls).toEqual([]);
    });

    it('rejects a timeout shorter than a millisecond', async () => {
      const status = await runCli(['install-cert', URL_A, '-y', '--timeout', '0.0001'], deps());

      expect(status).toBe(USAGE_ERROR_STATUS);
      expect(errorOutput.text).toContain('Not a positive number of seconds.');
      expect(fetcher.calls).toEqual([]);
    });

    it('fails on a URL with port 0', async () => {
      const status = await runCli(['install-cert', 'https://a.example:0', '-y'], deps());

      expect(status).toBe(1);
      expect(fetcher.calls).toEqual([]);
      expect(existsSync(trustFile)).toBe(false);
    });

    it('shows the certificate before asking', async () => {
      await runCli(['install-cert', URL_A], deps(['n']));

      expect(output.text).toContain(FIXTURE_CERT);
    });

    it('writes to the file named by --trust-file', async () => {
      const other = join(tempDir, 'other.json');

      await runCli(['install-cert', URL_A, '-y', '--trust-file', other], deps());

      expect(readTrust(other)).toEqual({ [URL_A]: FIXTURE_CERT });
      expect(existsSync(trustFile)).toBe(false);
    });

    it('ignores plain http URLs', async () => {
      const status = await runCli(['install-cert', 'http://a.example', '-y'], deps());

      expect(status).toBe(0);
      expect(existsSync(trustFile)).toBe(false);
    });
  });

  describe('trust state commands', () => {
    it('uninstall-cert removes a pin', async () => {
      writeFileSync(trustFile, JSON.stringify({ [URL_A]: FIXTURE_CERT }));

      expect(await runCli(['uninstall-cert', URL_A], deps())).toBe(0);
      expect(readTrust()).toEqual({});
    });

    it('disable-trust then enable-trust round-trips', async () => {
      expect(await runCli(['disable-trust', URL_A], deps())).toBe(0);
      expect(readTrust()).toEqual({ [URL_A]: 'AnyCertificate' });

      expect(await runCli(['enable-trust', URL_A], deps())).toBe(0);
      expect(readTrust()).toEqual({});
    });

    it('clear-trust empties the store', async () => {
      writeFileSync(trustFile, JSON.stringify({ [URL_A]: FIXTURE_CERT, 'https://b.example': 'AnyCertificate' }));

      expect(await runCli(['clear-trust'], deps())).toBe(0);
      expect(readFileSync(trustFile, 'utf-8')).toBe('{}');
    });

    it('list-trust prints the entries', async () => {
      writeFileSync(trustFile, JSON.stringify({ [URL_A]: FIXTURE_CERT, 'https://b.example': 'AnyCertificate' }));

      expect(await runCli(['list-trust'], deps())).toBe(0);
      expect(output.text).toBe(`${URL_A}\tpinned\t${FIXTURE_FINGERPRINT}\nhttps://b.example\tdisabled\n`);
    });

    it('returns 1 when the store is corrupt', async () => {
      writeFileSync(trustFile, '{');

      expect(await runCli(['uninstall-cert', URL_A], deps())).toBe(1);
      expect(readFileSync(trustFile, 'utf-8')).toBe('{');
    });
  });

  describe('usage', () => {
    it('prints help and succeeds', async () => {
      const status = await runCli(['--help'], deps());

      expect(status).toBe(0);
      expect(output.text).toContain('install-cert');
      expect(output.text).toContain('list-trust');
    });

    it('rejects an unknown command', async () => {
      const status = await runCli(['frobnicate'], deps());

      expect(status).toBe(USAGE_ERROR_STATUS);
      expect(errorOutput.text).toContain("unknown command 'frobnicate'");
    });

    it('requires a URL', async () => {
      const status = await runCli(['install-cert'], deps());

      expect(status).toBe(USAGE_ERROR_STATUS);
      expect(errorOutput.text).toContain("missing required argument 'url'");
    });

    it('fails on invalid configuration', async () => {
      const status = await runCli(['list-trust'], deps([], { LOG_LEVEL: 'chatty' }));

      expect(status).toBe(1);
      expect(errorOutput.text).toMatch(/^Invalid configuration:/);
    });
  });
});
