/**
 * Shared test helpers
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from '../logging';
import type { ConfirmationPrompt } from '../prompt';
import type { CertificateFetcher, FetchOptions } from '../fetcher';
import type { OperationContext } from '../operations';

export const FIXTURE_CERT_PATH = path.join(__dirname, '..', 'fetcher', '__tests__', 'fixtures', 'localhost.cert.pem');
export const FIXTURE_KEY_PATH = path.join(__dirname, '..', 'fetcher', '__tests__', 'fixtures', 'localhost.key.pem');

export const FIXTURE_CERT = fs.readFileSync(FIXTURE_CERT_PATH, 'utf-8');

/** SHA-256 fingerprint of the fixture certificate */
export const FIXTURE_FINGERPRINT =
  '40:D7:2F:D7:E2:87:2C:36:30:11:5C:EC:1E:8E:BC:B7:4C:9E:46:10:7A:2D:42:C4:8C:CA:CC:7C:5E:3F:61:EF';

export type LogRecord = Record<string, unknown>;

/**
 * pino logger writing to memory
 */
export function createMemoryLogger() {
  const records: LogRecord[] = [];
  const log = createLogger({
    level: 'debug',
    destination: {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  });
  return { log, records, messages: () => records.map(r => r.msg) };
}

/**
 * Prompt that replays canned answers and records questions
 */
export class ScriptedPrompt implements ConfirmationPrompt {
  readonly questions: string[] = [];

  constructor(private answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? '';
  }
}

/**
 * Fetcher returning a fixed certificate and recording calls
 */
export function createFakeFetcher(certificate: string = FIXTURE_CERT) {
  const calls: Array<{ hostname: string; options?: FetchOptions }> = [];
  const fetchCertificate: CertificateFetcher = async (hostname, options) => {
    calls.push({ hostname, options });
    return certificate;
  };
  return { fetchCertificate, calls };
}

export class MemoryOutput {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

/**
 * Operation context over a trust file with fakes for everything else
 */
export function createTestContext(trustFile: string, answers: string[] = []) {
  const logger = createMemoryLogger();
  const fetcher = createFakeFetcher();
  const prompt = new ScriptedPrompt(answers);
  const output = new MemoryOutput();
  const ctx: OperationContext = {
    trustFile,
    log: logger.log,
    fetchCertificate: fetcher.fetchCertificate,
    prompt,
    output,
  };
  return { ctx, logger, fetcher, prompt, output };
}
