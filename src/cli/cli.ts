/**
 * CLI Commands
 *
 * Provides command-line interface for:
 * - depot-trust install-cert <url> [-y] - Pin the certificate served behind a URL
 * - depot-trust uninstall-cert <url> - Unpin a URL's certificate
 * - depot-trust disable-trust <url> - Allow access to a URL without trust
 * - depot-trust enable-trust <url> - Withdraw that permission
 * - depot-trust clear-trust - Empty the trust store
 * - depot-trust list-trust - Print the trust store
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig, type DepotTrustConfig, type Environment } from '../config';
import { ConfigError, describeError } from '../errors';
import { fetchLeafCertificate, type CertificateFetcher } from '../fetcher';
import { createLogger, type OperationLogger } from '../logging';
import {
  ExitStatus,
  installCert,
  uninstallCert,
  disableTrust,
  enableTrust,
  clearTrust,
  listTrust,
  type OperationContext,
  type OutputWriter,
} from '../operations';
import { ReadlinePrompt, type ConfirmationPrompt } from '../prompt';

/** Exit status for malformed command lines */
export const USAGE_ERROR_STATUS = 2;

/**
 * Collaborators the CLI would otherwise create itself.
 */
export interface CliDependencies {
  /** Environment used for configuration (default: process.env) */
  env?: Environment;
  log?: OperationLogger;
  fetchCertificate?: CertificateFetcher;
  prompt?: ConfirmationPrompt;
  /** Command output and help text (default: stdout) */
  output?: OutputWriter;
  /** Usage errors (default: stderr) */
  errorOutput?: OutputWriter;
}

interface TrustFileOptions {
  trustFile: string;
}

interface InstallCertCommandOptions extends TrustFileOptions {
  y?: boolean;
  port?: number;
  timeout?: number;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Not a TCP port.');
  }
  return port;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || Math.round(seconds * 1000) < 1) {
    throw new InvalidArgumentError('Not a positive number of seconds.');
  }
  return seconds;
}

/**
 * Build the commander program. `onStatus` receives the status of the
 * operation that ran.
 */
export function createProgram(
  config: DepotTrustConfig,
  context: (trustFile: string) => OperationContext,
  onStatus: (status: ExitStatus) => void,
  deps: Pick<CliDependencies, 'output' | 'errorOutput'> = {},
): Command {
  const output = deps.output ?? process.stdout;
  const errorOutput = deps.errorOutput ?? process.stderr;

  const program = new Command();
  program
    .name('depot-trust')
    .description('Maintains the TLS certificate trust store used to reach depot URLs')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output.write(str),
      writeErr: (str) => errorOutput.write(str),
    });

  const withTrustFile = (command: Command): Command =>
    command.option(
      '--trust-file <file>',
      'path to the file containing the trust store',
      config.trustFile,
    );

  withTrustFile(
    program
      .command('install-cert')
      .description("pins an URL's leaf certificate in the trust store")
      .argument('<url>', 'URL to have its certificate pinned')
      .option('-y', 'accept any certificate behind the URL without confirmation')
      .option('--port <port>', "connect to this port instead of the URL's", parsePort)
      .option('--timeout <seconds>', 'handshake timeout in seconds', parseSeconds),
  ).action(async (url: string, opts: InstallCertCommandOptions) => {
    onStatus(
      await installCert(context(opts.trustFile), url, {
        autoAccept: opts.y === true,
        port: opts.port,
        timeoutMs: opts.timeout !== undefined
          ? Math.round(opts.timeout * 1000)
          : config.fetchTimeoutMs,
      }),
    );
  });

  withTrustFile(
    program
      .command('uninstall-cert')
      .description('unpins any known certificate for an URL from the trust store')
      .argument('<url>', 'URL to have its certificate unpinned'),
  ).action(async (url: string, opts: TrustFileOptions) => {
    onStatus(await uninstallCert(context(opts.trustFile), url));
  });

  withTrustFile(
    program
      .command('disable-trust')
      .description('allows access to an URL without establishing trust')
      .argument('<url>', 'URL to be accessible without establishing trust'),
  ).action(async (url: string, opts: TrustFileOptions) => {
    onStatus(await disableTrust(context(opts.trustFile), url));
  });

  withTrustFile(
    program
      .command('enable-trust')
      .description('removes permission to access an URL without establishing trust')
      .argument('<url>', 'URL to no longer be accessible without establishing trust'),
  ).action(async (url: string, opts: TrustFileOptions) => {
    onStatus(await enableTrust(context(opts.trustFile), url));
  });

  withTrustFile(
    program
      .command('clear-trust')
      .description('clears the configured trust store'),
  ).action(async (opts: TrustFileOptions) => {
    onStatus(await clearTrust(context(opts.trustFile)));
  });

  withTrustFile(
    program
      .command('list-trust')
      .description('prints every URL in the trust store with its trust decision'),
  ).action(async (opts: TrustFileOptions) => {
    onStatus(await listTrust(context(opts.trustFile)));
  });

  return program;
}

/**
 * Run the CLI with the given arguments.
 *
 * @param args - Command line arguments (without the program name)
 * @returns process exit status
 *
 * @example
 * ```typescript
 * const status = await runCli(['install-cert', 'https://depot.example', '-y']);
 * ```
 */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  const errorOutput = deps.errorOutput ?? process.stderr;

  let config: DepotTrustConfig;
  try {
    config = loadConfig({ env: deps.env });
  } catch (error) {
    if (error instanceof ConfigError) {
      errorOutput.write(`${error.message}\n`);
      return ExitStatus.FAILURE;
    }
    throw error;
  }

  const log = deps.log ?? createLogger({ level: config.logLevel });
  const fetchCertificate = deps.fetchCertificate ?? fetchLeafCertificate;
  const prompt = deps.prompt ?? new ReadlinePrompt();
  const output = deps.output ?? process.stdout;

  const context = (trustFile: string): OperationContext => ({
    trustFile,
    log,
    fetchCertificate,
    prompt,
    output,
  });

  let status: number = ExitStatus.SUCCESS;
  const program = createProgram(config, context, (result) => {
    status = result;
  }, { output, errorOutput });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and friends exit with 0
      return error.exitCode === 0 ? ExitStatus.SUCCESS : USAGE_ERROR_STATUS;
    }
    errorOutput.write(`${describeError(error)}\n`);
    return ExitStatus.FAILURE;
  }
  return status;
}
