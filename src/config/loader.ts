/**
 * Configuration loader
 *
 * Precedence, lowest first: built-in defaults, YAML config file, environment.
 * Command-line flags are applied on top by the CLI.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigError, describeError } from '../errors';
import { DEFAULT_FETCH_TIMEOUT_MS } from '../fetcher';
import {
  ConfigFile,
  ConfigFileSchema,
  DepotTrustConfig,
  DepotTrustConfigSchema,
  ENV,
} from './types';

export type Environment = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Environment to read (default: process.env) */
  env?: Environment;
  /** Explicit YAML config path; overrides DEPOT_TRUST_CONFIG */
  configPath?: string;
  /** Platform to compute defaults for (default: process.platform) */
  platform?: NodeJS.Platform;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Default trust file location for a platform
 */
export function getDefaultTrustFile(
  platform: NodeJS.Platform = process.platform,
  env: Environment = process.env,
): string {
  if (platform === 'win32') {
    const base = env[ENV.CFG_DIR] || env.PROGRAMDATA || 'C:\\ProgramData';
    return path.win32.join(base, 'depot-trust', 'depot-trust.json');
  }
  return '/etc/depot-trust/depot-trust.json';
}

/**
 * Read and validate a YAML config file
 */
export function loadConfigFile(configPath: string): ConfigFile {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Unable to read config file ${configPath}: ${describeError(error)}`, [], error);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in config file ${configPath}: ${describeError(error)}`, [], error);
  }

  // An empty document configures nothing
  if (raw === undefined || raw === null) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid config file ${configPath}:\n  ${issues.join('\n  ')}`, issues);
  }
  return result.data;
}

function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`${ENV.TIMEOUT} must be a positive number of seconds, got "${value}"`);
  }
  return seconds;
}

export function loadConfig(options: LoadConfigOptions = {}): DepotTrustConfig {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  const configPath = options.configPath ?? env[ENV.CONFIG];
  const file: ConfigFile = configPath ? loadConfigFile(configPath) : {};

  const rawTimeout = env[ENV.TIMEOUT];
  const timeoutSeconds = rawTimeout !== undefined
    ? parseTimeoutSeconds(rawTimeout)
    : file.fetchTimeoutSeconds;

  const candidate = {
    trustFile: env[ENV.TRUST_FILE] || file.trustFile || getDefaultTrustFile(platform, env),
    fetchTimeoutMs: timeoutSeconds !== undefined
      ? Math.round(timeoutSeconds * 1000)
      : DEFAULT_FETCH_TIMEOUT_MS,
    logLevel: env[ENV.LOG_LEVEL] || file.logLevel,
  };

  const result = DepotTrustConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return result.data;
}
