import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Optional YAML configuration file
 */
export const ConfigFileSchema = z
  .object({
    trustFile: z.string().min(1).optional(),
    fetchTimeoutSeconds: z.number().positive().optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

export const DepotTrustConfigSchema = z.object({
  trustFile: z.string().min(1),
  fetchTimeoutMs: z.number().int().positive(),
  logLevel: LogLevelSchema.default('info'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type DepotTrustConfig = z.infer<typeof DepotTrustConfigSchema>;

/** Environment variable names */
export const ENV = {
  CONFIG: 'DEPOT_TRUST_CONFIG',
  TRUST_FILE: 'DEPOT_TRUST_FILE',
  TIMEOUT: 'DEPOT_TRUST_TIMEOUT',
  CFG_DIR: 'DEPOT_TRUST_CFG_DIR',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;
