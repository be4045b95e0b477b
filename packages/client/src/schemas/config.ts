import { z } from 'zod';

/**
 * Send configuration schema - per-attempt timeout, wait between attempts and retry bound
 */
export const sendConfigSchema = z.object({
  // ky rejects timeouts beyond the largest setTimeout delay
  timeout: z.number().int().positive().max(2_147_483_647).default(30_000),
  sendInterval: z.number().int().nonnegative().default(5_000),
  maxAttempts: z.number().int().min(1).default(3),
  retryStatusCodes: z.array(z.number().int().min(100).max(599)).optional(),
});

/**
 * Log levels accepted by the logging configuration file
 */
export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

/**
 * Logging configuration file schema (the JSON file named by ND_LOGGING_CONFIG)
 */
export const loggingConfigSchema = z
  .object({
    name: z.string().min(1).default('nd-rest'),
    level: logLevelSchema.default('info'),
    destination: z.string().min(1).optional(),
  })
  .strict();
