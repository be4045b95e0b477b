import type { z } from 'zod';
import type {
  logLevelSchema,
  loggingConfigSchema,
  sendConfigSchema,
} from '../schemas/config.js';

/**
 * SendConfig - per-attempt timeout (ms), wait between attempts (ms), retry bound
 * and the statuses treated as transient. Defaults are filled in.
 */
export type SendConfig = z.infer<typeof sendConfigSchema>;

/**
 * SendConfigInput - what callers pass; every field is optional
 */
export type SendConfigInput = z.input<typeof sendConfigSchema>;

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * LoggingConfig - contents of the file named by ND_LOGGING_CONFIG
 */
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
