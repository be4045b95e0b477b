import { readFileSync } from 'node:fs';
import { type Logger, destination, pino } from 'pino';
import { NdError, ValidationError } from '../errors/index.js';
import { loggingConfigSchema } from '../schemas/config.js';
import type { LoggingConfig } from '../types/config.js';

/**
 * Environment variable naming the JSON logging configuration file
 */
export const LOGGING_CONFIG_ENV = 'ND_LOGGING_CONFIG';

const REDACT_PATHS = [
  'password',
  'token',
  'cookie',
  'passphrase',
  'headers.authorization',
  'headers.cookie',
  '*.password',
  '*.token',
  '*.userPasswd',
  '*.switchPassword',
];

/**
 * Read the logging configuration named by ND_LOGGING_CONFIG.
 * Returns undefined when the variable is not set.
 * @throws {NdError} if the file cannot be read or is not JSON
 * @throws {ValidationError} if the file doesn't match the schema
 */
export function loadLoggingConfig(
  env: NodeJS.ProcessEnv = process.env,
): LoggingConfig | undefined {
  const path = env[LOGGING_CONFIG_ENV];
  if (!path) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new NdError(`Unable to read logging configuration ${path}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = loggingConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Invalid logging configuration ${path}`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Create the library logger.
 *
 * Logging stays silent unless ND_LOGGING_CONFIG names a configuration file
 * (or a config is passed in). Credentials, tokens and cookies are redacted.
 */
export function createLogger(
  options: { env?: NodeJS.ProcessEnv; config?: LoggingConfig } = {},
): Logger {
  const config = options.config ?? loadLoggingConfig(options.env);
  if (!config) {
    return pino({ name: 'nd-rest', level: 'silent' });
  }

  const loggerOptions = {
    name: config.name,
    level: config.level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (config.destination) {
    return pino(
      loggerOptions,
      destination({ dest: config.destination, sync: true, mkdir: true }),
    );
  }
  return pino(loggerOptions);
}
