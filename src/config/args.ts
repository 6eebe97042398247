/**
 * command-line options, corresponding environment variables, default values and types
 * Contains also the typescript declaration of config
 */
import type { ConfigTemplate } from '../lib/parseConfig';

export const logLevels = ['error', 'warn', 'notice', 'info', 'debug'] as const;
export type LogLevel = (typeof logLevels)[number];

export const loggers = ['console', 'file'] as const;
export type LoggerKind = (typeof loggers)[number];

/**
 * Typescript declaration of config
 *
 * See below for config arguments, corresponding environment variables,
 * default value and type
 */
export interface Config {
  log_level: LogLevel;
  logger: LoggerKind;
  log_file: string;

  // Persisted state ('' disables persistence)
  state_file: string;
  autosave: boolean;

  // Nth prime lookup
  wolfram_url: string;
  wolfram_app_id: string;
  wolfram_timeout: number;
  nth_prime_cache_max: number;

  // Additional command-line keys
  [key: string]: string | number | boolean | undefined;
}

/**
 * Config arguments
 *
 * Format:
 * [ command-line-option, env-variable, default-value, type? ]
 *
 * type can be one of:
 * - string (default value)
 * - boolean:
 *    * --option is enough
 *    * env variable must be set to "true" to be considered as truthy
 * - number
 *
 * Additional command-line:
 * all command-line pairs `--key-name value` are stored into config
 * (string only) as `config.key_name = value`
 */
const configArgs: ConfigTemplate = [
  // Logging
  ['--log-level', 'PS_LOG_LEVEL', 'notice'],
  ['--logger', 'PS_LOGGER', 'console'],
  ['--log-file', 'PS_LOG_FILE', 'prime-store.log'],

  // Persistence
  ['--state-file', 'PS_STATE_FILE', ''],
  ['--autosave', 'PS_AUTOSAVE', false, 'boolean'],

  // Nth prime lookup
  ['--wolfram-url', 'PS_WOLFRAM_URL', 'https://api.wolframalpha.com/v2/query'],
  ['--wolfram-app-id', 'PS_WOLFRAM_APP_ID', ''],
  ['--wolfram-timeout', 'PS_WOLFRAM_TIMEOUT', 10000, 'number'], // ms
  ['--nth-prime-cache-max', 'PS_NTH_PRIME_CACHE_MAX', 1000, 'number'],
];

export default configArgs;
