/**
 * Configuration parser
 * Order: default < env < cli
 */
import {
  logLevels,
  loggers,
  type Config,
  type LogLevel,
  type LoggerKind,
} from '../config/args';

import { ConfigError } from './errors';

export type ConfigTemplate = ConfigEntry[];

type ConfigValue = string | number | boolean;

export type ConfigEntry = [
  string, // arg
  string, // env value
  ConfigValue, // default value
  ('string' | 'number' | 'boolean' | null | undefined)?, // type
];

const isLogLevel = (value: ConfigValue | undefined): value is LogLevel =>
  logLevels.some(level => level === value);

const isLoggerKind = (value: ConfigValue | undefined): value is LoggerKind =>
  loggers.some(logger => logger === value);

export class ConfigParser {
  private config: ConfigTemplate;

  constructor(config: ConfigTemplate) {
    this.config = config;
  }

  parse(argv: string[] = process.argv): Config {
    const result = new Map<string, ConfigValue>();
    const cliArgs = this.parseCliArgs(argv);
    for (const [cliArg, envVar, defaultValue, type] of this.config) {
      const key = this.getKeyFromCliArg(cliArg);
      let value: ConfigValue = defaultValue;

      // Override with env value if exists
      const envValue = process.env[envVar];
      if (envValue !== undefined) {
        if (type === 'boolean') {
          value = envValue.toLowerCase() === 'true';
        } else if (type === 'number') {
          value = this.toNumber(envValue, `environment variable ${envVar}`);
        } else {
          value = envValue;
        }
      }

      // Override with CLI arg if exists
      const cliValue = cliArgs.get(cliArg);
      if (cliValue !== undefined) {
        if (type === 'boolean') {
          value = true;
        } else if (type === 'number') {
          value = this.toNumber(
            String(cliValue),
            `command line argument ${cliArg}`
          );
        } else {
          value = String(cliValue);
        }
        cliArgs.delete(cliArg);
      }

      result.set(key, value);
    }

    // Store additional arguments
    cliArgs.forEach((v, k) => {
      const key = this.getKeyFromCliArg(k);
      if (result.has(key)) {
        throw new ConfigError(`Error in command line: ${k} redefined`);
      }
      result.set(key, v);
    });

    return this.validate(result);
  }

  // Command-line parser
  private parseCliArgs(argv: string[]): Map<string, ConfigValue> {
    const args = new Map<string, ConfigValue>();

    for (let i = 2; i < argv.length; i++) {
      const arg = argv[i];

      if (arg.startsWith('-')) {
        const configEntry = this.config.find(entry => entry[0] === arg);

        if (configEntry && configEntry[3] === 'boolean') {
          args.set(arg, true);
        } else {
          const nextArg = argv[i + 1];
          if (nextArg === undefined) {
            throw new ConfigError(`Missing value for ${arg}`);
          }
          args.set(arg, nextArg);
          i++; // Skip the value we just consumed
        }
      }
    }

    return args;
  }

  private getKeyFromCliArg(cliArg: string): string {
    return cliArg.replace(/^-+/, '').replace(/-/g, '_');
  }

  private toNumber(raw: string, origin: string): number {
    const value = parseInt(raw, 10);
    if (Number.isNaN(value)) {
      throw new ConfigError(`Error parsing number from ${origin}: ${raw}`);
    }
    return value;
  }

  private validate(raw: Map<string, ConfigValue>): Config {
    const str = (key: string): string => {
      const value = raw.get(key);
      if (typeof value !== 'string') {
        throw new ConfigError(`${key} must be a string`);
      }
      return value;
    };
    const num = (key: string): number => {
      const value = raw.get(key);
      if (typeof value !== 'number') {
        throw new ConfigError(`${key} must be a number`);
      }
      return value;
    };
    const bool = (key: string): boolean => raw.get(key) === true;

    const logLevel = raw.get('log_level');
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(
        `log_level must be one of ${logLevels.join(', ')}, got ${String(logLevel)}`
      );
    }
    const logger = raw.get('logger');
    if (!isLoggerKind(logger)) {
      throw new ConfigError(
        `logger must be one of ${loggers.join(', ')}, got ${String(logger)}`
      );
    }

    return {
      ...Object.fromEntries(raw),
      log_level: logLevel,
      logger,
      log_file: str('log_file'),
      state_file: str('state_file'),
      autosave: bool('autosave'),
      wolfram_url: str('wolfram_url'),
      wolfram_app_id: str('wolfram_app_id'),
      wolfram_timeout: num('wolfram_timeout'),
      nth_prime_cache_max: num('nth_prime_cache_max'),
    };
  }
}

export function parseConfig(
  config: ConfigEntry[],
  argv: string[] = process.argv
): Config {
  const parser = new ConfigParser(config);
  return parser.parse(argv);
}
