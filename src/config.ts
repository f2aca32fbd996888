import dotenv from 'dotenv';
import { InvalidConfigurationError } from './errors/log-window.error.js';

dotenv.config();

export interface AWSConfig {
  region: string;
}

export interface LogsConfig {
  logGroupName: string;
  relativeWindow: string;
  specificMonth: string;
  specificDay: string;
  filterPattern: string | undefined;
}

export interface AppConfig {
  aws: AWSConfig;
  logs: LogsConfig;
  logging: {
    level: LogLevelName;
  };
}

export const DEFAULT_RELATIVE_WINDOW = '5m';
export const CURRENT = 'current';
export const DEFAULT_REGION = 'us-east-1';
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Values supplied on the command line. Anything left undefined keeps the
 * value already in the config.
 */
export interface ConfigOverrides {
  logGroupName?: string;
  relativeWindow?: string;
  specificMonth?: string;
  specificDay?: string;
  filterPattern?: string;
  region?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isLogLevel(value: string): value is LogLevelName {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevel(value: string | undefined): LogLevelName {
  const level = nonEmpty(value)?.toLowerCase() ?? 'info';
  if (!isLogLevel(level)) {
    throw new InvalidConfigurationError({
      message: `Invalid LOG_LEVEL: ${value}. Expected one of ${LOG_LEVELS.join(', ')}.`,
      metadata: { level: value },
    });
  }
  return level;
}

/**
 * Builds the run configuration from environment variables.
 * The log group is not checked here so that `--group` can still supply it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    aws: {
      region: nonEmpty(env.AWS_REGION) ?? nonEmpty(env.AWS_DEFAULT_REGION) ?? DEFAULT_REGION,
    },
    logs: {
      logGroupName: nonEmpty(env.LOG_GROUP_NAME) ?? '',
      relativeWindow: nonEmpty(env.RELATIVE_WINDOW) ?? DEFAULT_RELATIVE_WINDOW,
      specificMonth: nonEmpty(env.SPECIFIC_MONTH) ?? CURRENT,
      specificDay: nonEmpty(env.SPECIFIC_DAY) ?? CURRENT,
      filterPattern: nonEmpty(env.FILTER_PATTERN),
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
    },
  };
}

export function applyCliOverrides(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...base,
    aws: {
      region: nonEmpty(overrides.region) ?? base.aws.region,
    },
    logs: {
      logGroupName: nonEmpty(overrides.logGroupName) ?? base.logs.logGroupName,
      relativeWindow: nonEmpty(overrides.relativeWindow) ?? base.logs.relativeWindow,
      specificMonth: nonEmpty(overrides.specificMonth) ?? base.logs.specificMonth,
      specificDay: nonEmpty(overrides.specificDay) ?? base.logs.specificDay,
      filterPattern: nonEmpty(overrides.filterPattern) ?? base.logs.filterPattern,
    },
  };
}

export function assertRunnable(config: AppConfig): void {
  if (!config.logs.logGroupName) {
    throw new InvalidConfigurationError({
      message: 'No log group given. Set LOG_GROUP_NAME or pass --group <name>.',
    });
  }
}
