/**
 * Logger Wrapper
 *
 * Wraps pino behind the `Logger` interface. Output goes to stderr so that
 * stdout carries only the rendered event table.
 */

import pino from 'pino';
import { getCorrelationId } from './runtime.util.js';
import type { Logger } from '../types/logger.types.js';

function getRequestContext(): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  const correlationId = getCorrelationId();
  if (correlationId) {
    context.correlationId = correlationId;
  }

  return context;
}

class PinoLogger implements Logger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger) {
    this.logger = logger;
  }

  private enrichLogData(args: unknown[]): Record<string, unknown> {
    const data: Record<string, unknown> = { ...getRequestContext() };
    if (args.length === 1 && isPlainRecord(args[0])) {
      return { ...data, ...args[0] };
    }
    if (args.length > 0) {
      data.args = args;
    }
    return data;
  }

  debug(message: string, ...args: unknown[]): void {
    this.logger.debug(this.enrichLogData(args), message);
  }

  info(message: string, ...args: unknown[]): void {
    this.logger.info(this.enrichLogData(args), message);
  }

  warn(message: string, ...args: unknown[]): void {
    this.logger.warn(this.enrichLogData(args), message);
  }

  error(message: string, error?: Error | unknown, ...args: unknown[]): void {
    const data = this.enrichLogData(args);
    if (error instanceof Error) {
      this.logger.error({ ...data, err: error }, message);
    } else if (error !== undefined) {
      this.logger.error({ ...data, error }, message);
    } else {
      this.logger.error(data, message);
    }
  }

  fatal(message: string, error?: Error | unknown, ...args: unknown[]): void {
    const data = this.enrichLogData(args);
    if (error instanceof Error) {
      this.logger.fatal({ ...data, err: error }, message);
    } else if (error !== undefined) {
      this.logger.fatal({ ...data, error }, message);
    } else {
      this.logger.fatal(data, message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

export function createLogger(options?: {
  level?: string;
  context?: Record<string, unknown>;
}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options?.level ?? 'info',
    base: {
      ...getRequestContext(),
      ...(options?.context ?? {}),
    },
  };

  return new PinoLogger(pino(pinoOptions, pino.destination(2)));
}

export const logger = createLogger();
