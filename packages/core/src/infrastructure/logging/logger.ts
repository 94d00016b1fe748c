/**
 * @fileoverview Logger - winston adapter for the ILogger port
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Builds the console logger the runtime writes to and narrows it to the
 * {@link ILogger} port taken by the container, registry and scheduler.
 *
 * Output layout:
 *
 * ```
 * 2024-05-01 12:00:00 warn [ComponentRegistry]: Registration ignored {"component":"SaveManager"}
 * ```
 *
 * @version 1.0.0
 */

import winston from 'winston';

import { type ILogger } from '../../domain/di';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Pick the level from `LOG_LEVEL`, falling back to `info`.
 */
export function resolveLogLevel(envValue: string | undefined = process.env['LOG_LEVEL']): LogLevel {
  const candidate = envValue?.trim().toLowerCase();
  return candidate !== undefined && isLogLevel(candidate) ? candidate : 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
  /**
   * Defaults to true. Disable for non-TTY sinks.
   */
  colorize?: boolean;
  /**
   * Replaces the default console transport.
   */
  transports?: winston.transport[];
}

/**
 * Render log metadata as JSON; bigint values become strings and errors
 * their messages.
 */
export function formatMeta(meta: Record<string, unknown>): string {
  if (Object.keys(meta).length === 0) {
    return '';
  }

  return JSON.stringify(meta, (_key, value: unknown) => {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (value instanceof Error) {
      return value.message;
    }
    return value;
  });
}

function buildConsoleFormat(colorize: boolean): winston.Logform.Format {
  const formats: winston.Logform.Format[] = [winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })];
  if (colorize) {
    formats.push(winston.format.colorize({ all: true }));
  }
  formats.push(
    winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
      const serviceStr = typeof service === 'string' ? ` [${service}]` : '';
      const metaStr = formatMeta(meta);
      return `${String(timestamp)} ${level}${serviceStr}: ${String(message)}${metaStr ? ` ${metaStr}` : ''}`;
    }),
  );
  return winston.format.combine(...formats);
}

/**
 * Create the root winston logger.
 *
 * @remarks
 * Console only; the runtime performs no disk I/O.
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const level = options.level ?? resolveLogLevel();
  const format = buildConsoleFormat(options.colorize ?? true);

  const logger = winston.createLogger({
    level,
    format,
    transports: options.transports ?? [
      new winston.transports.Console({ handleExceptions: false, handleRejections: false }),
    ],
    exitOnError: false,
    silent: options.silent ?? false,
  });

  // A failing transport must not take the process down.
  logger.on('error', (error: unknown) => {
    process.stderr.write(`Logger error: ${String(error)}\n`);
  });

  return logger;
}

/**
 * Narrow a winston logger to the ILogger port, tagging every entry with
 * `context`.
 *
 * @example
 * ```typescript
 * const log = createContextLogger(createLogger(), 'ServiceContainer');
 * log.warn('Discovery failed', { service: 'IStorage' });
 * ```
 */
export function createContextLogger(base: winston.Logger, context: string): ILogger {
  const child = base.child({ service: context });
  return {
    error: (message, meta) => {
      child.error(message, { ...meta });
    },
    warn: (message, meta) => {
      child.warn(message, { ...meta });
    },
    info: (message, meta) => {
      child.info(message, { ...meta });
    },
    debug: (message, meta) => {
      child.debug(message, { ...meta });
    },
  };
}

let rootLogger: winston.Logger | undefined;

/**
 * Shared root logger for components built without an explicit one.
 */
export function getDefaultLogger(context: string): ILogger {
  rootLogger ??= createLogger();
  return createContextLogger(rootLogger, context);
}
