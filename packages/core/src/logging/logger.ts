/**
 * Detonate logging.
 *
 * pino underneath; every call goes through {@link SecureLogger} so context is
 * scrubbed by `sanitizeForLogging` before it reaches a destination. JSON on
 * stdout needs no worker thread, pretty and file outputs run as pino transports.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LoggingConfig } from '@detonate/shared';
import { sanitizeForLogging } from '../utils/crypto.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
  sessionId?: string;
  component?: string;
  [key: string]: unknown;
}

type LogMethod = (msg: string, context?: LogContext) => void;

export type SecureLogger = Record<LogLevel, LogMethod> & {
  child(context: LogContext): SecureLogger;
  readonly level: LogLevel;
};

type Output = LoggingConfig['output'][number];

const REDACTED_KEYS = ['password', 'secret', 'token', 'apiKey', 'authorization'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function pinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    name: 'detonate',
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err },
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACTED_KEYS.flatMap((key) => [key, `*.${key}`]),
      censor: '[REDACTED]',
    },
  };
}

function transportTarget(output: Output, level: LogLevel): pino.TransportTargetOptions | null {
  switch (output.type) {
    case 'file':
      return { target: 'pino/file', level, options: { destination: output.path, mkdir: true } };
    case 'stdout':
      // Pretty output goes to stderr so stdout stays free for reports.
      if (output.format !== 'pretty') return null;
      return {
        target: 'pino-pretty',
        level,
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname', destination: 2 },
      };
  }
}

function buildPino(config: LoggingConfig): PinoLogger {
  const options = pinoOptions(config);
  const targets = config.output
    .map((output) => transportTarget(output, config.level))
    .filter((target): target is pino.TransportTargetOptions => target !== null);

  if (targets.length === 0) return pino(options);
  return pino(options, pino.transport({ targets }));
}

function wrap(base: PinoLogger, bound: LogContext): SecureLogger {
  const emit =
    (level: LogLevel): LogMethod =>
    (msg, context) => {
      const scrubbed = sanitizeForLogging({ ...bound, ...context });
      base[level](typeof scrubbed === 'object' && scrubbed !== null ? scrubbed : {}, msg);
    };

  return {
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
    child: (context) => wrap(base, { ...bound, ...context }),
    get level(): LogLevel {
      return isLogLevel(base.level) ? base.level : 'info';
    },
  };
}

export function createLogger(config: LoggingConfig): SecureLogger {
  return wrap(buildPino(config), {});
}

let globalLogger: SecureLogger | null = null;

export function initializeLogger(config: LoggingConfig): SecureLogger {
  globalLogger = createLogger(config);
  return globalLogger;
}

/** Throws until {@link initializeLogger} has run. */
export function getLogger(): SecureLogger {
  if (!globalLogger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return globalLogger;
}

export function isLoggerInitialized(): boolean {
  return globalLogger !== null;
}

export function resetLogger(): void {
  globalLogger = null;
}

export function createNoopLogger(): SecureLogger {
  const ignore: LogMethod = () => {};
  const noop: SecureLogger = {
    trace: ignore,
    debug: ignore,
    info: ignore,
    warn: ignore,
    error: ignore,
    fatal: ignore,
    child: () => noop,
    level: 'info',
  };
  return noop;
}

/**
 * Logger tagged with `component`. Injected loggers win over the global one;
 * with neither, log calls are dropped.
 */
export function componentLogger(component: string, injected?: SecureLogger): SecureLogger {
  const parent = injected ?? globalLogger;
  return parent ? parent.child({ component }) : createNoopLogger();
}
