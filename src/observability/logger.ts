import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for Conductor. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Adapt a pino instance to the Logger interface.
 * Our call order is (message, context); pino expects (context, message).
 */
function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => { instance.debug(context ?? {}, msg); },
    info: (msg, context) => { instance.info(context ?? {}, msg); },
    warn: (msg, context) => { instance.warn(context ?? {}, msg); },
    error: (msg, context) => { instance.error(context ?? {}, msg); },
    fatal: (msg, context) => { instance.fatal(context ?? {}, msg); },
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** File descriptor to write to. The stdio MCP gateway needs stderr, since stdout carries the protocol. */
  destination?: 'stdout' | 'stderr';
}

/** Create a structured pino logger instance. */
export function createLogger(options?: LoggerOptions): Logger {
  const fd = options?.destination === 'stderr' ? 2 : 1;
  const pretty = process.env['NODE_ENV'] === 'development';

  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'conductor-core',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, destination: fd } }
      : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'password',
        'secret',
        '*.apiKey',
        '*.password',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  };

  const pinoInstance = pretty ? pino(pinoOptions) : pino(pinoOptions, pino.destination(fd));
  return wrap(pinoInstance);
}
