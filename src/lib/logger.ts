/**
 * Debug logging for certsmith
 *
 * Output is enabled with the DEBUG environment variable:
 *
 * DEBUG=certsmith:*          - All output
 * DEBUG=certsmith:pipeline   - Only acquisition pipeline
 * DEBUG=certsmith:webserver  - Only web server configurators
 *
 * Warnings and errors are additionally forwarded to the log sink, which the
 * CLI uses to surface them to the operator regardless of DEBUG.
 */

import debug from 'debug';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, namespace: string, message: string) => void;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

let sink: LogSink | undefined;

/** Install (or clear) the sink receiving warn and error lines. */
export function setLogSink(fn: LogSink | undefined): void {
  sink = fn;
}

export function createLogger(area: string): Logger {
  const namespace = `certsmith:${area}`;
  const debugLogger = debug(namespace);

  const emit = (level: LogLevel, message: string, args: unknown[]) => {
    debugLogger(`${level.toUpperCase()}: ${message}`, ...args);
    if (sink && (level === 'warn' || level === 'error')) {
      sink(level, namespace, format(message, ...args));
    }
  };

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),
  };
}
