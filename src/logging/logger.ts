import pino, { type Logger } from 'pino';
import type { Settings } from '../config/schema.js';

export type { Logger };

export interface LoggerOptions {
  level?: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  pretty?: boolean;
  name?: string;
}

/** Logs go to stderr so stdout stays free for answers and streamed chunks. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', pretty = false, name = 'citewise' } = options;

  if (pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ name, level }, pino.destination(2));
}

/** Just the slice of a logger the debug sink writes to. */
export interface DebugLogger {
  debug(obj: Record<string, unknown>, msg?: string): void;
}

/** Prints a labeled string, but only in debug mode. */
export type DebugSink = (text: string, label: string) => void;

export const noopDebug: DebugSink = () => {};

export function createDebugSink(settings: Pick<Settings, 'debug'>, logger: DebugLogger): DebugSink {
  if (!settings.debug) return noopDebug;
  return (text, label) => {
    logger.debug({ label: label.trim() }, `${label}${text}`);
  };
}
