/**
 * Logger factory using Pino
 * Structured JSON logs; pretty-printed through pino-pretty outside production
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'polytemplate',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const { name, level, pretty } = { ...defaultConfig, ...config };

  const options: LoggerOptions = { name, level };

  // A silent logger never writes, so it needs no transport worker
  if (pretty === true && level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoLib(options);
};

/**
 * Creates a child logger with additional context
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger =>
  parent.child(context);

export { type Logger } from 'pino';
