/**
 * Logger factory using Pino
 *
 * Each process logs under `<serviceName>-<role>`, so the API, the worker and
 * one-shot drains of one deployment are told apart in aggregated logs.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type ProcessRole = 'api' | 'worker' | 'drain';

export interface LoggerConfig {
  level: LogLevel;
  serviceName: string;
  pretty: boolean;
}

/**
 * Bearer tokens and subscription tokens both grant access on their own.
 */
export const REDACTED_PATHS = [
  'req.headers.authorization',
  'subscriptionToken',
  '*.subscriptionToken',
];

export const buildLoggerOptions = (config: LoggerConfig, role: ProcessRole): LoggerOptions => {
  const options: LoggerOptions = {
    name: `${config.serviceName}-${role}`,
    level: config.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
};

export const createLogger = (config: LoggerConfig, role: ProcessRole): Logger =>
  pinoLib(buildLoggerOptions(config, role));

/**
 * Logger that discards everything. Used by tests and tooling.
 */
export const createSilentLogger = (): Logger => pinoLib({ level: 'silent' });

export { type Logger } from 'pino';
