import { pino, type Logger, type LoggerOptions } from 'pino';

export type RelayLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
  /** Route output through pino-pretty (local development) */
  pretty?: boolean;
}

/** Create the pino logger shared by the services and the HTTP server. */
export function createLogger(config: LoggerConfig = {}): RelayLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'keyrelay',
    level: config.level ?? inferDefaultLevel(),
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(options);
}

function inferDefaultLevel(): string {
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}
