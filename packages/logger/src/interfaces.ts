import type { Color, LogFormat, LogLevel, LogMetadataRecord, Loggable } from './types';

// Base fields always present
export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  scope?: string;
  err?: Error | Loggable; // Standard error field
}

// User-defined fields merged at root level
export type LogMessage = BaseLogMessage & LogMetadataRecord;

export interface LoggerOptions {
  /**
   * Minimum log level to print.
   * @default 'info'
   */
  level?: LogLevel;
  /**
   * Log format.
   * @default 'auto' (pretty in dev, json in prod)
   */
  format?: LogFormat;
  prettyOptions?: {
    colors?: Partial<Record<LogLevel, Color>>;
  };
  /**
   * Replaces the console transport, e.g. to collect records in tests.
   */
  transport?: Transport;
}

export interface Transport {
  log(message: LogMessage): void;
}
