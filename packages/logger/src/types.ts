export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'pretty' | 'json';

export type Color = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export interface Loggable {
  toLog(): LogMetadataRecord; // Custom serialization hook
}

export type LogMetadataPrimitive = string | number | boolean | null | undefined;

export type LogMetadataLeaf = LogMetadataPrimitive | Error | Loggable;

export interface LogMetadataRecord {
  [key: string]: LogMetadataValue;
}

export type LogMetadataValue = LogMetadataLeaf | ReadonlyArray<LogMetadataLeaf> | LogMetadataRecord;

export type LogArgument = Error | Loggable | LogMetadataRecord;
