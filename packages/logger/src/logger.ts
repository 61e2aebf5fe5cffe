import { LogContext } from './async-storage';
import type { LoggerOptions, LogMessage, Transport } from './interfaces';
import { ConsoleTransport } from './transports/console';
import type { LogArgument, Loggable, LogLevel } from './types';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export class Logger {
  private static globalOptions: LoggerOptions = {
    level: 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : undefined,
  };
  private static transport: Transport = new ConsoleTransport(Logger.globalOptions);

  private readonly context?: string;

  constructor(context?: string | (abstract new (...args: never[]) => unknown) | object) {
    if (typeof context === 'function') {
      this.context = context.name;
    } else if (typeof context === 'object' && context !== null) {
      this.context = context.constructor.name;
    } else if (typeof context === 'string') {
      this.context = context;
    }
  }

  static configure(options: LoggerOptions): void {
    this.globalOptions = { ...this.globalOptions, ...options };
    this.transport = this.globalOptions.transport ?? new ConsoleTransport(this.globalOptions);
  }

  static isLevelEnabled(level: LogLevel): boolean {
    const configuredLevel = Logger.globalOptions.level ?? 'info';
    return LEVELS.indexOf(level) >= LEVELS.indexOf(configuredLevel);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  debug(msg: string, ...args: LogArgument[]): void {
    this.log('debug', msg, args);
  }

  warn(msg: string, ...args: LogArgument[]): void {
    this.log('warn', msg, args);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Internal Logic                               */
  /* -------------------------------------------------------------------------- */

  private log(level: LogLevel, msg: string, args: LogArgument[]): void {
    if (!Logger.isLevelEnabled(level)) {
      return;
    }

    const logMessage: LogMessage = {
      level,
      msg,
      time: Date.now(),
      context: this.context,
      scope: LogContext.getScope(),
    };

    for (const arg of args) {
      if (arg instanceof Error) {
        logMessage.err = arg;
      } else if (isLoggable(arg)) {
        Object.assign(logMessage, arg.toLog());
      } else {
        Object.assign(logMessage, arg);
      }
    }

    Logger.transport.log(logMessage);
  }
}

export function isLoggable(value: unknown): value is Loggable {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'toLog') === 'function';
}
