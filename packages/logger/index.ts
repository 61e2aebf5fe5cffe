export { Logger } from './src/logger';
export { LogContext } from './src/async-storage';
export { ConsoleTransport } from './src/transports/console';
export { loggerOptionsFromEnv } from './src/env';
export type * from './src/interfaces';
export type * from './src/types';
