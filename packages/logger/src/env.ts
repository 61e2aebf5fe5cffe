import { z } from 'zod';

import type { LoggerOptions } from './interfaces';

const envSchema = z.object({
  WAYPOST_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional(),
  WAYPOST_LOG_FORMAT: z.enum(['pretty', 'json']).optional(),
});

/**
 * Reads logger settings from the environment. Unset variables are left out so
 * that `Logger.configure` keeps its current values for them.
 */
export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid logger environment: ${issues}`);
  }

  const options: LoggerOptions = {};
  if (parsed.data.WAYPOST_LOG_LEVEL) {
    options.level = parsed.data.WAYPOST_LOG_LEVEL;
  }
  if (parsed.data.WAYPOST_LOG_FORMAT) {
    options.format = parsed.data.WAYPOST_LOG_FORMAT;
  }
  return options;
}
