import { z } from 'zod';

import { InvalidRouterOptionsError } from './errors';
import { isValidPattern } from './placeholders';

export const ACTION_METHOD_NAME = /^[A-Za-z_$][\w$]*$/;

export const actionMethodSchema = z.string().regex(ACTION_METHOD_NAME, 'must be a valid method name');

export const routerOptionsSchema = z.object({
  defaultRouteActionMethod: actionMethodSchema.default('index'),
  placeholders: z.record(z.string().min(1), z.string().refine(isValidPattern, 'must be a valid regular expression')).default({}),
});

export type RouterOptions = z.input<typeof routerOptionsSchema>;

export type NormalizedRouterOptions = z.output<typeof routerOptionsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function parseRouterOptions(input: RouterOptions = {}): NormalizedRouterOptions {
  const parsed = routerOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRouterOptionsError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseActionMethod(name: string): string {
  const parsed = actionMethodSchema.safeParse(name);
  if (!parsed.success) {
    throw new InvalidRouterOptionsError(formatIssues(parsed.error).map(issue => `defaultRouteActionMethod: ${issue}`));
  }
  return parsed.data;
}

const envSchema = z.object({
  WAYPOST_DEFAULT_ACTION_METHOD: z.string().optional(),
});

/**
 * Reads router options from the environment; unset variables keep their
 * defaults.
 */
export function routerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RouterOptions {
  const { WAYPOST_DEFAULT_ACTION_METHOD } = envSchema.parse(env);
  return WAYPOST_DEFAULT_ACTION_METHOD === undefined ? {} : { defaultRouteActionMethod: WAYPOST_DEFAULT_ACTION_METHOD };
}
