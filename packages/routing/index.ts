export { Route } from './src/route';
export { Router } from './src/router';
export { RouteAction, hasAfterAction, hasBeforeAction, resolveActionMethod, type ActionMethod } from './src/route-action';
export { OutputBuffer, echo } from './src/output-buffer';
export { parseAction, formatAction, resolveActionArguments, sortActionParams } from './src/action-definition';
export { assertActionResult, isActionResult, stringifyActionResult } from './src/action-result';
export { DEFAULT_PLACEHOLDERS, toPlaceholderToken } from './src/placeholders';
export {
  parseRouterOptions,
  routerOptionsFromEnv,
  routerOptionsSchema,
  type NormalizedRouterOptions,
  type RouterOptions,
} from './src/router-options';
export * from './src/errors';
export type * from './src/interfaces';
export type * from './src/types';
