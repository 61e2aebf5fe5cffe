import type { ActionTargetClass, PlaceholderParam } from './types';

/**
 * What a Route needs from the router that created it.
 */
export interface RouteRouter {
  fillPlaceholders(template: string, ...params: PlaceholderParam[]): string;
  getDefaultRouteActionMethod(): string;
  getActionTarget(name: string): ActionTargetClass | undefined;
}

/**
 * A target implementing this runs `beforeAction` ahead of the action method.
 * A non-empty result is sent as the response and the method is skipped.
 */
export interface BeforeActionHook {
  beforeAction(method: string, params: readonly unknown[]): unknown;
}

/**
 * A target implementing this produces the result when the action method
 * returns `null` or `undefined`.
 */
export interface AfterActionHook {
  afterAction(method: string, params: readonly unknown[]): unknown;
}
