import { isClass, trimStart } from '@waypost/common';
import { Logger } from '@waypost/logger';

import {
  DuplicateActionTargetError,
  DuplicateRouteNameError,
  InvalidRouterOptionsError,
  PlaceholderParameterError,
  RouteNotFoundError,
} from './errors';
import type { RouteRouter } from './interfaces';
import { DEFAULT_PLACEHOLDERS, isValidPattern, PLACEHOLDER_GROUP, toPlaceholderToken } from './placeholders';
import { Route } from './route';
import { parseActionMethod, parseRouterOptions, type RouterOptions } from './router-options';
import type { ActionTargetClass, PlaceholderParam, RouteActionInput } from './types';

/**
 * Creates routes and serves them what they need to dispatch: placeholder
 * filling, the default action method and the action target registry.
 */
export class Router implements RouteRouter {
  private readonly logger = new Logger(Router.name);
  private readonly placeholders = new Map<string, string>();
  private readonly targets = new Map<string, ActionTargetClass>();
  private readonly routes: Route[] = [];
  private readonly namedRoutes = new Map<string, Route>();
  private defaultRouteActionMethod: string;

  constructor(options: RouterOptions = {}) {
    const normalized = parseRouterOptions(options);

    this.defaultRouteActionMethod = normalized.defaultRouteActionMethod;
    this.addPlaceholder({ ...DEFAULT_PLACEHOLDERS, ...normalized.placeholders });
  }

  /* -------------------------------------------------------------------------- */
  /*                                Placeholders                                */
  /* -------------------------------------------------------------------------- */

  addPlaceholder(placeholder: string, pattern: string): this;
  addPlaceholder(placeholders: Readonly<Record<string, string>>): this;
  addPlaceholder(placeholder: string | Readonly<Record<string, string>>, pattern?: string): this {
    const entries: Array<[string, string]> =
      typeof placeholder === 'string' ? [[placeholder, pattern ?? '']] : Object.entries(placeholder);

    for (const [name, value] of entries) {
      if (!value || !isValidPattern(value)) {
        throw new InvalidRouterOptionsError([`placeholders.${name}: must be a valid regular expression`]);
      }
      const token = toPlaceholderToken(name);
      if (this.placeholders.has(token)) {
        this.logger.warn(`Placeholder overridden: ${token}`, { pattern: value });
      }
      this.placeholders.set(token, value);
    }
    return this;
  }

  getPlaceholders(): Record<string, string> {
    return Object.fromEntries(this.placeholders);
  }

  /**
   * Swaps placeholder tokens for their patterns, or patterns for tokens when
   * `flip` is set.
   */
  replacePlaceholders(text: string, flip = false): string {
    let replaced = text;
    for (const [token, pattern] of this.placeholders) {
      replaced = flip ? replaced.replaceAll(pattern, token) : replaced.replaceAll(token, pattern);
    }
    return replaced;
  }

  /**
   * Fills each placeholder of `template` with the param at the same position.
   * Every param must fully match the pattern it replaces.
   */
  fillPlaceholders(template: string, ...params: PlaceholderParam[]): string {
    const expanded = this.replacePlaceholders(template);
    const groups = expanded.match(PLACEHOLDER_GROUP);

    if (!groups) {
      if (params.length > 0) {
        throw new PlaceholderParameterError('String has no placeholders. Parameters not required');
      }
      return expanded;
    }

    let index = 0;
    return expanded.replace(PLACEHOLDER_GROUP, group => {
      const current = index++;
      const param = params[current];
      if (param === undefined) {
        throw new PlaceholderParameterError(`Placeholder parameter is empty: ${current}`, current);
      }

      const value = String(param);
      if (!new RegExp(`^(?:${group})$`).test(value)) {
        throw new PlaceholderParameterError(`Placeholder parameter is invalid: ${current}`, current);
      }
      return value;
    });
  }

  /* -------------------------------------------------------------------------- */
  /*                               Action Targets                               */
  /* -------------------------------------------------------------------------- */

  getDefaultRouteActionMethod(): string {
    return this.defaultRouteActionMethod;
  }

  setDefaultRouteActionMethod(method: string): this {
    this.defaultRouteActionMethod = parseActionMethod(method);
    return this;
  }

  /**
   * Registers a class under the name action descriptors use for it, e.g.
   * `App\Users` for `App\Users::show/0`.
   */
  registerActionTarget(name: string, target: ActionTargetClass): this {
    const key = trimStart(name, '\\');
    if (!isClass(target)) {
      throw new TypeError(`Action target must be a class: ${key}`);
    }
    if (this.targets.has(key)) {
      throw new DuplicateActionTargetError(key);
    }

    this.targets.set(key, target);
    this.logger.debug(`Action target registered: ${key} -> ${target.name}`);
    return this;
  }

  getActionTarget(name: string): ActionTargetClass | undefined {
    return this.targets.get(name);
  }

  hasActionTarget(name: string): boolean {
    return this.targets.has(trimStart(name, '\\'));
  }

  /* -------------------------------------------------------------------------- */
  /*                                   Routes                                   */
  /* -------------------------------------------------------------------------- */

  createRoute(origin: string, path: string, action: RouteActionInput, name?: string): Route {
    const route = new Route(this, origin, path, action);
    if (name !== undefined) {
      route.setName(name);
    }

    this.addRoute(route);
    return route;
  }

  addRoute(route: Route): this {
    const name = route.getName();
    if (name !== undefined) {
      if (this.namedRoutes.has(name)) {
        throw new DuplicateRouteNameError(name);
      }
      this.namedRoutes.set(name, route);
    }

    this.routes.push(route);
    this.logger.debug(`Route registered: ${route.getOrigin()}${route.getPath()}`, { name });
    return this;
  }

  getNamedRoute(name: string): Route {
    const route = this.namedRoutes.get(name);
    if (!route) {
      throw new RouteNotFoundError(name);
    }
    return route;
  }

  hasNamedRoute(name: string): boolean {
    return this.namedRoutes.has(name);
  }

  getRoutes(): readonly Route[] {
    return [...this.routes];
  }
}
