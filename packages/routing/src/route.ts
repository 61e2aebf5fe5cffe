import { isNil, trimEnd, trimStart } from '@waypost/common';
import { LogContext, Logger } from '@waypost/logger';

import { formatAction, normalizeActionInput, parseAction, resolveActionArguments, sortActionParams } from './action-definition';
import { assertActionResult, stringifyActionResult } from './action-result';
import { MethodNotFoundError, TargetNotFoundError } from './errors';
import type { RouteRouter } from './interfaces';
import { OutputBuffer } from './output-buffer';
import { hasAfterAction, hasBeforeAction, resolveActionMethod } from './route-action';
import type {
  ActionDefinition,
  ActionParams,
  ActionParamsInput,
  ActionResult,
  ClosureAction,
  DescriptorAction,
  PlaceholderParam,
  RouteActionInput,
  RouteOptions,
} from './types';

/**
 * A URL template bound to an action.
 *
 * The origin (`{scheme}://{subdomain}.example.com`) and the path
 * (`/users/{int}`) may hold placeholders, filled in by the owning router.
 */
export class Route {
  private readonly router: RouteRouter;
  private readonly logger = new Logger(Route.name);
  private origin = '';
  private path = '/';
  private action: RouteActionInput;
  private definition: ActionDefinition;
  private actionParams: ActionParams = new Map();
  private name?: string;
  private options: RouteOptions = {};

  /**
   * @param router The router that resolves placeholders and action targets
   * @param origin URL origin, in the format `{scheme}://{hostname}[:{port}]`
   * @param path URL path
   * @param action A closure or an action descriptor, see {@link setAction}
   */
  constructor(router: RouteRouter, origin: string, path: string, action: RouteActionInput) {
    this.router = router;
    this.setOrigin(origin);
    this.setPath(path);
    this.action = normalizeActionInput(action);
    this.definition = parseAction(this.action);
  }

  /**
   * Gets the URL origin, with placeholders filled when params are given.
   */
  getOrigin(...params: PlaceholderParam[]): string {
    if (params.length > 0) {
      return this.router.fillPlaceholders(this.origin, ...params);
    }
    return this.origin;
  }

  setOrigin(origin: string): this {
    this.origin = trimStart(origin, '/');
    return this;
  }

  /**
   * Gets the URL path, with placeholders filled when params are given.
   */
  getPath(...params: PlaceholderParam[]): string {
    if (params.length > 0) {
      return this.router.fillPlaceholders(this.path, ...params);
    }
    return this.path;
  }

  setPath(path: string): this {
    this.path = '/' + trimEnd(trimStart(path, '/'), '/');
    return this;
  }

  getURL(originParams: readonly PlaceholderParam[] = [], pathParams: readonly PlaceholderParam[] = []): string {
    return this.getOrigin(...originParams) + this.getPath(...pathParams);
  }

  getName(): string | undefined {
    return this.name;
  }

  setName(name: string): this {
    this.name = name;
    return this;
  }

  getOptions(): RouteOptions {
    return this.options;
  }

  setOptions(options: RouteOptions): this {
    this.options = { ...options };
    return this;
  }

  getAction(): RouteActionInput {
    return this.action;
  }

  /**
   * Sets the action: a closure, or a descriptor in the form
   * `App\Blog::show/0/2/1` where `/0/2/1` lists the action param keys in the
   * order the method receives them.
   */
  setAction(action: RouteActionInput): this {
    this.action = normalizeActionInput(action);
    this.definition = parseAction(this.action);
    return this;
  }

  getActionParams(): ActionParams {
    return this.actionParams;
  }

  /**
   * Sets the action params. Keys are the indexes action descriptors refer to.
   */
  setActionParams(params: ActionParamsInput): this {
    this.actionParams = sortActionParams(params);
    return this;
  }

  /**
   * Runs the action and returns everything it wrote followed by its result.
   *
   * @param construct Arguments for the target class constructor; closures
   * receive them after the action params.
   */
  run(...construct: unknown[]): string {
    const definition = this.definition;

    return LogContext.run(this.name ?? this.origin + this.path, () => {
      this.logger.debug('Dispatching route action', { action: formatAction(definition), kind: definition.kind });

      if (definition.kind === 'closure') {
        return this.runClosure(definition, construct);
      }
      return this.runDescriptor(definition, construct);
    });
  }

  private runClosure(definition: ClosureAction, construct: unknown[]): string {
    const { output, result } = OutputBuffer.capture(() => definition.closure(this.actionParams, ...construct));
    assertActionResult(result);
    return output + stringifyActionResult(result);
  }

  private runDescriptor(definition: DescriptorAction, construct: unknown[]): string {
    const method = definition.method ?? this.router.getDefaultRouteActionMethod();
    const params = resolveActionArguments(definition.paramKeys, this.actionParams);

    const targetClass = this.router.getActionTarget(definition.target);
    if (!targetClass) {
      throw new TargetNotFoundError(definition.target);
    }

    const target = new targetClass(...construct);
    const handler = resolveActionMethod(target, method);
    if (!handler) {
      throw new MethodNotFoundError(definition.target, method);
    }

    if (hasBeforeAction(target)) {
      const before = OutputBuffer.capture(() => target.beforeAction(method, params));
      assertActionResult(before.result);

      const response = before.output + stringifyActionResult(before.result);
      if (response !== '') {
        this.logger.debug('Before hook answered, skipping action method', { method });
        return response;
      }
    }

    const main = OutputBuffer.capture(() => handler(...params));
    assertActionResult(main.result);

    let output = main.output;
    let result: ActionResult = main.result;

    if (isNil(result) && hasAfterAction(target)) {
      const after = OutputBuffer.capture(() => target.afterAction(method, params));
      assertActionResult(after.result);
      output += after.output;
      result = after.result;
    }

    return output + stringifyActionResult(result);
  }
}
