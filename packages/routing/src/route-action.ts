import { isFunction } from '@waypost/common';

import type { AfterActionHook, BeforeActionHook } from './interfaces';
import { echo } from './output-buffer';
import type { EchoChunk } from './types';

export type ActionMethod = (...args: unknown[]) => unknown;

/**
 * Optional base class for descriptor targets. Its own members are not
 * dispatchable as actions.
 */
export abstract class RouteAction {
  /**
   * Appends incidental output to the response of the running action.
   */
  protected write(...chunks: EchoChunk[]): void {
    echo(...chunks);
  }
}

function hasMethod(target: object, name: string): boolean {
  return isFunction(Reflect.get(target, name));
}

export function hasBeforeAction(target: object): target is BeforeActionHook {
  return hasMethod(target, 'beforeAction');
}

export function hasAfterAction(target: object): target is AfterActionHook {
  return hasMethod(target, 'afterAction');
}

/**
 * Binds the named action method of `target`, or returns undefined when there
 * is none. Constructors, `Object.prototype` members and `RouteAction` helpers
 * never resolve.
 */
export function resolveActionMethod(target: object, name: string): ActionMethod | undefined {
  if (name === 'constructor' || name in Object.prototype) {
    return undefined;
  }
  if (target instanceof RouteAction && name in RouteAction.prototype) {
    return undefined;
  }

  const member: unknown = Reflect.get(target, name);
  if (!isFunction(member)) {
    return undefined;
  }

  return (...args: unknown[]): unknown => Reflect.apply(member, target, args);
}
