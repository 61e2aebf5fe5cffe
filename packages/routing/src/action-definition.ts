import { isString, trimStart } from '@waypost/common';

import { InvalidActionParameterKeyError, UndefinedActionParameterError } from './errors';
import type { ActionDefinition, ActionParams, ActionParamsInput, RouteActionInput } from './types';

const METHOD_SEPARATOR = '::';
const PARAM_SEPARATOR = '/';
const NAMESPACE_SEPARATOR = '\\';
const INTEGER_KEY = /^(?:0|-?[1-9]\d*)$/;

export function normalizeActionInput(action: RouteActionInput): RouteActionInput {
  return isString(action) ? trimStart(action, NAMESPACE_SEPARATOR) : action;
}

/**
 * Splits an action into the form `Route.run` dispatches on.
 *
 * `App\Blog::show/1/0` becomes target `App\Blog`, method `show` and param
 * keys `['1', '0']`. Without `::` the whole string is the target and the
 * method is left for the router default.
 */
export function parseAction(action: RouteActionInput): ActionDefinition {
  if (typeof action === 'function') {
    return { kind: 'closure', closure: action };
  }

  const separatorAt = action.indexOf(METHOD_SEPARATOR);
  if (separatorAt === -1) {
    return { kind: 'descriptor', target: action, paramKeys: [] };
  }

  const target = action.slice(0, separatorAt);
  const [method = '', ...paramKeys] = action.slice(separatorAt + METHOD_SEPARATOR.length).split(PARAM_SEPARATOR);

  return { kind: 'descriptor', target, method, paramKeys };
}

export function formatAction(definition: ActionDefinition): string {
  if (definition.kind === 'closure') {
    return definition.closure.name ? `closure ${definition.closure.name}` : 'closure';
  }
  const method = definition.method === undefined ? '' : `${METHOD_SEPARATOR}${definition.method}`;
  const keys = definition.paramKeys.map(key => `${PARAM_SEPARATOR}${key}`).join('');
  return `${definition.target}${method}${keys}`;
}

/**
 * Looks up each descriptor key in the stored params, keeping descriptor order.
 */
export function resolveActionArguments(paramKeys: readonly string[], params: ActionParams): unknown[] {
  return paramKeys.map(key => {
    const index = INTEGER_KEY.test(key) ? Number(key) : undefined;
    if (index === undefined || !params.has(index)) {
      throw new UndefinedActionParameterError(key);
    }
    return params.get(index);
  });
}

function isEntryIterable(input: ActionParamsInput): input is Iterable<readonly [number, unknown]> {
  return Symbol.iterator in input;
}

/**
 * Copies action params into a map ordered by ascending key.
 */
export function sortActionParams(input: ActionParamsInput): ActionParams {
  const entries: Array<[number, unknown]> = [];

  if (isEntryIterable(input)) {
    for (const [key, value] of input) {
      if (!Number.isSafeInteger(key)) {
        throw new InvalidActionParameterKeyError(String(key));
      }
      entries.push([key, value]);
    }
  } else {
    for (const [key, value] of Object.entries(input)) {
      if (!INTEGER_KEY.test(key)) {
        throw new InvalidActionParameterKeyError(key);
      }
      entries.push([Number(key), value]);
    }
  }

  entries.sort(([a], [b]) => a - b);
  return new Map(entries);
}
