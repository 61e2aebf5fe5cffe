import { isNil, isObject } from '@waypost/common';

import { InvalidActionResultError } from './errors';
import type { ActionResult, Stringable } from './types';

function isStringable(value: unknown): value is Stringable {
  return (
    isObject(value) &&
    !Array.isArray(value) &&
    typeof value.toString === 'function' &&
    value.toString !== Object.prototype.toString
  );
}

export function isActionResult(value: unknown): value is ActionResult {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
    case 'undefined':
      return true;
    case 'object':
      return value === null || isStringable(value);
    default:
      return false;
  }
}

export function assertActionResult(value: unknown): asserts value is ActionResult {
  if (!isActionResult(value)) {
    throw new InvalidActionResultError(describeType(value));
  }
}

/**
 * `null`, `undefined` and `false` are empty; `true` is `'1'`.
 */
export function stringifyActionResult(value: ActionResult): string {
  if (isNil(value) || value === false) {
    return '';
  }
  if (value === true) {
    return '1';
  }
  return String(value);
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  if (isObject(value)) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
