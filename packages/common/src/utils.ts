import type { AnyFunction, Class } from './types';

export function isClass(target: unknown): target is Class {
  return typeof target === 'function' && typeof target.prototype === 'object' && target.prototype !== null;
}

export function isUndefined(obj: unknown): obj is undefined {
  return typeof obj === 'undefined';
}

export function isNil(obj: unknown): obj is null | undefined {
  return isUndefined(obj) || obj === null;
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isFunction(fn: unknown): fn is AnyFunction {
  return typeof fn === 'function';
}

export function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Strips every leading occurrence of `char` from `value`.
 */
export function trimStart(value: string, char: string): string {
  if (char.length === 0) {
    return value;
  }

  let start = 0;
  while (value.startsWith(char, start)) {
    start += char.length;
  }
  return value.slice(start);
}

/**
 * Strips every trailing occurrence of `char` from `value`.
 */
export function trimEnd(value: string, char: string): string {
  if (char.length === 0) {
    return value;
  }

  let end = value.length;
  while (end >= char.length && value.startsWith(char, end - char.length)) {
    end -= char.length;
  }
  return value.slice(0, end);
}
