import type { Class } from '@waypost/common';

/**
 * Action parameters keyed by the index an action descriptor refers to.
 */
export type ActionParams = ReadonlyMap<number, unknown>;

export type ActionParamsInput = ActionParams | Iterable<readonly [number, unknown]> | Readonly<Record<number, unknown>>;

export type RouteClosure = (params: ActionParams, ...construct: unknown[]) => unknown;

/**
 * A closure, or a descriptor such as `App\Blog::show/0/2/1` where `/0/2/1` is
 * the order in which action params are passed to the method.
 */
export type RouteActionInput = RouteClosure | string;

export type ActionTargetClass = Class;

export interface ClosureAction {
  kind: 'closure';
  closure: RouteClosure;
}

export interface DescriptorAction {
  kind: 'descriptor';
  target: string;
  /** Absent when the descriptor has no `::`; the router default applies. */
  method?: string;
  paramKeys: readonly string[];
}

export type ActionDefinition = ClosureAction | DescriptorAction;

export type ActionResult = string | number | bigint | boolean | null | undefined | Stringable;

export interface Stringable {
  toString(): string;
}

export type RouteOptions = Record<string, unknown>;

export type PlaceholderParam = string | number | bigint;

export type EchoChunk = string | number | bigint | boolean;

export interface CapturedOutput<R> {
  output: string;
  result: R;
}
