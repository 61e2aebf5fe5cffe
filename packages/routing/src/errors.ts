import { HttpError } from '@waypost/common';
import { StatusCodes } from 'http-status-codes';

export class RoutingError extends HttpError {
  constructor(message: string, statusCode: StatusCodes = StatusCodes.INTERNAL_SERVER_ERROR) {
    super(statusCode, message);
  }
}

export class UndefinedActionParameterError extends RoutingError {
  constructor(readonly key: string) {
    super(`Undefined action parameter: ${key}`);
  }
}

export class InvalidActionParameterKeyError extends RoutingError {
  constructor(readonly key: string) {
    super(`Action parameter keys must be integers, got: ${key}`);
  }
}

export class TargetNotFoundError extends RoutingError {
  constructor(readonly target: string) {
    super(`Class not exists: ${target}`);
  }
}

export class MethodNotFoundError extends RoutingError {
  constructor(
    readonly target: string,
    readonly method: string,
  ) {
    super(`Class method not exists: ${target}::${method}`);
  }
}

export class InvalidActionResultError extends RoutingError {
  constructor(readonly resultType: string) {
    super(`Action return type must be scalar, null or stringable, got: ${resultType}`);
  }
}

export class PlaceholderParameterError extends RoutingError {
  constructor(
    message: string,
    readonly index?: number,
  ) {
    super(message);
  }
}

export class DuplicateRouteNameError extends RoutingError {
  constructor(readonly routeName: string) {
    super(`Route name is already in use: ${routeName}`);
  }
}

export class DuplicateActionTargetError extends RoutingError {
  constructor(readonly target: string) {
    super(`Action target is already registered: ${target}`);
  }
}

export class RouteNotFoundError extends RoutingError {
  constructor(readonly routeName: string) {
    super(`Named route not found: ${routeName}`, StatusCodes.NOT_FOUND);
  }
}

export class InvalidRouterOptionsError extends RoutingError {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid router options: ${issues.join('; ')}`);
  }
}
