import { Logger, type LogMessage } from '@waypost/logger';
import { StatusCodes } from 'http-status-codes';
import { afterEach, describe, expect, it } from 'vitest';

import {
  DuplicateActionTargetError,
  DuplicateRouteNameError,
  InvalidRouterOptionsError,
  PlaceholderParameterError,
  RouteNotFoundError,
} from './errors';
import { Route } from './route';
import { Router } from './router';

class Users {
  index(): string {
    return 'users';
  }
}

describe('Router', () => {
  afterEach(() => {
    Logger.configure({ level: 'info', transport: undefined });
  });

  describe('placeholders', () => {
    it('should fill placeholders in order', () => {
      const router = new Router();

      expect(router.fillPlaceholders('/posts/{title}/{num}', 'hello-world', 3)).toBe('/posts/hello-world/3');
      expect(router.fillPlaceholders('{scheme}://{subdomain}.example.com:{port}', 'https', 'api', 8080)).toBe(
        'https://api.example.com:8080',
      );
    });

    it('should fill raw pattern groups', () => {
      expect(new Router().fillPlaceholders('/files/([a-z]+)', 'abc')).toBe('/files/abc');
    });

    it('should fail on a missing param', () => {
      const router = new Router();

      expect(() => router.fillPlaceholders('/posts/{title}/{num}', 'hello')).toThrow('Placeholder parameter is empty: 1');
    });

    it('should fail on a param that does not match its placeholder', () => {
      const router = new Router();

      expect(() => router.fillPlaceholders('/users/{int}', 'abc')).toThrow(PlaceholderParameterError);
      expect(() => router.fillPlaceholders('/users/{int}', 'abc')).toThrow('Placeholder parameter is invalid: 0');
      expect(() => router.fillPlaceholders('/users/{int}', '12a')).toThrow('Placeholder parameter is invalid: 0');
    });

    it('should refuse params for a template without placeholders', () => {
      const router = new Router();

      expect(router.fillPlaceholders('/about')).toBe('/about');
      expect(() => router.fillPlaceholders('/about', 1)).toThrow('String has no placeholders. Parameters not required');
    });

    it('should add custom placeholders', () => {
      const router = new Router({ placeholders: { lang: '(en|pt)' } }).addPlaceholder('{slug}', '([a-z-]+)');

      expect(router.getPlaceholders()['{lang}']).toBe('(en|pt)');
      expect(router.getPlaceholders()['{slug}']).toBe('([a-z-]+)');
      expect(router.fillPlaceholders('/{lang}/{slug}', 'pt', 'ola-mundo')).toBe('/pt/ola-mundo');
    });

    it('should warn when a placeholder is overridden', () => {
      const messages: LogMessage[] = [];
      Logger.configure({ level: 'warn', transport: { log: message => messages.push(message) } });
      const router = new Router();

      router.addPlaceholder('int', '([0-9]+)');

      expect(router.getPlaceholders()['{int}']).toBe('([0-9]+)');
      expect(messages).toHaveLength(1);
      expect(messages[0]).toMatchObject({
        level: 'warn',
        msg: 'Placeholder overridden: {int}',
        context: 'Router',
        pattern: '([0-9]+)',
      });
    });

    it('should reject placeholders with invalid patterns', () => {
      expect(() => new Router().addPlaceholder('broken', '([a-z')).toThrow(InvalidRouterOptionsError);
      expect(() => new Router({ placeholders: { broken: '([a-z' } })).toThrow(
        'Invalid router options: placeholders.broken: must be a valid regular expression',
      );
    });

    it('should swap tokens and patterns', () => {
      const router = new Router();

      expect(router.replacePlaceholders('/users/{int}')).toBe('/users/([0-9]{1,18})');
      expect(router.replacePlaceholders('/users/([0-9]{1,18})', true)).toBe('/users/{int}');
    });
  });

  describe('default action method', () => {
    it('should default to index', () => {
      expect(new Router().getDefaultRouteActionMethod()).toBe('index');
    });

    it('should take the method from options', () => {
      expect(new Router({ defaultRouteActionMethod: 'handle' }).getDefaultRouteActionMethod()).toBe('handle');
    });

    it('should reject names that are not method names', () => {
      expect(() => new Router({ defaultRouteActionMethod: '1st' })).toThrow(
        'Invalid router options: defaultRouteActionMethod: must be a valid method name',
      );
      expect(() => new Router().setDefaultRouteActionMethod('two words')).toThrow(
        'Invalid router options: defaultRouteActionMethod: must be a valid method name',
      );
    });
  });

  describe('action targets', () => {
    it('should register targets without leading separators', () => {
      const router = new Router().registerActionTarget('\\App\\Users', Users);

      expect(router.getActionTarget('App\\Users')).toBe(Users);
      expect(router.hasActionTarget('\\App\\Users')).toBe(true);
      expect(router.getActionTarget('App\\Posts')).toBeUndefined();
    });

    it('should reject a target name registered twice', () => {
      const router = new Router().registerActionTarget('App\\Users', Users);

      expect(() => router.registerActionTarget('App\\Users', Users)).toThrow(DuplicateActionTargetError);
    });
  });

  describe('routes', () => {
    it('should create routes bound to the router', () => {
      const router = new Router().registerActionTarget('App\\Users', Users);
      const route = router.createRoute('https://example.com', '/users', 'App\\Users', 'users.index');

      expect(route).toBeInstanceOf(Route);
      expect(router.getNamedRoute('users.index')).toBe(route);
      expect(router.hasNamedRoute('users.index')).toBe(true);
      expect(route.run()).toBe('users');
    });

    it('should keep routes in registration order', () => {
      const router = new Router();
      const first = router.createRoute('', '/a', () => 'a');
      const second = new Route(router, '', '/b', () => 'b');
      router.addRoute(second);

      const routes = router.getRoutes();
      expect(routes).toHaveLength(2);
      expect(routes[0]).toBe(first);
      expect(routes[1]).toBe(second);
    });

    it('should reject duplicate route names', () => {
      const router = new Router();
      router.createRoute('', '/a', () => 'a', 'home');

      expect(() => router.createRoute('', '/b', () => 'b', 'home')).toThrow(DuplicateRouteNameError);
      expect(router.getRoutes()).toHaveLength(1);
    });

    it('should report unknown route names as not found', () => {
      const router = new Router();

      expect(() => router.getNamedRoute('missing')).toThrow(RouteNotFoundError);
      try {
        router.getNamedRoute('missing');
        expect.unreachable();
      } catch (error) {
        expect(error).toMatchObject({ routeName: 'missing', statusCode: StatusCodes.NOT_FOUND });
      }
    });
  });
});
