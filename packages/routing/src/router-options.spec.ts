import { describe, expect, it } from 'vitest';

import { InvalidRouterOptionsError } from './errors';
import { parseRouterOptions, routerOptionsFromEnv } from './router-options';

describe('parseRouterOptions', () => {
  it('should fill defaults', () => {
    expect(parseRouterOptions()).toEqual({ defaultRouteActionMethod: 'index', placeholders: {} });
  });

  it('should list every issue', () => {
    try {
      parseRouterOptions({ defaultRouteActionMethod: '', placeholders: { bad: '(' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRouterOptionsError);
      expect(error).toMatchObject({
        issues: ['defaultRouteActionMethod: must be a valid method name', 'placeholders.bad: must be a valid regular expression'],
      });
    }
  });
});

describe('routerOptionsFromEnv', () => {
  it('should read the default action method', () => {
    expect(routerOptionsFromEnv({ WAYPOST_DEFAULT_ACTION_METHOD: 'handle' })).toEqual({ defaultRouteActionMethod: 'handle' });
  });

  it('should leave defaults alone when unset', () => {
    expect(routerOptionsFromEnv({})).toEqual({});
  });
});
