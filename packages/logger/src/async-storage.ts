import { AsyncLocalStorage } from 'node:async_hooks';

export class LogContext {
  private static storage = new AsyncLocalStorage<string>();

  /**
   * Run a callback within a log scope.
   * @param scope Label attached to every record logged by the callback.
   * @param callback The callback to run.
   */
  static run<R>(scope: string, callback: () => R): R {
    return this.storage.run(scope, callback);
  }

  /**
   * Get the current scope label.
   */
  static getScope(): string | undefined {
    return this.storage.getStore();
  }
}
