/**
 * Runs synchronous handler bodies on behalf of the interceptor so they share
 * the promise contract of async handlers.
 */
export interface Executor {
  run<T>(fn: () => T | PromiseLike<T>): Promise<T>
}
