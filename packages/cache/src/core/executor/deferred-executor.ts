import type { Executor } from "../../ports/executor"

/**
 * Runs the body on the check phase of the event loop, after pending I/O
 * callbacks, so a synchronous handler never runs inside the caller's tick.
 * A throw becomes a rejection.
 */
export class DeferredExecutor implements Executor {
  run<T>(fn: () => T | PromiseLike<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(fn())
        } catch (err) {
          reject(err)
        }
      })
    })
  }
}

/** Runs the body in the caller's tick. For tests and trivially cheap handlers. */
export class InlineExecutor implements Executor {
  async run<T>(fn: () => T | PromiseLike<T>): Promise<T> {
    return fn()
  }
}
