import type { Milliseconds } from "../../ports/time"

/**
 * Settles with `work`, or rejects with `onTimeout()` once `timeoutMs` passes.
 * The work itself is not cancelled.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: Milliseconds,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs)
  })

  try {
    return await Promise.race([work, timeout])
  } finally {
    clearTimeout(timer)
  }
}
