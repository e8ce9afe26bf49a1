import type { Milliseconds } from "@tenantry/clock"

/**
 * Settles with `work`, or rejects with `onTimeout()` once `timeoutMs` passes.
 * The work itself keeps running; only the caller stops waiting.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: Milliseconds,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs)
  })

  try {
    return await Promise.race([work, expired])
  } finally {
    clearTimeout(timer)
  }
}
