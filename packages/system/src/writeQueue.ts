/**
 * Write Queue
 *
 * Serializes asynchronous write sections so that each one runs to completion
 * before the next starts. A section is typically
 * "mutate in memory -> persist -> notify" and must never interleave with another.
 *
 * Philosophy:
 * - One writer at a time, readers never wait
 * - A failing section rejects its own promise and does not poison the queue
 * - Sections run in the order they were enqueued
 */

/**
 * A unit of exclusive work
 */
export type WriteSection<T> = () => T | Promise<T>

/**
 * Options for creating a write queue
 */
export type WriteQueueOptions = {
  /**
   * Called when a section fails, in addition to rejecting the caller's promise.
   */
  onError?: (error: unknown, label: string) => void
}

/**
 * Write queue API
 */
export type WriteQueue = {
  /**
   * Enqueue a section. Resolves with the section's result once it has run.
   */
  run: <T>(label: string, section: WriteSection<T>) => Promise<T>

  /**
   * Resolves when every section enqueued so far has settled.
   */
  flush: () => Promise<void>

  /**
   * Number of sections enqueued and not yet settled.
   */
  pending: () => number
}

/**
 * Create a write queue
 *
 * @example
 * ```ts
 * const queue = createWriteQueue({
 *   onError: (error, label) => console.error(`[Store] ${label} failed:`, error),
 * })
 *
 * await queue.run('set-override', async () => {
 *   state.set({ ...state.get(), value: 1 })
 *   await persist(state.get())
 * })
 * ```
 */
export const createWriteQueue = (options: WriteQueueOptions = {}): WriteQueue => {
  const { onError } = options
  let tail: Promise<void> = Promise.resolve()
  let pendingCount = 0

  return {
    run: <T>(label: string, section: WriteSection<T>): Promise<T> => {
      pendingCount++

      const result = tail.then(() => section())

      // The tail only tracks completion; the caller observes the outcome through `result`
      tail = result.then(
        () => {
          pendingCount--
        },
        (error: unknown) => {
          pendingCount--
          onError?.(error, label)
        },
      )

      return result
    },

    flush: () => tail,

    pending: () => pendingCount,
  }
}
