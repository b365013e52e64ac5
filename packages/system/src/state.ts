/**
 * State Management
 *
 * Lightweight atoms and subscriptions for in-process state.
 *
 * Philosophy:
 * - Plain closures, no framework
 * - State is replaced, never edited in place
 * - Subscribers see every change synchronously, with the value it replaced
 */

/**
 * Create a subscription object
 * @param payload - The payload type delivered to subscribers
 */
export function createSubscription<TPayload>() {
  const subscribers = new Set<(payload: TPayload) => void>()

  return {
    subscribe: (callback: (payload: TPayload) => void): (() => void) => {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    notify: (payload: TPayload) => {
      subscribers.forEach((callback) => callback(payload))
    },
    clear: () => {
      subscribers.clear()
    },
    size: () => subscribers.size,
  }
}

export type Subscription<TPayload> = ReturnType<typeof createSubscription<TPayload>>

// ============================================================================
// Atom
// ============================================================================

export type AtomChange<T> = {
  next: T
  previous: T
  version: number
}

export type AtomOptions<T> = {
  /**
   * Writes equal to the current state are dropped. Defaults to `Object.is`.
   */
  equals?: (a: T, b: T) => boolean
}

/**
 * Create a versioned state atom.
 *
 * The version counts accepted writes, so a reader can tell whether
 * anything changed since it last looked without comparing values.
 */
export function createAtom<T>(initialState: T, options: AtomOptions<T> = {}) {
  const equals = options.equals ?? Object.is
  let state = initialState
  let version = 0
  const changes = createSubscription<AtomChange<T>>()

  const set = (next: T): boolean => {
    if (equals(state, next)) {
      return false
    }
    const previous = state
    state = next
    version++
    changes.notify({ next, previous, version })
    return true
  }

  return {
    get: () => state,
    version: () => version,
    set,
    update: (updater: (state: T) => T) => set(updater(state)),
    reset: () => set(initialState),
    subscribe: (callback: (change: AtomChange<T>) => void): (() => void) => changes.subscribe(callback),
  }
}

export type Atom<T> = ReturnType<typeof createAtom<T>>
