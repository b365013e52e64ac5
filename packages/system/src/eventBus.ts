/**
 * Type-Safe Event Bus
 *
 * A lightweight event bus over a discriminated union of events.
 * Subscribers pick an event `type` and receive the narrowed event.
 *
 * Philosophy:
 * - Type safety without compromise
 * - Simple subscription model
 * - Efficient event routing (one set of callbacks per type)
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Base shape for every event carried by a bus
 */
export type BusEvent = { readonly type: string }

/**
 * Narrow an event union to the member carrying a given type
 */
export type EventOfType<TEvent extends BusEvent, TType extends TEvent['type']> =
  Extract<TEvent, { type: TType }>

export type EventCallback<TEvent> = (event: TEvent) => void

export type Unsubscribe = () => void

/**
 * Event bus options
 */
export interface EventBusOptions<TEvent extends BusEvent> {
  /**
   * Optional error handler for callback errors.
   * If not provided, errors will be thrown.
   */
  onError?: (error: unknown, event: TEvent) => void
}

export interface EventBus<TEvent extends BusEvent> {
  /**
   * Subscribe to one event type. Returns an unsubscribe function.
   */
  on: <TType extends TEvent['type']>(
    type: TType,
    callback: EventCallback<EventOfType<TEvent, TType>>
  ) => Unsubscribe

  /**
   * Subscribe to every event.
   */
  onAny: (callback: EventCallback<TEvent>) => Unsubscribe

  /**
   * Emit an event to the subscribers of its type, then to `onAny` subscribers.
   */
  emit: (event: TEvent) => void

  clear: () => void

  /**
   * Number of active subscriptions
   */
  size: () => number
}

// ============================================================================
// Event Type Matching
// ============================================================================

/**
 * Check if an event carries the given type.
 *
 * @example
 * ```ts
 * bus.onAny((event) => {
 *   if (matchesEventType(event, 'store:changed')) {
 *     invalidate(event.keys)
 *   }
 * })
 * ```
 */
export function matchesEventType<TEvent extends BusEvent, TType extends TEvent['type']>(
  event: TEvent,
  type: TType
): event is EventOfType<TEvent, TType> {
  return event.type === type
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

/**
 * Create a new event bus instance.
 *
 * @example
 * ```ts
 * type StoreEvent =
 *   | { type: 'store:changed'; keys: Array<string> }
 *   | { type: 'store:reset'; reason: string }
 *
 * const bus = createEventBus<StoreEvent>()
 * const unsub = bus.on('store:changed', (event) => console.log(event.keys))
 * bus.emit({ type: 'store:changed', keys: ['diamond'] })
 * unsub()
 * ```
 */
export function createEventBus<TEvent extends BusEvent>(
  options: EventBusOptions<TEvent> = {}
): EventBus<TEvent> {
  // Map of event type -> Set of callbacks
  const subscriptions = new Map<string, Set<EventCallback<TEvent>>>()

  // Set of callbacks subscribed to all events
  const anySubscriptions = new Set<EventCallback<TEvent>>()

  const handleError =
    options.onError ||
    ((error: unknown) => {
      throw error
    })

  function addSubscription(type: string, callback: EventCallback<TEvent>): Unsubscribe {
    let callbacks = subscriptions.get(type)
    if (!callbacks) {
      callbacks = new Set()
      subscriptions.set(type, callbacks)
    }
    callbacks.add(callback)

    return () => {
      const cleanupCallbacks = subscriptions.get(type)
      if (cleanupCallbacks) {
        cleanupCallbacks.delete(callback)
        // Clean up empty sets
        if (cleanupCallbacks.size === 0) {
          subscriptions.delete(type)
        }
      }
    }
  }

  function invokeCallback(callback: EventCallback<TEvent>, event: TEvent): void {
    try {
      callback(event)
    } catch (error) {
      handleError(error, event)
    }
  }

  return {
    on(type, callback) {
      return addSubscription(type, (event) => {
        if (matchesEventType(event, type)) {
          callback(event)
        }
      })
    },

    onAny(callback) {
      anySubscriptions.add(callback)
      return () => {
        anySubscriptions.delete(callback)
      }
    },

    emit(event) {
      const callbacks = subscriptions.get(event.type)
      if (callbacks) {
        // Copy so callbacks may unsubscribe while we iterate
        Array.from(callbacks).forEach((callback) => invokeCallback(callback, event))
      }

      Array.from(anySubscriptions).forEach((callback) => invokeCallback(callback, event))
    },

    clear() {
      subscriptions.clear()
      anySubscriptions.clear()
    },

    size() {
      let count = anySubscriptions.size
      subscriptions.forEach((callbacks) => {
        count += callbacks.size
      })
      return count
    },
  }
}
