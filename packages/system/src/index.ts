/**
 * @beatgrid/system
 *
 * Framework-agnostic infrastructure shared by the beat engine.
 *
 * Philosophy:
 * - Pure utilities, no framework dependencies
 * - Type-safe by default
 * - Minimal boilerplate
 *
 * ## Modules
 *
 * ### State Management
 * Lightweight atoms and subscriptions for in-process state.
 *
 * ### Event Bus
 * Typed fan-out of events over a discriminated union.
 *
 * ### Write Queue
 * Serialized exclusive sections for persisted state.
 *
 * @example
 * ```ts
 * import { createAtom, createEventBus, createWriteQueue } from '@beatgrid/system'
 *
 * const table = createAtom<Record<string, number>>({})
 * const events = createEventBus<{ type: 'table:changed'; key: string }>()
 * const queue = createWriteQueue()
 *
 * await queue.run('set', async () => {
 *   table.update((current) => ({ ...current, a: 1 }))
 *   await save(table.get())
 *   events.emit({ type: 'table:changed', key: 'a' })
 * })
 * ```
 */

// ============================================================================
// State Management
// ============================================================================

export * from './state'

// ============================================================================
// Event Bus
// ============================================================================

export * from './eventBus'

// ============================================================================
// Write Queue
// ============================================================================

export * from './writeQueue'
