/**
 * Beat Engine - Override Store
 *
 * Persisted table of manual overrides, passed explicitly into every
 * calculator that consults it (there is no global instance).
 *
 * Responsibilities:
 * - Serve reads from an immutable in-memory snapshot
 * - Serialize writes: persist -> swap in memory -> notify, one at a time
 * - Persist transactionally (temp file + rename)
 * - Recover from a corrupt file by starting empty
 *
 * Philosophy:
 * - Readers never wait and never see a half-applied write
 * - A broken file is logged, never fatal
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { createAtom, createEventBus, createWriteQueue } from '@beatgrid/system'
import type { Unsubscribe } from '@beatgrid/system'
import {
  OverrideStoreCorrupt,
  gridModeSchema,
  letterSchema,
  orientationCategorySchema,
} from '../vocabulary'
import type { GridMode, Letter, OrientationCategory } from '../vocabulary'
import type { OverrideKey } from './keys'

// ============================================================================
// Schemas & Types
// ============================================================================

export const overrideValueSchema = z.union([
  z.string(),
  z.number(),
  z.tuple([z.number(), z.number()]),
])

export type OverrideValue = z.infer<typeof overrideValueSchema>

export type OverrideEntries = Record<string, OverrideValue>

export type OverrideStoreData = Partial<
  Record<GridMode, Partial<Record<OrientationCategory, Partial<Record<Letter, Record<string, OverrideEntries>>>>>>
>

export const overrideStoreDataSchema = z.record(
  gridModeSchema,
  z.record(
    orientationCategorySchema,
    z.record(letterSchema, z.record(z.string(), z.record(z.string(), overrideValueSchema))),
  ),
)

export type OverrideStoreEvent =
  | { type: 'overrides:changed'; key: OverrideKey; entryKeys: Array<string> }
  | { type: 'overrides:reset' }
  | { type: 'overrides:persisted'; path: string }

/**
 * Read side of the store. Calculators depend on this, not on the full store.
 */
export interface OverrideStoreReader {
  lookup: (key: OverrideKey, entryKey: string) => OverrideValue | undefined
}

export type OverrideStore = OverrideStoreReader & {
  readonly path: string | undefined
  entries: (key: OverrideKey) => Readonly<OverrideEntries> | undefined
  snapshot: () => OverrideStoreData
  version: () => number
  set: (key: OverrideKey, entries: Readonly<OverrideEntries>) => Promise<void>
  remove: (key: OverrideKey, entryKey: string) => Promise<boolean>
  clear: () => Promise<void>
  flush: () => Promise<void>
  on: <TType extends OverrideStoreEvent['type']>(
    type: TType,
    callback: (event: Extract<OverrideStoreEvent, { type: TType }>) => void,
  ) => Unsubscribe
}

export type OverrideStoreOptions = {
  /** File the store persists to. Without it the store lives in memory only. */
  path?: string
  data?: OverrideStoreData
}

// ============================================================================
// Pure Helpers
// ============================================================================

function entriesAt(data: OverrideStoreData, key: OverrideKey): OverrideEntries | undefined {
  return data[key.gridMode]?.[key.orientationCategory]?.[key.letter]?.[key.turnsTuple]
}

/**
 * Copy of `data` with entries merged into one table
 */
export function withOverrides(
  data: OverrideStoreData,
  key: OverrideKey,
  entries: Readonly<OverrideEntries>,
): OverrideStoreData {
  const next = structuredClone(data)
  const categories = (next[key.gridMode] ??= {})
  const letters = (categories[key.orientationCategory] ??= {})
  const tuples = (letters[key.letter] ??= {})
  tuples[key.turnsTuple] = { ...tuples[key.turnsTuple], ...entries }
  return next
}

/**
 * Copy of `data` with one entry removed; empty branches are pruned
 */
export function withoutOverride(data: OverrideStoreData, key: OverrideKey, entryKey: string): OverrideStoreData {
  const next = structuredClone(data)
  const categories = next[key.gridMode]
  const letters = categories?.[key.orientationCategory]
  const tuples = letters?.[key.letter]
  const entries = tuples?.[key.turnsTuple]
  if (!categories || !letters || !tuples || !entries) {
    return next
  }

  delete entries[entryKey]
  if (Object.keys(entries).length === 0) delete tuples[key.turnsTuple]
  if (Object.keys(tuples).length === 0) delete letters[key.letter]
  if (Object.keys(letters).length === 0) delete categories[key.orientationCategory]
  if (Object.keys(categories).length === 0) delete next[key.gridMode]
  return next
}

/**
 * Parse a store file's text. Throws on malformed JSON or shape.
 */
export function parseOverrideStore(text: string): OverrideStoreData {
  const json: unknown = JSON.parse(text)
  return overrideStoreDataSchema.parse(json)
}

// ============================================================================
// Store
// ============================================================================

async function persist(path: string, data: OverrideStoreData): Promise<void> {
  const tempPath = `${path}.tmp`
  await mkdir(dirname(path), { recursive: true })
  try {
    await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8')
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

/**
 * Create an override store over in-memory data
 *
 * @example
 * ```ts
 * const store = createOverrideStore({ path: './overrides.json' })
 * await store.set(key, { [overrideEntryKeys.placementOffset('blue')]: [10, -5] })
 * store.lookup(key, 'blue_offset') // [10, -5]
 * ```
 */
export function createOverrideStore(options: OverrideStoreOptions = {}): OverrideStore {
  const { path } = options
  const state = createAtom<OverrideStoreData>(options.data ?? {})
  const events = createEventBus<OverrideStoreEvent>({
    onError: (error, event) => console.error(`[OverrideStore] ${event.type} subscriber failed:`, error),
  })
  const queue = createWriteQueue({
    onError: (error, label) => console.error(`[OverrideStore] ${label} failed:`, error),
  })

  // Memory only moves once the file has; a failed write leaves both untouched
  const commit = async (next: OverrideStoreData, event: OverrideStoreEvent) => {
    if (path) {
      await persist(path, next)
    }
    state.set(next)
    if (path) {
      events.emit({ type: 'overrides:persisted', path })
    }
    events.emit(event)
  }

  return {
    path,

    lookup: (key, entryKey) => entriesAt(state.get(), key)?.[entryKey],

    entries: (key) => entriesAt(state.get(), key),

    snapshot: () => structuredClone(state.get()),

    version: () => state.version(),

    set: (key, entries) =>
      queue.run('set', () =>
        commit(withOverrides(state.get(), key, entries), {
          type: 'overrides:changed',
          key,
          entryKeys: Object.keys(entries),
        }),
      ),

    remove: (key, entryKey) =>
      queue.run('remove', async () => {
        if (entriesAt(state.get(), key)?.[entryKey] === undefined) {
          return false
        }
        await commit(withoutOverride(state.get(), key, entryKey), {
          type: 'overrides:changed',
          key,
          entryKeys: [entryKey],
        })
        return true
      }),

    clear: () => queue.run('clear', () => commit({}, { type: 'overrides:reset' })),

    flush: () => queue.flush(),

    on: (type, callback) => events.on(type, callback),
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Load a store from disk.
 * A missing file starts empty; a corrupt one is logged, replaced by an empty
 * store and rewritten.
 */
export async function loadOverrideStore(path: string): Promise<OverrideStore> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      console.log(`[OverrideStore] No store at ${path}, starting empty`)
      return createOverrideStore({ path })
    }
    throw error
  }

  try {
    const data = parseOverrideStore(text)
    console.log(`[OverrideStore] Loaded ${path}`)
    return createOverrideStore({ path, data })
  } catch (cause) {
    console.error('[OverrideStore] Discarding corrupt store:', new OverrideStoreCorrupt(path, cause))
    const store = createOverrideStore({ path })
    await store.clear()
    return store
  }
}
