/**
 * Beat System Resources
 *
 * The stateful parts of the engine as braided resources. They start in
 * dependency order and halt in reverse.
 *
 * Dependency Graph:
 *
 *   config (no deps) - Validated engine configuration
 *       ↓
 *   overrideStore ← config - Loaded from disk, flushed on halt
 *       ↓
 *   referenceDataset ← config - Letter templates
 *       ↓
 *   beatEngine ← config, overrideStore, referenceDataset
 */

import { defineResource, haltSystem, startSystem } from 'braided'
import type { StartedResource, StartedSystem } from 'braided'
import { DatasetValidationError, validateEngineConfig } from '../vocabulary'
import type { EngineConfig, EngineConfigInput, ReferenceDataset } from '../vocabulary'
import { createOverrideStore, loadOverrideStore } from '../overrides'
import type { OverrideStore } from '../overrides'
import { loadReferenceDataset, recordCount } from '../letters'
import { createBeatEngine } from './beatEngine'

// ============================================================================
// Resources
// ============================================================================

export const createEngineConfigResource = (input: EngineConfigInput = {}) =>
  defineResource({
    dependencies: [],
    start: () => {
      const parsed = validateEngineConfig(input)
      if (!parsed.success) {
        throw new Error(`Invalid engine config: ${parsed.error.message}`)
      }
      return parsed.data
    },
    halt: () => {},
  })

export const overrideStoreResource = defineResource({
  dependencies: ['config'],
  start: async ({ config }: { config: EngineConfig }) => {
    if (!config.overrideStorePath) {
      console.log('[OverrideStore] No path configured, keeping overrides in memory')
      return createOverrideStore()
    }
    return loadOverrideStore(config.overrideStorePath)
  },
  halt: async (store: OverrideStore) => {
    await store.flush()
    console.log('[OverrideStore] Flushed')
  },
})

/**
 * Dataset from `config.datasetPath`, or the one handed in when no path is set
 */
export const createReferenceDatasetResource = (dataset?: ReferenceDataset) =>
  defineResource({
    dependencies: ['config'],
    start: async ({ config }: { config: EngineConfig }) => {
      const loaded = config.datasetPath ? await loadReferenceDataset(config.datasetPath) : dataset
      if (loaded === undefined) {
        throw new DatasetValidationError('No reference dataset: set datasetPath or pass a dataset')
      }
      console.log(`[ReferenceDataset] ${recordCount(loaded)} templates ready`)
      return loaded
    },
    halt: () => {},
  })

export const beatEngineResource = defineResource({
  dependencies: ['config', 'overrideStore', 'referenceDataset'],
  start: ({
    config,
    overrideStore,
    referenceDataset,
  }: {
    config: EngineConfig
    overrideStore: OverrideStore
    referenceDataset: ReferenceDataset
  }) => {
    console.log('[BeatEngine] Starting...')
    return createBeatEngine({ dataset: referenceDataset, store: overrideStore, config })
  },
  halt: (engine) => {
    console.log('[BeatEngine] Halting...')
    engine.dispose()
  },
})

export type BeatEngineResource = StartedResource<typeof beatEngineResource>

// ============================================================================
// System
// ============================================================================

export type BeatSystemOptions = {
  config?: EngineConfigInput
  dataset?: ReferenceDataset
}

export const createBeatSystemConfig = (options: BeatSystemOptions = {}) => {
  return {
    config: createEngineConfigResource(options.config),
    overrideStore: overrideStoreResource,
    referenceDataset: createReferenceDatasetResource(options.dataset),
    beatEngine: beatEngineResource,
  }
}

export type BeatSystem = StartedSystem<ReturnType<typeof createBeatSystemConfig>>

/**
 * Start every resource; throws if any of them failed
 */
export async function startBeatSystem(options: BeatSystemOptions = {}) {
  const systemConfig = createBeatSystemConfig(options)
  const result = await startSystem(systemConfig)

  if (result.errors.size > 0) {
    console.error('[BeatSystem] Started with errors:', result.errors)
    const details = Array.from(result.errors.entries())
      .map(([name, error]) => `${name}: ${error.message}`)
      .join(', ')
    await haltSystem(systemConfig, result.system)
    throw new Error(`Beat system failed to start: ${details}`)
  }

  const system: BeatSystem = result.system
  console.log('[BeatSystem] ✅ Started')

  return {
    system,
    halt: () => haltSystem(systemConfig, system),
  }
}
