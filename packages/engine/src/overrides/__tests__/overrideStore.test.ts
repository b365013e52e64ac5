/**
 * Override Store Tests
 *
 * Addressing, serialized writes, persistence and corrupt-file recovery.
 */

import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  createOverrideStore,
  generateTurnsTupleKey,
  loadOverrideStore,
  orientationCategoryOf,
  overrideKeyForBeat,
  recordArrowLocationOverride,
  recordPlacementOffsetOverride,
  recordPrefloatOverride,
} from '@beatgrid/engine'
import type { OverrideKey } from '@beatgrid/engine'
import { beat, motion } from '../../__fixtures__'

const key: OverrideKey = {
  gridMode: 'diamond',
  orientationCategory: 'from_layer1',
  letter: 'A',
  turnsTuple: '(s, 0, 0)',
}

// Letter A: both hands pro, clockwise, alpha1 → alpha3
const letterA = beat({
  letter: 'A',
  letter_type: 'Type1',
  blue: motion({ motion_type: 'pro', start_loc: 's', end_loc: 'w', prop_rot_dir: 'cw' }),
  red: motion({ motion_type: 'pro', start_loc: 'n', end_loc: 'e', prop_rot_dir: 'cw' }),
})

describe('Override Store', () => {
  describe('Keys', () => {
    it('should lead with s when both props rotate the same way', () => {
      const turning = beat({
        blue: motion({ motion_type: 'pro', start_loc: 's', end_loc: 'w', turns: 1, prop_rot_dir: 'cw' }),
        red: motion({ motion_type: 'pro', start_loc: 'n', end_loc: 'e', turns: 0.5, prop_rot_dir: 'cw' }),
      })
      expect(generateTurnsTupleKey(turning)).toBe('(s, 1, 0.5)')
    })

    it('should lead with o when the props rotate opposite ways', () => {
      const turning = beat({
        blue: motion({ motion_type: 'pro', start_loc: 's', end_loc: 'w', turns: 2, prop_rot_dir: 'cw' }),
        red: motion({ motion_type: 'anti', start_loc: 'n', end_loc: 'e', turns: 1.5, prop_rot_dir: 'ccw' }),
      })
      expect(generateTurnsTupleKey(turning)).toBe('(o, 2, 1.5)')
    })

    it('should drop the direction when a prop does not rotate', () => {
      const floating = beat({
        blue: motion({ motion_type: 'float', start_loc: 's', end_loc: 'w', turns: 'fl' }),
        red: motion({ motion_type: 'static', start_loc: 'n', end_loc: 'n' }),
      })
      expect(generateTurnsTupleKey(floating)).toBe('(fl, 0)')
    })

    it('should categorise by end orientation layers', () => {
      const mixed = beat({
        blue: motion({ motion_type: 'static', start_loc: 's', end_loc: 's', end_ori: 'out' }),
        red: motion({ motion_type: 'static', start_loc: 'n', end_loc: 'n', end_ori: 'clock' }),
      })
      expect(orientationCategoryOf(mixed)).toBe('from_layer3_blue1_red2')
      expect(orientationCategoryOf({ blue: mixed.red, red: mixed.blue })).toBe('from_layer3_blue2_red1')
    })

    it('should address a lettered beat and nothing else', () => {
      expect(overrideKeyForBeat(letterA)).toEqual(key)
      expect(overrideKeyForBeat({ ...letterA, letter: null })).toBeNull()
    })
  })

  describe('In Memory', () => {
    it('should look up what was set', async () => {
      const store = createOverrideStore()
      await store.set(key, { blue_offset: [10, -5], red_location: 'ne' })

      expect(store.lookup(key, 'blue_offset')).toEqual([10, -5])
      expect(store.lookup(key, 'red_location')).toBe('ne')
      expect(store.lookup({ ...key, letter: 'B' }, 'blue_offset')).toBeUndefined()
      expect(store.version()).toBe(1)
    })

    it('should announce each change to subscribers', async () => {
      const store = createOverrideStore()
      const changed = vi.fn()
      store.on('overrides:changed', changed)

      await store.set(key, { blue_offset: [1, 2] })

      expect(changed).toHaveBeenCalledWith({
        type: 'overrides:changed',
        key,
        entryKeys: ['blue_offset'],
      })
    })

    it('should prune empty tables when the last entry goes', async () => {
      const store = createOverrideStore()
      await store.set(key, { blue_offset: [1, 2] })

      await expect(store.remove(key, 'blue_offset')).resolves.toBe(true)
      await expect(store.remove(key, 'blue_offset')).resolves.toBe(false)
      expect(store.snapshot()).toEqual({})
    })

    it('should apply concurrent writes one after another', async () => {
      const store = createOverrideStore()
      const writes = [
        store.set(key, { blue_offset: [1, 1] }),
        store.set(key, { red_offset: [2, 2] }),
        store.set(key, { blue_offset: [3, 3] }),
      ]
      await Promise.all(writes)

      expect(store.entries(key)).toEqual({ blue_offset: [3, 3], red_offset: [2, 2] })
      expect(store.version()).toBe(3)
    })

    it('should hand out snapshots that do not alias the store', async () => {
      const store = createOverrideStore()
      await store.set(key, { blue_offset: [1, 2] })

      const snapshot = store.snapshot()
      delete snapshot.diamond
      expect(store.lookup(key, 'blue_offset')).toEqual([1, 2])
    })
  })

  describe('Persistence', () => {
    let directory: string

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'beatgrid-overrides-'))
      vi.spyOn(console, 'log').mockImplementation(() => undefined)
    })

    afterEach(async () => {
      vi.restoreAllMocks()
      await rm(directory, { recursive: true, force: true })
    })

    it('should start empty when the file does not exist', async () => {
      const store = await loadOverrideStore(join(directory, 'missing.json'))
      expect(store.snapshot()).toEqual({})
    })

    it('should write through to disk and load back', async () => {
      const path = join(directory, 'nested', 'overrides.json')
      const store = createOverrideStore({ path })
      const persisted = vi.fn()
      store.on('overrides:persisted', persisted)

      await store.set(key, { blue_location: 'sw' })
      await store.flush()

      expect(persisted).toHaveBeenCalledWith({ type: 'overrides:persisted', path })
      const reloaded = await loadOverrideStore(path)
      expect(reloaded.lookup(key, 'blue_location')).toBe('sw')
    })

    it('should leave memory and disk untouched when a write fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined)
      // A directory in the way makes the final rename fail
      const path = join(directory, 'overrides.json')
      await mkdir(path)
      const store = createOverrideStore({ path })
      const changed = vi.fn()
      store.on('overrides:changed', changed)

      await expect(store.set(key, { blue_offset: [1, 2] })).rejects.toThrow()

      expect(store.lookup(key, 'blue_offset')).toBeUndefined()
      expect(store.version()).toBe(0)
      expect(changed).not.toHaveBeenCalled()
      expect(await readdir(directory)).toEqual(['overrides.json'])
    })

    it('should discard a corrupt file and start over empty', async () => {
      const path = join(directory, 'overrides.json')
      await writeFile(path, '{ not json', 'utf8')
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)

      const store = await loadOverrideStore(path)

      expect(store.snapshot()).toEqual({})
      expect(error).toHaveBeenCalledTimes(1)
      expect(error.mock.calls[0]?.[0]).toBe('[OverrideStore] Discarding corrupt store:')
      expect(await readFile(path, 'utf8')).toBe('{}\n')
    })

    it('should discard a file with the wrong shape', async () => {
      const path = join(directory, 'overrides.json')
      await writeFile(path, JSON.stringify({ diamond: { from_layer1: { A: { '(0, 0)': { blue_offset: true } } } } }))
      vi.spyOn(console, 'error').mockImplementation(() => undefined)

      const store = await loadOverrideStore(path)
      expect(store.snapshot()).toEqual({})
    })
  })

  describe('Actions', () => {
    it('should record a prefloat choice on the motion and in the store', async () => {
      const store = createOverrideStore()
      const updated = await recordPrefloatOverride(store, letterA, 'blue', {
        motion_type: 'anti',
        prop_rot_dir: 'ccw',
      })

      expect(updated.blue.prefloat_motion_type).toBe('anti')
      expect(updated.blue.prefloat_prop_rot_dir).toBe('ccw')
      expect(store.entries(key)).toEqual({
        blue_prefloat_motion_type: 'anti',
        blue_prefloat_prop_rot_dir: 'ccw',
      })
    })

    it('should keep the prefloat choice on the motion only for an unlettered beat', async () => {
      const store = createOverrideStore()
      vi.spyOn(console, 'warn').mockImplementation(() => undefined)

      const updated = await recordPrefloatOverride(store, { ...letterA, letter: null }, 'red', {
        motion_type: 'pro',
        prop_rot_dir: 'cw',
      })

      expect(updated.red.prefloat_motion_type).toBe('pro')
      expect(store.snapshot()).toEqual({})
      vi.restoreAllMocks()
    })

    it('should key arrow locations by the motion path', async () => {
      const store = createOverrideStore()
      await expect(recordArrowLocationOverride(store, letterA, 'red', 'n')).resolves.toBe(true)
      await expect(recordPlacementOffsetOverride(store, letterA, 'red', [5, 5])).resolves.toBe(true)

      expect(store.entries(key)).toEqual({ 'red_location:n-e': 'n', red_offset: [5, 5] })
    })
  })
})
