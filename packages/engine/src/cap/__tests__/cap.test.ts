/**
 * CAP Tests
 *
 * Generation for every variant, preconditions and invariants, and the
 * verifier rebuilding what the generator made.
 */

import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  CapInvariantError,
  CapPreconditionError,
  classifyCap,
  detectCapVariant,
  generateCap,
  inferRotationSlice,
  isCapVariant,
} from '@beatgrid/engine'
import type { Beat, Location, MotionAttributes, Sequence } from '@beatgrid/engine'
import { beat, motion } from '../../__fixtures__'

// ============================================================================
// Builders
// ============================================================================

const pro = (start_loc: Location, end_loc: Location, prop_rot_dir: 'cw' | 'ccw') =>
  motion({ motion_type: 'pro', start_loc, end_loc, prop_rot_dir })

const anti = (start_loc: Location, end_loc: Location, prop_rot_dir: 'cw' | 'ccw') =>
  motion({ motion_type: 'anti', start_loc, end_loc, prop_rot_dir, end_ori: 'out' })

const still = (location: Location, fields: Partial<MotionAttributes> = {}) =>
  motion({ motion_type: 'static', start_loc: location, end_loc: location, ...fields })

const dash = (start_loc: Location, end_loc: Location) =>
  motion({ motion_type: 'dash', start_loc, end_loc, end_ori: 'out' })

const numbered = (beats: Array<Beat>): Sequence => ({
  beats: beats.map((entry, index) => ({ ...entry, beat_number: index + 1 })),
})

const endPositions = (sequence: Sequence) => sequence.beats.map((entry) => entry.end_pos)

// Letter A forward (alpha1 → alpha3) and back (alpha3 → alpha1)
const forwardA = beat({ letter: 'A', letter_type: 'Type1', blue: pro('s', 'w', 'cw'), red: pro('n', 'e', 'cw') })
const backA = beat({ letter: 'A', letter_type: 'Type1', blue: pro('w', 's', 'ccw'), red: pro('e', 'n', 'ccw') })

// ============================================================================
// Tests
// ============================================================================

describe('CAP', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('Strict Rotated', () => {
    // Half a turn in four beats: alpha1 → alpha5
    const halfTurn = numbered([
      forwardA,
      beat({ letter: 'A', letter_type: 'Type1', blue: pro('w', 'n', 'cw'), red: pro('e', 's', 'cw') }),
      beat({ letter: 'α', letter_type: 'Type6', blue: still('n'), red: still('s') }),
      beat({ letter: 'α', letter_type: 'Type6', blue: still('n'), red: still('s') }),
    ])

    it('should pick the halved slice for a half turn', () => {
      expect(inferRotationSlice(halfTurn.beats, 'alpha1')).toBe('halved')
    })

    it('should grow four beats into eight rotated by half a turn', () => {
      const grown = generateCap(halfTurn, 8, 'strict_rotated')

      expect(grown.beats).toHaveLength(8)
      expect(grown.beats.map((entry) => entry.beat_number)).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
      expect(endPositions(grown)).toEqual([
        'alpha3',
        'alpha5',
        'alpha5',
        'alpha5',
        'alpha7',
        'alpha1',
        'alpha1',
        'alpha1',
      ])
      // beat 5 ends half a turn from where beat 1 ended (alpha3 → alpha7)
      expect(grown.beats[4]).toMatchObject({
        letter: 'A',
        start_pos: 'alpha5',
        end_pos: 'alpha7',
        blue: { motion_type: 'pro', start_loc: 'n', end_loc: 'e', prop_rot_dir: 'cw', end_ori: 'in' },
        red: { motion_type: 'pro', start_loc: 's', end_loc: 'w', prop_rot_dir: 'cw', end_ori: 'in' },
      })
    })

    it('should be recognised by the verifier', () => {
      const grown = generateCap(halfTurn, 8, 'strict_rotated')

      expect(classifyCap(grown)).toEqual({
        is_strict_rotated: true,
        is_strict_mirrored: false,
        is_strict_swapped: false,
        is_mirrored_swapped: false,
        is_rotated_swapped: false,
        ends_at_start_pos: true,
        can_be_CAP: true,
        word: 'AAααAAαα',
      })
    })

    it('should round-trip any partial sequence doubled in length', () => {
      const partial = numbered([
        forwardA,
        beat({ letter: 'α', letter_type: 'Type6', blue: still('w'), red: still('e') }),
        beat({ letter: 'Φ-', letter_type: 'Type5', blue: dash('w', 'e'), red: dash('e', 'w') }),
      ])

      const grown = generateCap(partial, 6, 'strict_rotated')

      expect(endPositions(grown)).toEqual(['alpha3', 'alpha3', 'alpha7', 'alpha1', 'alpha1', 'alpha5'])
      expect(classifyCap(grown).is_strict_rotated).toBe(true)
    })

    it('should replay a quarter turn four times', () => {
      const quarter = numbered([forwardA, beat({ letter: 'α', blue: still('w'), red: still('e') })])
      expect(inferRotationSlice(quarter.beats, 'alpha1')).toBe('quartered')

      const grown = generateCap(quarter, 8, 'strict_rotated', { slice: 'quartered' })

      expect(endPositions(grown)).toEqual([
        'alpha3',
        'alpha3',
        'alpha5',
        'alpha5',
        'alpha7',
        'alpha7',
        'alpha1',
        'alpha1',
      ])
      expect(isCapVariant(grown, 'strict_rotated')).toBe(true)
    })
  })

  describe('Strict Mirrored', () => {
    const there = numbered([forwardA, backA])

    it('should reflect the first half and reverse its rotations', () => {
      const grown = generateCap(there, 4, 'strict_mirrored', { mirrorAxis: 'vertical' })

      expect(endPositions(grown)).toEqual(['alpha3', 'alpha1', 'alpha7', 'alpha1'])
      expect(grown.beats[2]).toMatchObject({
        blue: { start_loc: 's', end_loc: 'e', prop_rot_dir: 'ccw' },
        red: { start_loc: 'n', end_loc: 'w', prop_rot_dir: 'ccw' },
      })
      expect(detectCapVariant(grown)).toBe('strict_mirrored')
    })

    it('should require the first half to return to its start', () => {
      const away = numbered([forwardA])
      expect(() => generateCap(away, 2, 'strict_mirrored')).toThrow(CapPreconditionError)
    })
  })

  describe('Strict Swapped', () => {
    // Ends with the hands exchanged: alpha1 → alpha5
    const exchanged = numbered([
      beat({ letter: 'C', letter_type: 'Type1', blue: pro('s', 'w', 'cw'), red: anti('n', 'e', 'ccw') }),
      beat({ letter: 'C', letter_type: 'Type1', blue: pro('w', 'n', 'cw'), red: anti('e', 's', 'ccw') }),
    ])

    it('should hand each color the other color motion', () => {
      const grown = generateCap(exchanged, 4, 'strict_swapped')

      expect(endPositions(grown)).toEqual(['alpha3', 'alpha5', 'alpha7', 'alpha1'])
      expect(grown.beats[2]).toMatchObject({
        blue: { motion_type: 'anti', start_loc: 'n', end_loc: 'e', prop_rot_dir: 'ccw' },
        red: { motion_type: 'pro', start_loc: 's', end_loc: 'w', prop_rot_dir: 'cw' },
      })

      const properties = classifyCap(grown)
      expect(properties.is_strict_rotated).toBe(false)
      expect(properties.is_strict_swapped).toBe(true)
      expect(properties.word).toBe('CCCC')
    })
  })

  describe('Mirrored Swapped', () => {
    it('should mirror and exchange the colors', () => {
      const grown = generateCap(numbered([forwardA, backA]), 4, 'mirrored_swapped', { mirrorAxis: 'horizontal' })

      expect(endPositions(grown)).toEqual(['alpha3', 'alpha1', 'alpha7', 'alpha1'])
      expect(grown.beats[2]).toMatchObject({
        blue: { start_loc: 's', end_loc: 'e', prop_rot_dir: 'ccw' },
        red: { start_loc: 'n', end_loc: 'w', prop_rot_dir: 'ccw' },
      })
      expect(isCapVariant(grown, 'mirrored_swapped')).toBe(true)
      // On alpha positions this is also a vertical mirror, which is checked first
      expect(detectCapVariant(grown)).toBe('strict_mirrored')
    })
  })

  describe('Rotated Swapped', () => {
    it('should walk the other color hand path from each hand', () => {
      const partial = numbered([
        beat({ letter: 'C', letter_type: 'Type1', blue: pro('s', 'w', 'cw'), red: anti('n', 'e', 'ccw') }),
      ])

      const grown = generateCap(partial, 2, 'rotated_swapped')

      expect(grown.beats[1]).toMatchObject({
        start_pos: 'alpha3',
        end_pos: 'alpha5',
        blue: { motion_type: 'anti', start_loc: 'w', end_loc: 'n', prop_rot_dir: 'ccw' },
        red: { motion_type: 'pro', start_loc: 'e', end_loc: 's', prop_rot_dir: 'cw' },
      })
      expect(detectCapVariant(grown)).toBe('rotated_swapped')
    })
  })

  describe('Start Position', () => {
    it('should keep the start position out of the arithmetic and number it 0', () => {
      const partial: Sequence = {
        start_position_beat: beat({ beat_number: 3, letter: 'α', blue: still('s'), red: still('n') }),
        beats: numbered([forwardA, backA]).beats,
      }

      const grown = generateCap(partial, 4, 'strict_mirrored')

      expect(grown.start_position_beat?.beat_number).toBe(0)
      expect(grown.beats).toHaveLength(4)
      expect(grown.beats[2]?.beat_number).toBe(3)
    })
  })

  describe('Prefloat Fields', () => {
    it('should carry consistent prefloat fields', () => {
      const floating = numbered([
        beat({
          blue: motion({
            motion_type: 'float',
            start_loc: 's',
            end_loc: 'w',
            turns: 'fl',
            prefloat_motion_type: 'pro',
            prefloat_prop_rot_dir: 'cw',
          }),
          red: still('n'),
        }),
      ])

      const grown = generateCap(floating, 2, 'strict_rotated', { slice: 'halved' })

      expect(grown.beats[1]?.end_pos).toBe('beta1')
      expect(grown.beats[1]?.blue).toMatchObject({
        motion_type: 'float',
        start_loc: 'w',
        end_loc: 'n',
        prefloat_motion_type: 'pro',
        prefloat_prop_rot_dir: 'cw',
      })
    })

    it('should drop prefloat fields a motion cannot use', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      const stray = numbered([beat({ blue: pro('s', 'w', 'cw'), red: still('n', { prefloat_motion_type: 'pro' }) })])

      const grown = generateCap(stray, 2, 'strict_rotated', { slice: 'halved' })

      expect(grown.beats[1]?.red.prefloat_motion_type).toBeUndefined()
      expect(warn).toHaveBeenCalledWith('[CapGenerator] Dropping inconsistent prefloat fields on beat 2 (red)')
    })
  })

  describe('Failures', () => {
    it('should refuse lengths it cannot grow between', () => {
      expect(() => generateCap({ beats: [] }, 4, 'strict_rotated')).toThrow(CapPreconditionError)
      expect(() => generateCap(numbered([forwardA, backA]), 2, 'strict_rotated')).toThrow(CapPreconditionError)
    })

    it('should stop when the index map points before the first beat', () => {
      expect(() => generateCap(numbered([forwardA]), 4, 'strict_rotated')).toThrow(CapInvariantError)
    })
  })

  describe('Verifier', () => {
    it('should report nothing for a sequence too short to be circular', () => {
      expect(classifyCap(numbered([forwardA]))).toEqual({
        is_strict_rotated: false,
        is_strict_mirrored: false,
        is_strict_swapped: false,
        is_mirrored_swapped: false,
        is_rotated_swapped: false,
        ends_at_start_pos: false,
        can_be_CAP: true,
        word: 'A',
      })
    })

    it('should treat an empty sequence as not circular', () => {
      expect(classifyCap({ beats: [] })).toMatchObject({ ends_at_start_pos: false, can_be_CAP: false, word: '' })
    })

    it('should compare the whole position for ends_at_start_pos and the family for can_be_CAP', () => {
      const properties = classifyCap(numbered([forwardA, backA, forwardA]))
      expect(properties.ends_at_start_pos).toBe(false)
      expect(properties.can_be_CAP).toBe(true)
    })
  })
})
