/**
 * Arrow Location Tests
 *
 * Anchors for static, dash and shift arrows, overrides and pixel placement.
 */

import { describe, expect, it } from 'vitest'
import {
  createOverrideStore,
  directionalTuples,
  engineConfigSchema,
  overrideKeyForBeat,
  quadrantIndex,
  resolveArrowLocation,
  resolveArrowPlacement,
  shiftAnchor,
} from '@beatgrid/engine'
import type { ArrowContext, MotionAttributes } from '@beatgrid/engine'
import { beat, motion } from '../../__fixtures__'

const { placement } = engineConfigSchema.parse({})

const blue = (letter: ArrowContext['letter']): ArrowContext => ({ color: 'blue', letter })
const red = (letter: ArrowContext['letter']): ArrowContext => ({ color: 'red', letter })

const still = (location: MotionAttributes['start_loc']) =>
  motion({ motion_type: 'static', start_loc: location, end_loc: location })

const dash = (start_loc: MotionAttributes['start_loc'], end_loc: MotionAttributes['end_loc'], turns = 0, prop_rot_dir: MotionAttributes['prop_rot_dir'] = 'no_rot') =>
  motion({ motion_type: 'dash', start_loc, end_loc, turns, prop_rot_dir })

const letterA = beat({
  letter: 'A',
  blue: motion({ motion_type: 'pro', start_loc: 's', end_loc: 'w', prop_rot_dir: 'cw' }),
  red: motion({ motion_type: 'pro', start_loc: 'n', end_loc: 'e', prop_rot_dir: 'cw' }),
})

describe('Arrow Location Resolver', () => {
  describe('Static', () => {
    it('should anchor on the start location', () => {
      expect(resolveArrowLocation(still('n'), still('s'), blue('α'), 'diamond')).toBe('n')
    })
  })

  describe('Shift', () => {
    it('should anchor between start and end', () => {
      expect(shiftAnchor({ start_loc: 'n', end_loc: 'e' })).toBe('ne')
      expect(shiftAnchor({ start_loc: 'ne', end_loc: 'se' })).toBe('e')
      expect(shiftAnchor({ start_loc: 's', end_loc: 'e' })).toBe('se')
    })

    it('should anchor pro, anti and float motions the same way', () => {
      const float = motion({ motion_type: 'float', start_loc: 's', end_loc: 'w', turns: 'fl' })
      expect(resolveArrowLocation(letterA.blue, letterA.red, blue('A'), 'diamond')).toBe('sw')
      expect(resolveArrowLocation(float, still('n'), blue('W'), 'diamond')).toBe('sw')
    })

    it('should let a stored location win', async () => {
      const store = createOverrideStore()
      await store.set(
        { gridMode: 'diamond', orientationCategory: 'from_layer1', letter: 'A', turnsTuple: '(s, 0, 0)' },
        { 'red_location:n-e': 'n' },
      )

      const context: ArrowContext = { ...red('A'), beat: letterA, store }
      expect(resolveArrowLocation(letterA.red, letterA.blue, context, 'diamond')).toBe('n')
      expect(resolveArrowLocation(letterA.red, letterA.blue, red('A'), 'diamond')).toBe('ne')
    })

    it('should give the same anchor for the same inputs', () => {
      const first = resolveArrowLocation(letterA.red, letterA.blue, red('A'), 'diamond')
      const second = resolveArrowLocation(letterA.red, letterA.blue, red('A'), 'diamond')
      expect(second).toBe(first)
    })
  })

  describe('Dash', () => {
    it('should use the default table at zero turns', () => {
      expect(resolveArrowLocation(dash('s', 'n'), still('s'), blue('Φ'), 'diamond')).toBe('w')
      expect(resolveArrowLocation(dash('ne', 'sw'), still('ne'), blue(null), 'box')).toBe('se')
    })

    it('should key turning dashes on their rotation and start', () => {
      expect(resolveArrowLocation(dash('n', 's', 1, 'cw'), still('n'), blue('Φ'), 'diamond')).toBe('e')
      expect(resolveArrowLocation(dash('n', 's', 1, 'ccw'), still('n'), blue('Φ'), 'diamond')).toBe('w')
    })

    it('should place both arrows of a zero-turn double dash by color', () => {
      expect(resolveArrowLocation(dash('s', 'n'), dash('n', 's'), blue('Φ-'), 'diamond')).toBe('w')
      expect(resolveArrowLocation(dash('n', 's'), dash('s', 'n'), red('Φ-'), 'diamond')).toBe('e')
    })

    it('should put a still dash opposite a turning partner in a double dash', () => {
      const turning = dash('n', 's', 1, 'cw')
      expect(resolveArrowLocation(dash('s', 'n'), turning, blue('Ψ-'), 'diamond')).toBe('w')
      expect(resolveArrowLocation(turning, dash('s', 'n'), red('Ψ-'), 'diamond')).toBe('e')
    })

    it('should place a lambda dash against the partner end', () => {
      expect(resolveArrowLocation(dash('w', 'e'), still('n'), blue('Λ'), 'diamond')).toBe('s')
    })

    it('should place a cross-shift dash against the shift anchor', () => {
      const shift = motion({ motion_type: 'pro', start_loc: 'n', end_loc: 'e', prop_rot_dir: 'cw' })
      expect(resolveArrowLocation(dash('w', 'e'), shift, blue('W-'), 'diamond')).toBe('s')
    })

    it('should follow a shift arrow that was moved by an override', async () => {
      const crossShift = beat({
        letter: 'W-',
        blue: dash('w', 'e'),
        red: motion({ motion_type: 'pro', start_loc: 'n', end_loc: 'e', prop_rot_dir: 'cw' }),
      })
      const key = overrideKeyForBeat(crossShift)
      if (key === null) throw new Error('beat has no letter')
      const store = createOverrideStore()
      await store.set(key, { 'red_location:n-e': 'se' })

      const context: ArrowContext = { color: 'blue', letter: 'W-', beat: crossShift, store }
      expect(resolveArrowLocation(crossShift.red, crossShift.blue, { ...context, color: 'red' }, 'diamond')).toBe('se')
      expect(resolveArrowLocation(crossShift.blue, crossShift.red, context, 'diamond')).toBe('n')
    })

    it('should use the box table for a cross-shift dash on the box grid', () => {
      const shift = motion({ motion_type: 'pro', start_loc: 'nw', end_loc: 'ne', prop_rot_dir: 'cw' })
      expect(shiftAnchor(shift)).toBe('n')
      expect(resolveArrowLocation(dash('ne', 'sw'), shift, blue('W-'), 'box')).toBe('se')
    })

    it('should fall back to the start location on a table miss', () => {
      expect(resolveArrowLocation(dash('w', 'e'), still('w'), blue('Λ'), 'diamond')).toBe('w')
    })
  })

  describe('Placement', () => {
    it('should turn the base offset into the anchor quadrant', () => {
      expect(quadrantIndex('n')).toBe(0)
      expect(quadrantIndex('e')).toBe(1)
      expect(quadrantIndex('sw')).toBe(2)
      expect(quadrantIndex('nw')).toBe(3)
      expect(directionalTuples('pro', 'ccw', 'diamond', [10, 20])).toEqual([
        [-20, -10],
        [10, -20],
        [20, 10],
        [-10, 20],
      ])
    })

    it('should never produce negative zero', () => {
      expect(directionalTuples('dash', 'no_rot', 'diamond', [0, 45])).toEqual([
        [0, 45],
        [-45, 0],
        [0, -45],
        [45, 0],
      ])
    })

    it('should offset a shift arrow by the configured default', () => {
      expect(resolveArrowPlacement(letterA.blue, letterA.red, blue('A'), 'diamond', placement)).toEqual({
        location: 'sw',
        offset: [-40, -40],
      })
      expect(resolveArrowPlacement(letterA.red, letterA.blue, red('A'), 'diamond', placement)).toEqual({
        location: 'ne',
        offset: [40, 40],
      })
    })

    it('should use the collision offset when both arrows share an anchor', () => {
      const together = motion({ motion_type: 'pro', start_loc: 's', end_loc: 'w', prop_rot_dir: 'cw' })
      expect(resolveArrowPlacement(together, together, blue('G'), 'diamond', placement)).toEqual({
        location: 'sw',
        offset: [-60, -20],
      })
    })

    it('should prefer a stored offset', async () => {
      const store = createOverrideStore()
      await store.set(
        { gridMode: 'diamond', orientationCategory: 'from_layer1', letter: 'A', turnsTuple: '(s, 0, 0)' },
        { blue_offset: [10, 4] },
      )

      const context: ArrowContext = { ...blue('A'), beat: letterA, store }
      expect(resolveArrowPlacement(letterA.blue, letterA.red, context, 'diamond', placement).offset).toEqual([-10, -4])
    })
  })
})
