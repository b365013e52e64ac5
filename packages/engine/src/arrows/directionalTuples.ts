/**
 * Beat Engine - Directional Tuples
 *
 * An arrow's placement offset is authored once, for the first quadrant, and
 * turned into the arrow's actual quadrant by one of these tuple sets.
 * Each set lists the (x, y) transform for quadrants 0..3.
 */

import { beatKeywords } from '../vocabulary'
import type { ConcreteMotionType, GridMode, Location, Offset, RotationDirection } from '../vocabulary'
import { compassOrder } from '../geometry'

const { motionTypes, gridModes } = beatKeywords

type Term = 'x' | '-x' | 'y' | '-y'
type TupleSet = readonly [readonly [Term, Term], readonly [Term, Term], readonly [Term, Term], readonly [Term, Term]]

const CLOCKWISE_TURN: TupleSet = [['x', 'y'], ['-y', 'x'], ['-x', '-y'], ['y', '-x']]
const COUNTER_TURN: TupleSet = [['-y', '-x'], ['x', '-y'], ['y', 'x'], ['-x', 'y']]
const BOX_SHIFT: TupleSet = [['-x', 'y'], ['-y', '-x'], ['x', '-y'], ['y', 'x']]
const DIAMOND_DASH_CW: TupleSet = [['x', '-y'], ['y', 'x'], ['-x', 'y'], ['-y', '-x']]
const DIAMOND_DASH_CCW: TupleSet = [['-x', '-y'], ['y', '-x'], ['x', 'y'], ['-y', 'x']]

type RotationTable = Readonly<Record<RotationDirection, TupleSet>>

const tupleSets: Readonly<Record<ConcreteMotionType, Readonly<Record<GridMode, RotationTable>>>> = {
  [motionTypes.pro]: {
    [gridModes.diamond]: { cw: CLOCKWISE_TURN, ccw: COUNTER_TURN, no_rot: CLOCKWISE_TURN },
    [gridModes.box]: { cw: BOX_SHIFT, ccw: CLOCKWISE_TURN, no_rot: CLOCKWISE_TURN },
  },
  [motionTypes.anti]: {
    [gridModes.diamond]: { cw: COUNTER_TURN, ccw: CLOCKWISE_TURN, no_rot: CLOCKWISE_TURN },
    [gridModes.box]: { cw: BOX_SHIFT, ccw: CLOCKWISE_TURN, no_rot: CLOCKWISE_TURN },
  },
  [motionTypes.static]: {
    [gridModes.diamond]: {
      cw: DIAMOND_DASH_CW,
      ccw: DIAMOND_DASH_CCW,
      no_rot: [['x', 'y'], ['-x', '-y'], ['-y', 'x'], ['y', '-x']],
    },
    [gridModes.box]: {
      cw: CLOCKWISE_TURN,
      ccw: COUNTER_TURN,
      no_rot: [['x', 'y'], ['-x', '-y'], ['-y', 'x'], ['y', '-x']],
    },
  },
  [motionTypes.dash]: {
    [gridModes.diamond]: {
      cw: DIAMOND_DASH_CW,
      ccw: DIAMOND_DASH_CCW,
      no_rot: [['x', 'y'], ['-y', '-x'], ['x', '-y'], ['y', 'x']],
    },
    [gridModes.box]: {
      cw: [['-y', 'x'], ['-x', '-y'], ['y', '-x'], ['x', 'y']],
      ccw: [['-x', 'y'], ['-y', '-x'], ['x', '-y'], ['y', 'x']],
      no_rot: CLOCKWISE_TURN,
    },
  },
}

function evaluate(term: Term, [x, y]: Offset): number {
  // `|| 0` turns -0 into 0
  switch (term) {
    case 'x':
      return x
    case '-x':
      return -x || 0
    case 'y':
      return y
    case '-y':
      return -y || 0
  }
}

/**
 * Offsets for all four quadrants
 */
export function directionalTuples(
  motionType: ConcreteMotionType,
  rotation: RotationDirection,
  gridMode: GridMode,
  base: Offset,
): ReadonlyArray<Offset> {
  return tupleSets[motionType][gridMode][rotation].map(
    ([xTerm, yTerm]): Offset => [evaluate(xTerm, base), evaluate(yTerm, base)],
  )
}

/**
 * Quadrant of an anchor: n/ne → 0, e/se → 1, s/sw → 2, w/nw → 3
 */
export function quadrantIndex(location: Location): number {
  return Math.floor(compassOrder.indexOf(location) / 2)
}
