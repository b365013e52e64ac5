/**
 * Beat Engine - Orientation Calculator
 *
 * Pure function from a motion to the orientation the prop ends in.
 *
 * Rules:
 * - Whole turns stay in the start category (radial / nonradial).
 *   pro flips on odd turns, anti and dash flip on even turns, static never flips.
 * - Half turns cross category; the rotation direction picks the member.
 * - Float is resolved to a concrete motion first and then turns half a turn
 *   against its resolved rotation.
 */

import { TurnsValidationError, beatKeywords, colorOrder, motionOf, withMotion } from '../vocabulary'
import type {
  Beat,
  ConcreteMotionType,
  MotionAttributes,
  Orientation,
  RotationDirection,
  Turns,
} from '../vocabulary'
import { handpathOf, reverseRotation, rotationOfHandpath } from '../geometry'
import type { OverrideStoreReader } from '../overrides'
import { isShiftMotionType, resolveEffectiveMotion } from './effectiveMotion'
import type { MotionContext } from './effectiveMotion'

const { orientations: ori, motionTypes, rotationDirections: rot, turns: turnsKeywords } = beatKeywords

// ============================================================================
// Tables
// ============================================================================

const oppositeOrientation: Readonly<Record<Orientation, Orientation>> = {
  [ori.in]: ori.out,
  [ori.out]: ori.in,
  [ori.clock]: ori.counter,
  [ori.counter]: ori.clock,
}

type HalfTurnKey = `${Orientation}|${Exclude<RotationDirection, 'no_rot'>}`

/**
 * Result of a pro half turn (0.5 mod 2). 1.5 mod 2 gives the opposite member.
 */
const proHalfTurn: ReadonlyMap<HalfTurnKey, Orientation> = new Map<HalfTurnKey, Orientation>([
  ['in|cw', ori.counter],
  ['in|ccw', ori.clock],
  ['out|cw', ori.clock],
  ['out|ccw', ori.counter],
  ['clock|cw', ori.in],
  ['clock|ccw', ori.out],
  ['counter|cw', ori.out],
  ['counter|ccw', ori.in],
])

// ============================================================================
// Validation
// ============================================================================

/**
 * Check a turns value against the motion type.
 * Returns the numeric turns, or null for a float.
 */
export function validateTurns(turns: Turns, motionType: MotionAttributes['motion_type']): number | null {
  if (turns === turnsKeywords.float) {
    if (motionType !== motionTypes.float) {
      throw new TurnsValidationError(`Turns "${turnsKeywords.float}" is only valid on a float motion, got ${motionType}`)
    }
    return null
  }

  if (typeof turns !== 'number' || !Number.isFinite(turns)) {
    throw new TurnsValidationError(`Turns must be a number or "${turnsKeywords.float}", got ${String(turns)}`)
  }
  if (turns < 0) {
    throw new TurnsValidationError(`Turns must not be negative, got ${turns}`)
  }
  if (!Number.isInteger(turns * 2)) {
    throw new TurnsValidationError(`Turns must be a multiple of 0.5, got ${turns}`)
  }
  if (motionType === motionTypes.float) {
    throw new TurnsValidationError(`A float motion carries turns "${turnsKeywords.float}", got ${turns}`)
  }
  return turns
}

// ============================================================================
// Orientation Rules
// ============================================================================

export function flipOrientation(orientation: Orientation): Orientation {
  return oppositeOrientation[orientation]
}

/**
 * anti and dash read the half-turn table the other way round
 */
function invertsParity(motionType: ConcreteMotionType): boolean {
  return motionType === motionTypes.anti || motionType === motionTypes.dash
}

function wholeTurnOrientation(start: Orientation, turns: number, motionType: ConcreteMotionType): Orientation {
  if (motionType === motionTypes.static) {
    return start
  }

  const even = turns % 2 === 0
  const flips = invertsParity(motionType) ? even : !even
  return flips ? flipOrientation(start) : start
}

function halfTurnOrientation(
  start: Orientation,
  turns: number,
  motionType: ConcreteMotionType,
  direction: RotationDirection,
): Orientation {
  if (direction === rot.none) {
    throw new TurnsValidationError(`A half turn (${turns}) needs a rotation direction`)
  }

  const base = proHalfTurn.get(`${start}|${direction}`)
  if (base === undefined) {
    throw new TurnsValidationError(`No half-turn rule for ${start} turning ${direction}`)
  }

  // 0.5 mod 2 keeps the table value for pro, 1.5 mod 2 takes the other member
  const firstHalf = turns % 2 === 0.5
  const keep = invertsParity(motionType) ? !firstHalf : firstHalf
  return keep ? base : flipOrientation(base)
}

/**
 * Orientation at the end of a motion
 *
 * @param motion - The motion (float motions are resolved through `context`)
 * @param context - Color, owning beat and override store, for float resolution
 */
export function calculateEndOrientation(motion: MotionAttributes, context?: MotionContext): Orientation {
  const turns = validateTurns(motion.turns, motion.motion_type)
  const concrete = resolveEffectiveMotion(motion, context)

  if (turns === null) {
    // A float undoes half a turn of the motion it replaces
    if (concrete.prop_rot_dir === rot.none) {
      return motion.start_ori
    }
    return halfTurnOrientation(motion.start_ori, 0.5, concrete.motion_type, reverseRotation(concrete.prop_rot_dir))
  }

  if (Number.isInteger(turns)) {
    return wholeTurnOrientation(motion.start_ori, turns, concrete.motion_type)
  }
  return halfTurnOrientation(motion.start_ori, turns, concrete.motion_type, concrete.prop_rot_dir)
}

/**
 * Copy of the beat with both end orientations recalculated
 */
export function withEndOrientations(beat: Beat, store?: OverrideStoreReader): Beat {
  return colorOrder.reduce<Beat>((current, color) => {
    const motion = motionOf(current, color)
    const end_ori = calculateEndOrientation(motion, { color, beat: current, store })
    return withMotion(current, color, { ...motion, end_ori })
  }, beat)
}

// ============================================================================
// Turns Edits
// ============================================================================

/**
 * Apply a new turns value to a motion, as the turns control of an editor does.
 *
 * - setting "fl" on a pro/anti motion turns it into a float and records the
 *   prefloat motion type and rotation
 * - setting a number on a float restores the recorded motion (or a pro
 *   following the hand path)
 * - dash and static motions lose their rotation at zero turns
 *
 * The end orientation is recalculated.
 */
export function applyTurns(motion: MotionAttributes, turns: Turns, context?: MotionContext): MotionAttributes {
  let next: MotionAttributes

  if (turns === turnsKeywords.float) {
    if (motion.motion_type === motionTypes.float) {
      next = motion
    } else if (isShiftMotionType(motion.motion_type)) {
      next = {
        ...motion,
        turns,
        motion_type: motionTypes.float,
        prop_rot_dir: rot.none,
        prefloat_motion_type: motion.motion_type,
        prefloat_prop_rot_dir: motion.prop_rot_dir,
      }
    } else {
      throw new TurnsValidationError(`A ${motion.motion_type} motion cannot float`)
    }
  } else if (motion.motion_type === motionTypes.float) {
    const restored = resolveEffectiveMotion(motion, context)
    next = {
      ...motion,
      prefloat_motion_type: undefined,
      prefloat_prop_rot_dir: undefined,
      turns,
      motion_type: restored.motion_type,
      prop_rot_dir:
        restored.prop_rot_dir === rot.none
          ? rotationOfHandpath(handpathOf(motion.start_loc, motion.end_loc))
          : restored.prop_rot_dir,
    }
  } else if (turns === 0 && !isShiftMotionType(motion.motion_type)) {
    next = { ...motion, turns, prop_rot_dir: rot.none }
  } else {
    next = { ...motion, turns }
  }

  return { ...next, end_ori: calculateEndOrientation(next, context) }
}
