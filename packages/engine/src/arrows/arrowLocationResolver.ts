/**
 * Beat Engine - Arrow Location Resolver
 *
 * Where an arrow is drawn. This is a render anchor, not the motion's start
 * or end location.
 *
 * Responsibilities:
 * - Static arrows anchor on their start location
 * - Dash arrows anchor through the dash tables (letter and turns decide which)
 * - Shift arrows (pro, anti, float) anchor between start and end, unless the
 *   override store pins them elsewhere
 * - Placement offsets rotate into the anchor's quadrant
 *
 * Philosophy:
 * - Same inputs and same store snapshot, same answer
 * - Optional table misses fall back to the start location; a shift between
 *   two points that are not a quarter apart is a malformed motion
 */

import {
  InvalidLocation,
  UnknownMotionType,
  beatKeywords,
  locationSchema,
  offsetSchema,
  partnerColor,
} from '../vocabulary'
import type {
  Beat,
  Color,
  GridMode,
  Letter,
  Location,
  MotionAttributes,
  Offset,
  PlacementConfig,
} from '../vocabulary'
import { handpathOf, opposite, rotate } from '../geometry'
import { overrideEntryKeys, overrideKeyForBeat } from '../overrides'
import type { OverrideStoreReader } from '../overrides'
import { resolveEffectiveMotion } from '../orientation'
import { doubleDashLetters, lambdaLetters, letterTypeOf } from '../letters/letterTypes'
import {
  doubleDashLocation,
  lambdaZeroTurnsLocation,
  nonZeroTurnsLocation,
  shiftComposedLocation,
  zeroTurnsLocation,
} from './dashTables'
import { directionalTuples, quadrantIndex } from './directionalTuples'

const { motionTypes, handpaths, rotationDirections: rot, letterTypes } = beatKeywords

// ============================================================================
// Types
// ============================================================================

/**
 * Letter context of the arrow being placed
 */
export type ArrowContext = {
  color: Color
  letter: Letter | null
  /** Owning beat, used to address the override store */
  beat?: Beat
  store?: OverrideStoreReader
}

export type ArrowPlacement = {
  location: Location
  offset: Offset
}

// ============================================================================
// Shift Arrows
// ============================================================================

/**
 * The compass point between the start and end of a quarter move
 * (n → e anchors on ne, ne → se anchors on e)
 */
export function shiftAnchor(motion: Pick<MotionAttributes, 'start_loc' | 'end_loc'>): Location {
  const handpath = handpathOf(motion.start_loc, motion.end_loc)
  switch (handpath) {
    case handpaths.clockwise:
      return rotate(motion.start_loc, rot.clockwise)
    case handpaths.counterClockwise:
      return rotate(motion.start_loc, rot.counterClockwise)
    default:
      throw new InvalidLocation(`${motion.start_loc}->${motion.end_loc}`, 'shift anchor')
  }
}

function overriddenLocation(motion: MotionAttributes, context: ArrowContext): Location | undefined {
  if (!context.store || !context.beat) {
    return undefined
  }
  const key = overrideKeyForBeat(context.beat)
  if (key === null) {
    return undefined
  }

  const parsed = locationSchema.safeParse(
    context.store.lookup(key, overrideEntryKeys.arrowLocation(context.color, motion)),
  )
  return parsed.success ? parsed.data : undefined
}

// ============================================================================
// Dash Arrows
// ============================================================================

const isZeroTurns = (motion: MotionAttributes) => motion.turns === 0

function nonZeroDashLocation(motion: MotionAttributes): Location {
  return nonZeroTurnsLocation(motion) ?? motion.start_loc
}

function isShiftFamily(motion: MotionAttributes): boolean {
  return (
    motion.motion_type === motionTypes.pro ||
    motion.motion_type === motionTypes.anti ||
    motion.motion_type === motionTypes.float
  )
}

function dashLocation(
  motion: MotionAttributes,
  partner: MotionAttributes,
  context: ArrowContext,
  gridMode: GridMode,
): Location {
  const { letter } = context

  if (letter !== null && doubleDashLetters.has(letter)) {
    if (isZeroTurns(motion) && isZeroTurns(partner)) {
      return doubleDashLocation(context.color, motion) ?? motion.start_loc
    }
    if (isZeroTurns(motion)) {
      return opposite(nonZeroDashLocation(partner))
    }
    return nonZeroDashLocation(motion)
  }

  if (!isZeroTurns(motion)) {
    return nonZeroDashLocation(motion)
  }

  if (letter !== null && lambdaLetters.has(letter)) {
    return lambdaZeroTurnsLocation(motion, partner.end_loc) ?? motion.start_loc
  }

  if (letter !== null && letterTypeOf(letter) === letterTypes.crossShift && isShiftFamily(partner)) {
    // Keyed on where the shift arrow is actually drawn, stored override included
    const shiftLocation =
      overriddenLocation(partner, { ...context, color: partnerColor(context.color) }) ?? shiftAnchor(partner)
    return shiftComposedLocation(gridMode, motion.start_loc, shiftLocation) ?? motion.start_loc
  }

  return zeroTurnsLocation(motion) ?? motion.start_loc
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Render anchor of one color's arrow
 *
 * @param motion - The arrow's motion
 * @param partner - The other color's motion in the same beat
 * @param context - Color, letter and (optionally) the beat and override store
 * @param gridMode - Grid the beat is drawn on
 */
export function resolveArrowLocation(
  motion: MotionAttributes,
  partner: MotionAttributes,
  context: ArrowContext,
  gridMode: GridMode,
): Location {
  const motionType: string = motion.motion_type
  switch (motionType) {
    case motionTypes.static:
      return motion.start_loc
    case motionTypes.dash:
      return dashLocation(motion, partner, context, gridMode)
    case motionTypes.pro:
    case motionTypes.anti:
    case motionTypes.float:
      return overriddenLocation(motion, context) ?? shiftAnchor(motion)
    default:
      throw new UnknownMotionType(motionType)
  }
}

function baseOffset(
  motion: MotionAttributes,
  context: ArrowContext,
  placement: PlacementConfig,
  collides: boolean,
): Offset {
  if (context.store && context.beat) {
    const key = overrideKeyForBeat(context.beat)
    if (key !== null) {
      const parsed = offsetSchema.safeParse(
        context.store.lookup(key, overrideEntryKeys.placementOffset(context.color)),
      )
      if (parsed.success) {
        return parsed.data
      }
    }
  }

  if (collides) {
    return placement.collision
  }
  if (motion.motion_type === motionTypes.dash) return placement.defaults.dash
  if (motion.motion_type === motionTypes.static) return placement.defaults.static
  return placement.defaults.shift
}

/**
 * Anchor plus pixel offset of one color's arrow.
 *
 * The base offset is the stored override for this color, or the configured
 * default for the motion family, or the collision offset when the partner's
 * arrow anchors on the same point. It is then turned into the anchor's
 * quadrant by the directional tuples of the resolved motion.
 */
export function resolveArrowPlacement(
  motion: MotionAttributes,
  partner: MotionAttributes,
  context: ArrowContext,
  gridMode: GridMode,
  placement: PlacementConfig,
): ArrowPlacement {
  const location = resolveArrowLocation(motion, partner, context, gridMode)
  const partnerLocation = resolveArrowLocation(
    partner,
    motion,
    { ...context, color: partnerColor(context.color) },
    gridMode,
  )

  const base = baseOffset(motion, context, placement, partnerLocation === location)
  const concrete = resolveEffectiveMotion(motion, {
    color: context.color,
    beat: context.beat,
    store: context.store,
  })
  const tuples = directionalTuples(concrete.motion_type, concrete.prop_rot_dir, gridMode, base)

  return { location, offset: tuples[quadrantIndex(location)] }
}
