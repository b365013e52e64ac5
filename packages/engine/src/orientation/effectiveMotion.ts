/**
 * Beat Engine - Effective Motion
 *
 * A float motion does not say how the prop would have turned. Before any
 * calculator looks at it, it is resolved to a concrete motion:
 *
 * 1. the prefloat fields recorded on the motion itself
 * 2. the override store entry for this beat and color
 * 3. a pro motion following the hand path
 *
 * Every other motion type resolves to itself.
 */

import { beatKeywords, motionTypeSchema, rotationDirectionSchema } from '../vocabulary'
import type {
  Beat,
  Color,
  ConcreteMotionType,
  MotionAttributes,
  MotionType,
  RotationDirection,
  ShiftMotionType,
} from '../vocabulary'
import { handpathOf, rotationOfHandpath } from '../geometry'
import { overrideEntryKeys, overrideKeyForBeat } from '../overrides'
import type { OverrideStoreReader } from '../overrides'

const { motionTypes, rotationDirections } = beatKeywords

// ============================================================================
// Types
// ============================================================================

export type ConcreteMotion = {
  motion_type: ConcreteMotionType
  prop_rot_dir: RotationDirection
}

/**
 * Where a motion sits, for store lookups
 */
export type MotionContext = {
  color: Color
  beat?: Beat
  store?: OverrideStoreReader
}

// ============================================================================
// Resolution
// ============================================================================

export function isShiftMotionType(value: unknown): value is ShiftMotionType {
  return value === motionTypes.pro || value === motionTypes.anti
}

function isRotating(value: unknown): value is RotationDirection {
  return value === rotationDirections.clockwise || value === rotationDirections.counterClockwise
}

export function isConcreteMotionType(motionType: MotionType): motionType is ConcreteMotionType {
  return motionType !== motionTypes.float
}

function fromRecordedFields(motion: MotionAttributes): ConcreteMotion | null {
  const { prefloat_motion_type, prefloat_prop_rot_dir } = motion
  if (isShiftMotionType(prefloat_motion_type) && isRotating(prefloat_prop_rot_dir)) {
    return { motion_type: prefloat_motion_type, prop_rot_dir: prefloat_prop_rot_dir }
  }
  return null
}

function fromStore(context: MotionContext | undefined): ConcreteMotion | null {
  if (!context?.store || !context.beat) {
    return null
  }

  const key = overrideKeyForBeat(context.beat)
  if (key === null) {
    return null
  }

  const motionType = motionTypeSchema.safeParse(
    context.store.lookup(key, overrideEntryKeys.prefloatMotionType(context.color)),
  )
  const rotation = rotationDirectionSchema.safeParse(
    context.store.lookup(key, overrideEntryKeys.prefloatRotation(context.color)),
  )

  if (motionType.success && rotation.success && isShiftMotionType(motionType.data) && isRotating(rotation.data)) {
    return { motion_type: motionType.data, prop_rot_dir: rotation.data }
  }
  return null
}

/**
 * Resolve a motion to the concrete motion every calculator works with
 */
export function resolveEffectiveMotion(motion: MotionAttributes, context?: MotionContext): ConcreteMotion {
  const motionType = motion.motion_type
  if (isConcreteMotionType(motionType)) {
    return { motion_type: motionType, prop_rot_dir: motion.prop_rot_dir }
  }

  return (
    fromRecordedFields(motion) ??
    fromStore(context) ?? {
      motion_type: motionTypes.pro,
      prop_rot_dir: rotationOfHandpath(handpathOf(motion.start_loc, motion.end_loc)),
    }
  )
}
