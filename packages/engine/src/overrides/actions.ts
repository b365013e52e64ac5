/**
 * Beat Engine - Override Actions
 *
 * The interactive edits that write to the override store. Each action
 * addresses the store through the beat's own letter, grid mode, orientation
 * category and turns tuple; a beat without a letter cannot be overridden.
 */

import { motionOf, withMotion } from '../vocabulary'
import type { Beat, Color, Location, Offset, RotationDirection, ShiftMotionType } from '../vocabulary'
import { overrideEntryKeys, overrideKeyForBeat } from './keys'
import type { OverrideStore } from './overrideStore'

export type PrefloatChoice = {
  motion_type: ShiftMotionType
  prop_rot_dir: RotationDirection
}

/**
 * Record what a float motion was before it floated.
 * The choice is written onto the motion itself and into the store, so
 * later beats with the same letter and turns resolve the same way.
 */
export async function recordPrefloatOverride(
  store: OverrideStore,
  beat: Beat,
  color: Color,
  choice: PrefloatChoice,
): Promise<Beat> {
  const updated = withMotion(beat, color, {
    ...motionOf(beat, color),
    prefloat_motion_type: choice.motion_type,
    prefloat_prop_rot_dir: choice.prop_rot_dir,
  })

  const key = overrideKeyForBeat(updated)
  if (key === null) {
    console.warn(`[OverrideStore] Beat ${beat.beat_number} has no letter, prefloat kept on the motion only`)
    return updated
  }

  await store.set(key, {
    [overrideEntryKeys.prefloatMotionType(color)]: choice.motion_type,
    [overrideEntryKeys.prefloatRotation(color)]: choice.prop_rot_dir,
  })
  return updated
}

/**
 * Pin the arrow of one color to a location. Returns false when the beat has no letter.
 */
export async function recordArrowLocationOverride(
  store: OverrideStore,
  beat: Beat,
  color: Color,
  location: Location,
): Promise<boolean> {
  const key = overrideKeyForBeat(beat)
  if (key === null) {
    return false
  }

  await store.set(key, { [overrideEntryKeys.arrowLocation(color, motionOf(beat, color))]: location })
  return true
}

/**
 * Replace the base placement offset of one color's arrow. Returns false when the beat has no letter.
 */
export async function recordPlacementOffsetOverride(
  store: OverrideStore,
  beat: Beat,
  color: Color,
  offset: Offset,
): Promise<boolean> {
  const key = overrideKeyForBeat(beat)
  if (key === null) {
    return false
  }

  await store.set(key, { [overrideEntryKeys.placementOffset(color)]: offset })
  return true
}
