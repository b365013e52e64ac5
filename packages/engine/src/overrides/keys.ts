/**
 * Beat Engine - Override Keys
 *
 * How a beat is addressed inside the override store:
 * `[gridMode][orientationCategory][letter][turnsTuple] -> { overrideKey: value }`.
 *
 * The turns tuple is part of the persisted file format; changing its
 * encoding orphans every existing entry.
 */

import { beatKeywords } from '../vocabulary'
import type {
  Beat,
  Color,
  GridMode,
  Letter,
  MotionAttributes,
  OrientationCategory,
  Orientation,
  Turns,
} from '../vocabulary'
import { gridModeOf } from '../geometry'

const { orientations, orientationCategories, rotationDirections } = beatKeywords

// ============================================================================
// Types
// ============================================================================

/**
 * Address of one entry table in the store
 */
export type OverrideKey = {
  gridMode: GridMode
  orientationCategory: OrientationCategory
  letter: Letter
  turnsTuple: string
}

// ============================================================================
// Turns Tuple
// ============================================================================

export function formatTurns(turns: Turns): string {
  return String(turns)
}

/**
 * Canonical turns tuple for a beat.
 *
 * When both props rotate the tuple leads with `s` (same direction) or
 * `o` (opposite direction): `(s, 1, 0.5)`. Otherwise it is just the two
 * turns values, blue first: `(0, fl)`.
 */
export function generateTurnsTupleKey(beat: Pick<Beat, 'blue' | 'red'>): string {
  const blue = formatTurns(beat.blue.turns)
  const red = formatTurns(beat.red.turns)
  const blueRot = beat.blue.prop_rot_dir
  const redRot = beat.red.prop_rot_dir

  if (blueRot === rotationDirections.none || redRot === rotationDirections.none) {
    return `(${blue}, ${red})`
  }

  const category = blueRot === redRot ? 's' : 'o'
  return `(${category}, ${blue}, ${red})`
}

// ============================================================================
// Orientation Category
// ============================================================================

export function isRadial(orientation: Orientation): boolean {
  return orientation === orientations.in || orientation === orientations.out
}

/**
 * Prop layer combination at the end of the beat
 */
export function orientationCategoryOf(beat: Pick<Beat, 'blue' | 'red'>): OrientationCategory {
  const blueRadial = isRadial(beat.blue.end_ori)
  const redRadial = isRadial(beat.red.end_ori)

  if (blueRadial && redRadial) return orientationCategories.layer1
  if (!blueRadial && !redRadial) return orientationCategories.layer2
  return blueRadial ? orientationCategories.layer3Blue1Red2 : orientationCategories.layer3Blue2Red1
}

/**
 * Store address for a beat; null while the beat has no letter
 */
export function overrideKeyForBeat(beat: Beat): OverrideKey | null {
  if (beat.letter === null) {
    return null
  }

  return {
    gridMode: gridModeOf(beat.blue.start_loc),
    orientationCategory: orientationCategoryOf(beat),
    letter: beat.letter,
    turnsTuple: generateTurnsTupleKey(beat),
  }
}

// ============================================================================
// Entry Keys
// ============================================================================

export const overrideEntryKeys = {
  prefloatMotionType: (color: Color) => `${color}_prefloat_motion_type`,
  prefloatRotation: (color: Color) => `${color}_prefloat_prop_rot_dir`,
  arrowLocation: (color: Color, motion: Pick<MotionAttributes, 'start_loc' | 'end_loc'>) =>
    `${color}_location:${motion.start_loc}-${motion.end_loc}`,
  placementOffset: (color: Color) => `${color}_offset`,
} as const
