/**
 * Beat Access
 *
 * Color-indexed reads and copy-on-write updates of a beat's motions.
 */

import { beatKeywords } from './keywords'
import type { Color } from './keywords'
import type { Beat, MotionAttributes } from './schemas'

const { colors } = beatKeywords

export const colorOrder: ReadonlyArray<Color> = [colors.blue, colors.red]

export function partnerColor(color: Color): Color {
  return color === colors.blue ? colors.red : colors.blue
}

export function motionOf(beat: Pick<Beat, 'blue' | 'red'>, color: Color): MotionAttributes {
  return color === colors.blue ? beat.blue : beat.red
}

/**
 * Copy of the beat with one color's motion replaced
 */
export function withMotion<TBeat extends Pick<Beat, 'blue' | 'red'>>(
  beat: TBeat,
  color: Color,
  motion: MotionAttributes,
): TBeat {
  return color === colors.blue ? { ...beat, blue: motion } : { ...beat, red: motion }
}
