/**
 * Beat Engine - CAP Generator
 *
 * Completes a partial sequence into a circular one. The loop is shared; the
 * strategy decides which beat to replay and how.
 *
 * The start position pseudo-beat never takes part in the index arithmetic.
 * It is carried through and handed back with beat number 0.
 */

import {
  CapInvariantError,
  CapPreconditionError,
  beatKeywords,
  colorOrder,
  motionOf,
  withMotion,
} from '../vocabulary'
import type { Beat, CapVariant, Color, MotionAttributes, PositionKey, Sequence } from '../vocabulary'
import { combine } from '../geometry'
import { isShiftMotionType, withEndOrientations } from '../orientation'
import type { OverrideStoreReader } from '../overrides'
import { capStrategyFor } from './strategies'
import type { CapStrategy, CapStrategyOptions } from './strategies'

const { motionTypes, rotationDirections } = beatKeywords

export type GenerateCapOptions = CapStrategyOptions & {
  store?: OverrideStoreReader
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Where the sequence starts: the start position beat when there is one,
 * otherwise the first beat's start
 */
export function initialPositionOf(sequence: Sequence): PositionKey {
  if (sequence.start_position_beat) {
    return sequence.start_position_beat.end_pos
  }
  const first = sequence.beats[0]
  if (first === undefined) {
    throw new CapPreconditionError('An empty sequence has no start position')
  }
  return first.start_pos
}

function hasPrefloatFields(motion: MotionAttributes): boolean {
  return motion.prefloat_motion_type !== undefined || motion.prefloat_prop_rot_dir !== undefined
}

function hasConsistentPrefloat(motion: MotionAttributes): boolean {
  return (
    motion.motion_type === motionTypes.float &&
    isShiftMotionType(motion.prefloat_motion_type) &&
    motion.prefloat_prop_rot_dir !== undefined &&
    motion.prefloat_prop_rot_dir !== rotationDirections.none
  )
}

function carryPrefloat(motion: MotionAttributes, color: Color, beatNumber: number): MotionAttributes {
  if (!hasPrefloatFields(motion) || hasConsistentPrefloat(motion)) {
    return motion
  }
  console.warn(`[CapGenerator] Dropping inconsistent prefloat fields on beat ${beatNumber} (${color})`)
  return { ...motion, prefloat_motion_type: undefined, prefloat_prop_rot_dir: undefined }
}

function nextBeat(strategy: CapStrategy, source: Beat, previous: Beat, store?: OverrideStoreReader): Beat {
  const draft = strategy.transform(source, previous)
  const beatNumber = previous.beat_number + 1

  const beat = colorOrder.reduce<Beat>(
    (current, color) => withMotion(current, color, carryPrefloat(motionOf(current, color), color, beatNumber)),
    {
      ...draft,
      beat_number: beatNumber,
      start_pos: previous.end_pos,
      end_pos: combine(draft.blue.end_loc, draft.red.end_loc),
    },
  )

  return withEndOrientations(beat, store)
}

// ============================================================================
// Generator
// ============================================================================

export function generateCap(
  partial: Sequence,
  targetLength: number,
  variant: CapVariant,
  options: GenerateCapOptions = {},
): Sequence {
  const length = partial.beats.length
  if (!Number.isInteger(targetLength) || length < 1 || length >= targetLength) {
    throw new CapPreconditionError(
      `Cannot grow a sequence of ${length} beats to ${targetLength}: need 1 <= length < target`,
    )
  }

  const strategy = capStrategyFor(variant, options)
  const reason = strategy.precondition(partial.beats, initialPositionOf(partial))
  if (reason !== null) {
    throw new CapPreconditionError(`${variant}: sequence ${reason}`)
  }

  const beats = [...partial.beats]
  for (let next = length + 1; next <= targetLength; next++) {
    const sourceNumber = strategy.indexMap(next, targetLength)
    const source = beats[sourceNumber - 1]
    const previous = beats[beats.length - 1]

    if (!Number.isInteger(sourceNumber) || sourceNumber < 1 || sourceNumber >= next || !source || !previous) {
      throw new CapInvariantError(
        `${variant} maps beat ${next} of ${targetLength} to beat ${sourceNumber}, outside 1..${next - 1}`,
      )
    }

    beats.push(nextBeat(strategy, source, previous, options.store))
  }

  return {
    start_position_beat: partial.start_position_beat && { ...partial.start_position_beat, beat_number: 0 },
    beats,
  }
}
