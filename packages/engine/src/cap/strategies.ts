/**
 * Beat Engine - CAP Strategies
 *
 * A circular sequence is completed by replaying its first part. Every variant
 * answers two questions and the generator loop does the rest:
 *
 * - which earlier beat the next beat is drawn from (indexMap)
 * - how that beat's motions are re-expressed from where the previous beat ended (transform)
 *
 * Index arithmetic is in beat numbers, the start position excluded.
 */

import { beatKeywords, colorOrder, motionOf, partnerColor } from '../vocabulary'
import type {
  Beat,
  CapSlice,
  CapVariant,
  Color,
  Location,
  MirrorAxis,
  MotionAttributes,
  PositionKey,
} from '../vocabulary'
import {
  combine,
  compassOrder,
  gridModeOf,
  handpathOf,
  mirror,
  positionLocations,
  reverseRotation,
  rotateByHandpath,
} from '../geometry'

const { capVariants, capSlices, mirrorAxes, colors } = beatKeywords

// ============================================================================
// Types
// ============================================================================

/**
 * Fields of a generated beat decided by the source beat. Positions, beat
 * number and end orientations are filled in by the generator.
 */
export type CapDraft = Pick<Beat, 'letter' | 'letter_type' | 'timing' | 'direction' | 'blue' | 'red'>

export type CapStrategy = {
  variant: CapVariant
  slice: CapSlice
  indexMap: (nextBeatNumber: number, targetLength: number) => number
  transform: (source: Beat, previous: Beat) => CapDraft
  /**
   * Reason the partial sequence cannot be completed, or null
   */
  precondition: (beats: ReadonlyArray<Beat>, initialPosition: PositionKey) => string | null
}

export type CapStrategyOptions = {
  slice?: CapSlice
  mirrorAxis?: MirrorAxis
}

type MotionTransform = (source: MotionAttributes, previous: MotionAttributes) => MotionAttributes

// ============================================================================
// Index Maps
// ============================================================================

function sliceLength(slice: CapSlice, targetLength: number): number {
  return slice === capSlices.quartered ? Math.floor(targetLength / 4) : Math.floor(targetLength / 2)
}

function forwardIndexMap(slice: CapSlice) {
  return (nextBeatNumber: number, targetLength: number) => nextBeatNumber - sliceLength(slice, targetLength)
}

// ============================================================================
// Motion Transforms
// ============================================================================

function continueFrom(previous: MotionAttributes, source: MotionAttributes, end_loc: Location): MotionAttributes {
  return {
    ...source,
    start_loc: previous.end_loc,
    start_ori: previous.end_ori,
    end_loc,
  }
}

/**
 * Same hand path as the source, walked from where the hand is now
 */
const rotatedMotion: MotionTransform = (source, previous) => {
  const handpath = handpathOf(source.start_loc, source.end_loc)
  return continueFrom(previous, source, rotateByHandpath(previous.end_loc, handpath, gridModeOf(previous.end_loc)))
}

function mirroredMotion(axis: MirrorAxis): MotionTransform {
  return (source, previous) => {
    const mirrored = continueFrom(previous, source, mirror(source.end_loc, axis))
    return {
      ...mirrored,
      prop_rot_dir: reverseRotation(source.prop_rot_dir),
      prefloat_prop_rot_dir:
        source.prefloat_prop_rot_dir === undefined ? undefined : reverseRotation(source.prefloat_prop_rot_dir),
    }
  }
}

/**
 * Keep the source motion as it is; used after a color swap
 */
const sourceMotion: MotionTransform = (source, previous) => continueFrom(previous, source, source.end_loc)

function draftFrom(source: Beat, previous: Beat, transform: MotionTransform, swapColors: boolean): CapDraft {
  const motionFor = (color: Color) => {
    const sourceColor = swapColors ? partnerColor(color) : color
    return transform(motionOf(source, sourceColor), motionOf(previous, color))
  }

  return {
    letter: source.letter,
    letter_type: source.letter_type,
    timing: source.timing,
    direction: source.direction,
    blue: motionFor(colors.blue),
    red: motionFor(colors.red),
  }
}

// ============================================================================
// Preconditions
// ============================================================================

function lastEndPosition(beats: ReadonlyArray<Beat>): PositionKey | null {
  const last = beats[beats.length - 1]
  return last === undefined ? null : last.end_pos
}

function endsWhereItStarted(beats: ReadonlyArray<Beat>, initialPosition: PositionKey): string | null {
  const end = lastEndPosition(beats)
  return end === initialPosition ? null : `must end at its start position ${initialPosition}, ends at ${end}`
}

function endsColorSwapped(beats: ReadonlyArray<Beat>, initialPosition: PositionKey): string | null {
  const { blue, red } = positionLocations(initialPosition)
  const swapped = combine(red, blue)
  const end = lastEndPosition(beats)
  return end === swapped ? null : `must end at ${swapped} with the hands swapped, ends at ${end}`
}

const always = () => null

// ============================================================================
// Strategies
// ============================================================================

export function capStrategyFor(variant: CapVariant, options: CapStrategyOptions = {}): CapStrategy {
  const axis = options.mirrorAxis ?? mirrorAxes.vertical
  const halved = forwardIndexMap(capSlices.halved)

  switch (variant) {
    case capVariants.strictRotated: {
      const slice = options.slice ?? capSlices.halved
      return {
        variant,
        slice,
        indexMap: forwardIndexMap(slice),
        transform: (source, previous) => draftFrom(source, previous, rotatedMotion, false),
        precondition: always,
      }
    }
    case capVariants.strictMirrored:
      return {
        variant,
        slice: capSlices.halved,
        indexMap: halved,
        transform: (source, previous) => draftFrom(source, previous, mirroredMotion(axis), false),
        precondition: endsWhereItStarted,
      }
    case capVariants.strictSwapped:
      return {
        variant,
        slice: capSlices.halved,
        indexMap: halved,
        transform: (source, previous) => draftFrom(source, previous, sourceMotion, true),
        precondition: endsColorSwapped,
      }
    case capVariants.mirroredSwapped:
      return {
        variant,
        slice: capSlices.halved,
        indexMap: halved,
        transform: (source, previous) => draftFrom(source, previous, mirroredMotion(axis), true),
        precondition: endsWhereItStarted,
      }
    case capVariants.rotatedSwapped:
      return {
        variant,
        slice: capSlices.halved,
        indexMap: halved,
        transform: (source, previous) => draftFrom(source, previous, rotatedMotion, true),
        precondition: always,
      }
  }
}

/**
 * Slice a strict rotation needs to close the circle: halved when the partial
 * sequence ends half a turn from where it started, quartered for a quarter
 * turn, null when it does neither.
 */
export function inferRotationSlice(beats: ReadonlyArray<Beat>, initialPosition: PositionKey): CapSlice | null {
  const end = lastEndPosition(beats)
  if (end === null) return null

  const start = positionLocations(initialPosition)
  const finish = positionLocations(end)
  const turned = (steps: number) =>
    colorOrder.every((color) => compassDistance(start[color], finish[color]) === steps)

  if (turned(4)) return capSlices.halved
  if (turned(2) || turned(6)) return capSlices.quartered
  return null
}

function compassDistance(from: Location, to: Location): number {
  return (compassOrder.indexOf(to) - compassOrder.indexOf(from) + 8) % 8
}
