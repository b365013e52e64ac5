/**
 * Beat Engine - CAP Verifier
 *
 * Decides which circular pattern, if any, a finished sequence follows by
 * asking the generator to rebuild its second half from its first half.
 */

import { BeatEngineError, beatKeywords, colorOrder, motionOf } from '../vocabulary'
import type { Beat, CapSlice, CapVariant, MirrorAxis, Sequence } from '../vocabulary'
import { positionFamily } from '../geometry'
import type { OverrideStoreReader } from '../overrides'
import { generateCap, initialPositionOf } from './capGenerator'

const { capVariants, capSlices, mirrorAxes } = beatKeywords

// ============================================================================
// Types
// ============================================================================

export type CapProperties = {
  is_strict_rotated: boolean
  is_strict_mirrored: boolean
  is_strict_swapped: boolean
  is_mirrored_swapped: boolean
  is_rotated_swapped: boolean
  ends_at_start_pos: boolean
  can_be_CAP: boolean
}

export type CapClassification = CapProperties & {
  word: string
}

type VariantProperty = Exclude<keyof CapProperties, 'ends_at_start_pos' | 'can_be_CAP'>

const variantProperties: Readonly<Record<CapVariant, VariantProperty>> = {
  [capVariants.strictRotated]: 'is_strict_rotated',
  [capVariants.strictMirrored]: 'is_strict_mirrored',
  [capVariants.strictSwapped]: 'is_strict_swapped',
  [capVariants.mirroredSwapped]: 'is_mirrored_swapped',
  [capVariants.rotatedSwapped]: 'is_rotated_swapped',
}

// Generator enumeration order
const variantOrder: ReadonlyArray<CapVariant> = Object.values(capVariants)

// ============================================================================
// Structural Comparison
// ============================================================================

function sameBeat(expected: Beat, actual: Beat): boolean {
  return (
    expected.letter === actual.letter &&
    expected.start_pos === actual.start_pos &&
    expected.end_pos === actual.end_pos &&
    colorOrder.every((color) => {
      const a = motionOf(expected, color)
      const b = motionOf(actual, color)
      return (
        a.motion_type === b.motion_type &&
        a.prop_rot_dir === b.prop_rot_dir &&
        a.start_loc === b.start_loc &&
        a.end_loc === b.end_loc &&
        a.turns === b.turns
      )
    })
  )
}

function slicesFor(variant: CapVariant, length: number): ReadonlyArray<CapSlice> {
  if (variant === capVariants.strictRotated && length % 4 === 0) {
    return [capSlices.halved, capSlices.quartered]
  }
  return [capSlices.halved]
}

function axesFor(variant: CapVariant): ReadonlyArray<MirrorAxis | undefined> {
  if (variant === capVariants.strictMirrored || variant === capVariants.mirroredSwapped) {
    return [mirrorAxes.vertical, mirrorAxes.horizontal]
  }
  return [undefined]
}

function rebuilds(
  sequence: Sequence,
  variant: CapVariant,
  slice: CapSlice,
  mirrorAxis: MirrorAxis | undefined,
  store?: OverrideStoreReader,
): boolean {
  const { beats } = sequence
  const kept = slice === capSlices.quartered ? Math.floor(beats.length / 4) : Math.floor(beats.length / 2)
  if (kept < 1) {
    return false
  }

  let rebuilt: Sequence
  try {
    rebuilt = generateCap(
      { start_position_beat: sequence.start_position_beat, beats: beats.slice(0, kept) },
      beats.length,
      variant,
      { slice, mirrorAxis, store },
    )
  } catch (error) {
    // The first part cannot produce this variant at all
    if (error instanceof BeatEngineError) {
      return false
    }
    throw error
  }

  return beats.slice(kept).every((beat, offset) => {
    const expected = rebuilt.beats[kept + offset]
    return expected !== undefined && sameBeat(expected, beat)
  })
}

export function isCapVariant(sequence: Sequence, variant: CapVariant, store?: OverrideStoreReader): boolean {
  if (sequence.beats.length < 2) {
    return false
  }
  return slicesFor(variant, sequence.beats.length).some((slice) =>
    axesFor(variant).some((axis) => rebuilds(sequence, variant, slice, axis, store)),
  )
}

// ============================================================================
// Classification
// ============================================================================

export function detectCapVariant(sequence: Sequence, store?: OverrideStoreReader): CapVariant | null {
  return variantOrder.find((variant) => isCapVariant(sequence, variant, store)) ?? null
}

export function sequenceWord(sequence: Sequence): string {
  return sequence.beats.map((beat) => beat.letter ?? '').join('')
}

export function classifyCap(sequence: Sequence, store?: OverrideStoreReader): CapClassification {
  const detected = detectCapVariant(sequence, store)
  const last = sequence.beats[sequence.beats.length - 1]

  let endsAtStart = false
  let sameFamily = false
  if (last !== undefined) {
    const initial = initialPositionOf(sequence)
    endsAtStart = last.end_pos === initial
    sameFamily = positionFamily(last.end_pos) === positionFamily(initial)
  }

  const properties: CapProperties = {
    is_strict_rotated: false,
    is_strict_mirrored: false,
    is_strict_swapped: false,
    is_mirrored_swapped: false,
    is_rotated_swapped: false,
    ends_at_start_pos: endsAtStart,
    can_be_CAP: sameFamily,
  }
  if (detected !== null) {
    properties[variantProperties[detected]] = true
  }

  return { ...properties, word: sequenceWord(sequence) }
}
