/**
 * Beat Engine
 *
 * The facade an editor talks to. It composes the calculators around one
 * override store, one reference dataset and one configuration.
 *
 * Responsibilities:
 * - Apply interactive motion edits and keep positions, orientations and letter consistent
 * - Cache a bounded number of classifications, dropping them whenever the override store changes
 * - Generate and classify circular sequences with the configured defaults
 */

import {
  CapPreconditionError,
  beatKeywords,
  motionOf,
  partnerColor,
  validateEngineConfig,
  withMotion,
} from '../vocabulary'
import type {
  Beat,
  CapSlice,
  CapVariant,
  Color,
  EngineConfig,
  EngineConfigInput,
  MirrorAxis,
  MotionAttributes,
  ReferenceDataset,
  Sequence,
} from '../vocabulary'
import { combine } from '../geometry'
import { applyTurns, withEndOrientations } from '../orientation'
import type { OverrideStore } from '../overrides'
import { resolveArrowPlacement } from '../arrows'
import type { ArrowPlacement } from '../arrows'
import { createLetterClassifier } from '../letters'
import type { Classification } from '../letters'
import { classifyCap, generateCap, inferRotationSlice, initialPositionOf } from '../cap'
import type { CapClassification } from '../cap'

const { capSlices, capVariants } = beatKeywords

// ============================================================================
// Types
// ============================================================================

export type BeatEngineOptions = {
  dataset: ReferenceDataset
  store: OverrideStore
  config?: EngineConfigInput
  /** Most classifications kept between store changes, least recently used go first */
  cacheLimit?: number
}

const DEFAULT_CACHE_LIMIT = 1024

export type MotionPatch = Partial<Omit<MotionAttributes, 'prefloat_motion_type' | 'prefloat_prop_rot_dir'>>

export type CapRequest = {
  slice?: CapSlice
  mirrorAxis?: MirrorAxis
}

export type BeatEngine = {
  config: EngineConfig
  store: OverrideStore
  classify: (beat: Beat) => Classification | null
  updateMotion: (beat: Beat, color: Color, patch: MotionPatch) => Beat
  reclassify: (sequence: Sequence) => Sequence
  arrowPlacement: (beat: Beat, color: Color) => ArrowPlacement
  generateCap: (partial: Sequence, targetLength: number, variant: CapVariant, request?: CapRequest) => Sequence
  classifyCap: (sequence: Sequence) => CapClassification
  cacheSize: () => number
  dispose: () => void
}

// ============================================================================
// Factory
// ============================================================================

export function createBeatEngine(options: BeatEngineOptions): BeatEngine {
  const parsed = validateEngineConfig(options.config ?? {})
  if (!parsed.success) {
    throw new Error(`Invalid engine config: ${parsed.error.message}`)
  }
  const config = parsed.data
  const { store, cacheLimit = DEFAULT_CACHE_LIMIT } = options
  const classifier = createLetterClassifier(options.dataset)

  // Float resolution reads the store, so a store change can change a letter
  const classifications = new Map<string, Classification | null>()
  const unsubscribers = [
    store.on('overrides:changed', () => classifications.clear()),
    store.on('overrides:reset', () => classifications.clear()),
  ]

  const classify = (beat: Beat): Classification | null => {
    const cacheKey = JSON.stringify([beat.letter, beat.start_pos, beat.end_pos, beat.blue, beat.red])
    const cached = classifications.get(cacheKey)
    if (cached !== undefined) {
      classifications.delete(cacheKey)
      classifications.set(cacheKey, cached)
      return cached
    }
    const result = classifier.tryClassify(beat, { store })
    classifications.set(cacheKey, result)
    if (classifications.size > cacheLimit) {
      const oldest = classifications.keys().next()
      if (!oldest.done) classifications.delete(oldest.value)
    }
    return result
  }

  const withLetter = (beat: Beat): Beat => {
    const result = classify(beat)
    if (result === null) {
      console.warn(`[BeatEngine] Beat ${beat.beat_number} matches no letter, leaving it blank`)
      return { ...beat, letter: null, letter_type: null }
    }
    return { ...beat, letter: result.letter, letter_type: result.letterType }
  }

  const updateMotion = (beat: Beat, color: Color, patch: MotionPatch): Beat => {
    const current = motionOf(beat, color)
    const { turns = current.turns, ...fields } = patch
    const edited = applyTurns({ ...current, ...fields }, turns, { color, beat, store })

    const moved = withMotion(beat, color, edited)
    const positioned: Beat = {
      ...moved,
      start_pos: combine(moved.blue.start_loc, moved.red.start_loc),
      end_pos: combine(moved.blue.end_loc, moved.red.end_loc),
    }

    return withEndOrientations(withLetter(positioned), store)
  }

  const reclassify = (sequence: Sequence): Sequence => ({
    ...sequence,
    beats: sequence.beats.map(withLetter),
  })

  const arrowPlacement = (beat: Beat, color: Color): ArrowPlacement =>
    resolveArrowPlacement(
      motionOf(beat, color),
      motionOf(beat, partnerColor(color)),
      { color, letter: beat.letter, beat, store },
      config.gridMode,
      config.placement,
    )

  /**
   * Slice that brings a strict rotation back to its start at `targetLength`:
   * a half turn replayed once, or a quarter turn replayed three times.
   */
  const rotationSliceFor = (partial: Sequence, targetLength: number): CapSlice => {
    const initialPosition = initialPositionOf(partial)
    const length = partial.beats.length
    const end = partial.beats[length - 1]?.end_pos
    const turn = inferRotationSlice(partial.beats, initialPosition)

    if (turn === capSlices.quartered && targetLength === 4 * length) return capSlices.quartered
    if (turn === capSlices.halved || end === initialPosition) return capSlices.halved

    const reason =
      turn === capSlices.quartered
        ? `a quarter turn of ${length} beats closes in ${4 * length} beats, not ${targetLength}`
        : `ends at ${end}, neither a half nor a quarter turn from ${initialPosition}`
    throw new CapPreconditionError(`${capVariants.strictRotated}: sequence ${reason}`)
  }

  const generate = (partial: Sequence, targetLength: number, variant: CapVariant, request: CapRequest = {}) => {
    let slice = request.slice
    if (slice === undefined && variant === capVariants.strictRotated) {
      slice = rotationSliceFor(partial, targetLength)
    }

    const result = generateCap(partial, targetLength, variant, {
      slice,
      mirrorAxis: request.mirrorAxis ?? config.mirrorAxis,
      store,
    })
    console.log(`[BeatEngine] ${variant}: ${partial.beats.length} → ${result.beats.length} beats`)
    return result
  }

  return {
    config,
    store,
    classify,
    updateMotion,
    reclassify,
    arrowPlacement,
    generateCap: generate,
    classifyCap: (sequence) => classifyCap(sequence, store),
    cacheSize: () => classifications.size,
    dispose: () => {
      unsubscribers.forEach((unsubscribe) => unsubscribe())
      classifications.clear()
    },
  }
}

