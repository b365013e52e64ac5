/**
 * Beat Schemas
 *
 * Zod schemas for every record the engine reads or writes: motions, beats,
 * sequences, reference dataset entries and the engine configuration.
 *
 * Philosophy:
 * - Schemas define types (z.infer), never the other way round
 * - Snake_case field names match the persisted sequence files
 * - Validation happens at the edges (import, load); calculators trust their input
 */

import { z } from 'zod'
import { beatKeywords, letterValues, positionKeyValues } from './keywords'

const k = beatKeywords

// ============================================================================
// Primitive Schemas
// ============================================================================

export const locationSchema = z.enum([
  k.locations.north,
  k.locations.northEast,
  k.locations.east,
  k.locations.southEast,
  k.locations.south,
  k.locations.southWest,
  k.locations.west,
  k.locations.northWest,
])

export const rotationDirectionSchema = z.enum([
  k.rotationDirections.clockwise,
  k.rotationDirections.counterClockwise,
  k.rotationDirections.none,
])

export const orientationSchema = z.enum([
  k.orientations.in,
  k.orientations.out,
  k.orientations.clock,
  k.orientations.counter,
])

export const motionTypeSchema = z.enum([
  k.motionTypes.pro,
  k.motionTypes.anti,
  k.motionTypes.static,
  k.motionTypes.dash,
  k.motionTypes.float,
])

export const gridModeSchema = z.enum([k.gridModes.diamond, k.gridModes.box])

export const colorSchema = z.enum([k.colors.blue, k.colors.red])

export const timingSchema = z.enum([k.timings.split, k.timings.together, k.timings.none])

export const directionSchema = z.enum([
  k.directions.same,
  k.directions.opposite,
  k.directions.none,
])

export const mirrorAxisSchema = z.enum([k.mirrorAxes.vertical, k.mirrorAxes.horizontal])

export const capVariantSchema = z.enum([
  k.capVariants.strictRotated,
  k.capVariants.strictMirrored,
  k.capVariants.strictSwapped,
  k.capVariants.mirroredSwapped,
  k.capVariants.rotatedSwapped,
])

export const capSliceSchema = z.enum([k.capSlices.halved, k.capSlices.quartered])

export const orientationCategorySchema = z.enum([
  k.orientationCategories.layer1,
  k.orientationCategories.layer2,
  k.orientationCategories.layer3Blue1Red2,
  k.orientationCategories.layer3Blue2Red1,
])

export const letterTypeSchema = z.enum([
  k.letterTypes.dualShift,
  k.letterTypes.shift,
  k.letterTypes.crossShift,
  k.letterTypes.dash,
  k.letterTypes.dualDash,
  k.letterTypes.static,
])

export const letterSchema = z.enum(letterValues)

export const positionKeySchema = z.enum(positionKeyValues)

/**
 * Turns: a non-negative multiple of 0.5, or the float sentinel.
 * Arithmetic rules live in the orientation calculator.
 */
export const turnsSchema = z.union([
  z.number().nonnegative().multipleOf(0.5),
  z.literal(k.turns.float),
])

export type Turns = z.infer<typeof turnsSchema>

// ============================================================================
// Motion & Beat Schemas
// ============================================================================

/**
 * One color's motion within a beat
 */
export const motionAttributesSchema = z.object({
  motion_type: motionTypeSchema,
  start_loc: locationSchema,
  end_loc: locationSchema,
  start_ori: orientationSchema,
  end_ori: orientationSchema,
  turns: turnsSchema,
  prop_rot_dir: rotationDirectionSchema,
  // Recorded when a shift is turned into a float, used to resolve the float later
  prefloat_motion_type: motionTypeSchema.optional(),
  prefloat_prop_rot_dir: rotationDirectionSchema.optional(),
})

export type MotionAttributes = z.infer<typeof motionAttributesSchema>

export const beatSchema = z.object({
  beat_number: z.number().int().nonnegative(),
  letter: letterSchema.nullable(),
  letter_type: letterTypeSchema.nullable(),
  start_pos: positionKeySchema,
  end_pos: positionKeySchema,
  timing: timingSchema,
  direction: directionSchema,
  blue: motionAttributesSchema,
  red: motionAttributesSchema,
})

export type Beat = z.infer<typeof beatSchema>

export const sequenceSchema = z
  .object({
    start_position_beat: beatSchema.optional(),
    beats: z.array(beatSchema),
  })
  .refine(
    (sequence) =>
      sequence.beats.every(
        (beat, index) => index === 0 || beat.beat_number > sequence.beats[index - 1].beat_number,
      ),
    { message: 'Beat numbers must increase monotonically', path: ['beats'] },
  )

export type Sequence = z.infer<typeof sequenceSchema>

// ============================================================================
// Reference Dataset Schemas
// ============================================================================

/**
 * Canonical template for one letter: both motions plus the positions
 */
export const referenceRecordSchema = z.object({
  start_pos: positionKeySchema,
  end_pos: positionKeySchema,
  timing: timingSchema.optional(),
  direction: directionSchema.optional(),
  blue: motionAttributesSchema,
  red: motionAttributesSchema,
})

export type ReferenceRecord = z.infer<typeof referenceRecordSchema>

export const referenceDatasetSchema = z.record(letterSchema, z.array(referenceRecordSchema))

export type ReferenceDataset = z.infer<typeof referenceDatasetSchema>

// ============================================================================
// Engine Configuration
// ============================================================================

export const offsetSchema = z.tuple([z.number(), z.number()])

export type Offset = z.infer<typeof offsetSchema>

export const placementConfigSchema = z.object({
  defaults: z
    .object({
      shift: offsetSchema.default([40, 40]),
      dash: offsetSchema.default([0, 45]),
      static: offsetSchema.default([0, 30]),
    })
    .default({}),
  // Base offset used when both arrows anchor on the same point
  collision: offsetSchema.default([60, 20]),
})

export type PlacementConfig = z.infer<typeof placementConfigSchema>

export const engineConfigSchema = z.object({
  gridMode: gridModeSchema.default(k.gridModes.diamond),
  mirrorAxis: mirrorAxisSchema.default(k.mirrorAxes.vertical),
  overrideStorePath: z.string().min(1).optional(),
  datasetPath: z.string().min(1).optional(),
  placement: placementConfigSchema.default({}),
})

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type EngineConfigInput = z.input<typeof engineConfigSchema>

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Validate an engine configuration
 */
export function validateEngineConfig(config: unknown) {
  return engineConfigSchema.safeParse(config)
}

/**
 * Validate a single beat record
 */
export function validateBeat(beat: unknown) {
  return beatSchema.safeParse(beat)
}

/**
 * Validate a sequence record
 */
export function validateSequence(sequence: unknown) {
  return sequenceSchema.safeParse(sequence)
}
