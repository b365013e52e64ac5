/**
 * Beat Engine - Dash Location Tables
 *
 * Anchor tables for dash arrows, loaded from `dashLocationTables.json` and
 * validated once at module load.
 *
 * Keys: `start-end` for a motion's locations, `|` to append a second
 * location (the partner's end, or the shift arrow's anchor).
 */

import { z } from 'zod'
import { beatKeywords, locationSchema } from '../vocabulary'
import type { Color, GridMode, Location, MotionAttributes } from '../vocabulary'
import rawTables from './dashLocationTables.json'

const { rotationDirections: rot } = beatKeywords

const locationTableSchema = z.record(z.string(), locationSchema)

const dashTablesSchema = z.object({
  doubleDash: z.object({ blue: locationTableSchema, red: locationTableSchema }),
  lambdaZeroTurns: locationTableSchema,
  zeroTurns: locationTableSchema,
  nonZeroTurns: z.object({ cw: locationTableSchema, ccw: locationTableSchema }),
  shiftComposed: z.object({ diamond: locationTableSchema, box: locationTableSchema }),
})

type LocationTable = ReadonlyMap<string, Location>

const toMap = (table: Record<string, Location>): LocationTable => new Map(Object.entries(table))

const parsed = dashTablesSchema.parse(rawTables)

const tables = {
  doubleDash: { blue: toMap(parsed.doubleDash.blue), red: toMap(parsed.doubleDash.red) },
  lambdaZeroTurns: toMap(parsed.lambdaZeroTurns),
  zeroTurns: toMap(parsed.zeroTurns),
  nonZeroTurns: { cw: toMap(parsed.nonZeroTurns.cw), ccw: toMap(parsed.nonZeroTurns.ccw) },
  shiftComposed: { diamond: toMap(parsed.shiftComposed.diamond), box: toMap(parsed.shiftComposed.box) },
} as const

const pathKey = (motion: Pick<MotionAttributes, 'start_loc' | 'end_loc'>) => `${motion.start_loc}-${motion.end_loc}`

// ============================================================================
// Lookups (undefined on a miss; callers fall back to the start location)
// ============================================================================

export function doubleDashLocation(color: Color, motion: MotionAttributes): Location | undefined {
  return tables.doubleDash[color].get(pathKey(motion))
}

export function lambdaZeroTurnsLocation(motion: MotionAttributes, partnerEnd: Location): Location | undefined {
  return tables.lambdaZeroTurns.get(`${pathKey(motion)}|${partnerEnd}`)
}

export function zeroTurnsLocation(motion: MotionAttributes): Location | undefined {
  return tables.zeroTurns.get(pathKey(motion))
}

export function nonZeroTurnsLocation(motion: MotionAttributes): Location | undefined {
  switch (motion.prop_rot_dir) {
    case rot.clockwise:
      return tables.nonZeroTurns.cw.get(motion.start_loc)
    case rot.counterClockwise:
      return tables.nonZeroTurns.ccw.get(motion.start_loc)
    case rot.none:
      return undefined
  }
}

/**
 * Anchor of a dash drawn next to a shift arrow (cross-shift letters)
 */
export function shiftComposedLocation(
  gridMode: GridMode,
  start: Location,
  shiftLocation: Location,
): Location | undefined {
  return tables.shiftComposed[gridMode].get(`${start}|${shiftLocation}`)
}
