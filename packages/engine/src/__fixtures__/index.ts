/**
 * Test fixtures: the reference dataset and builders for beats and motions
 */

import { combine } from '../geometry'
import { parseReferenceDataset } from '../letters'
import type { Beat, MotionAttributes } from '../vocabulary'
import rawDataset from './referenceDataset.json'

export const referenceDataset = parseReferenceDataset(rawDataset)

type MotionFields = Pick<MotionAttributes, 'motion_type' | 'start_loc' | 'end_loc'> & Partial<MotionAttributes>

/**
 * Motion starting "in" with zero turns and no rotation unless told otherwise
 */
export function motion(fields: MotionFields): MotionAttributes {
  return {
    start_ori: 'in',
    end_ori: 'in',
    turns: 0,
    prop_rot_dir: 'no_rot',
    ...fields,
  }
}

type BeatFields = Pick<Beat, 'blue' | 'red'> & Partial<Beat>

/**
 * Beat whose positions follow from its motions
 */
export function beat(fields: BeatFields): Beat {
  return {
    beat_number: 1,
    letter: null,
    letter_type: null,
    timing: 'none',
    direction: 'none',
    start_pos: combine(fields.blue.start_loc, fields.red.start_loc),
    end_pos: combine(fields.blue.end_loc, fields.red.end_loc),
    ...fields,
  }
}
