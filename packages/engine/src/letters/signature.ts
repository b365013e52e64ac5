/**
 * Beat Engine - Pictograph Signature
 *
 * A letter is determined by what the hands and props do, never by where on
 * the grid it happens or how many turns the props make. The signature keeps
 * exactly that, so rotated and mirrored copies of a beat share one key:
 *
 * - start and end position family
 * - per color: effective motion type, rotation against the hand path, hand path kind
 * - whether two shifting hands travel the same way
 * - how many hands land where the other one started
 */

import { beatKeywords, colorOrder, motionOf } from '../vocabulary'
import type { Beat, Color, MotionAttributes, ReferenceRecord } from '../vocabulary'
import { handpathOf, positionFamily, rotationOfHandpath } from '../geometry'
import { resolveEffectiveMotion } from '../orientation'
import type { OverrideStoreReader } from '../overrides'

const { handpaths, motionTypes } = beatKeywords

// ============================================================================
// Types
// ============================================================================

export type SignatureSource = Pick<ReferenceRecord, 'start_pos' | 'end_pos' | 'blue' | 'red'>

export type SignatureContext = {
  beat?: Beat
  store?: OverrideStoreReader
}

type HandpathKind = 'shift' | 'dash' | 'static'
type RotationCategory = 'with' | 'against' | 'free'

// ============================================================================
// Parts
// ============================================================================

function handpathKind(motion: MotionAttributes): HandpathKind {
  const handpath = handpathOf(motion.start_loc, motion.end_loc)
  if (handpath === handpaths.dash) return 'dash'
  if (handpath === handpaths.static) return 'static'
  return 'shift'
}

function motionPart(source: SignatureSource, color: Color, context: SignatureContext): string {
  const motion = motionOf(source, color)
  const concrete = resolveEffectiveMotion(motion, { color, beat: context.beat, store: context.store })
  const kind = handpathKind(motion)

  let rotation: RotationCategory = 'free'
  if (kind === 'shift' && (concrete.motion_type === motionTypes.pro || concrete.motion_type === motionTypes.anti)) {
    const handRotation = rotationOfHandpath(handpathOf(motion.start_loc, motion.end_loc))
    rotation = concrete.prop_rot_dir === handRotation ? 'with' : 'against'
  }

  return `${color}:${concrete.motion_type}:${rotation}:${kind}`
}

function relationPart(source: SignatureSource): string {
  const blue = handpathOf(source.blue.start_loc, source.blue.end_loc)
  const red = handpathOf(source.red.start_loc, source.red.end_loc)
  const shifting = (handpath: string) =>
    handpath === handpaths.clockwise || handpath === handpaths.counterClockwise

  if (!shifting(blue) || !shifting(red)) return 'rel:none'
  return blue === red ? 'rel:same' : 'rel:opp'
}

function handoffPart(source: SignatureSource): string {
  const handoffs =
    Number(source.blue.end_loc === source.red.start_loc) + Number(source.red.end_loc === source.blue.start_loc)
  return `handoff:${handoffs}`
}

// ============================================================================
// Signature
// ============================================================================

export function pictographSignature(source: SignatureSource, context: SignatureContext = {}): string {
  return [
    `${positionFamily(source.start_pos)}>${positionFamily(source.end_pos)}`,
    ...colorOrder.map((color) => motionPart(source, color, context)),
    relationPart(source),
    handoffPart(source),
  ].join('|')
}
