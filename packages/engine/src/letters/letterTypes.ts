/**
 * Beat Engine - Letter Types
 *
 * The static six-way partition of the alphabet.
 */

import { beatKeywords, letterSchema } from '../vocabulary'
import type { Letter, LetterType } from '../vocabulary'

const { letterTypes } = beatKeywords

export const lettersByType: Readonly<Record<LetterType, ReadonlyArray<Letter>>> = {
  [letterTypes.dualShift]: [
    'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K',
    'L', 'M', 'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V',
  ],
  [letterTypes.shift]: ['W', 'X', 'Y', 'Z', 'Σ', 'Δ', 'θ', 'Ω'],
  [letterTypes.crossShift]: ['W-', 'X-', 'Y-', 'Z-', 'Σ-', 'Δ-', 'θ-', 'Ω-'],
  [letterTypes.dash]: ['Φ', 'Ψ', 'Λ'],
  [letterTypes.dualDash]: ['Φ-', 'Ψ-', 'Λ-'],
  [letterTypes.static]: ['α', 'β', 'Γ'],
}

const typeByLetter: ReadonlyMap<Letter, LetterType> = new Map(
  Object.values(letterTypes).flatMap((letterType) =>
    lettersByType[letterType].map((letter): [Letter, LetterType] => [letter, letterType]),
  ),
)

export function isLetter(value: unknown): value is Letter {
  return letterSchema.safeParse(value).success
}

export function letterTypeOf(letter: Letter): LetterType {
  const letterType = typeByLetter.get(letter)
  if (letterType === undefined) {
    // Every Letter is listed above; reaching this means the two lists drifted apart
    throw new Error(`Letter ${letter} has no letter type`)
  }
  return letterType
}

/**
 * Dual-dash letters drawn as one combined shape
 */
export const doubleDashLetters: ReadonlySet<Letter> = new Set<Letter>(['Φ-', 'Ψ-'])

/**
 * Letters whose zero-turn dash is placed relative to the partner's end
 */
export const lambdaLetters: ReadonlySet<Letter> = new Set<Letter>(['Λ', 'Λ-'])
