/**
 * Beat Engine - Letter Classifier
 *
 * Maps a beat to the letter whose template shares its signature.
 *
 * Responsibilities:
 * - Build the signature index once per dataset
 * - Resolve float motions the same way the orientation calculator does
 * - Report conflicting templates instead of silently overwriting them
 *
 * Classification is pure: the same beat against the same dataset and store
 * always yields the same letter.
 */

import { UnclassifiedPictograph, letterValues } from '../vocabulary'
import type { Beat, Letter, LetterType, ReferenceDataset } from '../vocabulary'
import type { OverrideStoreReader } from '../overrides'
import { letterTypeOf } from './letterTypes'
import { pictographSignature } from './signature'

// ============================================================================
// Types
// ============================================================================

export type Classification = {
  letter: Letter
  letterType: LetterType
}

export type ClassifyContext = {
  store?: OverrideStoreReader
}

export type LetterClassifier = {
  classify: (beat: Beat, context?: ClassifyContext) => Classification
  tryClassify: (beat: Beat, context?: ClassifyContext) => Classification | null
  signatureOf: (beat: Beat, context?: ClassifyContext) => string
  size: () => number
}

// ============================================================================
// Index
// ============================================================================

function buildSignatureIndex(dataset: ReferenceDataset): ReadonlyMap<string, Letter> {
  const index = new Map<string, Letter>()

  for (const letter of letterValues) {
    for (const record of dataset[letter] ?? []) {
      const signature = pictographSignature(record)
      const existing = index.get(signature)
      if (existing === undefined) {
        index.set(signature, letter)
      } else if (existing !== letter) {
        console.warn(`[LetterClassifier] Template for ${letter} shares a signature with ${existing}, keeping ${existing}`)
      }
    }
  }

  return index
}

// ============================================================================
// Classifier
// ============================================================================

export function createLetterClassifier(dataset: ReferenceDataset): LetterClassifier {
  const index = buildSignatureIndex(dataset)

  const signatureOf = (beat: Beat, context: ClassifyContext = {}) =>
    pictographSignature(beat, { beat, store: context.store })

  const tryClassify = (beat: Beat, context?: ClassifyContext): Classification | null => {
    const letter = index.get(signatureOf(beat, context))
    if (letter === undefined) {
      return null
    }
    return { letter, letterType: letterTypeOf(letter) }
  }

  const classify = (beat: Beat, context?: ClassifyContext): Classification => {
    const result = tryClassify(beat, context)
    if (result === null) {
      throw new UnclassifiedPictograph(signatureOf(beat, context))
    }
    return result
  }

  return {
    classify,
    tryClassify,
    signatureOf,
    size: () => index.size,
  }
}

const classifiers = new WeakMap<ReferenceDataset, LetterClassifier>()

/**
 * Classify against a dataset without holding on to a classifier. The index
 * is built on first use and reused for as long as the dataset lives.
 */
export function classifyBeat(beat: Beat, dataset: ReferenceDataset, store?: OverrideStoreReader): Classification {
  let classifier = classifiers.get(dataset)
  if (!classifier) {
    classifier = createLetterClassifier(dataset)
    classifiers.set(dataset, classifier)
  }
  return classifier.classify(beat, { store })
}
