/**
 * Beat Engine - Reference Dataset
 *
 * The letter templates the classifier learns from: for every letter, the
 * beats that spell it. Read once at startup and never mutated.
 */

import { readFile } from 'node:fs/promises'
import { DatasetValidationError, referenceDatasetSchema } from '../vocabulary'
import type { ReferenceDataset } from '../vocabulary'

export function parseReferenceDataset(raw: unknown): ReferenceDataset {
  const result = referenceDatasetSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue ? issue.path.join('.') : '(root)'
    throw new DatasetValidationError(`Reference dataset is invalid at ${where}: ${issue?.message ?? 'unknown issue'}`, result.error)
  }
  return result.data
}

export async function loadReferenceDataset(path: string): Promise<ReferenceDataset> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new DatasetValidationError(`Reference dataset at ${path} could not be read`, error)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new DatasetValidationError(`Reference dataset at ${path} is not valid JSON`, error)
  }

  return parseReferenceDataset(raw)
}

export function recordCount(dataset: ReferenceDataset): number {
  return Object.values(dataset).reduce((total, records) => total + (records?.length ?? 0), 0)
}
