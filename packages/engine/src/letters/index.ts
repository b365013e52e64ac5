/**
 * Beat Engine - Letters
 */

export * from './letterTypes'
export * from './signature'
export * from './referenceDataset'
export * from './letterClassifier'
